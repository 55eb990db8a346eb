import {
  IEpaperService,
  IEpaperDriver,
  IHardwareAdapter,
  IRefreshCoordinator,
  IMenuStateMachine,
  IAnimationScheduler,
  IButtonInput,
  IButtonService,
  IInboundEventChannel,
  IPetStateService,
  IMessageLogService,
  ISettingsService,
  IStatsService,
  ICompanionClient,
  IApiServer,
} from "@core/interfaces";
import {
  ButtonConfig,
  DeviceConfig,
  EpaperConfig,
  LoopConfig,
  MenuConfig,
  PanelRotation,
  PetConfig,
  RefreshConfig,
  WebConfig,
} from "@core/types";
import { ConfigError } from "@core/errors";
import {
  DEVICE_DEFAULT_NAME,
  DEVICE_DEFAULT_API_PORT,
  DEVICE_DEFAULT_DATA_DIRECTORY,
  EPAPER_DEFAULT_WIDTH,
  EPAPER_DEFAULT_HEIGHT,
  EPAPER_DEFAULT_PIN_RESET,
  EPAPER_DEFAULT_PIN_DC,
  EPAPER_DEFAULT_PIN_BUSY,
  EPAPER_DEFAULT_PIN_CS,
  EPAPER_DEFAULT_SPI_BUS,
  EPAPER_DEFAULT_SPI_DEVICE_NUM,
  EPAPER_DEFAULT_SPI_SPEED_HZ,
  EPAPER_DEFAULT_ROTATION,
  EPAPER_DEFAULT_DRIVER,
  REFRESH_DEFAULT_FULL_CYCLE_LIMIT,
  REFRESH_DEFAULT_FULL_TIME_LIMIT_MS,
  MENU_DEFAULT_MIN_BUTTON_INTERVAL_MS,
  MENU_DEFAULT_FAILURE_THRESHOLD,
  LOOP_DEFAULT_TICK_INTERVAL_MS,
  LOOP_DEFAULT_PET_UPDATE_INTERVAL_MS,
  LOOP_DEFAULT_ANIMATION_INTERVAL_MS,
  LOOP_DEFAULT_INBOUND_CHECK_INTERVAL_MS,
  BUTTON_DEFAULT_PIN_RETURN,
  BUTTON_DEFAULT_PIN_ACTION,
  BUTTON_DEFAULT_PIN_GO,
  BUTTON_DEFAULT_DEBOUNCE_MS,
  BUTTON_DEFAULT_LONG_PRESS_MS,
  PET_DEFAULT_NAME,
  PET_DEFAULT_TYPE,
  WEB_DEFAULT_HOST,
  WEB_DEFAULT_API_BASE_PATH,
} from "@core/constants";
import { MockAdapter } from "@services/epaper/adapters/MockAdapter";
import { SpidevAdapter } from "@services/epaper/adapters/SpidevAdapter";
import { MockDisplayDriver } from "@services/epaper/drivers/MockDisplayDriver";
import { Waveshare2in13V4Driver } from "@services/epaper/drivers/Waveshare2in13V4Driver";
import { EpaperService } from "@services/epaper/EPaperService";
import { SysfsGpio } from "@services/gpio/SysfsGpio";
import { RefreshCoordinator } from "@services/refresh/RefreshCoordinator";
import { SettingsService } from "@services/state/SettingsService";
import { StatsService } from "@services/state/StatsService";
import { PetStateService } from "@services/state/PetStateService";
import { MessageLogService } from "@services/state/MessageLogService";
import { CompanionClient } from "@services/companion/CompanionClient";
import { SpriteLibrary } from "@services/animation/SpriteLibrary";
import { AnimationScheduler } from "@services/animation/AnimationScheduler";
import { MenuContext } from "@services/menu/BaseMenu";
import { HomeMenu } from "@services/menu/HomeMenu";
import { MessagesMenu } from "@services/menu/MessagesMenu";
import { StatsMenu } from "@services/menu/StatsMenu";
import { SettingsMenu } from "@services/menu/SettingsMenu";
import { MenuStateMachine } from "@services/menu/MenuStateMachine";
import { ButtonEventQueue } from "@services/buttons/ButtonEventQueue";
import { ButtonService } from "@services/buttons/ButtonService";
import { KeyboardButtonInput } from "@services/buttons/KeyboardButtonInput";
import { GpioButtonInput } from "@services/buttons/GpioButtonInput";
import { InboundEventChannel } from "@services/inbound/InboundEventChannel";
import { PetClockOrchestrator } from "@services/orchestrator/PetClockOrchestrator";
import { ApiServer } from "@web/ApiServer";

/**
 * Display driver factory function type
 */
type DriverFactory = (config: EpaperConfig) => IEpaperDriver;

export type ButtonInputKind = "keyboard" | "gpio";

const PANEL_ROTATIONS: readonly PanelRotation[] = [0, 90, 180, 270];

/**
 * Service Container (Dependency Injection Container)
 *
 * Singleton that builds every service once, from environment-driven config.
 * Test setters replace a service before anything that depends on it is built.
 */
export class ServiceContainer {
  private static instance: ServiceContainer;

  private services: {
    gpio?: SysfsGpio;
    epaper?: IEpaperService;
    coordinator?: IRefreshCoordinator;
    settings?: ISettingsService;
    stats?: IStatsService;
    pet?: IPetStateService;
    messages?: IMessageLogService;
    companion?: ICompanionClient;
    sprites?: SpriteLibrary;
    animation?: IAnimationScheduler;
    menus?: IMenuStateMachine;
    buttonQueue?: ButtonEventQueue;
    buttonInput?: IButtonInput;
    buttons?: IButtonService;
    inbound?: IInboundEventChannel;
    orchestrator?: PetClockOrchestrator;
    apiServer?: IApiServer;
  } = {};

  /**
   * Registry of display driver factories
   * Key: driver name (e.g., 'waveshare_2in13_v4')
   */
  private driverFactories: Map<string, DriverFactory> = new Map();

  private constructor() {
    this.registerDefaultDrivers();
  }

  private registerDefaultDrivers(): void {
    this.registerDisplayDriver(
      "mock_display",
      (config) => new MockDisplayDriver(config.width, config.height),
    );
    this.registerDisplayDriver(
      "waveshare_2in13_v4",
      () => new Waveshare2in13V4Driver(),
    );
  }

  /**
   * Get singleton instance
   */
  static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer();
    }
    return ServiceContainer.instance;
  }

  /**
   * Reset the container (useful for testing)
   */
  static reset(): void {
    if (ServiceContainer.instance) {
      ServiceContainer.instance.services = {};
      ServiceContainer.instance.driverFactories.clear();
      ServiceContainer.instance.registerDefaultDrivers();
    }
  }

  /**
   * True when the panel and buttons should be simulated
   */
  isMockHardware(): boolean {
    return (
      process.env.USE_MOCK_EPAPER === "true" || process.platform !== "linux"
    );
  }

  // Panel

  /**
   * Get E-paper Service
   * Uses the mock adapter and driver on non-Linux platforms or when USE_MOCK_EPAPER=true
   */
  getEpaperService(): IEpaperService {
    if (!this.services.epaper) {
      const config = this.getEpaperConfig();
      if (this.isMockHardware()) {
        this.services.epaper = new EpaperService(
          config,
          new MockDisplayDriver(config.width, config.height),
          new MockAdapter(),
        );
      } else {
        const driver = this.createDisplayDriver(config.driver, config);
        this.services.epaper = new EpaperService(
          config,
          driver,
          this.createHardwareAdapter(),
        );
      }
    }
    return this.services.epaper;
  }

  /**
   * Register a display driver factory
   */
  registerDisplayDriver(name: string, factory: DriverFactory): void {
    this.driverFactories.set(name, factory);
  }

  getRegisteredDrivers(): string[] {
    return Array.from(this.driverFactories.keys());
  }

  /**
   * Create a display driver by name
   * @throws ConfigError if no driver is registered under that name
   */
  createDisplayDriver(name: string, config: EpaperConfig): IEpaperDriver {
    const factory = this.driverFactories.get(name);
    if (!factory) {
      throw ConfigError.invalidValue(
        "EPAPER_DRIVER",
        name,
        `one of ${this.getRegisteredDrivers().join(", ")}`,
      );
    }
    return factory(config);
  }

  /**
   * Create a hardware adapter for the current platform
   * Returns SpidevAdapter on Linux, MockAdapter elsewhere
   */
  createHardwareAdapter(): IHardwareAdapter {
    if (process.platform !== "linux") {
      return new MockAdapter();
    }
    return new SpidevAdapter(this.getGpio());
  }

  /**
   * Shared sysfs GPIO lines for the panel control pins and the buttons
   */
  getGpio(): SysfsGpio {
    if (!this.services.gpio) {
      this.services.gpio = new SysfsGpio({
        chipBase: parseInt(process.env.GPIO_CHIP_BASE || "0"),
      });
    }
    return this.services.gpio;
  }

  getRefreshCoordinator(): IRefreshCoordinator {
    if (!this.services.coordinator) {
      this.services.coordinator = new RefreshCoordinator(
        this.getEpaperService(),
        this.getRefreshConfig(),
      );
    }
    return this.services.coordinator;
  }

  // State

  getSettingsService(): ISettingsService {
    if (!this.services.settings) {
      this.services.settings = new SettingsService(
        this.getDeviceConfig().dataDirectory,
      );
    }
    return this.services.settings;
  }

  getStatsService(): IStatsService {
    if (!this.services.stats) {
      this.services.stats = new StatsService(
        this.getDeviceConfig().dataDirectory,
      );
    }
    return this.services.stats;
  }

  getPetStateService(): IPetStateService {
    if (!this.services.pet) {
      this.services.pet = new PetStateService(
        this.getDeviceConfig().dataDirectory,
        this.getPetConfig(),
        this.getSettingsService(),
      );
    }
    return this.services.pet;
  }

  getMessageLogService(): IMessageLogService {
    if (!this.services.messages) {
      this.services.messages = new MessageLogService(
        this.getDeviceConfig().dataDirectory,
      );
    }
    return this.services.messages;
  }

  getCompanionClient(): ICompanionClient {
    if (!this.services.companion) {
      this.services.companion = new CompanionClient(
        this.getDeviceConfig(),
        this.getStatsService(),
      );
    }
    return this.services.companion;
  }

  // Screen content

  getSpriteLibrary(): SpriteLibrary {
    if (!this.services.sprites) {
      this.services.sprites = process.env.SPRITES_DIR
        ? new SpriteLibrary(process.env.SPRITES_DIR)
        : new SpriteLibrary();
    }
    return this.services.sprites;
  }

  getAnimationScheduler(): IAnimationScheduler {
    if (!this.services.animation) {
      this.services.animation = new AnimationScheduler(
        this.getSpriteLibrary(),
        this.getPetStateService(),
        this.getLoopConfig().animationIntervalMs,
      );
    }
    return this.services.animation;
  }

  /**
   * Get the menu state machine with Home first, then Messages, Stats and Settings
   */
  getMenuStateMachine(): IMenuStateMachine {
    if (!this.services.menus) {
      const context: MenuContext = {
        coordinator: this.getRefreshCoordinator(),
        pet: this.getPetStateService(),
        messages: this.getMessageLogService(),
        settings: this.getSettingsService(),
        stats: this.getStatsService(),
        companion: this.getCompanionClient(),
        deviceName: this.getDeviceConfig().name,
      };
      const home = new HomeMenu(
        context,
        this.getAnimationScheduler(),
        this.getSpriteLibrary(),
      );
      this.services.menus = new MenuStateMachine(
        home,
        [
          new MessagesMenu(context),
          new StatsMenu(context),
          new SettingsMenu(context),
        ],
        context.coordinator,
        this.getMenuConfig(),
      );
    }
    return this.services.menus;
  }

  // Input

  getButtonEventQueue(): ButtonEventQueue {
    if (!this.services.buttonQueue) {
      this.services.buttonQueue = new ButtonEventQueue();
    }
    return this.services.buttonQueue;
  }

  /**
   * Which raw input drives the buttons: BUTTON_INPUT when set, otherwise
   * GPIO on real hardware and the keyboard everywhere else
   */
  getButtonInputKind(): ButtonInputKind {
    const requested = process.env.BUTTON_INPUT;
    if (requested === "keyboard" || requested === "gpio") {
      return requested;
    }
    if (requested) {
      throw ConfigError.invalidValue("BUTTON_INPUT", requested, "keyboard or gpio");
    }
    return this.isMockHardware() ? "keyboard" : "gpio";
  }

  getButtonInput(): IButtonInput {
    if (!this.services.buttonInput) {
      const config = this.getButtonConfig();
      this.services.buttonInput =
        this.getButtonInputKind() === "gpio"
          ? new GpioButtonInput(this.getGpio(), config.pins)
          : new KeyboardButtonInput(config.longPressMs);
    }
    return this.services.buttonInput;
  }

  getButtonService(): IButtonService {
    if (!this.services.buttons) {
      this.services.buttons = new ButtonService(
        this.getButtonInput(),
        this.getButtonEventQueue(),
        this.getStatsService(),
        this.getButtonConfig(),
      );
    }
    return this.services.buttons;
  }

  getInboundEventChannel(): IInboundEventChannel {
    if (!this.services.inbound) {
      this.services.inbound = new InboundEventChannel();
    }
    return this.services.inbound;
  }

  // Top level

  getOrchestrator(): PetClockOrchestrator {
    if (!this.services.orchestrator) {
      this.services.orchestrator = new PetClockOrchestrator(
        {
          epaper: this.getEpaperService(),
          coordinator: this.getRefreshCoordinator(),
          menus: this.getMenuStateMachine(),
          animation: this.getAnimationScheduler(),
          sprites: this.getSpriteLibrary(),
          buttons: this.getButtonService(),
          buttonEvents: this.getButtonEventQueue(),
          inbound: this.getInboundEventChannel(),
          pet: this.getPetStateService(),
          messages: this.getMessageLogService(),
          settings: this.getSettingsService(),
          stats: this.getStatsService(),
        },
        this.getLoopConfig(),
      );
    }
    return this.services.orchestrator;
  }

  getApiServer(): IApiServer {
    if (!this.services.apiServer) {
      this.services.apiServer = new ApiServer(
        this.getWebConfig(),
        this.getDeviceConfig().name,
        {
          pet: this.getPetStateService(),
          messages: this.getMessageLogService(),
          stats: this.getStatsService(),
          inbound: this.getInboundEventChannel(),
          epaper: this.getEpaperService(),
        },
      );
    }
    return this.services.apiServer;
  }

  // Configuration getters

  getDeviceConfig(): DeviceConfig {
    return {
      name: process.env.DEVICE_NAME || DEVICE_DEFAULT_NAME,
      remoteHost: process.env.REMOTE_DEVICE_HOST || null,
      remotePort: parseInt(
        process.env.REMOTE_DEVICE_PORT || String(DEVICE_DEFAULT_API_PORT),
      ),
      dataDirectory: process.env.DATA_DIR || DEVICE_DEFAULT_DATA_DIRECTORY,
    };
  }

  getPetConfig(): PetConfig {
    return {
      name: process.env.PET_NAME || PET_DEFAULT_NAME,
      type: process.env.PET_TYPE || PET_DEFAULT_TYPE,
    };
  }

  /**
   * Get E-paper configuration
   */
  getEpaperConfig(): EpaperConfig {
    return {
      width: parseInt(process.env.EPAPER_WIDTH || String(EPAPER_DEFAULT_WIDTH)),
      height: parseInt(
        process.env.EPAPER_HEIGHT || String(EPAPER_DEFAULT_HEIGHT),
      ),
      pins: {
        reset: parseInt(
          process.env.EPAPER_PIN_RESET || String(EPAPER_DEFAULT_PIN_RESET),
        ),
        dc: parseInt(
          process.env.EPAPER_PIN_DC || String(EPAPER_DEFAULT_PIN_DC),
        ),
        busy: parseInt(
          process.env.EPAPER_PIN_BUSY || String(EPAPER_DEFAULT_PIN_BUSY),
        ),
        cs: parseInt(
          process.env.EPAPER_PIN_CS || String(EPAPER_DEFAULT_PIN_CS),
        ),
        power: process.env.EPAPER_PIN_POWER
          ? parseInt(process.env.EPAPER_PIN_POWER)
          : undefined,
      },
      spi: {
        bus: parseInt(
          process.env.EPAPER_SPI_BUS || String(EPAPER_DEFAULT_SPI_BUS),
        ),
        device: parseInt(
          process.env.EPAPER_SPI_DEVICE_NUM ||
            String(EPAPER_DEFAULT_SPI_DEVICE_NUM),
        ),
        speed: parseInt(
          process.env.EPAPER_SPI_SPEED || String(EPAPER_DEFAULT_SPI_SPEED_HZ),
        ),
      },
      rotation: parseRotation(process.env.EPAPER_ROTATION),
      driver: process.env.EPAPER_DRIVER || EPAPER_DEFAULT_DRIVER,
    };
  }

  getRefreshConfig(): RefreshConfig {
    return {
      fullRefreshCycleLimit: parseInt(
        process.env.FULL_REFRESH_CYCLES ||
          String(REFRESH_DEFAULT_FULL_CYCLE_LIMIT),
      ),
      fullRefreshTimeLimitMs: process.env.FULL_REFRESH_SECONDS
        ? parseInt(process.env.FULL_REFRESH_SECONDS) * 1000
        : REFRESH_DEFAULT_FULL_TIME_LIMIT_MS,
    };
  }

  getMenuConfig(): MenuConfig {
    return {
      minButtonIntervalMs: parseInt(
        process.env.MENU_MIN_BUTTON_INTERVAL_MS ||
          String(MENU_DEFAULT_MIN_BUTTON_INTERVAL_MS),
      ),
      failureThreshold: parseInt(
        process.env.MENU_FAILURE_THRESHOLD ||
          String(MENU_DEFAULT_FAILURE_THRESHOLD),
      ),
    };
  }

  getLoopConfig(): LoopConfig {
    return {
      tickIntervalMs: parseInt(
        process.env.LOOP_TICK_INTERVAL_MS ||
          String(LOOP_DEFAULT_TICK_INTERVAL_MS),
      ),
      petUpdateIntervalMs: parseInt(
        process.env.PET_UPDATE_INTERVAL_MS ||
          String(LOOP_DEFAULT_PET_UPDATE_INTERVAL_MS),
      ),
      animationIntervalMs: parseInt(
        process.env.ANIMATION_INTERVAL_MS ||
          String(LOOP_DEFAULT_ANIMATION_INTERVAL_MS),
      ),
      inboundCheckIntervalMs: parseInt(
        process.env.INBOUND_CHECK_INTERVAL_MS ||
          String(LOOP_DEFAULT_INBOUND_CHECK_INTERVAL_MS),
      ),
    };
  }

  getButtonConfig(): ButtonConfig {
    return {
      pins: {
        return: parseInt(
          process.env.BUTTON_PIN_RETURN || String(BUTTON_DEFAULT_PIN_RETURN),
        ),
        action: parseInt(
          process.env.BUTTON_PIN_ACTION || String(BUTTON_DEFAULT_PIN_ACTION),
        ),
        go: parseInt(process.env.BUTTON_PIN_GO || String(BUTTON_DEFAULT_PIN_GO)),
      },
      debounceMs: parseInt(
        process.env.BUTTON_DEBOUNCE_MS || String(BUTTON_DEFAULT_DEBOUNCE_MS),
      ),
      longPressMs: parseInt(
        process.env.BUTTON_LONG_PRESS_MS ||
          String(BUTTON_DEFAULT_LONG_PRESS_MS),
      ),
    };
  }

  /**
   * Get Web configuration
   */
  getWebConfig(): WebConfig {
    return {
      port: parseInt(process.env.API_PORT || String(DEVICE_DEFAULT_API_PORT)),
      host: process.env.WEB_HOST || WEB_DEFAULT_HOST,
      cors: process.env.WEB_CORS !== "false",
      apiBasePath: process.env.WEB_API_BASE || WEB_DEFAULT_API_BASE_PATH,
    };
  }

  // Test setters (for dependency injection in tests)

  setEpaperService(service: IEpaperService): void {
    this.services.epaper = service;
  }

  setSettingsService(service: ISettingsService): void {
    this.services.settings = service;
  }

  setStatsService(service: IStatsService): void {
    this.services.stats = service;
  }

  setPetStateService(service: IPetStateService): void {
    this.services.pet = service;
  }

  setMessageLogService(service: IMessageLogService): void {
    this.services.messages = service;
  }

  setCompanionClient(service: ICompanionClient): void {
    this.services.companion = service;
  }

  setButtonInput(input: IButtonInput): void {
    this.services.buttonInput = input;
  }
}

/**
 * Unset falls back to the default; anything else must
 * be a quarter turn
 */
function parseRotation(value: string | undefined): PanelRotation {
  if (!value) {
    return EPAPER_DEFAULT_ROTATION;
  }
  const degrees = parseInt(value);
  const rotation = PANEL_ROTATIONS.find((r) => r === degrees);
  if (rotation === undefined) {
    throw ConfigError.invalidValue("EPAPER_ROTATION", value, "0, 90, 180 or 270");
  }
  return rotation;
}
