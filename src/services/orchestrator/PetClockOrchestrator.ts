import {
  IAnimationScheduler,
  IButtonEventSource,
  IButtonService,
  IEpaperService,
  IInboundEventChannel,
  IMenuStateMachine,
  IMessageLogService,
  IPetStateService,
  IRefreshCoordinator,
  ISettingsService,
  IStatsService,
} from "@core/interfaces";
import {
  ButtonEvent,
  InboundEventType,
  LoopConfig,
  NavigationEvent,
  Result,
  failure,
  success,
} from "@core/types";
import { FONT_MEDIUM, FULL_SCREEN_RECT } from "@core/constants";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { SpriteLibrary } from "@services/animation/SpriteLibrary";

const logger = getLogger("PetClockOrchestrator");

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 3_600_000;

export const SHUTDOWN_MESSAGE = "Shutting down...";

/**
 * What each button does to the menus
 */
export const BUTTON_NAVIGATION: Record<ButtonEvent, NavigationEvent> = {
  [ButtonEvent.RETURN_PRESS]: NavigationEvent.BACK,
  [ButtonEvent.ACTION_PRESS]: NavigationEvent.NEXT,
  [ButtonEvent.GO_PRESS]: NavigationEvent.ACTIVATE,
  [ButtonEvent.ACTION_HOLD]: NavigationEvent.REFRESH,
};

export type OrchestratorServices = {
  epaper: IEpaperService;
  coordinator: IRefreshCoordinator;
  menus: IMenuStateMachine;
  animation: IAnimationScheduler;
  sprites: Pick<SpriteLibrary, "loadImages">;
  buttons: IButtonService;
  buttonEvents: IButtonEventSource;
  inbound: IInboundEventChannel;
  pet: IPetStateService;
  messages: IMessageLogService;
  settings: ISettingsService;
  stats: IStatsService;
};

export type FatalListener = (error: Error) => void;

/**
 * Runs the pet clock: one polling loop that feeds button events to the
 * menus and keeps the clock, the pet and its animation up to date.
 *
 * Button transitions are started from the loop but not awaited by it, so
 * the clock and animation keep ticking while a slow full refresh runs. They
 * share the menu render guard, which makes the periodic updates skip their
 * turn until the transition is done.
 */
export class PetClockOrchestrator {
  private isInitialized = false;
  private loopTimer: NodeJS.Timeout | null = null;
  private currentTick: Promise<void> | null = null;
  private readonly transitions = new Set<Promise<void>>();
  private fatalListeners: FatalListener[] = [];
  private fatalError: Error | null = null;

  private lastClockMinute = -1;
  private lastClockUpdate = 0;
  private lastPetUpdate = 0;
  private lastUptimeUpdate = 0;
  private lastInboundCheck = 0;

  constructor(
    private readonly services: OrchestratorServices,
    private readonly config: LoopConfig,
    private readonly clock: () => number = Date.now,
  ) {}

  /**
   * Load state, bring up the panel and buttons, and draw Home
   */
  async initialize(): Promise<Result<void>> {
    if (this.isInitialized) {
      return success(undefined);
    }
    const { epaper, menus, animation, sprites, buttons, pet } = this.services;

    // Pet mood depends on the sleep window, so settings load first
    for (const [name, provider] of [
      ["settings", this.services.settings],
      ["pet", pet],
      ["messages", this.services.messages],
      ["stats", this.services.stats],
    ] as const) {
      const loaded = await provider.initialize();
      if (!loaded.success) {
        logger.error(`Failed to load ${name} state: ${loaded.error.message}`);
        return failure(loaded.error);
      }
    }

    const images = await sprites.loadImages();
    if (!images.success) {
      logger.warn(`Sprite images unavailable, using text art: ${images.error.message}`);
    }

    const panel = await epaper.initialize();
    if (!panel.success) {
      return failure(panel.error);
    }

    const now = this.clock();
    const decayed = await pet.updateState(new Date(now));
    if (!decayed.success) {
      logger.warn(`Pet update failed: ${decayed.error.message}`);
    }

    animation.syncMood();
    animation.setEligibilityCheck(
      () => menus.isHomeActive() && !menus.isInTransition(),
    );
    animation.setSpriteUpdateHandler(async () => {
      await menus.tryUpdateHomeField("sprite");
    });

    try {
      await menus.setup();
      buttons.start();
    } catch (error) {
      return failure(toError(error));
    }

    this.lastClockMinute = Math.floor(now / MS_PER_MINUTE);
    this.lastClockUpdate = now;
    this.lastPetUpdate = now;
    this.lastUptimeUpdate = now;
    this.lastInboundCheck = now;
    this.isInitialized = true;
    logger.info("Pet clock initialized");
    return success(undefined);
  }

  start(): void {
    if (!this.isInitialized) {
      throw new Error("PetClockOrchestrator.start() called before initialize()");
    }
    if (this.loopTimer) {
      logger.warn("Main loop already running");
      return;
    }
    logger.info(`Starting main loop (${this.config.tickIntervalMs}ms)`);
    this.loopTimer = setInterval(() => {
      if (this.currentTick) {
        return;
      }
      this.currentTick = this.tick().finally(() => {
        this.currentTick = null;
      });
    }, this.config.tickIntervalMs);
  }

  isRunning(): boolean {
    return this.loopTimer !== null;
  }

  /**
   * Stop the loop and the buttons, then wait for work already started
   */
  async stop(): Promise<void> {
    if (this.loopTimer) {
      clearInterval(this.loopTimer);
      this.loopTimer = null;
      logger.info("Main loop stopped");
    }
    this.services.buttons.stop();
    await this.currentTick;
    await Promise.allSettled([...this.transitions]);
  }

  /**
   * Show the shutdown screen with a full refresh and put the panel to sleep
   */
  async dispose(): Promise<void> {
    await this.stop();
    const { coordinator, epaper } = this.services;

    if (this.isInitialized) {
      const frameBuffer = coordinator.getFrameBuffer();
      frameBuffer.clear();
      frameBuffer.drawTextCentered(
        SHUTDOWN_MESSAGE,
        FULL_SCREEN_RECT,
        { scale: FONT_MEDIUM },
      );
      const shown = await coordinator.commit(false);
      if (!shown.success) {
        logger.warn(`Shutdown screen failed: ${shown.error.message}`);
      }
      const slept = await epaper.sleep();
      if (!slept.success) {
        logger.warn(`Panel sleep failed: ${slept.error.message}`);
      }
    }

    await epaper.dispose();
    this.fatalListeners = [];
    this.isInitialized = false;
    logger.info("Pet clock disposed");
  }

  /**
   * Register for errors that should end the process
   * @returns unsubscribe function
   */
  onFatal(listener: FatalListener): () => void {
    this.fatalListeners.push(listener);
    return () => {
      const index = this.fatalListeners.indexOf(listener);
      if (index > -1) {
        this.fatalListeners.splice(index, 1);
      }
    };
  }

  getPendingTransitionCount(): number {
    return this.transitions.size;
  }

  /**
   * One pass of the main loop
   */
  async tick(): Promise<void> {
    if (this.fatalError) {
      return;
    }
    const now = this.clock();
    try {
      await this.pollButtons();
      if (now - this.lastInboundCheck >= this.config.inboundCheckIntervalMs) {
        this.lastInboundCheck = now;
        this.processInbound();
      }
      await this.updateClock(now);
      await this.updatePet(now);
      await this.services.animation.tick(now);
      await this.services.menus.renderCurrent();
      await this.countDisplayUpdates();
      await this.countUptime(now);
    } catch (error) {
      this.fail(toError(error));
    }
  }

  private async pollButtons(): Promise<void> {
    const event = await this.services.buttonEvents.getEvent(0);
    if (event) {
      this.dispatch(event);
    }
  }

  private dispatch(event: ButtonEvent): void {
    const navigation = BUTTON_NAVIGATION[event];
    const transition = this.services.menus
      .handleEvent(navigation)
      .then((outcome) => {
        logger.debug(`${event} -> ${navigation}: ${outcome}`);
      })
      .catch((error: unknown) => {
        this.fail(toError(error));
      })
      .finally(() => {
        this.transitions.delete(transition);
      });
    this.transitions.add(transition);
  }

  private processInbound(): void {
    const events = this.services.inbound.drain();
    if (events.length === 0) {
      return;
    }
    const kinds = new Set<InboundEventType>(events.map((e) => e.type));
    for (const kind of kinds) {
      logger.info(`Inbound ${kind}`);
      this.services.menus.requestRender(false);
    }
  }

  /**
   * Refresh the clock field when the minute changes or the refresh mode's
   * interval has passed
   */
  private async updateClock(now: number): Promise<void> {
    const minute = Math.floor(now / MS_PER_MINUTE);
    const interval = this.services.settings.getClockIntervalMs();
    if (
      minute === this.lastClockMinute &&
      now - this.lastClockUpdate < interval
    ) {
      return;
    }

    const { menus } = this.services;
    if (!menus.isHomeActive()) {
      // Home redraws in full when it becomes active again
      this.lastClockMinute = minute;
      this.lastClockUpdate = now;
      return;
    }

    this.lastClockUpdate = now;
    if (await menus.tryUpdateHomeField("clock")) {
      this.lastClockMinute = minute;
    }
  }

  private async updatePet(now: number): Promise<void> {
    if (now - this.lastPetUpdate < this.config.petUpdateIntervalMs) {
      return;
    }
    this.lastPetUpdate = now;

    const result = await this.services.pet.updateState(new Date(now));
    if (!result.success) {
      logger.warn(`Pet update failed: ${result.error.message}`);
      return;
    }
    if (result.data && this.services.menus.isHomeActive()) {
      this.services.menus.requestRender(false);
    }
  }

  private async countDisplayUpdates(): Promise<void> {
    const commits = this.services.coordinator.takeCommitCount();
    if (commits === 0) {
      return;
    }
    const counted = await this.services.stats.increment(
      "totalDisplayUpdates",
      commits,
    );
    if (!counted.success) {
      logger.warn(`Could not count display updates: ${counted.error.message}`);
    }
  }

  private async countUptime(now: number): Promise<void> {
    if (now - this.lastUptimeUpdate < MS_PER_HOUR) {
      return;
    }
    this.lastUptimeUpdate = now;
    const counted = await this.services.stats.increment("totalUptimeHours");
    if (!counted.success) {
      logger.warn(`Could not count uptime: ${counted.error.message}`);
    }
  }

  private fail(error: Error): void {
    if (this.fatalError) {
      return;
    }
    this.fatalError = error;
    logger.error(`Fatal error: ${error.message}`);
    if (this.loopTimer) {
      clearInterval(this.loopTimer);
      this.loopTimer = null;
    }
    for (const listener of this.fatalListeners) {
      try {
        listener(error);
      } catch (err) {
        logger.error("Error in fatal listener:", err);
      }
    }
  }
}
