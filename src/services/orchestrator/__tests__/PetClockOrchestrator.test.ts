import {
  BUTTON_NAVIGATION,
  OrchestratorServices,
  PetClockOrchestrator,
  SHUTDOWN_MESSAGE,
} from "../PetClockOrchestrator";
import { ButtonEventQueue } from "@services/buttons/ButtonEventQueue";
import { InboundEventChannel } from "@services/inbound/InboundEventChannel";
import { FrameBuffer } from "@services/framebuffer/FrameBuffer";
import { DisplayError, MenuError } from "@core/errors";
import {
  ButtonEvent,
  LoopConfig,
  MenuId,
  NavigationEvent,
  TransitionOutcome,
  failure,
  success,
} from "@core/types";
import {
  createMockAnimation,
  createMockButtons,
  createMockCoordinator,
  createMockEpaper,
  createMockMenus,
  createMockMessageLog,
  createMockPetState,
  createMockSettings,
  createMockStats,
} from "../../../__tests__/helpers/mockServices";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const LOOP: LoopConfig = {
  tickIntervalMs: 100,
  petUpdateIntervalMs: 3_600_000,
  animationIntervalMs: 500,
  inboundCheckIntervalMs: 5000,
};

// 12:00:10 UTC
const T0 = Date.UTC(2026, 0, 5, 12, 0, 10);

describe("PetClockOrchestrator", () => {
  let now: number;
  let frameBuffer: FrameBuffer;
  let services: {
    epaper: ReturnType<typeof createMockEpaper>;
    coordinator: ReturnType<typeof createMockCoordinator>;
    menus: ReturnType<typeof createMockMenus>;
    animation: ReturnType<typeof createMockAnimation>;
    sprites: { loadImages: jest.Mock };
    buttons: ReturnType<typeof createMockButtons>;
    buttonEvents: ButtonEventQueue;
    inbound: InboundEventChannel;
    pet: ReturnType<typeof createMockPetState>;
    messages: ReturnType<typeof createMockMessageLog>;
    settings: ReturnType<typeof createMockSettings>;
    stats: ReturnType<typeof createMockStats>;
  };
  let orchestrator: PetClockOrchestrator;

  const build = (): PetClockOrchestrator => {
    const deps: OrchestratorServices = services;
    return new PetClockOrchestrator(deps, LOOP, () => now);
  };

  beforeEach(() => {
    now = T0;
    frameBuffer = new FrameBuffer();
    services = {
      epaper: createMockEpaper(),
      coordinator: createMockCoordinator(frameBuffer),
      menus: createMockMenus(),
      animation: createMockAnimation(),
      sprites: { loadImages: jest.fn().mockResolvedValue(success(12)) },
      buttons: createMockButtons(),
      buttonEvents: new ButtonEventQueue(),
      inbound: new InboundEventChannel(),
      pet: createMockPetState(),
      messages: createMockMessageLog(),
      settings: createMockSettings(),
      stats: createMockStats(),
    };
    orchestrator = build();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("should map the buttons to navigation events", () => {
    expect(BUTTON_NAVIGATION).toEqual({
      [ButtonEvent.RETURN_PRESS]: NavigationEvent.BACK,
      [ButtonEvent.ACTION_PRESS]: NavigationEvent.NEXT,
      [ButtonEvent.GO_PRESS]: NavigationEvent.ACTIVATE,
      [ButtonEvent.ACTION_HOLD]: NavigationEvent.REFRESH,
    });
  });

  describe("initialize", () => {
    it("should load state, start the panel and draw Home", async () => {
      const result = await orchestrator.initialize();

      expect(result.success).toBe(true);
      const order = [
        services.settings.initialize,
        services.pet.initialize,
        services.messages.initialize,
        services.stats.initialize,
        services.epaper.initialize,
        services.pet.updateState,
        services.animation.syncMood,
        services.menus.setup,
        services.buttons.start,
      ].map((fn) => fn.mock.invocationCallOrder[0]);
      expect([...order].sort((a, b) => a - b)).toEqual(order);
      expect(services.pet.updateState).toHaveBeenCalledWith(new Date(T0));
    });

    it("should only show the pet while Home is idle", async () => {
      await orchestrator.initialize();
      const check = services.animation.setEligibilityCheck.mock.calls[0][0];

      expect(check()).toBe(true);
      services.menus.isInTransition.mockReturnValue(true);
      expect(check()).toBe(false);
    });

    it("should route sprite updates through the menus", async () => {
      await orchestrator.initialize();
      const handler = services.animation.setSpriteUpdateHandler.mock.calls[0][0];

      await handler?.();

      expect(services.menus.tryUpdateHomeField).toHaveBeenCalledWith("sprite");
    });

    it("should fail when the panel does not start", async () => {
      services.epaper.initialize.mockResolvedValue(
        failure(DisplayError.initFailed("no panel")),
      );

      const result = await orchestrator.initialize();

      expect(result.success).toBe(false);
      expect(services.menus.setup).not.toHaveBeenCalled();
      expect(services.buttons.start).not.toHaveBeenCalled();
    });

    it("should carry on without sprite images", async () => {
      services.sprites.loadImages.mockResolvedValue(
        failure(new Error("missing")),
      );

      const result = await orchestrator.initialize();

      expect(result.success).toBe(true);
    });

    it("should fail when the first render throws", async () => {
      services.menus.setup.mockRejectedValue(
        MenuError.renderFailed(MenuId.HOME, new Error("boom")),
      );

      const result = await orchestrator.initialize();

      expect(result.success).toBe(false);
    });
  });

  describe("tick", () => {
    beforeEach(async () => {
      await orchestrator.initialize();
    });

    it("should dispatch a queued button event", async () => {
      services.buttonEvents.offer(ButtonEvent.ACTION_PRESS);

      await orchestrator.tick();

      expect(services.menus.handleEvent).toHaveBeenCalledWith(
        NavigationEvent.NEXT,
      );
      expect(services.buttonEvents.hasEvent()).toBe(false);
    });

    it("should keep ticking while a transition runs", async () => {
      let finish: () => void = () => undefined;
      services.menus.handleEvent.mockImplementation(
        () =>
          new Promise<TransitionOutcome>((resolve) => {
            finish = () => resolve(TransitionOutcome.APPLIED);
          }),
      );
      services.buttonEvents.offer(ButtonEvent.GO_PRESS);

      await orchestrator.tick();
      await orchestrator.tick();

      expect(orchestrator.getPendingTransitionCount()).toBe(1);
      expect(services.menus.renderCurrent).toHaveBeenCalledTimes(2);
      finish();
      await orchestrator.stop();
      expect(orchestrator.getPendingTransitionCount()).toBe(0);
    });

    it("should report a failed transition as fatal", async () => {
      const fatal = jest.fn();
      orchestrator.onFatal(fatal);
      const error = MenuError.recoveryFailed(3, new Error("panel gone"));
      services.menus.handleEvent.mockRejectedValue(error);
      services.buttonEvents.offer(ButtonEvent.RETURN_PRESS);

      await orchestrator.tick();
      await orchestrator.stop();

      expect(fatal).toHaveBeenCalledWith(error);
    });

    it("should update the clock when the minute changes", async () => {
      now = T0 + 20_000;
      await orchestrator.tick();
      expect(services.menus.tryUpdateHomeField).not.toHaveBeenCalled();

      now = T0 + 50_000;
      await orchestrator.tick();
      expect(services.menus.tryUpdateHomeField).toHaveBeenCalledWith("clock");
    });

    it("should retry the clock when the guard was busy", async () => {
      services.menus.tryUpdateHomeField.mockResolvedValueOnce(false);
      now = T0 + 50_000;

      await orchestrator.tick();
      now += 100;
      await orchestrator.tick();
      now += 100;
      await orchestrator.tick();

      expect(services.menus.tryUpdateHomeField).toHaveBeenCalledTimes(2);
    });

    it("should skip the clock away from Home", async () => {
      services.menus.isHomeActive.mockReturnValue(false);
      now = T0 + 50_000;

      await orchestrator.tick();

      expect(services.menus.tryUpdateHomeField).not.toHaveBeenCalled();
    });

    it("should drain inbound events on their interval", async () => {
      services.inbound.publish({ type: "poked", from: "friend" });

      now = T0 + 1000;
      await orchestrator.tick();
      expect(services.menus.requestRender).not.toHaveBeenCalled();

      now = T0 + 5000;
      await orchestrator.tick();
      expect(services.menus.requestRender).toHaveBeenCalledWith(false);
      expect(services.inbound.size()).toBe(0);
    });

    it("should decay the pet every hour and redraw Home", async () => {
      services.pet.updateState.mockResolvedValue(success(true));
      now = T0 + 3_600_000;

      await orchestrator.tick();

      expect(services.pet.updateState).toHaveBeenLastCalledWith(new Date(now));
      expect(services.menus.requestRender).toHaveBeenCalledWith(false);
      expect(services.stats.increment).toHaveBeenCalledWith("totalUptimeHours");
    });

    it("should advance the animation and render pending work", async () => {
      now = T0 + 500;

      await orchestrator.tick();

      expect(services.animation.tick).toHaveBeenCalledWith(T0 + 500);
      expect(services.menus.renderCurrent).toHaveBeenCalledTimes(1);
    });

    it("should count panel commits as display updates", async () => {
      services.coordinator.takeCommitCount.mockReturnValue(2);

      await orchestrator.tick();

      expect(services.stats.increment).toHaveBeenCalledWith(
        "totalDisplayUpdates",
        2,
      );
    });

    it("should stop ticking after a fatal render error", async () => {
      const fatal = jest.fn();
      orchestrator.onFatal(fatal);
      services.menus.renderCurrent.mockRejectedValue(
        MenuError.recoveryFailed(3, new Error("boom")),
      );

      await orchestrator.tick();
      await orchestrator.tick();

      expect(fatal).toHaveBeenCalledTimes(1);
      expect(services.menus.renderCurrent).toHaveBeenCalledTimes(1);
    });
  });

  it("should run the loop on its interval", async () => {
    jest.useFakeTimers();
    await orchestrator.initialize();

    orchestrator.start();
    await jest.advanceTimersByTimeAsync(300);

    expect(orchestrator.isRunning()).toBe(true);
    expect(services.menus.renderCurrent).toHaveBeenCalledTimes(3);

    await orchestrator.stop();
    expect(orchestrator.isRunning()).toBe(false);
    expect(services.buttons.stop).toHaveBeenCalled();
  });

  it("should refuse to start before initialize", () => {
    expect(() => orchestrator.start()).toThrow(
      "PetClockOrchestrator.start() called before initialize()",
    );
  });

  it("should show the shutdown screen and sleep the panel", async () => {
    await orchestrator.initialize();
    const drawTextCentered = jest.spyOn(frameBuffer, "drawTextCentered");

    await orchestrator.dispose();

    expect(drawTextCentered).toHaveBeenCalledWith(
      SHUTDOWN_MESSAGE,
      { x: 0, y: 0, width: 250, height: 122 },
      { scale: 2 },
    );
    expect(services.coordinator.commit).toHaveBeenLastCalledWith(false);
    expect(services.epaper.sleep).toHaveBeenCalled();
    expect(services.epaper.dispose).toHaveBeenCalled();
  });
});
