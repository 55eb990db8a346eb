import {
  IButtonEventSink,
  IButtonInput,
  IButtonService,
  IStatsService,
} from "@core/interfaces";
import { ButtonConfig, ButtonEvent, ButtonName } from "@core/types";
import { getLogger } from "@utils/logger";

const logger = getLogger("ButtonService");

const PRESS_EVENTS: Record<ButtonName, ButtonEvent> = {
  return: ButtonEvent.RETURN_PRESS,
  action: ButtonEvent.ACTION_PRESS,
  go: ButtonEvent.GO_PRESS,
};

/**
 * Turns raw edges into button events.
 *
 * A press closer than `debounceMs` to the previous accepted press of the
 * same button is ignored. Holding the action button for `longPressMs`
 * adds one ACTION_HOLD after its ACTION_PRESS.
 */
export class ButtonService implements IButtonService {
  private readonly lastPress = new Map<ButtonName, number>();
  private readonly held = new Set<ButtonName>();
  private holdTimer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly input: IButtonInput,
    private readonly sink: IButtonEventSink,
    private readonly stats: IStatsService,
    private readonly config: ButtonConfig,
    private readonly clock: () => number = Date.now,
  ) {}

  start(): void {
    if (this.running) {
      return;
    }
    this.input.start((button, pressed) => {
      if (pressed) {
        this.press(button);
      } else {
        this.release(button);
      }
    });
    this.running = true;
    logger.info(
      `Listening on ${this.input.name} (debounce ${this.config.debounceMs}ms, hold ${this.config.longPressMs}ms)`,
    );
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.input.stop();
    this.cancelHold();
    this.held.clear();
    this.running = false;
  }

  press(button: ButtonName): void {
    const now = this.clock();
    const last = this.lastPress.get(button);
    if (last !== undefined && now - last < this.config.debounceMs) {
      logger.debug(`Ignored ${button} bounce after ${now - last}ms`);
      return;
    }
    this.lastPress.set(button, now);
    this.held.add(button);

    this.emit(PRESS_EVENTS[button]);
    void this.stats.increment("totalButtonPresses").catch((error) => {
      logger.warn(`Could not count button press: ${String(error)}`);
    });

    if (button === "action") {
      this.cancelHold();
      this.holdTimer = setTimeout(() => {
        this.holdTimer = null;
        if (this.held.has("action")) {
          this.emit(ButtonEvent.ACTION_HOLD);
        }
      }, this.config.longPressMs);
    }
  }

  release(button: ButtonName): void {
    this.held.delete(button);
    if (button === "action") {
      this.cancelHold();
    }
  }

  private emit(event: ButtonEvent): void {
    if (this.sink.offer(event)) {
      logger.debug(`Button event ${event}`);
    }
  }

  private cancelHold(): void {
    if (this.holdTimer) {
      clearTimeout(this.holdTimer);
      this.holdTimer = null;
    }
  }
}
