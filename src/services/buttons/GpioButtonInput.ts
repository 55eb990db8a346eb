import { ButtonEdgeListener, IButtonInput } from "@core/interfaces";
import { ButtonName } from "@core/types";
import { ButtonError } from "@core/errors";
import { SysfsGpio } from "@services/gpio/SysfsGpio";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("GpioButtonInput");

const BUTTONS: ButtonName[] = ["return", "action", "go"];

/**
 * Physical buttons wired active-low with pull-ups, sampled on an interval.
 * Debouncing is left to ButtonService.
 */
export class GpioButtonInput implements IButtonInput {
  readonly name = "gpio";

  private timer: NodeJS.Timeout | null = null;
  private readonly pressed = new Map<ButtonName, boolean>();

  constructor(
    private readonly gpio: SysfsGpio,
    private readonly pins: Record<ButtonName, number>,
    private readonly pollMs = 10,
  ) {}

  /**
   * @throws ButtonError when a pin cannot be claimed
   */
  start(listener: ButtonEdgeListener): void {
    if (this.timer) {
      return;
    }

    try {
      for (const button of BUTTONS) {
        this.gpio.claim(this.pins[button], "in");
        this.pressed.set(button, false);
      }
    } catch (error) {
      for (const button of BUTTONS) {
        this.gpio.release(this.pins[button]);
      }
      throw ButtonError.initFailed("could not claim button pins", toError(error));
    }

    this.timer = setInterval(() => this.sample(listener), this.pollMs);
    logger.info(
      `Polling buttons every ${this.pollMs}ms (return=${this.pins.return} action=${this.pins.action} go=${this.pins.go})`,
    );
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    for (const button of BUTTONS) {
      this.gpio.release(this.pins[button]);
    }
  }

  private sample(listener: ButtonEdgeListener): void {
    for (const button of BUTTONS) {
      const down = !this.gpio.read(this.pins[button]);
      if (down !== this.pressed.get(button)) {
        this.pressed.set(button, down);
        listener(button, down);
      }
    }
  }
}
