import { IButtonEventSink, IButtonEventSource } from "@core/interfaces";
import { ButtonEvent } from "@core/types";
import { getLogger } from "@utils/logger";

const logger = getLogger("ButtonEventQueue");

/**
 * Capacity-one handoff from button input to the main loop.
 *
 * An offer never blocks: when the slot is taken the new event is dropped,
 * so a burst of presses collapses into the first one.
 */
export class ButtonEventQueue implements IButtonEventSource, IButtonEventSink {
  private slot: ButtonEvent | null = null;
  private waiter: ((event: ButtonEvent | null) => void) | null = null;

  offer(event: ButtonEvent): boolean {
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver(event);
      return true;
    }
    if (this.slot !== null) {
      logger.debug(`Dropped ${event}, ${this.slot} still pending`);
      return false;
    }
    this.slot = event;
    return true;
  }

  async getEvent(timeoutMs: number): Promise<ButtonEvent | null> {
    if (this.slot !== null) {
      const event = this.slot;
      this.slot = null;
      return event;
    }
    if (timeoutMs <= 0 || this.waiter) {
      return null;
    }

    return new Promise<ButtonEvent | null>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (event) => {
        clearTimeout(timer);
        resolve(event);
      };
    });
  }

  hasEvent(): boolean {
    return this.slot !== null;
  }
}
