import { IInboundEventChannel } from "@core/interfaces";
import { InboundEvent } from "@core/types";

/**
 * In-memory handoff from the HTTP handlers to the main loop
 */
export class InboundEventChannel implements IInboundEventChannel {
  private events: InboundEvent[] = [];

  publish(event: InboundEvent): void {
    this.events.push(event);
  }

  drain(): InboundEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  size(): number {
    return this.events.length;
  }
}
