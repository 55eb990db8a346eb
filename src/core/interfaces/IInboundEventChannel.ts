import { InboundEvent } from "@core/types";

/**
 * Hands events from the HTTP API to the main loop.
 *
 * Delivery is at least once; there is no ordering guarantee between event
 * kinds.
 */
export interface IInboundEventChannel {
  publish(event: InboundEvent): void;

  /**
   * Remove and return everything published so far
   */
  drain(): InboundEvent[];

  size(): number;
}
