import { StoredMessage } from "./StateTypes";

/**
 * Events delivered from the HTTP API to the main loop
 */
export type InboundEvent =
  | { type: "message-received"; message: StoredMessage }
  | { type: "fed"; from: string }
  | { type: "poked"; from: string };

export type InboundEventType = InboundEvent["type"];
