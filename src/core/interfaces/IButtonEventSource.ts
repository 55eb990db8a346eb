import { ButtonEvent, ButtonName } from "@core/types";

/**
 * Single-slot handoff between button input and the main loop
 */
export interface IButtonEventSource {
  /**
   * Wait up to `timeoutMs` for an event
   * @returns null when none arrived in time
   */
  getEvent(timeoutMs: number): Promise<ButtonEvent | null>;

  hasEvent(): boolean;
}

/**
 * Producer side of the handoff
 */
export interface IButtonEventSink {
  /**
   * Hand over an event without blocking
   * @returns false when the slot was occupied and the event dropped
   */
  offer(event: ButtonEvent): boolean;
}

/**
 * Raw press and release edges per button
 */
export type ButtonEdgeListener = (
  button: ButtonName,
  pressed: boolean,
) => void;

/**
 * Source of raw button edges (GPIO on the device, keyboard on a laptop)
 */
export interface IButtonInput {
  readonly name: string;

  start(listener: ButtonEdgeListener): void;

  stop(): void;
}

/**
 * Debounces raw edges and turns them into ButtonEvents
 */
export interface IButtonService {
  start(): void;

  stop(): void;

  press(button: ButtonName): void;

  release(button: ButtonName): void;
}
