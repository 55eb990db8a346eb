/**
 * Discrete button events delivered to the main loop
 */
export enum ButtonEvent {
  RETURN_PRESS = "return_press",
  ACTION_PRESS = "action_press",
  ACTION_HOLD = "action_hold",
  GO_PRESS = "go_press",
}

/**
 * Physical buttons
 */
export type ButtonName = "return" | "action" | "go";

/**
 * Button subsystem configuration
 */
export type ButtonConfig = {
  /** GPIO pins (BCM numbering) */
  pins: Record<ButtonName, number>;

  /** Presses closer together than this are ignored per button */
  debounceMs: number;

  /** Hold time that produces an ACTION_HOLD */
  longPressMs: number;
};
