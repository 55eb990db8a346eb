/**
 * Centralized user-facing error messages.
 *
 * Error codes are string literals here so this module does not import the
 * error classes (which import it). They match the enum values in each class.
 *
 * @example
 * ```typescript
 * import { getUserMessage } from '@errors/ErrorMessages';
 *
 * const message = getUserMessage("DISPLAY_BUSY");
 * // Returns: "Display is busy. Please wait."
 * ```
 */

/**
 * Display error user messages
 */
export const DISPLAY_ERROR_MESSAGES: Record<string, string> = {
  DISPLAY_DEVICE_INIT_FAILED:
    "Failed to initialize the display. Please restart the device.",
  DISPLAY_DEVICE_NOT_INITIALIZED:
    "Display not initialized. Please restart the application.",
  DISPLAY_BUSY: "Display is busy. Please wait.",
  DISPLAY_TIMEOUT: "Display operation timed out. Please try again.",
  DISPLAY_SLEEPING: "Display is asleep. Wake it before updating.",
  DISPLAY_INVALID_BITMAP: "Invalid image data for the display.",
  DISPLAY_BITMAP_SIZE_MISMATCH:
    "Image size does not match display. Please check configuration.",
  DISPLAY_REGION_OUT_OF_BOUNDS: "Screen region is outside the display.",
  DISPLAY_UPDATE_FAILED: "Failed to update display. Please try again.",
  DISPLAY_ASSET_LOAD_FAILED: "Failed to load a font or sprite asset.",
  DISPLAY_NOTHING_DISPLAYED: "Nothing has been shown on the display yet.",
  DISPLAY_UNKNOWN_ERROR: "Display error occurred. Please try again.",
};

/**
 * Menu error user messages
 */
export const MENU_ERROR_MESSAGES: Record<string, string> = {
  MENU_RENDER_FAILED: "Failed to draw the screen. Retrying.",
  MENU_RECOVERY_FAILED:
    "The screen could not be recovered. The device will restart.",
  MENU_NOT_SET_UP: "Menus are not set up yet.",
  MENU_UNKNOWN_ERROR: "Menu error occurred. Please try again.",
};

/**
 * State persistence error user messages
 */
export const STATE_ERROR_MESSAGES: Record<string, string> = {
  STATE_LOAD_FAILED: "Failed to load saved data. Defaults are in use.",
  STATE_SAVE_FAILED: "Failed to save data. Changes may be lost on restart.",
  STATE_INVALID_DATA: "Saved data is corrupted. Defaults are in use.",
  STATE_NOT_INITIALIZED: "Data store not initialized.",
  STATE_UNKNOWN_ERROR: "Data error occurred. Please try again.",
};

/**
 * Configuration error user messages
 */
export const CONFIG_ERROR_MESSAGES: Record<string, string> = {
  CONFIG_INVALID_VALUE: "Invalid setting value.",
  CONFIG_OUT_OF_RANGE: "Setting value is out of range.",
  CONFIG_UNKNOWN_ERROR: "Configuration error occurred.",
};

/**
 * Web error user messages
 */
export const WEB_ERROR_MESSAGES: Record<string, string> = {
  WEB_SERVER_START_FAILED: "Failed to start the API server.",
  WEB_SERVER_NOT_RUNNING: "API server is not running.",
  WEB_PORT_IN_USE: "API port is already in use.",
  WEB_INVALID_REQUEST: "Invalid request.",
  WEB_NOT_FOUND: "Not found.",
  WEB_UNKNOWN_ERROR: "Server error occurred. Please try again.",
};

/**
 * Companion device error user messages
 */
export const COMPANION_ERROR_MESSAGES: Record<string, string> = {
  COMPANION_NOT_CONFIGURED: "No companion device is configured.",
  COMPANION_REQUEST_FAILED: "Could not reach the companion device.",
  COMPANION_TIMEOUT: "The companion device did not answer in time.",
  COMPANION_BAD_RESPONSE: "The companion device sent an unexpected reply.",
  COMPANION_UNKNOWN_ERROR: "Companion error occurred. Please try again.",
};

/**
 * Button error user messages
 */
export const BUTTON_ERROR_MESSAGES: Record<string, string> = {
  BUTTON_INIT_FAILED: "Failed to set up the buttons. Please restart the device.",
  BUTTON_UNKNOWN_ERROR: "Button error occurred.",
};

/**
 * Combined lookup of all error messages
 */
export const ERROR_MESSAGES: Record<string, string> = {
  ...DISPLAY_ERROR_MESSAGES,
  ...MENU_ERROR_MESSAGES,
  ...STATE_ERROR_MESSAGES,
  ...CONFIG_ERROR_MESSAGES,
  ...WEB_ERROR_MESSAGES,
  ...COMPANION_ERROR_MESSAGES,
  ...BUTTON_ERROR_MESSAGES,
};

/**
 * Fallback messages per code prefix
 */
export const DEFAULT_ERROR_MESSAGES: Record<string, string> = {
  DISPLAY: "Display error occurred. Please try again.",
  MENU: "Menu error occurred. Please try again.",
  STATE: "Data error occurred. Please try again.",
  CONFIG: "Configuration error occurred.",
  WEB: "Server error occurred. Please try again.",
  COMPANION: "Companion error occurred. Please try again.",
  BUTTON: "Button error occurred.",
};

/**
 * Get the user-facing message for an error code.
 * Falls back to the category default, then to a generic message.
 */
export function getUserMessage(code: string): string {
  const message = ERROR_MESSAGES[code];
  if (message) {
    return message;
  }

  // Category is the prefix before the first underscore
  const category = code.split("_")[0];
  const defaultMessage = DEFAULT_ERROR_MESSAGES[category];
  if (defaultMessage) {
    return defaultMessage;
  }

  return "An error occurred. Please try again.";
}
