/**
 * Default Configuration Constants
 *
 * Default values used throughout the application, grouped by service.
 * Environment variables read by the ServiceContainer override most of them.
 */

// =============================================================================
// Device Defaults
// =============================================================================

/**
 * Name this device reports to the companion device and the status API
 */
export const DEVICE_DEFAULT_NAME = "bunny_clock";

/**
 * Port the HTTP API listens on, and the port assumed for the companion device
 */
export const DEVICE_DEFAULT_API_PORT = 5000;

/**
 * Directory holding pet, message, settings and stats files
 */
export const DEVICE_DEFAULT_DATA_DIRECTORY = "./data";

// =============================================================================
// E-Paper Display Defaults
// =============================================================================

/**
 * Native panel width in pixels (Waveshare 2.13" V4 is 122x250 portrait)
 */
export const EPAPER_DEFAULT_WIDTH = 122;

/**
 * Native panel height in pixels
 */
export const EPAPER_DEFAULT_HEIGHT = 250;

/**
 * Rotation applied between the landscape framebuffer and the native panel
 * 90 turns the 250x122 framebuffer into the panel's portrait memory layout
 */
export const EPAPER_DEFAULT_ROTATION = 90;

/**
 * Default driver name
 */
export const EPAPER_DEFAULT_DRIVER = "waveshare_2in13_v4";

/**
 * GPIO pins (BCM numbering) used by the Waveshare e-Paper HAT
 */
export const EPAPER_DEFAULT_PIN_RESET = 17;
export const EPAPER_DEFAULT_PIN_DC = 25;
export const EPAPER_DEFAULT_PIN_BUSY = 24;
export const EPAPER_DEFAULT_PIN_CS = 8;

/**
 * SPI bus, chip select and clock
 */
export const EPAPER_DEFAULT_SPI_BUS = 0;
export const EPAPER_DEFAULT_SPI_DEVICE_NUM = 0;
export const EPAPER_DEFAULT_SPI_SPEED_HZ = 4000000;

/**
 * Maximum time to wait for the busy pin before giving up on a panel write
 */
export const EPAPER_BUSY_TIMEOUT_MS = 5000;

// =============================================================================
// Refresh Policy Defaults
// =============================================================================

/**
 * Partial commits allowed after a full commit before the next one is forced full
 */
export const REFRESH_DEFAULT_FULL_CYCLE_LIMIT = 10;

/**
 * Time after a full commit before the next commit is forced full (5 minutes)
 */
export const REFRESH_DEFAULT_FULL_TIME_LIMIT_MS = 300000;

// =============================================================================
// Menu Defaults
// =============================================================================

/**
 * Minimum time between accepted button events
 * Matches how long the panel needs for a partial refresh
 */
export const MENU_DEFAULT_MIN_BUTTON_INTERVAL_MS = 300;

/**
 * Consecutive render failures before navigation is forced back to Home
 */
export const MENU_DEFAULT_FAILURE_THRESHOLD = 3;

/**
 * Number of messages the Messages screen shows and cycles through
 */
export const MENU_VISIBLE_MESSAGES = 3;

/**
 * Longest message text shown before it is truncated with "..."
 */
export const MENU_MESSAGE_MAX_CHARS = 20;

// =============================================================================
// Main Loop Defaults
// =============================================================================

/**
 * Polling loop cadence
 */
export const LOOP_DEFAULT_TICK_INTERVAL_MS = 100;

/**
 * Pet decay interval (1 hour)
 */
export const LOOP_DEFAULT_PET_UPDATE_INTERVAL_MS = 3600000;

/**
 * Sprite animation cadence
 */
export const LOOP_DEFAULT_ANIMATION_INTERVAL_MS = 500;

/**
 * How often inbound API events are drained
 */
export const LOOP_DEFAULT_INBOUND_CHECK_INTERVAL_MS = 5000;

// =============================================================================
// Button Defaults
// =============================================================================

/**
 * Button GPIO pins (BCM numbering)
 */
export const BUTTON_DEFAULT_PIN_RETURN = 6;
export const BUTTON_DEFAULT_PIN_ACTION = 13;
export const BUTTON_DEFAULT_PIN_GO = 19;

/**
 * Per-button debounce window
 */
export const BUTTON_DEFAULT_DEBOUNCE_MS = 200;

/**
 * Hold duration that turns an action press into an action hold
 */
export const BUTTON_DEFAULT_LONG_PRESS_MS = 2000;

// =============================================================================
// Pet Defaults
// =============================================================================

export const PET_DEFAULT_NAME = "Fluffy";
export const PET_DEFAULT_TYPE = "bunny";

/**
 * Upper bound for hunger, happiness and health
 */
export const PET_STAT_MAX = 10;

/**
 * Hunger gained per hour
 */
export const PET_HUNGER_DECAY_PER_HOUR = 1.0;

/**
 * Happiness lost per hour
 */
export const PET_HAPPINESS_DECAY_PER_HOUR = 0.5;

/**
 * Decay is skipped when less than this has passed since the last update (6 minutes)
 */
export const PET_MIN_DECAY_INTERVAL_MS = 360000;

// =============================================================================
// Message Log Defaults
// =============================================================================

/**
 * Messages kept in the log before the oldest are trimmed
 */
export const MESSAGES_MAX_STORED = 50;

/**
 * Longest message accepted by the API
 */
export const MESSAGES_MAX_LENGTH = 200;

// =============================================================================
// Companion Client Defaults
// =============================================================================

/**
 * Request timeout for calls to the companion device
 */
export const COMPANION_REQUEST_TIMEOUT_MS = 5000;

// =============================================================================
// Web Defaults
// =============================================================================

export const WEB_DEFAULT_HOST = "0.0.0.0";
export const WEB_DEFAULT_API_BASE_PATH = "/api";
export const WEB_SERVICE_NAME = "E-Ink Pet Clock API";
export const WEB_SERVICE_VERSION = "1.0.0";
