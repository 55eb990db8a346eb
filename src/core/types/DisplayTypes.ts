/**
 * Color depth supported by the panel drivers
 */
export type ColorDepth = "1bit";

/**
 * Kind of display behind a driver
 */
export enum DisplayType {
  EPAPER = "epaper",
  MOCK = "mock",
}

/**
 * 1-bit bitmap, rows packed MSB first, a cleared bit is a black pixel
 */
export type Bitmap1Bit = {
  /** Width in pixels */
  width: number;

  /** Height in pixels */
  height: number;

  /** Raw bitmap data (1 bit per pixel, packed into bytes, ceil(width / 8) bytes per row) */
  data: Uint8Array;

  /** Optional metadata about the bitmap */
  metadata?: {
    /** Creation timestamp */
    createdAt: Date;

    /** Description of what's displayed */
    description?: string;
  };
};

/**
 * Axis-aligned pixel rectangle
 */
export type Rectangle = {
  x: number;
  y: number;
  width: number;
  height: number;
};

/**
 * Point in pixel space
 */
export type Point2D = {
  x: number;
  y: number;
};

/**
 * Rotation between the framebuffer and the native panel memory layout
 */
export type PanelRotation = 0 | 90 | 180 | 270;

/**
 * E-paper display configuration
 */
export type EpaperConfig = {
  /** Native panel width in pixels */
  width: number;

  /** Native panel height in pixels */
  height: number;

  /** GPIO pins for control */
  pins: {
    /** Reset pin */
    reset: number;

    /** Data/Command pin */
    dc: number;

    /** Busy pin */
    busy: number;

    /** Chip select pin (optional, may be handled by SPI) */
    cs?: number;

    /** Power control pin (optional) */
    power?: number;
  };

  /** SPI bus configuration */
  spi: {
    bus: number;
    device: number;
    speed: number;
  };

  /** Rotation from framebuffer to panel */
  rotation: PanelRotation;

  /** Driver name registered in the ServiceContainer */
  driver: string;
};

/**
 * E-paper display status
 */
export type EpaperStatus = {
  /** Whether display is initialized */
  initialized: boolean;

  /** Whether display is busy */
  busy: boolean;

  /** Whether display is in sleep mode */
  sleeping: boolean;

  /** Display model/name */
  model?: string;

  /** Framebuffer width in pixels (after rotation) */
  width?: number;

  /** Framebuffer height in pixels (after rotation) */
  height?: number;

  /** Last update timestamp */
  lastUpdate?: Date;

  /** Number of full refreshes performed */
  fullRefreshCount: number;

  /** Number of partial refreshes performed */
  partialRefreshCount: number;
};

/**
 * Panel refresh mode
 */
export enum DisplayUpdateMode {
  /** Full refresh (slower, clears ghosting) */
  FULL = "full",

  /** Partial refresh (faster, accumulates ghosting) */
  PARTIAL = "partial",
}

/**
 * Ghost-suppression bookkeeping owned by the RefreshCoordinator
 */
export type RefreshState = {
  /** A full commit has reached the panel since the last failure or invalidation */
  baseImageEstablished: boolean;

  /** Partial commits since the last full commit */
  cyclesSinceFull: number;

  /** Milliseconds since the last full commit */
  timeSinceFull: number;
};

/**
 * Why a commit ended up with the mode it did
 */
export type CommitReason =
  | "requested"
  | "no-base-image"
  | "cycle-limit"
  | "time-limit";

/**
 * Outcome of a successful RefreshCoordinator commit
 */
export type CommitResult = {
  mode: DisplayUpdateMode;

  /** True when a partial request was upgraded to full */
  forced: boolean;

  reason: CommitReason;

  /** Framebuffer region pushed to the panel */
  region: Rectangle;

  /** Counter value after this commit */
  cyclesSinceFull: number;
};
