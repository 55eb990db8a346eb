import { BaseError } from "./BaseError";
import { Rectangle } from "@core/types/DisplayTypes";

/**
 * Display-related error codes
 */
export enum DisplayErrorCode {
  // Panel hardware errors
  DEVICE_INIT_FAILED = "DISPLAY_DEVICE_INIT_FAILED",
  DEVICE_NOT_INITIALIZED = "DISPLAY_DEVICE_NOT_INITIALIZED",

  // Display state errors
  DISPLAY_BUSY = "DISPLAY_BUSY",
  DISPLAY_TIMEOUT = "DISPLAY_TIMEOUT",
  DISPLAY_SLEEPING = "DISPLAY_SLEEPING",

  // Data errors
  INVALID_BITMAP = "DISPLAY_INVALID_BITMAP",
  BITMAP_SIZE_MISMATCH = "DISPLAY_BITMAP_SIZE_MISMATCH",
  REGION_OUT_OF_BOUNDS = "DISPLAY_REGION_OUT_OF_BOUNDS",

  // Update errors
  UPDATE_FAILED = "DISPLAY_UPDATE_FAILED",

  // Assets
  ASSET_LOAD_FAILED = "DISPLAY_ASSET_LOAD_FAILED",
  NOTHING_DISPLAYED = "DISPLAY_NOTHING_DISPLAYED",

  // Generic
  UNKNOWN = "DISPLAY_UNKNOWN_ERROR",
}

/**
 * Display Service Error
 */
export class DisplayError extends BaseError {
  constructor(
    message: string,
    code: DisplayErrorCode = DisplayErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, recoverable, context, cause);
  }

  /**
   * Create error for initialization failure
   */
  static initFailed(reason: string, error?: Error): DisplayError {
    return new DisplayError(
      `Failed to initialize e-paper display: ${reason}`,
      DisplayErrorCode.DEVICE_INIT_FAILED,
      false,
      { reason, originalError: error?.message },
      error,
    );
  }

  /**
   * Create error for device not initialized
   */
  static notInitialized(): DisplayError {
    return new DisplayError(
      "E-paper display not initialized. Call initialize() first.",
      DisplayErrorCode.DEVICE_NOT_INITIALIZED,
      false,
    );
  }

  /**
   * Create error for display busy
   */
  static displayBusy(): DisplayError {
    return new DisplayError(
      "Display is busy. Wait for current operation to complete.",
      DisplayErrorCode.DISPLAY_BUSY,
      true,
    );
  }

  /**
   * Create error for display timeout
   */
  static timeout(operation: string, timeoutMs: number): DisplayError {
    return new DisplayError(
      `Display timeout during ${operation} after ${timeoutMs}ms`,
      DisplayErrorCode.DISPLAY_TIMEOUT,
      true,
      { operation, timeoutMs },
    );
  }

  /**
   * Create error for an update attempted while the panel sleeps
   */
  static sleeping(): DisplayError {
    return new DisplayError(
      "Display is sleeping. Call wake() first.",
      DisplayErrorCode.DISPLAY_SLEEPING,
      true,
    );
  }

  /**
   * Create error for invalid bitmap
   */
  static invalidBitmap(reason: string): DisplayError {
    return new DisplayError(
      `Invalid bitmap: ${reason}`,
      DisplayErrorCode.INVALID_BITMAP,
      false,
      { reason },
    );
  }

  /**
   * Create error for bitmap size mismatch
   */
  static sizeMismatch(
    bitmapWidth: number,
    bitmapHeight: number,
    displayWidth: number,
    displayHeight: number,
  ): DisplayError {
    return new DisplayError(
      `Bitmap size (${bitmapWidth}x${bitmapHeight}) does not match display (${displayWidth}x${displayHeight})`,
      DisplayErrorCode.BITMAP_SIZE_MISMATCH,
      false,
      { bitmapWidth, bitmapHeight, displayWidth, displayHeight },
    );
  }

  /**
   * Create error for a region that does not fit on the screen
   */
  static regionOutOfBounds(
    region: Rectangle,
    width: number,
    height: number,
  ): DisplayError {
    return new DisplayError(
      `Region ${region.width}x${region.height}@${region.x},${region.y} is outside ${width}x${height}`,
      DisplayErrorCode.REGION_OUT_OF_BOUNDS,
      false,
      { region, width, height },
    );
  }

  /**
   * Create error for a failed panel write
   */
  static updateFailed(error: Error): DisplayError {
    return new DisplayError(
      `Failed to update display: ${error.message}`,
      DisplayErrorCode.UPDATE_FAILED,
      true,
      { originalError: error.message },
      error,
    );
  }

  /**
   * Create error for a font or sprite that could not be loaded
   */
  static assetLoadFailed(assetPath: string, error: Error): DisplayError {
    return new DisplayError(
      `Failed to load asset ${assetPath}: ${error.message}`,
      DisplayErrorCode.ASSET_LOAD_FAILED,
      true,
      { assetPath, originalError: error.message },
      error,
    );
  }

  /**
   * Create error for a snapshot requested before the first panel write
   */
  static nothingDisplayed(): DisplayError {
    return new DisplayError(
      "No frame has been sent to the display yet",
      DisplayErrorCode.NOTHING_DISPLAYED,
      true,
    );
  }
}
