import {
  Bitmap1Bit,
  DisplayUpdateMode,
  EpaperStatus,
  PanelRotation,
  Rectangle,
  Result,
} from "@core/types";

/**
 * E-paper panel as seen from the rest of the application.
 *
 * Works in framebuffer coordinates (landscape 250x122 by default); the
 * service rotates into the panel's native layout and aligns partial windows
 * to the controller's byte addressing.
 */
export interface IEpaperService {
  initialize(): Promise<Result<void>>;

  /**
   * Push a whole framebuffer-sized bitmap
   * @param mode FULL by default; PARTIAL refreshes the whole screen without a flash
   */
  displayBitmap(
    bitmap: Bitmap1Bit,
    mode?: DisplayUpdateMode,
  ): Promise<Result<void>>;

  /**
   * Partial refresh of one region of a framebuffer-sized bitmap
   */
  displayRegion(bitmap: Bitmap1Bit, region: Rectangle): Promise<Result<void>>;

  /**
   * Full refresh to white
   */
  clear(): Promise<Result<void>>;

  sleep(): Promise<Result<void>>;

  wake(): Promise<Result<void>>;

  getStatus(): Result<EpaperStatus>;

  isBusy(): boolean;

  /**
   * Framebuffer dimensions, after rotation
   */
  getDimensions(): { width: number; height: number };

  getRotation(): PanelRotation;

  /**
   * PNG of the last bitmap pushed, in framebuffer orientation
   */
  getSnapshotPng(): Promise<Result<Buffer>>;

  /**
   * Put the panel to sleep and release the hardware
   */
  dispose(): Promise<void>;
}
