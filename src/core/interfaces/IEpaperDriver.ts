import { IHardwareAdapter } from "./IHardwareAdapter";
import { ColorDepth, DisplayType, Rectangle } from "@core/types";

/**
 * What a panel can do, in its native (unrotated) orientation
 */
export interface PanelCapabilities {
  width: number;
  height: number;
  colorDepth: ColorDepth;
  displayType: DisplayType;
  supportsPartialRefresh: boolean;
  /** Typical full refresh time in milliseconds */
  refreshTimeFullMs: number;
  /** Typical partial refresh time in milliseconds */
  refreshTimePartialMs: number;
}

/**
 * E-paper panel driver.
 *
 * Buffers are packed 1-bit rows in the panel's native orientation, a set
 * bit being white. Each model implements its own controller command
 * sequences on top of an IHardwareAdapter.
 */
export interface IEpaperDriver {
  /**
   * Registry key, e.g. "waveshare_2in13_v4"
   */
  readonly name: string;

  readonly capabilities: PanelCapabilities;

  /**
   * Reset the controller and run its initialization sequence
   */
  init(adapter: IHardwareAdapter): Promise<void>;

  /**
   * Full refresh of the whole panel. The buffer also becomes the base image
   * that later partial refreshes are compared against.
   */
  display(buffer: Buffer): Promise<void>;

  /**
   * Partial refresh of one window.
   * @param buffer packed rows covering exactly the window
   * @param window native panel coordinates; x is a multiple of 8, and so is
   * the width unless the window reaches the right edge
   */
  displayPartial(buffer: Buffer, window: Rectangle): Promise<void>;

  /**
   * Full refresh to white
   */
  clear(): Promise<void>;

  /**
   * Enter deep sleep. The controller needs init again before the next write.
   */
  sleep(): Promise<void>;

  wake(): Promise<void>;

  isSleeping(): boolean;

  /**
   * False while the busy pin is asserted
   */
  isReady(): boolean;

  /**
   * @throws Error when the busy pin stays asserted past the timeout
   */
  waitUntilReady(timeoutMs: number): Promise<void>;

  dispose(): Promise<void>;
}
