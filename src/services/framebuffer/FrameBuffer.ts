import { Bitmap1Bit, Point2D, Rectangle } from "@core/types";
import { SCREEN_HEIGHT, SCREEN_WIDTH } from "@core/constants";
import { IFrameBuffer } from "@core/interfaces";
import {
  BitmapTextOptions,
  calculateBitmapTextHeight,
  calculateBitmapTextWidth,
  renderBitmapText,
} from "@utils/bitmapFont";
import { BitmapUtils } from "./BitmapUtils";

/**
 * The single drawing surface behind the panel.
 *
 * Coordinates are in the landscape framebuffer space (250x122 by default);
 * rotation into the panel's memory layout happens in the EpaperService.
 * Only the RefreshCoordinator hands this out, and only inside the render
 * guard, so nothing here is synchronized.
 */
export class FrameBuffer implements IFrameBuffer {
  private bitmap: Bitmap1Bit;

  constructor(
    readonly width: number = SCREEN_WIDTH,
    readonly height: number = SCREEN_HEIGHT,
  ) {
    this.bitmap = BitmapUtils.createBlankBitmap(width, height);
  }

  get bounds(): Rectangle {
    return { x: 0, y: 0, width: this.width, height: this.height };
  }

  /**
   * Paint the whole surface white
   */
  clear(): void {
    this.bitmap.data.fill(0xff);
  }

  clearRect(rect: Rectangle): void {
    BitmapUtils.fillRect(this.bitmap, rect, false);
  }

  fillRect(rect: Rectangle, black = true): void {
    BitmapUtils.fillRect(this.bitmap, rect, black);
  }

  drawRect(rect: Rectangle): void {
    BitmapUtils.drawRect(this.bitmap, rect);
  }

  setPixel(x: number, y: number, black = true): void {
    BitmapUtils.setPixel(this.bitmap, x, y, black);
  }

  getPixel(x: number, y: number): boolean {
    return BitmapUtils.getPixel(this.bitmap, x, y);
  }

  drawLine(from: Point2D, to: Point2D): void {
    BitmapUtils.drawLine(this.bitmap, from, to);
  }

  drawHorizontalLine(y: number, x1 = 0, x2 = this.width - 1): void {
    BitmapUtils.drawHorizontalLine(this.bitmap, x1, x2, y);
  }

  /**
   * Draw text with its top-left corner at (x, y), returning its width
   */
  drawText(
    text: string,
    x: number,
    y: number,
    options: BitmapTextOptions = {},
  ): number {
    return renderBitmapText(this.bitmap, text, x, y, options);
  }

  /**
   * Draw text centered horizontally inside a rectangle, top-aligned
   */
  drawTextCentered(
    text: string,
    rect: Rectangle,
    options: BitmapTextOptions = {},
  ): void {
    const width = calculateBitmapTextWidth(text, options.scale ?? 1);
    const x = rect.x + Math.floor((rect.width - width) / 2);
    this.drawText(text, Math.max(rect.x, x), rect.y, options);
  }

  measureText(text: string, scale = 1): { width: number; height: number } {
    return {
      width: calculateBitmapTextWidth(text, scale),
      height: calculateBitmapTextHeight(scale),
    };
  }

  /**
   * Copy a bitmap in with its top-left corner at (x, y). White source pixels
   * overwrite only when `opaque` is set.
   */
  drawBitmap(source: Bitmap1Bit, x: number, y: number, opaque = false): void {
    BitmapUtils.blit(this.bitmap, source, x, y, opaque);
  }

  /**
   * Copy of the current contents
   */
  snapshot(): Bitmap1Bit {
    return BitmapUtils.clone(this.bitmap);
  }

  /**
   * Copy of one region of the current contents
   */
  snapshotRegion(rect: Rectangle): Bitmap1Bit {
    return BitmapUtils.extractRegion(this.bitmap, rect);
  }

  /**
   * Live view for callers that only read, such as the panel push
   */
  getBitmap(): Readonly<Bitmap1Bit> {
    return this.bitmap;
  }
}
