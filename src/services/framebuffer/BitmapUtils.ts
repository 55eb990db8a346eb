import { Bitmap1Bit, PanelRotation, Point2D, Rectangle } from "@core/types";
import { getLogger } from "@utils/logger";

const logger = getLogger("BitmapUtils");

/**
 * Low-level operations on packed 1-bit bitmaps.
 *
 * Rows are ceil(width / 8) bytes, most significant bit first. A set bit is
 * white and a cleared bit is black, which is what the SSD1680 RAM expects,
 * so a freshly created bitmap is all 0xFF.
 */
export class BitmapUtils {
  /**
   * Create a blank bitmap, white unless `fill` asks for black
   */
  static createBlankBitmap(
    width: number,
    height: number,
    fill: boolean = false,
  ): Bitmap1Bit {
    const data = new Uint8Array(Math.ceil(width / 8) * height);
    data.fill(fill ? 0x00 : 0xff);

    return {
      width,
      height,
      data,
      metadata: {
        createdAt: new Date(),
      },
    };
  }

  static getBytesPerRow(bitmap: Bitmap1Bit): number {
    return Math.ceil(bitmap.width / 8);
  }

  /**
   * Copy a bitmap, including its data
   */
  static clone(bitmap: Bitmap1Bit): Bitmap1Bit {
    return {
      width: bitmap.width,
      height: bitmap.height,
      data: new Uint8Array(bitmap.data),
      metadata: bitmap.metadata ? { ...bitmap.metadata } : undefined,
    };
  }

  /**
   * True when the pixel is black. Pixels outside the bitmap read as white.
   */
  static getPixel(bitmap: Bitmap1Bit, x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) {
      return false;
    }
    const byte =
      bitmap.data[y * BitmapUtils.getBytesPerRow(bitmap) + (x >> 3)];
    return (byte & (0x80 >> (x & 7))) === 0;
  }

  /**
   * Set a pixel black (`black` true) or white. Out of range writes are clipped.
   */
  static setPixel(
    bitmap: Bitmap1Bit,
    x: number,
    y: number,
    black: boolean = true,
  ): void {
    BitmapUtils.setPixelFast(
      bitmap.data,
      BitmapUtils.getBytesPerRow(bitmap),
      bitmap.width,
      bitmap.height,
      x,
      y,
      black,
    );
  }

  /**
   * setPixel for tight loops that already know the row stride
   * @internal
   */
  static setPixelFast(
    data: Uint8Array,
    bytesPerRow: number,
    width: number,
    height: number,
    x: number,
    y: number,
    black: boolean = true,
  ): void {
    if (x < 0 || x >= width || y < 0 || y >= height) {
      return;
    }

    const byteIndex = y * bytesPerRow + (x >> 3);
    const mask = 0x80 >> (x & 7);

    if (black) {
      data[byteIndex] &= ~mask;
    } else {
      data[byteIndex] |= mask;
    }
  }

  /**
   * Fill a rectangle, clipped to the bitmap
   */
  static fillRect(
    bitmap: Bitmap1Bit,
    rect: Rectangle,
    black: boolean = true,
  ): void {
    const clipped = BitmapUtils.clipRect(rect, bitmap.width, bitmap.height);
    if (!clipped) {
      return;
    }

    const bytesPerRow = BitmapUtils.getBytesPerRow(bitmap);
    for (let y = clipped.y; y < clipped.y + clipped.height; y++) {
      for (let x = clipped.x; x < clipped.x + clipped.width; x++) {
        BitmapUtils.setPixelFast(
          bitmap.data,
          bytesPerRow,
          bitmap.width,
          bitmap.height,
          x,
          y,
          black,
        );
      }
    }
  }

  /**
   * One pixel wide rectangle outline
   */
  static drawRect(bitmap: Bitmap1Bit, rect: Rectangle, black = true): void {
    if (rect.width <= 0 || rect.height <= 0) {
      return;
    }
    const right = rect.x + rect.width - 1;
    const bottom = rect.y + rect.height - 1;
    BitmapUtils.drawHorizontalLine(bitmap, rect.x, right, rect.y, black);
    BitmapUtils.drawHorizontalLine(bitmap, rect.x, right, bottom, black);
    BitmapUtils.drawVerticalLine(bitmap, rect.x, rect.y, bottom, black);
    BitmapUtils.drawVerticalLine(bitmap, right, rect.y, bottom, black);
  }

  static drawHorizontalLine(
    bitmap: Bitmap1Bit,
    x1: number,
    x2: number,
    y: number,
    black = true,
  ): void {
    const start = Math.min(x1, x2);
    const end = Math.max(x1, x2);
    BitmapUtils.fillRect(
      bitmap,
      { x: start, y, width: end - start + 1, height: 1 },
      black,
    );
  }

  static drawVerticalLine(
    bitmap: Bitmap1Bit,
    x: number,
    y1: number,
    y2: number,
    black = true,
  ): void {
    const start = Math.min(y1, y2);
    const end = Math.max(y1, y2);
    BitmapUtils.fillRect(
      bitmap,
      { x, y: start, width: 1, height: end - start + 1 },
      black,
    );
  }

  /**
   * Bresenham line between two points
   */
  static drawLine(bitmap: Bitmap1Bit, p1: Point2D, p2: Point2D): void {
    // Bresenham needs integers or it never reaches the end point
    const x2 = Math.round(p2.x);
    const y2 = Math.round(p2.y);
    let x = Math.round(p1.x);
    let y = Math.round(p1.y);

    const dx = Math.abs(x2 - x);
    const dy = Math.abs(y2 - y);
    const sx = x < x2 ? 1 : -1;
    const sy = y < y2 ? 1 : -1;
    let err = dx - dy;

    const bytesPerRow = BitmapUtils.getBytesPerRow(bitmap);

    for (;;) {
      BitmapUtils.setPixelFast(
        bitmap.data,
        bytesPerRow,
        bitmap.width,
        bitmap.height,
        x,
        y,
        true,
      );
      if (x === x2 && y === y2) break;

      const e2 = 2 * err;
      if (e2 > -dy) {
        err -= dy;
        x += sx;
      }
      if (e2 < dx) {
        err += dx;
        y += sy;
      }
    }
  }

  /**
   * Copy the black pixels of `source` onto `target` with its top-left corner
   * at (x, y). With `opaque` the white pixels are copied too.
   */
  static blit(
    target: Bitmap1Bit,
    source: Bitmap1Bit,
    x: number,
    y: number,
    opaque: boolean = false,
  ): void {
    const targetStride = BitmapUtils.getBytesPerRow(target);
    for (let sy = 0; sy < source.height; sy++) {
      for (let sx = 0; sx < source.width; sx++) {
        const black = BitmapUtils.getPixel(source, sx, sy);
        if (black || opaque) {
          BitmapUtils.setPixelFast(
            target.data,
            targetStride,
            target.width,
            target.height,
            x + sx,
            y + sy,
            black,
          );
        }
      }
    }
  }

  /**
   * Intersect a rectangle with the bitmap area, null when nothing is left
   */
  static clipRect(
    rect: Rectangle,
    width: number,
    height: number,
  ): Rectangle | null {
    const x1 = Math.max(0, Math.floor(rect.x));
    const y1 = Math.max(0, Math.floor(rect.y));
    const x2 = Math.min(width, Math.floor(rect.x + rect.width));
    const y2 = Math.min(height, Math.floor(rect.y + rect.height));

    if (x2 <= x1 || y2 <= y1) {
      return null;
    }
    return { x: x1, y: y1, width: x2 - x1, height: y2 - y1 };
  }

  /**
   * Widen a rectangle so its left and right edges fall on byte boundaries.
   * The SSD1680 RAM window is addressed in whole bytes along x.
   */
  static alignRectToBytes(rect: Rectangle, width: number): Rectangle {
    const left = Math.floor(rect.x / 8) * 8;
    const right = Math.min(width, Math.ceil((rect.x + rect.width) / 8) * 8);
    return { x: left, y: rect.y, width: right - left, height: rect.height };
  }

  /**
   * Copy a rectangle out into a new bitmap of the rectangle's size
   */
  static extractRegion(bitmap: Bitmap1Bit, rect: Rectangle): Bitmap1Bit {
    const region = BitmapUtils.createBlankBitmap(rect.width, rect.height);
    const stride = BitmapUtils.getBytesPerRow(region);

    for (let y = 0; y < rect.height; y++) {
      for (let x = 0; x < rect.width; x++) {
        if (BitmapUtils.getPixel(bitmap, rect.x + x, rect.y + y)) {
          BitmapUtils.setPixelFast(
            region.data,
            stride,
            region.width,
            region.height,
            x,
            y,
            true,
          );
        }
      }
    }
    return region;
  }

  /**
   * Rotate a bitmap clockwise from the framebuffer's orientation into the
   * panel's. 90 and 270 swap width and height.
   */
  static rotate(bitmap: Bitmap1Bit, rotation: PanelRotation): Bitmap1Bit {
    if (rotation === 0) {
      return BitmapUtils.clone(bitmap);
    }

    const { width, height } = bitmap;
    const swap = rotation === 90 || rotation === 270;
    const rotated = BitmapUtils.createBlankBitmap(
      swap ? height : width,
      swap ? width : height,
    );
    const stride = BitmapUtils.getBytesPerRow(rotated);

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (!BitmapUtils.getPixel(bitmap, x, y)) {
          continue;
        }
        const target = BitmapUtils.rotatePoint(
          { x, y },
          rotation,
          width,
          height,
        );
        BitmapUtils.setPixelFast(
          rotated.data,
          stride,
          rotated.width,
          rotated.height,
          target.x,
          target.y,
          true,
        );
      }
    }

    logger.debug(
      `Rotated ${width}x${height} by ${rotation} to ${rotated.width}x${rotated.height}`,
    );
    return rotated;
  }

  /**
   * Where a framebuffer pixel lands on the panel
   */
  static rotatePoint(
    point: Point2D,
    rotation: PanelRotation,
    width: number,
    height: number,
  ): Point2D {
    switch (rotation) {
      case 90:
        return { x: point.y, y: width - 1 - point.x };
      case 180:
        return { x: width - 1 - point.x, y: height - 1 - point.y };
      case 270:
        return { x: height - 1 - point.y, y: point.x };
      default:
        return { x: point.x, y: point.y };
    }
  }

  /**
   * Panel-space rectangle covering a framebuffer rectangle
   */
  static rotateRect(
    rect: Rectangle,
    rotation: PanelRotation,
    width: number,
    height: number,
  ): Rectangle {
    switch (rotation) {
      case 90:
        return {
          x: rect.y,
          y: width - rect.x - rect.width,
          width: rect.height,
          height: rect.width,
        };
      case 180:
        return {
          x: width - rect.x - rect.width,
          y: height - rect.y - rect.height,
          width: rect.width,
          height: rect.height,
        };
      case 270:
        return {
          x: height - rect.y - rect.height,
          y: rect.x,
          width: rect.height,
          height: rect.width,
        };
      default:
        return { ...rect };
    }
  }

  /**
   * Pack 8-bit greyscale pixels (one byte per pixel, row-major) into a
   * bitmap. Values below the threshold become black.
   */
  static fromGreyscale(
    pixels: Uint8Array,
    width: number,
    height: number,
    threshold: number = 128,
  ): Bitmap1Bit {
    const bitmap = BitmapUtils.createBlankBitmap(width, height);
    const stride = BitmapUtils.getBytesPerRow(bitmap);

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (pixels[y * width + x] < threshold) {
          BitmapUtils.setPixelFast(
            bitmap.data,
            stride,
            width,
            height,
            x,
            y,
            true,
          );
        }
      }
    }
    return bitmap;
  }

  /**
   * Unpack to 8-bit greyscale, 0 for black and 255 for white
   */
  static toGreyscale(bitmap: Bitmap1Bit): Uint8Array {
    const pixels = new Uint8Array(bitmap.width * bitmap.height);
    for (let y = 0; y < bitmap.height; y++) {
      for (let x = 0; x < bitmap.width; x++) {
        pixels[y * bitmap.width + x] = BitmapUtils.getPixel(bitmap, x, y)
          ? 0
          : 255;
      }
    }
    return pixels;
  }

  /**
   * Number of black pixels
   */
  static countBlackPixels(bitmap: Bitmap1Bit): number {
    let count = 0;
    for (let y = 0; y < bitmap.height; y++) {
      for (let x = 0; x < bitmap.width; x++) {
        if (BitmapUtils.getPixel(bitmap, x, y)) count++;
      }
    }
    return count;
  }
}
