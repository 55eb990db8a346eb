import { Bitmap1Bit, Point2D, Rectangle } from "@core/types";

export interface TextOptions {
  scale?: number;
  bold?: boolean;
  inverted?: boolean;
}

/**
 * Drawing surface handed to menus inside the render guard
 */
export interface IFrameBuffer {
  readonly width: number;
  readonly height: number;
  readonly bounds: Rectangle;

  clear(): void;
  clearRect(rect: Rectangle): void;
  fillRect(rect: Rectangle, black?: boolean): void;
  drawRect(rect: Rectangle): void;
  setPixel(x: number, y: number, black?: boolean): void;
  getPixel(x: number, y: number): boolean;
  drawLine(from: Point2D, to: Point2D): void;
  drawHorizontalLine(y: number, x1?: number, x2?: number): void;

  /**
   * @returns width of the drawn text
   */
  drawText(text: string, x: number, y: number, options?: TextOptions): number;
  drawTextCentered(text: string, rect: Rectangle, options?: TextOptions): void;
  measureText(text: string, scale?: number): { width: number; height: number };
  drawBitmap(source: Bitmap1Bit, x: number, y: number, opaque?: boolean): void;

  snapshot(): Bitmap1Bit;
  snapshotRegion(rect: Rectangle): Bitmap1Bit;
  getBitmap(): Readonly<Bitmap1Bit>;
}
