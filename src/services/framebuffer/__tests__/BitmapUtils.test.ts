import { BitmapUtils } from "../BitmapUtils";
import { HOME_SPRITE_RECT, SCREEN_HEIGHT, SCREEN_WIDTH } from "@core/constants";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe("BitmapUtils", () => {
  describe("createBlankBitmap", () => {
    it("should pad rows to whole bytes and start white", () => {
      const bitmap = BitmapUtils.createBlankBitmap(10, 2);

      expect(bitmap.data.length).toBe(4);
      expect(Array.from(bitmap.data)).toEqual([0xff, 0xff, 0xff, 0xff]);
      expect(bitmap.metadata?.createdAt).toBeInstanceOf(Date);
    });

    it("should start black when fill is set", () => {
      const bitmap = BitmapUtils.createBlankBitmap(8, 1, true);
      expect(bitmap.data[0]).toBe(0x00);
    });
  });

  describe("pixels", () => {
    it("should clear the bit for a black pixel, most significant bit first", () => {
      const bitmap = BitmapUtils.createBlankBitmap(8, 1);

      BitmapUtils.setPixel(bitmap, 0, 0);
      expect(bitmap.data[0]).toBe(0x7f);

      BitmapUtils.setPixel(bitmap, 7, 0);
      expect(bitmap.data[0]).toBe(0x7e);

      BitmapUtils.setPixel(bitmap, 0, 0, false);
      expect(bitmap.data[0]).toBe(0xfe);
    });

    it("should address the second row through the padded stride", () => {
      const bitmap = BitmapUtils.createBlankBitmap(10, 2);

      BitmapUtils.setPixel(bitmap, 9, 1);

      expect(bitmap.data[3]).toBe(0xbf);
      expect(BitmapUtils.getPixel(bitmap, 9, 1)).toBe(true);
    });

    it("should ignore writes and read white outside the bitmap", () => {
      const bitmap = BitmapUtils.createBlankBitmap(8, 1);

      BitmapUtils.setPixel(bitmap, 8, 0);
      BitmapUtils.setPixel(bitmap, -1, 0);

      expect(bitmap.data[0]).toBe(0xff);
      expect(BitmapUtils.getPixel(bitmap, 20, 20)).toBe(false);
    });
  });

  describe("shapes", () => {
    it("should fill a clipped rectangle", () => {
      const bitmap = BitmapUtils.createBlankBitmap(8, 1);

      BitmapUtils.fillRect(bitmap, { x: 2, y: 0, width: 4, height: 5 });

      expect(bitmap.data[0]).toBe(0xc3);
    });

    it("should outline a rectangle", () => {
      const bitmap = BitmapUtils.createBlankBitmap(8, 8);

      BitmapUtils.drawRect(bitmap, { x: 0, y: 0, width: 4, height: 3 });

      expect(BitmapUtils.countBlackPixels(bitmap)).toBe(10);
      expect(BitmapUtils.getPixel(bitmap, 1, 1)).toBe(false);
    });

    it("should draw a diagonal line through both end points", () => {
      const bitmap = BitmapUtils.createBlankBitmap(8, 8);

      BitmapUtils.drawLine(bitmap, { x: 0, y: 0 }, { x: 3, y: 3 });

      expect(BitmapUtils.countBlackPixels(bitmap)).toBe(4);
      expect(BitmapUtils.getPixel(bitmap, 3, 3)).toBe(true);
    });
  });

  describe("blit", () => {
    it("should copy only black pixels unless opaque", () => {
      const source = BitmapUtils.createBlankBitmap(2, 1);
      BitmapUtils.setPixel(source, 0, 0);

      const transparent = BitmapUtils.createBlankBitmap(8, 1, true);
      BitmapUtils.blit(transparent, source, 4, 0);
      expect(transparent.data[0]).toBe(0x00);

      const opaque = BitmapUtils.createBlankBitmap(8, 1, true);
      BitmapUtils.blit(opaque, source, 4, 0, true);
      expect(opaque.data[0]).toBe(0x04);
    });
  });

  describe("rectangles", () => {
    it("should clip to the bitmap area", () => {
      expect(
        BitmapUtils.clipRect({ x: -5, y: -5, width: 10, height: 10 }, 20, 20),
      ).toEqual({ x: 0, y: 0, width: 5, height: 5 });
      expect(
        BitmapUtils.clipRect({ x: 30, y: 0, width: 5, height: 5 }, 20, 20),
      ).toBeNull();
    });

    it("should widen to byte boundaries without passing the right edge", () => {
      expect(
        BitmapUtils.alignRectToBytes({ x: 13, y: 4, width: 10, height: 3 }, 250),
      ).toEqual({ x: 8, y: 4, width: 16, height: 3 });
      expect(
        BitmapUtils.alignRectToBytes({ x: 245, y: 0, width: 5, height: 1 }, 250),
      ).toEqual({ x: 240, y: 0, width: 10, height: 1 });
    });

    it("should map the sprite field into panel space for every rotation", () => {
      const rotate = (rotation: 0 | 90 | 180 | 270) =>
        BitmapUtils.rotateRect(
          HOME_SPRITE_RECT,
          rotation,
          SCREEN_WIDTH,
          SCREEN_HEIGHT,
        );

      expect(rotate(0)).toEqual(HOME_SPRITE_RECT);
      expect(rotate(90)).toEqual({ x: 24, y: 8, width: 64, height: 64 });
      expect(rotate(180)).toEqual({ x: 8, y: 34, width: 64, height: 64 });
      expect(rotate(270)).toEqual({ x: 34, y: 178, width: 64, height: 64 });
    });
  });

  describe("rotate", () => {
    it.each([
      [90, 2, 3, { x: 0, y: 2 }],
      [180, 3, 2, { x: 2, y: 1 }],
      [270, 2, 3, { x: 1, y: 0 }],
    ] as const)(
      "should move the top-left pixel when rotating by %i",
      (rotation, width, height, expected) => {
        const bitmap = BitmapUtils.createBlankBitmap(3, 2);
        BitmapUtils.setPixel(bitmap, 0, 0);

        const rotated = BitmapUtils.rotate(bitmap, rotation);

        expect(rotated.width).toBe(width);
        expect(rotated.height).toBe(height);
        expect(BitmapUtils.countBlackPixels(rotated)).toBe(1);
        expect(BitmapUtils.getPixel(rotated, expected.x, expected.y)).toBe(true);
      },
    );

    it("should land a filled rectangle exactly on its rotated rectangle", () => {
      const bitmap = BitmapUtils.createBlankBitmap(16, 8);
      const rect = { x: 3, y: 1, width: 4, height: 2 };
      BitmapUtils.fillRect(bitmap, rect);

      const rotated = BitmapUtils.rotate(bitmap, 90);
      const target = BitmapUtils.rotateRect(rect, 90, 16, 8);

      expect(target).toEqual({ x: 1, y: 9, width: 2, height: 4 });
      expect(BitmapUtils.countBlackPixels(rotated)).toBe(8);
      for (let y = target.y; y < target.y + target.height; y++) {
        for (let x = target.x; x < target.x + target.width; x++) {
          expect(BitmapUtils.getPixel(rotated, x, y)).toBe(true);
        }
      }
    });

    it("should return an independent copy at 0 degrees", () => {
      const bitmap = BitmapUtils.createBlankBitmap(8, 1);
      const copy = BitmapUtils.rotate(bitmap, 0);

      BitmapUtils.setPixel(copy, 0, 0);

      expect(bitmap.data[0]).toBe(0xff);
    });
  });

  describe("regions and greyscale", () => {
    it("should extract a region into its own bitmap", () => {
      const bitmap = BitmapUtils.createBlankBitmap(20, 20);
      BitmapUtils.setPixel(bitmap, 5, 5);

      const region = BitmapUtils.extractRegion(bitmap, {
        x: 4,
        y: 4,
        width: 3,
        height: 3,
      });

      expect(region.width).toBe(3);
      expect(BitmapUtils.countBlackPixels(region)).toBe(1);
      expect(BitmapUtils.getPixel(region, 1, 1)).toBe(true);
    });

    it("should threshold greyscale and unpack back to 0 and 255", () => {
      const bitmap = BitmapUtils.fromGreyscale(
        new Uint8Array([0, 255, 100, 200]),
        2,
        2,
      );

      expect(BitmapUtils.getPixel(bitmap, 0, 0)).toBe(true);
      expect(BitmapUtils.getPixel(bitmap, 1, 0)).toBe(false);
      expect(BitmapUtils.getPixel(bitmap, 0, 1)).toBe(true);
      expect(Array.from(BitmapUtils.toGreyscale(bitmap))).toEqual([
        0, 255, 0, 255,
      ]);
    });
  });
});
