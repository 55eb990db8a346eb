import fs from "fs";
import path from "path";
import { z } from "zod";
import { Bitmap1Bit } from "@core/types";
import { BitmapUtils } from "@services/framebuffer/BitmapUtils";

/**
 * Fixed 5x7 bitmap font, integer scaled.
 *
 * Glyphs live in assets/fonts/font5x7.json as five column bytes each, bit 0
 * being the top row. Characters missing from the file render as the
 * fallback glyph.
 */

const FONT_FILE = path.join(__dirname, "../../assets/fonts/font5x7.json");

const FontFileSchema = z.object({
  glyphWidth: z.number().int().positive(),
  glyphHeight: z.number().int().min(1).max(8),
  spacing: z.number().int().min(0),
  fallback: z.string().length(1),
  glyphs: z.record(z.string(), z.array(z.number().int().min(0).max(255))),
});

type FontFile = z.infer<typeof FontFileSchema>;

let cachedFont: FontFile | null = null;

const loadFont = (): FontFile => {
  if (!cachedFont) {
    cachedFont = FontFileSchema.parse(
      JSON.parse(fs.readFileSync(FONT_FILE, "utf-8")),
    );
  }
  return cachedFont;
};

export interface BitmapTextOptions {
  /** Integer pixel multiplier, 1 by default */
  scale?: number;
  /** Draw every column twice, one scaled pixel apart */
  bold?: boolean;
  /** Draw white on a black background */
  inverted?: boolean;
}

/**
 * Column bytes for a character
 */
export function getGlyph(char: string): number[] {
  const font = loadFont();
  return font.glyphs[char] ?? font.glyphs[font.fallback] ?? [];
}

export function calculateBitmapTextWidth(text: string, scale = 1): number {
  if (text.length === 0) {
    return 0;
  }
  const font = loadFont();
  const chars = Array.from(text).length;
  return (chars * font.glyphWidth + (chars - 1) * font.spacing) * scale;
}

export function calculateBitmapTextHeight(scale = 1): number {
  return loadFont().glyphHeight * scale;
}

/**
 * Draw text with its top-left corner at (x, y). Pixels outside the bitmap
 * are clipped. Returns the rendered width.
 */
export function renderBitmapText(
  bitmap: Bitmap1Bit,
  text: string,
  x: number,
  y: number,
  options: BitmapTextOptions = {},
): number {
  const font = loadFont();
  const scale = Math.max(1, Math.round(options.scale ?? 1));
  const black = !options.inverted;
  const originX = Math.round(x);
  const originY = Math.round(y);
  const advance = (font.glyphWidth + font.spacing) * scale;

  if (options.inverted) {
    BitmapUtils.fillRect(bitmap, {
      x: originX - scale,
      y: originY - scale,
      width: calculateBitmapTextWidth(text, scale) + 2 * scale,
      height: calculateBitmapTextHeight(scale) + 2 * scale,
    });
  }

  let cursorX = originX;
  for (const char of Array.from(text)) {
    const columns = getGlyph(char);
    columns.forEach((column, col) => {
      for (let row = 0; row < font.glyphHeight; row++) {
        if ((column & (1 << row)) === 0) {
          continue;
        }
        const px = cursorX + col * scale;
        const py = originY + row * scale;
        BitmapUtils.fillRect(
          bitmap,
          {
            x: px,
            y: py,
            width: options.bold ? scale * 2 : scale,
            height: scale,
          },
          black,
        );
      }
    });
    cursorX += advance;
  }

  return calculateBitmapTextWidth(text, scale);
}
