import fs from "fs";
import { access } from "fs/promises";
import path from "path";
import sharp from "sharp";
import { z } from "zod";
import { Bitmap1Bit, PetMood, Result, success } from "@core/types";
import { DisplayError } from "@core/errors";
import { BitmapUtils } from "@services/framebuffer/BitmapUtils";
import {
  calculateBitmapTextWidth,
  renderBitmapText,
} from "@utils/bitmapFont";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("SpriteLibrary");

const DEFAULT_SPRITES_DIR = path.join(__dirname, "../../../assets/sprites");

const ANIMATION_FILE = "animations.json";

const TEXT_ART_LINE_HEIGHT = 12;

const AnimationFileSchema = z
  .object({
    frameSize: z.number().int().positive(),
    sequences: z.record(z.string(), z.array(z.string().min(1)).min(1)),
    textArt: z.record(z.string(), z.array(z.array(z.string())).min(1)),
  })
  .refine((file) => file.sequences[PetMood.NEUTRAL] !== undefined, {
    message: "a neutral sequence is required",
  })
  .refine((file) => file.textArt[PetMood.NEUTRAL] !== undefined, {
    message: "neutral text art is required",
  });

type AnimationFile = z.infer<typeof AnimationFileSchema>;

/**
 * Frame identifiers per mood and the images behind them.
 *
 * Sequences and text art come from animations.json. A frame's image is
 * `<frameId>.png` next to it, scaled to the frame size and thresholded;
 * frames without an image are drawn from the mood's text art instead.
 */
export class SpriteLibrary {
  private readonly animations: AnimationFile;
  private readonly frameOwners = new Map<string, { mood: string; index: number }>();
  private readonly images = new Map<string, Bitmap1Bit>();
  private readonly textFrames = new Map<string, Bitmap1Bit>();

  constructor(private readonly spritesDir: string = DEFAULT_SPRITES_DIR) {
    this.animations = AnimationFileSchema.parse(
      JSON.parse(
        fs.readFileSync(path.join(spritesDir, ANIMATION_FILE), "utf-8"),
      ),
    );
    for (const [mood, frames] of Object.entries(this.animations.sequences)) {
      frames.forEach((frameId, index) => {
        this.frameOwners.set(frameId, { mood, index });
      });
    }
  }

  get frameSize(): number {
    return this.animations.frameSize;
  }

  /**
   * Frame identifiers for a mood, the neutral ones when the mood has none
   */
  getSequence(mood: PetMood): readonly string[] {
    return (
      this.animations.sequences[mood] ??
      this.animations.sequences[PetMood.NEUTRAL] ??
      []
    );
  }

  /**
   * Decode every frame image that exists on disk
   * @returns how many frames have an image
   */
  async loadImages(): Promise<Result<number>> {
    const size = this.frameSize;
    for (const frameId of this.frameOwners.keys()) {
      const file = path.join(this.spritesDir, `${frameId}.png`);
      try {
        await access(file);
      } catch {
        logger.debug(`No image for ${frameId}, using text art`);
        continue;
      }

      try {
        const { data, info } = await sharp(file)
          .resize(size, size, { kernel: "nearest", fit: "fill" })
          .greyscale()
          .threshold(128)
          .raw()
          .toBuffer({ resolveWithObject: true });
        const pixels = new Uint8Array(size * size);
        for (let i = 0; i < pixels.length; i++) {
          pixels[i] = data[i * info.channels];
        }
        this.images.set(frameId, BitmapUtils.fromGreyscale(pixels, size, size));
      } catch (error) {
        const err = DisplayError.assetLoadFailed(file, toError(error));
        logger.warn(`${err.message}, using text art`);
      }
    }

    logger.info(
      `${this.images.size} of ${this.frameOwners.size} sprite frames have images`,
    );
    return success(this.images.size);
  }

  hasImage(frameId: string): boolean {
    return this.images.has(frameId);
  }

  /**
   * Bitmap of frameSize x frameSize for a frame
   */
  renderFrame(frameId: string): Bitmap1Bit {
    const image = this.images.get(frameId);
    if (image) {
      return image;
    }

    const cached = this.textFrames.get(frameId);
    if (cached) {
      return cached;
    }
    const rendered = this.renderTextArt(frameId);
    this.textFrames.set(frameId, rendered);
    return rendered;
  }

  /**
   * Text art lines for a frame
   */
  getTextArt(frameId: string): string[] {
    const owner = this.frameOwners.get(frameId) ?? {
      mood: PetMood.NEUTRAL,
      index: 0,
    };
    const variants =
      this.animations.textArt[owner.mood] ??
      this.animations.textArt[PetMood.NEUTRAL] ??
      [];
    return variants.length > 0 ? variants[owner.index % variants.length] : [];
  }

  private renderTextArt(frameId: string): Bitmap1Bit {
    const size = this.frameSize;
    const bitmap = BitmapUtils.createBlankBitmap(size, size);
    const lines = this.getTextArt(frameId);
    const top = Math.floor((size - lines.length * TEXT_ART_LINE_HEIGHT) / 2);

    lines.forEach((line, i) => {
      const x = Math.max(0, Math.floor((size - calculateBitmapTextWidth(line)) / 2));
      renderBitmapText(bitmap, line, x, top + i * TEXT_ART_LINE_HEIGHT);
    });
    return bitmap;
  }
}
