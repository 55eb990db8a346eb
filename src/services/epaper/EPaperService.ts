import sharp from "sharp";
import { IEpaperService } from "@core/interfaces";
import { IEpaperDriver } from "@core/interfaces/IEpaperDriver";
import { IHardwareAdapter } from "@core/interfaces/IHardwareAdapter";
import {
  Bitmap1Bit,
  DisplayUpdateMode,
  EpaperConfig,
  EpaperStatus,
  PanelRotation,
  Rectangle,
  Result,
  failure,
  success,
} from "@core/types";
import { DisplayError } from "@core/errors";
import { EPAPER_BUSY_TIMEOUT_MS } from "@core/constants";
import { BitmapUtils } from "@services/framebuffer/BitmapUtils";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("EpaperService");

/**
 * E-paper panel service
 *
 * Turns framebuffer-oriented bitmaps into native panel writes through a
 * pluggable driver and hardware adapter. Keeps the last frame so the web API
 * can show what the panel shows.
 */
export class EpaperService implements IEpaperService {
  private initialized = false;
  private sleeping = false;
  private busy = false;
  private fullRefreshCount = 0;
  private partialRefreshCount = 0;
  private lastUpdate: Date | null = null;
  private lastFrame: Bitmap1Bit | null = null;
  private readonly rotation: PanelRotation;

  constructor(
    private readonly config: EpaperConfig,
    private readonly driver: IEpaperDriver,
    private readonly adapter: IHardwareAdapter,
  ) {
    this.rotation = config.rotation;
    const { width, height } = driver.capabilities;
    logger.info(
      `Using driver ${driver.name} (${width}x${height}, rotation ${this.rotation})`,
    );
  }

  async initialize(): Promise<Result<void>> {
    if (this.initialized) {
      return success(undefined);
    }

    try {
      const { reset, dc, busy, power } = this.config.pins;
      this.adapter.init({ reset, dc, busy, power }, this.config.spi);
      await this.driver.init(this.adapter);

      this.initialized = true;
      this.sleeping = false;
      this.busy = false;
      logger.info("E-paper display initialized");
      return success(undefined);
    } catch (error) {
      const err = toError(error);
      logger.error("Initializing e-paper display failed:", err);
      return failure(DisplayError.initFailed(err.message, err));
    }
  }

  async displayBitmap(
    bitmap: Bitmap1Bit,
    mode: DisplayUpdateMode = DisplayUpdateMode.FULL,
  ): Promise<Result<void>> {
    const sizeCheck = this.checkFrameSize(bitmap);
    if (!sizeCheck.success) {
      return sizeCheck;
    }

    return this.write(async () => {
      const native = BitmapUtils.rotate(bitmap, this.rotation);
      const buffer = Buffer.from(native.data);
      if (mode === DisplayUpdateMode.FULL) {
        await this.driver.display(buffer);
        this.fullRefreshCount++;
      } else {
        await this.driver.displayPartial(buffer, {
          x: 0,
          y: 0,
          width: native.width,
          height: native.height,
        });
        this.partialRefreshCount++;
      }
      this.lastFrame = BitmapUtils.clone(bitmap);
      logger.debug(`Frame displayed (${mode})`);
    });
  }

  async displayRegion(
    bitmap: Bitmap1Bit,
    region: Rectangle,
  ): Promise<Result<void>> {
    const sizeCheck = this.checkFrameSize(bitmap);
    if (!sizeCheck.success) {
      return sizeCheck;
    }

    const { width, height } = this.getDimensions();
    const clipped = BitmapUtils.clipRect(region, width, height);
    if (
      !clipped ||
      clipped.width !== region.width ||
      clipped.height !== region.height
    ) {
      return failure(DisplayError.regionOutOfBounds(region, width, height));
    }

    return this.write(async () => {
      const native = BitmapUtils.rotate(bitmap, this.rotation);
      const window = BitmapUtils.alignRectToBytes(
        BitmapUtils.rotateRect(clipped, this.rotation, width, height),
        native.width,
      );
      const slice = BitmapUtils.extractRegion(native, window);
      await this.driver.displayPartial(Buffer.from(slice.data), window);
      this.partialRefreshCount++;
      this.lastFrame = BitmapUtils.clone(bitmap);
      logger.debug(
        `Region ${clipped.width}x${clipped.height}@${clipped.x},${clipped.y} displayed as window ${window.width}x${window.height}@${window.x},${window.y}`,
      );
    });
  }

  async clear(): Promise<Result<void>> {
    return this.write(async () => {
      await this.driver.clear();
      this.fullRefreshCount++;
      const { width, height } = this.getDimensions();
      this.lastFrame = BitmapUtils.createBlankBitmap(width, height);
      logger.info("E-paper display cleared");
    });
  }

  async sleep(): Promise<Result<void>> {
    if (!this.initialized) {
      return failure(DisplayError.notInitialized());
    }
    if (this.sleeping) {
      return success(undefined);
    }

    try {
      await this.driver.sleep();
      this.sleeping = true;
      logger.info("E-paper display is now sleeping");
      return success(undefined);
    } catch (error) {
      const err = toError(error);
      logger.error("Putting display to sleep failed:", err);
      return failure(DisplayError.updateFailed(err));
    }
  }

  async wake(): Promise<Result<void>> {
    if (!this.initialized) {
      return failure(DisplayError.notInitialized());
    }
    if (!this.sleeping) {
      return success(undefined);
    }

    try {
      await this.driver.wake();
      this.sleeping = false;
      logger.info("E-paper display is awake");
      return success(undefined);
    } catch (error) {
      const err = toError(error);
      logger.error("Waking display failed:", err);
      return failure(DisplayError.updateFailed(err));
    }
  }

  getStatus(): Result<EpaperStatus> {
    if (!this.initialized) {
      return failure(DisplayError.notInitialized());
    }
    const { width, height } = this.getDimensions();
    return success({
      initialized: this.initialized,
      busy: this.isBusy(),
      sleeping: this.sleeping,
      model: this.driver.name,
      width,
      height,
      lastUpdate: this.lastUpdate ?? undefined,
      fullRefreshCount: this.fullRefreshCount,
      partialRefreshCount: this.partialRefreshCount,
    });
  }

  isBusy(): boolean {
    return this.busy || (this.initialized && !this.driver.isReady());
  }

  getDimensions(): { width: number; height: number } {
    const { width, height } = this.driver.capabilities;
    if (this.rotation === 90 || this.rotation === 270) {
      return { width: height, height: width };
    }
    return { width, height };
  }

  getRotation(): PanelRotation {
    return this.rotation;
  }

  async getSnapshotPng(): Promise<Result<Buffer>> {
    if (!this.lastFrame) {
      return failure(DisplayError.nothingDisplayed());
    }
    const { width, height } = this.lastFrame;
    try {
      const png = await sharp(Buffer.from(BitmapUtils.toGreyscale(this.lastFrame)), {
        raw: { width, height, channels: 1 },
      })
        .png()
        .toBuffer();
      return success(png);
    } catch (error) {
      const err = toError(error);
      logger.error("Encoding snapshot failed:", err);
      return failure(DisplayError.invalidBitmap(err.message));
    }
  }

  async dispose(): Promise<void> {
    if (!this.initialized) {
      return;
    }

    try {
      await this.driver.dispose();
      this.adapter.dispose();
      logger.info("E-paper service disposed");
    } catch (error) {
      logger.error("Error disposing e-paper service:", error);
    } finally {
      this.initialized = false;
      this.busy = false;
    }
  }

  private checkFrameSize(bitmap: Bitmap1Bit): Result<void> {
    const { width, height } = this.getDimensions();
    if (bitmap.width !== width || bitmap.height !== height) {
      return failure(
        DisplayError.sizeMismatch(bitmap.width, bitmap.height, width, height),
      );
    }
    return success(undefined);
  }

  /**
   * Run one panel write with the state checks and busy bookkeeping every
   * write shares
   */
  private async write(operation: () => Promise<void>): Promise<Result<void>> {
    if (!this.initialized) {
      return failure(DisplayError.notInitialized());
    }
    if (this.sleeping) {
      return failure(DisplayError.sleeping());
    }
    if (this.busy) {
      return failure(DisplayError.displayBusy());
    }

    this.busy = true;
    try {
      if (!this.driver.isReady()) {
        logger.info("Panel busy, waiting for it to become ready");
        try {
          await this.driver.waitUntilReady(EPAPER_BUSY_TIMEOUT_MS);
        } catch {
          return failure(
            DisplayError.timeout("waitUntilReady", EPAPER_BUSY_TIMEOUT_MS),
          );
        }
      }
      await operation();
      this.lastUpdate = new Date();
      return success(undefined);
    } catch (error) {
      const err = toError(error);
      logger.error("Panel write failed:", err);
      return failure(DisplayError.updateFailed(err));
    } finally {
      this.busy = false;
    }
  }
}
