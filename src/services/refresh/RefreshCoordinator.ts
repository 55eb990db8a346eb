import {
  FieldDrawFn,
  IEpaperService,
  IFrameBuffer,
  IRefreshCoordinator,
} from "@core/interfaces";
import {
  CommitReason,
  CommitResult,
  DisplayUpdateMode,
  Rectangle,
  RefreshConfig,
  RefreshState,
  Result,
  failure,
  success,
} from "@core/types";
import { DisplayError } from "@core/errors";
import { FrameBuffer } from "@services/framebuffer/FrameBuffer";
import { BitmapUtils } from "@services/framebuffer/BitmapUtils";
import { getLogger } from "@utils/logger";

const logger = getLogger("RefreshCoordinator");

/**
 * Owns the framebuffer and the ghost-suppression bookkeeping.
 *
 * Callers draw into the framebuffer and ask for a commit; the coordinator
 * decides whether the panel gets a full or a partial refresh. Not
 * synchronized: the MenuStateMachine's render guard serializes every caller.
 */
export class RefreshCoordinator implements IRefreshCoordinator {
  private readonly frameBuffer: FrameBuffer;
  private baseImageEstablished = false;
  private cyclesSinceFull = 0;
  private lastFullTime: number | null = null;
  private commitsSinceTaken = 0;

  constructor(
    private readonly epaper: IEpaperService,
    private readonly config: RefreshConfig,
    private readonly clock: () => number = Date.now,
  ) {
    const { width, height } = epaper.getDimensions();
    this.frameBuffer = new FrameBuffer(width, height);
  }

  getFrameBuffer(): IFrameBuffer {
    return this.frameBuffer;
  }

  async commit(
    requestPartial: boolean,
    region?: Rectangle,
  ): Promise<Result<CommitResult>> {
    const bounds = this.frameBuffer.bounds;
    const now = this.clock();
    const reason = this.decide(now);
    const full = reason !== "requested" || !requestPartial;

    let target = bounds;
    if (!full && region) {
      const clipped = BitmapUtils.clipRect(region, bounds.width, bounds.height);
      if (!clipped) {
        return failure(
          DisplayError.regionOutOfBounds(region, bounds.width, bounds.height),
        );
      }
      target = clipped;
    }

    const bitmap = this.frameBuffer.getBitmap();
    const coversScreen =
      target.width === bounds.width && target.height === bounds.height;
    let result: Result<void>;
    if (full) {
      result = await this.epaper.displayBitmap(bitmap, DisplayUpdateMode.FULL);
    } else if (coversScreen) {
      result = await this.epaper.displayBitmap(bitmap, DisplayUpdateMode.PARTIAL);
    } else {
      result = await this.epaper.displayRegion(bitmap, target);
    }

    if (!result.success) {
      this.baseImageEstablished = false;
      logger.warn(
        `${full ? "Full" : "Partial"} commit failed, base image dropped: ${result.error.message}`,
      );
      return failure(
        result.error instanceof DisplayError
          ? result.error
          : DisplayError.updateFailed(result.error),
      );
    }

    if (full) {
      this.baseImageEstablished = true;
      this.cyclesSinceFull = 0;
      this.lastFullTime = now;
    } else {
      this.cyclesSinceFull++;
    }
    this.commitsSinceTaken++;

    const forced = requestPartial && full;
    if (forced) {
      logger.info(`Partial commit upgraded to full (${reason})`);
    }
    return success({
      mode: full ? DisplayUpdateMode.FULL : DisplayUpdateMode.PARTIAL,
      forced,
      reason,
      region: target,
      cyclesSinceFull: this.cyclesSinceFull,
    });
  }

  async updateField(
    rect: Rectangle,
    draw: FieldDrawFn,
  ): Promise<Result<CommitResult>> {
    this.frameBuffer.clearRect(rect);
    draw(this.frameBuffer, rect);
    return this.commit(true, rect);
  }

  invalidateBaseImage(): void {
    if (this.baseImageEstablished) {
      logger.debug("Base image invalidated");
    }
    this.baseImageEstablished = false;
  }

  isBaseImageEstablished(): boolean {
    return this.baseImageEstablished;
  }

  getRefreshState(): RefreshState {
    return {
      baseImageEstablished: this.baseImageEstablished,
      cyclesSinceFull: this.cyclesSinceFull,
      timeSinceFull:
        this.lastFullTime === null ? 0 : this.clock() - this.lastFullTime,
    };
  }

  takeCommitCount(): number {
    const count = this.commitsSinceTaken;
    this.commitsSinceTaken = 0;
    return count;
  }

  /**
   * Why the next commit gets the mode it gets. Anything but "requested"
   * forces a full refresh.
   */
  private decide(now: number): CommitReason {
    if (!this.baseImageEstablished) {
      return "no-base-image";
    }
    if (this.cyclesSinceFull >= this.config.fullRefreshCycleLimit) {
      return "cycle-limit";
    }
    if (
      this.lastFullTime !== null &&
      now - this.lastFullTime >= this.config.fullRefreshTimeLimitMs
    ) {
      return "time-limit";
    }
    return "requested";
  }
}
