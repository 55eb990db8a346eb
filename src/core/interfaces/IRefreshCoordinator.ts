import { CommitResult, Rectangle, RefreshState, Result } from "@core/types";
import { IFrameBuffer } from "./IFrameBuffer";

/**
 * Redraws the content of one field after it has been cleared
 */
export type FieldDrawFn = (frameBuffer: IFrameBuffer, rect: Rectangle) => void;

/**
 * Owns the framebuffer and decides between full and partial panel refreshes.
 *
 * A partial refresh only makes sense against a base image that the panel
 * already holds, and partial refreshes leave ghosting behind, so a request
 * for one is upgraded to a full refresh when there is no base image, or
 * when too many partial refreshes or too much time have passed since the
 * last full refresh.
 */
export interface IRefreshCoordinator {
  getFrameBuffer(): IFrameBuffer;

  /**
   * Push the framebuffer to the panel.
   * @param requestPartial caller's preference; may be upgraded to full
   * @param region dirty region for a partial commit, whole screen if omitted
   * @returns the mode actually used, or a DisplayError. A failure also drops
   * the base image so the next commit is full.
   */
  commit(
    requestPartial: boolean,
    region?: Rectangle,
  ): Promise<Result<CommitResult>>;

  /**
   * Clear `rect`, let `draw` repaint it, and commit that rectangle partially
   */
  updateField(rect: Rectangle, draw: FieldDrawFn): Promise<Result<CommitResult>>;

  /**
   * Forget the base image so the next commit is full
   */
  invalidateBaseImage(): void;

  isBaseImageEstablished(): boolean;

  getRefreshState(): RefreshState;

  /**
   * Successful commits since the previous call, for the usage counters
   */
  takeCommitCount(): number;
}
