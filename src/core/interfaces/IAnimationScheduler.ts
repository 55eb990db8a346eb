import { AnimationState, PetMood } from "@core/types";

/**
 * Called after the frame index moved
 */
export type SpriteUpdateHandler = () => Promise<void>;

/**
 * Steps the pet animation for the current mood.
 *
 * A mood change swaps the frame sequence and restarts it at frame 0;
 * otherwise each tick advances one frame, wrapping around.
 */
export interface IAnimationScheduler {
  /**
   * Advance one frame if the tick is eligible and at least the animation
   * interval passed since the last advance, then run the sprite update
   * handler.
   * @returns true when a frame was advanced
   */
  tick(now: number): Promise<boolean>;

  /**
   * Restart on frame 0 of the pet's current mood. The scheduler starts on the
   * neutral sequence until this runs, since pet state loads after wiring.
   */
  syncMood(): void;

  setSpriteUpdateHandler(handler: SpriteUpdateHandler | null): void;

  /**
   * Ticks are skipped while this returns false (Home not active, or a
   * transition running)
   */
  setEligibilityCheck(check: () => boolean): void;

  /**
   * Frame identifier for the current mood and index
   */
  getCurrentFrame(): string;

  getMood(): PetMood;

  getState(): Readonly<AnimationState>;
}
