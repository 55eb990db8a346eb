import {
  IAnimationScheduler,
  IPetStateService,
  SpriteUpdateHandler,
} from "@core/interfaces";
import { AnimationState, PetMood } from "@core/types";
import { getLogger } from "@utils/logger";
import { SpriteLibrary } from "./SpriteLibrary";

const logger = getLogger("AnimationScheduler");

/**
 * Steps the pet sprite through the frame sequence of its current mood.
 *
 * Only moves the frame index; drawing is left to the sprite update handler,
 * which goes through the menu state machine's non-blocking guard.
 */
export class AnimationScheduler implements IAnimationScheduler {
  private state: AnimationState;
  private handler: SpriteUpdateHandler | null = null;
  private eligible: () => boolean = () => true;

  constructor(
    private readonly sprites: SpriteLibrary,
    private readonly pet: IPetStateService,
    private readonly intervalMs: number,
  ) {
    this.state = this.startSequence(PetMood.NEUTRAL, null);
  }

  syncMood(): void {
    this.state = this.startSequence(this.pet.getMood(), null);
  }

  setSpriteUpdateHandler(handler: SpriteUpdateHandler | null): void {
    this.handler = handler;
  }

  setEligibilityCheck(check: () => boolean): void {
    this.eligible = check;
  }

  async tick(now: number): Promise<boolean> {
    if (!this.eligible()) {
      return false;
    }
    const { lastFrameTime } = this.state;
    if (lastFrameTime !== null && now - lastFrameTime < this.intervalMs) {
      return false;
    }

    const mood = this.pet.getMood(new Date(now));
    if (mood !== this.state.mood) {
      logger.debug(`Mood changed ${this.state.mood} -> ${mood}`);
      this.state = this.startSequence(mood, now);
    } else {
      this.state = {
        ...this.state,
        frameIndex: (this.state.frameIndex + 1) % this.state.frameSequence.length,
        lastFrameTime: now,
      };
    }

    if (this.handler) {
      try {
        await this.handler();
      } catch (error) {
        logger.warn("Sprite update failed:", error);
      }
    }
    return true;
  }

  getCurrentFrame(): string {
    return this.state.frameSequence[this.state.frameIndex];
  }

  getMood(): PetMood {
    return this.state.mood;
  }

  getState(): Readonly<AnimationState> {
    return this.state;
  }

  private startSequence(
    mood: PetMood,
    lastFrameTime: number | null,
  ): AnimationState {
    return {
      mood,
      frameSequence: this.sprites.getSequence(mood),
      frameIndex: 0,
      lastFrameTime,
    };
  }
}
