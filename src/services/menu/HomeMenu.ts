import { IAnimationScheduler, IFrameBuffer, IHomeMenu } from "@core/interfaces";
import {
  MenuId,
  PetMood,
  PetSnapshot,
  Rectangle,
  Result,
  failure,
  success,
} from "@core/types";
import {
  FONT_GIANT,
  FONT_MEDIUM,
  FONT_SMALL,
  HOME_DATE_RECT,
  HOME_ERROR_INDICATOR,
  HOME_MOOD_RECT,
  HOME_SEPARATOR_Y,
  HOME_SPRITE_RECT,
  HOME_STATS_HEALTH_X,
  HOME_STATS_HUNGER_X,
  HOME_STATS_MESSAGES_X,
  HOME_STATS_MOOD_X,
  HOME_STATS_Y,
  HOME_TIME_RECT,
  SCREEN_WIDTH,
} from "@core/constants";
import { SpriteLibrary } from "@services/animation/SpriteLibrary";
import { formatClockParts, formatShortDate } from "@utils/format";
import { BaseMenu, MenuContext } from "./BaseMenu";

const MOOD_ICONS: Partial<Record<PetMood, string>> = {
  [PetMood.HAPPY]: ":)",
  [PetMood.NEUTRAL]: ":|",
  [PetMood.SAD]: ":(",
  [PetMood.HUNGRY]: ":P",
  [PetMood.SICK]: ":X",
};

/** Gap between the clock digits and the AM/PM marker */
const CLOCK_SUFFIX_GAP = 4;

/**
 * Health as up to three hearts, one per 3 points
 */
export function formatHealth(health: number): string {
  const hearts = Math.min(Math.floor(health / 3), 3);
  return hearts > 0 ? "<3".repeat(hearts) : "HP:0";
}

/**
 * Hunger as up to three stars, one per 3 points
 */
export function formatHunger(hunger: number): string {
  const stars = Math.max(0, Math.min(Math.floor(hunger / 3), 3));
  return stars > 0 ? "*".repeat(stars) : "FED";
}

export function moodIcon(mood: PetMood): string {
  return MOOD_ICONS[mood] ?? ":|";
}

/**
 * Clock, date, pet sprite and a one-line status bar.
 *
 * The clock and the sprite have fixed rectangles so the periodic updaters
 * can repaint them alone with a partial refresh.
 */
export class HomeMenu extends BaseMenu implements IHomeMenu {
  readonly id = MenuId.HOME;
  readonly title = "Home";

  private lastDrawnDate: string | null = null;

  constructor(
    context: MenuContext,
    private readonly animation: IAnimationScheduler,
    private readonly sprites: SpriteLibrary,
  ) {
    super(context, "HomeMenu");
  }

  /**
   * Feed the pet
   */
  async onBack(): Promise<Result<void>> {
    const fed = await this.context.pet.feed();
    if (!fed.success) {
      return failure(fed.error);
    }
    this.logger.info(`Fed ${fed.data.name}, hunger now ${fed.data.hunger}`);
    return this.render(false);
  }

  /**
   * Poke the companion device. The client records a failed poke in the
   * stats; it is not a render failure.
   */
  async onActivate(): Promise<Result<void>> {
    const poke = await this.context.companion.sendPoke();
    if (poke.success) {
      await this.context.pet.messageSent();
      await this.context.stats.increment("totalMessagesSent");
      this.logger.info("Poke sent");
    } else {
      this.logger.warn(`Poke failed: ${poke.error.message}`);
    }
    return this.render(false);
  }

  async updateClockField(): Promise<Result<void>> {
    if (!this.coordinator.isBaseImageEstablished()) {
      return this.render(true);
    }
    if (formatShortDate(this.now()) !== this.lastDrawnDate) {
      return this.render(false);
    }

    const result = await this.coordinator.updateField(
      HOME_TIME_RECT,
      (frameBuffer, rect) => this.drawClock(frameBuffer, rect),
    );
    return result.success ? success(undefined) : failure(result.error);
  }

  async updateSpriteField(): Promise<Result<void>> {
    if (!this.coordinator.isBaseImageEstablished()) {
      return this.render(true);
    }

    const result = await this.coordinator.updateField(
      HOME_SPRITE_RECT,
      (frameBuffer, rect) => this.drawSprite(frameBuffer, rect),
    );
    return result.success ? success(undefined) : failure(result.error);
  }

  protected draw(frameBuffer: IFrameBuffer): void {
    const pet = this.context.pet.getSnapshot(this.now());
    const date = formatShortDate(this.now());

    frameBuffer.drawText(date, HOME_DATE_RECT.x, HOME_DATE_RECT.y, {
      scale: FONT_MEDIUM,
    });
    this.lastDrawnDate = date;

    this.drawClock(frameBuffer, HOME_TIME_RECT);
    frameBuffer.drawText(
      `${pet.name} is ${pet.mood}`,
      HOME_MOOD_RECT.x,
      HOME_MOOD_RECT.y,
      { scale: FONT_SMALL },
    );
    this.drawSprite(frameBuffer, HOME_SPRITE_RECT);

    if (this.context.stats.getStats().lastError) {
      frameBuffer.drawText(
        "!",
        HOME_ERROR_INDICATOR.x,
        HOME_ERROR_INDICATOR.y,
        { scale: FONT_MEDIUM },
      );
    }

    frameBuffer.drawHorizontalLine(HOME_SEPARATOR_Y, 0, SCREEN_WIDTH - 1);
    this.drawStatusBar(frameBuffer, pet);
    this.drawHints(frameBuffer, ["[Feed]", "[Msg]", "[>]"], 90);
  }

  private drawClock(frameBuffer: IFrameBuffer, rect: Rectangle): void {
    const { digits, suffix } = formatClockParts(
      this.now(),
      this.context.settings.get("timeFormat"),
    );
    const width = frameBuffer.drawText(digits, rect.x, rect.y, {
      scale: FONT_GIANT,
    });

    if (suffix) {
      const digitsHeight = frameBuffer.measureText(digits, FONT_GIANT).height;
      const suffixHeight = frameBuffer.measureText(suffix, FONT_SMALL).height;
      frameBuffer.drawText(
        suffix,
        rect.x + width + CLOCK_SUFFIX_GAP,
        rect.y + digitsHeight - suffixHeight,
        { scale: FONT_SMALL },
      );
    }
  }

  private drawSprite(frameBuffer: IFrameBuffer, rect: Rectangle): void {
    const frame = this.sprites.renderFrame(this.animation.getCurrentFrame());
    frameBuffer.drawBitmap(frame, rect.x, rect.y, true);
  }

  private drawStatusBar(frameBuffer: IFrameBuffer, pet: PetSnapshot): void {
    frameBuffer.drawText(formatHealth(pet.health), HOME_STATS_HEALTH_X, HOME_STATS_Y);
    frameBuffer.drawText(formatHunger(pet.hunger), HOME_STATS_HUNGER_X, HOME_STATS_Y);
    frameBuffer.drawText(moodIcon(pet.mood), HOME_STATS_MOOD_X, HOME_STATS_Y);

    const unread = this.context.messages.getUnreadCount();
    if (unread > 0) {
      frameBuffer.drawText(`MSG:${unread}`, HOME_STATS_MESSAGES_X, HOME_STATS_Y);
    }
  }
}
