import { IFrameBuffer } from "@core/interfaces";
import { DeviceStats, MenuId, PetSnapshot, Result } from "@core/types";
import { MENU_MESSAGE_MAX_CHARS } from "@core/constants";
import { truncateText } from "@utils/format";
import { BaseMenu, MenuContext } from "./BaseMenu";

const LINES_X = 10;
const LINES_Y = 30;
const LINE_STEP = 14;
const MOOD_STARS = 5;

export type StatsPage = "pet" | "device";

/**
 * Five-star happiness meter
 */
export function formatMoodStars(happiness: number): string {
  const filled = Math.max(0, Math.min(Math.floor(happiness / 2), MOOD_STARS));
  return "*".repeat(filled) + "-".repeat(MOOD_STARS - filled);
}

export function petStatLines(pet: PetSnapshot): string[] {
  const age = Math.floor(pet.ageHours);
  return [
    `Age: ${Math.floor(age / 24)}d ${age % 24}h`,
    `Fed: ${pet.totalFeeds} times`,
    `Msgs: ${pet.messagesSent} sent, ${pet.messagesReceived} rcv`,
    `Mood: ${formatMoodStars(pet.happiness)}`,
    `H:${pet.health} F:${10 - pet.hunger} M:${pet.happiness}`,
  ];
}

export function deviceStatLines(stats: DeviceStats): string[] {
  const lastError = stats.lastError
    ? truncateText(stats.lastError.message, MENU_MESSAGE_MAX_CHARS)
    : "none";
  return [
    `Uptime: ${Math.floor(stats.totalUptimeHours)}h`,
    `Buttons: ${stats.totalButtonPresses}`,
    `Updates: ${stats.totalDisplayUpdates}`,
    `Net errors: ${stats.networkErrors}`,
    `Last err: ${lastError}`,
  ];
}

/**
 * Pet and device counters on two pages; Go flips between them
 */
export class StatsMenu extends BaseMenu {
  readonly id = MenuId.STATS;
  readonly title = "Pet Stats";

  private page: StatsPage = "pet";

  constructor(context: MenuContext) {
    super(context, "StatsMenu");
  }

  getPage(): StatsPage {
    return this.page;
  }

  async onActivate(): Promise<Result<void>> {
    this.page = this.page === "pet" ? "device" : "pet";
    return this.render(false);
  }

  protected draw(frameBuffer: IFrameBuffer): void {
    const lines =
      this.page === "pet"
        ? petStatLines(this.context.pet.getSnapshot(this.now()))
        : deviceStatLines(this.context.stats.getStats());

    this.drawHeader(
      frameBuffer,
      this.page === "pet" ? this.title : "Device Stats",
    );
    lines.forEach((line, i) => {
      frameBuffer.drawText(line, LINES_X, LINES_Y + i * LINE_STEP);
    });
    this.drawHints(frameBuffer, ["[Back]", "[Next]", "[>]"]);
  }
}
