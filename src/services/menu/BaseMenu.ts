import {
  ICompanionClient,
  IFrameBuffer,
  IMenu,
  IMessageLogService,
  IPetStateService,
  IRefreshCoordinator,
  ISettingsService,
  IStatsService,
} from "@core/interfaces";
import { MenuId, Result, failure, success } from "@core/types";
import { MenuError } from "@core/errors";
import {
  FONT_MEDIUM,
  FONT_SMALL,
  MENU_HINTS_Y,
  MENU_TITLE_POS,
  MENU_TITLE_SEPARATOR_Y,
  SCREEN_WIDTH,
} from "@core/constants";
import { Logger, getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { formatClock } from "@utils/format";

/**
 * Everything a menu reads from or writes to
 */
export interface MenuContext {
  coordinator: IRefreshCoordinator;
  pet: IPetStateService;
  messages: IMessageLogService;
  settings: ISettingsService;
  stats: IStatsService;
  companion: ICompanionClient;
  deviceName: string;
  /** Wall clock, replaceable in tests */
  now?: () => Date;
}

/** Small clock at the right of a menu header */
const HEADER_CLOCK_X = 180;
const HEADER_CLOCK_Y = 5;
/** Widest title that still leaves room for the header clock */
const HEADER_TITLE_MAX_WIDTH = HEADER_CLOCK_X - MENU_TITLE_POS.x - 5;

export const HINT_LEFT_X = 5;
export const HINT_MIDDLE_X = 80;
export const HINT_RIGHT_X = 210;

/**
 * Shared drawing and commit logic for the four screens.
 *
 * A render clears the framebuffer, lets the subclass draw the whole screen
 * and commits it. Anything thrown while drawing becomes a failed Result so
 * the state machine can count it.
 */
export abstract class BaseMenu implements IMenu {
  abstract readonly id: MenuId;
  abstract readonly title: string;

  protected readonly logger: Logger;
  protected readonly coordinator: IRefreshCoordinator;
  private readonly clock: () => Date;

  constructor(
    protected readonly context: MenuContext,
    loggerName: string,
  ) {
    this.coordinator = context.coordinator;
    this.clock = context.now ?? (() => new Date());
    this.logger = getLogger(loggerName);
  }

  async render(full: boolean): Promise<Result<void>> {
    const frameBuffer = this.coordinator.getFrameBuffer();

    try {
      frameBuffer.clear();
      this.draw(frameBuffer);
    } catch (error) {
      return failure(MenuError.renderFailed(this.id, toError(error)));
    }

    const result = await this.coordinator.commit(!full);
    if (!result.success) {
      return failure(result.error);
    }

    this.logger.debug(
      `${this.id} rendered (${result.data.mode}, ${result.data.reason})`,
    );
    return success(undefined);
  }

  async onBack(): Promise<Result<void>> {
    return success(undefined);
  }

  abstract onActivate(): Promise<Result<void>>;

  /**
   * Draw the whole screen onto a cleared framebuffer
   */
  protected abstract draw(frameBuffer: IFrameBuffer): void;

  protected now(): Date {
    return this.clock();
  }

  protected formatTime(date: Date = this.now()): string {
    return formatClock(date, this.context.settings.get("timeFormat"));
  }

  /**
   * Title, small clock and separator line
   */
  protected drawHeader(frameBuffer: IFrameBuffer, title: string): void {
    const scale =
      frameBuffer.measureText(title, FONT_MEDIUM).width <= HEADER_TITLE_MAX_WIDTH
        ? FONT_MEDIUM
        : FONT_SMALL;
    frameBuffer.drawText(title, MENU_TITLE_POS.x, MENU_TITLE_POS.y, { scale });
    frameBuffer.drawText(this.formatTime(), HEADER_CLOCK_X, HEADER_CLOCK_Y, {
      scale: FONT_SMALL,
    });
    frameBuffer.drawHorizontalLine(
      MENU_TITLE_SEPARATOR_Y,
      MENU_TITLE_POS.x,
      SCREEN_WIDTH - 5,
    );
  }

  /**
   * Button hints along the bottom edge, in Return, Go, Action order
   */
  protected drawHints(
    frameBuffer: IFrameBuffer,
    hints: [string, string, string],
    middleX: number = HINT_MIDDLE_X,
  ): void {
    const [left, middle, right] = hints;
    frameBuffer.drawText(left, HINT_LEFT_X, MENU_HINTS_Y);
    frameBuffer.drawText(middle, middleX, MENU_HINTS_Y);
    frameBuffer.drawText(right, HINT_RIGHT_X, MENU_HINTS_Y);
  }
}
