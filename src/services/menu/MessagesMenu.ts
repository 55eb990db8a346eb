import { IFrameBuffer } from "@core/interfaces";
import { MenuId, Result, StoredMessage, failure, success } from "@core/types";
import {
  FONT_MEDIUM,
  MENU_CONTENT_X,
  MENU_CONTENT_Y,
  MENU_MESSAGE_MAX_CHARS,
  MENU_VISIBLE_MESSAGES,
  SCREEN_WIDTH,
} from "@core/constants";
import { truncateText } from "@utils/format";
import { BaseMenu, MenuContext } from "./BaseMenu";

/** Messages fetched for the header count */
const MESSAGE_FETCH_LIMIT = 5;
const MESSAGE_LINE_HEIGHT = 16;
const EMPTY_TEXT_Y = 50;

/**
 * One list line: cursor, text and sender
 */
export function formatMessageLine(
  message: StoredMessage,
  selected: boolean,
): string {
  const prefix = selected ? ">" : " ";
  return `${prefix} ${truncateText(message.message, MENU_MESSAGE_MAX_CHARS)} -${message.from}`;
}

/**
 * The latest messages from the companion device.
 *
 * Go moves the cursor over the visible messages and marks everything read.
 */
export class MessagesMenu extends BaseMenu {
  readonly id = MenuId.MESSAGES;
  readonly title = "Messages";

  private selectedIndex = 0;

  constructor(context: MenuContext) {
    super(context, "MessagesMenu");
  }

  getSelectedIndex(): number {
    return this.selectedIndex;
  }

  async onActivate(): Promise<Result<void>> {
    const messages = this.fetch();
    if (messages.length === 0) {
      return success(undefined);
    }

    const visible = Math.min(messages.length, MENU_VISIBLE_MESSAGES);
    this.selectedIndex = (this.selectedIndex + 1) % visible;

    const marked = await this.context.messages.markAllRead();
    if (!marked.success) {
      return failure(marked.error);
    }
    return this.render(false);
  }

  protected draw(frameBuffer: IFrameBuffer): void {
    const messages = this.fetch();
    const unread = this.context.messages.getUnreadCount();

    let header = `${this.title} (${messages.length})`;
    if (unread > 0) {
      header += ` - ${unread} new`;
    }
    this.drawHeader(frameBuffer, header);

    if (messages.length === 0) {
      frameBuffer.drawTextCentered(
        "No messages",
        { x: 0, y: EMPTY_TEXT_Y, width: SCREEN_WIDTH, height: 16 },
        { scale: FONT_MEDIUM },
      );
    } else {
      const visible = messages.slice(0, MENU_VISIBLE_MESSAGES);
      if (this.selectedIndex >= visible.length) {
        this.selectedIndex = 0;
      }
      visible.forEach((message, i) => {
        frameBuffer.drawText(
          formatMessageLine(message, i === this.selectedIndex),
          MENU_CONTENT_X,
          MENU_CONTENT_Y + i * MESSAGE_LINE_HEIGHT,
        );
      });
    }

    this.drawHints(frameBuffer, ["[Back]", "[Read]", "[>]"]);
  }

  private fetch(): StoredMessage[] {
    return this.context.messages.getMessages({ limit: MESSAGE_FETCH_LIMIT });
  }
}
