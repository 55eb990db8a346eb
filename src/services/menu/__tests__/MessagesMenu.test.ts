import { MessagesMenu, formatMessageLine } from "../MessagesMenu";
import { FrameBuffer } from "@services/framebuffer/FrameBuffer";
import { StoredMessage, failure } from "@core/types";
import {
  createMockCompanion,
  createMockCoordinator,
  createMockMessageLog,
  createMockPetState,
  createMockSettings,
  createMockStats,
} from "../../../__tests__/helpers/mockServices";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const message = (
  id: number,
  text: string,
  read = false,
): StoredMessage => ({
  id,
  from: "remote",
  message: text,
  type: "text",
  timestamp: "2026-01-05T18:00:00.000Z",
  read,
});

describe("MessagesMenu", () => {
  let frameBuffer: FrameBuffer;
  let coordinator: ReturnType<typeof createMockCoordinator>;
  let messages: ReturnType<typeof createMockMessageLog>;
  let menu: MessagesMenu;

  beforeEach(() => {
    frameBuffer = new FrameBuffer();
    coordinator = createMockCoordinator(frameBuffer);
    messages = createMockMessageLog();
    menu = new MessagesMenu({
      coordinator,
      pet: createMockPetState(),
      messages,
      settings: createMockSettings(),
      stats: createMockStats(),
      companion: createMockCompanion(),
      deviceName: "test_clock",
      now: () => new Date(2026, 0, 5, 19, 5),
    });
  });

  describe("formatMessageLine", () => {
    it("should mark the selected line", () => {
      expect(formatMessageLine(message(1, "hello there"), true)).toBe(
        "> hello there -remote",
      );
      expect(formatMessageLine(message(1, "hello there"), false)).toBe(
        "  hello there -remote",
      );
    });

    it("should shorten long messages", () => {
      expect(
        formatMessageLine(message(1, "abcdefghijklmnopqrstuvwxyz"), false),
      ).toBe("  abcdefghijklmnopq... -remote");
    });
  });

  describe("render", () => {
    it("should say so when there are no messages", async () => {
      const drawText = jest.spyOn(frameBuffer, "drawText");
      const drawTextCentered = jest.spyOn(frameBuffer, "drawTextCentered");

      await menu.render(true);

      expect(drawText).toHaveBeenCalledWith("Messages (0)", 5, 4, { scale: 2 });
      expect(drawText).toHaveBeenCalledWith("19:05", 180, 5, { scale: 1 });
      expect(drawTextCentered).toHaveBeenCalledWith(
        "No messages",
        { x: 0, y: 50, width: 250, height: 16 },
        { scale: 2 },
      );
      expect(drawText).toHaveBeenCalledWith("[Read]", 80, 110);
    });

    it("should list messages with the unread count in the header", async () => {
      messages.getMessages.mockReturnValue([
        message(2, "see you soon"),
        message(1, "hello there", true),
      ]);
      messages.getUnreadCount.mockReturnValue(1);
      const drawText = jest.spyOn(frameBuffer, "drawText");

      await menu.render(true);

      expect(messages.getMessages).toHaveBeenCalledWith({ limit: 5 });
      // too wide for the medium font next to the clock
      expect(drawText).toHaveBeenCalledWith("Messages (2) - 1 new", 5, 4, {
        scale: 1,
      });
      expect(drawText).toHaveBeenCalledWith("> see you soon -remote", 5, 28);
      expect(drawText).toHaveBeenCalledWith("  hello there -remote", 5, 44);
    });

    it("should show at most three messages", async () => {
      messages.getMessages.mockReturnValue([
        message(5, "five"),
        message(4, "four"),
        message(3, "three"),
        message(2, "two"),
      ]);
      const drawText = jest.spyOn(frameBuffer, "drawText");

      await menu.render(true);

      expect(drawText).toHaveBeenCalledWith("  three -remote", 5, 60);
      expect(drawText).not.toHaveBeenCalledWith("  two -remote", 5, 76);
    });
  });

  describe("onActivate", () => {
    it("should move the cursor, mark all read and redraw", async () => {
      messages.getMessages.mockReturnValue([
        message(2, "see you soon"),
        message(1, "hello there"),
      ]);

      await menu.onActivate();
      expect(menu.getSelectedIndex()).toBe(1);
      expect(messages.markAllRead).toHaveBeenCalledTimes(1);
      expect(coordinator.commit).toHaveBeenCalledWith(true);

      await menu.onActivate();
      expect(menu.getSelectedIndex()).toBe(0);
    });

    it("should do nothing without messages", async () => {
      const result = await menu.onActivate();

      expect(result.success).toBe(true);
      expect(messages.markAllRead).not.toHaveBeenCalled();
      expect(coordinator.commit).not.toHaveBeenCalled();
    });

    it("should fail when marking read fails", async () => {
      messages.getMessages.mockReturnValue([message(1, "hello there")]);
      messages.markAllRead.mockResolvedValueOnce(failure(new Error("disk full")));

      const result = await menu.onActivate();

      expect(result.success).toBe(false);
      expect(coordinator.commit).not.toHaveBeenCalled();
    });

    it("should reset the cursor when the list shrinks", async () => {
      messages.getMessages.mockReturnValue([
        message(2, "see you soon"),
        message(1, "hello there"),
      ]);
      await menu.onActivate();
      messages.getMessages.mockReturnValue([message(3, "new one")]);
      const drawText = jest.spyOn(frameBuffer, "drawText");

      await menu.render(false);

      expect(drawText).toHaveBeenCalledWith("> new one -remote", 5, 28);
      expect(menu.getSelectedIndex()).toBe(0);
    });
  });
});
