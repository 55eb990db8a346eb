import readline from "readline";
import { ButtonEdgeListener, IButtonInput } from "@core/interfaces";
import { ButtonName } from "@core/types";
import { getLogger } from "@utils/logger";

const logger = getLogger("KeyboardButtonInput");

/** How long a key tap keeps its button down */
const TAP_MS = 50;

const KEY_BUTTONS: Record<string, ButtonName> = {
  r: "return",
  a: "action",
  g: "go",
};

/**
 * Readable that may be a TTY, like process.stdin
 */
export type KeyStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

type Key = { name?: string; ctrl?: boolean };

/**
 * Development input: r, a and g tap the return, action and go buttons,
 * h holds the action button long enough to count as a hold.
 */
export class KeyboardButtonInput implements IButtonInput {
  readonly name = "keyboard";

  private listener: ButtonEdgeListener | null = null;
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly onKeypress = (_text: string | undefined, key?: Key) =>
    this.handleKey(key);

  constructor(
    private readonly holdMs: number,
    private readonly stream: KeyStream = process.stdin,
  ) {}

  start(listener: ButtonEdgeListener): void {
    this.listener = listener;
    readline.emitKeypressEvents(this.stream);
    if (this.stream.isTTY && this.stream.setRawMode) {
      this.stream.setRawMode(true);
    }
    this.stream.on("keypress", this.onKeypress);
    this.stream.resume();
    logger.info("Keys: r=return a=action g=go h=hold action, ctrl-c quits");
  }

  stop(): void {
    this.stream.removeListener("keypress", this.onKeypress);
    if (this.stream.isTTY && this.stream.setRawMode) {
      this.stream.setRawMode(false);
    }
    this.stream.pause();
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.listener = null;
  }

  private handleKey(key?: Key): void {
    if (!key?.name) {
      return;
    }
    // Raw mode swallows ctrl-c, so hand it back to the signal handlers
    if (key.ctrl && key.name === "c") {
      process.kill(process.pid, "SIGINT");
      return;
    }
    if (key.name === "h") {
      this.tap("action", this.holdMs + TAP_MS);
      return;
    }
    const button = KEY_BUTTONS[key.name];
    if (button) {
      this.tap(button, TAP_MS);
    }
  }

  private tap(button: ButtonName, downMs: number): void {
    const listener = this.listener;
    if (!listener) {
      return;
    }
    listener(button, true);
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      listener(button, false);
    }, downMs);
    this.timers.add(timer);
  }
}
