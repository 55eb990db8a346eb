import {
  IEpaperDriver,
  PanelCapabilities,
} from "@core/interfaces/IEpaperDriver";
import { IHardwareAdapter } from "@core/interfaces/IHardwareAdapter";
import { Rectangle } from "@core/types";
import { getLogger, Logger } from "@utils/logger";

/**
 * Shared plumbing for e-paper drivers: adapter ownership, busy polling,
 * sleep state and buffer validation.
 *
 * Subclasses provide the controller specific parts:
 * - initDisplay(): command sequence run after every hardware reset
 * - display() / displayPartial() / clear()
 * - sleep(), which must call setSleeping(true)
 */
export abstract class BaseEpaperDriver implements IEpaperDriver {
  abstract readonly name: string;
  abstract readonly capabilities: PanelCapabilities;

  protected adapter: IHardwareAdapter | null = null;
  protected logger: Logger = getLogger("EpaperDriver");
  private sleeping = false;

  async init(adapter: IHardwareAdapter): Promise<void> {
    this.logger = getLogger(this.name);
    const { width, height, colorDepth } = this.capabilities;
    this.logger.info(`Initializing ${this.name} (${width}x${height}, ${colorDepth})`);

    this.adapter = adapter;
    await adapter.reset();
    await this.waitForReady();
    await this.initDisplay();
    this.sleeping = false;

    this.logger.info(`${this.name} ready`);
  }

  protected abstract initDisplay(): Promise<void>;

  abstract display(buffer: Buffer): Promise<void>;

  abstract displayPartial(buffer: Buffer, window: Rectangle): Promise<void>;

  abstract clear(): Promise<void>;

  abstract sleep(): Promise<void>;

  /**
   * The controller loses its configuration in deep sleep, so waking is a
   * reset followed by the init sequence
   */
  async wake(): Promise<void> {
    if (!this.sleeping) {
      return;
    }
    const adapter = this.requireAdapter();
    this.logger.info("Waking display");
    await adapter.reset();
    await this.waitForReady();
    await this.initDisplay();
    this.sleeping = false;
  }

  isSleeping(): boolean {
    return this.sleeping;
  }

  isReady(): boolean {
    if (!this.adapter) return false;
    return !this.adapter.gpioRead(this.adapter.getPins().busy);
  }

  async waitUntilReady(timeoutMs: number): Promise<void> {
    const startTime = Date.now();
    while (!this.isReady()) {
      if (Date.now() - startTime > timeoutMs) {
        this.logger.warn(`Busy pin still high after ${timeoutMs}ms`);
        throw new Error(`Display busy timeout after ${timeoutMs}ms`);
      }
      await this.delay(5);
    }
  }

  async dispose(): Promise<void> {
    if (this.adapter && !this.sleeping) {
      await this.sleep();
    }
    this.adapter = null;
    this.logger.info(`${this.name} disposed`);
  }

  // --- helpers for subclasses ---

  /**
   * Busy wait bounded by one full refresh plus a second
   */
  protected async waitForReady(): Promise<void> {
    await this.waitUntilReady(this.capabilities.refreshTimeFullMs + 1000);
  }

  protected setSleeping(value: boolean): void {
    this.sleeping = value;
  }

  protected requireAdapter(): IHardwareAdapter {
    if (!this.adapter) {
      throw new Error(`${this.name}: adapter not initialized`);
    }
    return this.adapter;
  }

  protected sendCommand(command: number, ...data: number[]): void {
    const adapter = this.requireAdapter();
    adapter.sendCommand(command);
    for (const byte of data) {
      adapter.sendData(byte);
    }
  }

  protected sendData(data: number | Buffer): void {
    this.requireAdapter().sendData(data);
  }

  protected delay(ms: number): Promise<void> {
    if (this.adapter) {
      return this.adapter.delay(ms);
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  protected get bytesPerRow(): number {
    return Math.ceil(this.capabilities.width / 8);
  }

  /**
   * Size of a full native frame in bytes
   */
  protected get frameSize(): number {
    return this.bytesPerRow * this.capabilities.height;
  }

  protected assertFrameSize(buffer: Buffer): void {
    if (buffer.length !== this.frameSize) {
      throw new Error(
        `Invalid buffer size: expected ${this.frameSize}, got ${buffer.length}`,
      );
    }
  }

  /**
   * A partial window must be byte aligned on x, inside the panel, and
   * matched by a buffer of exactly its size
   */
  protected assertWindow(buffer: Buffer, window: Rectangle): void {
    const { width, height } = this.capabilities;
    if (window.x % 8 !== 0) {
      throw new Error(`Window x ${window.x} is not byte aligned`);
    }
    if (
      window.x < 0 ||
      window.y < 0 ||
      window.width <= 0 ||
      window.height <= 0 ||
      window.x + window.width > this.bytesPerRow * 8 ||
      window.y + window.height > height
    ) {
      throw new Error(
        `Window ${window.width}x${window.height}@${window.x},${window.y} is outside ${width}x${height}`,
      );
    }
    const expected = Math.ceil(window.width / 8) * window.height;
    if (buffer.length !== expected) {
      throw new Error(
        `Invalid window buffer size: expected ${expected}, got ${buffer.length}`,
      );
    }
  }
}
