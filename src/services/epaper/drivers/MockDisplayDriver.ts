import { PanelCapabilities } from "@core/interfaces/IEpaperDriver";
import { DisplayType, Rectangle } from "@core/types";
import { BaseEpaperDriver } from "./BaseEpaperDriver";

export interface MockDisplayOptions {
  refreshTimeFullMs?: number;
  refreshTimePartialMs?: number;
}

/**
 * Panel simulator for development and tests.
 *
 * Keeps what a real panel would be showing, applying partial windows on top
 * of the last full frame, and counts refreshes.
 */
export class MockDisplayDriver extends BaseEpaperDriver {
  readonly name = "mock_display";
  readonly capabilities: PanelCapabilities;

  private screen: Buffer | null = null;
  private partialWindows: Rectangle[] = [];
  private fullRefreshes = 0;
  private failNext: Error | null = null;

  constructor(
    width: number = 122,
    height: number = 250,
    options: MockDisplayOptions = {},
  ) {
    super();
    this.capabilities = {
      width,
      height,
      colorDepth: "1bit",
      displayType: DisplayType.MOCK,
      supportsPartialRefresh: true,
      refreshTimeFullMs: options.refreshTimeFullMs ?? 2000,
      refreshTimePartialMs: options.refreshTimePartialMs ?? 300,
    };
  }

  protected async initDisplay(): Promise<void> {
    this.logger.info("Mock panel initialized");
  }

  async display(buffer: Buffer): Promise<void> {
    this.throwIfFailing();
    this.assertFrameSize(buffer);
    await this.delay(this.capabilities.refreshTimeFullMs);
    this.screen = Buffer.from(buffer);
    this.fullRefreshes++;
    this.logger.debug("Mock panel full refresh");
  }

  async displayPartial(buffer: Buffer, window: Rectangle): Promise<void> {
    this.throwIfFailing();
    this.assertWindow(buffer, window);
    await this.delay(this.capabilities.refreshTimePartialMs);

    const screen = this.screen ?? Buffer.alloc(this.frameSize, 0xff);
    const windowStride = Math.ceil(window.width / 8);
    const firstByte = window.x / 8;
    const rowBytes = Math.min(windowStride, this.bytesPerRow - firstByte);
    for (let row = 0; row < window.height; row++) {
      const source = row * windowStride;
      buffer.copy(
        screen,
        (window.y + row) * this.bytesPerRow + firstByte,
        source,
        source + rowBytes,
      );
    }
    this.screen = screen;
    this.partialWindows.push({ ...window });
    this.logger.debug(
      `Mock panel partial refresh ${window.width}x${window.height}@${window.x},${window.y}`,
    );
  }

  async clear(): Promise<void> {
    await this.display(Buffer.alloc(this.frameSize, 0xff));
  }

  async sleep(): Promise<void> {
    this.setSleeping(true);
    this.logger.info("Mock panel sleeping");
  }

  isReady(): boolean {
    return true;
  }

  async waitUntilReady(_timeoutMs: number): Promise<void> {
    // never busy
  }

  // --- test helpers ---

  /**
   * What the panel shows, in native orientation; null before the first write
   */
  getScreenBuffer(): Buffer | null {
    return this.screen;
  }

  getPartialWindows(): Rectangle[] {
    return [...this.partialWindows];
  }

  getFullRefreshCount(): number {
    return this.fullRefreshes;
  }

  /**
   * Make the next display or displayPartial call throw
   */
  failNextWrite(error: Error = new Error("SPI write failed")): void {
    this.failNext = error;
  }

  private throwIfFailing(): void {
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }
  }
}
