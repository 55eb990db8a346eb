import {
  IHardwareAdapter,
  PinConfig,
  SPIConfig,
} from "@core/interfaces/IHardwareAdapter";
import { getLogger } from "@utils/logger";

const logger = getLogger("MockAdapter");

/**
 * One byte or buffer written over SPI, tagged by the DC line
 */
export type WireEntry =
  | { type: "cmd"; value: number }
  | { type: "data"; value: number | Buffer };

export interface MockAdapterOptions {
  /** Resolve delay() immediately, for tests */
  instantDelays?: boolean;
}

/**
 * In-process stand-in for the e-paper HAT.
 *
 * Records the command stream so driver sequences can be asserted, and lets
 * tests hold the busy pin.
 */
export class MockAdapter implements IHardwareAdapter {
  private pins: PinConfig | null = null;
  private pinStates = new Map<number, boolean>();
  private busy = false;
  private wire: WireEntry[] = [];
  private resetCount = 0;

  constructor(private readonly options: MockAdapterOptions = {}) {}

  init(pins: PinConfig, spi: SPIConfig): void {
    if (this.pins) {
      logger.warn("Already initialized");
      return;
    }
    logger.info(
      `Mock hardware: RST=${pins.reset} DC=${pins.dc} BUSY=${pins.busy}, SPI ${spi.bus}.${spi.device} @ ${spi.speed}Hz`,
    );
    this.pins = pins;
    this.pinStates.set(pins.reset, true);
    this.pinStates.set(pins.dc, false);
    if (pins.power !== undefined) {
      this.pinStates.set(pins.power, true);
    }
  }

  dispose(): void {
    if (!this.pins) return;
    this.pins = null;
    this.pinStates.clear();
    logger.info("Mock hardware released");
  }

  gpioWrite(pin: number, value: boolean): void {
    this.requirePins();
    this.pinStates.set(pin, value);
  }

  gpioRead(pin: number): boolean {
    const pins = this.requirePins();
    if (pin === pins.busy) {
      return this.busy;
    }
    return this.pinStates.get(pin) ?? false;
  }

  spiWrite(data: Uint8Array): void {
    this.requirePins();
    logger.debug(`SPI ${data.length} bytes`);
  }

  sendCommand(command: number): void {
    const pins = this.requirePins();
    this.pinStates.set(pins.dc, false);
    this.wire.push({ type: "cmd", value: command });
  }

  sendData(data: number | Buffer): void {
    const pins = this.requirePins();
    this.pinStates.set(pins.dc, true);
    this.wire.push({
      type: "data",
      value: typeof data === "number" ? data : Buffer.from(data),
    });
  }

  async reset(): Promise<void> {
    const pins = this.requirePins();
    this.pinStates.set(pins.reset, true);
    await this.delay(20);
    this.pinStates.set(pins.reset, false);
    await this.delay(2);
    this.pinStates.set(pins.reset, true);
    await this.delay(20);
    this.resetCount++;
  }

  delay(ms: number): Promise<void> {
    if (this.options.instantDelays) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  getPins(): PinConfig {
    return this.requirePins();
  }

  // --- test helpers ---

  setBusyState(busy: boolean): void {
    this.busy = busy;
  }

  getWireLog(): WireEntry[] {
    return [...this.wire];
  }

  /**
   * Command bytes only, in order
   */
  getCommands(): number[] {
    return this.wire.flatMap((entry) =>
      entry.type === "cmd" ? [entry.value] : [],
    );
  }

  /**
   * Single data bytes sent right after the first occurrence of `command`
   */
  getDataAfter(command: number): number[] {
    const start = this.wire.findIndex(
      (entry) => entry.type === "cmd" && entry.value === command,
    );
    if (start < 0) return [];
    const bytes: number[] = [];
    for (const entry of this.wire.slice(start + 1)) {
      if (entry.type === "cmd") break;
      if (typeof entry.value === "number") bytes.push(entry.value);
    }
    return bytes;
  }

  /**
   * Buffers written after each occurrence of `command`
   */
  getBuffersAfter(command: number): Buffer[] {
    const buffers: Buffer[] = [];
    let capturing = false;
    for (const entry of this.wire) {
      if (entry.type === "cmd") {
        capturing = entry.value === command;
      } else if (capturing && Buffer.isBuffer(entry.value)) {
        buffers.push(entry.value);
      }
    }
    return buffers;
  }

  clearWireLog(): void {
    this.wire = [];
  }

  getResetCount(): number {
    return this.resetCount;
  }

  getPinState(pin: number): boolean {
    return this.pinStates.get(pin) ?? false;
  }

  isInitialized(): boolean {
    return this.pins !== null;
  }

  private requirePins(): PinConfig {
    if (!this.pins) {
      throw new Error("MockAdapter not initialized. Call init() first.");
    }
    return this.pins;
  }
}
