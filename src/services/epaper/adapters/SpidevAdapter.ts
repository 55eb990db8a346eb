import fs from "fs";
import {
  IHardwareAdapter,
  PinConfig,
  SPIConfig,
} from "@core/interfaces/IHardwareAdapter";
import { SysfsGpio } from "@services/gpio/SysfsGpio";
import { getLogger } from "@utils/logger";

const logger = getLogger("SpidevAdapter");

/** spidev's default transfer buffer size */
const SPI_CHUNK_SIZE = 4096;

export interface SpidevAdapterOptions {
  /** Directory holding the spidevB.D nodes */
  devRoot?: string;
}

/**
 * Hardware adapter for the Pi: control pins through sysfs GPIO, pixel data
 * through a plain write() on /dev/spidevB.D.
 *
 * The SPI clock comes from the device tree; `spi.speed` is only logged.
 */
export class SpidevAdapter implements IHardwareAdapter {
  private spiFd: number | null = null;
  private pins: PinConfig | null = null;

  constructor(
    private readonly gpio: SysfsGpio,
    private readonly options: SpidevAdapterOptions = {},
  ) {}

  init(pins: PinConfig, spi: SPIConfig): void {
    if (this.pins) {
      logger.warn("SpidevAdapter already initialized");
      return;
    }

    const device = `${this.options.devRoot ?? "/dev"}/spidev${spi.bus}.${spi.device}`;
    logger.info(
      `Opening ${device} (RST=${pins.reset} DC=${pins.dc} BUSY=${pins.busy}, requested ${spi.speed}Hz)`,
    );

    try {
      this.gpio.claim(pins.reset, "out", true);
      this.gpio.claim(pins.dc, "out", false);
      this.gpio.claim(pins.busy, "in");
      if (pins.power !== undefined) {
        this.gpio.claim(pins.power, "out", true);
      }
      this.spiFd = fs.openSync(device, "w");
      this.pins = pins;
    } catch (error) {
      this.releasePins(pins);
      logger.error("Failed to initialize SpidevAdapter:", error);
      throw error;
    }
  }

  dispose(): void {
    if (!this.pins) {
      return;
    }

    try {
      if (this.pins.power !== undefined) {
        this.gpio.write(this.pins.power, false);
      }
      if (this.spiFd !== null) {
        fs.closeSync(this.spiFd);
      }
      this.releasePins(this.pins);
      logger.info("SpidevAdapter disposed");
    } catch (error) {
      logger.error("Error disposing SpidevAdapter:", error);
    } finally {
      this.spiFd = null;
      this.pins = null;
    }
  }

  gpioWrite(pin: number, value: boolean): void {
    this.requirePins();
    this.gpio.write(pin, value);
  }

  gpioRead(pin: number): boolean {
    this.requirePins();
    return this.gpio.read(pin);
  }

  spiWrite(data: Uint8Array): void {
    const fd = this.requireSpi();
    for (let offset = 0; offset < data.length; offset += SPI_CHUNK_SIZE) {
      fs.writeSync(fd, data, offset, Math.min(SPI_CHUNK_SIZE, data.length - offset));
    }
  }

  sendCommand(command: number): void {
    const pins = this.requirePins();
    this.gpio.write(pins.dc, false);
    this.spiWrite(Uint8Array.of(command));
  }

  sendData(data: number | Buffer): void {
    const pins = this.requirePins();
    this.gpio.write(pins.dc, true);
    this.spiWrite(typeof data === "number" ? Uint8Array.of(data) : data);
  }

  async reset(): Promise<void> {
    const pins = this.requirePins();
    this.gpio.write(pins.reset, true);
    await this.delay(20);
    this.gpio.write(pins.reset, false);
    await this.delay(2);
    this.gpio.write(pins.reset, true);
    await this.delay(20);
  }

  delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  getPins(): PinConfig {
    return this.requirePins();
  }

  private releasePins(pins: PinConfig): void {
    for (const pin of [pins.reset, pins.dc, pins.busy, pins.power]) {
      if (pin !== undefined) {
        this.gpio.release(pin);
      }
    }
  }

  private requirePins(): PinConfig {
    if (!this.pins) {
      throw new Error("SpidevAdapter not initialized");
    }
    return this.pins;
  }

  private requireSpi(): number {
    if (this.spiFd === null) {
      throw new Error("SpidevAdapter not initialized");
    }
    return this.spiFd;
  }
}
