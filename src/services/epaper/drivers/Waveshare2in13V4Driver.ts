import { PanelCapabilities } from "@core/interfaces/IEpaperDriver";
import { DisplayType, Rectangle } from "@core/types";
import { BaseEpaperDriver } from "./BaseEpaperDriver";

/**
 * Waveshare 2.13" V4 black/white panel (SSD1680 controller, 122x250)
 *
 * Command reference:
 * - 0x01: Driver output control (gate lines)
 * - 0x10: Deep sleep mode
 * - 0x11: Data entry mode
 * - 0x12: Software reset
 * - 0x18: Temperature sensor selection
 * - 0x20: Activate display update sequence
 * - 0x21: Display update control 1
 * - 0x22: Display update control 2 (0xF7 full, 0xFF partial)
 * - 0x24: Write RAM (new image)
 * - 0x26: Write RAM (base image for partial refresh)
 * - 0x3C: Border waveform
 * - 0x44 / 0x45: RAM X / Y window
 * - 0x4E / 0x4F: RAM X / Y address counter
 */
export class Waveshare2in13V4Driver extends BaseEpaperDriver {
  readonly name = "waveshare_2in13_v4";

  readonly capabilities: PanelCapabilities = {
    width: 122,
    height: 250,
    colorDepth: "1bit",
    displayType: DisplayType.EPAPER,
    supportsPartialRefresh: true,
    refreshTimeFullMs: 2000,
    refreshTimePartialMs: 300,
  };

  static readonly CMD_DRIVER_OUTPUT = 0x01;
  static readonly CMD_DEEP_SLEEP = 0x10;
  static readonly CMD_DATA_ENTRY_MODE = 0x11;
  static readonly CMD_SWRESET = 0x12;
  static readonly CMD_TEMP_SENSOR = 0x18;
  static readonly CMD_ACTIVATE_UPDATE = 0x20;
  static readonly CMD_UPDATE_CTRL_1 = 0x21;
  static readonly CMD_UPDATE_CTRL_2 = 0x22;
  static readonly CMD_WRITE_RAM = 0x24;
  static readonly CMD_WRITE_BASE_RAM = 0x26;
  static readonly CMD_BORDER_WAVEFORM = 0x3c;
  static readonly CMD_SET_RAM_X = 0x44;
  static readonly CMD_SET_RAM_Y = 0x45;
  static readonly CMD_SET_RAM_X_COUNTER = 0x4e;
  static readonly CMD_SET_RAM_Y_COUNTER = 0x4f;

  static readonly UPDATE_FULL = 0xf7;
  static readonly UPDATE_PARTIAL = 0xff;

  protected async initDisplay(): Promise<void> {
    const W = Waveshare2in13V4Driver;
    await this.waitForReady();
    this.sendCommand(W.CMD_SWRESET);
    await this.waitForReady();

    this.setGateLines();
    this.sendCommand(W.CMD_DATA_ENTRY_MODE, 0x03); // x then y increment
    this.setWindow({
      x: 0,
      y: 0,
      width: this.capabilities.width,
      height: this.capabilities.height,
    });
    this.sendCommand(W.CMD_BORDER_WAVEFORM, 0x05);
    this.sendCommand(W.CMD_UPDATE_CTRL_1, 0x00, 0x80);
    this.sendCommand(W.CMD_TEMP_SENSOR, 0x80); // internal sensor
    await this.waitForReady();
  }

  /**
   * Full refresh. Writes both RAM banks so the frame is also the base image.
   */
  async display(buffer: Buffer): Promise<void> {
    this.assertFrameSize(buffer);
    const W = Waveshare2in13V4Driver;
    this.logger.time("display");

    this.setWindow({
      x: 0,
      y: 0,
      width: this.capabilities.width,
      height: this.capabilities.height,
    });
    this.sendCommand(W.CMD_WRITE_RAM);
    this.sendData(buffer);
    this.sendCommand(W.CMD_WRITE_BASE_RAM);
    this.sendData(buffer);
    await this.turnOnDisplay(W.UPDATE_FULL);

    this.logger.timeEnd("display");
  }

  async displayPartial(buffer: Buffer, window: Rectangle): Promise<void> {
    this.assertWindow(buffer, window);
    const W = Waveshare2in13V4Driver;
    this.logger.time("displayPartial");

    await this.pulseReset();
    this.sendCommand(W.CMD_BORDER_WAVEFORM, 0x80);
    this.setGateLines();
    this.sendCommand(W.CMD_DATA_ENTRY_MODE, 0x03);
    this.setWindow(window);
    this.sendCommand(W.CMD_WRITE_RAM);
    this.sendData(buffer);
    await this.turnOnDisplay(W.UPDATE_PARTIAL);

    this.logger.timeEnd("displayPartial");
  }

  async clear(): Promise<void> {
    await this.display(Buffer.alloc(this.frameSize, 0xff));
  }

  async sleep(): Promise<void> {
    this.sendCommand(Waveshare2in13V4Driver.CMD_DEEP_SLEEP, 0x01);
    await this.delay(100);
    this.setSleeping(true);
    this.logger.info("Display is now sleeping");
  }

  private async turnOnDisplay(sequence: number): Promise<void> {
    this.sendCommand(Waveshare2in13V4Driver.CMD_UPDATE_CTRL_2, sequence);
    this.sendCommand(Waveshare2in13V4Driver.CMD_ACTIVATE_UPDATE);
    await this.waitForReady();
  }

  private setGateLines(): void {
    const lastLine = this.capabilities.height - 1;
    this.sendCommand(
      Waveshare2in13V4Driver.CMD_DRIVER_OUTPUT,
      lastLine & 0xff,
      (lastLine >> 8) & 0x01,
      0x00,
    );
  }

  /**
   * Set the RAM window and move the address counter to its top-left corner.
   * X is addressed in bytes.
   */
  private setWindow(window: Rectangle): void {
    const W = Waveshare2in13V4Driver;
    const xStart = window.x >> 3;
    const xEnd = (window.x + window.width - 1) >> 3;
    const yStart = window.y;
    const yEnd = window.y + window.height - 1;

    this.sendCommand(W.CMD_SET_RAM_X, xStart, xEnd);
    this.sendCommand(
      W.CMD_SET_RAM_Y,
      yStart & 0xff,
      (yStart >> 8) & 0xff,
      yEnd & 0xff,
      (yEnd >> 8) & 0xff,
    );
    this.sendCommand(W.CMD_SET_RAM_X_COUNTER, xStart);
    this.sendCommand(W.CMD_SET_RAM_Y_COUNTER, yStart & 0xff, (yStart >> 8) & 0xff);
  }

  /**
   * Short reset pulse the controller needs before switching to partial mode
   */
  private async pulseReset(): Promise<void> {
    const adapter = this.requireAdapter();
    const { reset } = adapter.getPins();
    adapter.gpioWrite(reset, false);
    await this.delay(1);
    adapter.gpioWrite(reset, true);
  }
}
