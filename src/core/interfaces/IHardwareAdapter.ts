/**
 * GPIO and SPI access for the e-paper HAT.
 *
 * Drivers only speak through this interface, so the command sequences can be
 * exercised against MockAdapter on a laptop and against a real GPIO binding
 * on the Pi.
 */

/**
 * Control pins (BCM numbering)
 */
export interface PinConfig {
  reset: number;
  /** Data/Command select */
  dc: number;
  busy: number;
  /** Optional power switch for the panel */
  power?: number;
}

export interface SPIConfig {
  bus: number;
  device: number;
  /** Clock in Hz */
  speed: number;
}

export interface IHardwareAdapter {
  /**
   * Claim the pins and open the SPI device
   */
  init(pins: PinConfig, spi: SPIConfig): void;

  /**
   * Release pins and close the SPI device
   */
  dispose(): void;

  gpioWrite(pin: number, value: boolean): void;

  gpioRead(pin: number): boolean;

  spiWrite(data: Uint8Array): void;

  /**
   * Pull DC low and write one command byte
   */
  sendCommand(command: number): void;

  /**
   * Pull DC high and write one byte or a whole buffer
   */
  sendData(data: number | Buffer): void;

  /**
   * Pulse the reset pin high, low, high
   */
  reset(): Promise<void>;

  delay(ms: number): Promise<void>;

  getPins(): PinConfig;
}
