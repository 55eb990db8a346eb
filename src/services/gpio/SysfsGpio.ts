import fs from "fs";
import path from "path";
import { getLogger } from "@utils/logger";

const logger = getLogger("SysfsGpio");

export type GpioDirection = "in" | "out";

export interface SysfsGpioOptions {
  /** Root of the sysfs GPIO tree */
  root?: string;
  /**
   * Added to BCM numbers to get the kernel line number. 0 on older Pi
   * kernels; newer ones number the main chip from 512.
   */
  chipBase?: number;
}

/**
 * GPIO lines through the kernel's sysfs interface.
 *
 * Value files stay open while a line is claimed, so reads and writes are a
 * single pread/pwrite each.
 */
export class SysfsGpio {
  private readonly root: string;
  private readonly chipBase: number;
  private readonly lines = new Map<number, number>();

  constructor(options: SysfsGpioOptions = {}) {
    this.root = options.root ?? "/sys/class/gpio";
    this.chipBase = options.chipBase ?? 0;
  }

  /**
   * Export a line, set its direction and open its value file
   */
  claim(pin: number, direction: GpioDirection, initial = false): void {
    if (this.lines.has(pin)) {
      throw new Error(`GPIO ${pin} is already claimed`);
    }

    const dir = this.lineDir(pin);
    if (!fs.existsSync(dir)) {
      fs.writeFileSync(path.join(this.root, "export"), String(this.line(pin)));
    }

    const mode = direction === "in" ? "in" : initial ? "high" : "low";
    fs.writeFileSync(path.join(dir, "direction"), mode);
    this.lines.set(pin, fs.openSync(path.join(dir, "value"), "r+"));
    if (direction === "out") {
      this.write(pin, initial);
    }
    logger.debug(`GPIO ${pin} (line ${this.line(pin)}) claimed as ${mode}`);
  }

  write(pin: number, value: boolean): void {
    fs.writeSync(this.fd(pin), value ? "1" : "0", 0);
  }

  read(pin: number): boolean {
    const buffer = Buffer.alloc(1);
    fs.readSync(this.fd(pin), buffer, 0, 1, 0);
    return buffer.toString() === "1";
  }

  isClaimed(pin: number): boolean {
    return this.lines.has(pin);
  }

  /**
   * Close and unexport a line; unclaimed lines are ignored
   */
  release(pin: number): void {
    const fd = this.lines.get(pin);
    if (fd === undefined) {
      return;
    }
    this.lines.delete(pin);
    fs.closeSync(fd);
    try {
      fs.writeFileSync(path.join(this.root, "unexport"), String(this.line(pin)));
    } catch (error) {
      logger.warn(`Could not unexport GPIO ${pin}: ${String(error)}`);
    }
  }

  releaseAll(): void {
    for (const pin of [...this.lines.keys()]) {
      this.release(pin);
    }
  }

  private line(pin: number): number {
    return this.chipBase + pin;
  }

  private lineDir(pin: number): string {
    return path.join(this.root, `gpio${this.line(pin)}`);
  }

  private fd(pin: number): number {
    const fd = this.lines.get(pin);
    if (fd === undefined) {
      throw new Error(`GPIO ${pin} is not claimed`);
    }
    return fd;
  }
}
