import fs from "fs";
import path from "path";
import { SysfsGpio } from "../SysfsGpio";
import { createFakeSysfs } from "../../../__tests__/helpers/fakeSysfs";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const readLine = (root: string, line: number, file: string): string =>
  fs.readFileSync(path.join(root, `gpio${line}`, file), "utf-8");

describe("SysfsGpio", () => {
  let root: string;
  let gpio: SysfsGpio;

  beforeEach(() => {
    root = createFakeSysfs([17, 24, 529]);
    gpio = new SysfsGpio({ root });
  });

  afterEach(() => {
    gpio.releaseAll();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("should set the direction with the initial level", () => {
    gpio.claim(17, "out", true);
    gpio.claim(24, "in");

    expect(readLine(root, 17, "direction")).toBe("high");
    expect(readLine(root, 24, "direction")).toBe("in");
    expect(gpio.isClaimed(17)).toBe(true);
  });

  it("should write and read values", () => {
    gpio.claim(17, "out");

    gpio.write(17, true);
    expect(readLine(root, 17, "value")).toBe("1");
    expect(gpio.read(17)).toBe(true);

    gpio.write(17, false);
    expect(gpio.read(17)).toBe(false);
  });

  it("should offset lines by the chip base", () => {
    const offset = new SysfsGpio({ root, chipBase: 512 });
    offset.claim(17, "out");
    offset.write(17, true);

    expect(readLine(root, 529, "value")).toBe("1");
    offset.releaseAll();
  });

  it("should refuse a second claim and unclaimed access", () => {
    gpio.claim(17, "out");

    expect(() => gpio.claim(17, "out")).toThrow("GPIO 17 is already claimed");
    expect(() => gpio.read(24)).toThrow("GPIO 24 is not claimed");
  });

  it("should unexport on release", () => {
    gpio.claim(24, "in");
    gpio.releaseAll();

    expect(fs.readFileSync(path.join(root, "unexport"), "utf-8")).toBe("24");
    expect(gpio.isClaimed(24)).toBe(false);
  });
});
