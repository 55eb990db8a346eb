import fs from "fs";
import os from "os";
import path from "path";
import { StatsService } from "../StatsService";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const T0 = new Date("2026-01-05T12:00:00.000Z");

describe("StatsService", () => {
  let dir: string;
  let service: StatsService;

  const readStats = (): Record<string, unknown> =>
    JSON.parse(fs.readFileSync(path.join(dir, "stats.json"), "utf-8"));

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "stats-"));
    service = new StatsService(dir, () => T0);
    await service.initialize();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should start from zero", () => {
    expect(service.getStats()).toMatchObject({
      firstBoot: T0.toISOString(),
      totalButtonPresses: 0,
      lastError: null,
    });
  });

  it("should increment counters", async () => {
    await service.increment("totalButtonPresses");
    await service.increment("totalDisplayUpdates", 3);

    expect(readStats()).toMatchObject({
      totalButtonPresses: 1,
      totalDisplayUpdates: 3,
    });
  });

  it("should record network errors", async () => {
    await service.recordError("Request timed out");

    expect(service.getStats()).toMatchObject({
      networkErrors: 1,
      lastError: { message: "Request timed out", timestamp: T0.toISOString() },
    });
  });

  it("should keep counts across restarts", async () => {
    await service.increment("totalMessagesSent", 2);

    const reloaded = new StatsService(dir, () => T0);
    await reloaded.initialize();

    expect(reloaded.getStats().totalMessagesSent).toBe(2);
  });
});
