import { RefreshCoordinator } from "../RefreshCoordinator";
import { IEpaperService, IFrameBuffer } from "@core/interfaces";
import { DisplayUpdateMode, Rectangle, failure, success } from "@core/types";
import { DisplayError } from "@core/errors";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe("RefreshCoordinator", () => {
  let epaper: jest.Mocked<IEpaperService>;
  let now: number;
  let coordinator: RefreshCoordinator;

  const config = { fullRefreshCycleLimit: 10, fullRefreshTimeLimitMs: 300000 };

  beforeEach(() => {
    now = 1000;
    epaper = {
      initialize: jest.fn().mockResolvedValue(success(undefined)),
      displayBitmap: jest.fn().mockResolvedValue(success(undefined)),
      displayRegion: jest.fn().mockResolvedValue(success(undefined)),
      clear: jest.fn().mockResolvedValue(success(undefined)),
      sleep: jest.fn().mockResolvedValue(success(undefined)),
      wake: jest.fn().mockResolvedValue(success(undefined)),
      getStatus: jest.fn(),
      isBusy: jest.fn().mockReturnValue(false),
      getDimensions: jest.fn().mockReturnValue({ width: 250, height: 122 }),
      getRotation: jest.fn().mockReturnValue(90),
      getSnapshotPng: jest.fn(),
      dispose: jest.fn().mockResolvedValue(undefined),
    };
    coordinator = new RefreshCoordinator(epaper, config, () => now);
  });

  const establishBase = async () => {
    await coordinator.commit(false);
    epaper.displayBitmap.mockClear();
    epaper.displayRegion.mockClear();
  };

  it("sizes the framebuffer from the panel service", () => {
    const fb = coordinator.getFrameBuffer();
    expect(fb.width).toBe(250);
    expect(fb.height).toBe(122);
  });

  describe("base image gating", () => {
    it("upgrades a partial request to full before any full commit", async () => {
      const result = await coordinator.commit(true, {
        x: 10,
        y: 10,
        width: 20,
        height: 20,
      });

      expect(result).toEqual(
        success({
          mode: DisplayUpdateMode.FULL,
          forced: true,
          reason: "no-base-image",
          region: { x: 0, y: 0, width: 250, height: 122 },
          cyclesSinceFull: 0,
        }),
      );
      expect(epaper.displayBitmap).toHaveBeenCalledWith(
        coordinator.getFrameBuffer().getBitmap(),
        DisplayUpdateMode.FULL,
      );
      expect(epaper.displayRegion).not.toHaveBeenCalled();
      expect(coordinator.isBaseImageEstablished()).toBe(true);
    });

    it("goes back to full after invalidation", async () => {
      await establishBase();
      coordinator.invalidateBaseImage();

      const result = await coordinator.commit(true);

      expect(result).toMatchObject({
        success: true,
        data: { mode: DisplayUpdateMode.FULL, reason: "no-base-image" },
      });
    });

    it("does not count a plain full request as forced", async () => {
      const result = await coordinator.commit(false);
      expect(result).toMatchObject({
        success: true,
        data: { mode: DisplayUpdateMode.FULL, forced: false },
      });
    });
  });

  describe("partial commits", () => {
    beforeEach(establishBase);

    it("pushes only the requested region", async () => {
      const region = { x: 10, y: 10, width: 20, height: 20 };

      const result = await coordinator.commit(true, region);

      expect(result).toEqual(
        success({
          mode: DisplayUpdateMode.PARTIAL,
          forced: false,
          reason: "requested",
          region,
          cyclesSinceFull: 1,
        }),
      );
      expect(epaper.displayRegion).toHaveBeenCalledWith(
        coordinator.getFrameBuffer().getBitmap(),
        region,
      );
    });

    it("refreshes the whole screen partially without a region", async () => {
      await coordinator.commit(true);

      expect(epaper.displayBitmap).toHaveBeenCalledWith(
        expect.anything(),
        DisplayUpdateMode.PARTIAL,
      );
      expect(epaper.displayRegion).not.toHaveBeenCalled();
    });

    it("clips a region that hangs off the screen", async () => {
      const result = await coordinator.commit(true, {
        x: 240,
        y: 100,
        width: 20,
        height: 30,
      });

      expect(result).toMatchObject({
        success: true,
        data: { region: { x: 240, y: 100, width: 10, height: 22 } },
      });
    });

    it("rejects a region entirely off the screen without touching the panel", async () => {
      const result = await coordinator.commit(true, {
        x: 300,
        y: 0,
        width: 10,
        height: 10,
      });

      expect(result).toMatchObject({
        success: false,
        error: { code: "DISPLAY_REGION_OUT_OF_BOUNDS" },
      });
      expect(epaper.displayRegion).not.toHaveBeenCalled();
      expect(coordinator.isBaseImageEstablished()).toBe(true);
    });
  });

  describe("ghost suppression", () => {
    beforeEach(establishBase);

    it("forces the 11th commit after a full one to be full", async () => {
      const region = { x: 0, y: 0, width: 8, height: 8 };
      for (let i = 1; i <= 10; i++) {
        const partial = await coordinator.commit(true, region);
        expect(partial).toMatchObject({
          success: true,
          data: { mode: DisplayUpdateMode.PARTIAL, cyclesSinceFull: i },
        });
      }

      const eleventh = await coordinator.commit(true, region);

      expect(eleventh).toMatchObject({
        success: true,
        data: {
          mode: DisplayUpdateMode.FULL,
          forced: true,
          reason: "cycle-limit",
          cyclesSinceFull: 0,
        },
      });
      expect(coordinator.getRefreshState().cyclesSinceFull).toBe(0);
    });

    it("forces a full commit once the time limit has passed", async () => {
      now += 299999;
      const before = await coordinator.commit(true);
      expect(before).toMatchObject({
        success: true,
        data: { mode: DisplayUpdateMode.PARTIAL },
      });

      now += 1;
      const after = await coordinator.commit(true);
      expect(after).toMatchObject({
        success: true,
        data: { mode: DisplayUpdateMode.FULL, reason: "time-limit" },
      });
      expect(coordinator.getRefreshState().timeSinceFull).toBe(0);
    });
  });

  describe("failures", () => {
    it("drops the base image when the panel write fails", async () => {
      await establishBase();
      epaper.displayRegion.mockResolvedValueOnce(
        failure(DisplayError.updateFailed(new Error("SPI write failed"))),
      );

      const result = await coordinator.commit(true, {
        x: 0,
        y: 0,
        width: 16,
        height: 16,
      });

      expect(result).toMatchObject({
        success: false,
        error: { code: "DISPLAY_UPDATE_FAILED" },
      });
      expect(coordinator.isBaseImageEstablished()).toBe(false);

      const next = await coordinator.commit(true);
      expect(next).toMatchObject({
        success: true,
        data: { mode: DisplayUpdateMode.FULL, reason: "no-base-image" },
      });
    });

    it("wraps a plain error in a DisplayError", async () => {
      epaper.displayBitmap.mockResolvedValueOnce(failure(new Error("boom")));

      const result = await coordinator.commit(false);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(DisplayError);
        expect(result.error.message).toBe("Failed to update display: boom");
      }
    });

    it("keeps the counters when a partial write fails", async () => {
      await establishBase();
      await coordinator.commit(true);
      epaper.displayBitmap.mockResolvedValueOnce(failure(new Error("boom")));

      await coordinator.commit(true);

      expect(coordinator.getRefreshState()).toEqual({
        baseImageEstablished: false,
        cyclesSinceFull: 1,
        timeSinceFull: 0,
      });
    });
  });

  describe("updateField", () => {
    it("clears the field, redraws it and commits only that rectangle", async () => {
      await establishBase();
      const fb = coordinator.getFrameBuffer();
      fb.fillRect(fb.bounds);
      const rect = { x: 16, y: 8, width: 16, height: 8 };
      const draw = jest.fn((target: IFrameBuffer, field: Rectangle) => {
        target.setPixel(field.x, field.y);
      });

      const result = await coordinator.updateField(rect, draw);

      expect(draw).toHaveBeenCalledWith(fb, rect);
      expect(fb.getPixel(16, 8)).toBe(true);
      expect(fb.getPixel(17, 8)).toBe(false);
      expect(fb.getPixel(15, 8)).toBe(true);
      expect(epaper.displayRegion).toHaveBeenCalledWith(fb.getBitmap(), rect);
      expect(result).toMatchObject({
        success: true,
        data: { mode: DisplayUpdateMode.PARTIAL },
      });
    });
  });

  it("reports time since the last full commit", async () => {
    expect(coordinator.getRefreshState().timeSinceFull).toBe(0);
    await coordinator.commit(false);
    now += 4500;
    expect(coordinator.getRefreshState()).toEqual({
      baseImageEstablished: true,
      cyclesSinceFull: 0,
      timeSinceFull: 4500,
    });
  });

  it("hands out the commit count once", async () => {
    await coordinator.commit(false);
    await coordinator.commit(true);
    await coordinator.commit(true);

    expect(coordinator.takeCommitCount()).toBe(3);
    expect(coordinator.takeCommitCount()).toBe(0);
  });
});
