import { Writable } from "node:stream";
import winston from "winston";
import { getLogger } from "../logger";

class CaptureTransport extends winston.transports.Stream {
  logs: winston.Logform.TransformableInfo[] = [];

  constructor() {
    super({
      stream: new Writable({
        write(_chunk, _encoding, callback) {
          callback();
        },
      }),
    });
  }

  log(info: winston.Logform.TransformableInfo, callback: () => void): void {
    this.logs.push(info);
    callback();
  }
}

describe("logger", () => {
  const savedLevel = process.env.LOG_LEVEL;
  const savedOnly = process.env.LOG_ONLY;

  afterEach(() => {
    process.env.LOG_LEVEL = savedLevel;
    process.env.LOG_ONLY = savedOnly;
  });

  beforeEach(() => {
    delete process.env.LOG_ONLY;
  });

  it("should log info and above when LOG_LEVEL is empty", () => {
    process.env.LOG_LEVEL = "";
    const transport = new CaptureTransport();
    const logger = getLogger("Clock", transport);

    logger.debug("tick");
    logger.info("minute changed");

    expect(transport.logs).toHaveLength(1);
    expect(transport.logs[0].level).toBe("info");
    expect(transport.logs[0].message).toBe("minute changed");
  });

  it("should respect LOG_LEVEL=warn", () => {
    process.env.LOG_LEVEL = "warn";
    const transport = new CaptureTransport();
    const logger = getLogger("Clock", transport);

    logger.info("ignored");
    logger.warn("slow refresh");
    logger.error("panel lost");

    expect(transport.logs.map((info) => info.level)).toEqual(["warn", "error"]);
  });

  it("should keep metadata passed with the message", () => {
    process.env.LOG_LEVEL = "info";
    const transport = new CaptureTransport();
    const logger = getLogger("Menu", transport);

    logger.info("switched", { menu: "stats" });

    expect(transport.logs[0].menu).toBe("stats");
    expect(transport.logs[0].label).toBe("Menu");
  });

  it("should drop loggers not named in LOG_ONLY", () => {
    process.env.LOG_LEVEL = "info";
    process.env.LOG_ONLY = "RefreshCoordinator, MenuStateMachine";
    const allowed = new CaptureTransport();
    const silenced = new CaptureTransport();

    getLogger("MenuStateMachine", allowed).info("kept");
    getLogger("PetStateService", silenced).info("dropped");

    expect(allowed.logs).toHaveLength(1);
    expect(silenced.logs).toHaveLength(0);
  });

  describe("timers", () => {
    beforeEach(() => {
      process.env.LOG_LEVEL = "info";
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it("should log the elapsed time between time and timeEnd", () => {
      const transport = new CaptureTransport();
      const logger = getLogger("Panel", transport);

      const now = jest.spyOn(Date, "now");
      now.mockReturnValueOnce(10_000).mockReturnValueOnce(12_250);

      logger.time("full refresh");
      logger.timeEnd("full refresh");

      expect(transport.logs).toHaveLength(1);
      expect(transport.logs[0].message).toBe("full refresh: 2250ms");
    });

    it("should warn for an unknown timer and forget finished ones", () => {
      const transport = new CaptureTransport();
      const logger = getLogger("Panel", transport);

      jest.spyOn(Date, "now").mockReturnValue(5_000);

      logger.time("partial");
      logger.timeEnd("partial");
      logger.timeEnd("partial");

      expect(transport.logs).toHaveLength(2);
      expect(transport.logs[0].message).toBe("partial: 0ms");
      expect(transport.logs[1].level).toBe("warn");
      expect(transport.logs[1].message).toBe("Timer 'partial' does not exist");
    });
  });
});
