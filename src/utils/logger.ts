import winston from "winston";

/**
 * winston logger with console-style timers
 */
export interface Logger extends winston.Logger {
  time(label: string): void;
  timeEnd(label: string): void;
}

/**
 * Prefixes named in LOG_ONLY, or null when every logger may write
 */
const readLogOnlyFilter = (): Set<string> | null => {
  const logOnly = process.env.LOG_ONLY;
  if (!logOnly) return null;
  return new Set(
    logOnly
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );
};

/**
 * Create the logger for one module.
 *
 * Lines are written to stdout as `[Prefix] message`. LOG_LEVEL picks the
 * lowest level that is written (`info` when unset), and an extra transport
 * can be passed to capture output, which is how the tests read it.
 *
 * @example
 * const logger = getLogger("RefreshCoordinator");
 * logger.info("Full refresh (cycle limit)");
 * logger.time("commit");
 * // ... push the framebuffer
 * logger.timeEnd("commit"); // [RefreshCoordinator] commit: 412ms
 *
 * Set LOG_ONLY=MenuStateMachine,RefreshCoordinator to silence every other
 * module while chasing a navigation problem.
 */
export const getLogger = (
  prefix: string,
  transport?: winston.transport,
): Logger => {
  const logOnly = readLogOnlyFilter();

  const onlyAllowed = winston.format((info) =>
    logOnly && !logOnly.has(String(info.label)) ? false : info,
  );

  const baseLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || "info",
    format: winston.format.combine(
      winston.format.label({ label: prefix }),
      winston.format.timestamp(),
      onlyAllowed(),
      winston.format.printf(
        ({ label, message }) => `[${String(label)}] ${String(message)}`,
      ),
    ),
    transports: [
      new winston.transports.Console(),
      ...(transport ? [transport] : []),
    ],
  });

  const startedAt = new Map<string, number>();

  return Object.assign(baseLogger, {
    time(label: string): void {
      startedAt.set(label, Date.now());
    },
    timeEnd(label: string): void {
      const start = startedAt.get(label);
      if (start === undefined) {
        baseLogger.warn(`Timer '${label}' does not exist`);
        return;
      }
      startedAt.delete(label);
      baseLogger.info(`${label}: ${Date.now() - start}ms`);
    },
  });
};
