import dotenv from "dotenv";
dotenv.config();

import { ServiceContainer } from "@di/ServiceContainer";
import { IApiServer } from "@core/interfaces";
import { isSuccess } from "@core/types";
import { PetClockOrchestrator } from "@services/orchestrator/PetClockOrchestrator";
import { getLogger } from "@utils/logger";

const logger = getLogger("PetClock");

/** Forced exit when a graceful shutdown hangs */
const SHUTDOWN_TIMEOUT_MS = 5000;

/**
 * Main entry point
 *
 * Loads state and the panel, draws Home, serves the API for the companion
 * device and runs the main loop until a signal or a fatal error.
 */
async function main() {
  logger.info("Starting pet clock...");

  const container = ServiceContainer.getInstance();

  const orchestrator = container.getOrchestrator();
  const initResult = await orchestrator.initialize();
  if (!isSuccess(initResult)) {
    logger.error("Failed to initialize:", initResult.error);
    process.exit(1);
  }
  logger.info("✓ State loaded and Home drawn");

  const apiServer = container.getApiServer();
  const webResult = await apiServer.start();
  if (!isSuccess(webResult)) {
    logger.error("Failed to start API server:", webResult.error.message);
    await orchestrator.dispose();
    process.exit(1);
  }
  logger.info(`✓ API available at ${apiServer.getServerUrl()}`);

  const shutdown = setupGracefulShutdown(orchestrator, apiServer);
  orchestrator.onFatal((error) => {
    logger.error("Main loop stopped:", error);
    void shutdown("FATAL", 1);
  });

  orchestrator.start();
  logger.info(`✅ ${container.getDeviceConfig().name} is ready`);
}

/**
 * Setup handlers for graceful shutdown
 * @returns the shutdown routine, for fatal errors raised by the loop
 */
function setupGracefulShutdown(
  orchestrator: PetClockOrchestrator,
  apiServer: IApiServer,
): (reason: string, exitCode: number) => Promise<void> {
  let shuttingDown = false;

  const shutdown = async (reason: string, exitCode: number) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${reason} received. Shutting down gracefully...`);

    const forceExitTimeout = setTimeout(() => {
      logger.warn("Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      logger.info("Stopping API server...");
      await apiServer.stop();

      // Stops the loop, shows the shutdown screen and puts the panel to sleep
      await orchestrator.dispose();

      clearTimeout(forceExitTimeout);
      logger.info("✓ Shutdown complete");
      process.exit(exitCode);
    } catch (error) {
      clearTimeout(forceExitTimeout);
      logger.error("Error during shutdown:", error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM", 0));
  process.on("SIGINT", () => void shutdown("SIGINT", 0));

  process.on("uncaughtException", (error) => {
    logger.error("Uncaught exception:", error);
    void shutdown("UNCAUGHT_EXCEPTION", 1);
  });

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled rejection:", reason);
    void shutdown("UNHANDLED_REJECTION", 1);
  });

  return shutdown;
}

main().catch((error) => {
  logger.error("Failed to start application:", error);
  process.exit(1);
});
