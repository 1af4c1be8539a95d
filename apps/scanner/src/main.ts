/**
 * Scanner Main Entry Point
 *
 * - HTTP API for triggering the daily job and draining alerts
 * - Optional interval scheduler
 * - Graceful shutdown closes the server, the scheduler and the DB pool
 */

// must run before ./env validates process.env
import "dotenv/config";

import { logger, type IntervalWorker } from "@dip-scanner/utils";

import { ApiServer } from "./api/server";
import { appConfigFromEnv, createAppContext } from "./context";
import { env } from "./env";
import { startDailyJobScheduler } from "./scheduler";

async function main(): Promise<void> {
  logger.info("Starting scanner", { appEnv: env.APP_ENV, port: env.PORT });

  const context = createAppContext(appConfigFromEnv(env));

  const server = new ApiServer(context);
  await server.start(env.PORT);

  let scheduler: IntervalWorker | null = null;
  if (env.SCHEDULER_ENABLED) {
    scheduler = startDailyJobScheduler(context.scan, env.SCHEDULER_INTERVAL_MS);
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");
    await server.stop();
    await scheduler?.stop();
    await context.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });

  logger.info("Scanner running", { schedulerEnabled: env.SCHEDULER_ENABLED });
}

main().catch(error => {
  logger.error("Fatal error", error);
  process.exit(1);
});
