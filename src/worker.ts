/**
 * BullMQ Worker Entry Point
 * Processes crawl jobs from the queue
 */

import "dotenv/config";
import { AppConfig } from "./core/config/app-config";
import { closeConnection, createCrawlWorker } from "./core/services/queue";
import { gracefulShutdown, startHealthServer } from "./core/utils/health";
import { Logger } from "./core/utils/logger";

const server = startHealthServer(AppConfig.HEALTH_PORT + 1, "Worker health check");

async function main(): Promise<void> {
  Logger.info("Starting BullMQ worker for crawl jobs");

  const worker = createCrawlWorker();

  const shutdown = gracefulShutdown(server, async () => {
    await worker.close();
    await closeConnection();
  });
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  Logger.info("Worker is ready and listening for jobs");
}

main().catch((e: unknown) => {
  Logger.error("Worker startup failed", e);
  process.exit(1);
});
