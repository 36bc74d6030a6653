/**
 * Main Entry Point
 * Starts the BullMQ worker and upserts recurring crawls
 * This is the primary way to run the application in queue mode
 */

import "dotenv/config";
import { AppConfig } from "./core/config/app-config";
import {
  closeConnection,
  createCrawlQueue,
  createCrawlWorker,
  scheduleRecurringCrawl,
} from "./core/services/queue";
import { gracefulShutdown, startHealthServer } from "./core/utils/health";
import { Logger } from "./core/utils/logger";
import { SITE_CATEGORIES } from "./sites/registry";

const server = startHealthServer(AppConfig.HEALTH_PORT);

async function main(): Promise<void> {
  Logger.info("Starting catalog sync application");

  const queue = createCrawlQueue();

  Logger.info("Setting up recurring crawl schedules");
  for (const key of Object.keys(SITE_CATEGORIES)) {
    // "all" overlaps the real categories; the template is never crawled
    if (key === "template" || key === "all") continue;

    try {
      await scheduleRecurringCrawl(queue, key, { maxItems: AppConfig.MAX_ITEMS });
    } catch (error) {
      Logger.error(`Failed to schedule ${key}`, error);
    }
  }

  const worker = createCrawlWorker();

  const shutdown = gracefulShutdown(server, async () => {
    await worker.close();
    await queue.close();
    await closeConnection();
  });
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  Logger.info("Application is ready and listening for jobs");
}

main().catch((e: unknown) => {
  Logger.error("Startup failed", e);
  process.exit(1);
});
