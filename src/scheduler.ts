/**
 * Scheduler Entry Point
 * Sets up recurring crawls for every category
 */

import "dotenv/config";
import { AppConfig } from "./core/config/app-config";
import { closeConnection, createCrawlQueue, scheduleRecurringCrawl } from "./core/services/queue";
import { Logger } from "./core/utils/logger";
import { SITE_CATEGORIES, isCategoryKey } from "./sites/registry";

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argv.includes("--help") || argv.includes("-h")) {
    Logger.info(`
Scheduler - Configure recurring crawl jobs

Usage:
  npm run scheduler                      # Schedule every category
  npm run scheduler -- --category <cat>  # Schedule one category only

Options:
  --category <category>  ${Object.keys(SITE_CATEGORIES).join(", ")}
  --cron <pattern>       Cron pattern (default: CRAWL_CRON or "0 2 * * *")
  --limit <n>            Max products per site (default: MAX_ITEMS)

Examples:
  npm run scheduler
  npm run scheduler -- --category apparel --cron "0 */6 * * *"
`);
    return;
  }

  const getArg = (flag: string) => {
    const i = argv.indexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  const targetCategory = getArg("--category");
  const cron = getArg("--cron") ?? AppConfig.CRAWL_CRON;
  const maxItems = Number(getArg("--limit") ?? AppConfig.MAX_ITEMS) || 0;

  const categoriesToSchedule = targetCategory
    ? [targetCategory]
    : Object.keys(SITE_CATEGORIES).filter((key) => key !== "template" && key !== "all");

  Logger.info("Scheduling recurring crawls", { categories: categoriesToSchedule, cron, maxItems });

  const queue = createCrawlQueue();
  try {
    for (const cat of categoriesToSchedule) {
      if (!isCategoryKey(cat)) {
        Logger.warn(`Unknown category: ${cat}, skipping`);
        continue;
      }
      try {
        await scheduleRecurringCrawl(queue, cat, { cron, maxItems });
      } catch (error) {
        Logger.error(`Failed to schedule ${cat}`, error);
      }
    }

    const scheduled = await queue.getJobSchedulers();
    Logger.info(`Total scheduled jobs: ${scheduled.length}`);
    for (const scheduler of scheduled) {
      Logger.info(`  - ${scheduler.key}: ${scheduler.pattern ?? `every ${scheduler.every}ms`}`);
    }
  } finally {
    await queue.close();
    await closeConnection();
  }
  Logger.info("Scheduler completed");
}

main().catch((e: unknown) => {
  Logger.error("Scheduler failed", e);
  process.exit(1);
});
