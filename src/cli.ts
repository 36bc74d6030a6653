#!/usr/bin/env node
/**
 * CLI Entry Point
 * Runs crawls directly, bypassing the queue, or enqueues a one-time crawl
 */

import "dotenv/config";
import { AppConfig } from "./core/config/app-config";
import { pushStoredDescriptions, runCrawl } from "./core/services/crawl-service";
import { closeConnection, createCrawlQueue, scheduleOneTimeCrawl } from "./core/services/queue";
import { Logger } from "./core/utils/logger";
import { SITE_CATEGORIES, registry } from "./sites/registry";

const siteKeys = () => Array.from(registry.keys());

async function main(): Promise<number> {
  const argv = process.argv.slice(2);

  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  if (hasFlag("--help")) {
    Logger.info(`Usage:
node dist/cli.js --site <key> [--limit N]
node dist/cli.js --sites <key1,key2> [--limit N]
node dist/cli.js --category <category> [--limit N] [--enqueue]
node dist/cli.js --update-descriptions [--limit N] [--dry-run]

Options:
  --site      Single site to run
  --sites     Multiple sites to run (comma-separated)
  --category  Every site of a category (${Object.keys(SITE_CATEGORIES).join(", ")})
  --limit     Max products per site (default: MAX_ITEMS, 0 = no limit)
  --enqueue   Add a one-time job to the queue instead of running here
  --list      List available sites
  --update-descriptions  Push stored translated descriptions to products already in the catalog
  --dry-run   With --update-descriptions, count without updating

Examples:
  npm run cli -- --site nike --limit 10
  npm run cli -- --category apparel --enqueue
  npm run cli -- --update-descriptions --dry-run

Available sites: ${siteKeys().join(", ")}`);
    return 0;
  }

  if (hasFlag("--list")) {
    Logger.info(`Available sites: ${siteKeys().join(", ")}`);
    return 0;
  }

  if (hasFlag("--update-descriptions")) {
    const stats = await pushStoredDescriptions({
      limit: Number(getArg("--limit") ?? 0) || 0,
      dryRun: hasFlag("--dry-run"),
    });
    Logger.info(
      `Descriptions ${hasFlag("--dry-run") ? "to update" : "updated"}: ${stats.updated}, skipped ${stats.skipped}, failed ${stats.failed}`,
      { ...stats },
    );
    return stats.failed > 0 ? 1 : 0;
  }

  const sitesArg = getArg("--sites") ?? getArg("--site") ?? process.env.SITE;
  const category = getArg("--category");

  if (!sitesArg && !category) {
    Logger.error("Missing --site, --sites, --category or SITE env variable");
    Logger.info(`Available sites: ${siteKeys().join(", ")}`);
    return 1;
  }

  const siteKeysArg = sitesArg
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  const maxItems = Number(getArg("--limit") ?? AppConfig.MAX_ITEMS) || 0;

  if (hasFlag("--enqueue")) {
    const queue = createCrawlQueue();
    try {
      await scheduleOneTimeCrawl(queue, { siteKeys: siteKeysArg, category, maxItems });
    } finally {
      await queue.close();
      await closeConnection();
    }
    return 0;
  }

  const results = await runCrawl({ siteKeys: siteKeysArg, category, maxItems });
  const successCount = results.filter((r) => r.success).length;
  const failCount = results.length - successCount;

  for (const r of results) {
    const job = r.job;
    Logger.info(`${r.success ? "ok" : "FAILED"} ${r.siteKey}`, {
      found: job?.totalFound,
      created: job?.totalCreated,
      updated: job?.totalUpdated,
      failed: job?.totalFailed,
      error: r.error,
    });
  }
  Logger.info(`Crawl completed: ${successCount} successful, ${failCount} failed`);
  return failCount > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    Logger.error("Crawl failed", e);
    process.exitCode = 1;
  });
