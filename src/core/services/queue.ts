/**
 * BullMQ Queue Configuration
 * Handles job scheduling and processing for crawl tasks
 */

import { Queue, Worker, type Job } from "bullmq";
import Redis from "ioredis";
import { AppConfig } from "../config/app-config";
import { Logger } from "../utils/logger";
import { runCrawl, type CrawlResult } from "./crawl-service";

let connection: Redis | null = null;

/**
 * Shared Redis connection, opened on first use
 */
export function getConnection(): Redis {
  if (!connection) {
    connection = new Redis({
      host: AppConfig.REDIS_HOST,
      port: AppConfig.REDIS_PORT,
      password: AppConfig.REDIS_PASSWORD,
      maxRetriesPerRequest: null, // Required for BullMQ
    });
  }
  return connection;
}

export async function closeConnection(): Promise<void> {
  if (!connection) return;
  await connection.quit();
  connection = null;
}

export interface CrawlJobData {
  siteKeys?: string[];
  category?: string;
  maxItems?: number;
}

export interface CrawlJobResult {
  success: boolean;
  results: CrawlResult[];
}

export const QUEUE_NAMES = {
  CRAWL: "crawl-jobs",
} as const;

/**
 * Create a new crawl queue
 */
export function createCrawlQueue(): Queue<CrawlJobData, CrawlJobResult> {
  return new Queue<CrawlJobData, CrawlJobResult>(QUEUE_NAMES.CRAWL, {
    connection: getConnection(),
  });
}

/**
 * Default processor for crawl jobs
 */
export async function processCrawlJob(
  job: Pick<Job<CrawlJobData>, "id" | "data">,
  crawl: typeof runCrawl = runCrawl,
): Promise<CrawlJobResult> {
  const { siteKeys, category, maxItems } = job.data;

  Logger.info(`Processing job ${job.id}`, { siteKeys, category, maxItems });

  try {
    const results = await crawl({ siteKeys, category, maxItems });

    const successCount = results.filter((r) => r.success).length;
    const failCount = results.length - successCount;

    Logger.info(`Job ${job.id} completed`, { successCount, failCount });

    return { success: failCount === 0, results };
  } catch (error) {
    Logger.error(`Job ${job.id} failed`, error);
    throw error;
  }
}

/**
 * Setup default event handlers for a worker
 */
export function setupWorkerEventHandlers(worker: Worker<CrawlJobData, CrawlJobResult>): void {
  worker.on("completed", (job) => {
    Logger.info(`Job ${job.id} completed successfully`);
  });

  worker.on("failed", (job, err) => {
    Logger.error(`Job ${job?.id} failed`, err);
  });

  worker.on("error", (err) => {
    Logger.error("Worker error", err);
  });
}

/**
 * Create a worker to process crawl jobs, one at a time
 */
export function createCrawlWorker(
  processor: (job: Job<CrawlJobData>) => Promise<CrawlJobResult> = (job) => processCrawlJob(job),
  setupEvents = true,
): Worker<CrawlJobData, CrawlJobResult> {
  const worker = new Worker<CrawlJobData, CrawlJobResult>(
    QUEUE_NAMES.CRAWL,
    async (job) => {
      Logger.info(`Processing crawl job: ${job.id}`, { data: job.data });
      return processor(job);
    },
    {
      connection: getConnection(),
      concurrency: 1,
      limiter: {
        max: 1,
        duration: 1000,
      },
    },
  );

  if (setupEvents) {
    setupWorkerEventHandlers(worker);
  }

  return worker;
}

/**
 * Schedule a recurring crawl for a category using upsertJobScheduler
 */
export async function scheduleRecurringCrawl(
  queue: Queue<CrawlJobData, CrawlJobResult>,
  category: string,
  options: { maxItems?: number; cron?: string } = {},
): Promise<void> {
  const { maxItems = 0, cron = AppConfig.CRAWL_CRON } = options;

  await queue.upsertJobScheduler(
    `crawl-${category}`,
    { pattern: cron },
    {
      name: `crawl-${category}`,
      data: { category, maxItems },
      opts: {
        removeOnComplete: {
          age: 24 * 3600, // Keep completed jobs for 24 hours
          count: 1000,
        },
        removeOnFail: {
          age: 7 * 24 * 3600, // Keep failed jobs for 7 days
        },
      },
    },
  );

  Logger.info(`Scheduled recurring crawl for category: ${category}`, { cron, maxItems });
}

/**
 * Schedule a one-time crawl job
 */
export async function scheduleOneTimeCrawl(
  queue: Queue<CrawlJobData, CrawlJobResult>,
  data: CrawlJobData,
  options: { delay?: number } = {},
): Promise<Job<CrawlJobData, CrawlJobResult>> {
  const job = await queue.add("crawl-onetime", data, {
    delay: options.delay,
    attempts: 3,
    backoff: {
      type: "exponential",
      delay: 60000, // 1 minute
    },
  });

  Logger.info(`Scheduled one-time crawl job: ${job.id}`, { data });

  return job;
}
