/**
 * Orchestrator: one crawl/sync run for one site
 *
 * pending → running → success | failed. Items fail individually and are
 * counted; only a ConfigurationError ends the run early.
 */

import pLimit from "p-limit";
import { performance } from "node:perf_hooks";
import { AppConfig } from "../config/app-config";
import { withDefaults } from "../config/pacing";
import { EXECUTION_CONSTANTS } from "../constants";
import type { JobRepository } from "../database/repositories";
import { errorMessage, isFatal, truncate } from "../errors";
import { Extractor, type DetailPage } from "../extraction/extractor";
import type { FetchEngine } from "../fetch/engine";
import type { BlobStore } from "../media/blob-store";
import type { MediaDownloader } from "../media/downloader";
import type { Renderer } from "../render/bridge";
import type { SyncEngine } from "../sync/sync-service";
import type { Translator } from "../translation/translator";
import { isSuccess } from "../types/fetch";
import type { ScrapeJob } from "../types/job";
import type { SiteProfile } from "../types/site";
import type { LinkCollector } from "../collector/link-collector";
import { chunk } from "../utils/array";
import { formatDuration, nowIso } from "../utils/date";
import { Logger } from "../utils/logger";
import { sleep } from "../utils/retry";

export interface RunOptions {
  /** Cut-off after collection; 0 means no limit. */
  maxItems?: number;
  batchSize?: number;
  batchSleepMs?: number;
  progressEvery?: number;
  /** Store the first detail response of the run through the blob store. */
  debugDump?: boolean;
}

export interface OrchestratorDeps {
  jobs: JobRepository;
  collector: Pick<LinkCollector, "collect">;
  fetcher: Pick<FetchEngine, "fetchBatch">;
  renderer: Renderer;
  syncer: Pick<SyncEngine, "sync">;
  translator?: Translator;
  media?: MediaDownloader;
  blobs?: Pick<BlobStore, "store">;
  sleep?: (ms: number) => Promise<void>;
}

type Counters = Pick<ScrapeJob, "totalFound" | "totalCreated" | "totalUpdated" | "totalFailed">;

type LoadedPage = { url: string; page: DetailPage } | { url: string; page: null; error: string };

export class Orchestrator {
  private readonly sleep: (ms: number) => Promise<void>;
  private firstResponseDumped = false;

  constructor(private readonly deps: OrchestratorDeps) {
    this.sleep = deps.sleep ?? sleep;
  }

  async run(site: SiteProfile, options: RunOptions = {}): Promise<ScrapeJob> {
    const t0 = performance.now();
    const pacing = withDefaults(site.pacing);
    const maxItems = options.maxItems ?? AppConfig.MAX_ITEMS;
    const batchSize = Math.max(1, options.batchSize ?? pacing.batchSize);
    const batchSleepMs = options.batchSleepMs ?? pacing.batchSleepMs;
    const progressEvery = Math.max(0, options.progressEvery ?? AppConfig.PROGRESS_EVERY);
    const debugDump = options.debugDump ?? AppConfig.DEBUG_DUMP;

    const { jobs } = this.deps;
    const job = await jobs.create(site.key);
    await jobs.update(job.id, { status: "running", startedAt: nowIso() });
    Logger.info("Scrape job started", { site: site.key, jobId: job.id });

    const counters: Counters = { totalFound: 0, totalCreated: 0, totalUpdated: 0, totalFailed: 0 };

    try {
      const collected = await this.deps.collector.collect(site, { maxItems });
      counters.totalFound = collected.urls.length;
      await jobs.update(job.id, { totalFound: counters.totalFound });
      if (!collected.exhausted) {
        Logger.warn("Listing stopped before it was exhausted", {
          site: site.key,
          rounds: collected.rounds,
          failedPages: collected.failedPages,
        });
      }

      const extractor = new Extractor(site, {
        fetcher: this.deps.fetcher,
        translator: this.deps.translator,
        media: this.deps.media,
      });
      const batches = chunk(collected.urls, batchSize);
      let processed = 0;
      let consecutiveFailures = 0;
      // set by the first fatal item; queued items of the batch are skipped
      let aborted = false;

      for (let i = 0; i < batches.length; i++) {
        const loaded = await this.loadDetailPages(site, batches[i], debugDump);
        const limit = pLimit(pacing.syncConcurrency);

        await Promise.all(
          loaded.map((item) =>
            limit(async () => {
              if (aborted) return;
              if (pacing.cooldownThreshold > 0 && consecutiveFailures >= pacing.cooldownThreshold) {
                Logger.cooldownActivated(site.key, consecutiveFailures);
                consecutiveFailures = 0;
                await this.sleep(pacing.cooldownSeconds * 1000);
              }

              let ok: boolean;
              try {
                ok = await this.processItem(site, extractor, item, counters);
              } catch (error) {
                aborted = true;
                throw error;
              }
              consecutiveFailures = ok ? 0 : consecutiveFailures + 1;

              processed++;
              if (progressEvery > 0 && processed % progressEvery === 0) {
                const elapsed = (performance.now() - t0) / 1000;
                Logger.batchProgress(site.key, processed, counters.totalFound, elapsed > 0 ? processed / elapsed : 0);
              }
            }),
          ),
        );

        await jobs.update(job.id, counters);
        if (i < batches.length - 1 && batchSleepMs > 0) {
          await this.sleep(batchSleepMs);
        }
      }

      const done = await jobs.update(job.id, { ...counters, status: "success", finishedAt: nowIso() });
      Logger.info("Scrape job finished", {
        site: site.key,
        jobId: job.id,
        ...counters,
        elapsed: formatDuration((performance.now() - t0) / 1000),
      });
      return done;
    } catch (error) {
      Logger.error("Scrape job failed", error, { site: site.key, jobId: job.id });
      return jobs.update(job.id, {
        ...counters,
        status: "failed",
        finishedAt: nowIso(),
        errorMessage: truncate(errorMessage(error), EXECUTION_CONSTANTS.JOB_ERROR_MAX_LENGTH),
      });
    }
  }

  /**
   * Extracts and syncs one item; false when it failed.
   * @throws ConfigurationError, which aborts the run
   */
  private async processItem(
    site: SiteProfile,
    extractor: Extractor,
    item: LoadedPage,
    counters: Counters,
  ): Promise<boolean> {
    if (item.page === null) {
      counters.totalFailed++;
      Logger.itemFailed(site.key, item.url, item.error);
      return false;
    }

    try {
      const product = await extractor.extract(item.page);
      const outcome = await this.deps.syncer.sync(product);
      if (outcome.action === "created") counters.totalCreated++;
      else counters.totalUpdated++;
      return true;
    } catch (error) {
      if (isFatal(error)) throw error;
      counters.totalFailed++;
      Logger.itemFailed(site.key, item.url, error);
      return false;
    }
  }

  private async loadDetailPages(site: SiteProfile, urls: string[], debugDump: boolean): Promise<LoadedPage[]> {
    const detail = site.detail;
    const pacing = withDefaults(site.pacing);
    let loaded: LoadedPage[];

    if (detail.via === "http") {
      const results = await this.deps.fetcher.fetchBatch(urls, pacing.detailConcurrency);
      loaded = urls.map((url): LoadedPage => {
        const result = results.get(url);
        if (!result || !isSuccess(result)) {
          return { url, page: null, error: result?.error ?? "not fetched" };
        }
        return { url, page: { url, finalUrl: result.finalUrl ?? url, html: result.body } };
      });
    } else {
      const limit = pLimit(pacing.detailConcurrency);
      loaded = await Promise.all(
        urls.map((url) =>
          limit(async (): Promise<LoadedPage> => {
            const rendered = await this.deps.renderer.render({
              url,
              waitHint: detail.waitSelector,
              timeoutMs: pacing.renderTimeoutMs,
              interactions: detail.sideChannelName !== undefined,
            });
            if (!rendered.ok) return { url, page: null, error: rendered.error.message };
            return {
              url,
              page: {
                url,
                finalUrl: rendered.page.url,
                html: rendered.page.html,
                sideChannel: rendered.page.sideChannel,
              },
            };
          }),
        ),
      );
    }

    if (debugDump) await this.dumpFirstResponse(site, loaded);
    return loaded;
  }

  /** Once per orchestrator instance. */
  private async dumpFirstResponse(site: SiteProfile, loaded: LoadedPage[]): Promise<void> {
    if (this.firstResponseDumped || !this.deps.blobs) return;
    const first = loaded.find((item) => item.page !== null);
    if (!first?.page) return;

    this.firstResponseDumped = true;
    const stored = await this.deps.blobs.store(Buffer.from(first.page.html, "utf8"), `debug/${site.key}-first-detail.html`);
    Logger.info("Stored first detail response", { site: site.key, url: first.url, path: stored });
  }

  /** Whether this instance already wrote its debug dump. */
  get dumped(): boolean {
    return this.firstResponseDumped;
  }
}
