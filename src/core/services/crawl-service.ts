/**
 * Crawl Service - reusable entry into the pipeline
 * Used from the CLI, the BullMQ worker and anything else that wants a crawl
 */

import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { DEFAULT_SITES, SITE_CATEGORIES, isCategoryKey, registry } from "../../sites/registry";
import { LinkCollector } from "../collector/link-collector";
import { AppConfig } from "../config/app-config";
import { withDefaults } from "../config/pacing";
import { closeDb, openDb } from "../database/connection";
import {
  SqliteJobRepository,
  SqliteSyncMappingRepository,
  type SyncMappingRepository,
} from "../database/repositories";
import { ConfigurationError, errorMessage, isFatal } from "../errors";
import { Orchestrator, type RunOptions } from "../execution/orchestrator";
import { FetchEngine } from "../fetch/engine";
import { LocalBlobStore, type BlobStore } from "../media/blob-store";
import { MediaDownloader } from "../media/downloader";
import { createRenderer } from "../render/subprocess";
import { AttributeService } from "../sync/attributes";
import {
  pushDescriptions,
  type DescriptionPushOptions,
  type DescriptionPushStats,
} from "../sync/description-push";
import { SyncEngine, type CatalogClient } from "../sync/sync-service";
import { WooCommerceClient } from "../sync/woo-client";
import type { ScrapeJob } from "../types/job";
import type { SiteProfile } from "../types/site";
import { Logger } from "../utils/logger";

export interface CrawlOptions {
  siteKeys?: string[];
  category?: string;
  /** 0 means no limit; unset falls back to MAX_ITEMS. */
  maxItems?: number;
}

export interface CrawlResult {
  siteKey: string;
  success: boolean;
  job?: ScrapeJob;
  error?: string;
}

export type OrchestratorFactory = (site: SiteProfile) => Pick<Orchestrator, "run">;

export interface CrawlContext {
  sites?: ReadonlyMap<string, SiteProfile>;
  /** Builds the pipeline for one site; the default wires the production stack. */
  createOrchestrator?: OrchestratorFactory;
}

/**
 * Site keys to crawl, in order.
 * @throws ConfigurationError for an unknown key or category
 */
export function resolveSiteKeys(
  options: Pick<CrawlOptions, "siteKeys" | "category">,
  sites: ReadonlyMap<string, SiteProfile> = registry,
): string[] {
  let keys: readonly string[];
  if (options.siteKeys && options.siteKeys.length > 0) {
    keys = options.siteKeys;
  } else if (options.category) {
    if (!isCategoryKey(options.category)) {
      throw new ConfigurationError(
        `Unknown category "${options.category}". Available: ${Object.keys(SITE_CATEGORIES).join(", ")}`,
      );
    }
    keys = SITE_CATEGORIES[options.category].sites;
  } else {
    keys = DEFAULT_SITES;
  }

  const unknown = keys.filter((key) => !sites.has(key));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Unknown site(s): ${unknown.join(", ")}. Available: ${Array.from(sites.keys()).join(", ")}`,
    );
  }
  return Array.from(new Set(keys));
}

/**
 * Runs one crawl per site, sequentially. A failing site is recorded and the
 * next one still runs; a ConfigurationError stops the whole crawl.
 */
export async function runCrawl(options: CrawlOptions = {}, context: CrawlContext = {}): Promise<CrawlResult[]> {
  const sites = context.sites ?? registry;
  const keys = resolveSiteKeys(options, sites);
  const runOptions: RunOptions = { maxItems: options.maxItems };
  const results: CrawlResult[] = [];

  Logger.info("Crawl started", { sites: keys, maxItems: options.maxItems ?? AppConfig.MAX_ITEMS });

  for (const key of keys) {
    const site = sites.get(key);
    if (!site) continue;
    Logger.info(`=== Starting site: ${key} ===`);

    try {
      const job = context.createOrchestrator
        ? await context.createOrchestrator(site).run(site, runOptions)
        : await runWithProductionStack(site, runOptions);
      const result: CrawlResult = { siteKey: key, success: job.status === "success", job };
      if (job.errorMessage) result.error = job.errorMessage;
      results.push(result);
      Logger.info(`=== Finished site: ${key} ===`, { status: job.status });
    } catch (error) {
      Logger.error(`Site ${key} failed`, error);
      if (isFatal(error)) throw error;
      results.push({ siteKey: key, success: false, error: errorMessage(error) });
    }
  }

  const failed = results.filter((r) => !r.success).length;
  Logger.info("Crawl finished", { sites: results.length, failed });
  return results;
}

let catalogClient: WooCommerceClient | null = null;
const attributeServices = new WeakMap<CatalogClient, AttributeService>();

/** Catalog client built from config on first use and kept for the process. */
function productionClient(): WooCommerceClient {
  if (!catalogClient) catalogClient = WooCommerceClient.fromConfig();
  return catalogClient;
}

/** One attribute cache per catalog client, shared by every site run in the process. */
export function sharedAttributeService(client: CatalogClient): AttributeService {
  let service = attributeServices.get(client);
  if (!service) {
    service = new AttributeService(client);
    attributeServices.set(client, service);
  }
  return service;
}

export function createSyncEngine(
  client: CatalogClient,
  mappings: SyncMappingRepository,
  blobs?: Pick<BlobStore, "read">,
): SyncEngine {
  return new SyncEngine({ client, mappings, attributes: sharedAttributeService(client), blobs });
}

/** Re-pushes stored translated descriptions through the production database and catalog. */
export async function pushStoredDescriptions(options: DescriptionPushOptions = {}): Promise<DescriptionPushStats> {
  const handles = openDb(AppConfig.DB_PATH);
  try {
    return await pushDescriptions(
      { client: productionClient(), mappings: new SqliteSyncMappingRepository(handles.orm) },
      options,
    );
  } finally {
    closeDb(handles);
  }
}

/** Opens the database for one site run and closes it afterwards. */
async function runWithProductionStack(site: SiteProfile, options: RunOptions): Promise<ScrapeJob> {
  const handles = openDb(AppConfig.DB_PATH);
  try {
    return await buildOrchestrator(site, handles.orm).run(site, options);
  } finally {
    closeDb(handles);
  }
}

function buildOrchestrator(site: SiteProfile, orm: BetterSQLite3Database): Orchestrator {
  const pacing = withDefaults(site.pacing);
  const fetcher = new FetchEngine({
    maxAttempts: pacing.maxRetries,
    timeoutMs: pacing.timeoutMs,
    waveSleepMs: pacing.waveSleepMs,
    headers: site.headers,
    site: site.key,
  });
  const renderer = createRenderer();
  const blobs = new LocalBlobStore(AppConfig.STORAGE_DIR);

  return new Orchestrator({
    jobs: new SqliteJobRepository(orm),
    collector: new LinkCollector({ fetcher, renderer }),
    fetcher,
    renderer,
    media: new MediaDownloader(blobs),
    blobs,
    syncer: createSyncEngine(productionClient(), new SqliteSyncMappingRepository(orm), blobs),
  });
}
