/**
 * Link collector: turns a site's listing into a deduplicated list of
 * detail-page URLs.
 *
 * JSON listings are walked in rounds of `concurrency` consecutive pages. A
 * round that brings no new links ends collection, unless some of its pages
 * failed, in which case the round is re-issued up to `roundRetries` times.
 */

import * as cheerio from "cheerio";
import { EXECUTION_CONSTANTS } from "../constants";
import { withDefaults } from "../config/pacing";
import type { FetchEngine } from "../fetch/engine";
import { isJsonObject, parseJson, type JsonValue } from "../json/value";
import { collectAll } from "../json/search";
import type { Renderer } from "../render/bridge";
import type { ApiListing, RenderedListing, SiteProfile } from "../types/site";
import { Logger } from "../utils/logger";
import { sleep } from "../utils/retry";
import { dedupeExact, dedupeProductUrls, resolveLocation } from "../utils/url";

export interface CollectOptions {
  /** Pages per round; defaults to the site's listing concurrency. */
  concurrency?: number;
  /** Cut-off applied after dedup; 0 means no limit. */
  maxItems?: number;
}

export interface CollectResult {
  urls: string[];
  /** False when collection stopped on failures rather than an empty listing. */
  exhausted: boolean;
  rounds: number;
  failedPages: number;
}

export interface LinkCollectorDeps {
  fetcher: Pick<FetchEngine, "fetchBatch">;
  renderer: Renderer;
  sleep?: (ms: number) => Promise<void>;
}

/** Product links found in one listing page. Pages may hold objects or plain strings. */
export function extractApiLinks(
  page: JsonValue,
  linkFields: readonly string[],
  origin: string,
): string[] {
  const holders = collectAll(
    page,
    (node) => isJsonObject(node) && linkFields.some((f) => Object.prototype.hasOwnProperty.call(node, f)),
  );
  const links: string[] = [];

  for (const holder of holders) {
    if (!isJsonObject(holder)) continue;
    for (const field of linkFields) {
      const value = holder[field];
      let raw: string | null = null;
      if (typeof value === "string") {
        raw = value;
      } else if (isJsonObject(value)) {
        const nested = value.url ?? value.path;
        raw = typeof nested === "string" ? nested : null;
      }
      const resolved = raw ? resolveLocation(origin, raw) : null;
      if (resolved) {
        links.push(resolved);
        break;
      }
    }
  }
  return links;
}

export function extractHtmlLinks(html: string, selector: string, origin: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];
  $(selector).each((_, el) => {
    const href = $(el).attr("href");
    const resolved = href ? resolveLocation(origin, href) : null;
    if (resolved) links.push(resolved);
  });
  return links;
}

export function buildPageUrl(listing: ApiListing, offset: number): string {
  const u = new URL(listing.endpoint);
  for (const [key, value] of Object.entries(listing.query ?? {})) {
    u.searchParams.set(key, value);
  }
  u.searchParams.set(listing.offsetParam, String(offset));
  u.searchParams.set(listing.countParam, String(listing.pageSize));
  return u.toString();
}

export class LinkCollector {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: LinkCollectorDeps) {
    this.sleep = deps.sleep ?? sleep;
  }

  async collect(site: SiteProfile, options: CollectOptions = {}): Promise<CollectResult> {
    const started = Date.now();
    const pacing = withDefaults(site.pacing);
    const concurrency = Math.max(1, options.concurrency ?? pacing.listingConcurrency);

    const raw =
      site.listing.kind === "api"
        ? await this.collectApi(site, site.listing, concurrency, pacing.roundSleepMs)
        : await this.collectRendered(site, site.listing);

    const pattern = site.productUrlPattern;
    const filtered = pattern ? raw.urls.filter((url) => pattern.test(url)) : raw.urls;

    let urls = dedupeProductUrls(filtered);
    const maxItems = options.maxItems ?? 0;
    if (maxItems > 0 && urls.length > maxItems) {
      urls = urls.slice(0, maxItems);
    }

    Logger.collectComplete(site.key, urls.length, Date.now() - started);
    return { ...raw, urls };
  }

  private async collectApi(
    site: SiteProfile,
    listing: ApiListing,
    concurrency: number,
    roundSleepMs: number,
  ): Promise<CollectResult> {
    const roundRetries = listing.roundRetries ?? EXECUTION_CONSTANTS.DEFAULT_ROUND_RETRIES;
    const seen = new Set<string>();
    const ordered: string[] = [];
    let offset = 0;
    let retriesLeft = roundRetries;
    let rounds = 0;
    let failedPages = 0;
    let exhausted = false;

    while (rounds < EXECUTION_CONSTANTS.MAX_LISTING_ROUNDS) {
      rounds++;
      const pages = Array.from({ length: concurrency }, (_, i) =>
        buildPageUrl(listing, offset + i * listing.pageSize),
      );
      const results = await this.deps.fetcher.fetchBatch(pages, concurrency);

      let newLinks = 0;
      let failedInRound = 0;
      for (const pageUrl of pages) {
        const result = results.get(pageUrl);
        const body = result?.body ?? null;
        const parsed = body === null ? null : parseJson(body);
        if (parsed === null) {
          failedInRound++;
          Logger.warn("Listing page failed", {
            site: site.key,
            url: pageUrl,
            error: result?.error ?? "unparseable listing response",
          });
          continue;
        }
        for (const link of extractApiLinks(parsed, listing.linkFields, site.origin)) {
          if (seen.has(link)) continue;
          seen.add(link);
          ordered.push(link);
          newLinks++;
        }
      }
      failedPages += failedInRound;

      Logger.debug(`Listing round ${rounds}`, {
        site: site.key,
        offset,
        newLinks,
        failed: failedInRound,
        total: ordered.length,
      });

      if (newLinks === 0) {
        if (failedInRound === 0) {
          exhausted = true;
          break;
        }
        if (retriesLeft > 0) {
          retriesLeft--;
          Logger.warn("Empty listing round had failures, retrying round", {
            site: site.key,
            offset,
            retriesLeft,
          });
          await this.sleep(roundSleepMs);
          continue;
        }
        Logger.warn("Listing stopped on failures; collection may be incomplete", {
          site: site.key,
          offset,
          count: ordered.length,
        });
        break;
      }

      retriesLeft = roundRetries;
      offset += concurrency * listing.pageSize;
      await this.sleep(roundSleepMs);
    }

    return { urls: dedupeExact(ordered), exhausted, rounds, failedPages };
  }

  private async collectRendered(site: SiteProfile, listing: RenderedListing): Promise<CollectResult> {
    const u = new URL(listing.url);
    u.searchParams.set(listing.countParam, String(listing.targetCount));

    const result = await this.deps.renderer.render({
      url: u.toString(),
      waitHint: listing.waitSelector,
    });
    if (!result.ok) {
      Logger.warn("Listing render failed", {
        site: site.key,
        url: u.toString(),
        error: result.error.message,
      });
      return { urls: [], exhausted: false, rounds: 1, failedPages: 1 };
    }

    const urls = extractHtmlLinks(result.page.html, listing.linkSelector, site.origin);
    return { urls: dedupeExact(urls), exhausted: true, rounds: 1, failedPages: 0 };
  }
}
