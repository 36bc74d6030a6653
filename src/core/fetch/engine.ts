/**
 * Fetch engine: bounded-concurrency waves of HTTP requests with retry/backoff
 */

import {
  BROWSER_HEADER_POOL,
  FETCH_CONSTANTS,
  NAVIGATION_HEADERS,
  RETRYABLE_STATUSES,
  THROTTLE_STATUSES,
} from "../constants";
import { AppConfig } from "../config/app-config";
import { errorMessage, TransientNetworkError } from "../errors";
import type { FetchResult, HttpResponse, HttpTransport } from "../types/fetch";
import { chunk, uniq } from "../utils/array";
import { Logger } from "../utils/logger";
import {
  exponentialBackoffMs,
  RetryError,
  sleep,
  withRetry,
  type BackoffOptions,
} from "../utils/retry";
import { fetchTransport } from "./transport";

export interface FetchEngineOptions {
  transport?: HttpTransport;
  /** Total attempts per URL, the first one included. */
  maxAttempts?: number;
  timeoutMs?: number;
  waveSleepMs?: number;
  backoff?: BackoffOptions;
  /** Extra wait added on 429/503. */
  throttleFloorMs?: number;
  /** Site headers merged over the rotating browser headers (Referer, Origin...). */
  headers?: Record<string, string>;
  sleep?: (ms: number) => Promise<void>;
  site?: string;
}

export interface RequestInit {
  method?: "GET" | "POST";
  body?: string;
  headers?: Record<string, string>;
}

/** Non-retryable HTTP status; surfaces as an item-level failure. */
class HttpStatusError extends Error {
  constructor(public readonly status: number) {
    super(`HTTP ${status}`);
    this.name = "HttpStatusError";
  }
}

export class FetchEngine {
  private readonly transport: HttpTransport;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly waveSleepMs: number;
  private readonly backoff: BackoffOptions;
  private readonly throttleFloorMs: number;
  private readonly siteHeaders: Record<string, string>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly site: string | undefined;
  private headerCursor = 0;

  constructor(options: FetchEngineOptions = {}) {
    this.transport = options.transport ?? fetchTransport;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? AppConfig.MAX_RETRIES);
    this.timeoutMs = options.timeoutMs ?? AppConfig.FETCH_TIMEOUT_MS;
    this.waveSleepMs = options.waveSleepMs ?? AppConfig.WAVE_SLEEP_MS;
    this.backoff = options.backoff ?? {
      base: AppConfig.RETRY_BASE,
      jitterMinMs: FETCH_CONSTANTS.JITTER_MIN_MS,
      jitterMaxMs: FETCH_CONSTANTS.JITTER_MAX_MS,
    };
    this.throttleFloorMs = options.throttleFloorMs ?? FETCH_CONSTANTS.THROTTLE_FLOOR_MS;
    this.siteHeaders = options.headers ?? {};
    this.sleep = options.sleep ?? sleep;
    this.site = options.site;
  }

  /** Next header set from the fixed pool, round-robin. */
  nextHeaders(): Record<string, string> {
    const base = BROWSER_HEADER_POOL[this.headerCursor % BROWSER_HEADER_POOL.length];
    this.headerCursor++;
    return { ...base, ...NAVIGATION_HEADERS, ...this.siteHeaders };
  }

  /** Delay before the attempt following `attempt` (1-based). */
  retryDelayMs(attempt: number, error: Error): number {
    const delay = exponentialBackoffMs(attempt, this.backoff);
    if (error instanceof TransientNetworkError && error.status !== null && THROTTLE_STATUSES.has(error.status)) {
      return delay + Math.max(this.throttleFloorMs, error.retryAfterMs ?? 0);
    }
    return delay;
  }

  /**
   * Fetches one URL, retrying transient failures up to the attempt ceiling.
   * Never throws: failures are reported through `FetchResult.error`.
   */
  async fetchOne(url: string, init: RequestInit = {}): Promise<FetchResult> {
    let attempts = 0;
    let lastStatus: number | null = null;

    try {
      const response = await withRetry(
        async (attempt) => {
          attempts = attempt;
          const r = await this.request(url, init);
          lastStatus = r.status;
          if (r.status >= 200 && r.status < 300) return r;
          if (RETRYABLE_STATUSES.has(r.status)) {
            throw new TransientNetworkError(`HTTP ${r.status}`, {
              status: r.status,
              retryAfterMs: r.retryAfterSeconds === null ? null : r.retryAfterSeconds * 1000,
            });
          }
          throw new HttpStatusError(r.status);
        },
        {
          maxAttempts: this.maxAttempts,
          delayMs: (attempt, error) => this.retryDelayMs(attempt, error),
          retryCondition: (error) => error instanceof TransientNetworkError,
          onRetry: (attempt, error, delayMs) =>
            Logger.debug(`Retrying ${url}`, {
              site: this.site,
              url,
              attempt,
              delayMs,
              error: error.message,
            }),
          sleep: this.sleep,
        },
      );

      return Object.freeze({
        url,
        finalUrl: response.url,
        statusCode: response.status,
        body: response.body,
        contentType: response.contentType,
        error: null,
        attempts,
      });
    } catch (error) {
      const cause = error instanceof RetryError ? error.originalError : error;
      return Object.freeze({
        url,
        finalUrl: null,
        statusCode: lastStatus,
        body: null,
        contentType: null,
        error: errorMessage(cause),
        attempts,
      });
    }
  }

  /**
   * Yields one result map per wave of at most `concurrency` requests. Each
   * wave settles completely before the next one starts.
   */
  async *fetchWaves(
    urls: readonly string[],
    concurrency: number,
    init: RequestInit = {},
  ): AsyncGenerator<Map<string, FetchResult>> {
    const waves = chunk(uniq(urls), concurrency);
    for (let i = 0; i < waves.length; i++) {
      const results = await Promise.all(waves[i].map((url) => this.fetchOne(url, init)));
      yield new Map(results.map((r) => [r.url, r]));

      if (i < waves.length - 1 && this.waveSleepMs > 0) {
        await this.sleep(this.waveSleepMs);
      }
    }
  }

  async fetchBatch(
    urls: readonly string[],
    concurrency: number,
    init: RequestInit = {},
  ): Promise<Map<string, FetchResult>> {
    const all = new Map<string, FetchResult>();
    for await (const wave of this.fetchWaves(urls, concurrency, init)) {
      for (const [url, result] of wave) all.set(url, result);
    }
    return all;
  }

  private request(url: string, init: RequestInit): Promise<HttpResponse> {
    const headers = { ...this.nextHeaders(), ...init.headers };
    if (init.body !== undefined && !("content-type" in headers)) {
      headers["content-type"] = "application/json";
    }
    return this.transport({
      url,
      method: init.method ?? "GET",
      headers,
      body: init.body,
      timeoutMs: this.timeoutMs,
    });
  }
}
