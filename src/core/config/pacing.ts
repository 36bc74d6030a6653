/**
 * Pacing configuration utilities
 */

import type { PacingConfig } from "../types/site";
import { AppConfig } from "./app-config";

const DEFAULTS: Required<PacingConfig> = {
  listingConcurrency: AppConfig.LISTING_CONCURRENCY,
  detailConcurrency: AppConfig.DETAIL_CONCURRENCY,
  colourConcurrency: AppConfig.COLOUR_CONCURRENCY,
  syncConcurrency: AppConfig.SYNC_CONCURRENCY,
  waveSleepMs: AppConfig.WAVE_SLEEP_MS,
  roundSleepMs: 500,
  maxRetries: AppConfig.MAX_RETRIES,
  timeoutMs: AppConfig.FETCH_TIMEOUT_MS,
  renderTimeoutMs: AppConfig.RENDER_TIMEOUT_MS,
  batchSize: AppConfig.BATCH_SIZE,
  batchSleepMs: AppConfig.BATCH_SLEEP_MS,
  cooldownThreshold: 5,
  cooldownSeconds: 120,
};

export function withDefaults(cfg?: PacingConfig): Required<PacingConfig> {
  const c = cfg ?? {};
  return {
    listingConcurrency: Math.max(1, c.listingConcurrency ?? DEFAULTS.listingConcurrency),
    detailConcurrency: Math.max(1, c.detailConcurrency ?? DEFAULTS.detailConcurrency),
    colourConcurrency: Math.max(1, c.colourConcurrency ?? DEFAULTS.colourConcurrency),
    syncConcurrency: Math.max(1, c.syncConcurrency ?? DEFAULTS.syncConcurrency),
    waveSleepMs: c.waveSleepMs ?? DEFAULTS.waveSleepMs,
    roundSleepMs: c.roundSleepMs ?? DEFAULTS.roundSleepMs,
    maxRetries: Math.max(1, c.maxRetries ?? DEFAULTS.maxRetries),
    timeoutMs: c.timeoutMs ?? DEFAULTS.timeoutMs,
    renderTimeoutMs: c.renderTimeoutMs ?? DEFAULTS.renderTimeoutMs,
    batchSize: Math.max(1, c.batchSize ?? DEFAULTS.batchSize),
    batchSleepMs: c.batchSleepMs ?? DEFAULTS.batchSleepMs,
    cooldownThreshold: c.cooldownThreshold ?? DEFAULTS.cooldownThreshold,
    cooldownSeconds: c.cooldownSeconds ?? DEFAULTS.cooldownSeconds,
  };
}
