/**
 * Centralized application configuration
 *
 * Values are read once, when the module is first imported. Entry points load
 * `.env` through `dotenv/config` before anything else.
 */

import { PRICING_MODES } from "../sync/pricing";
import { envBool, envFloat, envInt, envOneOf, envStr } from "./env";

export class AppConfig {
  // Database configuration
  static readonly DB_PATH = envStr("DB_PATH", "state/catalog-sync.sqlite");

  // Blob storage (downloaded images, debug dumps)
  static readonly STORAGE_DIR = envStr("STORAGE_DIR", "storage");

  // Fetch engine
  static readonly MAX_RETRIES = envInt("MAX_RETRIES", 5);
  static readonly RETRY_BASE = envFloat("RETRY_BASE", 2);
  static readonly FETCH_TIMEOUT_MS = envInt("FETCH_TIMEOUT_MS", 60_000);
  static readonly WAVE_SLEEP_MS = envInt("WAVE_SLEEP_MS", 500);

  // Concurrency
  static readonly LISTING_CONCURRENCY = envInt("LISTING_CONCURRENCY", 5);
  static readonly DETAIL_CONCURRENCY = envInt("DETAIL_CONCURRENCY", 20);
  static readonly COLOUR_CONCURRENCY = envInt("COLOUR_CONCURRENCY", 8);
  static readonly SYNC_CONCURRENCY = envInt("SYNC_CONCURRENCY", 2);

  // Execution
  static readonly MAX_ITEMS = envInt("MAX_ITEMS", 0);
  static readonly BATCH_SIZE = envInt("BATCH_SIZE", 200);
  static readonly BATCH_SLEEP_MS = envInt("BATCH_SLEEP_MS", 1000);
  static readonly PROGRESS_EVERY = envInt("PROGRESS_EVERY", 50);
  static readonly DEBUG_DUMP = envBool("DEBUG_DUMP", false);

  // Render bridge
  static readonly RENDER_COMMAND = envStr("RENDER_COMMAND", "");
  static readonly RENDER_INTERACTIVE_COMMAND = envStr("RENDER_INTERACTIVE_COMMAND", "");
  static readonly RENDER_TIMEOUT_MS = envInt("RENDER_TIMEOUT_MS", 120_000);

  // Remote catalog
  static readonly WORDPRESS_BASE_URL = envStr("WORDPRESS_BASE_URL", "");
  static readonly WORDPRESS_CONSUMER_KEY = envStr("WORDPRESS_CONSUMER_KEY", "");
  static readonly WORDPRESS_CONSUMER_SECRET = envStr("WORDPRESS_CONSUMER_SECRET", "");
  static readonly WORDPRESS_API_VERSION = envStr("WORDPRESS_API_VERSION", "wc/v3");
  static readonly WORDPRESS_USERNAME = envStr("WORDPRESS_USERNAME", "");
  static readonly WORDPRESS_APP_PASSWORD = envStr("WORDPRESS_APP_PASSWORD", "");
  static readonly WORDPRESS_DEFAULT_CATEGORY = envStr("WORDPRESS_DEFAULT_CATEGORY", "");
  static readonly PRICE_MULTIPLIER = envFloat("PRICE_MULTIPLIER", 1);
  static readonly PRICING_MODE = envOneOf("PRICING_MODE", PRICING_MODES, "flat");
  static readonly REMOTE_TIMEOUT_MS = envInt("REMOTE_TIMEOUT_MS", 30_000);

  // Queue
  static readonly REDIS_HOST = envStr("REDIS_HOST", "localhost");
  static readonly REDIS_PORT = envInt("REDIS_PORT", 6379);
  static readonly REDIS_PASSWORD = process.env.REDIS_PASSWORD;
  static readonly HEALTH_PORT = envInt("HEALTH_PORT", 8080);
  static readonly CRAWL_CRON = envStr("CRAWL_CRON", "0 2 * * *"); // daily at 2 AM
}
