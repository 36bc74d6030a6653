/**
 * Application constants
 */

// Fetch engine constants
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([
  429, 502, 503, 504, 520, 521, 522, 523, 524,
]);

/** Statuses that get an extra wait on top of the exponential backoff. */
export const THROTTLE_STATUSES: ReadonlySet<number> = new Set([429, 503]);

export const FETCH_CONSTANTS = {
  THROTTLE_FLOOR_MS: 5000,
  JITTER_MIN_MS: 1000,
  JITTER_MAX_MS: 3000,
} as const;

// Render bridge constants
export const CHALLENGE_MARKERS: readonly string[] = [
  "cf-browser-verification",
  "challenge-platform",
  "cf-error-details",
  "Checking your browser before accessing",
  "Just a moment",
];

export const NETWORK_ERROR_PATTERNS: readonly string[] = [
  "timeout",
  "net::ERR",
  "ERR_NAME_NOT_RESOLVED",
  "ERR_INTERNET_DISCONNECTED",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
];

export const RENDER_CONSTANTS = {
  PROCESS_GRACE_MS: 10_000,
  NETWORK_ERROR_FLOOR_MS: 10_000,
} as const;

// Execution constants
export const EXECUTION_CONSTANTS = {
  JOB_ERROR_MAX_LENGTH: 1000,
  DEFAULT_ROUND_RETRIES: 2,
  MAX_LISTING_ROUNDS: 500,
} as const;

// Remote catalog constants
export const CATALOG_CONSTANTS = {
  PER_PAGE: 100,
  MAX_PAGES: 200,
  COLOR_ATTRIBUTE: "Color",
  SIZE_ATTRIBUTE: "Size",
  DEFAULT_WEIGHT_KG: 0.3,
  TAX_RATE: 0.13,
  // Margin by discount band, checked in order; a discount of 0 adds no margin
  PROFIT_TIERS: [
    { maxDiscount: 30, rate: 0.21 },
    { maxDiscount: 60, rate: 0.27 },
    { maxDiscount: 99, rate: 1 },
  ],
} as const;

// Browser-like header pool, rotated per request
export const BROWSER_HEADER_POOL: readonly Record<string, string>[] = [
  {
    "user-agent":
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    accept:
      "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
    "accept-language": "en-US,en;q=0.9",
    "sec-ch-ua-platform": '"Windows"',
  },
  {
    "user-agent":
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15",
    accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "accept-language": "en-US,en;q=0.8",
  },
  {
    "user-agent":
      "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36",
    accept:
      "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
    "accept-language": "en-GB,en;q=0.9",
    "sec-ch-ua-platform": '"Linux"',
  },
];

export const NAVIGATION_HEADERS: Readonly<Record<string, string>> = {
  "accept-encoding": "gzip, deflate, br",
  "upgrade-insecure-requests": "1",
  "sec-fetch-dest": "document",
  "sec-fetch-mode": "navigate",
  "sec-fetch-site": "none",
  "sec-fetch-user": "?1",
  "cache-control": "max-age=0",
};
