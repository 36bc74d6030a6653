/**
 * Site profile types
 *
 * A profile is the only per-site input to the pipeline: where listings live,
 * how detail pages are fetched and which selectors feed each field.
 */

/** Pacing/rate-limiting per site */
export interface PacingConfig {
  listingConcurrency?: number;
  detailConcurrency?: number;
  colourConcurrency?: number;
  syncConcurrency?: number;
  waveSleepMs?: number;
  roundSleepMs?: number;
  maxRetries?: number;
  timeoutMs?: number;
  renderTimeoutMs?: number;
  batchSize?: number;
  batchSleepMs?: number;
  cooldownThreshold?: number;
  cooldownSeconds?: number;
}

/** Paginated JSON category API, walked with an offset/anchor cursor. */
export interface ApiListing {
  kind: "api";
  endpoint: string;
  offsetParam: string;
  countParam: string;
  pageSize: number;
  /** Object keys whose string values are product links (searched recursively). */
  linkFields: string[];
  /** Extra fixed query parameters sent with every page. */
  query?: Record<string, string>;
  /** Max consecutive re-tries of a round that yielded nothing because of failures. */
  roundRetries?: number;
}

/** HTML listing rendered once with an item-count parameter ("load all"). */
export interface RenderedListing {
  kind: "rendered_html";
  url: string;
  countParam: string;
  targetCount: number;
  linkSelector: string;
  waitSelector?: string;
}

export type ListingStrategy = ApiListing | RenderedListing;

export interface DetailSelectors {
  title: string[];
  description: string[];
  price: string[];
  originalPrice: string[];
  discount: string[];
  images: string[];
  sizes: string[];
  colourLinks: string[];
  colourLabel: string[];
  externalId?: string[];
  /** Any match marks a single-SKU product as out of stock. */
  outOfStock?: string[];
  /** Container of collapsible detail sections (fit, fabric, care). */
  accordion?: string[];
}

export interface DetailStrategy {
  via: "http" | "render";
  selectors: DetailSelectors;
  /** Selector of the script tag holding the server-rendered state blob. */
  embeddedStateSelector?: string;
  /** Follow per-colour links to collect colour-specific images and sizes. */
  colourPages?: boolean;
  /** Side-channel block name the render worker prints for colour variations. */
  sideChannelName?: string;
  waitSelector?: string;
  /** Class marking an unavailable size tile. */
  sizeDisabledClass?: string;
}

export interface SiteProfile {
  key: string;
  displayName: string;
  origin: string;
  currency: string;
  listing: ListingStrategy;
  detail: DetailStrategy;
  /** Only links matching this pattern are treated as product pages. */
  productUrlPattern?: RegExp;
  /** Site-specific headers merged over the rotating browser header set. */
  headers?: Record<string, string>;
  pacing?: PacingConfig;
}
