// src/core/extraction/price.ts

const PRICE_RE = /(?:CAD|USD|EUR|GBP|\$|€|£)?\s*([\d,]+\.?\d*)/;
const PERCENT_RE = /(\d+(?:\.\d+)?)\s*%/;

/** Plausible range for a scraped price; anything outside is treated as noise. */
export const PRICE_BOUNDS = { min: 10, max: 10_000 } as const;

export const parsePrice = (txt?: string | null): number | null => {
  if (!txt) return null;
  const m = txt.trim().match(PRICE_RE);
  if (!m) return null;
  const v = parseFloat(m[1].replace(/,/g, ""));
  return Number.isFinite(v) ? v : null;
};

export const parsePercent = (txt?: string | null): number | null => {
  if (!txt) return null;
  const m = txt.match(PERCENT_RE);
  return m ? parseFloat(m[1]) : null;
};

export function inPriceBounds(value: number | null): value is number {
  return value !== null && value >= PRICE_BOUNDS.min && value <= PRICE_BOUNDS.max;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** `round(100 × (1 − sale/original), 2)`, or null unless original > sale > 0. */
export function computeDiscount(sale: number | null, original: number | null): number | null {
  if (sale === null || original === null) return null;
  if (sale <= 0 || original <= sale) return null;
  return round2(100 * (1 - sale / original));
}

/** Keeps an explicit discount; derives one from the prices otherwise. */
export function resolveDiscount(
  explicit: number | null,
  sale: number | null,
  original: number | null,
): number | null {
  return explicit ?? computeDiscount(sale, original);
}
