/**
 * Remote price calculation
 *
 * flat:   price × multiplier, with the original price kept as regular_price
 *         and the current one as sale_price
 * tiered: (price + margin + tax) × multiplier as regular_price only, the
 *         margin rate picked by the discount band
 */

import { CATALOG_CONSTANTS } from "../constants";
import { round2 } from "../extraction/price";

export const PRICING_MODES = ["flat", "tiered"] as const;
export type PricingMode = (typeof PRICING_MODES)[number];

export interface PricingRule {
  mode: PricingMode;
  multiplier: number;
}

export interface PriceFields {
  regular_price?: string;
  sale_price?: string;
}

/** Whole percent in 1..99, or 0 when there is no discount. */
export function clampDiscount(discount: number | null): number {
  if (discount === null || !Number.isFinite(discount) || discount <= 0) return 0;
  return Math.min(99, Math.max(1, Math.round(discount)));
}

export function profitRate(discount: number | null): number {
  const percent = clampDiscount(discount);
  if (percent === 0) return 0;
  return CATALOG_CONSTANTS.PROFIT_TIERS.find((tier) => percent <= tier.maxDiscount)?.rate ?? 0;
}

export function calculateFinalPrice(price: number, discount: number | null, rule: PricingRule): number {
  if (rule.mode === "flat") return round2(price * rule.multiplier);
  const margin = price * profitRate(discount);
  const tax = price * CATALOG_CONSTANTS.TAX_RATE;
  return round2((price + margin + tax) * rule.multiplier);
}

/**
 * Price fields for a product or variation body; empty when there is no
 * positive price.
 */
export function priceFields(
  price: number | null,
  originalPrice: number | null,
  discount: number | null,
  rule: PricingRule,
): PriceFields {
  if (price === null || price <= 0) return {};
  const format = (value: number): string => String(calculateFinalPrice(value, discount, rule));

  if (rule.mode === "tiered") return { regular_price: format(price) };
  if (originalPrice !== null && originalPrice > price) {
    return { regular_price: format(originalPrice), sale_price: format(price) };
  }
  return { regular_price: format(price) };
}
