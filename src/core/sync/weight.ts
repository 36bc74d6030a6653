/**
 * Shipping weight guessed from the product name
 */

import { CATALOG_CONSTANTS } from "../constants";
import weightTable from "../data/weight-table.json";

interface WeightRange {
  keyword: string;
  min: number;
  max: number;
}

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const RULES: { pattern: RegExp; kg: number }[] = weightTable.map((range: WeightRange) => ({
  pattern: new RegExp(`\\b${escapeRegExp(range.keyword)}\\b`, "i"),
  kg: Math.round(((range.min + range.max) / 2) * 1000) / 1000,
}));

/** Lower-cased, punctuation to spaces, whitespace collapsed. */
export function normalizeName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ");
}

/**
 * Midpoint of the first matching keyword range, in table order, rounded to
 * grams. Unknown products weigh the default.
 */
export function detectWeight(name: string): number {
  const normalized = normalizeName(name);
  if (!normalized.trim()) return CATALOG_CONSTANTS.DEFAULT_WEIGHT_KG;

  for (const rule of RULES) {
    if (rule.pattern.test(normalized)) return rule.kg;
  }
  return CATALOG_CONSTANTS.DEFAULT_WEIGHT_KG;
}
