/**
 * Server-rendered state blobs (`__NEXT_DATA__` and similar)
 *
 * Known paths are tried first; otherwise a bounded shape search locates the
 * colourway array, the current product and its related products.
 */

import * as cheerio from "cheerio";
import {
  asArray,
  asString,
  getPath,
  has,
  isJsonArray,
  isJsonObject,
  parseJson,
  type JsonObject,
  type JsonValue,
} from "../json/value";
import { findByPathsOrShape, findFirst } from "../json/search";
import type { ColorwayVariant } from "../types/product";
import { groupVariantsByColour, normalizeColourway, type NormalizeContext } from "./normalize";

export const DEFAULT_STATE_SELECTOR = "script#__NEXT_DATA__";

const COLOURWAY_PATHS = [
  "props.pageProps.product.colourways",
  "props.pageProps.colourways",
  "props.pageProps.productData.colourways",
  "query.product.colourways",
];

const PRODUCT_PATHS = [
  "props.pageProps.product",
  "props.pageProps.productData",
  "query.product",
  "props.pageProps.initialProduct",
];

const RELATED_PATHS = [
  "props.pageProps.product.relatedProducts",
  "props.pageProps.relatedProducts",
  "props.pageProps.productData.relatedProducts",
  "query.product.relatedProducts",
];

export function readEmbeddedState(html: string, selector = DEFAULT_STATE_SELECTOR): JsonValue | null {
  const $ = cheerio.load(html);
  const text = $(selector).first().text().trim();
  return text ? parseJson(text) : null;
}

function firstVariant(node: JsonObject): JsonObject | null {
  const first = asArray(node.variants)[0];
  return isJsonObject(first) ? first : null;
}

const hasSizeAndStock = (v: JsonObject | null): boolean =>
  v !== null && has(v, "size") && has(v, "stockAvailability");

/** Array whose first element has an id, a colour-ish field and size/stock variants. */
export function looksLikeColourways(node: JsonValue): boolean {
  if (!isJsonArray(node) || node.length === 0) return false;
  const first = node[0];
  if (!isJsonObject(first)) return false;
  if (!has(first, "id")) return false;
  if (!(has(first, "colour") || has(first, "label") || has(first, "colourCode"))) return false;
  return hasSizeAndStock(firstVariant(first));
}

/** Single product (or colourway) object whose variants carry size and stock. */
export function looksLikeProduct(node: JsonValue): boolean {
  if (!isJsonObject(node)) return false;
  return hasSizeAndStock(firstVariant(node));
}

export function findColourways(root: JsonValue): JsonObject[] {
  const hit = findByPathsOrShape(root, COLOURWAY_PATHS, looksLikeColourways);
  return hit === null ? [] : asArray(hit).filter(isJsonObject);
}

export function findCurrentProduct(root: JsonValue): JsonObject | null {
  const hit = findByPathsOrShape(root, PRODUCT_PATHS, looksLikeProduct, { descendArrays: false });
  return isJsonObject(hit) ? hit : null;
}

export function findRelatedProducts(root: JsonValue): JsonObject[] {
  for (const path of RELATED_PATHS) {
    const value = getPath(root, path);
    if (isJsonArray(value) && value.length > 0) return value.filter(isJsonObject);
  }
  const holder = findFirst(
    root,
    (node) => isJsonObject(node) && asArray(node.relatedProducts).length > 0,
  );
  return isJsonObject(holder) ? asArray(holder.relatedProducts).filter(isJsonObject) : [];
}

const idOf = (node: JsonObject): string | null => asString(node.id) ?? asString(node.catentryId);
const labelOf = (node: JsonObject): string | null => asString(node.label) ?? asString(node.colour);

function alreadyIncluded(list: readonly JsonObject[], candidate: JsonObject): boolean {
  const id = idOf(candidate);
  const label = labelOf(candidate);
  if (!id && !label) return false;
  return list.some((cw) => (id !== null && idOf(cw) === id) || (label !== null && labelOf(cw) === label));
}

/**
 * Raw colourway records found in the state blob: the colourway array, then
 * the current product (grouped when its variants are flat), then related
 * products that carry variants.
 */
export function collectRawColourways(root: JsonValue): JsonObject[] {
  const colourways = [...findColourways(root)];

  const current = findCurrentProduct(root);
  if (current) {
    const flat = firstVariant(current);
    if (flat !== null && has(flat, "colour")) {
      for (const grouped of groupVariantsByColour(current)) {
        const label = labelOf(grouped);
        if (!label || !colourways.some((cw) => labelOf(cw) === label)) {
          colourways.push(grouped);
        }
      }
    } else if (!alreadyIncluded(colourways, current)) {
      colourways.push(current);
    }
  }

  for (const related of findRelatedProducts(root)) {
    if (alreadyIncluded(colourways, related)) continue;
    if (asArray(related.variants).length > 0) colourways.push(related);
  }

  return colourways;
}

/** Normalized colourways from a state blob, before merging. */
export function extractEmbeddedColourways(root: JsonValue, ctx: NormalizeContext): ColorwayVariant[] {
  const out: ColorwayVariant[] = [];
  for (const raw of collectRawColourways(root)) {
    const cw = normalizeColourway(raw, ctx);
    if (cw) out.push(cw);
  }
  return out;
}

/** Product-level fields the state blob may carry. */
export function embeddedProductFields(root: JsonValue): {
  title: string | null;
  description: string | null;
  externalId: string | null;
} {
  const product = findCurrentProduct(root);
  if (!product) return { title: null, description: null, externalId: null };
  return {
    title: asString(product.name) ?? asString(product.title),
    description: asString(product.description),
    externalId: asString(product.styleNumber) ?? asString(product.productCode),
  };
}
