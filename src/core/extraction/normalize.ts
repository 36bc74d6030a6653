/**
 * Variant matrix normalization
 *
 * Raw colourway records (embedded state, side channel, per-colour pages) all
 * end up as `ColorwayVariant`. Merging enforces the matrix invariants: unique
 * labels and at least one size per colourway.
 */

import {
  asArray,
  asBoolean,
  asNumber,
  asObjects,
  asString,
  getPath,
  isJsonObject,
  type JsonObject,
  type JsonValue,
} from "../json/value";
import type {
  ColorwayVariant,
  ProductImage,
  ProductStatus,
  SizeVariant,
  VariantMatrix,
} from "../types/product";
import { uniqBy } from "../utils/array";
import { resolveLocation, slugify } from "../utils/url";
import { computeDiscount, resolveDiscount } from "./price";

export interface NormalizeContext {
  origin: string;
  currency: string | null;
}

export function dedupeImages(images: readonly ProductImage[]): ProductImage[] {
  return uniqBy(
    images.filter((img) => img.url !== ""),
    (img) => img.url,
  );
}

/** Size price, then colourway base price, then the product price. */
export function resolveSizePrice(
  size: SizeVariant,
  colourway: Pick<ColorwayVariant, "basePrice">,
  productPrice: number | null = null,
): number | null {
  return size.price ?? colourway.basePrice ?? productPrice;
}

function toImages(value: JsonValue | undefined, fallbackAlt: string | null, origin: string): ProductImage[] {
  const out: ProductImage[] = [];
  for (const item of asArray(value)) {
    const raw = typeof item === "string" ? item : isJsonObject(item) ? asString(item.url) : null;
    const url = raw ? resolveLocation(origin, raw) : null;
    if (!url) continue;
    const alt = isJsonObject(item) ? asString(item.alt) ?? asString(item.altText) : null;
    out.push({ url, altText: alt ?? fallbackAlt, localPath: null });
  }
  return out;
}

/**
 * Normalizes one embedded-state colourway. Returns null when it has no label
 * or no usable size.
 */
export function normalizeColourway(raw: JsonObject, ctx: NormalizeContext): ColorwayVariant | null {
  const label = asString(raw.label) ?? asString(raw.colour);
  if (!label) return null;

  const basePrice = asNumber(getPath(raw, "price.price"));
  const originalPrice = asNumber(getPath(raw, "price.originalPrice"));

  const sizeVariants: SizeVariant[] = [];
  for (const variant of asObjects(raw.variants)) {
    const size = asString(variant.size);
    if (!size) continue;
    sizeVariants.push({
      size,
      sku: asString(variant.id) ?? asString(variant.catentryId),
      stockAvailable: asBoolean(variant.stockAvailability),
      price: asNumber(getPath(variant, "price.price")),
    });
  }
  if (sizeVariants.length === 0) return null;

  const url = asString(raw.url);
  return {
    colourLabel: label,
    colourSlug: slugify(label),
    colourCode: asString(raw.colourCode),
    swatchUrl: asString(raw.swatchUrl) ?? asString(raw.swatch_url),
    pdpUrl: url ? resolveLocation(ctx.origin, url) : null,
    basePrice,
    originalPrice,
    currency: asString(getPath(raw, "price.currency")) ?? ctx.currency,
    discountPercentage: computeDiscount(basePrice, originalPrice),
    soldOut: asBoolean(raw.soldOut),
    images: toImages(raw.images, label, ctx.origin),
    sizeVariants,
  };
}

/**
 * Groups a product whose variants carry a flat `colour` field into one
 * synthetic colourway record per colour, in first-seen order.
 */
export function groupVariantsByColour(product: JsonObject): JsonObject[] {
  const grouped = new Map<string, { record: JsonObject; variants: JsonObject[] }>();

  for (const variant of asObjects(product.variants)) {
    const colour = asString(variant.colour);
    if (!colour) continue;

    let entry = grouped.get(colour);
    if (!entry) {
      entry = {
        record: {
          id: product.id ?? null,
          colourCode: product.colourCode ?? null,
          label: colour,
          colour,
          mainColour: product.mainColour ?? null,
          url: product.url ?? null,
          soldOut: product.soldOut ?? false,
          price: product.price ?? null,
        },
        variants: [],
      };
      grouped.set(colour, entry);
    }
    entry.variants.push(variant);
  }

  return Array.from(grouped.values(), ({ record, variants }) => ({ ...record, variants }));
}

/**
 * Enforces unique labels (later duplicates merge into the first: new sizes
 * appended, images deduped) and drops colourways left without sizes.
 */
export function mergeColourways(colourways: readonly ColorwayVariant[]): VariantMatrix {
  const byLabel = new Map<string, ColorwayVariant>();

  for (const cw of colourways) {
    const existing = byLabel.get(cw.colourLabel);
    if (!existing) {
      byLabel.set(cw.colourLabel, {
        ...cw,
        images: dedupeImages(cw.images),
        sizeVariants: uniqBy(cw.sizeVariants, (s) => s.size),
      });
      continue;
    }

    const known = new Set(existing.sizeVariants.map((s) => s.size));
    for (const size of cw.sizeVariants) {
      if (known.has(size.size)) continue;
      known.add(size.size);
      existing.sizeVariants.push(size);
    }
    existing.images = dedupeImages([...existing.images, ...cw.images]);
    existing.colourCode ??= cw.colourCode;
    existing.swatchUrl ??= cw.swatchUrl;
    existing.pdpUrl ??= cw.pdpUrl;
    existing.basePrice ??= cw.basePrice;
    existing.originalPrice ??= cw.originalPrice;
    existing.currency ??= cw.currency;
    existing.discountPercentage ??= cw.discountPercentage;
  }

  return Array.from(byLabel.values()).filter((cw) => cw.sizeVariants.length > 0);
}

/**
 * Converts the render worker's colour-variation block:
 * `{ "<colour>": { images, sizes: { available, unavailable }, price, discount_price, discount_percent } }`.
 */
export function sideChannelToColourways(value: JsonValue | undefined, ctx: NormalizeContext): ColorwayVariant[] {
  if (!isJsonObject(value)) return [];
  const out: ColorwayVariant[] = [];

  for (const [title, data] of Object.entries(value)) {
    const label = title.trim();
    if (!label || !isJsonObject(data)) continue;

    const listPrice = asNumber(data.price);
    const salePrice = asNumber(data.discount_price);
    const basePrice = salePrice ?? listPrice;
    const originalPrice = salePrice !== null && listPrice !== null && listPrice > salePrice ? listPrice : null;

    const sizeVariants: SizeVariant[] = [];
    const addSizes = (list: JsonValue | undefined, stockAvailable: boolean): void => {
      for (const item of asArray(list)) {
        const size = asString(item);
        if (size) sizeVariants.push({ size, sku: null, stockAvailable, price: null });
      }
    };
    addSizes(getPath(data, "sizes.available"), true);
    addSizes(getPath(data, "sizes.unavailable"), false);

    out.push({
      colourLabel: label,
      colourSlug: slugify(label),
      colourCode: null,
      swatchUrl: null,
      pdpUrl: null,
      basePrice,
      originalPrice,
      currency: ctx.currency,
      discountPercentage: resolveDiscount(asNumber(data.discount_percent), basePrice, originalPrice),
      soldOut: false,
      images: toImages(data.images, label, ctx.origin),
      sizeVariants: uniqBy(sizeVariants, (s) => s.size),
    });
  }
  return out;
}

/** All product images: base images first, then each colourway's, deduped by URL. The first one is primary. */
export function collectProductImages(
  baseImages: readonly ProductImage[],
  matrix: VariantMatrix | null,
): ProductImage[] {
  const colourImages = (matrix ?? []).flatMap((cw) => cw.images);
  return dedupeImages([...baseImages, ...colourImages]).map((img, i) => ({ ...img, isPrimary: i === 0 }));
}

/** Out of stock only when every size of every colourway is unavailable. */
export function deriveStatus(matrix: VariantMatrix | null, inStock: boolean): ProductStatus {
  if (matrix && matrix.length > 0) {
    const anyAvailable = matrix.some((cw) => cw.sizeVariants.some((s) => s.stockAvailable));
    return anyAvailable ? "published" : "out_of_stock";
  }
  return inStock ? "published" : "out_of_stock";
}
