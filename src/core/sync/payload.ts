/**
 * CanonicalProduct → WooCommerce request bodies
 */

import { resolveSizePrice } from "../extraction/normalize";
import type { CanonicalProduct, ColorwayVariant, ProductStatus, SizeVariant } from "../types/product";
import { priceFields, type PricingRule } from "./pricing";
import { detectWeight } from "./weight";

export type RemoteStatus = "publish" | "draft";
export type StockStatus = "instock" | "outofstock";

export interface ProductAttributePayload {
  id: number;
  position: number;
  visible: boolean;
  variation: boolean;
  options: string[];
}

export interface MetaEntry {
  key: string;
  value: string;
}

export interface ProductPayload {
  name: string;
  description: string;
  type: "simple" | "variable";
  status: RemoteStatus;
  sku: string;
  regular_price?: string;
  sale_price?: string;
  manage_stock: boolean;
  stock_quantity?: number;
  stock_status?: StockStatus;
  weight: string;
  attributes?: ProductAttributePayload[];
  images?: { id: number }[];
  categories?: { id: number }[];
  meta_data: MetaEntry[];
}

export interface VariationPayload {
  attributes: { id: number; option: string }[];
  regular_price?: string;
  sale_price?: string;
  sku: string;
  manage_stock: true;
  stock_quantity: number;
  stock_status: StockStatus;
  weight: string;
  image?: { id: number };
}

export interface PayloadContext {
  attributes: ProductAttributePayload[];
  imageIds: number[];
  categoryIds: number[];
  pricing: PricingRule;
}

const STATUS_MAP: Record<ProductStatus, RemoteStatus> = {
  published: "publish",
  out_of_stock: "draft",
};

export const mapStatus = (status: ProductStatus): RemoteStatus => STATUS_MAP[status];

export function buildMetaData(product: CanonicalProduct): MetaEntry[] {
  const meta = Object.entries(product.meta).map(([key, value]) => ({ key, value }));
  meta.push({ key: "weblink", value: product.sourceUrl });
  return meta;
}

export function buildProductPayload(product: CanonicalProduct, ctx: PayloadContext): ProductPayload {
  const variable = product.variantMatrix !== null;

  const payload: ProductPayload = {
    name: product.title,
    description: product.meta.description_translated || product.description || "",
    type: variable ? "variable" : "simple",
    status: mapStatus(product.status),
    sku: product.externalId,
    manage_stock: !variable,
    weight: String(detectWeight(product.title)),
    meta_data: buildMetaData(product),
  };

  if (variable) {
    payload.attributes = ctx.attributes;
  } else {
    Object.assign(
      payload,
      priceFields(product.price, product.originalPrice, product.discountPercentage, ctx.pricing),
    );
    payload.stock_quantity = product.inStock ? 1 : 0;
    payload.stock_status = product.inStock ? "instock" : "outofstock";
  }

  if (ctx.imageIds.length > 0) payload.images = ctx.imageIds.map((id) => ({ id }));
  if (ctx.categoryIds.length > 0) payload.categories = ctx.categoryIds.map((id) => ({ id }));
  return payload;
}

/** Size sku, else `{externalId}-{first three letters of the colour}-{size}`. */
export function variationSku(externalId: string, colourLabel: string, size: SizeVariant): string {
  return size.sku ?? `${externalId}-${colourLabel.slice(0, 3).toUpperCase()}-${size.size}`;
}

export function variationKey(colour: string, size: string): string {
  return `${colour.trim()}|${size.trim()}`.toLowerCase();
}

export interface VariationContext {
  colorAttributeId: number;
  sizeAttributeId: number;
  imageId: number | null;
  pricing: PricingRule;
}

export function buildVariationPayload(
  product: CanonicalProduct,
  colourway: ColorwayVariant,
  size: SizeVariant,
  ctx: VariationContext,
): VariationPayload {
  const price = resolveSizePrice(size, colourway, product.price);
  const payload: VariationPayload = {
    attributes: [
      { id: ctx.colorAttributeId, option: colourway.colourLabel },
      { id: ctx.sizeAttributeId, option: size.size },
    ],
    ...priceFields(
      price,
      colourway.originalPrice ?? product.originalPrice,
      colourway.discountPercentage ?? product.discountPercentage,
      ctx.pricing,
    ),
    sku: variationSku(product.externalId, colourway.colourLabel, size),
    manage_stock: true,
    stock_quantity: size.stockAvailable ? 1 : 0,
    stock_status: size.stockAvailable ? "instock" : "outofstock",
    weight: String(detectWeight(product.title)),
  };
  if (ctx.imageId !== null) payload.image = { id: ctx.imageId };
  return payload;
}
