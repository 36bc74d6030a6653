/**
 * Canonical product model
 *
 * Every site profile normalizes into these shapes before anything reaches the
 * sync engine.
 */

export interface ProductImage {
  url: string;
  altText: string | null;
  /** Blob-store path once downloaded, null until then or on failure. */
  localPath: string | null;
  /** Featured image of the product; set on the first product image only. */
  isPrimary?: boolean;
}

export interface SizeVariant {
  size: string;
  sku: string | null;
  stockAvailable: boolean;
  /** Overrides the colourway base price when present. */
  price: number | null;
}

export interface ColorwayVariant {
  colourLabel: string;
  colourSlug: string;
  colourCode: string | null;
  swatchUrl: string | null;
  pdpUrl: string | null;
  basePrice: number | null;
  originalPrice: number | null;
  currency: string | null;
  discountPercentage: number | null;
  soldOut: boolean;
  images: ProductImage[];
  sizeVariants: SizeVariant[];
}

/** Ordered colourways; labels are unique and each has at least one size. */
export type VariantMatrix = ColorwayVariant[];

export type ProductStatus = "published" | "out_of_stock";

export interface CanonicalProduct {
  siteId: string;
  /** Site-assigned natural key; (siteId, externalId) identifies the product. */
  externalId: string;
  title: string;
  description: string | null;
  slug: string;
  price: number | null;
  originalPrice: number | null;
  discountPercentage: number | null;
  currency: string | null;
  status: ProductStatus;
  /** Stock flag for single-SKU products; derived from sizes otherwise. */
  inStock: boolean;
  images: ProductImage[];
  /** null means a single-SKU product. */
  variantMatrix: VariantMatrix | null;
  meta: Record<string, string>;
  sourceUrl: string;
}

export interface PriceInfo {
  price: number | null;
  originalPrice: number | null;
  discountPercentage: number | null;
  currency: string | null;
}
