/**
 * Sync engine: upserts one CanonicalProduct into the remote catalog
 *
 * NEW → CREATING → SYNCED | FAILED when no remote id is stored,
 * EXISTING → UPDATING → SYNCED | FAILED otherwise. The mapping is written on
 * every attempt, failed ones included.
 */

import path from "node:path";
import { AppConfig } from "../config/app-config";
import { EXECUTION_CONSTANTS } from "../constants";
import type { SyncMappingRepository } from "../database/repositories";
import { errorMessage, truncate } from "../errors";
import type { BlobStore } from "../media/blob-store";
import type { CanonicalProduct, ColorwayVariant, ProductImage, VariantMatrix } from "../types/product";
import type { SyncMapping } from "../types/job";
import { Logger } from "../utils/logger";
import { AttributeService } from "./attributes";
import type { PricingMode, PricingRule } from "./pricing";
import {
  buildProductPayload,
  buildVariationPayload,
  variationKey,
  type ProductPayload,
} from "./payload";
import type { RemoteVariation, WooCommerceClient } from "./woo-client";

export type CatalogClient = Pick<
  WooCommerceClient,
  | "findAttributeBySlug"
  | "findAttributeByName"
  | "createAttribute"
  | "findTermBySlug"
  | "findTermByName"
  | "createTerm"
  | "findCategoryByName"
  | "createCategory"
  | "createProduct"
  | "updateProduct"
  | "listVariations"
  | "createVariation"
  | "updateVariation"
  | "uploadMedia"
>;

export interface SyncEngineOptions {
  client: CatalogClient;
  mappings: SyncMappingRepository;
  /** Shared across engines to keep one attribute cache per process. */
  attributes?: AttributeService;
  /** Source of downloaded media; images without a stored copy are not uploaded. */
  blobs?: Pick<BlobStore, "read">;
  defaultCategory?: string;
  priceMultiplier?: number;
  pricingMode?: PricingMode;
  now?: () => Date;
}

export interface VariationStats {
  created: number;
  updated: number;
  failed: number;
}

export interface SyncOutcome {
  mapping: SyncMapping;
  action: "created" | "updated";
  variations: VariationStats;
}

const MIME_BY_EXTENSION: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
  gif: "image/gif",
  avif: "image/avif",
  mp4: "video/mp4",
  mov: "video/quicktime",
};

const contentTypeFor = (filename: string): string =>
  MIME_BY_EXTENSION[path.extname(filename).slice(1).toLowerCase()] ?? "image/jpeg";

const COLOUR_ATTRIBUTE_NAME = /^colou?r$/i;
const SIZE_ATTRIBUTE_NAME = /^size$/i;

/** `colour|size` key of a remote variation, or null when either attribute is missing. */
export function remoteVariationKey(
  variation: RemoteVariation,
  colorAttributeId: number,
  sizeAttributeId: number,
): string | null {
  const colour = variation.attributes.find((a) => a.id === colorAttributeId || COLOUR_ATTRIBUTE_NAME.test(a.name));
  const size = variation.attributes.find((a) => a.id === sizeAttributeId || SIZE_ATTRIBUTE_NAME.test(a.name));
  if (!colour?.option || !size?.option) return null;
  return variationKey(colour.option, size.option);
}

export class SyncEngine {
  private readonly client: CatalogClient;
  private readonly mappings: SyncMappingRepository;
  private readonly attributes: AttributeService;
  private readonly blobs: Pick<BlobStore, "read"> | undefined;
  private readonly defaultCategory: string;
  private readonly pricing: PricingRule;
  private readonly now: () => Date;
  private readonly categoryCache = new Map<string, number>();

  constructor(options: SyncEngineOptions) {
    this.client = options.client;
    this.mappings = options.mappings;
    this.attributes = options.attributes ?? new AttributeService(options.client);
    this.blobs = options.blobs;
    this.defaultCategory = options.defaultCategory ?? AppConfig.WORDPRESS_DEFAULT_CATEGORY;
    this.pricing = {
      mode: options.pricingMode ?? AppConfig.PRICING_MODE,
      multiplier: options.priceMultiplier ?? AppConfig.PRICE_MULTIPLIER,
    };
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Creates or updates the remote product and its variations.
   * @throws the remote error after recording it on the mapping
   */
  async sync(product: CanonicalProduct): Promise<SyncOutcome> {
    const existing = await this.mappings.find(product.siteId, product.externalId);
    const remoteId = existing?.remoteProductId ?? null;
    const action = remoteId === null ? "created" : "updated";
    let payload: ProductPayload | null = null;
    let remoteProductId = remoteId;

    try {
      payload = await this.buildPayload(product);
      const saved =
        remoteId === null
          ? await this.client.createProduct(payload)
          : await this.client.updateProduct(remoteId, payload);
      remoteProductId = saved.id;

      const variations = product.variantMatrix
        ? await this.syncVariations(saved.id, product, product.variantMatrix, remoteId !== null)
        : { created: 0, updated: 0, failed: 0 };

      const mapping: SyncMapping = {
        siteId: product.siteId,
        externalId: product.externalId,
        remoteProductId: saved.id,
        lastSyncStatus: "success",
        lastSyncedAt: this.now().toISOString(),
        lastPayloadSnapshot: JSON.stringify(payload),
        lastError: null,
      };
      await this.mappings.save(mapping);

      Logger.info(`Product ${action}`, {
        site: product.siteId,
        externalId: product.externalId,
        remoteId: saved.id,
        ...variations,
      });
      return { mapping, action, variations };
    } catch (error) {
      await this.mappings.save({
        siteId: product.siteId,
        externalId: product.externalId,
        remoteProductId,
        lastSyncStatus: "failed",
        lastSyncedAt: this.now().toISOString(),
        lastPayloadSnapshot: payload === null ? null : JSON.stringify(payload),
        lastError: truncate(errorMessage(error), EXECUTION_CONSTANTS.JOB_ERROR_MAX_LENGTH),
      });
      throw error;
    }
  }

  private async buildPayload(product: CanonicalProduct): Promise<ProductPayload> {
    const attributes = product.variantMatrix
      ? await this.attributes.prepareProductAttributes(product.variantMatrix)
      : [];
    const imageIds = await this.uploadImages(product.images, product.title);
    const categoryId = await this.resolveCategory(this.defaultCategory || product.meta.brand || product.siteId);

    return buildProductPayload(product, {
      attributes,
      imageIds,
      categoryIds: categoryId === null ? [] : [categoryId],
      pricing: this.pricing,
    });
  }

  /** PUT for variations already present under the same colour|size key, POST for the rest. Nothing is deleted. */
  private async syncVariations(
    productId: number,
    product: CanonicalProduct,
    matrix: VariantMatrix,
    reconcile: boolean,
  ): Promise<VariationStats> {
    const colorAttributeId = await this.attributes.colorAttributeId();
    const sizeAttributeId = await this.attributes.sizeAttributeId();

    const remote = new Map<string, number>();
    if (reconcile) {
      for (const variation of await this.client.listVariations(productId)) {
        const key = remoteVariationKey(variation, colorAttributeId, sizeAttributeId);
        if (key !== null && !remote.has(key)) remote.set(key, variation.id);
      }
    }

    const stats: VariationStats = { created: 0, updated: 0, failed: 0 };
    const colourImages = new Map<string, number>();

    for (const colourway of matrix) {
      const imageId = await this.colourImageId(product, colourway, colourImages);

      for (const size of colourway.sizeVariants) {
        const body = buildVariationPayload(product, colourway, size, {
          colorAttributeId,
          sizeAttributeId,
          imageId,
          pricing: this.pricing,
        });
        const existingId = remote.get(variationKey(colourway.colourLabel, size.size));

        try {
          if (existingId === undefined) {
            await this.client.createVariation(productId, body);
            stats.created++;
          } else {
            await this.client.updateVariation(productId, existingId, body);
            stats.updated++;
          }
        } catch (error) {
          stats.failed++;
          Logger.warn("Variation sync failed", {
            site: product.siteId,
            externalId: product.externalId,
            colour: colourway.colourLabel,
            size: size.size,
            error: errorMessage(error),
          });
        }
      }
    }
    return stats;
  }

  /** One upload per colour; the cache is re-checked after the upload returns. */
  private async colourImageId(
    product: CanonicalProduct,
    colourway: ColorwayVariant,
    cache: Map<string, number>,
  ): Promise<number | null> {
    const key = colourway.colourLabel.trim().toLowerCase();
    const cached = cache.get(key);
    if (cached !== undefined) return cached;

    const image = colourway.images.find((img) => img.localPath !== null);
    if (!image?.localPath) return null;

    const id = await this.uploadImage(image.localPath, `${product.title} - ${colourway.colourLabel}`);
    if (id === null) return null;

    const raced = cache.get(key);
    if (raced !== undefined) return raced;
    cache.set(key, id);
    return id;
  }

  /** Uploads in order with the primary image first, so it becomes the featured one. */
  private async uploadImages(images: readonly ProductImage[], title: string): Promise<number[]> {
    const ids: number[] = [];
    const ordered = [...images.filter((img) => img.isPrimary), ...images.filter((img) => !img.isPrimary)];
    for (const image of ordered) {
      if (!image.localPath) continue;
      const id = await this.uploadImage(image.localPath, image.altText ?? title);
      if (id !== null) ids.push(id);
    }
    if (ids.length === 0 && images.some((img) => img.localPath)) {
      Logger.warn("No product image could be uploaded", { title, count: images.length });
    }
    return ids;
  }

  /** Media id, or null when the bytes are missing or the upload fails. */
  private async uploadImage(localPath: string, altText: string): Promise<number | null> {
    if (!this.blobs) return null;
    const bytes = await this.blobs.read(localPath);
    if (!bytes) return null;

    const filename = path.posix.basename(localPath);
    try {
      const media = await this.client.uploadMedia({
        bytes,
        filename,
        contentType: contentTypeFor(filename),
        altText,
      });
      return media.id;
    } catch (error) {
      Logger.warn("Media upload failed", { path: localPath, error: errorMessage(error) });
      return null;
    }
  }

  /** Category id by name, created when missing; null when neither works. */
  private async resolveCategory(name: string): Promise<number | null> {
    const cached = this.categoryCache.get(name);
    if (cached !== undefined) return cached;

    try {
      const category = (await this.client.findCategoryByName(name)) ?? (await this.client.createCategory(name));
      this.categoryCache.set(name, category.id);
      return category.id;
    } catch (error) {
      Logger.warn("Category could not be resolved", { category: name, error: errorMessage(error) });
      return null;
    }
  }
}
