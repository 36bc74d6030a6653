/**
 * Extractor: one detail page in, one CanonicalProduct out
 *
 * Sources, in precedence order: render side channel, embedded state blob,
 * per-colour pages, then the main page's own sizes. Every source is
 * normalized to colourways and merged once at the end.
 */

import * as cheerio from "cheerio";
import { withDefaults } from "../config/pacing";
import type { FetchEngine } from "../fetch/engine";
import type { JsonValue } from "../json/value";
import type { MediaDownloader } from "../media/downloader";
import { translateSafely, type Translator } from "../translation/translator";
import type { CanonicalProduct, ColorwayVariant, PriceInfo, ProductImage, VariantMatrix } from "../types/product";
import type { SiteProfile } from "../types/site";
import { isSuccess, type FetchResult } from "../types/fetch";
import { Logger } from "../utils/logger";
import { lastPathSegment, normalizeUrlKey, slugify } from "../utils/url";
import { validateProduct } from "../validation/product-validator";
import { DEFAULT_STATE_SELECTOR, embeddedProductFields, extractEmbeddedColourways, readEmbeddedState } from "./embedded-state";
import {
  accordionText,
  extractColourLabel,
  extractImages,
  extractPrice,
  extractSizes,
  parseDetailHtml,
  type AccordionSection,
  type HtmlProductFields,
} from "./html";
import { collectProductImages, deriveStatus, mergeColourways, sideChannelToColourways, type NormalizeContext } from "./normalize";
import { computeDiscount } from "./price";

export interface DetailPage {
  /** URL as collected. */
  url: string;
  /** URL after redirects. */
  finalUrl: string;
  html: string;
  sideChannel?: Record<string, JsonValue>;
}

export interface ExtractorDeps {
  fetcher: Pick<FetchEngine, "fetchBatch">;
  translator?: Translator;
  media?: MediaDownloader;
}

const sameUrl = (a: string, b: string): boolean => {
  try {
    return normalizeUrlKey(a) === normalizeUrlKey(b);
  } catch {
    return a === b;
  }
};

export class Extractor {
  private readonly ctx: NormalizeContext;
  private readonly colourConcurrency: number;

  constructor(
    private readonly site: SiteProfile,
    private readonly deps: ExtractorDeps,
  ) {
    this.ctx = { origin: site.origin, currency: site.currency };
    this.colourConcurrency = withDefaults(site.pacing).colourConcurrency;
  }

  /**
   * @throws MalformedSourceError when the page yields no usable product
   */
  async extract(page: DetailPage): Promise<CanonicalProduct> {
    const detail = this.site.detail;
    const fields = parseDetailHtml(page.html, detail.selectors, {
      ...this.ctx,
      url: page.finalUrl,
      sizeDisabledClass: detail.sizeDisabledClass,
    });

    const state = readEmbeddedState(page.html, detail.embeddedStateSelector ?? DEFAULT_STATE_SELECTOR);
    const embedded = state === null ? null : embeddedProductFields(state);

    const colourways: ColorwayVariant[] = [];
    if (detail.sideChannelName && page.sideChannel) {
      colourways.push(...sideChannelToColourways(page.sideChannel[detail.sideChannelName], this.ctx));
    }
    if (state !== null) {
      colourways.push(...extractEmbeddedColourways(state, this.ctx));
    }
    if (detail.colourPages && fields.colourLinks.length > 0) {
      colourways.push(...(await this.fetchColourPages(page, fields)));
    }
    if (colourways.length === 0 && fields.sizes.length > 0) {
      colourways.push(this.pageColourway(fields, fields.colourLabel ?? "Default", page.finalUrl));
    }

    const merged = mergeColourways(colourways);
    const matrix: VariantMatrix | null = merged.length > 0 ? merged : null;

    const externalId = fields.externalId ?? embedded?.externalId ?? lastPathSegment(page.finalUrl) ?? "";
    const title = fields.title ?? embedded?.title ?? "";
    const description = fields.description ?? embedded?.description ?? null;
    const price = this.resolvePrice(fields.price, matrix);

    const meta = await this.buildMeta(title, description, fields.accordion, page.url);
    if (price.discountPercentage !== null && price.discountPercentage > 0) {
      meta.discount = String(Math.round(price.discountPercentage));
    }

    const product: CanonicalProduct = {
      siteId: this.site.key,
      externalId,
      title,
      description,
      slug: slugify(title) || slugify(externalId),
      price: price.price,
      originalPrice: price.originalPrice,
      discountPercentage: price.discountPercentage,
      currency: price.currency,
      status: deriveStatus(matrix, !fields.soldOut),
      inStock: matrix === null ? !fields.soldOut : matrix.some((cw) => cw.sizeVariants.some((s) => s.stockAvailable)),
      images: collectProductImages(fields.images, matrix),
      variantMatrix: matrix,
      meta,
      sourceUrl: page.url,
    };

    validateProduct(product);
    return this.deps.media ? this.withLocalMedia(product, this.deps.media) : product;
  }

  /** Brand plus whatever translations succeed; accordion sections are kept as JSON. */
  private async buildMeta(
    title: string,
    description: string | null,
    accordion: AccordionSection[],
    url: string,
  ): Promise<Record<string, string>> {
    const meta: Record<string, string> = { brand: this.site.displayName };
    const logMeta = { site: this.site.key, url };
    const translate = (text: string | null) => translateSafely(this.deps.translator, text, logMeta);

    const name = await translate(title);
    if (name !== null) meta.name_translated = name;
    const translated = await translate(description);
    if (translated !== null) meta.description_translated = translated;

    if (accordion.length > 0) {
      const sections = await translate(accordionText(accordion));
      if (sections !== null) meta.accordion_translated = sections;
      meta.accordion_sections = JSON.stringify(accordion);
    }
    return meta;
  }

  /** Main-page price, else the cheapest colourway price. */
  private resolvePrice(fromPage: PriceInfo, matrix: VariantMatrix | null): PriceInfo {
    if (fromPage.price !== null || matrix === null) return fromPage;

    let cheapest: ColorwayVariant | null = null;
    for (const cw of matrix) {
      if (cw.basePrice === null) continue;
      if (cheapest === null || cheapest.basePrice === null || cw.basePrice < cheapest.basePrice) cheapest = cw;
    }
    if (cheapest === null) return fromPage;

    const originalPrice = cheapest.originalPrice ?? fromPage.originalPrice;
    return {
      price: cheapest.basePrice,
      originalPrice,
      discountPercentage:
        cheapest.discountPercentage ?? computeDiscount(cheapest.basePrice, originalPrice),
      currency: cheapest.currency ?? fromPage.currency,
    };
  }

  private pageColourway(fields: Pick<HtmlProductFields, "images" | "sizes" | "price">, label: string, pdpUrl: string): ColorwayVariant {
    return {
      colourLabel: label,
      colourSlug: slugify(label) || "default",
      colourCode: null,
      swatchUrl: null,
      pdpUrl,
      basePrice: fields.price.price,
      originalPrice: fields.price.originalPrice,
      currency: fields.price.currency,
      discountPercentage: fields.price.discountPercentage,
      soldOut: fields.sizes.every((s) => !s.stockAvailable),
      images: fields.images,
      sizeVariants: fields.sizes,
    };
  }

  /**
   * One colourway per colour link. The current page's colour reuses the
   * already-parsed images and sizes; the others are fetched at the colour
   * concurrency. All colours carry the main page's price.
   */
  private async fetchColourPages(page: DetailPage, fields: HtmlProductFields): Promise<ColorwayVariant[]> {
    const selectors = this.site.detail.selectors;
    const isCurrent = (link: string) => sameUrl(link, page.finalUrl) || sameUrl(link, page.url);
    const others = fields.colourLinks.filter((link) => !isCurrent(link));

    const results =
      others.length > 0
        ? await this.deps.fetcher.fetchBatch(others, this.colourConcurrency)
        : new Map<string, FetchResult>();

    const out: ColorwayVariant[] = [];
    for (const link of fields.colourLinks) {
      if (isCurrent(link)) {
        const label = fields.colourLabel ?? lastPathSegment(link) ?? "Default";
        out.push(this.pageColourway(fields, label, link));
        continue;
      }

      const result = results.get(link);
      if (!result || !isSuccess(result)) {
        Logger.warn("Colour page failed", {
          site: this.site.key,
          url: link,
          error: result?.error ?? "not fetched",
        });
        continue;
      }

      const $ = cheerio.load(result.body);
      const colourFields = {
        images: extractImages($, selectors.images, this.ctx.origin),
        sizes: extractSizes($, selectors.sizes, this.site.detail.sizeDisabledClass),
        price: fields.price.price !== null ? fields.price : extractPrice($, selectors, this.ctx.currency),
      };
      const label = extractColourLabel($, selectors.colourLabel, link);
      out.push(this.pageColourway(colourFields, label, link));
    }

    Logger.debug("Colour pages processed", {
      site: this.site.key,
      url: page.url,
      count: out.length,
      requested: fields.colourLinks.length,
    });
    return out;
  }

  /** Downloads every unique image once and points colourway images at the stored copies. */
  private async withLocalMedia(product: CanonicalProduct, media: MediaDownloader): Promise<CanonicalProduct> {
    const downloaded = await media.downloadAll(product.images, {
      siteId: product.siteId,
      externalId: product.externalId,
      name: product.slug || product.title,
    });
    const byUrl = new Map(downloaded.map((img) => [img.url, img.localPath]));
    const localise = (img: ProductImage): ProductImage => ({ ...img, localPath: byUrl.get(img.url) ?? null });

    return {
      ...product,
      images: downloaded,
      variantMatrix:
        product.variantMatrix?.map((cw) => ({ ...cw, images: cw.images.map(localise) })) ?? null,
    };
  }
}
