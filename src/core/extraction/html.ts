/**
 * Selector-driven HTML field extraction
 *
 * Each field walks its selector chain in order and takes the first selector
 * that yields something usable. Nothing here throws: a missing field comes
 * back as null or an empty list.
 */

import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import type { DetailSelectors } from "../types/site";
import type { PriceInfo, ProductImage, SizeVariant } from "../types/product";
import { uniq, uniqBy } from "../utils/array";
import { lastPathSegment, resolveLocation } from "../utils/url";
import { inPriceBounds, parsePercent, parsePrice, resolveDiscount } from "./price";

export type CheerioAPI = cheerio.CheerioAPI;

export interface HtmlContext {
  origin: string;
  currency: string | null;
  /** Final URL of the page, after redirects. */
  url: string;
  sizeDisabledClass?: string;
}

export interface HtmlProductFields {
  title: string | null;
  description: string | null;
  externalId: string | null;
  price: PriceInfo;
  images: ProductImage[];
  sizes: SizeVariant[];
  colourLinks: string[];
  /** Colour named on the page itself, if any. */
  colourLabel: string | null;
  /** True when an out-of-stock marker is present. */
  soldOut: boolean;
  accordion: AccordionSection[];
}

/** One collapsible block of product details (fit, fabric, care). */
export interface AccordionSection {
  title: string;
  content: string;
}

const clean = (text: string): string => text.replace(/\s+/g, " ").trim();

export function firstText($: CheerioAPI, selectors: readonly string[]): string | null {
  for (const selector of selectors) {
    const text = clean($(selector).first().text());
    if (text) return text;
  }
  return null;
}

/** Paragraphs joined by newlines; list items become bullets. */
export function extractDescription($: CheerioAPI, selectors: readonly string[]): string | null {
  for (const selector of selectors) {
    const parts: string[] = [];
    $(selector).each((_, el) => {
      const node = $(el);
      const text = clean(node.text());
      if (!text) return;
      parts.push(node.is("li") ? `• ${text}` : text);
    });
    if (parts.length > 0) return parts.join("\n");
  }
  return null;
}

function firstPrice(
  $: CheerioAPI,
  selectors: readonly string[],
  accept: (value: number) => boolean,
): number | null {
  for (const selector of selectors) {
    for (const el of $(selector).toArray()) {
      const value = parsePrice($(el).text());
      if (inPriceBounds(value) && accept(value)) return value;
    }
  }
  return null;
}

export function extractPrice(
  $: CheerioAPI,
  selectors: Pick<DetailSelectors, "price" | "originalPrice" | "discount">,
  currency: string | null,
): PriceInfo {
  const price = firstPrice($, selectors.price, () => true);
  const originalPrice = firstPrice($, selectors.originalPrice, (v) => price === null || v > price);

  let explicitDiscount: number | null = null;
  for (const selector of selectors.discount) {
    explicitDiscount = parsePercent($(selector).first().text());
    if (explicitDiscount !== null) break;
  }

  return {
    price,
    originalPrice,
    discountPercentage: resolveDiscount(explicitDiscount, price, originalPrice),
    currency,
  };
}

export function extractImages($: CheerioAPI, selectors: readonly string[], origin: string): ProductImage[] {
  for (const selector of selectors) {
    const images: ProductImage[] = [];
    $(selector).each((_, el) => {
      const img = $(el);
      const src = img.attr("src") ?? img.attr("data-src");
      const url = src ? resolveLocation(origin, src) : null;
      if (!url) return;
      images.push({ url, altText: img.attr("alt")?.trim() || null, localPath: null });
    });
    if (images.length > 0) return uniqBy(images, (i) => i.url);
  }
  return [];
}

export function extractSizes($: CheerioAPI, selectors: readonly string[], disabledClass = "disabled"): SizeVariant[] {
  for (const selector of selectors) {
    const sizes: SizeVariant[] = [];
    $(selector).each((_, el) => {
      const item = $(el);
      const size = clean(item.text());
      if (!size) return;
      const disabled =
        item.hasClass(disabledClass) ||
        item.find(`.${disabledClass}`).length > 0 ||
        item.attr("disabled") !== undefined ||
        item.attr("aria-disabled") === "true" ||
        item.find("input[disabled]").length > 0;
      sizes.push({ size, sku: null, stockAvailable: !disabled, price: null });
    });
    if (sizes.length > 0) return uniqBy(sizes, (s) => s.size);
  }
  return [];
}

export function extractLinks($: CheerioAPI, selectors: readonly string[], origin: string): string[] {
  const links: string[] = [];
  for (const selector of selectors) {
    $(selector).each((_, el) => {
      const href = $(el).attr("href");
      const url = href ? resolveLocation(origin, href) : null;
      if (url) links.push(url);
    });
  }
  return uniq(links);
}

/** Colour name from the page, else the URL's last segment, else "Default". */
export function extractColourLabel($: CheerioAPI, selectors: readonly string[], url: string): string {
  return firstText($, selectors) ?? lastPathSegment(url) ?? "Default";
}

const ACCORDION_HEADER =
  '.card-header[data-toggle="collapse"], .accordion-section[data-toggle="collapse"], [data-toggle="collapse"][href^="#"]';
const ACCORDION_HEADER_TITLE = "h3.accordion-title, .accordion-title, .card-title h3, h3";
const ACCORDION_TARGET_BODY = ".collapse-body, .card-body, .accordion-body, .collapse-content";
const ACCORDION_ITEM = ".accordion-item, .accordion__item, [data-accordion-item], .accordion-panel, .card";
const ACCORDION_ITEM_TITLE = ".accordion-header, .accordion-title, h2, h3, h4, [data-accordion-header], .card-title h3";
const ACCORDION_ITEM_BODY =
  '.accordion-body, .accordion-content, .accordion-panel-body, .card-body, .collapse-body, [data-testid="typography-div"]';

type Selection = cheerio.Cheerio<AnyNode>;

const isCollapseBody = (node: Selection): boolean => {
  const cls = node.attr("class") ?? "";
  return cls.includes("collapse") || cls.includes("card-body");
};

/** Toggle header → its collapse target by id, else the nearest sibling that looks like a collapse body. */
function headerSection($: CheerioAPI, header: Selection): AccordionSection | null {
  const title = clean(header.find(ACCORDION_HEADER_TITLE).first().text());
  const targetId = (header.attr("href") ?? header.attr("data-target") ?? "").replace(/^#/, "");

  let content = "";
  if (targetId) {
    const target = $("[id]").filter((_, el) => $(el).attr("id") === targetId).first();
    const body = target.find(ACCORDION_TARGET_BODY).first();
    content = clean((body.length > 0 ? body : target).text());
  }
  if (!content) {
    const sibling = [...header.nextAll().toArray(), ...header.prevAll().toArray()]
      .map((el) => $(el))
      .find(isCollapseBody);
    content = sibling ? clean(sibling.text()) : "";
  }
  return title || content ? { title, content } : null;
}

function itemSection(item: Selection): AccordionSection | null {
  const title = clean(item.find(ACCORDION_ITEM_TITLE).first().text()) || clean((item.attr("id") ?? "").replace(/[-_]/g, " "));
  const body = item.find(ACCORDION_ITEM_BODY).first();
  let content = clean((body.length > 0 ? body : item).text());
  if (body.length === 0 && title && content.startsWith(title)) content = content.slice(title.length).trim();
  return title || content ? { title, content } : null;
}

/**
 * Accordion sections from the first selector that yields any. Collapse
 * headers are tried first, then accordion items inside the container, then
 * every match of the selector as one item.
 */
export function extractAccordionSections($: CheerioAPI, selectors: readonly string[]): AccordionSection[] {
  for (const selector of selectors) {
    const matches = $(selector);
    const container = matches.first();
    if (container.length === 0) continue;

    const collect = (nodes: Selection, read: (node: Selection) => AccordionSection | null): AccordionSection[] =>
      nodes
        .toArray()
        .map((el) => read($(el)))
        .filter((section): section is AccordionSection => section !== null);

    const fromHeaders = collect(container.find(ACCORDION_HEADER), (header) => headerSection($, header));
    if (fromHeaders.length > 0) return fromHeaders;
    const fromItems = collect(container.find(ACCORDION_ITEM), itemSection);
    if (fromItems.length > 0) return fromItems;
    const fromMatches = collect(matches, itemSection);
    if (fromMatches.length > 0) return fromMatches;
  }
  return [];
}

/** Sections as one text block: each title on its own line above its content, sections separated by a blank line. */
export function accordionText(sections: readonly AccordionSection[]): string {
  return sections.map((s) => (s.title ? `${s.title}\n${s.content}` : s.content)).join("\n\n");
}

export function parseDetailHtml(
  html: string,
  selectors: DetailSelectors,
  ctx: HtmlContext,
): HtmlProductFields {
  const $ = cheerio.load(html);
  return {
    title: firstText($, selectors.title),
    description: extractDescription($, selectors.description),
    externalId: firstText($, selectors.externalId ?? []),
    price: extractPrice($, selectors, ctx.currency),
    images: extractImages($, selectors.images, ctx.origin),
    sizes: extractSizes($, selectors.sizes, ctx.sizeDisabledClass),
    colourLinks: extractLinks($, selectors.colourLinks, ctx.origin),
    colourLabel: firstText($, selectors.colourLabel),
    soldOut: (selectors.outOfStock ?? []).some((sel) => $(sel).length > 0),
    accordion: extractAccordionSections($, selectors.accordion ?? []),
  };
}
