/**
 * Global product attributes (Color, Size) and their terms
 *
 * Lookups go cache → slug → name → slug again → create. A failed create gets
 * one last slug lookup before the error is rethrown.
 */

import { CATALOG_CONSTANTS } from "../constants";
import { errorMessage } from "../errors";
import type { VariantMatrix } from "../types/product";
import { uniq } from "../utils/array";
import { Logger, type LogMeta } from "../utils/logger";
import { slugify } from "../utils/url";
import type { ProductAttributePayload } from "./payload";
import type { WooCommerceClient } from "./woo-client";

export type AttributeCatalog = Pick<
  WooCommerceClient,
  | "findAttributeBySlug"
  | "findAttributeByName"
  | "createAttribute"
  | "findTermBySlug"
  | "findTermByName"
  | "createTerm"
>;

interface Lookups {
  bySlug: () => Promise<{ id: number } | null>;
  byName: () => Promise<{ id: number } | null>;
  create: () => Promise<{ id: number }>;
}

async function findOrCreate(what: string, meta: LogMeta, lookups: Lookups): Promise<number> {
  const found = (await lookups.bySlug()) ?? (await lookups.byName()) ?? (await lookups.bySlug());
  if (found) {
    Logger.debug(`Found existing ${what}`, { ...meta, id: found.id });
    return found.id;
  }

  try {
    const created = await lookups.create();
    Logger.info(`Created ${what}`, { ...meta, id: created.id });
    return created.id;
  } catch (error) {
    Logger.warn(`Creating ${what} failed, checking once more`, { ...meta, error: errorMessage(error) });
    const late = await lookups.bySlug();
    if (late) return late.id;
    throw error;
  }
}

export class AttributeService {
  private readonly attributeCache = new Map<string, number>();
  private readonly termCache = new Map<number, Map<string, number>>();

  constructor(private readonly catalog: AttributeCatalog) {}

  async ensureAttribute(name: string): Promise<number> {
    const cached = this.attributeCache.get(name);
    if (cached !== undefined) return cached;

    const slug = slugify(name);
    const id = await findOrCreate("attribute", { name, slug }, {
      bySlug: () => this.catalog.findAttributeBySlug(slug),
      byName: () => this.catalog.findAttributeByName(name),
      create: () =>
        this.catalog.createAttribute({
          name,
          slug,
          type: "select",
          order_by: "menu_order",
          has_archives: false,
        }),
    });
    this.attributeCache.set(name, id);
    return id;
  }

  /** Ensures the term exists and returns its name, which is what variations reference. */
  async ensureTerm(attributeId: number, name: string): Promise<string> {
    let terms = this.termCache.get(attributeId);
    if (!terms) {
      terms = new Map();
      this.termCache.set(attributeId, terms);
    }
    if (terms.has(name)) return name;

    const slug = slugify(name);
    const id = await findOrCreate("attribute term", { attributeId, name, slug }, {
      bySlug: () => this.catalog.findTermBySlug(attributeId, slug),
      byName: () => this.catalog.findTermByName(attributeId, name),
      create: () => this.catalog.createTerm(attributeId, name),
    });
    terms.set(name, id);
    return name;
  }

  colorAttributeId(): Promise<number> {
    return this.ensureAttribute(CATALOG_CONSTANTS.COLOR_ATTRIBUTE);
  }

  sizeAttributeId(): Promise<number> {
    return this.ensureAttribute(CATALOG_CONSTANTS.SIZE_ATTRIBUTE);
  }

  /** Color then Size, each with every distinct option in the matrix. */
  async prepareProductAttributes(matrix: VariantMatrix): Promise<ProductAttributePayload[]> {
    const colours = uniq(matrix.map((cw) => cw.colourLabel));
    const sizes = uniq(matrix.flatMap((cw) => cw.sizeVariants.map((s) => s.size)));
    const out: ProductAttributePayload[] = [];

    for (const [name, values] of [
      [CATALOG_CONSTANTS.COLOR_ATTRIBUTE, colours],
      [CATALOG_CONSTANTS.SIZE_ATTRIBUTE, sizes],
    ] as const) {
      if (values.length === 0) continue;
      const id = await this.ensureAttribute(name);
      const options: string[] = [];
      for (const value of values) options.push(await this.ensureTerm(id, value));
      out.push({ id, position: out.length, visible: true, variation: true, options });
    }
    return out;
  }
}
