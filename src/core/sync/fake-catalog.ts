/**
 * In-process WooCommerce stand-in
 *
 * Answers the subset of `/wp-json/wc/v3` and `/wp-json/wp/v2/media` the client
 * uses, through a `FetchLike`, so sync tests and dry runs never open a socket.
 */

import { isJsonArray, isJsonObject, parseJson, type JsonObject } from "../json/value";
import { slugify } from "../utils/url";
import { WooCommerceClient, type FetchInit, type FetchLike } from "./woo-client";

export interface RecordedRequest {
  method: string;
  path: string;
  body: JsonObject | null;
}

interface NamedEntity {
  id: number;
  name: string;
  slug: string;
}

interface StoredVariation {
  id: number;
  sku: string | null;
  attributes: { id: number; name: string; option: string }[];
  body: JsonObject;
}

const API_PREFIX = "/wp-json/wc/v3";
const MEDIA_PATH = "/wp-json/wp/v2/media";

const json = (data: unknown, status = 200): Response =>
  new Response(JSON.stringify(data), { status, headers: { "content-type": "application/json" } });

const notFound = (path: string): Response => json({ code: "rest_no_route", message: `No route for ${path}` }, 404);

const text = (obj: JsonObject | null, key: string): string => {
  const value = obj?.[key];
  return typeof value === "string" ? value : "";
};

export class FakeWooCommerce {
  readonly requests: RecordedRequest[] = [];
  readonly attributes: NamedEntity[] = [];
  readonly terms = new Map<number, NamedEntity[]>();
  readonly categories: NamedEntity[] = [];
  readonly products = new Map<number, JsonObject>();
  readonly variations = new Map<number, StoredVariation[]>();
  readonly media: { id: number; filename: string; altText: string }[] = [];

  /** Runs before an attribute POST is handled; lets a test create the attribute "elsewhere" first. */
  beforeCreateAttribute: (() => void) | null = null;
  /** Variation writes matching this predicate answer HTTP 500. */
  failVariation: ((body: JsonObject) => boolean) | null = null;

  private nextId = 100;

  readonly fetch: FetchLike = (url, init) => Promise.resolve(this.handle(url, init));

  client(): WooCommerceClient {
    return new WooCommerceClient({
      baseUrl: "https://catalog.test",
      consumerKey: "test-key",
      consumerSecret: "test-secret",
      fetch: this.fetch,
    });
  }

  seedAttribute(name: string, slug = slugify(name)): number {
    const id = this.nextId++;
    this.attributes.push({ id, name, slug });
    return id;
  }

  seedTerm(attributeId: number, name: string): number {
    const id = this.nextId++;
    this.termsOf(attributeId).push({ id, name, slug: slugify(name) });
    return id;
  }

  /** Requests matching a method and a path pattern. */
  calls(method: string, pattern: RegExp): RecordedRequest[] {
    return this.requests.filter((r) => r.method === method && pattern.test(r.path));
  }

  private handle(url: string, init: FetchInit): Response {
    const parsed = new URL(url);
    const body = typeof init.body === "string" ? this.parseBody(init.body) : null;
    this.requests.push({ method: init.method, path: parsed.pathname, body });

    if (parsed.pathname === MEDIA_PATH && init.method === "POST") {
      return this.uploadMedia(init.body);
    }
    if (!parsed.pathname.startsWith(API_PREFIX)) return notFound(parsed.pathname);

    const route = parsed.pathname.slice(API_PREFIX.length);
    const page = Number(parsed.searchParams.get("page") ?? "1");
    const perPage = Number(parsed.searchParams.get("per_page") ?? "10");
    const paged = <T>(items: T[]): Response => json(items.slice((page - 1) * perPage, page * perPage));

    let m: RegExpMatchArray | null;

    if (route === "/products/attributes") {
      if (init.method === "GET") return paged(this.attributes);
      this.beforeCreateAttribute?.();
      return this.createNamed(this.attributes, text(body, "name"), text(body, "slug"));
    }

    if ((m = route.match(/^\/products\/attributes\/(\d+)\/terms$/))) {
      const terms = this.termsOf(Number(m[1]));
      if (init.method === "GET") return paged(terms);
      return this.createNamed(terms, text(body, "name"), "");
    }

    if (route === "/products/categories") {
      if (init.method === "GET") return paged(this.categories);
      return this.createNamed(this.categories, text(body, "name"), "");
    }

    if (route === "/products" && init.method === "POST" && body) {
      const id = this.nextId++;
      this.products.set(id, body);
      return json({ id, sku: text(body, "sku"), status: text(body, "status") }, 201);
    }

    if ((m = route.match(/^\/products\/(\d+)$/)) && init.method === "PUT" && body) {
      const id = Number(m[1]);
      const current = this.products.get(id);
      if (!current) return json({ code: "woocommerce_rest_product_invalid_id" }, 404);
      const merged = { ...current, ...body };
      this.products.set(id, merged);
      return json({ id, sku: text(merged, "sku"), status: text(merged, "status") });
    }

    if ((m = route.match(/^\/products\/(\d+)\/variations(?:\/(\d+))?$/))) {
      const productId = Number(m[1]);
      if (!this.products.has(productId)) return json({ code: "woocommerce_rest_product_invalid_id" }, 404);
      const stored = this.variationsOf(productId);

      if (init.method === "GET" && m[2] === undefined) {
        return paged(stored.map((v) => ({ id: v.id, sku: v.sku, attributes: v.attributes })));
      }
      if (!body) return json({ code: "rest_invalid_json" }, 400);
      if (this.failVariation?.(body)) return json({ code: "internal_server_error" }, 500);

      if (init.method === "POST") {
        const variation = this.toVariation(this.nextId++, body);
        stored.push(variation);
        return json({ id: variation.id, sku: variation.sku, attributes: variation.attributes }, 201);
      }
      const variationId = Number(m[2]);
      const index = stored.findIndex((v) => v.id === variationId);
      if (index < 0) return json({ code: "woocommerce_rest_product_variation_invalid_id" }, 404);
      const variation = this.toVariation(variationId, body);
      stored[index] = variation;
      return json({ id: variation.id, sku: variation.sku, attributes: variation.attributes });
    }

    return notFound(parsed.pathname);
  }

  private parseBody(raw: string): JsonObject | null {
    const value = parseJson(raw);
    return isJsonObject(value) ? value : null;
  }

  private createNamed(list: NamedEntity[], name: string, slug: string): Response {
    const finalSlug = slug || slugify(name);
    if (!name) return json({ code: "rest_missing_callback_param", message: "name is required" }, 400);
    if (list.some((e) => e.slug === finalSlug)) {
      return json({ code: "term_exists", message: `A resource with the slug ${finalSlug} already exists.` }, 400);
    }
    const entity = { id: this.nextId++, name, slug: finalSlug };
    list.push(entity);
    return json(entity, 201);
  }

  private toVariation(id: number, body: JsonObject): StoredVariation {
    const raw = body.attributes;
    const attributes = (isJsonArray(raw) ? raw : []).filter(isJsonObject).map((attr) => {
      const attrId = typeof attr.id === "number" ? attr.id : 0;
      return {
        id: attrId,
        name: this.attributes.find((a) => a.id === attrId)?.name ?? "",
        option: text(attr, "option"),
      };
    });
    const sku = text(body, "sku");
    return { id, sku: sku || null, attributes, body };
  }

  private uploadMedia(body: FetchInit["body"]): Response {
    if (!(body instanceof FormData)) return json({ code: "rest_upload_no_data" }, 400);
    const file = body.get("file");
    const alt = body.get("alt_text");
    const entry = {
      id: this.nextId++,
      filename: file === null || typeof file === "string" ? "" : file.name,
      altText: typeof alt === "string" ? alt : "",
    };
    this.media.push(entry);
    return json({ id: entry.id, source_url: `https://catalog.test/uploads/${entry.filename}` }, 201);
  }

  private termsOf(attributeId: number): NamedEntity[] {
    let list = this.terms.get(attributeId);
    if (!list) {
      list = [];
      this.terms.set(attributeId, list);
    }
    return list;
  }

  private variationsOf(productId: number): StoredVariation[] {
    let list = this.variations.get(productId);
    if (!list) {
      list = [];
      this.variations.set(productId, list);
    }
    return list;
  }
}
