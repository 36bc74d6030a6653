/**
 * WooCommerce REST client
 *
 * Thin typed wrapper over `/wp-json/{apiVersion}` with Basic auth. Every
 * response body is parsed through a zod schema; any non-2xx answer becomes a
 * RemoteCatalogError carrying the status and body.
 */

import { z } from "zod";
import { AppConfig } from "../config/app-config";
import { CATALOG_CONSTANTS } from "../constants";
import { ConfigurationError, RemoteCatalogError, truncate } from "../errors";
import { parseJson } from "../json/value";
import { Logger } from "../utils/logger";
import type { ProductPayload, VariationPayload } from "./payload";

export const AttributeSchema = z.object({
  id: z.number(),
  name: z.string(),
  slug: z.string().default(""),
});

export const TermSchema = z.object({
  id: z.number(),
  name: z.string(),
  slug: z.string().default(""),
});

export const CategorySchema = TermSchema;

export const ProductSchema = z.object({
  id: z.number(),
  sku: z.string().nullish(),
  status: z.string().optional(),
});

export const VariationSchema = z.object({
  id: z.number(),
  sku: z.string().nullish(),
  attributes: z
    .array(
      z.object({
        id: z.number().default(0),
        name: z.string().default(""),
        option: z.string().default(""),
      }),
    )
    .default([]),
});

export const MediaSchema = z.object({
  id: z.number(),
  source_url: z.string().nullish(),
});

export type RemoteAttribute = z.infer<typeof AttributeSchema>;
export type RemoteTerm = z.infer<typeof TermSchema>;
export type RemoteCategory = z.infer<typeof CategorySchema>;
export type RemoteProduct = z.infer<typeof ProductSchema>;
export type RemoteVariation = z.infer<typeof VariationSchema>;
export type RemoteMedia = z.infer<typeof MediaSchema>;

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string | FormData;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<Response>;

export interface WooClientOptions {
  baseUrl: string;
  consumerKey: string;
  consumerSecret: string;
  apiVersion?: string;
  /** WordPress application-password credentials for the media endpoint. */
  username?: string;
  appPassword?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface MediaUpload {
  bytes: Buffer;
  filename: string;
  contentType: string;
  altText: string;
}

const basicAuth = (user: string, password: string): string =>
  `Basic ${Buffer.from(`${user}:${password}`).toString("base64")}`;

const sameText = (a: string, b: string): boolean => a.trim().toLowerCase() === b.trim().toLowerCase();

export class WooCommerceClient {
  private readonly baseUrl: string;
  private readonly apiBase: string;
  private readonly auth: string;
  private readonly mediaAuth: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: WooClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiBase = `${this.baseUrl}/wp-json/${options.apiVersion ?? "wc/v3"}`;
    this.auth = basicAuth(options.consumerKey, options.consumerSecret);
    this.mediaAuth =
      options.username && options.appPassword ? basicAuth(options.username, options.appPassword) : this.auth;
    this.timeoutMs = options.timeoutMs ?? AppConfig.REMOTE_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * @throws ConfigurationError when the base URL or the API keys are missing
   */
  static fromConfig(fetchFn?: FetchLike): WooCommerceClient {
    if (!AppConfig.WORDPRESS_BASE_URL || !AppConfig.WORDPRESS_CONSUMER_KEY || !AppConfig.WORDPRESS_CONSUMER_SECRET) {
      throw new ConfigurationError(
        "WORDPRESS_BASE_URL, WORDPRESS_CONSUMER_KEY and WORDPRESS_CONSUMER_SECRET must be set",
      );
    }
    return new WooCommerceClient({
      baseUrl: AppConfig.WORDPRESS_BASE_URL,
      consumerKey: AppConfig.WORDPRESS_CONSUMER_KEY,
      consumerSecret: AppConfig.WORDPRESS_CONSUMER_SECRET,
      apiVersion: AppConfig.WORDPRESS_API_VERSION,
      username: AppConfig.WORDPRESS_USERNAME,
      appPassword: AppConfig.WORDPRESS_APP_PASSWORD,
      fetch: fetchFn,
    });
  }

  // Attributes

  listAttributes(): Promise<RemoteAttribute[]> {
    return this.getAllPages("/products/attributes", AttributeSchema);
  }

  async findAttributeBySlug(slug: string): Promise<RemoteAttribute | null> {
    return (await this.listAttributes()).find((a) => sameText(a.slug, slug)) ?? null;
  }

  async findAttributeByName(name: string): Promise<RemoteAttribute | null> {
    return (await this.listAttributes()).find((a) => sameText(a.name, name)) ?? null;
  }

  createAttribute(body: {
    name: string;
    slug: string;
    type: "select";
    order_by: "menu_order";
    has_archives: boolean;
  }): Promise<RemoteAttribute> {
    return this.request("POST", "/products/attributes", AttributeSchema, body);
  }

  // Attribute terms

  listTerms(attributeId: number): Promise<RemoteTerm[]> {
    return this.getAllPages(`/products/attributes/${attributeId}/terms`, TermSchema);
  }

  async findTermBySlug(attributeId: number, slug: string): Promise<RemoteTerm | null> {
    return (await this.listTerms(attributeId)).find((t) => sameText(t.slug, slug)) ?? null;
  }

  async findTermByName(attributeId: number, name: string): Promise<RemoteTerm | null> {
    return (await this.listTerms(attributeId)).find((t) => sameText(t.name, name)) ?? null;
  }

  createTerm(attributeId: number, name: string): Promise<RemoteTerm> {
    return this.request("POST", `/products/attributes/${attributeId}/terms`, TermSchema, { name });
  }

  // Categories

  async findCategoryByName(name: string): Promise<RemoteCategory | null> {
    const categories = await this.getAllPages("/products/categories", CategorySchema);
    return categories.find((c) => sameText(c.name, name)) ?? null;
  }

  createCategory(name: string): Promise<RemoteCategory> {
    return this.request("POST", "/products/categories", CategorySchema, { name });
  }

  // Products and variations

  createProduct(payload: ProductPayload): Promise<RemoteProduct> {
    return this.request("POST", "/products", ProductSchema, payload);
  }

  /** Full payload on sync; a partial body changes only the fields it carries. */
  updateProduct(id: number, payload: Partial<ProductPayload>): Promise<RemoteProduct> {
    return this.request("PUT", `/products/${id}`, ProductSchema, payload);
  }

  listVariations(productId: number): Promise<RemoteVariation[]> {
    return this.getAllPages(`/products/${productId}/variations`, VariationSchema);
  }

  createVariation(productId: number, payload: VariationPayload): Promise<RemoteVariation> {
    return this.request("POST", `/products/${productId}/variations`, VariationSchema, payload);
  }

  updateVariation(productId: number, variationId: number, payload: VariationPayload): Promise<RemoteVariation> {
    return this.request("PUT", `/products/${productId}/variations/${variationId}`, VariationSchema, payload);
  }

  // Media

  /** Multipart upload to the WordPress media library (`/wp-json/wp/v2/media`). */
  async uploadMedia(upload: MediaUpload): Promise<RemoteMedia> {
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(upload.bytes)], { type: upload.contentType }), upload.filename);
    form.append("title", upload.filename.replace(/\.[^.]+$/, ""));
    form.append("alt_text", upload.altText);

    const url = `${this.baseUrl}/wp-json/wp/v2/media`;
    const value = await this.send("POST", url, this.mediaAuth, form);
    return this.parse(MediaSchema, value, "POST", url);
  }

  /** Walks `?per_page=100&page=N` until a short page, at most 200 pages. */
  private async getAllPages<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>[]> {
    const all: z.infer<S>[] = [];
    const separator = path.includes("?") ? "&" : "?";

    for (let page = 1; page <= CATALOG_CONSTANTS.MAX_PAGES; page++) {
      const batch = await this.request(
        "GET",
        `${path}${separator}per_page=${CATALOG_CONSTANTS.PER_PAGE}&page=${page}`,
        z.array(schema),
      );
      all.push(...batch);
      if (batch.length < CATALOG_CONSTANTS.PER_PAGE) break;
    }
    return all;
  }

  private async request<S extends z.ZodTypeAny>(
    method: "GET" | "POST" | "PUT",
    path: string,
    schema: S,
    body?: unknown,
  ): Promise<z.infer<S>> {
    const url = `${this.apiBase}${path}`;
    const value = await this.send(method, url, this.auth, body === undefined ? undefined : JSON.stringify(body));
    return this.parse(schema, value, method, url);
  }

  private async send(method: string, url: string, auth: string, body?: string | FormData): Promise<unknown> {
    const headers: Record<string, string> = { authorization: auth, accept: "application/json" };
    if (typeof body === "string") headers["content-type"] = "application/json";

    const response = await this.fetchFn(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const text = await response.text();

    if (!response.ok) {
      Logger.error("Remote catalog request failed", undefined, {
        method,
        url,
        status: response.status,
        body: truncate(text, 500),
      });
      throw new RemoteCatalogError(`${method} ${url} failed with HTTP ${response.status}`, response.status, text);
    }
    return text ? parseJson(text) : null;
  }

  private parse<S extends z.ZodTypeAny>(schema: S, value: unknown, method: string, url: string): z.infer<S> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new RemoteCatalogError(
        `${method} ${url} returned an unexpected body: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        200,
        truncate(JSON.stringify(value) ?? "", 1000),
      );
    }
    return parsed.data;
  }
}
