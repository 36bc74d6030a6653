/**
 * Media downloader: fetches product images and hands the bytes to a BlobStore
 */

import { randomInt } from "node:crypto";
import pLimit from "p-limit";
import { BROWSER_HEADER_POOL } from "../constants";
import { AppConfig } from "../config/app-config";
import { errorMessage } from "../errors";
import { fetchBinary, type BinaryResponse } from "../fetch/transport";
import type { ProductImage } from "../types/product";
import { Logger } from "../utils/logger";
import { slugify } from "../utils/url";
import type { BlobStore } from "./blob-store";

const KNOWN_EXTENSIONS = new Set(["jpg", "jpeg", "png", "gif", "webp", "mp4", "webm", "mov"]);

const MIME_EXTENSIONS: Record<string, string> = {
  "image/jpeg": "jpg",
  "image/png": "png",
  "image/gif": "gif",
  "image/webp": "webp",
  "video/mp4": "mp4",
  "video/webm": "webm",
  "video/quicktime": "mov",
};

const ALPHANUMERIC = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

export function guessExtension(url: string, contentType: string | null): string {
  let pathname = "";
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  const match = pathname.match(/\.([a-z0-9]+)$/i);
  const fromUrl = match ? match[1].toLowerCase() : null;
  if (fromUrl && KNOWN_EXTENSIONS.has(fromUrl)) return fromUrl;

  const mime = contentType?.split(";")[0].trim().toLowerCase();
  if (mime && mime in MIME_EXTENSIONS) return MIME_EXTENSIONS[mime];
  return "jpg";
}

export function randomToken(length = 8, pick: (max: number) => number = randomInt): string {
  let out = "";
  for (let i = 0; i < length; i++) out += ALPHANUMERIC[pick(ALPHANUMERIC.length)];
  return out;
}

export interface MediaTarget {
  siteId: string;
  externalId: string;
  /** Used for the file name; usually the product title or slug. */
  name: string;
}

/** `products/{siteId}/{externalId}/{slug}-{random8}.{ext}` */
export function mediaPath(target: MediaTarget, extension: string, token: string): string {
  const slug = slugify(target.name) || "media";
  return `products/${target.siteId}/${target.externalId}/${slug}-${token}.${extension}`;
}

export interface MediaDownloaderOptions {
  fetch?: (url: string, headers: Record<string, string>, timeoutMs: number) => Promise<BinaryResponse>;
  timeoutMs?: number;
  concurrency?: number;
  token?: () => string;
}

export class MediaDownloader {
  private readonly fetch: NonNullable<MediaDownloaderOptions["fetch"]>;
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly token: () => string;

  constructor(
    private readonly store: BlobStore,
    options: MediaDownloaderOptions = {},
  ) {
    this.fetch = options.fetch ?? fetchBinary;
    this.timeoutMs = options.timeoutMs ?? AppConfig.REMOTE_TIMEOUT_MS;
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.token = options.token ?? (() => randomToken());
  }

  /** Stored relative path, or null on any failure. */
  async download(url: string, target: MediaTarget): Promise<string | null> {
    try {
      const response = await this.fetch(url, { ...BROWSER_HEADER_POOL[0] }, this.timeoutMs);
      if (response.status < 200 || response.status >= 300 || response.bytes.length === 0) {
        Logger.debug("Media download rejected", { url, status: response.status });
        return null;
      }
      const extension = guessExtension(url, response.contentType);
      return await this.store.store(response.bytes, mediaPath(target, extension, this.token()));
    } catch (error) {
      Logger.debug("Media download failed", { url, error: errorMessage(error) });
      return null;
    }
  }

  /** Downloads every image, filling `localPath` where it succeeded. */
  async downloadAll(images: readonly ProductImage[], target: MediaTarget): Promise<ProductImage[]> {
    const limit = pLimit(this.concurrency);
    return Promise.all(
      images.map((image) =>
        limit(async () => ({ ...image, localPath: await this.download(image.url, target) })),
      ),
    );
  }
}
