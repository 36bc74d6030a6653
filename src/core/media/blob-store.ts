/**
 * Blob storage for downloaded media and debug dumps
 */

import { promises as fs } from "fs";
import path from "node:path";
import { errorMessage } from "../errors";
import { Logger } from "../utils/logger";

export interface BlobStore {
  /** Stores bytes under a relative path; null when the write failed. */
  store(bytes: Buffer, relativePath: string): Promise<string | null>;
  /** Bytes previously stored under `relativePath`, or null. */
  read(relativePath: string): Promise<Buffer | null>;
}

const normalizeRelative = (relativePath: string): string =>
  path.posix.normalize(relativePath.replace(/\\/g, "/")).replace(/^(\.\.\/|\/)+/, "");

/** Writes under a root directory on the local filesystem. */
export class LocalBlobStore implements BlobStore {
  constructor(private readonly rootDir: string) {}

  async store(bytes: Buffer, relativePath: string): Promise<string | null> {
    const normalized = normalizeRelative(relativePath);
    const target = path.join(this.rootDir, normalized);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, bytes);
      return normalized;
    } catch (error) {
      Logger.warn("Blob write failed", { path: normalized, error: errorMessage(error) });
      return null;
    }
  }

  async read(relativePath: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(path.join(this.rootDir, normalizeRelative(relativePath)));
    } catch (error) {
      Logger.warn("Blob read failed", { path: relativePath, error: errorMessage(error) });
      return null;
    }
  }
}

/** In-process store, used by tests and dry runs. */
export class MemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, Buffer>();

  async store(bytes: Buffer, relativePath: string): Promise<string | null> {
    this.blobs.set(relativePath, bytes);
    return relativePath;
  }

  async read(relativePath: string): Promise<Buffer | null> {
    return this.blobs.get(relativePath) ?? null;
  }
}
