/**
 * Re-push translated descriptions to products that are already in the catalog
 *
 * The translation is read from the last payload snapshot of each mapping, so
 * nothing is scraped again. Only `description` is sent.
 */

import { z } from "zod";
import type { SyncMappingRepository } from "../database/repositories";
import { errorMessage } from "../errors";
import { parseJson } from "../json/value";
import type { SyncMapping } from "../types/job";
import { Logger } from "../utils/logger";
import type { CatalogClient } from "./sync-service";

export interface DescriptionPushOptions {
  /** Max mappings to visit; 0 or unset means all. */
  limit?: number;
  /** Count what would be updated without calling the catalog. */
  dryRun?: boolean;
}

export interface DescriptionPushStats {
  total: number;
  updated: number;
  skipped: number;
  failed: number;
}

export interface DescriptionPushDeps {
  client: Pick<CatalogClient, "updateProduct">;
  mappings: Pick<SyncMappingRepository, "listMapped">;
}

const SnapshotSchema = z.object({
  meta_data: z.array(z.object({ key: z.string(), value: z.unknown() })).default([]),
});

/** `description_translated` from a payload snapshot, or null when absent or blank. */
export function translatedDescription(snapshot: string | null): string | null {
  if (!snapshot) return null;
  const parsed = SnapshotSchema.safeParse(parseJson(snapshot));
  if (!parsed.success) return null;
  const entry = parsed.data.meta_data.find((m) => m.key === "description_translated");
  return typeof entry?.value === "string" && entry.value.trim() ? entry.value : null;
}

export async function pushDescriptions(
  deps: DescriptionPushDeps,
  options: DescriptionPushOptions = {},
): Promise<DescriptionPushStats> {
  const mappings = await deps.mappings.listMapped(options.limit ?? 0);
  const stats: DescriptionPushStats = { total: mappings.length, updated: 0, skipped: 0, failed: 0 };

  Logger.info("Pushing translated descriptions", { total: stats.total, dryRun: options.dryRun ?? false });

  for (const mapping of mappings) {
    const description = translatedDescription(mapping.lastPayloadSnapshot);
    if (mapping.remoteProductId === null || description === null) {
      stats.skipped++;
      continue;
    }
    if (options.dryRun) {
      stats.updated++;
      continue;
    }
    if (await pushOne(deps.client, mapping, mapping.remoteProductId, description)) stats.updated++;
    else stats.failed++;
  }

  Logger.info("Description push finished", { ...stats });
  return stats;
}

async function pushOne(
  client: DescriptionPushDeps["client"],
  mapping: SyncMapping,
  remoteId: number,
  description: string,
): Promise<boolean> {
  try {
    await client.updateProduct(remoteId, { description });
    Logger.debug("Description updated", { site: mapping.siteId, externalId: mapping.externalId, remoteId });
    return true;
  } catch (error) {
    Logger.warn("Description update failed", {
      site: mapping.siteId,
      externalId: mapping.externalId,
      remoteId,
      error: errorMessage(error),
    });
    return false;
  }
}
