/**
 * Persistence ports for sync mappings and scrape jobs
 *
 * The sync engine and the orchestrator only see the interfaces; SQLite backs
 * them in production and the in-memory versions back tests and dry runs.
 */

import { and, asc, desc, eq, isNotNull } from "drizzle-orm";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { ScrapeJob, SyncMapping } from "../types/job";
import { scrapeJobs, syncMappings } from "./schema";

export type JobChanges = Partial<Omit<ScrapeJob, "id" | "siteId">>;

export interface SyncMappingRepository {
  find(siteId: string, externalId: string): Promise<SyncMapping | null>;
  /** Inserts or replaces the mapping for (siteId, externalId). */
  save(mapping: SyncMapping): Promise<void>;
  /** Mappings with a remote product id, ordered by site then external id; `limit` of 0 or less means all. */
  listMapped(limit?: number): Promise<SyncMapping[]>;
}

export interface JobRepository {
  create(siteId: string): Promise<ScrapeJob>;
  update(id: number, changes: JobChanges): Promise<ScrapeJob>;
  get(id: number): Promise<ScrapeJob | null>;
  recent(siteId: string, limit: number): Promise<ScrapeJob[]>;
}

export class SqliteSyncMappingRepository implements SyncMappingRepository {
  constructor(private readonly orm: BetterSQLite3Database) {}

  async find(siteId: string, externalId: string): Promise<SyncMapping | null> {
    const row = this.orm
      .select()
      .from(syncMappings)
      .where(and(eq(syncMappings.siteId, siteId), eq(syncMappings.externalId, externalId)))
      .get();
    return row ?? null;
  }

  async save(mapping: SyncMapping): Promise<void> {
    this.orm
      .insert(syncMappings)
      .values(mapping)
      .onConflictDoUpdate({
        target: [syncMappings.siteId, syncMappings.externalId],
        set: {
          remoteProductId: mapping.remoteProductId,
          lastSyncStatus: mapping.lastSyncStatus,
          lastSyncedAt: mapping.lastSyncedAt,
          lastPayloadSnapshot: mapping.lastPayloadSnapshot,
          lastError: mapping.lastError,
        },
      })
      .run();
  }

  async listMapped(limit = 0): Promise<SyncMapping[]> {
    return this.orm
      .select()
      .from(syncMappings)
      .where(isNotNull(syncMappings.remoteProductId))
      .orderBy(asc(syncMappings.siteId), asc(syncMappings.externalId))
      .limit(limit > 0 ? limit : -1)
      .all();
  }
}

export class SqliteJobRepository implements JobRepository {
  constructor(private readonly orm: BetterSQLite3Database) {}

  async create(siteId: string): Promise<ScrapeJob> {
    return this.orm.insert(scrapeJobs).values({ siteId, status: "pending" }).returning().get();
  }

  async update(id: number, changes: JobChanges): Promise<ScrapeJob> {
    const row = this.orm.update(scrapeJobs).set(changes).where(eq(scrapeJobs.id, id)).returning().get();
    if (!row) throw new Error(`Unknown scrape job ${id}`);
    return row;
  }

  async get(id: number): Promise<ScrapeJob | null> {
    return this.orm.select().from(scrapeJobs).where(eq(scrapeJobs.id, id)).get() ?? null;
  }

  async recent(siteId: string, limit: number): Promise<ScrapeJob[]> {
    return this.orm
      .select()
      .from(scrapeJobs)
      .where(eq(scrapeJobs.siteId, siteId))
      .orderBy(desc(scrapeJobs.id))
      .limit(limit)
      .all();
  }
}

const mappingKey = (siteId: string, externalId: string): string => `${siteId}\u0000${externalId}`;

export class InMemorySyncMappingRepository implements SyncMappingRepository {
  readonly rows = new Map<string, SyncMapping>();

  async find(siteId: string, externalId: string): Promise<SyncMapping | null> {
    const row = this.rows.get(mappingKey(siteId, externalId));
    return row ? { ...row } : null;
  }

  async save(mapping: SyncMapping): Promise<void> {
    this.rows.set(mappingKey(mapping.siteId, mapping.externalId), { ...mapping });
  }

  async listMapped(limit = 0): Promise<SyncMapping[]> {
    const mapped = Array.from(this.rows.entries())
      .filter(([, row]) => row.remoteProductId !== null)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, row]) => ({ ...row }));
    return limit > 0 ? mapped.slice(0, limit) : mapped;
  }
}

export class InMemoryJobRepository implements JobRepository {
  readonly rows = new Map<number, ScrapeJob>();
  private nextId = 1;

  async create(siteId: string): Promise<ScrapeJob> {
    const job: ScrapeJob = {
      id: this.nextId++,
      siteId,
      status: "pending",
      startedAt: null,
      finishedAt: null,
      totalFound: 0,
      totalCreated: 0,
      totalUpdated: 0,
      totalFailed: 0,
      errorMessage: null,
    };
    this.rows.set(job.id, job);
    return { ...job };
  }

  async update(id: number, changes: JobChanges): Promise<ScrapeJob> {
    const current = this.rows.get(id);
    if (!current) throw new Error(`Unknown scrape job ${id}`);
    const next = { ...current, ...changes };
    this.rows.set(id, next);
    return { ...next };
  }

  async get(id: number): Promise<ScrapeJob | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async recent(siteId: string, limit: number): Promise<ScrapeJob[]> {
    return Array.from(this.rows.values())
      .filter((job) => job.siteId === siteId)
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map((job) => ({ ...job }));
  }
}
