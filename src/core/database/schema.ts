/**
 * Database schema: drizzle table definitions plus the DDL that creates them
 */

import type Database from "better-sqlite3";
import { integer, primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const syncMappings = sqliteTable(
  "sync_mappings",
  {
    siteId: text("site_id").notNull(),
    externalId: text("external_id").notNull(),
    remoteProductId: integer("remote_product_id"),
    lastSyncStatus: text("last_sync_status", { enum: ["success", "failed"] }).notNull(),
    lastSyncedAt: text("last_synced_at").notNull(),
    lastPayloadSnapshot: text("last_payload_snapshot"),
    lastError: text("last_error"),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.siteId, t.externalId] }),
  }),
);

export const scrapeJobs = sqliteTable("scrape_jobs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  siteId: text("site_id").notNull(),
  status: text("status", { enum: ["pending", "running", "success", "failed"] }).notNull(),
  startedAt: text("started_at"),
  finishedAt: text("finished_at"),
  totalFound: integer("total_found").notNull().default(0),
  totalCreated: integer("total_created").notNull().default(0),
  totalUpdated: integer("total_updated").notNull().default(0),
  totalFailed: integer("total_failed").notNull().default(0),
  errorMessage: text("error_message"),
});

/**
 * Creates every table and index if missing. Safe to run on each start.
 */
export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS sync_mappings (
      site_id TEXT NOT NULL,
      external_id TEXT NOT NULL,
      remote_product_id INTEGER,
      last_sync_status TEXT NOT NULL CHECK (last_sync_status IN ('success', 'failed')),
      last_synced_at TEXT NOT NULL,
      last_payload_snapshot TEXT,
      last_error TEXT,
      PRIMARY KEY (site_id, external_id)
    );

    CREATE TABLE IF NOT EXISTS scrape_jobs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      site_id TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('pending', 'running', 'success', 'failed')),
      started_at TEXT,
      finished_at TEXT,
      total_found INTEGER NOT NULL DEFAULT 0,
      total_created INTEGER NOT NULL DEFAULT 0,
      total_updated INTEGER NOT NULL DEFAULT 0,
      total_failed INTEGER NOT NULL DEFAULT 0,
      error_message TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_sync_mappings_remote ON sync_mappings(remote_product_id)
      WHERE remote_product_id IS NOT NULL;
    CREATE INDEX IF NOT EXISTS idx_scrape_jobs_site ON scrape_jobs(site_id, id DESC);
  `);
}
