/**
 * Database connection management
 */

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../errors";
import { Logger } from "../utils/logger";
import { initSchema } from "./schema";

/**
 * Database connection handles
 */
export interface DbHandles {
  db: Database.Database;
  orm: BetterSQLite3Database;
}

const OPTIONAL_PRAGMAS = ["cache_size = -200000", "temp_store = MEMORY", "mmap_size = 268435456"];

/**
 * Opens a database connection with WAL settings and initializes the schema.
 * `:memory:` opens a throwaway in-process database.
 */
export function openDb(dbPath: string): DbHandles {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");
  for (const pragma of OPTIONAL_PRAGMAS) {
    try {
      db.pragma(pragma);
    } catch (error) {
      Logger.debug("Optional pragma rejected", { pragma, error: errorMessage(error) });
    }
  }
  initSchema(db);
  return { db, orm: drizzle(db) };
}

/**
 * Closes a database connection
 */
export function closeDb(h: DbHandles): void {
  h.db.close();
}
