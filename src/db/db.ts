import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { applyDbMigrations } from "./migrations";
import { SCHEMA_SQL } from "./schema";
import { logger } from "../logger";

export type SqliteDb = Database.Database;

export const IN_MEMORY_DB_PATH = ":memory:";

export function openSqlite(dbPath: string): SqliteDb {
  const inMemory = dbPath === IN_MEMORY_DB_PATH;
  if (!inMemory) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  // In-memory databases keep their own journal mode.
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  // Episodes are removed with their session through ON DELETE CASCADE.
  if (db.pragma("foreign_keys", { simple: true }) !== 1) {
    db.close();
    throw new Error("SQLite foreign key enforcement could not be enabled");
  }
  return db;
}

export function applySchema(db: SqliteDb, schemaSql: string = SCHEMA_SQL) {
  db.exec(schemaSql);

  try {
    const result = applyDbMigrations(db);
    if (result.applied.length > 0) {
      logger.info({ appliedMigrations: result.applied }, "Applied DB migrations");
    }
    logger.info({ totalMigrations: result.total, appliedCount: result.applied.length }, "DB migration check complete");
  } catch (err) {
    logger.error({ err }, "Failed to apply schema migrations");
    throw err;
  }
}

/** Opens the database and brings the schema up to date. */
export function openDatabase(dbPath: string): SqliteDb {
  const db = openSqlite(dbPath);
  applySchema(db);
  return db;
}
