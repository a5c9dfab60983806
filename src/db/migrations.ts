import type { SqliteDb } from "./db";

type Migration = {
  id: string;
  run: (db: SqliteDb) => void;
};

type MigrationRow = { id: string };

function ensureMigrationsTable(db: SqliteDb) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    );
  `);
}

const MIGRATIONS: Migration[] = [
  {
    id: "20250101_001_seed_bot_status",
    run: (db) => {
      db.prepare("INSERT OR IGNORE INTO bot_status (id, is_update, update_msg) VALUES (1, 0, ?)").run(
        "bot is updated !"
      );
    }
  },
  {
    id: "20250101_002_indexes",
    run: (db) => {
      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_episodes_session_order ON episodes (session_id, episode_order);
        CREATE INDEX IF NOT EXISTS idx_processed_updates_received_at ON processed_updates (received_at);
        CREATE INDEX IF NOT EXISTS idx_plans_active ON plans (is_active);
      `);
    }
  }
];

function assertUniqueMigrationIds(migrations: Migration[]) {
  const seen = new Set<string>();
  for (const migration of migrations) {
    if (seen.has(migration.id)) {
      throw new Error(`Duplicate migration id: ${migration.id}`);
    }
    seen.add(migration.id);
  }
}

export function applyDbMigrations(db: SqliteDb): { applied: string[]; total: number } {
  assertUniqueMigrationIds(MIGRATIONS);
  ensureMigrationsTable(db);

  const appliedRows = db.prepare<[], MigrationRow>("SELECT id FROM schema_migrations").all();
  const appliedIds = new Set(appliedRows.map((row) => row.id));
  const insertApplied = db.prepare("INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)");

  const newlyApplied: string[] = [];
  const txn = db.transaction(() => {
    for (const migration of MIGRATIONS) {
      if (appliedIds.has(migration.id)) continue;
      migration.run(db);
      insertApplied.run(migration.id, Date.now());
      newlyApplied.push(migration.id);
      appliedIds.add(migration.id);
    }
  });

  txn();
  return { applied: newlyApplied, total: MIGRATIONS.length };
}
