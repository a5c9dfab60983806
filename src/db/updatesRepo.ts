import type { SqliteDb } from "./db";

/** Returns false when this update_id was already recorded (a webhook redelivery). */
export function tryRecordUpdate(db: SqliteDb, updateId: number, receivedAt = Date.now()): boolean {
  const result = db
    .prepare("INSERT INTO processed_updates (update_id, received_at) VALUES (?, ?) ON CONFLICT(update_id) DO NOTHING")
    .run(updateId, receivedAt);
  return result.changes > 0;
}

export function deleteProcessedUpdatesOlderThan(db: SqliteDb, cutoffMs: number): number {
  return db.prepare("DELETE FROM processed_updates WHERE received_at < ?").run(cutoffMs).changes;
}
