import type { SqliteDb } from "./db";
import { deleteProcessedUpdatesOlderThan } from "./updatesRepo";

export type DbMaintenanceResult = {
  nowMs: number;
  processedUpdatesCutoffMs: number;
  deletedProcessedUpdates: number;
};

export function runDbMaintenance(params: {
  db: SqliteDb;
  processedUpdatesRetentionDays: number;
  nowMs?: number;
}): DbMaintenanceResult {
  const { db, processedUpdatesRetentionDays } = params;
  const nowMs = params.nowMs ?? Date.now();
  const retentionDays = Math.max(1, Math.floor(processedUpdatesRetentionDays));
  const processedUpdatesCutoffMs = nowMs - retentionDays * 24 * 60 * 60 * 1000;

  let deletedProcessedUpdates = 0;
  const txn = db.transaction(() => {
    deletedProcessedUpdates = deleteProcessedUpdatesOlderThan(db, processedUpdatesCutoffMs);
  });
  txn();

  return {
    nowMs,
    processedUpdatesCutoffMs,
    deletedProcessedUpdates
  };
}
