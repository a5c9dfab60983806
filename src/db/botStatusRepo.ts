import type { SqliteDb } from "./db";

export type BotStatus = {
  isUpdate: boolean;
  updateMessage: string;
};

type BotStatusRow = { is_update: number; update_msg: string };

const DEFAULT_UPDATE_MESSAGE = "bot is updated !";

/** Read on every update so several processes sharing the database agree on the switch. */
export function getBotStatus(db: SqliteDb): BotStatus {
  const row = db.prepare<[], BotStatusRow>("SELECT is_update, update_msg FROM bot_status WHERE id = 1").get();
  if (!row) {
    return { isUpdate: false, updateMessage: DEFAULT_UPDATE_MESSAGE };
  }
  return { isUpdate: row.is_update === 1, updateMessage: row.update_msg };
}

export function setBotStatus(db: SqliteDb, params: { isUpdate: boolean; updateMessage?: string }) {
  db.prepare(
    [
      "INSERT INTO bot_status (id, is_update, update_msg) VALUES (1, ?, ?)",
      "ON CONFLICT(id) DO UPDATE SET is_update = excluded.is_update,",
      "update_msg = COALESCE(?, bot_status.update_msg)"
    ].join(" ")
  ).run(params.isUpdate ? 1 : 0, params.updateMessage ?? DEFAULT_UPDATE_MESSAGE, params.updateMessage ?? null);
}
