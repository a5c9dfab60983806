import type { SqliteDb } from "./db";

export type SponsorChannelRow = {
  id: number;
  name: string | null;
  chat_id: string | null;
  link: string;
  other: number;
};

export function listSponsorChannels(db: SqliteDb): SponsorChannelRow[] {
  return db.prepare<[], SponsorChannelRow>("SELECT * FROM sponsor_channels ORDER BY other DESC, id ASC").all();
}

export function addSponsorChannel(
  db: SqliteDb,
  input: { name?: string | null; chatId?: string | null; link: string; other?: boolean }
): SponsorChannelRow {
  const result = db
    .prepare("INSERT INTO sponsor_channels (name, chat_id, link, other) VALUES (?, ?, ?, ?)")
    .run(input.name ?? null, input.chatId ?? null, input.link, input.other ? 1 : 0);
  const created = db
    .prepare<[number], SponsorChannelRow>("SELECT * FROM sponsor_channels WHERE id = ?")
    .get(Number(result.lastInsertRowid));
  if (!created) {
    throw new Error("Sponsor channel vanished right after insert");
  }
  return created;
}
