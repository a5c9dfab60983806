import type { SqliteDb } from "./db";

export function getTemplateText(db: SqliteDb, name: string): string | null {
  const row = db
    .prepare<[string], { text: string }>("SELECT text FROM message_templates WHERE name = ?")
    .get(name.trim());
  return row?.text ?? null;
}

export function upsertTemplate(db: SqliteDb, name: string, text: string) {
  db.prepare(
    "INSERT INTO message_templates (name, text) VALUES (?, ?) ON CONFLICT(name) DO UPDATE SET text = excluded.text"
  ).run(name.trim(), text);
}
