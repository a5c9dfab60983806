import {
  EPISODE_LINK_PREFIX,
  SESSION_LINK_PREFIX,
  generateLinkToken,
  insertWithUniqueLink,
  type LinkGenerator
} from "../content/links";
import type { MediaKind } from "../telegram/update";
import type { SqliteDb } from "./db";

export type ContentType = "movie" | "series";

export type ContentSessionRow = {
  id: number;
  title: string;
  content_type: ContentType;
  link: string;
  views: number;
  likes: number;
  dislikes: number;
  created_at: number;
};

export type EpisodeRow = {
  id: number;
  session_id: number;
  link: string;
  message_id: number;
  media_kind: MediaKind | null;
  episode_order: number;
  created_at: number;
};

export type SessionCounter = "views" | "likes" | "dislikes";

export function isContentType(value: string): value is ContentType {
  return value === "movie" || value === "series";
}

export function getContentSession(db: SqliteDb, sessionId: number): ContentSessionRow | null {
  return db.prepare<[number], ContentSessionRow>("SELECT * FROM content_sessions WHERE id = ?").get(sessionId) ?? null;
}

export function getContentSessionByLink(db: SqliteDb, link: string): ContentSessionRow | null {
  return db.prepare<[string], ContentSessionRow>("SELECT * FROM content_sessions WHERE link = ?").get(link) ?? null;
}

export function createContentSession(
  db: SqliteDb,
  input: { title: string; contentType: ContentType },
  generate: LinkGenerator = generateLinkToken
): ContentSessionRow {
  return insertWithUniqueLink(
    SESSION_LINK_PREFIX,
    (link) => {
      const result = db
        .prepare("INSERT INTO content_sessions (title, content_type, link, created_at) VALUES (?, ?, ?, ?)")
        .run(input.title, input.contentType, link, Date.now());
      const created = getContentSession(db, Number(result.lastInsertRowid));
      if (!created) {
        throw new Error("Content session vanished right after insert");
      }
      return created;
    },
    generate
  );
}

/** Episodes go with it (ON DELETE CASCADE). Returns false when nothing was deleted. */
export function deleteContentSession(db: SqliteDb, sessionId: number): boolean {
  return db.prepare("DELETE FROM content_sessions WHERE id = ?").run(sessionId).changes > 0;
}

export function incrementSessionCounter(db: SqliteDb, sessionId: number, counter: SessionCounter): ContentSessionRow | null {
  // Column names come from the SessionCounter union, never from user input.
  db.prepare(`UPDATE content_sessions SET ${counter} = ${counter} + 1 WHERE id = ?`).run(sessionId);
  return getContentSession(db, sessionId);
}

export function getEpisode(db: SqliteDb, episodeId: number): EpisodeRow | null {
  return db.prepare<[number], EpisodeRow>("SELECT * FROM episodes WHERE id = ?").get(episodeId) ?? null;
}

export function getEpisodeByLink(db: SqliteDb, link: string): EpisodeRow | null {
  return db.prepare<[string], EpisodeRow>("SELECT * FROM episodes WHERE link = ?").get(link) ?? null;
}

export function listEpisodes(db: SqliteDb, sessionId: number): EpisodeRow[] {
  return db
    .prepare<[number], EpisodeRow>("SELECT * FROM episodes WHERE session_id = ? ORDER BY episode_order ASC, id ASC")
    .all(sessionId);
}

export function countEpisodes(db: SqliteDb, sessionId: number): number {
  const row = db
    .prepare<[number], { count: number }>("SELECT COUNT(*) AS count FROM episodes WHERE session_id = ?")
    .get(sessionId);
  return Number(row?.count ?? 0);
}

/**
 * Next order is max(existing order) + 1, or 1 for the first episode. The read and
 * the insert share one transaction, so two uploads into the same session on this
 * connection cannot receive the same order.
 */
export function createEpisode(
  db: SqliteDb,
  input: { sessionId: number; messageId: number; mediaKind: MediaKind | null },
  generate: LinkGenerator = generateLinkToken
): EpisodeRow {
  const insert = db.transaction((link: string) => {
    const last = db
      .prepare<[number], { episode_order: number }>(
        "SELECT episode_order FROM episodes WHERE session_id = ? ORDER BY episode_order DESC LIMIT 1"
      )
      .get(input.sessionId);
    const order = last ? last.episode_order + 1 : 1;

    const result = db
      .prepare(
        "INSERT INTO episodes (session_id, link, message_id, media_kind, episode_order, created_at) VALUES (?, ?, ?, ?, ?, ?)"
      )
      .run(input.sessionId, link, input.messageId, input.mediaKind, order, Date.now());

    const created = getEpisode(db, Number(result.lastInsertRowid));
    if (!created) {
      throw new Error("Episode vanished right after insert");
    }
    return created;
  });

  return insertWithUniqueLink(EPISODE_LINK_PREFIX, (link) => insert(link), generate);
}

export function deleteEpisode(db: SqliteDb, episodeId: number): boolean {
  return db.prepare("DELETE FROM episodes WHERE id = ?").run(episodeId).changes > 0;
}
