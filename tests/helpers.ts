import { vi } from "vitest";

import type { BotDeps, BotSettings } from "../src/bot/context";
import { IN_MEMORY_DB_PATH, openDatabase, type SqliteDb } from "../src/db/db";
import { getOrCreateUser, type UserRow } from "../src/db/usersRepo";
import type { BotApi } from "../src/telegram/botApi";
import type { Message, Update } from "../src/telegram/update";

export function createTestDb(): SqliteDb {
  return openDatabase(IN_MEMORY_DB_PATH);
}

export function createFakeApi() {
  let nextMessageId = 500;
  return {
    sendMessage: vi.fn<BotApi["sendMessage"]>(async () => ({ ok: true, result: { message_id: nextMessageId++ } })),
    editMessageText: vi.fn<BotApi["editMessageText"]>(async () => ({ ok: true, result: true })),
    deleteMessage: vi.fn<BotApi["deleteMessage"]>(async () => ({ ok: true, result: true })),
    copyMessage: vi.fn<BotApi["copyMessage"]>(async () => ({ ok: true, result: { message_id: nextMessageId++ } })),
    isChatMember: vi.fn<BotApi["isChatMember"]>(async () => ({ ok: true, result: true })),
    answerCallbackQuery: vi.fn<BotApi["answerCallbackQuery"]>(async () => ({ ok: true, result: true })),
    setWebhook: vi.fn<BotApi["setWebhook"]>(async () => ({ ok: true, result: true }))
  } satisfies BotApi;
}

export type FakeApi = ReturnType<typeof createFakeApi>;

export type BackgroundTask = { name: string; task: () => Promise<void> };

export function createTestDeps(settings: Partial<BotSettings> = {}) {
  const db = createTestDb();
  const api = createFakeApi();
  const tasks: BackgroundTask[] = [];
  const deps: BotDeps = {
    db,
    api,
    settings: {
      BOT_USERNAME: "test_bot",
      BACKUP_CHANNEL_ID: "-100123",
      EXTRA_CAPTION: "",
      DELIVERY_DELETE_AFTER_SECONDS: 0,
      ...settings
    },
    runInBackground: (name, task) => {
      tasks.push({ name, task });
    }
  };
  return { db, api, deps, tasks };
}

export const ADMIN_ID = 9001;
export const USER_ID = 4242;

export function seedUser(db: SqliteDb, telegramUserId: number, fields: { superuser?: boolean; step?: string } = {}): UserRow {
  const user = getOrCreateUser(db, { telegramUserId, firstName: "Test" });
  db.prepare("UPDATE users SET is_superuser = ?, step = ? WHERE id = ?").run(
    fields.superuser ? 1 : 0,
    fields.step ?? user.step,
    user.id
  );
  return { ...user, is_superuser: fields.superuser ? 1 : 0, step: fields.step ?? user.step };
}

export function readStep(db: SqliteDb, telegramUserId: number): string | undefined {
  return db
    .prepare<[number], { step: string }>("SELECT step FROM users WHERE telegram_user_id = ?")
    .get(telegramUserId)?.step;
}

let updateSeq = 1;
let messageSeq = 1;

export function buildMessage(fromId: number, fields: Partial<Message> = {}): Message {
  return {
    message_id: messageSeq++,
    date: 1_700_000_000,
    chat: { id: fromId, type: "private" },
    from: { id: fromId, is_bot: false, first_name: "Test" },
    ...fields
  };
}

export function textUpdate(fromId: number, text: string): Update {
  return { update_id: updateSeq++, message: buildMessage(fromId, { text }) };
}

export function messageUpdate(fromId: number, fields: Partial<Message>): Update {
  return { update_id: updateSeq++, message: buildMessage(fromId, fields) };
}

export function callbackUpdate(fromId: number, data: string, carrierText = "menu"): Update {
  return {
    update_id: updateSeq++,
    callback_query: {
      id: `cb-${updateSeq}`,
      from: { id: fromId, is_bot: false, first_name: "Test" },
      message: buildMessage(fromId, { text: carrierText }),
      data
    }
  };
}

export const file = (id: string) => ({ file_id: id, file_unique_id: `u-${id}` });

/** Text of the n-th sendMessage call (0-based). */
export function sentText(api: FakeApi, index = 0): string | undefined {
  return api.sendMessage.mock.calls[index]?.[1];
}
