import type { Env } from "../config/env";
import type { SqliteDb } from "../db/db";
import { getOrCreateUser, setStep, type UserRow } from "../db/usersRepo";
import { botLog } from "../logger";
import type { ApiResult, BotApi, SendMessageOptions, SentMessage } from "../telegram/botApi";
import type { CallbackQuery, Chat, Message, TelegramUser, Update } from "../telegram/update";
import { serializeStep, type Step } from "./steps";

export type BotSettings = Pick<
  Env,
  "BOT_USERNAME" | "BACKUP_CHANNEL_ID" | "EXTRA_CAPTION" | "DELIVERY_DELETE_AFTER_SECONDS"
>;

/** Starts work the current update does not wait for. Failures are the task's own business. */
export type BackgroundRunner = (name: string, task: () => Promise<void>) => void;

export type BotDeps = {
  db: SqliteDb;
  api: BotApi;
  settings: BotSettings;
  runInBackground: BackgroundRunner;
};

export const runDetached: BackgroundRunner = (name, task) => {
  task().catch((err: unknown) => {
    botLog.warn({ err, task: name }, "Background task failed");
  });
};

/**
 * Everything a handler needs for one update. The user record is loaded (or
 * created) on first access and only for private chats.
 */
export class UpdateContext {
  private cachedUser: UserRow | null | undefined;

  constructor(
    readonly update: Update,
    readonly deps: BotDeps
  ) {}

  get db(): SqliteDb {
    return this.deps.db;
  }

  get api(): BotApi {
    return this.deps.api;
  }

  get settings(): BotSettings {
    return this.deps.settings;
  }

  get message(): Message | undefined {
    return this.update.message;
  }

  get callbackQuery(): CallbackQuery | undefined {
    return this.update.callback_query;
  }

  get chat(): Chat | undefined {
    return this.update.message?.chat ?? this.update.callback_query?.message?.chat;
  }

  get from(): TelegramUser | undefined {
    return this.update.message?.from ?? this.update.callback_query?.from;
  }

  get chatId(): number | undefined {
    return this.chat?.id;
  }

  isPrivate(): boolean {
    return this.chat?.type === "private";
  }

  get user(): UserRow | null {
    if (this.cachedUser !== undefined) return this.cachedUser;

    const from = this.from;
    if (!from || !this.isPrivate()) {
      this.cachedUser = null;
      return null;
    }

    this.cachedUser = getOrCreateUser(this.db, {
      telegramUserId: from.id,
      username: from.username,
      firstName: from.first_name,
      lastName: from.last_name
    });
    return this.cachedUser;
  }

  isSuperuser(): boolean {
    return this.user?.is_superuser === 1;
  }

  setStep(step: Step) {
    const user = this.user;
    if (!user) {
      botLog.warn({ step: step.name }, "setStep called without a user record");
      return;
    }
    const raw = serializeStep(step);
    setStep(this.db, user.id, raw);
    this.cachedUser = { ...user, step: raw };
  }

  async reply(text: string, options?: SendMessageOptions): Promise<ApiResult<SentMessage>> {
    const chatId = this.chatId;
    if (chatId === undefined) {
      return { ok: false, error: "no_chat" };
    }
    return this.api.sendMessage(chatId, text, options);
  }
}
