import { Telegram, TelegramError } from "telegraf";
import { apiLog } from "../logger";
import type { InlineKeyboard, ReplyKeyboard } from "../bot/keyboards";
import type { MessageEntity } from "./update";

export type ChatId = number | string;

export type ParseMode = "HTML" | "Markdown" | "MarkdownV2";

export type ReplyMarkup = InlineKeyboard | ReplyKeyboard;

export type ApiResult<T> = { ok: true; result: T } | { ok: false; error: string; errorCode?: number };

export type SendMessageOptions = {
  parseMode?: ParseMode;
  replyMarkup?: ReplyMarkup;
  replyToMessageId?: number;
};

export type EditMessageTextOptions = {
  parseMode?: ParseMode;
  replyMarkup?: InlineKeyboard;
};

export type CopyMessageOptions = {
  caption?: string;
  captionEntities?: MessageEntity[];
  parseMode?: ParseMode;
  protectContent?: boolean;
};

export type SentMessage = { message_id: number };

/**
 * The subset of the Bot API the bot relies on. Every call resolves; transport and
 * Telegram-side failures come back as `{ ok: false }`.
 */
export interface BotApi {
  sendMessage(chatId: ChatId, text: string, options?: SendMessageOptions): Promise<ApiResult<SentMessage>>;
  editMessageText(
    chatId: ChatId,
    messageId: number,
    text: string,
    options?: EditMessageTextOptions
  ): Promise<ApiResult<unknown>>;
  deleteMessage(chatId: ChatId, messageId: number): Promise<ApiResult<boolean>>;
  copyMessage(
    chatId: ChatId,
    fromChatId: ChatId,
    messageId: number,
    options?: CopyMessageOptions
  ): Promise<ApiResult<SentMessage>>;
  isChatMember(chatId: ChatId, userId: number): Promise<ApiResult<boolean>>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<ApiResult<boolean>>;
  setWebhook(url: string, secretToken?: string): Promise<ApiResult<boolean>>;
}

const JOINED_STATUSES = new Set(["creator", "administrator", "member"]);

export function isJoinedMember(member: { status: string; is_member?: boolean }): boolean {
  if (JOINED_STATUSES.has(member.status)) return true;
  return member.status === "restricted" && member.is_member === true;
}

export class TelegramTimeoutError extends Error {
  constructor(
    readonly method: string,
    readonly timeoutMs: number
  ) {
    super(`${method} timed out after ${timeoutMs}ms`);
    this.name = "TelegramTimeoutError";
  }
}

function withTimeout<T>(method: string, timeoutMs: number, promise: Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TelegramTimeoutError(method, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export type CreateBotApiParams = {
  token: string;
  baseUrl: string;
  timeoutMs: number;
  /** Prebuilt client; tests pass one whose methods are spied on. */
  telegram?: Telegram;
};

export function createBotApi(params: CreateBotApiParams): BotApi {
  const { token, baseUrl, timeoutMs } = params;
  const telegram = params.telegram ?? new Telegram(token, { apiRoot: baseUrl.replace(/\/+$/, "") });

  async function attempt<T>(method: string, run: () => Promise<T>): Promise<ApiResult<T>> {
    try {
      return { ok: true, result: await withTimeout(method, timeoutMs, run()) };
    } catch (err) {
      if (err instanceof TelegramError) {
        apiLog.warn({ method, errorCode: err.code, description: err.description }, "Bot API call rejected");
        return { ok: false, error: err.description, errorCode: err.code };
      }
      const message = err instanceof Error ? err.message : String(err);
      apiLog.warn({ method, error: message }, "Bot API transport failure");
      return { ok: false, error: message };
    }
  }

  return {
    sendMessage: (chatId, text, options = {}) =>
      attempt("sendMessage", () =>
        telegram.sendMessage(chatId, text, {
          parse_mode: options.parseMode,
          reply_markup: options.replyMarkup,
          reply_parameters:
            options.replyToMessageId !== undefined
              ? { message_id: options.replyToMessageId, allow_sending_without_reply: true }
              : undefined
        })
      ),

    editMessageText: (chatId, messageId, text, options = {}) =>
      attempt("editMessageText", () =>
        telegram.editMessageText(chatId, messageId, undefined, text, {
          parse_mode: options.parseMode,
          reply_markup: options.replyMarkup
        })
      ),

    deleteMessage: (chatId, messageId) => attempt("deleteMessage", () => telegram.deleteMessage(chatId, messageId)),

    copyMessage: (chatId, fromChatId, messageId, options = {}) =>
      attempt("copyMessage", () =>
        telegram.copyMessage(chatId, fromChatId, messageId, {
          caption: options.caption,
          caption_entities: options.captionEntities,
          parse_mode: options.parseMode,
          protect_content: options.protectContent
        })
      ),

    isChatMember: async (chatId, userId) => {
      const member = await attempt("getChatMember", () => telegram.getChatMember(chatId, userId));
      return member.ok ? { ok: true, result: isJoinedMember(member.result) } : member;
    },

    answerCallbackQuery: (callbackQueryId, text) =>
      attempt("answerCallbackQuery", () => telegram.answerCbQuery(callbackQueryId, text)),

    setWebhook: (url, secretToken) =>
      attempt("setWebhook", () =>
        telegram.setWebhook(url, {
          secret_token: secretToken,
          allowed_updates: ["message", "callback_query"]
        })
      )
  };
}
