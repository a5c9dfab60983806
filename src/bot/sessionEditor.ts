import {
  countEpisodes,
  deleteContentSession,
  deleteEpisode,
  getContentSession,
  getEpisode,
  listEpisodes,
  type ContentSessionRow
} from "../db/contentRepo";
import { buildShareUrl } from "../content/links";
import type { UpdateContext } from "./context";
import { buildAdminHomeKeyboard, buildConfirmDeleteKeyboard, buildSessionEditKeyboard } from "./keyboards";
import { escapeMarkdown } from "./markdown";

export type DeletableObject = "e" | "s";

export const SESSION_NOT_FOUND = "❌ سشن پیدا نشد.";
export const OBJECT_NOT_FOUND = "❌ مورد مورد نظر پیدا نشد.";
export const SESSION_OR_EPISODE_NOT_FOUND = "❌ سشن یا اپیزود مورد نظر پیدا نشد.";
export const SESSION_DELETED = "✅ سشن مورد نظر حذف شد.";
export const DELETE_WARNING = "🚨 هشدار: این عملیات غیرقابل بازگشت است!\nآیا مطمئن هستید؟";

export function buildSessionInfoMessage(session: ContentSessionRow, episodeCount: number, botUsername: string): string {
  const type = session.content_type === "series" ? "سریال" : "فیلم";
  return (
    "📌 *اطلاعات سشن*\n\n" +
    `🎬 *اسم سشن:* ${escapeMarkdown(session.title)}\n` +
    `📺 *تعداد قسمت‌ها:* \`${episodeCount}\`\n` +
    `📂 *نوع:* \`${type}\`\n` +
    `🔗 \`${buildShareUrl(botUsername, session.link)}\`\n`
  );
}

/**
 * Shows the edit screen of a session. Inside a callback query the message that
 * carried the button is edited in place, otherwise a new message is sent.
 */
export async function showSessionEditor(ctx: UpdateContext, sessionId: number): Promise<void> {
  const session = getContentSession(ctx.db, sessionId);
  if (!session) {
    await ctx.reply(SESSION_NOT_FOUND);
    return;
  }

  const text = buildSessionInfoMessage(session, countEpisodes(ctx.db, session.id), ctx.settings.BOT_USERNAME);
  const replyMarkup = buildSessionEditKeyboard(session, listEpisodes(ctx.db, session.id));

  const carrier = ctx.callbackQuery?.message;
  if (carrier) {
    await ctx.api.editMessageText(carrier.chat.id, carrier.message_id, text, { parseMode: "Markdown", replyMarkup });
    return;
  }
  await ctx.reply(text, { parseMode: "Markdown", replyMarkup });
}

export async function confirmDelete(ctx: UpdateContext, objectType: DeletableObject, objectId: number): Promise<void> {
  const exists =
    objectType === "s" ? getContentSession(ctx.db, objectId) !== null : getEpisode(ctx.db, objectId) !== null;
  if (!exists) {
    await ctx.reply(OBJECT_NOT_FOUND);
    return;
  }

  const replyMarkup = buildConfirmDeleteKeyboard(objectType, objectId);
  const carrier = ctx.callbackQuery?.message;
  if (carrier) {
    await ctx.api.editMessageText(carrier.chat.id, carrier.message_id, DELETE_WARNING, { replyMarkup });
    return;
  }
  await ctx.reply(DELETE_WARNING, { replyMarkup });
}

function owningSessionId(ctx: UpdateContext, objectType: DeletableObject, objectId: number): number | null {
  if (objectType === "s") {
    return getContentSession(ctx.db, objectId)?.id ?? null;
  }
  return getEpisode(ctx.db, objectId)?.session_id ?? null;
}

/** Answer to the confirmation screen; "no" goes back to the edit screen. */
export async function resolveDelete(
  ctx: UpdateContext,
  confirmed: boolean,
  objectType: DeletableObject,
  objectId: number
): Promise<void> {
  const sessionId = owningSessionId(ctx, objectType, objectId);
  if (sessionId === null) {
    await ctx.reply(SESSION_OR_EPISODE_NOT_FOUND);
    return;
  }

  if (!confirmed) {
    await showSessionEditor(ctx, sessionId);
    return;
  }

  if (objectType === "s") {
    ctx.setStep({ name: "admin_home" });
    deleteContentSession(ctx.db, sessionId);
    await ctx.reply(SESSION_DELETED, { parseMode: "Markdown", replyMarkup: buildAdminHomeKeyboard() });
    return;
  }

  deleteEpisode(ctx.db, objectId);
  await showSessionEditor(ctx, sessionId);
}
