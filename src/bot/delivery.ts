import { setTimeout as sleep } from "node:timers/promises";

import { parseLinkToken, SESSION_LINK_PREFIX } from "../content/links";
import {
  getContentSession,
  getContentSessionByLink,
  getEpisodeByLink,
  incrementSessionCounter,
  listEpisodes,
  type ContentSessionRow,
  type EpisodeRow
} from "../db/contentRepo";
import { listActivePlans } from "../db/plansRepo";
import { hasActiveSubscription } from "../db/usersRepo";
import { botLog } from "../logger";
import type { UpdateContext } from "./context";
import { buildPlansKeyboard, buildVoteKeyboard } from "./keyboards";
import { getMessage } from "./templates";

export const CONTENT_NOT_FOUND = "❌ محتوا پیدا نشد.";

export type DeliveryOutcome =
  | { kind: "not_found" }
  | { kind: "no_access"; sessionId: number }
  | { kind: "scheduled"; sessionId: number; episodes: number };

function resolveLink(ctx: UpdateContext, link: string): { session: ContentSessionRow; episodes: EpisodeRow[] } | null {
  const parsed = parseLinkToken(link);
  if (!parsed) return null;

  if (parsed.prefix === SESSION_LINK_PREFIX) {
    const session = getContentSessionByLink(ctx.db, parsed.token);
    return session ? { session, episodes: listEpisodes(ctx.db, session.id) } : null;
  }

  const episode = getEpisodeByLink(ctx.db, parsed.token);
  if (!episode) return null;
  const session = getContentSession(ctx.db, episode.session_id);
  return session ? { session, episodes: [episode] } : null;
}

export function deliveryNotice(deleteAfterSeconds: number): string {
  return `⏳ این محتوا پس از ${deleteAfterSeconds} ثانیه حذف می‌شود، لطفا آن را در پیام‌های ذخیره شده نگه دارید.`;
}

/**
 * Copies one stored episode into the user chat, waits, then removes the copy.
 * Runs detached from the update that asked for it.
 */
async function copyAndExpire(ctx: UpdateContext, chatId: number, episode: EpisodeRow): Promise<void> {
  const { BACKUP_CHANNEL_ID, DELIVERY_DELETE_AFTER_SECONDS } = ctx.settings;

  const copied = await ctx.api.copyMessage(chatId, BACKUP_CHANNEL_ID, episode.message_id, { protectContent: true });
  if (!copied.ok) {
    throw new Error(`copyMessage failed for episode ${episode.id}: ${copied.error}`);
  }

  await sleep(DELIVERY_DELETE_AFTER_SECONDS * 1000);

  const deleted = await ctx.api.deleteMessage(chatId, copied.result.message_id);
  if (!deleted.ok) {
    throw new Error(`deleteMessage failed for episode ${episode.id}: ${deleted.error}`);
  }
}

/** Handles a `/start <link>` deep link. */
export async function deliverContent(ctx: UpdateContext, link: string): Promise<DeliveryOutcome> {
  const chatId = ctx.chatId;
  const resolved = chatId === undefined ? null : resolveLink(ctx, link);
  if (chatId === undefined || !resolved) {
    await ctx.reply(CONTENT_NOT_FOUND);
    return { kind: "not_found" };
  }

  const { session, episodes } = resolved;
  const user = ctx.user;
  if (!user || !(user.is_superuser === 1 || hasActiveSubscription(user))) {
    await ctx.reply(getMessage(ctx.db, "payment_plan_message"), {
      parseMode: "Markdown",
      replyMarkup: buildPlansKeyboard(listActivePlans(ctx.db))
    });
    return { kind: "no_access", sessionId: session.id };
  }

  const counted = incrementSessionCounter(ctx.db, session.id, "views") ?? session;

  for (const episode of episodes) {
    ctx.deps.runInBackground(`deliver:${episode.link}`, () => copyAndExpire(ctx, chatId, episode));
  }
  botLog.info({ sessionId: session.id, episodes: episodes.length, chatId }, "Content delivery scheduled");

  await ctx.reply(deliveryNotice(ctx.settings.DELIVERY_DELETE_AFTER_SECONDS), {
    replyMarkup: buildVoteKeyboard(counted)
  });
  return { kind: "scheduled", sessionId: session.id, episodes: episodes.length };
}
