import { listSponsorChannels, type SponsorChannelRow } from "../db/sponsorsRepo";
import { botLog } from "../logger";
import type { UpdateContext } from "./context";
import { buildSponsorChannelsKeyboard } from "./keyboards";
import { getMessageOr } from "./templates";

export const SPONSOR_PROMPT_FALLBACK = "please join in the sponsor channel";

/**
 * Checks every mandatory channel and, when some are not joined, sends the join
 * prompt listing only those. Resolves true when the prompt was sent.
 */
export async function promptUnjoinedSponsors(ctx: UpdateContext): Promise<boolean> {
  const channels = listSponsorChannels(ctx.db);
  if (channels.length === 0) return false;

  const userId = ctx.from?.id ?? ctx.chatId;
  if (userId === undefined) return false;

  const unjoined: SponsorChannelRow[] = [];
  for (const channel of channels) {
    // "other" channels are promotional, and a channel without chat id cannot be checked.
    if (channel.other || !channel.chat_id) continue;
    const membership = await ctx.api.isChatMember(channel.chat_id, userId);
    if (membership.ok && membership.result) continue;
    unjoined.push(channel);
  }

  if (unjoined.length === 0) return false;

  botLog.info({ userId, unjoined: unjoined.map((c) => c.chat_id) }, "Sponsor membership required");
  await ctx.reply(getMessageOr(ctx.db, "sponsor_channels_message", SPONSOR_PROMPT_FALLBACK), {
    parseMode: "HTML",
    replyMarkup: buildSponsorChannelsKeyboard(unjoined)
  });
  return true;
}

/** Wraps an entry-point handler so it only runs once every sponsor channel is joined. */
export function withSponsorGate<A extends unknown[]>(
  handler: (ctx: UpdateContext, ...args: A) => Promise<void>
): (ctx: UpdateContext, ...args: A) => Promise<void> {
  return async (ctx, ...args) => {
    if (await promptUnjoinedSponsors(ctx)) return;
    await handler(ctx, ...args);
  };
}
