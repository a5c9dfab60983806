import { buildShareUrl } from "../../content/links";
import { createEpisode, getContentSession } from "../../db/contentRepo";
import { botLog } from "../../logger";
import { detectMediaKind } from "../../telegram/update";
import type { UpdateContext } from "../context";
import { passesGates } from "../gates";
import { buildAdminHomeKeyboard } from "../keyboards";
import { StepRouter } from "../router";
import { SESSION_NOT_FOUND } from "../sessionEditor";
import type { StepOf } from "../steps";

export const UPLOAD_FAILED = "اپلود انجام نشد مشکلی پیش امده";

/** Stores an uploaded file in the backup channel and records it as the next episode. */
async function getEpisode(ctx: UpdateContext, step: StepOf<"get_episode">) {
  const message = ctx.message;
  const chatId = ctx.chatId;
  if (!message || chatId === undefined) return;

  const session = getContentSession(ctx.db, step.sessionId);
  if (!session) {
    ctx.setStep({ name: "admin_home" });
    await ctx.reply(SESSION_NOT_FOUND, { replyMarkup: buildAdminHomeKeyboard() });
    return;
  }

  const caption = (message.caption ?? "") + ctx.settings.EXTRA_CAPTION;
  const copied = await ctx.api.copyMessage(ctx.settings.BACKUP_CHANNEL_ID, chatId, message.message_id, {
    caption: caption || undefined,
    captionEntities: message.caption_entities
  });
  if (!copied.ok) {
    botLog.warn({ sessionId: session.id, error: copied.error }, "Copy to backup channel failed");
    await ctx.reply(UPLOAD_FAILED, { parseMode: "Markdown" });
    return;
  }

  const episode = createEpisode(ctx.db, {
    sessionId: session.id,
    messageId: copied.result.message_id,
    mediaKind: detectMediaKind(message)
  });
  botLog.info({ sessionId: session.id, episodeId: episode.id, order: episode.episode_order }, "Episode stored");

  const url = buildShareUrl(ctx.settings.BOT_USERNAME, episode.link);
  await ctx.reply(`✅ آپلود با موفقیت انجام شد!\n\n📌 لینک:\n [E-${episode.episode_order}](${url})\n`, {
    parseMode: "Markdown"
  });
}

export const mediaRouter = new StepRouter<UpdateContext>("media").on("get_episode", getEpisode);

export async function handleMedia(ctx: UpdateContext): Promise<void> {
  if (!(await passesGates(ctx))) return;

  const step = ctx.user?.step;
  if (!step) return;
  await mediaRouter.route(ctx, step);
}
