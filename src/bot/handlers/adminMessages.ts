import { buildShareUrl, parseLinkToken, SESSION_LINK_PREFIX } from "../../content/links";
import {
  createContentSession,
  deleteContentSession,
  getContentSession,
  getContentSessionByLink,
  listEpisodes
} from "../../db/contentRepo";
import { getSubscriptionStatus, getUserByTelegramId } from "../../db/usersRepo";
import { botLog } from "../../logger";
import type { UpdateContext } from "../context";
import {
  buildAdminHomeKeyboard,
  buildAdminUploadKeyboard,
  buildBackKeyboard,
  buildCancelUploadKeyboard,
  MENU_LABELS
} from "../keyboards";
import { markdownLinkLabel } from "../markdown";
import { StepRouter } from "../router";
import { SESSION_NOT_FOUND, showSessionEditor } from "../sessionEditor";
import type { StepOf } from "../steps";
import { getMessage } from "../templates";

export const UPLOAD_CHOICE_PROMPT = "برای اپلود سریال و یا فیلم تک قسمتی یکی رو انتخاب کن";
export const USER_ID_PROMPT = "لطفا ایدی عددی کاربر مورد نظر رو ارسال کن";
export const FILE_PROMPT = "لطفا فایل مورد نظر رو ارسال کن";
export const USER_NOT_FOUND = "یوزر پیدا نشد";

async function backToAdminHome(ctx: UpdateContext) {
  ctx.setStep({ name: "admin_home" });
  await ctx.reply("Welcome To Admin panel", { replyMarkup: buildAdminHomeKeyboard() });
}

async function backToAdminUpload(ctx: UpdateContext) {
  ctx.setStep({ name: "admin_upload" });
  await ctx.reply(UPLOAD_CHOICE_PROMPT, { parseMode: "Markdown", replyMarkup: buildAdminUploadKeyboard() });
}

async function adminHome(ctx: UpdateContext) {
  const text = ctx.message?.text ?? "";

  if (text === MENU_LABELS.adminUpload) {
    await backToAdminUpload(ctx);
    return;
  }

  if (text === MENU_LABELS.adminUserInfo) {
    ctx.setStep({ name: "admin_user_info" });
    await ctx.reply(USER_ID_PROMPT, { parseMode: "Markdown", replyMarkup: buildBackKeyboard() });
    return;
  }

  const link = parseLinkToken(text);
  if (link?.prefix === SESSION_LINK_PREFIX) {
    const session = getContentSessionByLink(ctx.db, link.token);
    if (!session) {
      await ctx.reply(SESSION_NOT_FOUND);
      return;
    }
    await showSessionEditor(ctx, session.id);
  }
}

async function adminUpload(ctx: UpdateContext) {
  const text = ctx.message?.text;

  if (text === MENU_LABELS.back) {
    await backToAdminHome(ctx);
    return;
  }

  if (text === MENU_LABELS.uploadMovie || text === MENU_LABELS.uploadSeries) {
    const contentType = text === MENU_LABELS.uploadMovie ? "movie" : "series";
    ctx.setStep({ name: "get_title", contentType });
    await ctx.reply(contentType === "movie" ? "اسم فیلم را ارسال کنید" : "اسم سریال را ارسال کنید", {
      parseMode: "Markdown",
      replyMarkup: buildBackKeyboard()
    });
  }
}

async function getTitle(ctx: UpdateContext, step: StepOf<"get_title">) {
  const text = ctx.message?.text;

  if (text === MENU_LABELS.back) {
    await backToAdminUpload(ctx);
    return;
  }
  // Media, stickers and the like carry no title.
  if (!text) return;

  const session = createContentSession(ctx.db, { title: text, contentType: step.contentType });
  botLog.info({ sessionId: session.id, contentType: session.content_type }, "Content session created");
  ctx.setStep({ name: "get_episode", sessionId: session.id });
  await ctx.reply(FILE_PROMPT, { parseMode: "Markdown", replyMarkup: buildCancelUploadKeyboard() });
}

function buildUploadSummary(ctx: UpdateContext, sessionId: number): string | null {
  const session = getContentSession(ctx.db, sessionId);
  if (!session) return null;

  const botUsername = ctx.settings.BOT_USERNAME;
  const episodeLines = listEpisodes(ctx.db, session.id)
    .map((episode) => `[E${episode.episode_order}](${buildShareUrl(botUsername, episode.link)})\n`)
    .join("");
  return (
    "✅ آپلود با موفقیت انجام شد!\n\n" +
    `📌 لینک قسمت‌ها:\n${episodeLines}\n` +
    `📂 لینک کل مجموعه:\n[S${markdownLinkLabel(session.title)}](${buildShareUrl(botUsername, session.link)})`
  );
}

/** Text while uploading episodes; the media half of this step lives in the media handler. */
async function getEpisodeControls(ctx: UpdateContext, step: StepOf<"get_episode">) {
  const text = ctx.message?.text;

  if (text === MENU_LABELS.cancelUpload) {
    deleteContentSession(ctx.db, step.sessionId);
    botLog.info({ sessionId: step.sessionId }, "Upload cancelled, session removed");
    await backToAdminUpload(ctx);
    return;
  }

  if (text === MENU_LABELS.finishUpload) {
    const summary = buildUploadSummary(ctx, step.sessionId);
    ctx.setStep({ name: "admin_home" });
    if (!summary) {
      await ctx.reply(SESSION_NOT_FOUND, { replyMarkup: buildAdminHomeKeyboard() });
      return;
    }
    await ctx.reply(summary, { parseMode: "Markdown", replyMarkup: buildAdminHomeKeyboard() });
  }
}

async function adminUserInfo(ctx: UpdateContext) {
  const text = ctx.message?.text?.trim() ?? "";

  if (text === MENU_LABELS.back) {
    await backToAdminHome(ctx);
    return;
  }

  const telegramUserId = /^\d+$/.test(text) ? Number(text) : NaN;
  const target = Number.isSafeInteger(telegramUserId) ? getUserByTelegramId(ctx.db, telegramUserId) : null;
  if (!target) {
    await ctx.reply(USER_NOT_FOUND, { parseMode: "Markdown" });
    return;
  }

  const status = getSubscriptionStatus(target);
  const planTitle =
    status.kind === "unlimited" ? "Unlimited" : status.kind === "none" ? "No Subscription" : `${status.daysLeft} days`;
  await ctx.reply(
    getMessage(ctx.db, "user_info", {
      user_id: target.telegram_user_id,
      plan_title: planTitle,
      // No payment ledger yet.
      last_plan: "-",
      payment_count: 0
    }),
    { parseMode: "Markdown", replyMarkup: buildBackKeyboard() }
  );
}

export const adminMessageRouter = new StepRouter<UpdateContext>("admin")
  .on("admin_home", (ctx) => adminHome(ctx))
  .on("admin_upload", (ctx) => adminUpload(ctx))
  .on("get_title", getTitle)
  .on("get_episode", getEpisodeControls)
  .on("admin_user_info", (ctx) => adminUserInfo(ctx));
