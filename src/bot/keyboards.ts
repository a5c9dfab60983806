import { Markup } from "telegraf";
import type { EpisodeRow, ContentSessionRow } from "../db/contentRepo";
import type { PlanRow } from "../db/plansRepo";
import type { SponsorChannelRow } from "../db/sponsorsRepo";

export type InlineKeyboard = ReturnType<typeof Markup.inlineKeyboard>["reply_markup"];
export type ReplyKeyboard = ReturnType<typeof Markup.keyboard>["reply_markup"];

export const MENU_LABELS = {
  buySubscription: "🛒 خرید اشتراک",
  accountInfo: "اطلاعات حساب 👤",
  adminUpload: "اپلود ⬇️",
  adminUserInfo: "اطلاعات کاربر 💹",
  uploadMovie: "اپلود فیلم ➕",
  uploadSeries: "اپلود سریال ➕",
  back: "بازگشت",
  finishUpload: "اتمام اپلود ✅",
  cancelUpload: "لغو اپلود ❌",
  confirmMembership: "تایید عضویت ✅"
} as const;

export const CALLBACK_KEYS = {
  joinedToSponsor: "joined_to_sponsor",
  editSession: "edit_session",
  sureDeleteObject: "sure_delete_object",
  pay: "pay",
  vote: "vote"
} as const;

export function buildHomeKeyboard(): ReplyKeyboard {
  return Markup.keyboard([[MENU_LABELS.buySubscription, MENU_LABELS.accountInfo]]).resize().reply_markup;
}

export function buildAdminHomeKeyboard(): ReplyKeyboard {
  return Markup.keyboard([[MENU_LABELS.adminUpload, MENU_LABELS.adminUserInfo]]).resize().reply_markup;
}

export function buildAdminUploadKeyboard(): ReplyKeyboard {
  return Markup.keyboard([[MENU_LABELS.uploadMovie, MENU_LABELS.uploadSeries], [MENU_LABELS.back]]).resize()
    .reply_markup;
}

export function buildBackKeyboard(): ReplyKeyboard {
  return Markup.keyboard([[MENU_LABELS.back]]).resize().reply_markup;
}

export function buildCancelUploadKeyboard(): ReplyKeyboard {
  return Markup.keyboard([[MENU_LABELS.finishUpload, MENU_LABELS.cancelUpload]]).resize().reply_markup;
}

/** Channels with the `other` flag come first, then a trailing confirm button. */
export function buildSponsorChannelsKeyboard(channels: SponsorChannelRow[]): InlineKeyboard {
  const ordered = [...channels].sort((a, b) => Number(b.other) - Number(a.other));
  const rows = ordered.map((channel) => [Markup.button.url(channel.name ?? channel.link, channel.link)]);
  if (rows.length === 0) {
    return Markup.inlineKeyboard([]).reply_markup;
  }
  return Markup.inlineKeyboard([
    ...rows,
    [Markup.button.callback(MENU_LABELS.confirmMembership, CALLBACK_KEYS.joinedToSponsor)]
  ]).reply_markup;
}

export function buildPlansKeyboard(plans: PlanRow[]): InlineKeyboard {
  return Markup.inlineKeyboard(
    plans.map((plan) => [Markup.button.callback(`${plan.title} | ${plan.price}`, `${CALLBACK_KEYS.pay}:${plan.id}`)])
  ).reply_markup;
}

export function buildSessionEditKeyboard(session: ContentSessionRow, episodes: EpisodeRow[]): InlineKeyboard {
  const key = CALLBACK_KEYS.editSession;
  return Markup.inlineKeyboard([
    ...episodes.map((episode) => [
      Markup.button.callback(`🗑 حذف قسمت ${episode.episode_order}`, `${key}:delete_e:${episode.id}`)
    ]),
    [Markup.button.callback("➕ افزودن قسمت", `${key}:add_e:${session.id}`)],
    [Markup.button.callback("❌ حذف کل سشن", `${key}:delete_s:${session.id}`)]
  ]).reply_markup;
}

export function buildConfirmDeleteKeyboard(objectType: "e" | "s", objectId: number): InlineKeyboard {
  const key = CALLBACK_KEYS.sureDeleteObject;
  return Markup.inlineKeyboard([
    [
      Markup.button.callback("✅ بله", `${key}:yes:${objectType}:${objectId}`),
      Markup.button.callback("❌ خیر", `${key}:no:${objectType}:${objectId}`)
    ]
  ]).reply_markup;
}

export function buildVoteKeyboard(session: ContentSessionRow): InlineKeyboard {
  const key = CALLBACK_KEYS.vote;
  return Markup.inlineKeyboard([
    [
      Markup.button.callback(`👍 ${session.likes}`, `${key}:like:${session.id}`),
      Markup.button.callback(`👎 ${session.dislikes}`, `${key}:dislike:${session.id}`)
    ]
  ]).reply_markup;
}
