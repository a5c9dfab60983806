import { getContentSession, incrementSessionCounter } from "../../db/contentRepo";
import { getPlan } from "../../db/plansRepo";
import { botLog } from "../../logger";
import type { UpdateContext } from "../context";
import { passesGates } from "../gates";
import { buildCancelUploadKeyboard, buildVoteKeyboard, CALLBACK_KEYS } from "../keyboards";
import { lookupByKey } from "../router";
import { confirmDelete, resolveDelete, SESSION_NOT_FOUND } from "../sessionEditor";
import { withSponsorGate } from "../sponsorGate";
import { FILE_PROMPT } from "./adminMessages";

export const UNKNOWN_OPERATION = "❌ عملیات ناشناخته است.";
export const PLAN_NOT_FOUND = "❌ پلن پیدا نشد.";
export const PAYMENT_UNAVAILABLE = "⚠️ پرداخت آنلاین در حال حاضر در دسترس نیست.";

type CallbackHandler = (ctx: UpdateContext, parts: string[]) => Promise<void>;

function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

const joinedToSponsor = withSponsorGate(async (ctx: UpdateContext) => {
  const carrier = ctx.callbackQuery?.message;
  if (carrier) {
    await ctx.api.deleteMessage(carrier.chat.id, carrier.message_id);
  }
  ctx.setStep({ name: "home" });
  await ctx.reply("Home");
});

/** edit_session:<delete_e|delete_s|add_e>:<id> */
async function editSession(ctx: UpdateContext, [operation, rawId]: string[]) {
  const objectId = parseId(rawId);
  if (objectId === null) {
    await ctx.reply(UNKNOWN_OPERATION);
    return;
  }

  switch (operation) {
    case "delete_e":
      await confirmDelete(ctx, "e", objectId);
      return;
    case "delete_s":
      await confirmDelete(ctx, "s", objectId);
      return;
    case "add_e": {
      const session = getContentSession(ctx.db, objectId);
      if (!session) {
        await ctx.reply(SESSION_NOT_FOUND);
        return;
      }
      ctx.setStep({ name: "get_episode", sessionId: session.id });
      await ctx.reply(FILE_PROMPT, { parseMode: "Markdown", replyMarkup: buildCancelUploadKeyboard() });
      return;
    }
    default:
      await ctx.reply(UNKNOWN_OPERATION);
  }
}

/** sure_delete_object:<yes|no>:<e|s>:<id> */
async function sureDeleteObject(ctx: UpdateContext, [answer, objectType, rawId]: string[]) {
  const objectId = parseId(rawId);
  if ((answer !== "yes" && answer !== "no") || (objectType !== "e" && objectType !== "s") || objectId === null) {
    await ctx.reply(UNKNOWN_OPERATION);
    return;
  }
  await resolveDelete(ctx, answer === "yes", objectType, objectId);
}

/** pay:<planId>. Checkout is not wired to a provider yet, so the plan is only summarised. */
async function pay(ctx: UpdateContext, [rawId]: string[]) {
  const planId = parseId(rawId);
  const plan = planId === null ? null : getPlan(ctx.db, planId);
  if (!plan || plan.is_active !== 1) {
    await ctx.reply(PLAN_NOT_FOUND);
    return;
  }
  const duration = plan.duration_days < 0 ? "نامحدود 💎" : `${plan.duration_days} روز`;
  await ctx.reply(`🧾 ${plan.title}\n💰 ${plan.price}\n⏳ ${duration}\n\n${PAYMENT_UNAVAILABLE}`);
}

/** vote:<like|dislike>:<sessionId> */
async function vote(ctx: UpdateContext, [choice, rawId]: string[]) {
  const sessionId = parseId(rawId);
  if ((choice !== "like" && choice !== "dislike") || sessionId === null) {
    await ctx.reply(UNKNOWN_OPERATION);
    return;
  }

  const session = incrementSessionCounter(ctx.db, sessionId, choice === "like" ? "likes" : "dislikes");
  const carrier = ctx.callbackQuery?.message;
  if (!session || !carrier) return;
  await ctx.api.editMessageText(carrier.chat.id, carrier.message_id, carrier.text ?? "👍 / 👎", {
    replyMarkup: buildVoteKeyboard(session)
  });
}

function superuserOnly(handler: CallbackHandler): CallbackHandler {
  return async (ctx, parts) => {
    if (!ctx.isSuperuser()) {
      botLog.warn({ userId: ctx.from?.id }, "Admin callback from a regular user ignored");
      return;
    }
    await handler(ctx, parts);
  };
}

const callbackHandlers: ReadonlyMap<string, CallbackHandler> = new Map<string, CallbackHandler>([
  [CALLBACK_KEYS.joinedToSponsor, (ctx) => joinedToSponsor(ctx)],
  [CALLBACK_KEYS.editSession, superuserOnly(editSession)],
  [CALLBACK_KEYS.sureDeleteObject, superuserOnly(sureDeleteObject)],
  [CALLBACK_KEYS.pay, pay],
  [CALLBACK_KEYS.vote, vote]
]);

export async function handleCallbackQuery(ctx: UpdateContext): Promise<void> {
  const query = ctx.callbackQuery;
  if (!query) return;

  // Answered first so the client stops its spinner even when a gate stops the update.
  await ctx.api.answerCallbackQuery(query.id);
  if (!(await passesGates(ctx))) return;

  const data = query.data ?? "";
  const handler = lookupByKey(callbackHandlers, data);
  if (!handler) {
    botLog.debug({ data }, "Callback data without a handler");
    return;
  }
  await handler(ctx, data.split(":").slice(1));
}
