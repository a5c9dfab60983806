import { listActivePlans } from "../../db/plansRepo";
import { getSubscriptionStatus, type SubscriptionStatus } from "../../db/usersRepo";
import type { UpdateContext } from "../context";
import { passesGates } from "../gates";
import { buildPlansKeyboard, MENU_LABELS } from "../keyboards";
import { StepRouter } from "../router";
import { withSponsorGate } from "../sponsorGate";
import { getMessage } from "../templates";
import { adminMessageRouter } from "./adminMessages";

export function describePlanDays(status: SubscriptionStatus): string {
  switch (status.kind) {
    case "unlimited":
      return "نامحدود 💎";
    case "none":
      return "بدون اشتراک";
    case "active":
      return `${status.daysLeft} روز`;
  }
}

const home = withSponsorGate(async (ctx: UpdateContext) => {
  const text = ctx.message?.text;

  if (text === MENU_LABELS.buySubscription) {
    await ctx.reply(getMessage(ctx.db, "payment_plan_message"), {
      parseMode: "Markdown",
      replyMarkup: buildPlansKeyboard(listActivePlans(ctx.db))
    });
    return;
  }

  if (text === MENU_LABELS.accountInfo) {
    const user = ctx.user;
    if (!user) return;
    await ctx.reply(
      getMessage(ctx.db, "info_plan_message", {
        user_id: user.telegram_user_id,
        plan_days: describePlanDays(getSubscriptionStatus(user))
      }),
      { parseMode: "Markdown" }
    );
  }
});

export const homeRouter = new StepRouter<UpdateContext>("home").on("home", (ctx) => home(ctx));

/** Plain (non-command, non-media) messages. Steps the home router does not know go to the admin router. */
export async function handleMessage(ctx: UpdateContext): Promise<void> {
  if (!(await passesGates(ctx))) return;

  const step = ctx.user?.step;
  if (!step) return;

  if (await homeRouter.route(ctx, step)) return;
  await adminMessageRouter.route(ctx, step);
}
