import { setBotStatus } from "../../db/botStatusRepo";
import { addSubscription, getUserByTelegramId } from "../../db/usersRepo";
import { botLog } from "../../logger";
import type { UpdateContext } from "../context";
import { deliverContent } from "../delivery";
import { passesGates } from "../gates";
import { buildAdminHomeKeyboard, buildHomeKeyboard } from "../keyboards";
import { withSponsorGate } from "../sponsorGate";

export type ParsedCommand = { command: string; args: string[] };

/** "/start@my_bot S_abc" -> { command: "start", args: ["S_abc"] } */
export function parseCommand(text: string): ParsedCommand | null {
  const [head, ...args] = text.trim().split(/\s+/);
  const match = /^\/([A-Za-z0-9_]+)(?:@\w+)?$/.exec(head ?? "");
  if (!match) return null;
  return { command: match[1].toLowerCase(), args };
}

const startHandler = withSponsorGate(async (ctx: UpdateContext, payload: string | undefined) => {
  ctx.setStep({ name: "home" });
  if (payload) {
    await deliverContent(ctx, payload);
    return;
  }
  await ctx.reply("Home", { replyMarkup: buildHomeKeyboard(), replyToMessageId: ctx.message?.message_id });
});

async function adminHandler(ctx: UpdateContext) {
  ctx.setStep({ name: "admin_home" });
  await ctx.reply("Welcome To Admin panel", {
    replyMarkup: buildAdminHomeKeyboard(),
    replyToMessageId: ctx.message?.message_id
  });
}

async function maintenanceHandler(ctx: UpdateContext, args: string[]) {
  const mode = args[0]?.toLowerCase();
  if (mode !== "on" && mode !== "off") {
    await ctx.reply("Usage: /maintenance on|off");
    return;
  }
  const message = args.slice(1).join(" ");
  setBotStatus(ctx.db, { isUpdate: mode === "on", updateMessage: message || undefined });
  botLog.info({ by: ctx.from?.id, mode }, "Maintenance mode switched");
  await ctx.reply(mode === "on" ? "Maintenance mode is on" : "Maintenance mode is off");
}

async function grantHandler(ctx: UpdateContext, args: string[]) {
  const [rawId, rawDays] = args;
  const telegramUserId = Number(rawId);
  const days = Number(rawDays);
  if (!rawId || !rawDays || !Number.isSafeInteger(telegramUserId) || !Number.isSafeInteger(days) || days === 0) {
    await ctx.reply("Usage: /grant <telegram_id> <days> (negative days = unlimited)");
    return;
  }

  const target = getUserByTelegramId(ctx.db, telegramUserId);
  if (!target) {
    await ctx.reply("یوزر پیدا نشد");
    return;
  }

  const expiresAt = addSubscription(ctx.db, target.id, days);
  botLog.info({ by: ctx.from?.id, telegramUserId, days, expiresAt }, "Subscription granted");
  await ctx.reply(`Subscription of ${telegramUserId} now expires at ${new Date(expiresAt).toISOString()}`);
}

/** Messages whose text starts with "/". Unknown commands and non-superuser admin commands are ignored. */
export async function handleCommand(ctx: UpdateContext): Promise<void> {
  if (!(await passesGates(ctx))) return;

  const parsed = parseCommand(ctx.message?.text ?? "");
  if (!parsed) return;
  const { command, args } = parsed;

  switch (command) {
    case "start":
      await startHandler(ctx, args[0]);
      return;
    case "help":
      await ctx.reply("Help Command");
      return;
  }

  if (!ctx.isSuperuser()) return;

  switch (command) {
    case "admin":
      await adminHandler(ctx);
      return;
    case "maintenance":
      await maintenanceHandler(ctx, args);
      return;
    case "grant":
      await grantHandler(ctx, args);
      return;
    default:
      botLog.debug({ command }, "Unknown command ignored");
  }
}
