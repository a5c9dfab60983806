import { getBotStatus } from "../db/botStatusRepo";
import { botLog } from "../logger";
import type { UpdateContext } from "./context";

export const BLOCKED_NOTICE = "شما در ربات بلاک شده اید";

/** Resolves true when the gate handled the update and nothing else may run. */
export type Gate = (ctx: UpdateContext) => Promise<boolean>;

/**
 * While the maintenance switch is on only superusers get through. A missing user
 * record (group chats, unknown update shapes) is treated as a regular user.
 */
export const maintenanceGate: Gate = async (ctx) => {
  const status = getBotStatus(ctx.db);
  if (!status.isUpdate || ctx.isSuperuser()) return false;

  botLog.info({ chatId: ctx.chatId }, "Update held back by maintenance mode");
  await ctx.reply(status.updateMessage, { parseMode: "HTML" });
  return true;
};

export const blockGate: Gate = async (ctx) => {
  const user = ctx.user;
  if (!user || user.is_active === 1) return false;

  botLog.info({ telegramUserId: user.telegram_user_id }, "Blocked user ignored");
  await ctx.reply(BLOCKED_NOTICE, { parseMode: "HTML" });
  return true;
};

const GATE_CHAIN: readonly Gate[] = [maintenanceGate, blockGate];

/** Runs the chain in order; true means the update may proceed to step routing. */
export async function passesGates(ctx: UpdateContext): Promise<boolean> {
  for (const gate of GATE_CHAIN) {
    if (await gate(ctx)) return false;
  }
  return true;
}
