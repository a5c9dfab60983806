import type { Update } from "../telegram/update";
import { detectMediaKind, isCommandText } from "../telegram/update";
import { UpdateContext, type BotDeps } from "./context";
import { handleCallbackQuery } from "./handlers/callbackQueries";
import { handleCommand } from "./handlers/commands";
import { handleMedia } from "./handlers/media";
import { handleMessage } from "./handlers/messages";

export type HandlerKind = "command" | "media" | "message" | "callback_query";

/** Pure classification; the first matching rule wins. */
export function classifyUpdate(update: Update): HandlerKind {
  const message = update.message;
  if (message) {
    if (isCommandText(message.text)) return "command";
    if (detectMediaKind(message) !== null) return "media";
    return "message";
  }
  if (update.callback_query) return "callback_query";
  // Unsupported update types land in the message handler, which finds no user and does nothing.
  return "message";
}

const HANDLERS: Record<HandlerKind, (ctx: UpdateContext) => Promise<void>> = {
  command: handleCommand,
  media: handleMedia,
  message: handleMessage,
  callback_query: handleCallbackQuery
};

export async function dispatch(update: Update, deps: BotDeps): Promise<HandlerKind> {
  const kind = classifyUpdate(update);
  await HANDLERS[kind](new UpdateContext(update, deps));
  return kind;
}
