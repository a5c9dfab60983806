import type { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import express, { Router } from "express";
import { ZodError } from "zod";

import type { BotDeps } from "../bot/context";
import { dispatch, type HandlerKind } from "../bot/dispatcher";
import { tryRecordUpdate } from "../db/updatesRepo";
import { webhookLog } from "../logger";
import { parseUpdate, type Update } from "../telegram/update";
import { verifySecretToken } from "./verifySecretToken";

export type WebhookOutcome =
  | { status: "dispatched"; updateId: number; handler: HandlerKind }
  | { status: "duplicate"; updateId: number }
  | { status: "invalid_json" }
  | { status: "invalid_update" }
  | { status: "failed"; updateId: number };

/**
 * Parse, de-duplicate and dispatch one webhook body. Never throws: every failure
 * is logged and reported through the outcome.
 */
export async function processWebhookBody(rawBody: Buffer, deps: BotDeps): Promise<WebhookOutcome> {
  let payload: unknown;
  try {
    payload = JSON.parse(rawBody.toString("utf8"));
  } catch (err) {
    webhookLog.warn({ err, bytes: rawBody.length }, "Webhook body is not valid JSON");
    return { status: "invalid_json" };
  }

  let update: Update;
  try {
    update = parseUpdate(payload);
  } catch (err) {
    const issues = err instanceof ZodError ? err.issues.length : undefined;
    webhookLog.warn({ err, issues }, "Webhook body is not a Telegram update");
    return { status: "invalid_update" };
  }

  const updateId = update.update_id;
  let firstDelivery: boolean;
  try {
    firstDelivery = tryRecordUpdate(deps.db, updateId);
  } catch (err) {
    webhookLog.error({ err, updateId }, "Could not record update");
    return { status: "failed", updateId };
  }
  if (!firstDelivery) {
    webhookLog.info({ updateId }, "Duplicate update ignored");
    return { status: "duplicate", updateId };
  }

  try {
    const handler = await dispatch(update, deps);
    webhookLog.debug({ updateId, handler }, "Update dispatched");
    return { status: "dispatched", updateId, handler };
  } catch (err) {
    webhookLog.error({ err, updateId }, "Update handler failed");
    return { status: "failed", updateId };
  }
}

// Oversized or unreadable bodies still get a 2xx, or Telegram keeps redelivering them.
const acknowledgeUnreadableBody: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  webhookLog.warn({ err }, "Webhook body could not be read");
  res.status(200).json({ ok: true });
};

export type TelegramWebhookRouterParams = {
  path: string;
  secretToken?: string;
  rawBodyLimitBytes: number;
  deps: BotDeps;
};

export function createTelegramWebhookRouter(params: TelegramWebhookRouterParams) {
  const { path, secretToken, rawBodyLimitBytes, deps } = params;
  const router = Router();

  const authenticate = (req: Request, res: Response, next: NextFunction) => {
    const auth = verifySecretToken({
      expected: secretToken,
      headerValue: req.header("x-telegram-bot-api-secret-token")
    });
    if (!auth.valid) {
      webhookLog.warn({ reason: auth.reason }, "Webhook rejected (secret token)");
      res.status(401).json({ ok: false });
      return;
    }
    next();
  };

  // Raw body so a malformed payload is handled (and acknowledged) here rather than by a JSON parser.
  const readBody = express.raw({ type: "*/*", limit: rawBodyLimitBytes });

  router.post(path, authenticate, readBody, async (req: Request, res: Response) => {
    const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    try {
      await processWebhookBody(rawBody, deps);
    } catch (err) {
      webhookLog.error({ err }, "Webhook processing failed");
    } finally {
      // Telegram redelivers anything that is not a 2xx, so failures are acknowledged too.
      res.status(200).json({ ok: true });
    }
  });
  router.use(path, acknowledgeUnreadableBody);

  return router;
}
