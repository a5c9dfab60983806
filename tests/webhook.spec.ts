import express from "express";
import type { Server } from "node:http";
import { afterEach, describe, expect, it } from "vitest";

import type { BotDeps } from "../src/bot/context";
import { runDbMaintenance } from "../src/db/maintenance";
import { tryRecordUpdate } from "../src/db/updatesRepo";
import { createTelegramWebhookRouter, processWebhookBody } from "../src/webhooks/telegramWebhookRouter";
import { verifySecretToken } from "../src/webhooks/verifySecretToken";
import { createTestDeps, textUpdate, USER_ID } from "./helpers";

const body = (value: unknown) => Buffer.from(JSON.stringify(value));

describe("processWebhookBody", () => {
  it("dispatches a valid update", async () => {
    const { api, deps } = createTestDeps();
    const update = textUpdate(USER_ID, "/help");

    await expect(processWebhookBody(body(update), deps)).resolves.toEqual({
      status: "dispatched",
      updateId: update.update_id,
      handler: "command"
    });
    expect(api.sendMessage).toHaveBeenCalledWith(USER_ID, "Help Command", undefined);
  });

  it("ignores a redelivered update_id", async () => {
    const { api, deps } = createTestDeps();
    const raw = body(textUpdate(USER_ID, "/help"));

    await processWebhookBody(raw, deps);
    const second = await processWebhookBody(raw, deps);

    expect(second.status).toBe("duplicate");
    expect(api.sendMessage).toHaveBeenCalledTimes(1);
  });

  it("reports malformed JSON without throwing", async () => {
    const { api, deps } = createTestDeps();

    await expect(processWebhookBody(Buffer.from("{not json"), deps)).resolves.toEqual({ status: "invalid_json" });
    expect(api.sendMessage).not.toHaveBeenCalled();
  });

  it("reports bodies that are not updates", async () => {
    const { deps } = createTestDeps();

    await expect(processWebhookBody(body({ hello: "world" }), deps)).resolves.toEqual({ status: "invalid_update" });
  });

  it("contains handler failures", async () => {
    const { api, deps } = createTestDeps();
    api.sendMessage.mockRejectedValue(new Error("boom"));
    const update = textUpdate(USER_ID, "/help");

    await expect(processWebhookBody(body(update), deps)).resolves.toEqual({
      status: "failed",
      updateId: update.update_id
    });
  });

  it("reports a store failure instead of throwing", async () => {
    const { api, db, deps } = createTestDeps();
    db.exec("DROP TABLE processed_updates");
    const update = textUpdate(USER_ID, "/help");

    await expect(processWebhookBody(body(update), deps)).resolves.toEqual({
      status: "failed",
      updateId: update.update_id
    });
    expect(api.sendMessage).not.toHaveBeenCalled();
  });
});

describe("createTelegramWebhookRouter", () => {
  const WEBHOOK_PATH = "/telegram/webhook";
  let server: Server | undefined;

  afterEach(async () => {
    const running = server;
    server = undefined;
    if (!running) return;
    running.closeAllConnections();
    await new Promise<void>((resolve, reject) => running.close((err) => (err ? reject(err) : resolve())));
  });

  async function start(deps: BotDeps): Promise<string> {
    const app = express();
    app.use(
      createTelegramWebhookRouter({ path: WEBHOOK_PATH, secretToken: "test-secret", rawBodyLimitBytes: 1024, deps })
    );
    const listening = await new Promise<Server>((resolve) => {
      const started = app.listen(0, "127.0.0.1", () => resolve(started));
    });
    server = listening;
    const address = listening.address();
    if (address === null || typeof address === "string") throw new Error("server has no TCP address");
    return `http://127.0.0.1:${address.port}${WEBHOOK_PATH}`;
  }

  async function post(url: string, payload: string, secret = "test-secret") {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", "X-Telegram-Bot-Api-Secret-Token": secret },
      body: payload
    });
    return { status: response.status, json: await response.json() };
  }

  it("dispatches an authenticated update and acknowledges it", async () => {
    const { api, deps } = createTestDeps();
    const url = await start(deps);

    await expect(post(url, JSON.stringify(textUpdate(USER_ID, "/help")))).resolves.toEqual({
      status: 200,
      json: { ok: true }
    });
    expect(api.sendMessage).toHaveBeenCalledWith(USER_ID, "Help Command", undefined);
  });

  it("answers 401 when the secret header does not match", async () => {
    const { api, deps } = createTestDeps();
    const url = await start(deps);

    await expect(post(url, JSON.stringify(textUpdate(USER_ID, "/help")), "wrong-secret")).resolves.toEqual({
      status: 401,
      json: { ok: false }
    });
    expect(api.sendMessage).not.toHaveBeenCalled();
  });

  it("acknowledges malformed JSON", async () => {
    const { deps } = createTestDeps();
    const url = await start(deps);

    await expect(post(url, "{not json")).resolves.toEqual({ status: 200, json: { ok: true } });
  });

  it("acknowledges an update whose handler fails", async () => {
    const { api, deps } = createTestDeps();
    api.sendMessage.mockRejectedValue(new Error("boom"));
    const url = await start(deps);

    await expect(post(url, JSON.stringify(textUpdate(USER_ID, "/help")))).resolves.toEqual({
      status: 200,
      json: { ok: true }
    });
  });

  it("acknowledges an update it could not record", async () => {
    const { db, deps } = createTestDeps();
    db.exec("DROP TABLE processed_updates");
    const url = await start(deps);

    await expect(post(url, JSON.stringify(textUpdate(USER_ID, "/help")))).resolves.toEqual({
      status: 200,
      json: { ok: true }
    });
  });

  it("acknowledges a body over the size limit without dispatching it", async () => {
    const { api, deps } = createTestDeps();
    const url = await start(deps);
    const oversized = JSON.stringify({ ...textUpdate(USER_ID, "/help"), padding: "x".repeat(2048) });

    await expect(post(url, oversized)).resolves.toEqual({ status: 200, json: { ok: true } });
    expect(api.sendMessage).not.toHaveBeenCalled();
  });
});

describe("verifySecretToken", () => {
  it("accepts everything when no secret is configured", () => {
    expect(verifySecretToken({ expected: undefined, headerValue: undefined })).toEqual({ valid: true });
  });

  it("compares the header against the configured secret", () => {
    expect(verifySecretToken({ expected: "test-secret", headerValue: "test-secret" })).toEqual({ valid: true });
    expect(verifySecretToken({ expected: "test-secret", headerValue: "other" })).toEqual({
      valid: false,
      reason: "secret_mismatch"
    });
    expect(verifySecretToken({ expected: "test-secret", headerValue: undefined })).toEqual({
      valid: false,
      reason: "missing_secret"
    });
  });
});

describe("runDbMaintenance", () => {
  it("prunes processed updates past the retention window", () => {
    const { db } = createTestDeps();
    const day = 24 * 60 * 60 * 1000;
    const now = 100 * day;
    tryRecordUpdate(db, 1, now - 10 * day);
    tryRecordUpdate(db, 2, now - day);

    const result = runDbMaintenance({ db, processedUpdatesRetentionDays: 7, nowMs: now });

    expect(result).toEqual({ nowMs: now, processedUpdatesCutoffMs: now - 7 * day, deletedProcessedUpdates: 1 });
    expect(tryRecordUpdate(db, 1)).toBe(true);
    expect(tryRecordUpdate(db, 2)).toBe(false);
  });
});
