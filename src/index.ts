import "dotenv/config";

import express from "express";
import { runDetached, type BotDeps } from "./bot/context";
import { loadEnv } from "./config/env";
import { openDatabase } from "./db/db";
import { runDbMaintenance } from "./db/maintenance";
import { promoteSuperusers } from "./db/usersRepo";
import { logger } from "./logger";
import { createBotApi } from "./telegram/botApi";
import { createTelegramWebhookRouter } from "./webhooks/telegramWebhookRouter";

const MAINTENANCE_INTERVAL_MS = 6 * 60 * 60 * 1000;

async function main() {
  const env = loadEnv(process.env);

  const db = openDatabase(env.DB_PATH);
  logger.info({ dbPath: env.DB_PATH }, "SQLite ready");

  if (env.ADMIN_TELEGRAM_USER_IDS.length > 0) {
    promoteSuperusers(db, env.ADMIN_TELEGRAM_USER_IDS);
    logger.info({ adminIds: env.ADMIN_TELEGRAM_USER_IDS }, "Superusers promoted");
  }

  const api = createBotApi({
    token: env.BOT_TOKEN,
    baseUrl: env.TELEGRAM_API_BASE_URL,
    timeoutMs: env.TELEGRAM_API_TIMEOUT_MS
  });

  const deps: BotDeps = {
    db,
    api,
    settings: {
      BOT_USERNAME: env.BOT_USERNAME,
      BACKUP_CHANNEL_ID: env.BACKUP_CHANNEL_ID,
      EXTRA_CAPTION: env.EXTRA_CAPTION,
      DELIVERY_DELETE_AFTER_SECONDS: env.DELIVERY_DELETE_AFTER_SECONDS
    },
    runInBackground: runDetached
  };

  const app = express();

  app.get("/healthz", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.use(
    createTelegramWebhookRouter({
      path: env.WEBHOOK_PATH,
      secretToken: env.TELEGRAM_WEBHOOK_SECRET,
      rawBodyLimitBytes: env.WEBHOOK_RAW_BODY_LIMIT_BYTES,
      deps
    })
  );

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, webhookPath: env.WEBHOOK_PATH }, "HTTP server listening");
  });

  const maintenanceInterval = setInterval(() => {
    try {
      const result = runDbMaintenance({ db, processedUpdatesRetentionDays: env.PROCESSED_UPDATES_RETENTION_DAYS });
      logger.info(result, "DB maintenance complete");
    } catch (err) {
      logger.error({ err }, "DB maintenance failed");
    }
  }, MAINTENANCE_INTERVAL_MS);

  const shutdown = (signal: string) => {
    logger.warn({ signal }, "Shutting down...");
    clearInterval(maintenanceInterval);
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  if (env.PUBLIC_URL) {
    const webhookUrl = env.PUBLIC_URL.replace(/\/+$/, "") + env.WEBHOOK_PATH;
    const registered = await api.setWebhook(webhookUrl, env.TELEGRAM_WEBHOOK_SECRET);
    if (registered.ok) {
      logger.info({ webhookUrl }, "Telegram webhook registered");
    } else {
      logger.error({ webhookUrl, error: registered.error }, "Telegram webhook registration failed");
    }
  } else {
    logger.info("PUBLIC_URL not set; webhook registration skipped");
  }
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
