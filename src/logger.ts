import pino from "pino";

const REDACT_PATHS = [
  "authorization",
  "token",
  "secret",
  "password",
  "BOT_TOKEN",
  "TELEGRAM_WEBHOOK_SECRET",
  "req.headers.authorization",
  "headers.authorization",
  "headers['x-telegram-bot-api-secret-token']"
];

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: undefined,
  redact: {
    paths: REDACT_PATHS,
    censor: "[redacted]"
  }
});

export const botLog = logger.child({ component: "bot" });
export const apiLog = logger.child({ component: "bot-api" });
export const webhookLog = logger.child({ component: "webhook" });
