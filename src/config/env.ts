import { z } from "zod";

function parseIdList(val?: string): number[] {
  if (!val) return [];
  return val
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => Number(s))
    .filter((n) => Number.isSafeInteger(n));
}

const EnvSchema = z.object({
  BOT_TOKEN: z.string().min(1),
  // Used to build t.me deep links for content sessions and episodes.
  BOT_USERNAME: z
    .string()
    .min(1)
    .transform((val) => val.trim().replace(/^@/, "")),
  PORT: z.coerce.number().int().positive().default(3000),
  DB_PATH: z.string().min(1).default("./data/bot.sqlite"),

  // Storage channel for uploaded media; episodes reference message ids in it.
  BACKUP_CHANNEL_ID: z.string().min(1),
  // Appended to every uploaded caption. A literal "\n" in the value is a line break.
  EXTRA_CAPTION: z
    .string()
    .optional()
    .transform((val) => (val ? val.replace(/\\n/g, "\n") : "")),

  TELEGRAM_API_BASE_URL: z.string().url().default("https://api.telegram.org"),
  TELEGRAM_API_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120_000).default(30_000),

  WEBHOOK_PATH: z.string().startsWith("/").default("/telegram/webhook"),
  // Compared against the X-Telegram-Bot-Api-Secret-Token header when set.
  TELEGRAM_WEBHOOK_SECRET: z.string().optional(),
  // When set, setWebhook is called at startup with PUBLIC_URL + WEBHOOK_PATH.
  PUBLIC_URL: z.string().url().optional(),
  WEBHOOK_RAW_BODY_LIMIT_BYTES: z.coerce.number().int().min(1024).max(5 * 1024 * 1024).default(1_048_576),

  DELIVERY_DELETE_AFTER_SECONDS: z.coerce.number().int().min(1).max(86_400).default(60),

  // Comma-separated Telegram numeric user ids promoted to superuser on boot.
  ADMIN_TELEGRAM_USER_IDS: z
    .string()
    .optional()
    .transform(parseIdList),

  PROCESSED_UPDATES_RETENTION_DAYS: z.coerce.number().int().min(1).default(7)
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(raw: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment variables.");
  }

  const env = parsed.data;
  const secret = env.TELEGRAM_WEBHOOK_SECRET?.trim();
  if (secret && !/^[A-Za-z0-9_-]{1,256}$/.test(secret)) {
    throw new Error("TELEGRAM_WEBHOOK_SECRET may only contain A-Z, a-z, 0-9, _ and - (1-256 chars).");
  }

  return env;
}
