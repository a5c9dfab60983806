import type { SqliteDb } from "../db/db";
import { getTemplateText } from "../db/templatesRepo";

export type TemplateValues = Record<string, string | number | null | undefined>;

export class MessageTemplateNotFoundError extends Error {
  constructor(readonly templateName: string) {
    super(`Message template "${templateName}" is not defined`);
    this.name = "MessageTemplateNotFoundError";
  }
}

// Used until an operator stores their own text under the same name.
const BUILT_IN_TEMPLATES: Partial<Record<string, string>> = {
  payment_plan_message: "💳 یکی از پلن‌های زیر را انتخاب کنید:",
  info_plan_message: "👤 شناسه شما: `{user_id}`\n⏳ اشتراک: {plan_days}",
  user_info: "👤 کاربر: `{user_id}`\n📦 اشتراک: {plan_title}\n🧾 آخرین پلن: {last_plan}\n💰 تعداد پرداخت: {payment_count}"
};

export function renderTemplate(template: string, values: TemplateValues = {}): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    if (!(key in values)) return match;
    const value = values[key];
    return value === null || value === undefined ? "" : String(value);
  });
}

/** Stored text first, then the built-in default; throws when neither exists. */
export function getMessage(db: SqliteDb, name: string, values?: TemplateValues): string {
  const text = getTemplateText(db, name) ?? BUILT_IN_TEMPLATES[name];
  if (text === undefined) {
    throw new MessageTemplateNotFoundError(name);
  }
  return values ? renderTemplate(text, values) : text;
}

export function getMessageOr(db: SqliteDb, name: string, fallback: string, values?: TemplateValues): string {
  try {
    return getMessage(db, name, values);
  } catch (err) {
    if (err instanceof MessageTemplateNotFoundError) return fallback;
    throw err;
  }
}
