import crypto from "node:crypto";

export function safeEqual(a: string, b: string): boolean {
  const aBuf = Buffer.from(a);
  const bBuf = Buffer.from(b);
  if (aBuf.length !== bBuf.length) return false;
  return crypto.timingSafeEqual(aBuf, bBuf);
}

/**
 * Telegram echoes the secret given to setWebhook in `X-Telegram-Bot-Api-Secret-Token`.
 * With no configured secret every request passes.
 */
export function verifySecretToken(params: {
  expected: string | undefined;
  headerValue: string | undefined;
}): { valid: boolean; reason?: string } {
  const expected = params.expected?.trim();
  if (!expected) return { valid: true };

  const actual = params.headerValue?.trim() ?? "";
  if (!actual) return { valid: false, reason: "missing_secret" };
  if (!safeEqual(expected, actual)) return { valid: false, reason: "secret_mismatch" };
  return { valid: true };
}
