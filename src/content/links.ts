import crypto from "node:crypto";

export type LinkPrefix = "S" | "E";

export const SESSION_LINK_PREFIX: LinkPrefix = "S";
export const EPISODE_LINK_PREFIX: LinkPrefix = "E";

const MAX_LINK_ATTEMPTS = 3;
const LINK_PATTERN = /^([SE])_([A-Za-z0-9_-]{16})$/;

export type LinkGenerator = (prefix: LinkPrefix) => string;

export class LinkCollisionError extends Error {
  constructor(readonly prefix: LinkPrefix, readonly attempts: number) {
    super(`Could not allocate a unique ${prefix} link after ${attempts} attempts`);
    this.name = "LinkCollisionError";
  }
}

/** "<prefix>_" followed by 12 random bytes in base64url (16 chars, 96 bits). */
export function generateLinkToken(prefix: LinkPrefix): string {
  return `${prefix}_${crypto.randomBytes(12).toString("base64url")}`;
}

export function parseLinkToken(value: string): { prefix: LinkPrefix; token: string } | null {
  const match = LINK_PATTERN.exec(value.trim());
  if (!match) return null;
  const prefix = match[1] === "S" ? SESSION_LINK_PREFIX : EPISODE_LINK_PREFIX;
  return { prefix, token: match[0] };
}

export function buildShareUrl(botUsername: string, link: string): string {
  return `https://t.me/${botUsername}?start=${encodeURIComponent(link)}`;
}

function isUniqueLinkViolation(err: unknown): boolean {
  return err instanceof Error && err.message.includes("UNIQUE") && err.message.includes(".link");
}

/**
 * Generation never pre-checks for collisions: the insert is attempted and the
 * table's UNIQUE(link) constraint decides, with a fresh token on conflict.
 */
export function insertWithUniqueLink<T>(
  prefix: LinkPrefix,
  insert: (link: string) => T,
  generate: LinkGenerator = generateLinkToken
): T {
  for (let attempt = 1; attempt <= MAX_LINK_ATTEMPTS; attempt += 1) {
    try {
      return insert(generate(prefix));
    } catch (err) {
      if (!isUniqueLinkViolation(err)) throw err;
    }
  }
  throw new LinkCollisionError(prefix, MAX_LINK_ATTEMPTS);
}
