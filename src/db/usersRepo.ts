import type { SqliteDb } from "./db";

export type UserRow = {
  id: number;
  telegram_user_id: number;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  step: string;
  is_active: number;
  is_superuser: number;
  subscription_expires_at: number | null;
  created_at: number;
  updated_at: number;
};

export type UserProfile = {
  telegramUserId: number;
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
};

export type SubscriptionStatus =
  | { kind: "none" }
  | { kind: "unlimited"; expiresAt: number }
  | { kind: "active"; expiresAt: number; daysLeft: number };

export const DEFAULT_STEP = "home";

const DAY_MS = 24 * 60 * 60 * 1000;
// "Unlimited" is stored as a far-future expiry; anything beyond ten years reads as unlimited.
export const UNLIMITED_SUBSCRIPTION_DAYS = 36_500;
const UNLIMITED_THRESHOLD_DAYS = 3_650;

export function getUserByTelegramId(db: SqliteDb, telegramUserId: number): UserRow | null {
  const row = db.prepare<[number], UserRow>("SELECT * FROM users WHERE telegram_user_id = ?").get(telegramUserId);
  return row ?? null;
}

export function getOrCreateUser(db: SqliteDb, profile: UserProfile): UserRow {
  const now = Date.now();

  const txn = db.transaction(() => {
    const existing = getUserByTelegramId(db, profile.telegramUserId);
    if (existing) return existing;

    const id = String(profile.telegramUserId);
    db.prepare(
      "INSERT INTO users (telegram_user_id, username, first_name, last_name, step, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?)"
    ).run(
      profile.telegramUserId,
      profile.username || id,
      profile.firstName ?? null,
      profile.lastName || id,
      DEFAULT_STEP,
      now,
      now
    );

    const created = getUserByTelegramId(db, profile.telegramUserId);
    if (!created) {
      throw new Error(`User ${profile.telegramUserId} vanished right after insert`);
    }
    return created;
  });

  return txn();
}

/** Single-row write by primary key; concurrent writers for the same user are last-write-wins. */
export function setStep(db: SqliteDb, userId: number, step: string) {
  if (step.length === 0) {
    throw new Error("Step must be a non-empty string");
  }
  db.prepare("UPDATE users SET step = ?, updated_at = ? WHERE id = ?").run(step, Date.now(), userId);
}

export function setUserActive(db: SqliteDb, telegramUserId: number, isActive: boolean) {
  db.prepare("UPDATE users SET is_active = ?, updated_at = ? WHERE telegram_user_id = ?").run(
    isActive ? 1 : 0,
    Date.now(),
    telegramUserId
  );
}

/** Creates missing rows and flags every listed id as superuser. Returns how many ids were processed. */
export function promoteSuperusers(db: SqliteDb, telegramUserIds: number[]): number {
  const txn = db.transaction(() => {
    for (const telegramUserId of telegramUserIds) {
      getOrCreateUser(db, { telegramUserId });
      db.prepare("UPDATE users SET is_superuser = 1, updated_at = ? WHERE telegram_user_id = ?").run(
        Date.now(),
        telegramUserId
      );
    }
    return telegramUserIds.length;
  });
  return txn();
}

/**
 * Extends from the current expiry while it is still in the future, otherwise from now.
 * Negative `days` means unlimited. Returns the new expiry (ms epoch).
 */
export function addSubscription(db: SqliteDb, userId: number, days: number, nowMs = Date.now()): number {
  const txn = db.transaction(() => {
    const row = db
      .prepare<[number], Pick<UserRow, "subscription_expires_at">>("SELECT subscription_expires_at FROM users WHERE id = ?")
      .get(userId);
    if (!row) {
      throw new Error(`User ${userId} not found`);
    }

    let expiresAt: number;
    if (days < 0) {
      expiresAt = nowMs + UNLIMITED_SUBSCRIPTION_DAYS * DAY_MS;
    } else if (row.subscription_expires_at !== null && row.subscription_expires_at > nowMs) {
      expiresAt = row.subscription_expires_at + days * DAY_MS;
    } else {
      expiresAt = nowMs + days * DAY_MS;
    }

    db.prepare("UPDATE users SET subscription_expires_at = ?, updated_at = ? WHERE id = ?").run(expiresAt, nowMs, userId);
    return expiresAt;
  });

  return txn();
}

export function getSubscriptionStatus(user: Pick<UserRow, "subscription_expires_at">, nowMs = Date.now()): SubscriptionStatus {
  const expiresAt = user.subscription_expires_at;
  if (expiresAt === null || expiresAt <= nowMs) {
    return { kind: "none" };
  }
  const daysLeft = Math.ceil((expiresAt - nowMs) / DAY_MS);
  if (daysLeft > UNLIMITED_THRESHOLD_DAYS) {
    return { kind: "unlimited", expiresAt };
  }
  return { kind: "active", expiresAt, daysLeft };
}

export function hasActiveSubscription(user: Pick<UserRow, "subscription_expires_at">, nowMs = Date.now()): boolean {
  return getSubscriptionStatus(user, nowMs).kind !== "none";
}
