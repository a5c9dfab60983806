import { describe, expect, it } from "vitest";

import { getMessage, getMessageOr, MessageTemplateNotFoundError, renderTemplate } from "../src/bot/templates";
import { upsertTemplate } from "../src/db/templatesRepo";
import {
  addSubscription,
  getOrCreateUser,
  getSubscriptionStatus,
  getUserByTelegramId,
  hasActiveSubscription,
  promoteSuperusers,
  setStep
} from "../src/db/usersRepo";
import { createTestDb } from "./helpers";

const DAY = 24 * 60 * 60 * 1000;

describe("usersRepo", () => {
  it("returns the same row on repeated get-or-create", () => {
    const db = createTestDb();
    const first = getOrCreateUser(db, { telegramUserId: 1, username: "alice", firstName: "Alice" });
    const second = getOrCreateUser(db, { telegramUserId: 1, username: "changed" });

    expect(second.id).toBe(first.id);
    expect(second).toMatchObject({ username: "alice", step: "home", is_active: 1, is_superuser: 0 });
  });

  it("refuses an empty step", () => {
    const db = createTestDb();
    const user = getOrCreateUser(db, { telegramUserId: 1 });

    expect(() => setStep(db, user.id, "")).toThrow("Step must be a non-empty string");
  });

  it("promotes configured superusers, creating them when missing", () => {
    const db = createTestDb();

    expect(promoteSuperusers(db, [10, 11])).toBe(2);
    expect(getUserByTelegramId(db, 11)?.is_superuser).toBe(1);
  });

  it("extends an active subscription from its current expiry", () => {
    const db = createTestDb();
    const user = getOrCreateUser(db, { telegramUserId: 1 });
    const now = 1_000 * DAY;

    const first = addSubscription(db, user.id, 10, now);
    const second = addSubscription(db, user.id, 5, now + DAY);

    expect(first).toBe(now + 10 * DAY);
    expect(second).toBe(now + 15 * DAY);
  });

  it("starts over from now once the subscription has lapsed", () => {
    const db = createTestDb();
    const user = getOrCreateUser(db, { telegramUserId: 1 });
    const now = 1_000 * DAY;
    addSubscription(db, user.id, 1, now);

    expect(addSubscription(db, user.id, 3, now + 5 * DAY)).toBe(now + 8 * DAY);
  });

  it("classifies subscription status", () => {
    const now = 1_000 * DAY;

    expect(getSubscriptionStatus({ subscription_expires_at: null }, now)).toEqual({ kind: "none" });
    expect(getSubscriptionStatus({ subscription_expires_at: now - 1 }, now)).toEqual({ kind: "none" });
    expect(getSubscriptionStatus({ subscription_expires_at: now + 2 * DAY }, now)).toEqual({
      kind: "active",
      expiresAt: now + 2 * DAY,
      daysLeft: 2
    });
    expect(getSubscriptionStatus({ subscription_expires_at: now + 36_500 * DAY }, now).kind).toBe("unlimited");
    expect(hasActiveSubscription({ subscription_expires_at: now + 1 }, now)).toBe(true);
  });
});

describe("templates", () => {
  it("fills known placeholders and keeps unknown ones", () => {
    expect(renderTemplate("{a} and {b}", { a: 1 })).toBe("1 and {b}");
    expect(renderTemplate("{a}", { a: null })).toBe("");
  });

  it("prefers stored text over the built-in default", () => {
    const db = createTestDb();
    upsertTemplate(db, "info_plan_message", "id={user_id}");

    expect(getMessage(db, "info_plan_message", { user_id: 7 })).toBe("id=7");
  });

  it("throws for names with neither stored nor built-in text", () => {
    const db = createTestDb();

    expect(() => getMessage(db, "nope")).toThrow(MessageTemplateNotFoundError);
    expect(getMessageOr(db, "nope", "fallback")).toBe("fallback");
  });
});
