import { describe, expect, it } from "vitest";

import { UpdateContext } from "../src/bot/context";
import { dispatch } from "../src/bot/dispatcher";
import { BLOCKED_NOTICE } from "../src/bot/gates";
import { MENU_LABELS } from "../src/bot/keyboards";
import { promptUnjoinedSponsors, SPONSOR_PROMPT_FALLBACK } from "../src/bot/sponsorGate";
import { setBotStatus } from "../src/db/botStatusRepo";
import { addSponsorChannel } from "../src/db/sponsorsRepo";
import { upsertTemplate } from "../src/db/templatesRepo";
import { setUserActive } from "../src/db/usersRepo";
import { ADMIN_ID, callbackUpdate, createTestDeps, readStep, seedUser, sentText, textUpdate, USER_ID } from "./helpers";

describe("maintenance gate", () => {
  it("answers regular users with the maintenance notice and stops", async () => {
    const { db, api, deps } = createTestDeps();
    setBotStatus(db, { isUpdate: true, updateMessage: "<b>back soon</b>" });

    await dispatch(textUpdate(USER_ID, "/start"), deps);

    expect(api.sendMessage).toHaveBeenCalledTimes(1);
    expect(api.sendMessage).toHaveBeenCalledWith(USER_ID, "<b>back soon</b>", { parseMode: "HTML" });
  });

  it("lets superusers through", async () => {
    const { db, api, deps } = createTestDeps();
    seedUser(db, ADMIN_ID, { superuser: true });
    setBotStatus(db, { isUpdate: true });

    await dispatch(textUpdate(ADMIN_ID, "/help"), deps);

    expect(sentText(api)).toBe("Help Command");
  });

  it("uses the seeded default notice", async () => {
    const { db, api, deps } = createTestDeps();
    setBotStatus(db, { isUpdate: true });

    const update = callbackUpdate(USER_ID, "pay:1");

    await dispatch(update, deps);

    expect(sentText(api)).toBe("bot is updated !");
    expect(api.answerCallbackQuery).toHaveBeenCalledTimes(1);
    expect(api.answerCallbackQuery).toHaveBeenCalledWith(update.callback_query?.id);
  });
});

describe("block gate", () => {
  it("stops blocked users before any step handler", async () => {
    const { db, api, deps } = createTestDeps();
    seedUser(db, USER_ID, { step: "home" });
    setUserActive(db, USER_ID, false);

    await dispatch(textUpdate(USER_ID, MENU_LABELS.buySubscription), deps);

    expect(api.sendMessage).toHaveBeenCalledTimes(1);
    expect(sentText(api)).toBe(BLOCKED_NOTICE);
    expect(readStep(db, USER_ID)).toBe("home");
  });

  it("still answers the callback query of a blocked user", async () => {
    const { db, api, deps } = createTestDeps();
    seedUser(db, USER_ID, { step: "home" });
    setUserActive(db, USER_ID, false);
    const update = callbackUpdate(USER_ID, "vote:like:1");

    await dispatch(update, deps);

    expect(api.answerCallbackQuery).toHaveBeenCalledWith(update.callback_query?.id);
    expect(sentText(api)).toBe(BLOCKED_NOTICE);
    expect(api.editMessageText).not.toHaveBeenCalled();
  });

  it("blocks commands too", async () => {
    const { db, api, deps } = createTestDeps();
    seedUser(db, USER_ID, { step: "admin_home" });
    setUserActive(db, USER_ID, false);

    await dispatch(textUpdate(USER_ID, "/start"), deps);

    expect(sentText(api)).toBe(BLOCKED_NOTICE);
    expect(readStep(db, USER_ID)).toBe("admin_home");
  });
});

describe("sponsor gate", () => {
  it("lists only unjoined channels and skips the wrapped handler", async () => {
    const { db, api, deps } = createTestDeps();
    addSponsorChannel(db, { name: "Joined", chatId: "-1001", link: "https://t.me/joined" });
    addSponsorChannel(db, { name: "Missing", chatId: "-1002", link: "https://t.me/missing" });
    addSponsorChannel(db, { name: "Promo", link: "https://t.me/promo", other: true });
    api.isChatMember.mockImplementation(async (chatId) => ({ ok: true, result: chatId === "-1001" }));

    await dispatch(textUpdate(USER_ID, "/start"), deps);

    expect(api.isChatMember).toHaveBeenCalledTimes(2);
    expect(api.sendMessage).toHaveBeenCalledTimes(1);
    const [, text, options] = api.sendMessage.mock.calls[0] ?? [];
    expect(text).toBe(SPONSOR_PROMPT_FALLBACK);
    expect(options?.parseMode).toBe("HTML");
    expect(options?.replyMarkup).toMatchObject({
      inline_keyboard: [
        [{ text: "Missing", url: "https://t.me/missing" }],
        [{ text: MENU_LABELS.confirmMembership, callback_data: "joined_to_sponsor" }]
      ]
    });
  });

  it("counts a failed membership lookup as not joined", async () => {
    const { db, api, deps } = createTestDeps();
    addSponsorChannel(db, { name: "Main", chatId: "-1001", link: "https://t.me/main" });
    upsertTemplate(db, "sponsor_channels_message", "join first");
    api.isChatMember.mockResolvedValue({ ok: false, error: "Bad Request: user not found" });

    const ctx = new UpdateContext(textUpdate(USER_ID, "/start"), deps);

    await expect(promptUnjoinedSponsors(ctx)).resolves.toBe(true);
    expect(sentText(api)).toBe("join first");
  });

  it("is idempotent while membership does not change", async () => {
    const { db, api, deps } = createTestDeps();
    addSponsorChannel(db, { name: "Main", chatId: "-1001", link: "https://t.me/main" });
    api.isChatMember.mockResolvedValue({ ok: true, result: false });

    await dispatch(textUpdate(USER_ID, "/start"), deps);
    await dispatch(textUpdate(USER_ID, "/start"), deps);

    expect(api.sendMessage.mock.calls[0]?.slice(1)).toEqual(api.sendMessage.mock.calls[1]?.slice(1));
  });

  it("runs the handler once every channel is joined", async () => {
    const { db, api, deps } = createTestDeps();
    addSponsorChannel(db, { name: "Main", chatId: "-1001", link: "https://t.me/main" });

    await dispatch(callbackUpdate(USER_ID, "joined_to_sponsor"), deps);

    expect(api.deleteMessage).toHaveBeenCalledTimes(1);
    expect(sentText(api)).toBe("Home");
    expect(readStep(db, USER_ID)).toBe("home");
  });
});
