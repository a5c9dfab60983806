import { describe, expect, it } from "vitest";

import { escapeMarkdown, markdownLinkLabel } from "../src/bot/markdown";

describe("escapeMarkdown", () => {
  it("prefixes entity markers with a backslash", () => {
    expect(escapeMarkdown("Breaking_Bad *S1 `x` [y]")).toBe("Breaking\\_Bad \\*S1 \\`x\\` \\[y]");
  });

  it("leaves other text alone", () => {
    expect(escapeMarkdown("فصل ۱ (2024) a\\b")).toBe("فصل ۱ (2024) a\\b");
  });
});

describe("markdownLinkLabel", () => {
  it("swaps square brackets for parentheses", () => {
    expect(markdownLinkLabel("Show [Final] _cut_")).toBe("Show (Final) _cut_");
  });
});
