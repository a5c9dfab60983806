// Helpers for user-supplied text in `parseMode: "Markdown"` (legacy) messages.
// Backslash escapes are only read outside entities; inside a link label every
// character up to the closing `]` is taken literally.

/** Escapes text placed outside any entity. */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, "\\$&");
}

/** Text for a `[label](url)` link: square brackets would end the label early. */
export function markdownLinkLabel(text: string): string {
  return text.replace(/\[/g, "(").replace(/]/g, ")");
}
