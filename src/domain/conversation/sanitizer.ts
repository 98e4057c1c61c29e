/**
 * Text sanitizer applied to every piece of user-supplied conversation text.
 *
 * The output is safe to echo back into markup and to log: control characters
 * are removed, horizontal whitespace is collapsed, long runs of blank lines
 * are capped and markup-significant characters are replaced by entities.
 *
 * sanitize(sanitize(x)) === sanitize(x) for every input.
 */

export interface SanitizeOptions {
  maxConsecutiveNewlines?: number;
}

export const DEFAULT_MAX_CONSECUTIVE_NEWLINES = 3;

// C0 controls and DEL, minus \t (0x09) and \n (0x0A).
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F]/g;
const HORIZONTAL_WHITESPACE = /[ \t]+/g;

// An "&" that does not already start one of the entities produced below.
const BARE_AMPERSAND = /&(?!(?:amp|lt|gt|quot|#39);)/g;

const ENTITIES: Record<string, string> = {
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeMarkup(text: string): string {
  return text
    .replace(BARE_AMPERSAND, "&amp;")
    .replace(/[<>"']/g, (ch) => ENTITIES[ch] ?? ch);
}

export function sanitize(text: string, options: SanitizeOptions = {}): string {
  const maxNewlines = Math.max(
    1,
    options.maxConsecutiveNewlines ?? DEFAULT_MAX_CONSECUTIVE_NEWLINES
  );
  const newlineRun = new RegExp(`\\n{${maxNewlines + 1},}`, "g");

  const cleaned = String(text ?? "")
    .replace(/\r\n?/g, "\n")
    .replace(CONTROL_CHARS, "")
    .replace(HORIZONTAL_WHITESPACE, " ")
    .replace(newlineRun, "\n".repeat(maxNewlines));

  return escapeMarkup(cleaned).trim();
}
