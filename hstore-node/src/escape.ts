import { BACKSLASH, QUOTE } from "./consts.ts";

/**
 * Drops the backslash of every `\X` pair, whatever X is: `\a` reads as `a`.
 * A trailing lone backslash is kept.
 */
export function unescape(s: string): string {
  if (!s.includes(BACKSLASH)) return s;

  let result = "";
  let i = 0;
  while (i < s.length) {
    if (s[i] === BACKSLASH && i + 1 < s.length) {
      result += s[i + 1];
      i += 2;
      continue;
    }
    result += s[i];
    i += 1;
  }
  return result;
}

/** Backslash-escapes `\` and `"` for use inside a quoted hstore token. */
export function escape(s: string): string {
  let result = "";
  for (const ch of s) {
    if (ch === BACKSLASH || ch === QUOTE) result += BACKSLASH;
    result += ch;
  }
  return result;
}
