import type { ParseEncoding, TextEncoding } from "./types.ts";

export const QUOTE = '"';
export const BACKSLASH = "\\";
export const ARROW = "=>";
export const PAIR_SEPARATOR = ",";
export const NULL_LITERAL = "NULL";

/** PostgreSQL's `isspace` set; Unicode spaces are ordinary characters. */
export const WHITESPACE: ReadonlySet<string> = new Set(" \t\n\v\f\r");

export const DEFAULT_ENCODING: TextEncoding = "utf-8";

export const TEXT_ENCODINGS: ReadonlySet<string> = new Set([
  "utf8",
  "utf-8",
  "utf16le",
  "utf-16le",
  "ucs2",
  "ucs-2",
  "latin1",
  "binary",
  "ascii",
]);

/** Encodings that keep ASCII bytes as themselves, so byte input can be scanned directly. */
export const PARSE_ENCODINGS: ReadonlySet<string> = new Set<ParseEncoding>([
  "utf8",
  "utf-8",
  "latin1",
  "binary",
  "ascii",
]);
