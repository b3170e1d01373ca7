import { inspect } from "node:util";
import { ARROW, BACKSLASH, NULL_LITERAL, PAIR_SEPARATOR, QUOTE, WHITESPACE } from "./consts.ts";
import { decodeField, resolveParseEncoding, toScanText } from "./encoding.ts";
import { HstoreError } from "./error.ts";
import { unescape } from "./escape.ts";
import type {
  HstoreSource,
  HstoreText,
  Pair,
  ParseInto,
  ParseIntoOptions,
  ParseOptions,
} from "./types.ts";

function fail(position: number): never {
  throw new HstoreError("malformed_input", { position });
}

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

/** `raw` is the text between the quotes for quoted tokens, still escaped. */
interface KeyToken {
  type: "quoted" | "bare";
  raw: string;
  start: number;
  end: number;
}

type ValueToken =
  | { type: "quoted"; raw: string; start: number; end: number }
  | { type: "bare"; raw: string; start: number; end: number }
  | { type: "null"; start: number; end: number };

// ---------------------------------------------------------------------------
// Scanning helpers
// ---------------------------------------------------------------------------

function skipSpace(s: string, pos: number): number {
  let i = pos;
  while (i < s.length && WHITESPACE.has(s[i])) i++;
  return i;
}

/** Returns the offset just past the closing quote, or -1 when unterminated. */
function scanQuoted(s: string, pos: number): number {
  let i = pos + 1;
  while (i < s.length) {
    if (s[i] === BACKSLASH) {
      if (i + 1 >= s.length) return -1;
      i += 2;
      continue;
    }
    if (s[i] === QUOTE) return i + 1;
    i += 1;
  }
  return -1;
}

function scanBare(s: string, pos: number): number {
  let i = pos;
  while (i < s.length && s[i] !== PAIR_SEPARATOR && !WHITESPACE.has(s[i])) i++;
  return i;
}

/** Offset where the value starts, or -1 when no `=>` follows. */
function matchArrow(s: string, pos: number): number {
  const i = skipSpace(s, pos);
  if (!s.startsWith(ARROW, i)) return -1;
  return skipSpace(s, i + ARROW.length);
}

function atPairEnd(s: string, pos: number): boolean {
  const i = skipSpace(s, pos);
  return i === s.length || s[i] === PAIR_SEPARATOR;
}

// ---------------------------------------------------------------------------
// Key and value readers
// ---------------------------------------------------------------------------

/**
 * Key readings at `pos`, in the order they are tried: the quoted span
 * first, then bare runs from shortest to longest. A bare key never
 * contains whitespace, so the candidates stop at the first space.
 */
function* keyCandidates(s: string, pos: number): Generator<KeyToken> {
  if (s[pos] === QUOTE) {
    const end = scanQuoted(s, pos);
    if (end !== -1) yield { type: "quoted", raw: s.slice(pos + 1, end - 1), start: pos, end };
  }

  for (let i = pos + 1; i < s.length; i++) {
    if (WHITESPACE.has(s[i])) {
      yield { type: "bare", raw: s.slice(pos, i), start: pos, end: i };
      return;
    }
    if (s.startsWith(ARROW, i)) yield { type: "bare", raw: s.slice(pos, i), start: pos, end: i };
  }
}

function readValue(s: string, pos: number): ValueToken | undefined {
  if (s[pos] === QUOTE) {
    const end = scanQuoted(s, pos);
    if (end !== -1 && atPairEnd(s, end)) {
      return { type: "quoted", raw: s.slice(pos + 1, end - 1), start: pos, end };
    }
  }

  const nullEnd = pos + NULL_LITERAL.length;
  if (s.slice(pos, nullEnd).toUpperCase() === NULL_LITERAL && atPairEnd(s, nullEnd)) {
    return { type: "null", start: pos, end: nullEnd };
  }

  // Falls back here for a quoted value with trailing text: `"x"y` is bare.
  const end = scanBare(s, pos);
  if (end === pos) return undefined;
  return { type: "bare", raw: s.slice(pos, end), start: pos, end };
}

function matchPair(s: string, pos: number): { key: KeyToken; value: ValueToken } | undefined {
  for (const key of keyCandidates(s, pos)) {
    const valueStart = matchArrow(s, key.end);
    if (valueStart === -1) continue;
    const value = readValue(s, valueStart);
    if (value !== undefined) return { key, value };
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Pair scanner
// ---------------------------------------------------------------------------

/** `decode` receives each unescaped field with the offset of its token. */
function* scanPairs(
  s: string,
  decode: (field: string, position: number) => string,
): Generator<Pair, void, undefined> {
  // End of the last consumed token; malformed input is reported here.
  let cursor = 0;

  for (;;) {
    const start = skipSpace(s, cursor);
    if (start === s.length) return;

    const pair = matchPair(s, start);
    if (pair === undefined) fail(cursor);

    const { key, value } = pair;
    const keyText = key.type === "quoted" ? unescape(key.raw) : key.raw;
    let valueText: string | null;
    switch (value.type) {
      case "quoted":
        valueText = decode(unescape(value.raw), value.start);
        break;
      case "bare":
        valueText = decode(value.raw, value.start);
        break;
      case "null":
        valueText = null;
        break;
    }
    yield [decode(keyText, key.start), valueText];

    cursor = value.end;
    const next = skipSpace(s, cursor);
    if (next === s.length) return;
    if (s[next] !== PAIR_SEPARATOR) fail(cursor);
    cursor = next + 1;
  }
}

/**
 * Lazily parses hstore text into pairs, in text order and with duplicate
 * keys kept. Pairs before a malformed spot are yielded before the error is
 * thrown.
 *
 * Byte input is scanned byte by byte; each key and value is decoded with
 * `options.encoding` after unescaping. Only encodings that keep ASCII bytes
 * as themselves are accepted, and a field whose bytes are not valid in the
 * encoding fails with `undecodable_field` at the offset of its token.
 */
export function parsePairs(
  input: HstoreText,
  options: ParseOptions = {},
): Generator<Pair, void, undefined> {
  const encoding = resolveParseEncoding(options.encoding);
  if (typeof input === "string") return scanPairs(input, (field) => field);
  if (!(input instanceof Uint8Array)) {
    throw new HstoreError("invalid_argument", {
      reason: `expected a string or bytes, not ${inspect(input)}`,
    });
  }
  return scanPairs(toScanText(input), (field, position) => {
    const text = decodeField(field, encoding);
    if (text === undefined) throw new HstoreError("undecodable_field", { position });
    return text;
  });
}

// ---------------------------------------------------------------------------
// Materializing helpers
// ---------------------------------------------------------------------------

function checkInto(into: unknown): ParseInto {
  if (into === undefined) return "map";
  if (into === "map" || into === "pairs" || into === "object") return into;
  throw new HstoreError("invalid_argument", { reason: `unknown result type ${inspect(into)}` });
}

function collect(
  pairs: Iterable<Pair>,
  into: ParseInto,
): Map<string, string | null> | Pair[] | Record<string, string | null> {
  switch (into) {
    case "map":
      return new Map(pairs);
    case "pairs":
      return Array.from(pairs);
    case "object": {
      const result: Record<string, string | null> = {};
      Object.setPrototypeOf(result, null);
      for (const [key, value] of pairs) result[key] = value;
      return result;
    }
  }
}

/**
 * Parses a whole hstore document. Later duplicates overwrite earlier ones
 * in a map or object result; `into: "pairs"` keeps them all.
 */
export function parse(
  input: HstoreText,
  options?: ParseOptions & { into?: "map" },
): Map<string, string | null>;
export function parse(input: HstoreText, options: ParseOptions & { into: "pairs" }): Pair[];
export function parse(
  input: HstoreText,
  options: ParseOptions & { into: "object" },
): Record<string, string | null>;
export function parse(
  input: HstoreText,
  options: ParseIntoOptions = {},
): Map<string, string | null> | Pair[] | Record<string, string | null> {
  const into = checkInto(options.into);
  return collect(parsePairs(input, options), into);
}

/** Reads everything from `source` in one call and parses it. */
export function read(
  source: HstoreSource,
  options?: ParseOptions & { into?: "map" },
): Map<string, string | null>;
export function read(source: HstoreSource, options: ParseOptions & { into: "pairs" }): Pair[];
export function read(
  source: HstoreSource,
  options: ParseOptions & { into: "object" },
): Record<string, string | null>;
export function read(
  source: HstoreSource,
  options: ParseIntoOptions = {},
): Map<string, string | null> | Pair[] | Record<string, string | null> {
  if (typeof source?.read !== "function") {
    throw new HstoreError("invalid_argument", {
      reason: "source must be a readable object that implements read()",
    });
  }
  const into = checkInto(options.into);
  return collect(parsePairs(source.read(), options), into);
}
