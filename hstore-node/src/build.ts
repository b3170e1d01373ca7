import { inspect } from "node:util";
import { NULL_LITERAL, PAIR_SEPARATOR } from "./consts.ts";
import { encodeText, resolveEncoding } from "./encoding.ts";
import { HstoreError } from "./error.ts";
import { escape } from "./escape.ts";
import type { BuildBytesOptions, BuildOptions, HstoreInput, HstoreSink } from "./types.ts";

function isIterable<T>(input: Iterable<T> | object): input is Iterable<T> {
  return Symbol.iterator in input;
}

function entriesOf<K, V>(input: HstoreInput<K, V>): Iterable<readonly [K | string, V]> {
  if (typeof input !== "object" || input === null) {
    throw new HstoreError("invalid_argument", {
      reason: `expected a map, an iterable of pairs or an object, not ${inspect(input)}`,
    });
  }
  if (isIterable(input)) return input;
  return Object.entries(input);
}

function checkOptions<K, V>(options: BuildOptions<K, V>): void {
  if (options.keyMap !== undefined && typeof options.keyMap !== "function") {
    throw new HstoreError("invalid_argument", { reason: "keyMap must be callable" });
  }
  if (options.valueMap !== undefined && typeof options.valueMap !== "function") {
    throw new HstoreError("invalid_argument", { reason: "valueMap must be callable" });
  }
}

function writePair(key: string, value: string | null): string {
  if (value === null) return `"${escape(key)}"=>${NULL_LITERAL}`;
  return `"${escape(key)}"=>"${escape(value)}"`;
}

function writeEntries<K, V>(
  input: HstoreInput<K, V>,
  sink: HstoreSink,
  options: BuildOptions<K, V>,
): void {
  checkOptions(options);
  if (typeof sink?.write !== "function") {
    throw new HstoreError("invalid_argument", {
      reason: "sink must be a writable object that implements write()",
    });
  }

  const { keyMap, valueMap } = options;
  let first = true;
  for (const [rawKey, rawValue] of entriesOf(input)) {
    let key: unknown = rawKey;
    if (typeof rawKey !== "string" && keyMap !== undefined) key = keyMap(rawKey);
    if (typeof key !== "string") throw new HstoreError("non_string_key", { key });

    let value: unknown = rawValue;
    if (rawValue !== null && typeof rawValue !== "string" && valueMap !== undefined) {
      value = valueMap(rawValue);
    }
    if (value !== null && typeof value !== "string") {
      throw new HstoreError("non_string_value", { key, value });
    }

    sink.write(first ? writePair(key, value) : PAIR_SEPARATOR + writePair(key, value));
    first = false;
  }
}

/**
 * Appends the hstore text for `input` to `sink`, one chunk per pair.
 * Pairs written before a failing entry stay in the sink.
 */
export function write<K, V>(
  input: Iterable<readonly [K, V]>,
  sink: HstoreSink,
  options?: BuildOptions<K, V>,
): void;
export function write<V>(
  input: Readonly<Record<string, V>>,
  sink: HstoreSink,
  options?: BuildOptions<string, V>,
): void;
export function write<K, V>(
  input: HstoreInput<K, V>,
  sink: HstoreSink,
  options: BuildOptions<K, V> = {},
): void {
  writeEntries(input, sink, options);
}

/**
 * Renders `input` as hstore text. Keys and values are always quoted; a
 * `null` value becomes the bare `NULL` token.
 *
 * ```ts
 * build([["a", 1], ["b", null]], { valueMap: String }); // '"a"=>"1","b"=>NULL'
 * ```
 */
export function build<K, V>(input: Iterable<readonly [K, V]>, options?: BuildOptions<K, V>): string;
export function build<V>(input: Readonly<Record<string, V>>, options?: BuildOptions<string, V>): string;
export function build<K, V>(input: HstoreInput<K, V>, options: BuildOptions<K, V> = {}): string {
  let result = "";
  writeEntries(input, { write: (chunk: string) => { result += chunk; } }, options);
  return result;
}

/** Like {@link build}, encoded with `options.encoding` (UTF-8 by default). */
export function buildBytes<K, V>(
  input: Iterable<readonly [K, V]>,
  options?: BuildBytesOptions<K, V>,
): Uint8Array;
export function buildBytes<V>(
  input: Readonly<Record<string, V>>,
  options?: BuildBytesOptions<string, V>,
): Uint8Array;
export function buildBytes<K, V>(
  input: HstoreInput<K, V>,
  options: BuildBytesOptions<K, V> = {},
): Uint8Array {
  const encoding = resolveEncoding(options.encoding);
  let result = "";
  writeEntries(input, { write: (chunk: string) => { result += chunk; } }, options);
  return encodeText(result, encoding);
}
