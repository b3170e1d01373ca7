/** One hstore entry. A `null` value is SQL `NULL`, not the empty string. */
export type Pair = readonly [key: string, value: string | null];

/** Node text encodings usable for hstore fields (the byte-to-text ones are excluded). */
export type TextEncoding = Exclude<BufferEncoding, "hex" | "base64" | "base64url">;

/** Encodings byte input can be parsed in: ASCII bytes must stay themselves. */
export type ParseEncoding = Extract<TextEncoding, "utf8" | "utf-8" | "latin1" | "binary" | "ascii">;

/** hstore text, either decoded or as the raw bytes read from the wire. */
export type HstoreText = string | Uint8Array;

/**
 * Anything the serializer can walk as key/value entries: a `Map`, an
 * iterable of `[key, value]` tuples (iteration order is kept), or a plain
 * object (`Object.entries` order).
 */
export type HstoreInput<K, V> = Iterable<readonly [K, V]> | Readonly<Record<string, V>>;

export interface BuildOptions<K, V> {
  /** Turns a non-string key into its text form. */
  keyMap?: (key: K) => string;
  /** Turns a value that is neither a string nor `null` into its text form. */
  valueMap?: (value: V) => string;
}

export interface BuildBytesOptions<K, V> extends BuildOptions<K, V> {
  encoding?: TextEncoding;
}

export interface ParseOptions {
  /** Encoding of byte input. Ignored for string input. */
  encoding?: ParseEncoding;
}

export type ParseInto = "map" | "pairs" | "object";

export interface ParseIntoOptions extends ParseOptions {
  into?: ParseInto;
}

/** Append-only destination, e.g. a Node `Writable`. */
export interface HstoreSink {
  write(chunk: string): unknown;
}

/** Source read in one call, e.g. a file handle wrapper. */
export interface HstoreSource {
  read(): HstoreText;
}
