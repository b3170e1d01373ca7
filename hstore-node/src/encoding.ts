import { Buffer, isAscii, isUtf8 } from "node:buffer";
import { inspect } from "node:util";
import { DEFAULT_ENCODING, PARSE_ENCODINGS, TEXT_ENCODINGS } from "./consts.ts";
import { HstoreError } from "./error.ts";
import type { HstoreText, ParseEncoding, TextEncoding } from "./types.ts";

function isTextEncoding(name: string): name is TextEncoding {
  return TEXT_ENCODINGS.has(name);
}

function isParseEncoding(name: string): name is ParseEncoding {
  return PARSE_ENCODINGS.has(name);
}

export function resolveEncoding(name: unknown): TextEncoding {
  if (name === undefined) return DEFAULT_ENCODING;
  if (typeof name === "string") {
    const normalized = name.toLowerCase();
    if (isTextEncoding(normalized)) return normalized;
  }
  throw new HstoreError("invalid_argument", {
    reason: `unsupported text encoding ${inspect(name)}`,
  });
}

export function resolveParseEncoding(name: unknown): ParseEncoding {
  const encoding = resolveEncoding(name);
  if (isParseEncoding(encoding)) return encoding;
  throw new HstoreError("invalid_argument", {
    reason: `text encoding ${inspect(encoding)} cannot be parsed byte by byte`,
  });
}

// Byte input is scanned as latin1 so that every byte is exactly one
// character and offsets stay byte offsets.

export function toScanText(input: HstoreText): string {
  if (typeof input === "string") return input;
  return Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString("latin1");
}

function isValidText(bytes: Buffer, encoding: ParseEncoding): boolean {
  switch (encoding) {
    case "utf8":
    case "utf-8":
      return isUtf8(bytes);
    case "ascii":
      return isAscii(bytes);
    case "latin1":
    case "binary":
      return true;
  }
}

/** Returns `undefined` when the field's bytes are not valid in `encoding`. */
export function decodeField(field: string, encoding: ParseEncoding): string | undefined {
  const bytes = Buffer.from(field, "latin1");
  if (!isValidText(bytes, encoding)) return undefined;
  return bytes.toString(encoding);
}

export function encodeText(text: string, encoding: TextEncoding): Uint8Array {
  return new Uint8Array(Buffer.from(text, encoding));
}
