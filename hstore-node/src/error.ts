import { inspect } from "node:util";

export type HstoreErrorKind =
  | "malformed_input"
  | "undecodable_field"
  | "non_string_key"
  | "non_string_value"
  | "invalid_argument";

const KIND_MESSAGES: Record<HstoreErrorKind, string> = {
  malformed_input: "malformed hstore value",
  undecodable_field: "undecodable hstore field",
  non_string_key: "key is not a string",
  non_string_value: "value is not a string",
  invalid_argument: "invalid argument",
};

export interface HstoreErrorDetails {
  /** Offset in the scanned text: UTF-16 code units for strings, bytes for byte input. */
  position?: number;
  key?: unknown;
  value?: unknown;
  reason?: string;
}

function formatMessage(kind: HstoreErrorKind, details: HstoreErrorDetails): string {
  const base = KIND_MESSAGES[kind];
  switch (kind) {
    case "malformed_input":
    case "undecodable_field":
      return `${base} at position ${details.position}`;
    case "non_string_key":
      return `${base}: ${inspect(details.key)}`;
    case "non_string_value":
      return `${base}: ${inspect(details.value)} (key ${inspect(details.key)})`;
    case "invalid_argument":
      return details.reason === undefined ? base : `${base}: ${details.reason}`;
  }
}

export class HstoreError extends Error {
  readonly kind: HstoreErrorKind;
  readonly position?: number;
  readonly key?: unknown;
  readonly value?: unknown;

  constructor(kind: HstoreErrorKind, details: HstoreErrorDetails = {}) {
    super(formatMessage(kind, details));
    this.name = "HstoreError";
    this.kind = kind;
    if (details.position !== undefined) this.position = details.position;
    if ("key" in details) this.key = details.key;
    if ("value" in details) this.value = details.value;
  }
}
