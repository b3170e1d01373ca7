export type {
  Pair,
  TextEncoding,
  ParseEncoding,
  HstoreText,
  HstoreInput,
  BuildOptions,
  BuildBytesOptions,
  ParseOptions,
  ParseInto,
  ParseIntoOptions,
  HstoreSink,
  HstoreSource,
} from "./types.ts";

export { HstoreError } from "./error.ts";
export type { HstoreErrorKind, HstoreErrorDetails } from "./error.ts";

export { unescape, escape } from "./escape.ts";

export { parsePairs, parse, read } from "./parse.ts";
export { build, buildBytes, write } from "./build.ts";
