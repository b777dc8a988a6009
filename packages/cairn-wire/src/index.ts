// cairn wire protocol: frame types and codec.
//
// Frames are tagged values (simple string, error, integer, bulk string, text,
// array, map, set). This package turns bytes into frames and back, and maps
// plain values onto frames for replies.

// ============================================================================
// Frame Types
// ============================================================================

export type {
  Frame,
  FrameKind,
  SimpleStringFrame,
  ErrorFrame,
  IntegerFrame,
  BulkStringFrame,
  TextFrame,
  ArrayFrame,
  MapFrame,
  SetFrame,
} from "./types.ts";

export {
  FrameTag,
  I64_MIN,
  I64_MAX,
  isFrame,
  simpleString,
  errorFrame,
  integer,
  bulkString,
  absent,
  text,
  array,
  map,
  set,
} from "./types.ts";

// ============================================================================
// Errors
// ============================================================================

export { FrameError, type FrameErrorKind } from "./frame_error.ts";

// ============================================================================
// Codec
// ============================================================================

export {
  decodeFrame,
  tryDecodeFrame,
  decodeFrames,
  encodeFrame,
  frameKey,
  frameEquals,
  uniqueFrames,
  uniqueEntries,
  DEFAULT_MAX_BULK_LENGTH,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_LINE_LENGTH,
  type DecodeResult,
  type DecodeOptions,
} from "./codec.ts";

export { toFrame, encodeValue, type WireValue } from "./value.ts";

export {
  concat,
  utf8Encode,
  utf8Decode,
  bytesToBinaryString,
  binaryStringToBytes,
} from "./bytes.ts";
