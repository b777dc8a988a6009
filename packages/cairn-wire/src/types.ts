// cairn wire protocol frame types.
//
// Every frame starts with a one-byte tag. Lines end in CR LF; bulk and text
// payloads are length-prefixed and followed by a CR LF terminator.

// ============================================================================
// Tags
// ============================================================================

/** Leading tag byte of each frame kind. */
export const FrameTag = {
  SimpleString: 0x2b, // '+'
  Error: 0x2d, // '-'
  Integer: 0x3a, // ':'
  BulkString: 0x24, // '$'
  Array: 0x2a, // '*'
  Map: 0x25, // '%'
  Set: 0x26, // '&'
  Text: 0x5e, // '^'
} as const;

export type FrameTag = (typeof FrameTag)[keyof typeof FrameTag];

/** Smallest and largest values an Integer frame can carry. */
export const I64_MIN = -(1n << 63n);
export const I64_MAX = (1n << 63n) - 1n;

// ============================================================================
// Frames
// ============================================================================

/** Short line-terminated text without embedded CR/LF. */
export interface SimpleStringFrame {
  tag: "SimpleString";
  value: string;
}

/** A server-reported error, distinct from a successful string. */
export interface ErrorFrame {
  tag: "Error";
  message: string;
}

/** Signed 64-bit integer. Booleans travel as 0 / 1. */
export interface IntegerFrame {
  tag: "Integer";
  value: bigint;
}

/**
 * Length-prefixed byte blob.
 *
 * `null` is the absent sentinel (`$-1\r\n`), never the same as an empty blob.
 */
export interface BulkStringFrame {
  tag: "BulkString";
  value: Uint8Array | null;
}

/** UTF-8 text, kept apart from BulkString so a reader knows to decode it. */
export interface TextFrame {
  tag: "Text";
  value: string;
}

export interface ArrayFrame {
  tag: "Array";
  items: Frame[];
}

/** Key/value pairs. Keys are unique by encoding; order carries no meaning. */
export interface MapFrame {
  tag: "Map";
  entries: Array<[Frame, Frame]>;
}

/** Unique members, compared by encoding. */
export interface SetFrame {
  tag: "Set";
  items: Frame[];
}

/** One self-describing unit of the wire protocol. */
export type Frame =
  | SimpleStringFrame
  | ErrorFrame
  | IntegerFrame
  | BulkStringFrame
  | TextFrame
  | ArrayFrame
  | MapFrame
  | SetFrame;

export type FrameKind = Frame["tag"];

const FRAME_KINDS: ReadonlySet<string> = new Set<FrameKind>([
  "SimpleString",
  "Error",
  "Integer",
  "BulkString",
  "Text",
  "Array",
  "Map",
  "Set",
]);

/** Check whether a value is a Frame object. */
export function isFrame(value: unknown): value is Frame {
  return (
    typeof value === "object" &&
    value !== null &&
    "tag" in value &&
    typeof value.tag === "string" &&
    FRAME_KINDS.has(value.tag)
  );
}

// ============================================================================
// Factory functions
// ============================================================================

export function simpleString(value: string): SimpleStringFrame {
  return { tag: "SimpleString", value };
}

export function errorFrame(message: string): ErrorFrame {
  return { tag: "Error", message };
}

export function integer(value: bigint | number): IntegerFrame {
  return { tag: "Integer", value: BigInt(value) };
}

export function bulkString(value: Uint8Array | string | null): BulkStringFrame {
  return {
    tag: "BulkString",
    value: typeof value === "string" ? new TextEncoder().encode(value) : value,
  };
}

/** The absent sentinel. */
export function absent(): BulkStringFrame {
  return { tag: "BulkString", value: null };
}

export function text(value: string): TextFrame {
  return { tag: "Text", value };
}

export function array(items: Frame[]): ArrayFrame {
  return { tag: "Array", items };
}

export function map(entries: Array<[Frame, Frame]>): MapFrame {
  return { tag: "Map", entries };
}

export function set(items: Frame[]): SetFrame {
  return { tag: "Set", items };
}
