// Frame encoding/decoding.
//
// decodeFrame works on a byte buffer that may hold only part of a frame: it
// raises FrameError("incomplete") so stream readers can wait for more bytes
// and try again from the same offset.

import {
  type Frame,
  FrameTag,
  I64_MAX,
  I64_MIN,
  array,
  bulkString,
  errorFrame,
  integer,
  map,
  set,
  simpleString,
  text,
} from "./types.ts";
import { FrameError } from "./frame_error.ts";
import {
  CRLF,
  bytesToBinaryString,
  concat,
  indexOfCrlf,
  utf8Decode,
  utf8Encode,
} from "./bytes.ts";

/** Decoded value and the offset just past it. */
export interface DecodeResult<T> {
  value: T;
  next: number;
}

export interface DecodeOptions {
  /** Largest bulk or text payload accepted. Defaults to 512 MiB. */
  maxBulkLength?: number;
  /** Deepest nesting of composite frames accepted. Defaults to 128. */
  maxDepth?: number;
  /** Longest CR LF terminated line accepted, terminator excluded. Defaults to 64 KiB. */
  maxLineLength?: number;
}

export const DEFAULT_MAX_BULK_LENGTH = 512 * 1024 * 1024;
export const DEFAULT_MAX_DEPTH = 128;
export const DEFAULT_MAX_LINE_LENGTH = 64 * 1024;

const INTEGER_LINE = /^-?\d+$/;

// ============================================================================
// Decoding
// ============================================================================

class FrameDecoder {
  private readonly maxBulkLength: number;
  private readonly maxDepth: number;
  private readonly maxLineLength: number;

  constructor(
    private readonly buf: Uint8Array,
    public pos: number,
    options: DecodeOptions,
  ) {
    this.maxBulkLength = options.maxBulkLength ?? DEFAULT_MAX_BULK_LENGTH;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  }

  frame(depth: number): Frame {
    if (this.pos >= this.buf.length) {
      throw FrameError.incomplete(this.pos);
    }
    const tagOffset = this.pos;
    const tag = this.buf[this.pos++];

    switch (tag) {
      case FrameTag.SimpleString:
        return simpleString(utf8Decode(this.line()));
      case FrameTag.Error:
        return errorFrame(utf8Decode(this.line()));
      case FrameTag.Integer:
        return integer(this.integerLine());
      case FrameTag.BulkString:
        return bulkString(this.lengthPrefixed("bulk string"));
      case FrameTag.Text: {
        const payload = this.lengthPrefixed("text");
        if (payload === null) {
          throw FrameError.malformed("text frame cannot be absent", tagOffset);
        }
        return text(utf8Decode(payload));
      }
      case FrameTag.Array:
        return array(this.elements(this.count("array"), depth));
      case FrameTag.Set:
        return set(uniqueFrames(this.elements(this.count("set"), depth)));
      case FrameTag.Map: {
        const pairs = this.count("map");
        const flat = this.elements(pairs * 2, depth);
        const entries: Array<[Frame, Frame]> = [];
        for (let i = 0; i < flat.length; i += 2) {
          entries.push([flat[i], flat[i + 1]]);
        }
        return map(uniqueEntries(entries));
      }
      default:
        throw FrameError.malformed(
          `unknown frame tag 0x${tag.toString(16).padStart(2, "0")}`,
          tagOffset,
        );
    }
  }

  /** Bytes up to the next CR LF; the terminator is consumed. */
  private line(): Uint8Array {
    const bound = this.pos + this.maxLineLength + 2;
    const end = indexOfCrlf(this.buf, this.pos, bound);
    if (end < 0) {
      if (this.buf.length >= bound) {
        throw FrameError.malformed(
          `line exceeds limit of ${this.maxLineLength} bytes`,
          this.pos,
        );
      }
      throw FrameError.incomplete(this.pos, this.buf.length + 1);
    }
    const line = this.buf.subarray(this.pos, end);
    this.pos = end + 2;
    return line;
  }

  private integerLine(): bigint {
    const start = this.pos;
    const raw = utf8Decode(this.line());
    if (!INTEGER_LINE.test(raw)) {
      throw FrameError.malformed(`invalid integer: ${JSON.stringify(raw)}`, start);
    }
    const value = BigInt(raw);
    if (value < I64_MIN || value > I64_MAX) {
      throw FrameError.malformed(`integer out of range: ${raw}`, start);
    }
    return value;
  }

  private count(what: string): number {
    const start = this.pos;
    const n = this.integerLine();
    if (n < 0n) {
      throw FrameError.malformed(`negative ${what} count: ${n}`, start);
    }
    if (n > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw FrameError.malformed(`${what} count too large: ${n}`, start);
    }
    return Number(n);
  }

  /**
   * `<len>\r\n<payload>\r\n`. Length -1 is the absent sentinel.
   *
   * The two bytes after the payload are skipped without being checked.
   */
  private lengthPrefixed(what: string): Uint8Array | null {
    const start = this.pos;
    const n = this.integerLine();
    if (n === -1n) return null;
    if (n < -1n) {
      throw FrameError.malformed(`invalid ${what} length: ${n}`, start);
    }
    if (n > BigInt(this.maxBulkLength)) {
      throw FrameError.malformed(
        `${what} length ${n} exceeds limit of ${this.maxBulkLength}`,
        start,
      );
    }
    const len = Number(n);
    if (this.pos + len + 2 > this.buf.length) {
      throw FrameError.incomplete(this.pos, this.pos + len + 2);
    }
    const payload = new Uint8Array(this.buf.subarray(this.pos, this.pos + len));
    this.pos += len + 2;
    return payload;
  }

  private elements(n: number, depth: number): Frame[] {
    if (depth >= this.maxDepth) {
      throw FrameError.malformed(`frames nested deeper than ${this.maxDepth}`, this.pos);
    }
    const items: Frame[] = [];
    for (let i = 0; i < n; i++) {
      items.push(this.frame(depth + 1));
    }
    return items;
  }
}

/**
 * Decode one frame from `buf` starting at `offset`.
 *
 * @throws FrameError with kind `incomplete` when the buffer ends first, or
 * `malformed` when the bytes are not a valid frame.
 */
export function decodeFrame(
  buf: Uint8Array,
  offset = 0,
  options: DecodeOptions = {},
): DecodeResult<Frame> {
  const decoder = new FrameDecoder(buf, offset, options);
  const value = decoder.frame(0);
  return { value, next: decoder.pos };
}

/**
 * Like decodeFrame, but returns null when the buffer does not yet hold a
 * whole frame. Malformed input still throws.
 */
export function tryDecodeFrame(
  buf: Uint8Array,
  offset = 0,
  options: DecodeOptions = {},
): DecodeResult<Frame> | null {
  try {
    return decodeFrame(buf, offset, options);
  } catch (e) {
    if (e instanceof FrameError && e.kind === "incomplete") return null;
    throw e;
  }
}

/** Decode every frame in a buffer that holds whole frames only. */
export function decodeFrames(buf: Uint8Array, options: DecodeOptions = {}): Frame[] {
  const frames: Frame[] = [];
  let offset = 0;
  while (offset < buf.length) {
    const result = decodeFrame(buf, offset, options);
    frames.push(result.value);
    offset = result.next;
  }
  return frames;
}

// ============================================================================
// Encoding
// ============================================================================

function header(tag: FrameTag, body: string | number | bigint): Uint8Array {
  return utf8Encode(`${String.fromCharCode(tag)}${body}\r\n`);
}

function checkLine(value: string, what: string): string {
  if (value.includes("\r") || value.includes("\n")) {
    throw FrameError.malformed(`${what} cannot contain CR or LF`);
  }
  return value;
}

function writeFrame(out: Uint8Array[], frame: Frame): void {
  switch (frame.tag) {
    case "SimpleString":
      out.push(header(FrameTag.SimpleString, checkLine(frame.value, "simple string")));
      return;
    case "Error":
      out.push(header(FrameTag.Error, checkLine(frame.message, "error message")));
      return;
    case "Integer":
      if (frame.value < I64_MIN || frame.value > I64_MAX) {
        throw FrameError.malformed(`integer out of range: ${frame.value}`);
      }
      out.push(header(FrameTag.Integer, frame.value));
      return;
    case "BulkString":
      if (frame.value === null) {
        out.push(header(FrameTag.BulkString, -1));
        return;
      }
      out.push(header(FrameTag.BulkString, frame.value.length), frame.value, CRLF);
      return;
    case "Text": {
      const bytes = utf8Encode(frame.value);
      out.push(header(FrameTag.Text, bytes.length), bytes, CRLF);
      return;
    }
    case "Array":
      out.push(header(FrameTag.Array, frame.items.length));
      for (const item of frame.items) writeFrame(out, item);
      return;
    case "Set":
      out.push(header(FrameTag.Set, frame.items.length));
      for (const item of frame.items) writeFrame(out, item);
      return;
    case "Map":
      out.push(header(FrameTag.Map, frame.entries.length));
      for (const [key, value] of frame.entries) {
        writeFrame(out, key);
        writeFrame(out, value);
      }
      return;
  }
}

/** Encode a frame into a single buffer. */
export function encodeFrame(frame: Frame): Uint8Array {
  const parts: Uint8Array[] = [];
  writeFrame(parts, frame);
  return concat(parts);
}

// ============================================================================
// Structural identity
// ============================================================================

/** A string that is equal for two frames exactly when their encodings are. */
export function frameKey(frame: Frame): string {
  return bytesToBinaryString(encodeFrame(frame));
}

export function frameEquals(a: Frame, b: Frame): boolean {
  return frameKey(a) === frameKey(b);
}

/** Drop repeated members, keeping the first of each. */
export function uniqueFrames(items: readonly Frame[]): Frame[] {
  const seen = new Set<string>();
  const out: Frame[] = [];
  for (const item of items) {
    const key = frameKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}

/** Collapse repeated keys; the last value written for a key wins. */
export function uniqueEntries(entries: ReadonlyArray<[Frame, Frame]>): Array<[Frame, Frame]> {
  const byKey = new Map<string, [Frame, Frame]>();
  for (const [key, value] of entries) {
    byKey.set(frameKey(key), [key, value]);
  }
  return [...byKey.values()];
}
