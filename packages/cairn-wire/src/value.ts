// Mapping between plain TypeScript values and frames.

import {
  type Frame,
  I64_MAX,
  I64_MIN,
  absent,
  array,
  bulkString,
  integer,
  isFrame,
  map,
  set,
  text,
} from "./types.ts";
import { FrameError } from "./frame_error.ts";
import { encodeFrame, uniqueEntries, uniqueFrames } from "./codec.ts";

/** Values that command handlers may return. */
export type WireValue =
  | Frame
  | Uint8Array
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | Date
  | readonly WireValue[]
  | ReadonlyMap<WireValue, WireValue>
  | ReadonlySet<WireValue>;

function toInteger(value: bigint): Frame {
  if (value < I64_MIN || value > I64_MAX) {
    throw FrameError.malformed(`integer out of range: ${value}`);
  }
  return integer(value);
}

/**
 * Convert a value to the frame that represents it on the wire.
 *
 * - bytes → BulkString, strings → Text
 * - booleans → Integer 0/1, numbers → Integer (fraction dropped)
 * - null / undefined → the absent BulkString
 * - arrays, Maps and Sets → Array, Map and Set, recursively
 * - frames pass through unchanged
 * - anything else → Text of its string form (Dates as ISO-8601)
 */
export function toFrame(value: unknown): Frame {
  if (value === null || value === undefined) return absent();
  if (value instanceof Uint8Array) return bulkString(value);
  if (typeof value === "string") return text(value);
  if (typeof value === "boolean") return integer(value ? 1n : 0n);
  if (typeof value === "bigint") return toInteger(value);
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw FrameError.malformed(`cannot encode ${value} as an integer`);
    }
    return toInteger(BigInt(Math.trunc(value)));
  }
  if (isFrame(value)) return value;
  if (Array.isArray(value)) return array(value.map(toFrame));
  if (value instanceof Map) {
    const entries: Array<[Frame, Frame]> = [];
    for (const [k, v] of value) entries.push([toFrame(k), toFrame(v)]);
    return map(uniqueEntries(entries));
  }
  if (value instanceof Set) {
    return set(uniqueFrames([...value].map(toFrame)));
  }
  if (value instanceof Date) return text(value.toISOString());
  return text(String(value));
}

/** Encode a value with {@link toFrame} and {@link encodeFrame}. */
export function encodeValue(value: WireValue): Uint8Array {
  return encodeFrame(toFrame(value));
}
