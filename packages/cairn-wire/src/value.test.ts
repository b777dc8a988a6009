import { describe, expect, it } from "vitest";

import { encodeValue, toFrame } from "./value.ts";
import { errorFrame, integer, simpleString, text } from "./types.ts";
import { FrameError } from "./frame_error.ts";

const bytes = (s: string) => new TextEncoder().encode(s);
const wire = (value: Parameters<typeof encodeValue>[0]) =>
  new TextDecoder().decode(encodeValue(value));

describe("toFrame", () => {
  it("sends bytes as bulk strings and strings as text", () => {
    expect(wire(bytes("hi"))).toBe("$2\r\nhi\r\n");
    expect(wire("hi")).toBe("^2\r\nhi\r\n");
  });

  it("sends booleans as 0 and 1", () => {
    expect(wire(true)).toBe(":1\r\n");
    expect(wire(false)).toBe(":0\r\n");
  });

  it("truncates fractional numbers toward zero", () => {
    expect(wire(3.9)).toBe(":3\r\n");
    expect(wire(-3.9)).toBe(":-3\r\n");
    expect(wire(12n)).toBe(":12\r\n");
  });

  it("sends null and undefined as the absent bulk string", () => {
    expect(wire(null)).toBe("$-1\r\n");
    expect(wire(undefined)).toBe("$-1\r\n");
  });

  it("maps arrays, maps and sets recursively", () => {
    expect(wire([1, "a", null])).toBe("*3\r\n:1\r\n^1\r\na\r\n$-1\r\n");
    expect(wire(new Map([["k", 1]]))).toBe("%1\r\n^1\r\nk\r\n:1\r\n");
    expect(wire(new Set([1, 2]))).toBe("&2\r\n:1\r\n:2\r\n");
  });

  it("merges map keys with equal encodings, keeping the last value", () => {
    const value = new Map<Uint8Array, number>([
      [bytes("k"), 1],
      [bytes("k"), 2],
    ]);
    expect(wire(value)).toBe("%1\r\n$1\r\nk\r\n:2\r\n");
  });

  it("passes frames through", () => {
    expect(toFrame(simpleString("OK"))).toEqual(simpleString("OK"));
    expect(wire(errorFrame("ERR x"))).toBe("-ERR x\r\n");
    expect(toFrame([integer(5)])).toEqual({ tag: "Array", items: [integer(5)] });
  });

  it("falls back to text for other values", () => {
    const when = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
    expect(wire(when)).toBe("^24\r\n2024-01-02T03:04:05.000Z\r\n");
    expect(toFrame({ toString: () => "custom" })).toEqual(text("custom"));
  });

  it("rejects numbers that have no integer form", () => {
    expect(() => toFrame(Number.NaN)).toThrow(FrameError);
    expect(() => toFrame(Number.POSITIVE_INFINITY)).toThrow(FrameError);
    expect(() => toFrame(2n ** 63n)).toThrow(FrameError);
  });
});
