import { describe, expect, it } from "vitest";

import {
  type Frame,
  I64_MAX,
  I64_MIN,
  absent,
  array,
  bulkString,
  errorFrame,
  integer,
  map,
  set,
  simpleString,
  text,
} from "./types.ts";
import {
  type DecodeOptions,
  decodeFrame,
  decodeFrames,
  encodeFrame,
  frameEquals,
  tryDecodeFrame,
} from "./codec.ts";
import { FrameError } from "./frame_error.ts";

const bytes = (s: string) => new TextEncoder().encode(s);
const str = (b: Uint8Array) => new TextDecoder().decode(b);

function decodeError(input: string, options: DecodeOptions = {}): FrameError {
  try {
    decodeFrame(bytes(input), 0, options);
  } catch (e) {
    if (e instanceof FrameError) return e;
    throw e;
  }
  throw new Error(`expected ${JSON.stringify(input)} to fail`);
}

describe("decodeFrame", () => {
  it("decodes line frames", () => {
    expect(decodeFrame(bytes("+OK\r\n"))).toEqual({ value: simpleString("OK"), next: 5 });
    expect(decodeFrame(bytes("-ERR bad\r\n")).value).toEqual(errorFrame("ERR bad"));
    expect(decodeFrame(bytes(":-42\r\n")).value).toEqual(integer(-42n));
  });

  it("decodes bulk strings", () => {
    const result = decodeFrame(bytes("$5\r\nhello\r\n"));
    expect(result.next).toBe(11);
    expect(result.value).toEqual(bulkString("hello"));
  });

  it("keeps absent and empty bulk strings apart", () => {
    expect(decodeFrame(bytes("$-1\r\n")).value).toEqual({ tag: "BulkString", value: null });
    expect(decodeFrame(bytes("$0\r\n\r\n")).value).toEqual({
      tag: "BulkString",
      value: new Uint8Array(0),
    });
  });

  it("discards the two bytes after a bulk payload without checking them", () => {
    const frames = decodeFrames(bytes("$3\r\nabcXY+OK\r\n"));
    expect(frames).toEqual([bulkString("abc"), simpleString("OK")]);
  });

  it("keeps bulk payload bytes as given", () => {
    const frame = decodeFrame(bytes("$4\r\na\r\nb\r\n")).value;
    expect(frame).toEqual(bulkString("a\r\nb"));
  });

  it("decodes arrays in order", () => {
    const frame = decodeFrame(bytes("*2\r\n$3\r\nGET\r\n$1\r\nx\r\n")).value;
    expect(frame).toEqual(array([bulkString("GET"), bulkString("x")]));
  });

  it("lets the last pair win for repeated map keys", () => {
    const frame = decodeFrame(bytes("%2\r\n+a\r\n:1\r\n+a\r\n:2\r\n")).value;
    expect(frame).toEqual(map([[simpleString("a"), integer(2)]]));
  });

  it("counts map pairs, not frames", () => {
    const input = bytes("%1\r\n+k\r\n:1\r\n:9\r\n");
    const result = decodeFrame(input);
    expect(result.value).toEqual(map([[simpleString("k"), integer(1)]]));
    expect(result.next).toBe(input.length - 4);
  });

  it("drops repeated set members", () => {
    const frame = decodeFrame(bytes("&3\r\n:1\r\n:2\r\n:1\r\n")).value;
    expect(frame).toEqual(set([integer(1), integer(2)]));
  });

  it("decodes text frames", () => {
    expect(decodeFrame(bytes("^6\r\nhéllo\r\n")).value).toEqual(text("héllo"));
  });

  it("decodes at an offset", () => {
    const buf = bytes(":1\r\n:2\r\n");
    expect(decodeFrame(buf, 4)).toEqual({ value: integer(2), next: 8 });
  });
});

describe("incomplete input", () => {
  it("reports an empty buffer as incomplete", () => {
    expect(decodeError("").kind).toBe("incomplete");
  });

  it("reports a partial bulk payload as incomplete", () => {
    expect(decodeError("$5\r\nhel").kind).toBe("incomplete");
    expect(tryDecodeFrame(bytes("$5\r\nhel"))).toBeNull();
  });

  it("reports a missing bulk terminator as incomplete", () => {
    expect(tryDecodeFrame(bytes("$5\r\nhello"))).toBeNull();
  });

  it("reports a partial array as incomplete", () => {
    expect(tryDecodeFrame(bytes("*2\r\n:1\r\n"))).toBeNull();
    expect(tryDecodeFrame(bytes("*2\r\n:1\r\n:2"))).toBeNull();
  });

  it("says how many bytes a bulk payload still needs", () => {
    const error = decodeError("$5\r\nhel");
    expect(error.offset).toBe(4);
    expect(error.needed).toBe(11);
  });

  it("asks for one more byte when a line is unfinished", () => {
    expect(decodeError("+ab").needed).toBe(4);
    expect(decodeError("*2\r\n$3\r\nGET\r\n$10").needed).toBe(17);
    expect(decodeError("").needed).toBe(1);
  });
});

describe("malformed input", () => {
  it("rejects unknown tags", () => {
    const error = decodeError("!oops\r\n");
    expect(error.kind).toBe("malformed");
    expect(error.message).toBe("unknown frame tag 0x21");
    expect(error.isFatal()).toBe(true);
  });

  it("rejects unknown tags even when tryDecodeFrame is used", () => {
    expect(() => tryDecodeFrame(bytes("?\r\n"))).toThrow(FrameError);
  });

  it("rejects non-integer lines", () => {
    expect(decodeError(":abc\r\n").kind).toBe("malformed");
    expect(decodeError("$x\r\n").kind).toBe("malformed");
  });

  it("rejects lengths below -1 and negative counts", () => {
    expect(decodeError("$-2\r\n").kind).toBe("malformed");
    expect(decodeError("*-1\r\n").kind).toBe("malformed");
    expect(decodeError("%-3\r\n").kind).toBe("malformed");
  });

  it("rejects integers outside 64 bits", () => {
    expect(decodeError(":9223372036854775808\r\n").kind).toBe("malformed");
    expect(decodeFrame(bytes(":-9223372036854775808\r\n")).value).toEqual(integer(I64_MIN));
  });

  it("rejects absent text frames", () => {
    expect(decodeError("^-1\r\n").kind).toBe("malformed");
  });

  it("rejects bulk lengths above the limit before the payload arrives", () => {
    const error = decodeError("$10\r\n", { maxBulkLength: 4 });
    expect(error.kind).toBe("malformed");
    expect(error.message).toBe("bulk string length 10 exceeds limit of 4");
  });

  it("rejects lines longer than the limit", () => {
    const error = decodeError("+abcdefghij", { maxLineLength: 8 });
    expect(error.kind).toBe("malformed");
    expect(error.message).toBe("line exceeds limit of 8 bytes");
    expect(error.offset).toBe(1);

    expect(decodeError("$123456789\r\n", { maxLineLength: 4 }).kind).toBe("malformed");
  });

  it("accepts a line of exactly the limit and waits on a shorter one", () => {
    expect(decodeFrame(bytes("+abcdefgh\r\n"), 0, { maxLineLength: 8 }).value).toEqual(
      simpleString("abcdefgh"),
    );
    expect(decodeError("+abcdefghi", { maxLineLength: 8 }).kind).toBe("incomplete");
  });

  it("rejects nesting beyond the limit", () => {
    expect(decodeError("*1\r\n*1\r\n:1\r\n", { maxDepth: 1 }).kind).toBe("malformed");
    expect(decodeFrame(bytes("*1\r\n:1\r\n"), 0, { maxDepth: 1 }).value).toEqual(
      array([integer(1)]),
    );
  });
});

describe("encodeFrame", () => {
  it("encodes scalars", () => {
    expect(str(encodeFrame(simpleString("OK")))).toBe("+OK\r\n");
    expect(str(encodeFrame(errorFrame("ERR nope")))).toBe("-ERR nope\r\n");
    expect(str(encodeFrame(integer(0)))).toBe(":0\r\n");
    expect(str(encodeFrame(integer(-7)))).toBe(":-7\r\n");
    expect(str(encodeFrame(bulkString("1")))).toBe("$1\r\n1\r\n");
    expect(str(encodeFrame(absent()))).toBe("$-1\r\n");
    expect(str(encodeFrame(bulkString(new Uint8Array(0))))).toBe("$0\r\n\r\n");
  });

  it("encodes text with a byte length", () => {
    expect(str(encodeFrame(text("héllo")))).toBe("^6\r\nhéllo\r\n");
  });

  it("encodes composites with their counts", () => {
    const request = array([bulkString("SET"), bulkString("x"), bulkString("1")]);
    expect(str(encodeFrame(request))).toBe("*3\r\n$3\r\nSET\r\n$1\r\nx\r\n$1\r\n1\r\n");
    expect(str(encodeFrame(map([[simpleString("k"), integer(1)]])))).toBe("%1\r\n+k\r\n:1\r\n");
    expect(str(encodeFrame(set([integer(1), integer(2)])))).toBe("&2\r\n:1\r\n:2\r\n");
  });

  it("refuses line frames that contain a line break", () => {
    expect(() => encodeFrame(simpleString("a\r\nb"))).toThrow(FrameError);
    expect(() => encodeFrame(errorFrame("a\nb"))).toThrow(FrameError);
  });

  it("refuses integers outside 64 bits", () => {
    expect(() => encodeFrame({ tag: "Integer", value: I64_MAX + 1n })).toThrow(FrameError);
  });
});

describe("round trip", () => {
  const frames: Array<[string, Frame]> = [
    ["simple string", simpleString("PONG")],
    ["error", errorFrame("ERR unknown")],
    ["smallest integer", integer(I64_MIN)],
    ["largest integer", integer(I64_MAX)],
    ["binary bulk string", bulkString(new Uint8Array([0, 13, 10, 255]))],
    ["absent bulk string", absent()],
    ["text", text("naïve ☃")],
    ["nested array", array([integer(1), array([absent(), bulkString("")])])],
    [
      "map",
      map([
        [text("a"), integer(1)],
        [bulkString("b"), set([integer(2)])],
      ]),
    ],
    ["set", set([simpleString("x"), integer(3)])],
  ];

  for (const [name, frame] of frames) {
    it(`reproduces a ${name}`, () => {
      const encoded = encodeFrame(frame);
      const decoded = decodeFrame(encoded);
      expect(decoded.next).toBe(encoded.length);
      expect(decoded.value).toEqual(frame);
      expect(frameEquals(decoded.value, frame)).toBe(true);
    });
  }
});
