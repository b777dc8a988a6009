// Errors raised while decoding or encoding frames.

/**
 * Why a frame could not be decoded.
 *
 * - `incomplete`: the buffer ends before the frame does; more bytes may fix it.
 * - `malformed`: the bytes violate the protocol; no amount of input fixes it.
 * - `truncated`: the stream closed while a frame was only partly received.
 */
export type FrameErrorKind = "incomplete" | "malformed" | "truncated";

/** Error during frame decoding or encoding. */
export class FrameError extends Error {
  constructor(
    public kind: FrameErrorKind,
    message: string,
    public offset?: number,
    /** For `incomplete`: buffer length at which decoding is worth retrying. */
    public needed?: number,
  ) {
    super(message);
    this.name = "FrameError";
  }

  static incomplete(offset: number, needed = offset + 1): FrameError {
    return new FrameError(
      "incomplete",
      `frame incomplete at offset ${offset}`,
      offset,
      needed,
    );
  }

  static malformed(message: string, offset?: number): FrameError {
    return new FrameError("malformed", message, offset);
  }

  static truncated(buffered: number): FrameError {
    return new FrameError(
      "truncated",
      `stream closed with ${buffered} bytes of an unfinished frame`,
    );
  }

  /** True for errors that must end the connection. */
  isFatal(): boolean {
    return this.kind !== "incomplete";
  }
}
