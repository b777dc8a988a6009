// Frame reader/writer for TCP streams.
//
// Bytes are buffered until the decoder sees a whole frame. Frames that arrive
// ahead of the reader are queued and handed out in order. The socket is paused
// while the stream is held or while too many frames wait to be read.

import type { Duplex } from "node:stream";
import type { FrameTransport } from "@cairn/core";
import { type DecodeOptions, type Frame, FrameError, decodeFrame } from "@cairn/wire";

interface Waiter {
  resolve: (frame: Frame | null) => void;
  reject: (err: Error) => void;
}

/** Decoded frames queued before the socket is paused. */
export const PENDING_HIGH_WATER = 16;

const INITIAL_CAPACITY = 16 * 1024;

/**
 * A frame-decoding byte stream.
 *
 * Implements the FrameTransport interface for use with Connection, and is
 * also what the Client reads replies through.
 */
export class FrameStream<S extends Duplex = Duplex> implements FrameTransport {
  // Undecoded bytes live in buf[start, end). The buffer doubles when full.
  private buf: Buffer = Buffer.allocUnsafe(INITIAL_CAPACITY);
  private start = 0;
  private end = 0;
  // Bytes that must be buffered before decoding can get further.
  private needed = 1;
  private pendingFrames: Frame[] = [];
  private waiter: Waiter | null = null;
  private ended = false;
  private held = false;
  private error: Error | null = null;

  constructor(
    private readonly socket: S,
    private readonly options: DecodeOptions = {},
  ) {
    socket.on("data", (chunk: Buffer) => {
      // Nothing after a malformed frame is read.
      if (this.error) return;
      this.append(chunk);
      this.processBuffer();
      this.wake();
      this.updateFlow();
    });

    socket.on("error", (err: Error) => {
      this.error ??= err;
      this.wake();
    });

    socket.on("end", () => this.finish());
    socket.on("close", () => this.finish());
  }

  private append(chunk: Buffer): void {
    const size = this.end - this.start;
    if (this.end + chunk.length > this.buf.length) {
      const required = size + chunk.length;
      if (required * 2 > this.buf.length) {
        let capacity = this.buf.length;
        while (capacity < required * 2) capacity *= 2;
        const grown = Buffer.allocUnsafe(capacity);
        this.buf.copy(grown, 0, this.start, this.end);
        this.buf = grown;
      } else {
        this.buf.copyWithin(0, this.start, this.end);
      }
      this.start = 0;
      this.end = size;
    }
    chunk.copy(this.buf, this.end);
    this.end += chunk.length;
  }

  private processBuffer(): void {
    while (this.end - this.start >= this.needed) {
      try {
        const result = decodeFrame(this.buf.subarray(0, this.end), this.start, this.options);
        this.pendingFrames.push(result.value);
        this.start = result.next;
        this.needed = 1;
      } catch (e) {
        if (e instanceof FrameError && e.kind === "incomplete") {
          this.needed = (e.needed ?? this.end + 1) - this.start;
          break;
        }
        this.error = e instanceof Error ? e : new Error(String(e));
        return;
      }
    }
    if (this.start === this.end) {
      this.start = this.end = 0;
      if (this.buf.length > INITIAL_CAPACITY) {
        this.buf = Buffer.allocUnsafe(INITIAL_CAPACITY);
      }
    }
  }

  /** Pause the socket while held or backed up, resume it otherwise. */
  private updateFlow(): void {
    if (this.error || this.ended) return;
    if (this.held || this.pendingFrames.length >= PENDING_HIGH_WATER) {
      this.socket.pause();
    } else if (this.socket.isPaused()) {
      this.socket.resume();
    }
  }

  private finish(): void {
    if (this.ended) return;
    this.ended = true;
    this.wake();
  }

  /** Settle the pending recv() if anything is ready for it. */
  private wake(): void {
    const waiter = this.waiter;
    if (!waiter) return;

    const frame = this.pendingFrames.shift();
    if (frame !== undefined) {
      this.waiter = null;
      waiter.resolve(frame);
    } else if (this.error) {
      this.waiter = null;
      waiter.reject(this.error);
    } else if (this.ended) {
      this.waiter = null;
      if (this.buffered > 0) {
        waiter.reject(FrameError.truncated(this.buffered));
      } else {
        waiter.resolve(null);
      }
    }
  }

  /**
   * Stop reading from the socket until release().
   *
   * Bytes the peer sends meanwhile stay in the socket and the kernel.
   */
  hold(): void {
    this.held = true;
    this.updateFlow();
  }

  /** Undo hold(). */
  release(): void {
    this.held = false;
    this.updateFlow();
  }

  /** Get the underlying socket. */
  getSocket(): S {
    return this.socket;
  }

  /** Whether the peer has finished sending. */
  get isEnded(): boolean {
    return this.ended;
  }

  /** Bytes received but not yet decoded into a frame. */
  get buffered(): number {
    return this.end - this.start;
  }

  /**
   * Receive the next frame.
   *
   * Frames already decoded are served before a pending error is reported.
   */
  recv(): Promise<Frame | null> {
    if (this.waiter) {
      return Promise.reject(new Error("recv() is already pending"));
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
      this.wake();
      this.updateFlow();
    });
  }

  /** Write one encoded frame. */
  send(payload: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.write(payload, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Close the connection. */
  close(): void {
    this.socket.destroy();
  }
}
