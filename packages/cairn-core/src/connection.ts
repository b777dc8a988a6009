// Per-connection state machine and request loop.
//
//   awaiting ──frame──▶ dispatching ──▶ responding ──▶ awaiting
//      │                                    │
//      ├─ end of stream ─▶ disconnected     └─ write failure ─▶ aborted
//      └─ malformed frame / I/O error ─▶ aborted
//
// Command errors never leave the loop: they are answered with an Error frame.

import { type Frame, encodeFrame } from "@cairn/wire";
import type { Dispatcher } from "./dispatch.ts";
import { CommandError, ConnectionError } from "./errors.ts";
import type { FrameTransport } from "./transport.ts";

export type ConnectionState =
  | "awaiting"
  | "dispatching"
  | "responding"
  | "disconnected"
  | "aborted";

export interface ConnectionOptions {
  /** Called on every state change. */
  onStateChange?: (state: ConnectionState, previous: ConnectionState) => void;
}

/**
 * A client connection being served.
 *
 * Requests are handled strictly one after another: the next frame is not
 * dispatched until the reply to the current one has been written.
 */
export class Connection<T extends FrameTransport = FrameTransport> {
  private _state: ConnectionState = "awaiting";
  private _handled = 0;

  constructor(
    private readonly io: T,
    private readonly dispatcher: Dispatcher,
    private readonly options: ConnectionOptions = {},
  ) {}

  get state(): ConnectionState {
    return this._state;
  }

  /** Number of requests answered so far. */
  get handled(): number {
    return this._handled;
  }

  /**
   * Serve requests until the peer disconnects.
   *
   * Resolves on a clean disconnect. Rejects with a ConnectionError when the
   * connection is aborted. The transport is closed either way.
   */
  async run(): Promise<void> {
    if (this._state !== "awaiting") {
      throw ConnectionError.closed();
    }

    try {
      while (true) {
        let request: Frame | null;
        try {
          request = await this.io.recv();
        } catch (e) {
          throw this.abort(ConnectionError.from(e));
        }

        if (request === null) {
          this.transition("disconnected");
          return;
        }

        this.transition("dispatching");
        let reply: Uint8Array;
        try {
          const outcome = await this.dispatcher.dispatch(request);
          this.transition("responding");
          reply = encodeReply(outcome.ok ? outcome.value : outcome.error.toFrame());
        } catch (e) {
          throw this.abort(ConnectionError.dispatch(e instanceof Error ? e.message : String(e)));
        }

        try {
          await this.io.send(reply);
        } catch (e) {
          throw this.abort(ConnectionError.from(e));
        }

        this._handled++;
        this.transition("awaiting");
      }
    } finally {
      this.io.close();
    }
  }

  private abort(error: ConnectionError): ConnectionError {
    this.transition("aborted");
    return error;
  }

  private transition(next: ConnectionState): void {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    this.options.onStateChange?.(next, previous);
  }
}

/** Encode a reply; one that cannot be encoded is answered with an internal error. */
function encodeReply(frame: Frame): Uint8Array {
  try {
    return encodeFrame(frame);
  } catch (e) {
    return encodeFrame(CommandError.internal(e).toFrame());
  }
}
