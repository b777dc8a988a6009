/**
 * Frame transport abstraction.
 *
 * This module defines the FrameTransport interface that the connection loop
 * reads requests from and writes replies to.
 *
 * Implementations:
 * - FrameStream (cairn-tcp) for TCP sockets
 */

import type { Frame } from "@cairn/wire";

/**
 * Interface for transports that carry cairn frames.
 */
export interface FrameTransport {
  /**
   * Receive the next whole frame.
   *
   * Resolves to null when the peer closed the stream between frames.
   * Rejects with a FrameError when the bytes are malformed or the stream
   * closed partway through a frame, and with other errors on I/O failure.
   */
  recv(): Promise<Frame | null>;

  /**
   * Write one fully encoded reply.
   */
  send(payload: Uint8Array): Promise<void>;

  /**
   * Close the transport.
   */
  close(): void;
}
