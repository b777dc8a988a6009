// TCP client for cairn servers.

import net from "node:net";
import { CommandError, ConnectionError } from "@cairn/core";
import { type Frame, array, bulkString, encodeFrame } from "@cairn/wire";
import { FrameStream } from "./framing.ts";

/** A command argument; everything is sent as a bulk string. */
export type Argument = string | Uint8Array | number | bigint;

export interface ClientOptions {
  /** Defaults to 127.0.0.1. */
  host?: string;
  port: number;
  /** Largest bulk string accepted in a reply. */
  maxBulkLength?: number;
}

/** Raised for calls made after the connection is gone. */
export class ClientClosedError extends Error {
  constructor(message = "client is closed") {
    super(message);
    this.name = "ClientClosedError";
  }
}

function argumentFrame(arg: Argument): Frame {
  if (arg instanceof Uint8Array) return bulkString(arg);
  return bulkString(typeof arg === "string" ? arg : arg.toString());
}

function unexpected(command: string, reply: Frame): ConnectionError {
  return ConnectionError.protocol(`unexpected ${reply.tag} reply to ${command}`);
}

function bulkValue(command: string, reply: Frame): Uint8Array | null {
  if (reply.tag !== "BulkString") throw unexpected(command, reply);
  return reply.value;
}

function integerValue(command: string, reply: Frame): number {
  if (reply.tag !== "Integer") throw unexpected(command, reply);
  return Number(reply.value);
}

/**
 * A connection to a cairn server.
 *
 * Calls are queued and sent one at a time; each waits for its reply before
 * the next request goes out.
 *
 * @example
 * ```typescript
 * const client = await Client.connect({ port: 31337 });
 * await client.set("greeting", "hello");
 * const value = await client.get("greeting");
 * client.close();
 * ```
 */
export class Client {
  private tail: Promise<unknown> = Promise.resolve();
  private closed = false;

  private constructor(private readonly stream: FrameStream<net.Socket>) {}

  /** Open a connection. */
  static connect(options: ClientOptions): Promise<Client> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({
        host: options.host ?? "127.0.0.1",
        port: options.port,
      });
      const onError = (err: Error) => reject(ConnectionError.io(err.message));
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        resolve(new Client(new FrameStream(socket, { maxBulkLength: options.maxBulkLength })));
      });
    });
  }

  /**
   * Send a command and return the reply frame.
   *
   * Rejects with CommandError when the server answers with an Error frame.
   */
  execute(...args: Argument[]): Promise<Frame> {
    const request = encodeFrame(array(args.map(argumentFrame)));
    const result = this.tail.then(() => this.roundTrip(request));
    // Keep the queue moving past a failed call; the caller sees the failure.
    this.tail = result.catch(() => undefined);
    return result;
  }

  private async roundTrip(request: Uint8Array): Promise<Frame> {
    if (this.closed) throw new ClientClosedError();
    await this.stream.send(request);
    const reply = await this.stream.recv();
    if (reply === null) {
      this.closed = true;
      throw new ClientClosedError("server closed the connection");
    }
    if (reply.tag === "Error") {
      throw CommandError.remote(reply.message);
    }
    return reply;
  }

  async get(key: Argument): Promise<Uint8Array | null> {
    return bulkValue("GET", await this.execute("GET", key));
  }

  async set(key: Argument, value: Argument): Promise<number> {
    return integerValue("SET", await this.execute("SET", key, value));
  }

  /** True when the key existed. */
  async delete(key: Argument): Promise<boolean> {
    return integerValue("DELETE", await this.execute("DELETE", key)) === 1;
  }

  /** Remove every key; resolves with how many there were. */
  async flush(): Promise<number> {
    return integerValue("FLUSH", await this.execute("FLUSH"));
  }

  async mget(...keys: Argument[]): Promise<Array<Uint8Array | null>> {
    const reply = await this.execute("MGET", ...keys);
    if (reply.tag !== "Array") throw unexpected("MGET", reply);
    return reply.items.map((item) => bulkValue("MGET", item));
  }

  async mset(pairs: Iterable<readonly [Argument, Argument]>): Promise<number> {
    const args: Argument[] = [];
    for (const [key, value] of pairs) {
      args.push(key, value);
    }
    return integerValue("MSET", await this.execute("MSET", ...args));
  }

  /** Close the connection. Calls still queued fail with ClientClosedError. */
  close(): void {
    this.closed = true;
    this.stream.close();
  }
}
