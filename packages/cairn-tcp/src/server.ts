// TCP listener for cairn.
//
// One Dispatcher and one Store are shared by every connection. Each accepted
// socket gets its own Connection loop; at most `maxClients` loops run at once
// and later sockets wait their turn in arrival order.

import net from "node:net";
import {
  type CommandMiddleware,
  type CommandRegistry,
  Connection,
  ConnectionError,
  Dispatcher,
  MemoryStore,
  type Store,
  createDebug,
  loggingMiddleware,
} from "@cairn/core";
import { type ServerConfig, defaultServerConfig } from "./config.ts";
import { FrameStream } from "./framing.ts";
import { ClientPool } from "./pool.ts";

const debug = createDebug("cairn:server");

export interface ServerOptions {
  /** Backing store. Defaults to an empty MemoryStore. */
  store?: Store;
  /** Commands to serve. Defaults to the built-in commands. */
  registry?: CommandRegistry;
  /** Dispatch middleware. Defaults to command logging. */
  middleware?: readonly CommandMiddleware[];
}

type ClientStream = FrameStream<net.Socket>;

function peerOf(socket: net.Socket): string {
  return `${socket.remoteAddress}:${socket.remotePort}`;
}

/** Key-value server over TCP. */
export class Server {
  readonly config: ServerConfig;
  readonly store: Store;
  readonly dispatcher: Dispatcher;
  private readonly pool: ClientPool<ClientStream>;
  private readonly sockets = new Set<net.Socket>();
  private listener: net.Server | null = null;

  constructor(config: Partial<ServerConfig> = {}, options: ServerOptions = {}) {
    this.config = { ...defaultServerConfig(), ...config };
    this.store = options.store ?? new MemoryStore();
    this.dispatcher = new Dispatcher(this.store, {
      registry: options.registry,
      middleware: options.middleware ?? [loggingMiddleware()],
    });
    this.pool = new ClientPool(this.config.maxClients, (stream) => this.serve(stream));
  }

  /** Connections being served right now. */
  get activeConnections(): number {
    return this.pool.active;
  }

  /** Connections waiting for a free slot. */
  get queuedConnections(): number {
    return this.pool.queued;
  }

  /** Bound address, or null when not listening. */
  address(): net.AddressInfo | null {
    const address = this.listener?.address();
    return address && typeof address !== "string" ? address : null;
  }

  /** Start listening. Resolves with the bound address. */
  listen(): Promise<net.AddressInfo> {
    if (this.listener) {
      return Promise.reject(new Error("server is already listening"));
    }

    const listener = net.createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
    this.listener = listener;

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.listener = null;
        reject(err);
      };
      listener.once("error", onError);
      listener.listen(this.config.port, this.config.host, () => {
        listener.off("error", onError);
        listener.on("error", (err) => debug("listener error", { error: err.message }));
        const address = this.address();
        if (address === null) {
          reject(new Error("listener has no TCP address"));
          return;
        }
        debug("listening", { address: `${address.address}:${address.port}` });
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting connections and drop every client, served or waiting.
   *
   * Resolves once the listener is closed.
   */
  close(): Promise<void> {
    const listener = this.listener;
    if (!listener) return Promise.resolve();
    this.listener = null;

    const closed = new Promise<void>((resolve, reject) => {
      listener.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    this.pool.drain();
    for (const socket of this.sockets) {
      socket.destroy();
    }
    return closed;
  }

  private accept(socket: net.Socket): void {
    const peer = peerOf(socket);
    const stream: ClientStream = new FrameStream(socket, {
      maxBulkLength: this.config.maxBulkLength,
    });
    this.sockets.add(socket);

    // A client whose socket closes before its turn never gets one. One that
    // only half-closes keeps its place and its buffered requests are served.
    socket.once("close", () => {
      if (this.pool.withdraw(stream)) {
        debug("queued client left", { peer });
      }
      this.sockets.delete(socket);
    });

    stream.hold();
    if (this.pool.offer(stream) === "queued") {
      debug("client queued", { peer, queued: this.pool.queued });
    }
  }

  private serve(stream: ClientStream): void {
    const socket = stream.getSocket();
    const peer = peerOf(socket);
    const conn = new Connection(stream, this.dispatcher);
    stream.release();
    debug("connection opened", { peer, active: this.pool.active });

    void conn
      .run()
      .then(
        () => debug("connection closed", { peer, handled: conn.handled }),
        (e: unknown) => {
          const kind = e instanceof ConnectionError ? e.kind : "unknown";
          const message = e instanceof Error ? e.message : String(e);
          debug("connection aborted", { peer, kind, error: message, handled: conn.handled });
        },
      )
      .finally(() => this.pool.release());
  }
}
