// @cairn/tcp - TCP server and client for cairn (Node.js only)
//
// Provides TCP-specific I/O: socket framing, the client pool, server and client.

export { FrameStream } from "./framing.ts";
export { ClientPool } from "./pool.ts";
export { Server, type ServerOptions } from "./server.ts";
export { Client, ClientClosedError, type Argument, type ClientOptions } from "./client.ts";
export {
  type ServerConfig,
  ConfigError,
  defaultServerConfig,
  loadServerConfig,
} from "./config.ts";

// Re-export connection and error types from core
export {
  Connection,
  ConnectionError,
  CommandError,
  type ConnectionState,
  Dispatcher,
  MemoryStore,
  type Store,
} from "@cairn/core";
