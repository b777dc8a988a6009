// @cairn/core - command handling for cairn servers
//
// - Store interface and in-memory store
// - Command registry with the built-in key-value commands
// - Dispatcher with middleware and a global command lock
// - Per-connection request loop

export { type Store, type StoreValue, MemoryStore } from "./store.ts";
export { Mutex } from "./mutex.ts";
export {
  type Token,
  type CommandContext,
  type CommandHandler,
  CommandRegistry,
  builtinCommands,
} from "./commands.ts";
export {
  CommandError,
  type CommandErrorCode,
  ConnectionError,
  type ConnectionErrorKind,
} from "./errors.ts";
export {
  Extensions,
  type DispatchContext,
  type CommandRequest,
  type CommandOutcome,
  type Rejection,
  type CommandMiddleware,
} from "./middleware.ts";
export { Dispatcher, type DispatcherOptions, requestTokens } from "./dispatch.ts";
export {
  isEnabled,
  createDebug,
  loggingMiddleware,
  type DebugLogger,
  type LoggingOptions,
} from "./logging.ts";
export { type FrameTransport } from "./transport.ts";
export { Connection, type ConnectionState, type ConnectionOptions } from "./connection.ts";
