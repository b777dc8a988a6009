// Error types for command handling and connections.
//
// A CommandError stays inside one request/response cycle: it becomes an Error
// frame and the connection carries on. A ConnectionError ends the connection.

import { type ErrorFrame, FrameError, errorFrame } from "@cairn/wire";

export type CommandErrorCode =
  | "invalid-request"
  | "missing-command"
  | "unknown-command"
  | "wrong-arity"
  | "invalid-argument"
  | "rejected"
  | "internal"
  | "remote";

/** A recoverable failure of a single command. */
export class CommandError extends Error {
  constructor(
    public readonly code: CommandErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "CommandError";
  }

  static invalidRequest(): CommandError {
    return new CommandError("invalid-request", "Request must be list or simple string.");
  }

  static missingCommand(): CommandError {
    return new CommandError("missing-command", "Missing command");
  }

  static unknownCommand(name: string): CommandError {
    return new CommandError("unknown-command", `Unrecognized command: ${name}`);
  }

  static wrongArity(name: string): CommandError {
    return new CommandError("wrong-arity", `Wrong number of arguments for '${name}' command`);
  }

  static invalidArgument(message: string): CommandError {
    return new CommandError("invalid-argument", message);
  }

  static rejected(message: string): CommandError {
    return new CommandError("rejected", message);
  }

  /** Wrap an unexpected failure raised while running a command. */
  static internal(cause: unknown): CommandError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const error = new CommandError("internal", `Internal error: ${detail}`);
    error.cause = cause;
    return error;
  }

  /** An Error frame received from a server. */
  static remote(message: string): CommandError {
    return new CommandError("remote", message);
  }

  /** The Error frame sent to the client. Line breaks become spaces. */
  toFrame(): ErrorFrame {
    return errorFrame(this.message.replace(/[\r\n]+/g, " "));
  }
}

export type ConnectionErrorKind = "io" | "protocol" | "dispatch" | "closed";

/** Error during connection handling. */
export class ConnectionError extends Error {
  constructor(
    public kind: ConnectionErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "ConnectionError";
  }

  static io(message: string): ConnectionError {
    return new ConnectionError("io", message);
  }

  static protocol(message: string): ConnectionError {
    return new ConnectionError("protocol", message);
  }

  static dispatch(message: string): ConnectionError {
    return new ConnectionError("dispatch", message);
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed");
  }

  /** Classify a failure raised by a transport. */
  static from(e: unknown): ConnectionError {
    if (e instanceof ConnectionError) return e;
    if (e instanceof FrameError) return ConnectionError.protocol(e.message);
    return ConnectionError.io(e instanceof Error ? e.message : String(e));
  }
}
