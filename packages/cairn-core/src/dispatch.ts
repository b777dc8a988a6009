// Request dispatch.
//
// Turns one decoded request frame into tokens, finds the handler and runs it.
// Every failure short of a bug in the dispatcher itself comes back as a
// CommandOutcome; dispatch() does not throw.

import { type Frame, toFrame, utf8Decode, utf8Encode } from "@cairn/wire";
import { type CommandContext, CommandRegistry, type Token } from "./commands.ts";
import { CommandError } from "./errors.ts";
import {
  type CommandMiddleware,
  type CommandOutcome,
  type CommandRequest,
  type DispatchContext,
  Extensions,
} from "./middleware.ts";
import { Mutex } from "./mutex.ts";
import type { Store } from "./store.ts";

export interface DispatcherOptions {
  /** Handlers to serve. Defaults to the built-in commands. */
  registry?: CommandRegistry;
  /** Run in order for pre hooks and for post hooks. */
  middleware?: readonly CommandMiddleware[];
}

function argumentToken(item: Frame): Token {
  switch (item.tag) {
    case "BulkString":
      return item.value;
    case "SimpleString":
    case "Text":
      return utf8Encode(item.value);
    case "Integer":
      return utf8Encode(item.value.toString());
    default:
      throw CommandError.invalidArgument(`Invalid argument type: ${item.tag}`);
  }
}

function splitInline(line: string): Token[] {
  return line
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .map((part) => utf8Encode(part));
}

/**
 * Tokens of a request.
 *
 * An Array frame gives one token per element. A single string frame is an
 * inline command and is split on whitespace.
 */
export function requestTokens(request: Frame): Token[] {
  switch (request.tag) {
    case "Array":
      return request.items.map(argumentToken);
    case "SimpleString":
    case "Text":
      return splitInline(request.value);
    case "BulkString":
      if (request.value !== null) return splitInline(utf8Decode(request.value));
      break;
  }
  throw CommandError.invalidRequest();
}

function failure(e: unknown): CommandOutcome {
  const error = e instanceof CommandError ? e : CommandError.internal(e);
  return { ok: false, error };
}

/**
 * Routes requests to command handlers.
 *
 * One Dispatcher is shared by every connection of a server. Handlers run one
 * at a time under its lock, so each command sees and leaves the store in a
 * consistent state.
 */
export class Dispatcher {
  readonly registry: CommandRegistry;
  private readonly middleware: readonly CommandMiddleware[];
  private readonly lock = new Mutex();
  private readonly context: CommandContext;

  constructor(store: Store, options: DispatcherOptions = {}) {
    this.registry = options.registry ?? new CommandRegistry();
    this.middleware = options.middleware ?? [];
    this.context = { store };
  }

  async dispatch(request: Frame): Promise<CommandOutcome> {
    let tokens: Token[];
    try {
      tokens = requestTokens(request);
    } catch (e) {
      return failure(e);
    }
    if (tokens.length === 0) {
      return failure(CommandError.missingCommand());
    }
    const head = tokens[0];
    if (head === null) {
      return failure(CommandError.invalidArgument("Invalid command name"));
    }

    const command: CommandRequest = {
      name: utf8Decode(head).toUpperCase(),
      args: tokens.slice(1),
    };
    const ctx: DispatchContext = { extensions: new Extensions() };

    try {
      const outcome = await this.invoke(ctx, command);
      for (const mw of this.middleware) {
        await mw.post?.(ctx, command, outcome);
      }
      return outcome;
    } catch (e) {
      return failure(e);
    }
  }

  private async invoke(ctx: DispatchContext, command: CommandRequest): Promise<CommandOutcome> {
    for (const mw of this.middleware) {
      const rejection = await mw.pre?.(ctx, command);
      if (rejection) {
        return failure(CommandError.rejected(rejection.message));
      }
    }

    const handler = this.registry.lookup(command.name);
    if (!handler) {
      return failure(CommandError.unknownCommand(command.name));
    }

    try {
      const value = await this.lock.runExclusive(() => handler(this.context, command.args));
      return { ok: true, value: toFrame(value) };
    } catch (e) {
      return failure(e);
    }
  }
}
