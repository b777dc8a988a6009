// Command registry and the built-in key-value commands.

import type { WireValue } from "@cairn/wire";
import type { Store, StoreValue } from "./store.ts";
import { CommandError } from "./errors.ts";

/** One request argument. An absent bulk string arrives as null. */
export type Token = Uint8Array | null;

/** What a handler can reach while it runs. */
export interface CommandContext {
  store: Store;
}

/**
 * A command implementation.
 *
 * Receives the arguments after the command name. Throws CommandError for
 * bad arguments; anything else it throws is reported as an internal error.
 */
export type CommandHandler = (
  ctx: CommandContext,
  args: readonly Token[],
) => Promise<WireValue> | WireValue;

function arity(name: string, args: readonly Token[], expected: number): void {
  if (args.length !== expected) {
    throw CommandError.wrongArity(name);
  }
}

function key(token: Token): Uint8Array {
  if (token === null) {
    throw CommandError.invalidArgument("Invalid key");
  }
  return token;
}

/** GET, SET, DELETE, FLUSH, MGET and MSET. */
export const builtinCommands: Readonly<Record<string, CommandHandler>> = {
  async GET({ store }, args) {
    arity("GET", args, 1);
    return store.get(key(args[0]));
  },

  async SET({ store }, args) {
    arity("SET", args, 2);
    return store.set(key(args[0]), args[1]);
  },

  async DELETE({ store }, args) {
    arity("DELETE", args, 1);
    return (await store.delete(key(args[0]))) ? 1 : 0;
  },

  async FLUSH({ store }, args) {
    arity("FLUSH", args, 0);
    return store.clear();
  },

  async MGET({ store }, args) {
    return store.multiGet(args.map(key));
  },

  async MSET({ store }, args) {
    if (args.length % 2 !== 0) {
      throw CommandError.wrongArity("MSET");
    }
    // Validate every key before the first write.
    const pairs: Array<[Uint8Array, StoreValue]> = [];
    for (let i = 0; i < args.length; i += 2) {
      pairs.push([key(args[i]), args[i + 1]]);
    }
    return store.multiSet(pairs);
  },
};

/**
 * Fixed mapping from command name to handler.
 *
 * Names are matched case-insensitively. The table is built once and never
 * changes afterwards.
 */
export class CommandRegistry {
  private readonly handlers: ReadonlyMap<string, CommandHandler>;

  constructor(handlers: Readonly<Record<string, CommandHandler>> = builtinCommands) {
    const table = new Map<string, CommandHandler>();
    for (const [name, handler] of Object.entries(handlers)) {
      table.set(name.toUpperCase(), handler);
    }
    this.handlers = table;
  }

  /** The built-in commands plus `extra` (which may override them). */
  static withBuiltins(extra: Readonly<Record<string, CommandHandler>> = {}): CommandRegistry {
    return new CommandRegistry({ ...builtinCommands, ...extra });
  }

  lookup(name: string): CommandHandler | undefined {
    return this.handlers.get(name.toUpperCase());
  }

  has(name: string): boolean {
    return this.handlers.has(name.toUpperCase());
  }

  /** Registered names, upper case. */
  names(): string[] {
    return [...this.handlers.keys()];
  }
}
