// Dispatch middleware types.
//
// Middleware wraps every command the dispatcher runs, enabling patterns like
// logging, access rules and metrics without touching the handlers.

import type { Frame } from "@cairn/wire";
import type { Token } from "./commands.ts";
import type { CommandError } from "./errors.ts";

/**
 * Extensions provide type-safe, symbol-keyed storage for middleware state.
 *
 * Each middleware can define a unique symbol and store/retrieve typed data
 * without conflicts with other middleware.
 *
 * @example
 * ```typescript
 * const START = Symbol("start");
 * ctx.extensions.set(START, performance.now());
 * const start = ctx.extensions.get<number>(START);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }

  has(key: symbol): boolean {
    return this.data.has(key);
  }

  delete(key: symbol): boolean {
    return this.data.delete(key);
  }
}

/**
 * Context passed to middleware hooks.
 *
 * Shared between the pre and post hooks of a single command.
 */
export interface DispatchContext {
  extensions: Extensions;
}

/** A command about to run. */
export interface CommandRequest {
  /** Command name, upper case. */
  readonly name: string;
  /** Arguments after the name. */
  readonly args: readonly Token[];
}

/** Result of running a command. */
export type CommandOutcome = { ok: true; value: Frame } | { ok: false; error: CommandError };

/** Returned by a pre hook to stop a command from running. */
export interface Rejection {
  message: string;
}

/**
 * Dispatch middleware.
 *
 * @example
 * ```typescript
 * const readOnly: CommandMiddleware = {
 *   pre(ctx, request) {
 *     if (request.name !== "GET" && request.name !== "MGET") {
 *       return { message: "read-only server" };
 *     }
 *   },
 * };
 * ```
 */
export interface CommandMiddleware {
  /**
   * Called before the handler runs.
   *
   * @returns void to continue, a Rejection to answer with an error instead
   */
  pre?(ctx: DispatchContext, request: CommandRequest): Promise<Rejection | void> | Rejection | void;

  /** Called with the outcome. Cannot change it. */
  post?(ctx: DispatchContext, request: CommandRequest, outcome: CommandOutcome): Promise<void> | void;
}
