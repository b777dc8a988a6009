// Logging for cairn servers.
//
// Output is gated by the DEBUG environment variable, matched against
// namespaces the way npm's debug package does it.

import { utf8Decode } from "@cairn/wire";
import type {
  CommandMiddleware,
  CommandOutcome,
  CommandRequest,
  DispatchContext,
} from "./middleware.ts";
import type { Token } from "./commands.ts";

const START_TIME = Symbol("logging:start-time");

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "cairn:cmd".
   * Logging is enabled when DEBUG matches this namespace.
   * Supports patterns like "cairn:*" or "*".
   */
  namespace?: string;

  /**
   * Log command arguments. Defaults to true.
   */
  logArgs?: boolean;

  /**
   * Log reply frames. Defaults to false (replies can be large).
   */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log. Faster commands are skipped.
   * Defaults to 0 (log all commands).
   */
  minDuration?: number;

  /**
   * Patterns to match against. Defaults to process.env.DEBUG, read on every
   * call so it can be changed at runtime.
   */
  debug?: string;
}

/**
 * Check if a namespace is enabled by a DEBUG-style pattern list.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug = process.env.DEBUG): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/** Writes to stderr when its namespace is enabled. */
export type DebugLogger = (message: string, data?: Record<string, unknown>) => void;

/**
 * Create a namespaced debug logger.
 *
 * @example
 * ```typescript
 * const debug = createDebug("cairn:server");
 * debug("connection opened", { peer: "127.0.0.1:50123" });
 * // DEBUG=cairn:* prints: cairn:server connection opened { peer: '127.0.0.1:50123' }
 * ```
 */
export function createDebug(namespace: string): DebugLogger {
  return (message, data) => {
    if (!isEnabled(namespace)) return;
    if (data === undefined) {
      console.error(`${namespace} ${message}`);
    } else {
      console.error(`${namespace} ${message}`, data);
    }
  };
}

function renderToken(token: Token): string | null {
  return token === null ? null : utf8Decode(token);
}

/**
 * Create a middleware that logs every command with timing information.
 *
 * Logs structured objects:
 * - Request: { type: "request", command, args? }
 * - Response: { type: "response", command, duration, ok, result? | error? }
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher(store, { middleware: [loggingMiddleware()] });
 * // DEBUG=cairn:cmd prints "→ GET" and "← GET: ✓ 0.04ms" for each GET
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): CommandMiddleware {
  const namespace = options.namespace ?? "cairn:cmd";
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? false;
  const minDuration = options.minDuration ?? 0;
  const enabled = () => isEnabled(namespace, options.debug ?? process.env.DEBUG);

  return {
    pre(ctx: DispatchContext, request: CommandRequest): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!enabled()) return;

      const logObj: Record<string, unknown> = {
        type: "request",
        command: request.name,
      };

      if (logArgs && request.args.length > 0) {
        logObj.args = request.args.map(renderToken);
      }

      console.log(`→ ${request.name}`, logObj);
    },

    post(ctx: DispatchContext, request: CommandRequest, outcome: CommandOutcome): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      if (!enabled()) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        command: request.name,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        logObj.ok = true;
        if (logResults) {
          logObj.result = outcome.value;
        }
        console.log(`← ${request.name}: ✓ ${duration.toFixed(2)}ms`, logObj);
      } else {
        logObj.ok = false;
        logObj.errorCode = outcome.error.code;
        logObj.error = outcome.error.message;
        console.log(`← ${request.name}: ✗ ${duration.toFixed(2)}ms`, logObj);
      }
    },
  };
}
