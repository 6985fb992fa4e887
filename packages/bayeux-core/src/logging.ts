// Logging observer for Bayeux clients.
//
// Logs every exchange with timing information, and every retry decision.
// Output goes through the `debug` package: enable it with
// DEBUG=bayeux:* (or a narrower namespace) in the environment.

import createDebug from "debug";
import { isAccepted, type BayeuxResponse } from "@longpoll/bayeux-wire";

import type { ExchangeObserver } from "./observer.ts";

const START_TIME = Symbol("logging:start-time");

const textDecoder = new TextDecoder();

/** Log sink signature, compatible with a `debug` instance. */
export type LogFn = (formatter: string, ...args: unknown[]) => void;

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "bayeux:exchange".
   */
  namespace?: string;

  /**
   * Log request bodies. Defaults to true.
   */
  logBodies?: boolean;

  /**
   * Log decoded responses. Defaults to false.
   */
  logResponses?: boolean;

  /**
   * Log request headers. Authorization and cookies are always redacted.
   * Defaults to false.
   */
  logHeaders?: boolean;

  /**
   * Minimum duration (ms) to log. Faster exchanges are skipped.
   * Defaults to 0 (log all exchanges).
   */
  minDuration?: number;

  /**
   * Sink to write to instead of the `debug` instance. Always enabled.
   */
  log?: LogFn;
}

/**
 * Create an observer that logs exchanges and retry decisions.
 *
 * Entries are structured objects:
 * - Request: { type: "request", operation, attempt, body?, headers? }
 * - Response: { type: "response", operation, status?, duration, error?, advice?, responses? }
 * - Decision: { type: "decision", operation, action, reason?, retry, maxRetries }
 *
 * @example
 * ```typescript
 * const client = new BayeuxClient({
 *   url: "https://push.example.test/cometd",
 *   transport,
 *   observers: [loggingObserver({ logHeaders: true })],
 * });
 * ```
 */
export function loggingObserver(options: LoggingOptions = {}): ExchangeObserver {
  const debug = createDebug(options.namespace ?? "bayeux:exchange");
  const log: LogFn = options.log ?? debug;
  const isEnabled = (): boolean => options.log !== undefined || debug.enabled;
  const logBodies = options.logBodies ?? true;
  const logResponses = options.logResponses ?? false;
  const logHeaders = options.logHeaders ?? false;
  const minDuration = options.minDuration ?? 0;

  return {
    exchangeStart(ctx, exchange): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!isEnabled()) return;

      const entry: Record<string, unknown> = {
        type: "request",
        operation: ctx.operation,
        attempt: ctx.attempt,
      };

      if (logBodies) {
        entry.body = textDecoder.decode(exchange.body);
      }

      if (logHeaders && exchange.headers.size > 0) {
        entry.headers = exchange.headers.redacted();
      }

      log("→ %s %O", exchange.request.channel, entry);
    },

    exchangeResult(ctx, exchange, outcome): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;

      if (!isEnabled()) return;

      const channel = exchange.request.channel;
      const elapsed = duration.toFixed(2);
      const entry: Record<string, unknown> = {
        type: "response",
        operation: ctx.operation,
        duration: `${elapsed}ms`,
      };

      if (!outcome.ok) {
        entry.error = { name: outcome.error.name, message: outcome.error.message };
        log("← %s: ✗ %sms %O", channel, elapsed, entry);
        return;
      }

      entry.status = outcome.status;
      if (logResponses) {
        entry.responses = outcome.responses;
      }

      const failure = outcome.responses.find((response) => !isAccepted(response));
      if (failure === undefined) {
        log("← %s: ✓ %sms %O", channel, elapsed, entry);
        return;
      }

      entry.error = errorOf(failure);
      if (failure.advice) {
        entry.advice = failure.advice;
      }
      log("← %s: ✗ %sms %O", channel, elapsed, entry);
    },

    retryDecision(event): void {
      if (!isEnabled()) return;

      const entry: Record<string, unknown> = {
        type: "decision",
        operation: event.operation,
        action: event.decision.action,
        retry: event.retryCount,
        maxRetries: event.maxRetries,
      };
      if (event.decision.action === "give-up") {
        entry.reason = event.decision.reason;
      }

      log("↻ %s: %s %O", event.operation, event.decision.action, entry);
    },
  };
}

function errorOf(response: BayeuxResponse): string {
  if (response.tag === "Delivery") return "delivery";
  return response.error ?? "unsuccessful";
}
