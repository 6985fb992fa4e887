// Exchange observers for Bayeux clients.
//
// Observers see each exchange as it starts and finishes, and every retry
// decision. They enable logging, tracing and metrics; they cannot change
// what the engine does.

import createDebug from "debug";
import type { BayeuxRequest, BayeuxResponse } from "@longpoll/bayeux-wire";

import type { AdviceDecision } from "./advice.ts";
import type { RequestHeaders } from "./headers.ts";

const debug = createDebug("bayeux:observer");

/**
 * Extensions provide type-safe, symbol-keyed storage for observer state.
 *
 * Each observer can define a unique symbol and keep data between the start
 * and result hooks of one exchange without conflicts with other observers.
 *
 * @example
 * ```typescript
 * const START = Symbol("start");
 * ctx.extensions.set(START, Date.now());
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
}

/**
 * Context shared by the start and result hooks of one exchange.
 */
export interface ExchangeContext {
  extensions: Extensions;
  /** Top-level operation this exchange belongs to (e.g. "connect"). */
  operation: string;
  /** 1-based exchange number within the operation, handshakes included. */
  attempt: number;
  /** Retries spent by the operation when the exchange started. */
  retryCount: number;
}

/**
 * One request as it goes to the transport.
 */
export interface Exchange {
  readonly request: BayeuxRequest;
  readonly url: string;
  readonly headers: RequestHeaders;
  readonly body: Uint8Array;
}

/**
 * How an exchange ended. `ok` means a batch was decoded, whether or not
 * the server reported success inside it.
 */
export type ExchangeOutcome =
  | { ok: true; status: number; responses: BayeuxResponse[] }
  | { ok: false; error: Error };

/**
 * A retry decision taken after a failed response.
 */
export interface RetryDecisionEvent {
  operation: string;
  failure: BayeuxResponse;
  decision: AdviceDecision;
  /** The retry number that was considered. */
  retryCount: number;
  maxRetries: number;
}

/**
 * Exchange observer interface. Every hook is optional.
 */
export interface ExchangeObserver {
  /** Called before the request is handed to the transport. */
  exchangeStart?(ctx: ExchangeContext, exchange: Exchange): void;

  /** Called once the exchange produced a batch or failed. */
  exchangeResult?(ctx: ExchangeContext, exchange: Exchange, outcome: ExchangeOutcome): void;

  /** Called after the advice interpreter decided on a failed response. */
  retryDecision?(event: RetryDecisionEvent): void;
}

/**
 * Runs a list of observers, isolating the engine from their failures.
 */
export class ObserverSet {
  private readonly observers: readonly ExchangeObserver[];

  constructor(observers: readonly ExchangeObserver[]) {
    this.observers = observers;
  }

  start(ctx: ExchangeContext, exchange: Exchange): void {
    for (const observer of this.observers) {
      this.guard("exchangeStart", () => observer.exchangeStart?.(ctx, exchange));
    }
  }

  result(ctx: ExchangeContext, exchange: Exchange, outcome: ExchangeOutcome): void {
    // Reverse order, so the first observer wraps the others.
    for (let i = this.observers.length - 1; i >= 0; i--) {
      const observer = this.observers[i];
      this.guard("exchangeResult", () => observer.exchangeResult?.(ctx, exchange, outcome));
    }
  }

  decision(event: RetryDecisionEvent): void {
    for (const observer of this.observers) {
      this.guard("retryDecision", () => observer.retryDecision?.(event));
    }
  }

  private guard(hook: string, run: () => void): void {
    try {
      run();
    } catch (e) {
      debug("%s hook threw: %O", hook, e);
    }
  }
}
