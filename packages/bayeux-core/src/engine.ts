// Reconnection engine.
//
// Drives one top-level operation at a time through send, classify and
// decide, following server advice until the operation succeeds or the
// advice interpreter gives up. Retries are a loop, not recursion: every
// failure spends one unit of the budget, so an operation makes at most
// 2 * (maxRetries + 1) exchanges.

import {
  BayeuxError,
  ConfigError,
  ParseError,
  ProtocolError,
  RetryExhaustedError,
  SessionError,
  TransportError,
  handshakeRequest,
  type AcknowledgementResponse,
  type BayeuxRequest,
  type BayeuxResponse,
  type HandshakeResponse,
} from "@longpoll/bayeux-wire";

import { decide, giveUpMessage } from "./advice.ts";
import type { ResolvedConfig } from "./config.ts";
import { RequestHeaders } from "./headers.ts";
import { Extensions, ObserverSet, type Exchange, type ExchangeContext } from "./observer.ts";
import type { Session } from "./session.ts";
import type { HttpResponse } from "./transport.ts";

/** Engine state. */
export type EngineState =
  | "idle"
  | "awaiting-handshake"
  | "handshaked"
  | "awaiting-operation"
  | "operation-succeeded"
  | "retrying"
  | "failed";

/**
 * A client-initiated operation the engine can send again.
 *
 * `build` is called for every attempt so a retry after a re-handshake uses
 * the new client id.
 */
export interface Operation {
  /** Name used in diagnostics and SessionError. */
  name: string;
  /** Build a fresh request for the bound client id. */
  build(clientId: string): BayeuxRequest;
  /** Whether failures consult server advice. False means one attempt. */
  followAdvice: boolean;
}

type Step = { kind: "handshake" } | { kind: "operation"; operation: Operation };

const HANDSHAKE: Step = { kind: "handshake" };

/** Result of scanning one batch. */
interface BatchReview {
  accepted: BayeuxResponse[];
  failure?: AcknowledgementResponse;
}

/**
 * Scan a whole batch. Deliveries and successful responses are accepted
 * wherever they sit; the first failed response decides what happens next.
 */
export function reviewBatch(responses: readonly BayeuxResponse[]): BatchReview {
  const accepted: BayeuxResponse[] = [];
  let failure: AcknowledgementResponse | undefined;
  for (const response of responses) {
    if (response.tag === "Delivery" || response.successful) {
      accepted.push(response);
    } else if (failure === undefined) {
      failure = response;
    }
  }
  return failure === undefined ? { accepted } : { accepted, failure };
}

/**
 * Sequences handshakes, operations and retries for one session.
 */
export class ReconnectionEngine {
  private readonly config: ResolvedConfig;
  private readonly session: Session;
  private readonly observers: ObserverSet;
  private state: EngineState = "idle";

  constructor(config: ResolvedConfig, session: Session) {
    this.config = config;
    this.session = session;
    this.observers = new ObserverSet(config.observers);
  }

  /** Get the current engine state. */
  getState(): EngineState {
    return this.state;
  }

  /**
   * Handshake, retrying as advised. Binds the session on success.
   */
  handshake(): Promise<BayeuxResponse[]> {
    return this.drive(HANDSHAKE, "handshake");
  }

  /**
   * Run an operation that needs a bound session.
   *
   * @throws SessionError before any exchange when no session is bound
   */
  perform(operation: Operation): Promise<BayeuxResponse[]> {
    if (!this.session.isBound()) {
      return Promise.reject(new SessionError(operation.name));
    }
    return this.drive({ kind: "operation", operation }, operation.name);
  }

  /** Return to `idle`, e.g. after the owner reset the session. */
  resetState(): void {
    this.setState("idle");
  }

  private async drive(target: Step, name: string): Promise<BayeuxResponse[]> {
    const session = this.session;
    const accepted: BayeuxResponse[] = [];
    let step = target;
    let attempt = 0;
    let targetAttempts = 0;

    session.beginOperation();
    try {
      for (;;) {
        attempt++;
        if (step === target) targetAttempts++;

        const { responses, cookies } = await this.exchange(step, name, attempt);
        const review = reviewBatch(responses);
        if (step === target) {
          accepted.push(...review.accepted);
        }

        const failure = review.failure;
        if (failure === undefined) {
          if (step.kind === "handshake") {
            this.commitHandshake(responses, cookies);
            if (target.kind === "handshake") return accepted;
            step = target;
            continue;
          }
          this.setState("operation-succeeded");
          return accepted;
        }

        if (step.kind === "operation" && !step.operation.followAdvice) {
          this.setState("failed");
          throw new ProtocolError(failure, failure.error || `${name} failed`);
        }

        const retryCount = session.retryCount + 1;
        const decision = decide(failure.advice, retryCount, session.maxRetries);
        this.observers.decision({
          operation: name,
          failure,
          decision,
          retryCount,
          maxRetries: session.maxRetries,
        });

        if (decision.action === "give-up") {
          this.setState("failed");
          const message = giveUpMessage(decision.reason, failure.error);
          throw decision.reason === "exhausted"
            ? new RetryExhaustedError(failure, message, targetAttempts)
            : new ProtocolError(failure, message);
        }

        session.recordRetry();
        this.setState("retrying");
        // A failed handshake is retried as a handshake whatever the advice.
        step = step.kind === "handshake" || decision.action === "follow-handshake" ? HANDSHAKE : target;
      }
    } finally {
      session.endOperation();
    }
  }

  private async exchange(
    step: Step,
    operation: string,
    attempt: number,
  ): Promise<{ responses: BayeuxResponse[]; cookies: string[] }> {
    const request = this.buildRequest(step, operation);
    const headers = this.buildHeaders(step);
    const body = this.encode(request);
    const exchange: Exchange = { request, url: this.config.url, headers, body };
    const ctx: ExchangeContext = {
      extensions: new Extensions(),
      operation,
      attempt,
      retryCount: this.session.retryCount,
    };

    this.setState(step.kind === "handshake" ? "awaiting-handshake" : "awaiting-operation");
    this.observers.start(ctx, exchange);

    try {
      const response = await this.send(exchange);
      const responses = this.decode(response.body);
      this.observers.result(ctx, exchange, { ok: true, status: response.status, responses });
      return { responses, cookies: response.cookies };
    } catch (e) {
      const error = e instanceof Error ? e : new TransportError(String(e));
      this.observers.result(ctx, exchange, { ok: false, error });
      this.setState("failed");
      throw error;
    }
  }

  private encode(request: BayeuxRequest): Uint8Array {
    try {
      return this.config.codec.encode(request);
    } catch (e) {
      this.setState("failed");
      if (e instanceof BayeuxError) throw e;
      const message = e instanceof Error ? e.message : String(e);
      throw new ConfigError(`Could not encode ${request.channel} request: ${message}`, {
        field: request.tag === "Publish" ? "data" : undefined,
        cause: e,
      });
    }
  }

  private async send(exchange: Exchange): Promise<HttpResponse> {
    try {
      return await this.config.transport.send({
        url: exchange.url,
        headers: exchange.headers.toRecord(),
        body: exchange.body,
      });
    } catch (e) {
      if (e instanceof BayeuxError) throw e;
      const message = e instanceof Error ? e.message : String(e);
      throw new TransportError(`Could not send request to server: ${message}`, { cause: e });
    }
  }

  private decode(body: string): BayeuxResponse[] {
    try {
      return this.config.codec.decodeBatch(body);
    } catch (e) {
      if (e instanceof BayeuxError) throw e;
      const message = e instanceof Error ? e.message : String(e);
      throw new ParseError(`Could not decode response: ${message}`, { cause: e });
    }
  }

  private buildRequest(step: Step, operation: string): BayeuxRequest {
    if (step.kind === "handshake") {
      return handshakeRequest({
        minimumVersion: this.config.minimumVersion,
        ext: this.config.handshakeExt,
      });
    }

    const clientId = this.session.clientId();
    if (clientId === undefined) {
      throw new SessionError(operation);
    }
    return step.operation.build(clientId);
  }

  /**
   * Headers for one exchange. Session cookies go on everything except a
   * handshake, which starts a new server-side session.
   */
  private buildHeaders(step: Step): RequestHeaders {
    const headers = new RequestHeaders();
    for (const [name, value] of Object.entries(this.config.headers)) {
      headers.set(name, value);
    }
    headers.set("content-type", "application/json");

    if (this.config.accessToken !== undefined) {
      headers.setSensitive("authorization", `${this.config.authScheme} ${this.config.accessToken}`);
    }

    const cookies = this.session.cookies();
    if (step.kind === "operation" && cookies.length > 0) {
      headers.setSensitive("cookie", cookies.join("; "));
    }
    return headers;
  }

  private commitHandshake(responses: readonly BayeuxResponse[], cookies: string[]): void {
    const handshake = responses.find(
      (response): response is HandshakeResponse => response.tag === "Handshake" && response.successful,
    );
    if (handshake === undefined) {
      this.setState("failed");
      throw new ParseError("Handshake exchange returned no successful handshake response");
    }

    this.session.bind(handshake.clientId, cookies);
    this.setState("handshaked");
  }

  private setState(state: EngineState): void {
    if (this.state !== state) {
      this.state = state;
      this.config.onStateChange?.(state);
    }
  }
}
