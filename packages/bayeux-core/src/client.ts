// Bayeux client: the public operations.
//
// Each operation builds its request lazily and hands it to the reconnection
// engine. Everything except the handshake needs a bound session.

import {
  InvalidChannelError,
  connectRequest,
  disconnectRequest,
  isMetaChannel,
  publishRequest,
  subscribeRequest,
  unsubscribeRequest,
  type BayeuxResponse,
  type Ext,
} from "@longpoll/bayeux-wire";

import { resolveConfig, type ClientConfig, type ResolvedConfig } from "./config.ts";
import { ReconnectionEngine, type EngineState } from "./engine.ts";
import { Session } from "./session.ts";

/** Per-call options for operations that take an extension object. */
export interface OperationOptions {
  ext?: Ext;
  id?: string;
}

/**
 * Long-polling Bayeux client for one session.
 *
 * Calls are sequential: await one operation before starting the next.
 *
 * @example
 * ```typescript
 * const client = new BayeuxClient({
 *   url: "https://push.example.test/cometd",
 *   accessToken: "test-secret",
 *   transport: new FetchTransport(),
 * });
 *
 * await client.init();
 * await client.subscribe("/chat/demo");
 * await client.publish("/chat/demo", { text: "hello" });
 * const messages = await client.connect();
 * ```
 */
export class BayeuxClient {
  private readonly config: ResolvedConfig;
  private readonly session: Session;
  private readonly engine: ReconnectionEngine;

  constructor(config: ClientConfig) {
    this.config = resolveConfig(config);
    this.session = new Session(this.config.maxRetries);
    this.engine = new ReconnectionEngine(this.config, this.session);
  }

  /** Get the current engine state. */
  getState(): EngineState {
    return this.engine.getState();
  }

  /** The client id bound by the last successful handshake. */
  clientId(): string | undefined {
    return this.session.clientId();
  }

  /** Cookies persisted from the last successful handshake. */
  cookies(): readonly string[] {
    return this.session.cookies();
  }

  /** Check whether a handshake has bound a session. */
  isHandshaked(): boolean {
    return this.session.isBound();
  }

  /**
   * Negotiate a session. Retries and re-handshakes as the server advises.
   *
   * @returns the accepted responses of the handshake exchanges
   */
  handshake(): Promise<BayeuxResponse[]> {
    return this.engine.handshake();
  }

  /**
   * Send a long-poll connect.
   *
   * @returns acknowledgements and any deliveries the server pushed
   */
  connect(options: OperationOptions = {}): Promise<BayeuxResponse[]> {
    return this.engine.perform({
      name: "connect",
      followAdvice: true,
      build: (clientId) => connectRequest(clientId, this.config.connectionType, options),
    });
  }

  /**
   * End the session on the server. Sent once; failures are not retried.
   */
  disconnect(options: OperationOptions = {}): Promise<BayeuxResponse[]> {
    return this.engine.perform({
      name: "disconnect",
      followAdvice: false,
      build: (clientId) => disconnectRequest(clientId, options),
    });
  }

  /**
   * Subscribe to a channel or channel pattern (e.g. `/chat/*`).
   */
  subscribe(subscription: string, options: OperationOptions = {}): Promise<BayeuxResponse[]> {
    try {
      assertChannel(subscription);
    } catch (e) {
      return Promise.reject(e);
    }
    return this.engine.perform({
      name: "subscribe",
      followAdvice: true,
      build: (clientId) => subscribeRequest(clientId, subscription, options),
    });
  }

  /**
   * Unsubscribe from a channel or channel pattern.
   */
  unsubscribe(subscription: string, options: OperationOptions = {}): Promise<BayeuxResponse[]> {
    try {
      assertChannel(subscription);
    } catch (e) {
      return Promise.reject(e);
    }
    return this.engine.perform({
      name: "unsubscribe",
      followAdvice: true,
      build: (clientId) => unsubscribeRequest(clientId, subscription, options),
    });
  }

  /**
   * Publish `data` to a channel. The payload is passed through unexamined.
   */
  publish(channel: string, data: unknown, options: OperationOptions = {}): Promise<BayeuxResponse[]> {
    try {
      assertChannel(channel);
      if (isMetaChannel(channel)) {
        throw new InvalidChannelError(channel, "meta channels cannot be published to");
      }
    } catch (e) {
      return Promise.reject(e);
    }
    return this.engine.perform({
      name: "publish",
      followAdvice: true,
      build: (clientId) => publishRequest(channel, clientId, data, options),
    });
  }

  /**
   * Handshake, then connect.
   *
   * @returns the accepted responses of both operations, in order
   */
  async init(): Promise<BayeuxResponse[]> {
    const handshake = await this.handshake();
    const connect = await this.connect();
    return [...handshake, ...connect];
  }

  /**
   * Forget the session so the next operation needs a fresh handshake.
   */
  reset(): void {
    this.session.reset();
    this.engine.resetState();
  }
}

function assertChannel(channel: string): void {
  if (!channel.startsWith("/")) {
    throw new InvalidChannelError(channel, "channel names start with '/'");
  }
}
