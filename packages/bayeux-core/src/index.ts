// Bayeux client core
//
// The reconnection engine, session state, advice interpreter and the
// client facade. Transports live in their own packages.

// ============================================================================
// Client
// ============================================================================

export { BayeuxClient, type OperationOptions } from "./client.ts";

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_CONFIG,
  resolveConfig,
  type ClientConfig,
  type ResolvedConfig,
} from "./config.ts";

// ============================================================================
// Engine
// ============================================================================

export {
  ReconnectionEngine,
  reviewBatch,
  type EngineState,
  type Operation,
} from "./engine.ts";

export { Session } from "./session.ts";

export {
  GIVE_UP_MESSAGES,
  decide,
  giveUpMessage,
  type AdviceAction,
  type AdviceDecision,
  type GiveUpReason,
} from "./advice.ts";

// ============================================================================
// Transport
// ============================================================================

export type { HttpRequest, HttpResponse, HttpTransport } from "./transport.ts";

export { RequestHeaders, REDACTED } from "./headers.ts";

// ============================================================================
// Observers
// ============================================================================

export {
  Extensions,
  ObserverSet,
  type Exchange,
  type ExchangeContext,
  type ExchangeObserver,
  type ExchangeOutcome,
  type RetryDecisionEvent,
} from "./observer.ts";

export { loggingObserver, type LogFn, type LoggingOptions } from "./logging.ts";

// ============================================================================
// Re-exports from bayeux-wire
// ============================================================================

export {
  BayeuxError,
  TransportError,
  ParseError,
  SessionError,
  ConfigError,
  InvalidChannelError,
  ProtocolError,
  RetryExhaustedError,
  MetaChannel,
  jsonCodec,
  type Advice,
  type BayeuxCodec,
  type BayeuxRequest,
  type BayeuxResponse,
  type Ext,
} from "@longpoll/bayeux-wire";
