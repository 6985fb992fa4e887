// Bayeux wire protocol types and utilities
//
// This package contains the request/response variants, the structural
// classifier for untagged server responses, the JSON codec, and the error
// taxonomy shared by every layer of the client.

// ============================================================================
// Errors
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
  parseBayeuxError,
  type BayeuxErrorKind,
  type BayeuxErrorParts,
} from "./errors.ts";

// ============================================================================
// Wire Types
// ============================================================================

export type {
  Ext,
  Reconnect,
  Advice,
  HandshakeRequest,
  ConnectRequest,
  DisconnectRequest,
  SubscribeRequest,
  UnsubscribeRequest,
  PublishRequest,
  BayeuxRequest,
  HandshakeResponse,
  PublishResponse,
  DeliveryResponse,
  BasicResponse,
  ErroredResponse,
  BayeuxResponse,
  AcknowledgementResponse,
  RequestExtras,
} from "./types.ts";

export {
  // Constants
  BAYEUX_VERSION,
  LONG_POLLING,
  SUPPORTED_CONNECTION_TYPES,
  MetaChannel,
  isMetaChannel,
  isAccepted,
  // Factory functions
  handshakeRequest,
  connectRequest,
  disconnectRequest,
  subscribeRequest,
  unsubscribeRequest,
  publishRequest,
} from "./types.ts";

// ============================================================================
// Wire Schemas
// ============================================================================

export {
  AdviceSchema,
  ReconnectSchema,
  ErroredSchema,
  HandshakeSchema,
  PublishSchema,
  DeliverySchema,
  BasicSchema,
  RESPONSE_CLASSIFIERS,
  classifyResponse,
  type ResponseClassifier,
} from "./schemas.ts";

// ============================================================================
// Wire Codec
// ============================================================================

export {
  jsonCodec,
  toWireObject,
  encodeRequest,
  encodeRequestJson,
  encodeResponses,
  decodeBatch,
  type BayeuxCodec,
} from "./codec.ts";
