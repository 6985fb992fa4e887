// Bayeux wire protocol types for TypeScript.
//
// Requests and responses are tagged variants. The `tag` field lives only on
// the TypeScript side: the wire format is untagged JSON and the classifier in
// codec.ts assigns response tags structurally.

// ============================================================================
// Protocol Constants
// ============================================================================

/** Bayeux protocol version sent in every handshake. */
export const BAYEUX_VERSION = "1.0";

/** The only connection type this client negotiates. */
export const LONG_POLLING = "long-polling";

/** Connection types offered in the handshake. */
export const SUPPORTED_CONNECTION_TYPES: readonly string[] = [LONG_POLLING];

/** Reserved meta channels used for session control. */
export const MetaChannel = {
  Handshake: "/meta/handshake",
  Connect: "/meta/connect",
  Disconnect: "/meta/disconnect",
  Subscribe: "/meta/subscribe",
  Unsubscribe: "/meta/unsubscribe",
} as const;

export type MetaChannel = (typeof MetaChannel)[keyof typeof MetaChannel];

/** Check whether a channel name is under the reserved `/meta/` namespace. */
export function isMetaChannel(channel: string): boolean {
  return channel.startsWith("/meta/");
}

/** Opaque extension object carried in the `ext` field. */
export type Ext = Record<string, unknown>;

// ============================================================================
// Advice
// ============================================================================

/** Reconnection policy a server can advise. */
export type Reconnect = "retry" | "handshake" | "none";

/**
 * Server guidance on how to react to a failed exchange.
 *
 * `timeout` and `interval` are informational: the engine reports them to
 * observers and never waits on them.
 */
export interface Advice {
  reconnect?: Reconnect;
  timeout?: number;
  interval?: number;
  multipleClients?: boolean;
  hosts?: string[];
}

// ============================================================================
// Requests
// ============================================================================

interface RequestBase {
  ext?: Ext;
  id?: string;
}

export interface HandshakeRequest extends RequestBase {
  tag: "Handshake";
  channel: typeof MetaChannel.Handshake;
  version: string;
  minimumVersion?: string;
  supportedConnectionTypes: string[];
}

export interface ConnectRequest extends RequestBase {
  tag: "Connect";
  channel: typeof MetaChannel.Connect;
  clientId: string;
  connectionType: string;
}

export interface DisconnectRequest extends RequestBase {
  tag: "Disconnect";
  channel: typeof MetaChannel.Disconnect;
  clientId: string;
}

export interface SubscribeRequest extends RequestBase {
  tag: "Subscribe";
  channel: typeof MetaChannel.Subscribe;
  clientId: string;
  subscription: string;
}

export interface UnsubscribeRequest extends RequestBase {
  tag: "Unsubscribe";
  channel: typeof MetaChannel.Unsubscribe;
  clientId: string;
  subscription: string;
}

export interface PublishRequest extends RequestBase {
  tag: "Publish";
  channel: string;
  clientId: string;
  data: unknown;
}

/** Any message the client sends. */
export type BayeuxRequest =
  | HandshakeRequest
  | ConnectRequest
  | DisconnectRequest
  | SubscribeRequest
  | UnsubscribeRequest
  | PublishRequest;

// ============================================================================
// Responses
// ============================================================================

interface ResponseBase {
  channel: string;
  advice?: Advice;
  ext?: Ext;
  id?: string;
}

export interface HandshakeResponse extends ResponseBase {
  tag: "Handshake";
  successful: boolean;
  error?: string;
  version: string;
  minimumVersion?: string;
  clientId: string;
  supportedConnectionTypes: string[];
  authSuccessful?: boolean;
}

export interface PublishResponse extends ResponseBase {
  tag: "Publish";
  clientId: string;
  successful: boolean;
  error?: string;
  data: unknown;
}

/** A server-pushed message on a subscribed channel. Has no success flag. */
export interface DeliveryResponse extends ResponseBase {
  tag: "Delivery";
  data: unknown;
  clientId?: string;
}

/** Acknowledgement for connect, disconnect, subscribe and unsubscribe. */
export interface BasicResponse extends ResponseBase {
  tag: "Basic";
  successful: boolean;
  error?: string;
  clientId?: string;
  subscription?: string;
}

/** A response that explicitly carries a failure reason. */
export interface ErroredResponse extends ResponseBase {
  tag: "Errored";
  successful: false;
  error: string;
  clientId?: string;
  subscription?: string;
}

/**
 * Any message the server sends.
 *
 * Classification order is significant, see `classifyResponse`.
 */
export type BayeuxResponse =
  | ErroredResponse
  | HandshakeResponse
  | PublishResponse
  | DeliveryResponse
  | BasicResponse;

/** Responses that carry a `successful` flag. */
export type AcknowledgementResponse = Exclude<BayeuxResponse, DeliveryResponse>;

/** True when a response reports success or is a delivery. */
export function isAccepted(response: BayeuxResponse): boolean {
  return response.tag === "Delivery" || response.successful;
}

// ============================================================================
// Request Factories
// ============================================================================

/** Optional fields shared by every request factory. */
export interface RequestExtras {
  ext?: Ext;
  id?: string;
}

/**
 * Create a Handshake request offering long-polling.
 */
export function handshakeRequest(
  options: RequestExtras & { minimumVersion?: string } = {},
): HandshakeRequest {
  return {
    tag: "Handshake",
    channel: MetaChannel.Handshake,
    version: BAYEUX_VERSION,
    minimumVersion: options.minimumVersion,
    supportedConnectionTypes: [...SUPPORTED_CONNECTION_TYPES],
    ext: options.ext,
    id: options.id,
  };
}

/**
 * Create a Connect request.
 */
export function connectRequest(
  clientId: string,
  connectionType: string = LONG_POLLING,
  extras: RequestExtras = {},
): ConnectRequest {
  return { tag: "Connect", channel: MetaChannel.Connect, clientId, connectionType, ...extras };
}

/**
 * Create a Disconnect request.
 */
export function disconnectRequest(clientId: string, extras: RequestExtras = {}): DisconnectRequest {
  return { tag: "Disconnect", channel: MetaChannel.Disconnect, clientId, ...extras };
}

/**
 * Create a Subscribe request.
 */
export function subscribeRequest(
  clientId: string,
  subscription: string,
  extras: RequestExtras = {},
): SubscribeRequest {
  return { tag: "Subscribe", channel: MetaChannel.Subscribe, clientId, subscription, ...extras };
}

/**
 * Create an Unsubscribe request.
 */
export function unsubscribeRequest(
  clientId: string,
  subscription: string,
  extras: RequestExtras = {},
): UnsubscribeRequest {
  return { tag: "Unsubscribe", channel: MetaChannel.Unsubscribe, clientId, subscription, ...extras };
}

/**
 * Create a Publish request. `data` is passed through unexamined.
 */
export function publishRequest(
  channel: string,
  clientId: string,
  data: unknown,
  extras: RequestExtras = {},
): PublishRequest {
  return { tag: "Publish", channel, clientId, data, ...extras };
}
