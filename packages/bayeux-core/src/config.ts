// Client configuration.
//
// Defaults are resolved once, when the client is built, and validated with
// zod so a bad value fails early with the offending field named.

import { z } from "zod";
import {
  ConfigError,
  LONG_POLLING,
  jsonCodec,
  type BayeuxCodec,
  type Ext,
} from "@longpoll/bayeux-wire";

import type { EngineState } from "./engine.ts";
import type { ExchangeObserver } from "./observer.ts";
import type { HttpTransport } from "./transport.ts";

/** Configuration for a Bayeux client. */
export interface ClientConfig {
  /** Bayeux endpoint every request is POSTed to. */
  url: string;

  /** Transport used for every exchange. */
  transport: HttpTransport;

  /** Token sent in the Authorization header. Omitted when absent. */
  accessToken?: string;

  /** Authorization scheme placed before the token. Default: "OAuth" */
  authScheme?: string;

  /** Retries allowed per operation beyond the first attempt. Default: 3 */
  maxRetries?: number;

  /** Connection type sent in connect requests. Default: "long-polling" */
  connectionType?: string;

  /** Lowest protocol version the client accepts, sent in the handshake. */
  minimumVersion?: string;

  /** Extension object sent with every handshake (e.g. auth data). */
  handshakeExt?: Ext;

  /** Extra headers sent with every request. */
  headers?: Record<string, string>;

  /** Serialization codec. Default: jsonCodec */
  codec?: BayeuxCodec;

  /** Exchange observers, e.g. `loggingObserver()`. */
  observers?: ExchangeObserver[];

  /** Called when the engine changes state. */
  onStateChange?: (state: EngineState) => void;
}

/** Configuration with every default filled in. */
export interface ResolvedConfig {
  url: string;
  transport: HttpTransport;
  accessToken?: string;
  authScheme: string;
  maxRetries: number;
  connectionType: string;
  minimumVersion?: string;
  handshakeExt?: Ext;
  headers: Record<string, string>;
  codec: BayeuxCodec;
  observers: ExchangeObserver[];
  onStateChange?: (state: EngineState) => void;
}

/** Defaults applied by `resolveConfig`. */
export const DEFAULT_CONFIG = {
  authScheme: "OAuth",
  maxRetries: 3,
  connectionType: LONG_POLLING,
} as const;

const ConfigSchema = z.object({
  url: z.string().url(),
  accessToken: z.string().min(1).optional(),
  authScheme: z.string().min(1),
  maxRetries: z.number().int().min(0),
  connectionType: z.string().min(1),
  minimumVersion: z.string().min(1).optional(),
  headers: z.record(z.string()),
});

/**
 * Fill in defaults and validate.
 *
 * @throws ConfigError naming the first invalid field
 */
export function resolveConfig(config: ClientConfig): ResolvedConfig {
  const parsed = ConfigSchema.safeParse({
    url: config.url,
    accessToken: config.accessToken,
    authScheme: config.authScheme ?? DEFAULT_CONFIG.authScheme,
    maxRetries: config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
    connectionType: config.connectionType ?? DEFAULT_CONFIG.connectionType,
    minimumVersion: config.minimumVersion,
    headers: config.headers ?? {},
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join(".");
    throw new ConfigError(`Invalid client config: ${field}: ${issue.message}`, { field });
  }

  return {
    ...parsed.data,
    transport: config.transport,
    handshakeExt: config.handshakeExt,
    codec: config.codec ?? jsonCodec,
    observers: config.observers ?? [],
    onStateChange: config.onStateChange,
  };
}
