// Error taxonomy for Bayeux clients.
//
// Transport, parse, session and config errors are terminal. Protocol errors
// are retried as far as the server's advice and the retry budget allow.

import type { Advice, BayeuxResponse } from "./types.ts";

/** Error category, stable across subclasses. */
export type BayeuxErrorKind = "transport" | "parse" | "session" | "protocol" | "config";

/** Base class for every error this client raises. */
export class BayeuxError extends Error {
  readonly kind: BayeuxErrorKind;

  constructor(kind: BayeuxErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BayeuxError";
    this.kind = kind;
  }
}

/** The request could not be sent, or no body came back. */
export class TransportError extends BayeuxError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("transport", message, options);
    this.name = "TransportError";
    this.status = options?.status;
  }
}

/** A response batch did not classify. The whole batch is rejected. */
export class ParseError extends BayeuxError {
  /** Position of the offending element, when the body was a JSON array. */
  readonly index?: number;

  constructor(message: string, options?: { cause?: unknown; index?: number }) {
    super("parse", message, options);
    this.name = "ParseError";
    this.index = options?.index;
  }
}

/** An operation needing a session ran before a successful handshake. */
export class SessionError extends BayeuxError {
  readonly operation: string;

  constructor(operation: string) {
    super("session", `No client id bound for ${operation}; handshake first`);
    this.name = "SessionError";
    this.operation = operation;
  }
}

/** Invalid client configuration or call arguments. */
export class ConfigError extends BayeuxError {
  readonly field?: string;

  constructor(message: string, options?: { cause?: unknown; field?: string }) {
    super("config", message, options);
    this.name = "ConfigError";
    this.field = options?.field;
  }
}

/** A channel name the operation cannot use. */
export class InvalidChannelError extends ConfigError {
  readonly channel: string;

  constructor(channel: string, reason: string) {
    super(`Invalid channel "${channel}": ${reason}`, { field: "channel" });
    this.name = "InvalidChannelError";
    this.channel = channel;
  }
}

/**
 * The server reported `successful: false`.
 *
 * `message` is the server's error string verbatim; `code`, `args` and
 * `description` are filled in when it follows the `code::args::message` form.
 */
export class ProtocolError extends BayeuxError {
  readonly channel: string;
  readonly response: BayeuxResponse;
  readonly advice?: Advice;
  readonly code?: number;
  readonly args: string[];
  readonly description: string;

  constructor(response: BayeuxResponse, message: string) {
    super("protocol", message);
    this.name = "ProtocolError";
    this.channel = response.channel;
    this.response = response;
    this.advice = response.advice;
    const parsed = parseBayeuxError(message);
    this.code = parsed.code;
    this.args = parsed.args;
    this.description = parsed.message;
  }
}

/** A protocol error that was retried until the budget ran out. */
export class RetryExhaustedError extends ProtocolError {
  /** Number of exchanges attempted for the operation that failed. */
  readonly attempts: number;

  constructor(response: BayeuxResponse, message: string, attempts: number) {
    super(response, message);
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

/** Structured form of a Bayeux error string. */
export interface BayeuxErrorParts {
  code?: number;
  args: string[];
  message: string;
}

/**
 * Split a Bayeux error string of the form `code::args::message`.
 *
 * Both `"402::client_id::Unknown client"` and `"406::Unsupported version"`
 * are recognised; the second has no args. Anything else is returned as the
 * message with no code.
 */
export function parseBayeuxError(error: string): BayeuxErrorParts {
  const parts = error.split("::");
  if (parts.length < 2 || !/^\d{3}$/.test(parts[0])) {
    return { args: [], message: error };
  }

  const code = Number(parts[0]);
  if (parts.length === 2) {
    return { code, args: [], message: parts[1] };
  }

  return {
    code,
    args: parts[1] ? parts[1].split(",") : [],
    message: parts.slice(2).join("::"),
  };
}
