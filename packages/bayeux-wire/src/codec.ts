// JSON codec for Bayeux messages.
//
// Requests go out as a single JSON object; responses come back as a JSON
// array whose elements are classified by `classifyResponse`. A batch with
// one unclassifiable element is rejected as a whole.

import type { BayeuxRequest, BayeuxResponse } from "./types.ts";
import { classifyResponse } from "./schemas.ts";
import { ParseError } from "./errors.ts";

/**
 * Serialization capability used by the engine.
 *
 * The default is `jsonCodec`; tests and unusual servers can inject their own.
 */
export interface BayeuxCodec {
  /** Encode one request to the bytes sent as the HTTP body. */
  encode(request: BayeuxRequest): Uint8Array;

  /**
   * Decode a response body into classified responses.
   *
   * @throws ParseError if the body is not a JSON array of known shapes
   */
  decodeBatch(body: string | Uint8Array): BayeuxResponse[];
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

// ============================================================================
// Encoding
// ============================================================================

/**
 * Convert a tagged message to its wire object.
 *
 * Drops the tag and puts `channel` first. Undefined fields disappear when
 * the object is stringified.
 */
export function toWireObject(message: BayeuxRequest | BayeuxResponse): Record<string, unknown> {
  const { tag: _tag, channel, ...fields } = message;
  const wire: Record<string, unknown> = { channel, ...fields };
  if (message.tag === "Publish" && message.data === undefined) {
    wire.data = null;
  }
  return wire;
}

/**
 * Encode a request as JSON text.
 */
export function encodeRequestJson(request: BayeuxRequest): string {
  return JSON.stringify(toWireObject(request));
}

/**
 * Encode a request to UTF-8 bytes.
 */
export function encodeRequest(request: BayeuxRequest): Uint8Array {
  return encoder.encode(encodeRequestJson(request));
}

/**
 * Encode responses as a JSON array, the way a server would send them.
 */
export function encodeResponses(responses: BayeuxResponse[]): string {
  return JSON.stringify(responses.map(toWireObject));
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode and classify a response batch.
 *
 * @param body - Response body as text or UTF-8 bytes
 * @returns Responses in the order the server sent them
 */
export function decodeBatch(body: string | Uint8Array): BayeuxResponse[] {
  const text = typeof body === "string" ? body : decoder.decode(body);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new ParseError(`Response body is not valid JSON: ${preview(text)}`, { cause: e });
  }

  if (!Array.isArray(parsed)) {
    throw new ParseError(`Response body is not a JSON array: ${preview(text)}`);
  }

  const responses: BayeuxResponse[] = [];
  for (let i = 0; i < parsed.length; i++) {
    const response = classifyResponse(parsed[i]);
    if (response === null) {
      throw new ParseError(
        `Response element ${i} matches no known message shape: ${preview(JSON.stringify(parsed[i]))}`,
        { index: i },
      );
    }
    responses.push(response);
  }
  return responses;
}

/** Shorten a body for error messages. */
function preview(text: string, max = 120): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * The default codec: UTF-8 JSON with structural classification.
 */
export const jsonCodec: BayeuxCodec = {
  encode: encodeRequest,
  decodeBatch,
};
