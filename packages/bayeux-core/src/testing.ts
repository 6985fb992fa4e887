/**
 * Testing utilities for @longpoll/bayeux-core.
 *
 * `ScriptedTransport` stands in for a Bayeux server: replies are scripted
 * per channel and every request is recorded for assertions.
 */

import { z } from "zod";
import { TransportError } from "@longpoll/bayeux-wire";

import type { HttpRequest, HttpResponse, HttpTransport } from "./transport.ts";

const textDecoder = new TextDecoder();

const RequestMessageSchema = z.object({ channel: z.string() }).passthrough();

/** A request as the scripted server saw it. */
export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
  /** Body text. */
  body: string;
  /** Parsed request object. */
  message: Record<string, unknown>;
  channel: string;
}

/** A reply, an error to reject with, or a function producing either. */
export type ScriptedReply =
  | HttpResponse
  | Error
  | ((request: RecordedRequest) => HttpResponse | Error);

/**
 * Build an HTTP response carrying a JSON batch.
 *
 * @example
 * ```ts
 * transport.on("/meta/handshake", replyWith([{ channel: "/meta/handshake", ... }]));
 * ```
 */
export function replyWith(
  responses: unknown[],
  init: { status?: number; cookies?: string[] } = {},
): HttpResponse {
  return {
    status: init.status ?? 200,
    body: JSON.stringify(responses),
    cookies: init.cookies ?? [],
  };
}

/**
 * In-process transport with per-channel scripted replies.
 *
 * One-time replies queued with `once` are used first, in order; after that
 * the standing reply set with `on` answers. A request with no reply left
 * rejects with TransportError.
 */
export class ScriptedTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly queued = new Map<string, ScriptedReply[]>();
  private readonly standing = new Map<string, ScriptedReply>();

  /** Answer every request on `channel` with `reply`. */
  on(channel: string, reply: ScriptedReply): this {
    this.standing.set(channel, reply);
    return this;
  }

  /** Answer the next request on `channel` with `reply`. */
  once(channel: string, reply: ScriptedReply): this {
    const queue = this.queued.get(channel) ?? [];
    queue.push(reply);
    this.queued.set(channel, queue);
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const body = textDecoder.decode(request.body);
    const message = RequestMessageSchema.parse(JSON.parse(body));
    const recorded: RecordedRequest = {
      url: request.url,
      headers: { ...request.headers },
      body,
      message,
      channel: message.channel,
    };
    this.requests.push(recorded);

    const reply = this.queued.get(recorded.channel)?.shift() ?? this.standing.get(recorded.channel);
    if (reply === undefined) {
      throw new TransportError(`No scripted reply for ${recorded.channel}`);
    }

    const result = typeof reply === "function" ? reply(recorded) : reply;
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }

  /** Requests sent on `channel`, oldest first. */
  sent(channel: string): RecordedRequest[] {
    return this.requests.filter((request) => request.channel === channel);
  }

  /** Channel of every request, in order. */
  channels(): string[] {
    return this.requests.map((request) => request.channel);
  }
}
