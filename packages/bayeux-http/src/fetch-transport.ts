// HTTP transport over the global fetch.
//
// One POST per exchange. The status code is passed up untouched; only a
// failure to send, a timeout or an unreadable body is an error here.

import type { HttpRequest, HttpResponse, HttpTransport } from "@longpoll/bayeux-core";
import { TransportError } from "@longpoll/bayeux-core";

/** Default request timeout. Long enough to outlast a server-held long-poll. */
export const DEFAULT_TIMEOUT_MS = 120_000;

export interface FetchTransportOptions {
  /** Custom fetch implementation. Default: globalThis.fetch */
  fetch?: typeof fetch;

  /** Abort a request that takes longer than this. Default: 120000 */
  timeoutMs?: number;
}

/**
 * Cut `Set-Cookie` values down to their `name=value` pair.
 */
export function cookiePairs(setCookies: readonly string[]): string[] {
  const pairs: string[] = [];
  for (const header of setCookies) {
    const pair = header.split(";", 1)[0].trim();
    if (pair.includes("=")) {
      pairs.push(pair);
    }
  }
  return pairs;
}

/**
 * Transport that POSTs each request with fetch.
 *
 * Works wherever fetch does; on Node.js 20 that is undici.
 */
export class FetchTransport implements HttpTransport {
  private readonly fetchFn: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    let response: Response;
    try {
      response = await this.fetchFn(request.url, {
        method: "POST",
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      if (e instanceof Error && e.name === "TimeoutError") {
        throw new TransportError(`Request to ${request.url} timed out after ${this.timeoutMs}ms`, {
          cause: e,
        });
      }
      const message = e instanceof Error ? e.message : String(e);
      throw new TransportError(`Request to ${request.url} failed: ${message}`, { cause: e });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new TransportError(`Could not read response body: ${message}`, {
        cause: e,
        status: response.status,
      });
    }

    return {
      status: response.status,
      body,
      cookies: cookiePairs(response.headers.getSetCookie()),
    };
  }
}
