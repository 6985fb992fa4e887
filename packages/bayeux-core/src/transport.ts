/**
 * HTTP transport abstraction.
 *
 * The engine hands the transport a fully built request and gets back the
 * raw body and the cookies the server set. Issuing the POST, TLS, pooling
 * and timeouts are the transport's business.
 *
 * Implementations:
 * - FetchTransport (bayeux-http) over the global fetch
 * - ScriptedTransport (./testing.ts) for tests
 */

/** One outgoing exchange. */
export interface HttpRequest {
  url: string;
  headers: Record<string, string>;
  body: Uint8Array;
}

/** What came back. The status is reported to observers, never interpreted. */
export interface HttpResponse {
  status: number;
  body: string;
  /** Cookies the server set, as `name=value` strings. */
  cookies: string[];
}

/**
 * Interface for transports that can exchange one Bayeux request.
 */
export interface HttpTransport {
  /**
   * Send a request and read the whole body.
   *
   * Should reject with TransportError when nothing usable came back; any
   * other rejection is wrapped in one by the engine.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}
