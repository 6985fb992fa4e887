// Session state for one client instance.
//
// Holds the server-assigned client id, the cookies persisted from the last
// successful handshake, and the retry counter of the running operation.

/**
 * Mutable session identity.
 *
 * Only the reconnection engine calls `bind`, and only for a successful
 * handshake response. Only the owner of the client calls `reset`.
 */
export class Session {
  /** Retries allowed per operation beyond the first attempt. */
  readonly maxRetries: number;

  private token: string | undefined;
  private stickyCookies: string[] = [];
  private retries = 0;

  constructor(maxRetries: number) {
    this.maxRetries = maxRetries;
  }

  /**
   * Commit a handshake result. Cookies are replaced, never merged: a new
   * handshake means a new server-side session.
   */
  bind(clientId: string, cookies: readonly string[]): void {
    this.token = clientId;
    this.stickyCookies = [...cookies];
  }

  /** The bound client id, if a handshake succeeded. */
  clientId(): string | undefined {
    return this.token;
  }

  /** Cookies attached to every request after the handshake. */
  cookies(): readonly string[] {
    return this.stickyCookies;
  }

  isBound(): boolean {
    return this.token !== undefined;
  }

  /** Retries spent by the running operation. */
  get retryCount(): number {
    return this.retries;
  }

  beginOperation(): void {
    this.retries = 0;
  }

  /** Spend one unit of the retry budget and return the new count. */
  recordRetry(): number {
    this.retries += 1;
    return this.retries;
  }

  endOperation(): void {
    this.retries = 0;
  }

  /** Forget the client id and cookies, e.g. before a fresh handshake cycle. */
  reset(): void {
    this.token = undefined;
    this.stickyCookies = [];
    this.retries = 0;
  }
}
