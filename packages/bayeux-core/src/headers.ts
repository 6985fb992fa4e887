// Request headers with redaction support.
//
// Sensitive entries (credentials, session cookies) are sent as-is but
// replaced with a placeholder whenever headers are logged.

/** Placeholder shown instead of a sensitive header value. */
export const REDACTED = "[redacted]";

interface HeaderEntry {
  value: string;
  sensitive: boolean;
}

/**
 * Outgoing HTTP headers. Names are stored lower-cased.
 *
 * @example
 * ```typescript
 * const headers = new RequestHeaders();
 * headers.set("content-type", "application/json");
 * headers.setSensitive("authorization", "OAuth test-secret");
 * headers.redacted(); // { "content-type": "application/json", authorization: "[redacted]" }
 * ```
 */
export class RequestHeaders {
  private entries = new Map<string, HeaderEntry>();

  /**
   * Set a header that may appear in logs.
   */
  set(name: string, value: string): this {
    this.entries.set(name.toLowerCase(), { value, sensitive: false });
    return this;
  }

  /**
   * Set a header that is redacted in logs.
   */
  setSensitive(name: string, value: string): this {
    this.entries.set(name.toLowerCase(), { value, sensitive: true });
    return this;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Plain record for the transport.
   */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      record[name] = entry.value;
    }
    return record;
  }

  /**
   * Plain record with sensitive values replaced by `REDACTED`.
   */
  redacted(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      record[name] = entry.sensitive ? REDACTED : entry.value;
    }
    return record;
  }
}
