// Client factory wired to FetchTransport.

import { BayeuxClient, type ClientConfig } from "@longpoll/bayeux-core";

import { FetchTransport, type FetchTransportOptions } from "./fetch-transport.ts";

/** Client config where the transport is optional. */
export type HttpClientConfig = Omit<ClientConfig, "transport"> & {
  transport?: ClientConfig["transport"];
  /** Options for the default FetchTransport. Ignored when `transport` is set. */
  fetchOptions?: FetchTransportOptions;
};

/**
 * Create a Bayeux client that talks HTTP through fetch.
 *
 * @example
 * ```typescript
 * const client = createBayeuxClient({
 *   url: "https://push.example.test/cometd",
 *   accessToken: "test-secret",
 * });
 * await client.init();
 * ```
 */
export function createBayeuxClient(config: HttpClientConfig): BayeuxClient {
  const { fetchOptions, transport, ...rest } = config;
  return new BayeuxClient({
    ...rest,
    transport: transport ?? new FetchTransport(fetchOptions),
  });
}
