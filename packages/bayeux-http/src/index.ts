// HTTP transport for Bayeux clients.
//
// FetchTransport POSTs each exchange through fetch; createBayeuxClient wires
// it into a BayeuxClient.

export {
  FetchTransport,
  DEFAULT_TIMEOUT_MS,
  cookiePairs,
  type FetchTransportOptions,
} from "./fetch-transport.ts";
export { createBayeuxClient, type HttpClientConfig } from "./client.ts";
