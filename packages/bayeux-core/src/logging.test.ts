// Tests for the logging observer

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  connectRequest,
  encodeRequest,
  type BayeuxRequest,
  type BayeuxResponse,
} from "@longpoll/bayeux-wire";

import { RequestHeaders } from "./headers.ts";
import { loggingObserver } from "./logging.ts";
import { Extensions, type Exchange, type ExchangeContext } from "./observer.ts";

function exchangeFor(request: BayeuxRequest, headers = new RequestHeaders()): Exchange {
  return {
    request,
    url: "https://push.example.test/cometd",
    headers,
    body: encodeRequest(request),
  };
}

function contextFor(operation: string): ExchangeContext {
  return { extensions: new Extensions(), operation, attempt: 1, retryCount: 0 };
}

const connectFailure: BayeuxResponse = {
  tag: "Errored",
  channel: "/meta/connect",
  successful: false,
  error: "402::client_id::Unknown client",
  advice: { reconnect: "handshake" },
};

describe("loggingObserver", () => {
  beforeEach(() => {
    vi.spyOn(performance, "now").mockReturnValueOnce(100).mockReturnValueOnce(112.5);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs a request and its successful result", () => {
    const log = vi.fn();
    const observer = loggingObserver({ log });
    const ctx = contextFor("connect");
    const exchange = exchangeFor(connectRequest("1234"));

    observer.exchangeStart?.(ctx, exchange);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenLastCalledWith("→ %s %O", "/meta/connect", {
      type: "request",
      operation: "connect",
      attempt: 1,
      body: '{"channel":"/meta/connect","clientId":"1234","connectionType":"long-polling"}',
    });

    observer.exchangeResult?.(ctx, exchange, {
      ok: true,
      status: 200,
      responses: [{ tag: "Basic", channel: "/meta/connect", successful: true }],
    });
    expect(log).toHaveBeenLastCalledWith("← %s: ✓ %sms %O", "/meta/connect", "12.50", {
      type: "response",
      operation: "connect",
      duration: "12.50ms",
      status: 200,
    });
  });

  it("omits bodies when disabled and includes decoded responses when enabled", () => {
    const log = vi.fn();
    const observer = loggingObserver({ log, logBodies: false, logResponses: true });
    const ctx = contextFor("connect");
    const exchange = exchangeFor(connectRequest("1234"));
    const responses: BayeuxResponse[] = [{ tag: "Delivery", channel: "/chat/demo", data: "hi" }];

    observer.exchangeStart?.(ctx, exchange);
    expect(log.mock.calls[0][2]).not.toHaveProperty("body");

    observer.exchangeResult?.(ctx, exchange, { ok: true, status: 200, responses });
    expect(log.mock.calls[1][3]).toMatchObject({ responses });
  });

  it("redacts credentials when headers are logged", () => {
    const log = vi.fn();
    const observer = loggingObserver({ log, logHeaders: true });
    const headers = new RequestHeaders()
      .set("content-type", "application/json")
      .setSensitive("authorization", "OAuth test-secret");

    observer.exchangeStart?.(contextFor("connect"), exchangeFor(connectRequest("1234"), headers));
    expect(log.mock.calls[0][2]).toMatchObject({
      headers: { "content-type": "application/json", authorization: "[redacted]" },
    });
  });

  it("logs a failed response with its error and advice", () => {
    const log = vi.fn();
    const observer = loggingObserver({ log });
    const ctx = contextFor("connect");
    const exchange = exchangeFor(connectRequest("1234"));

    observer.exchangeStart?.(ctx, exchange);
    observer.exchangeResult?.(ctx, exchange, { ok: true, status: 200, responses: [connectFailure] });
    expect(log).toHaveBeenLastCalledWith("← %s: ✗ %sms %O", "/meta/connect", "12.50", {
      type: "response",
      operation: "connect",
      duration: "12.50ms",
      status: 200,
      error: "402::client_id::Unknown client",
      advice: { reconnect: "handshake" },
    });
  });

  it("logs transport failures by name and message", () => {
    const log = vi.fn();
    const observer = loggingObserver({ log });
    const ctx = contextFor("connect");
    const exchange = exchangeFor(connectRequest("1234"));

    observer.exchangeStart?.(ctx, exchange);
    observer.exchangeResult?.(ctx, exchange, { ok: false, error: new TypeError("fetch failed") });
    expect(log).toHaveBeenLastCalledWith("← %s: ✗ %sms %O", "/meta/connect", "12.50", {
      type: "response",
      operation: "connect",
      duration: "12.50ms",
      error: { name: "TypeError", message: "fetch failed" },
    });
  });

  it("skips exchanges faster than minDuration", () => {
    const log = vi.fn();
    const observer = loggingObserver({ log, minDuration: 50 });
    const ctx = contextFor("connect");
    const exchange = exchangeFor(connectRequest("1234"));

    observer.exchangeStart?.(ctx, exchange);
    observer.exchangeResult?.(ctx, exchange, { ok: true, status: 200, responses: [] });
    expect(log).toHaveBeenCalledTimes(1);
  });

  it("logs retry decisions", () => {
    const log = vi.fn();
    const observer = loggingObserver({ log });

    observer.retryDecision?.({
      operation: "connect",
      failure: connectFailure,
      decision: { action: "give-up", reason: "exhausted" },
      retryCount: 4,
      maxRetries: 3,
    });
    expect(log).toHaveBeenCalledWith("↻ %s: %s %O", "connect", "give-up", {
      type: "decision",
      operation: "connect",
      action: "give-up",
      retry: 4,
      maxRetries: 3,
      reason: "exhausted",
    });
  });
});
