import { describe, expect, it } from "vitest";

import {
  BayeuxError,
  ConfigError,
  InvalidChannelError,
  ParseError,
  ProtocolError,
  RetryExhaustedError,
  SessionError,
  TransportError,
  parseBayeuxError,
} from "./errors.ts";
import type { ErroredResponse } from "./types.ts";

const connectFailure: ErroredResponse = {
  tag: "Errored",
  channel: "/meta/connect",
  successful: false,
  error: "402::client_id::Unknown client",
  advice: { reconnect: "handshake" },
};

describe("parseBayeuxError", () => {
  it("splits code, args and message", () => {
    expect(parseBayeuxError("402::client_id::Unknown client")).toEqual({
      code: 402,
      args: ["client_id"],
      message: "Unknown client",
    });
  });

  it("splits comma separated args", () => {
    expect(parseBayeuxError("403::/chat/a,/chat/b::Subscription denied")).toEqual({
      code: 403,
      args: ["/chat/a", "/chat/b"],
      message: "Subscription denied",
    });
  });

  it("handles empty args", () => {
    expect(parseBayeuxError("500::::boom")).toEqual({ code: 500, args: [], message: "boom" });
  });

  it("handles the short code::message form", () => {
    expect(parseBayeuxError("406::Unsupported version, or unsupported minimum version")).toEqual({
      code: 406,
      args: [],
      message: "Unsupported version, or unsupported minimum version",
    });
  });

  it("keeps free-form strings as the message", () => {
    expect(parseBayeuxError("error")).toEqual({ args: [], message: "error" });
    expect(parseBayeuxError("4xx::nope")).toEqual({ args: [], message: "4xx::nope" });
  });
});

describe("error classes", () => {
  it("ProtocolError keeps the server message verbatim", () => {
    const error = new ProtocolError(connectFailure, connectFailure.error);
    expect(error).toBeInstanceOf(BayeuxError);
    expect(error.name).toBe("ProtocolError");
    expect(error.kind).toBe("protocol");
    expect(error.message).toBe("402::client_id::Unknown client");
    expect(error.code).toBe(402);
    expect(error.args).toEqual(["client_id"]);
    expect(error.description).toBe("Unknown client");
    expect(error.channel).toBe("/meta/connect");
    expect(error.advice).toEqual({ reconnect: "handshake" });
  });

  it("RetryExhaustedError refines ProtocolError with the attempt count", () => {
    const error = new RetryExhaustedError(connectFailure, "400::Error", 4);
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error.name).toBe("RetryExhaustedError");
    expect(error.attempts).toBe(4);
    expect(error.message).toBe("400::Error");
  });

  it("terminal errors carry their kind", () => {
    const cause = new Error("ECONNREFUSED");
    const transport = new TransportError("Could not send request to server", { cause });
    expect(transport.kind).toBe("transport");
    expect(transport.cause).toBe(cause);

    expect(new ParseError("bad", { index: 2 }).index).toBe(2);

    const session = new SessionError("publish");
    expect(session.kind).toBe("session");
    expect(session.message).toBe("No client id bound for publish; handshake first");

    const channel = new InvalidChannelError("/meta/connect", "meta channels cannot be published to");
    expect(channel.kind).toBe("config");
    expect(channel.field).toBe("channel");
    expect(channel.message).toBe(
      'Invalid channel "/meta/connect": meta channels cannot be published to',
    );

    const encoding = new TypeError("Do not know how to serialize a BigInt");
    const config = new ConfigError("Could not encode /chat/demo request", {
      field: "data",
      cause: encoding,
    });
    expect(config.kind).toBe("config");
    expect(config.field).toBe("data");
    expect(config.cause).toBe(encoding);
  });
});
