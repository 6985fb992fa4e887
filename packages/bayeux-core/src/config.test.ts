import { describe, expect, it } from "vitest";
import { ConfigError, jsonCodec } from "@longpoll/bayeux-wire";

import { DEFAULT_CONFIG, resolveConfig, type ClientConfig } from "./config.ts";
import { ScriptedTransport } from "./testing.ts";

const base: ClientConfig = {
  url: "https://push.example.test/cometd",
  transport: new ScriptedTransport(),
};

function configErrorOf(config: ClientConfig): ConfigError {
  try {
    resolveConfig(config);
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error("expected a ConfigError");
}

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    const config = resolveConfig(base);
    expect(config.authScheme).toBe(DEFAULT_CONFIG.authScheme);
    expect(config.maxRetries).toBe(3);
    expect(config.connectionType).toBe("long-polling");
    expect(config.headers).toEqual({});
    expect(config.observers).toEqual([]);
    expect(config.codec).toBe(jsonCodec);
    expect(config.accessToken).toBeUndefined();
  });

  it("keeps explicit values", () => {
    const config = resolveConfig({
      ...base,
      accessToken: "test-secret",
      authScheme: "Bearer",
      maxRetries: 0,
      headers: { "x-app": "demo" },
    });
    expect(config.accessToken).toBe("test-secret");
    expect(config.authScheme).toBe("Bearer");
    expect(config.maxRetries).toBe(0);
    expect(config.headers).toEqual({ "x-app": "demo" });
    expect(config.transport).toBe(base.transport);
  });

  it("rejects a malformed url", () => {
    const error = configErrorOf({ ...base, url: "not a url" });
    expect(error.field).toBe("url");
    expect(error.message).toMatch(/^Invalid client config: url: /);
  });

  it("rejects a negative or fractional retry budget", () => {
    expect(configErrorOf({ ...base, maxRetries: -1 }).field).toBe("maxRetries");
    expect(configErrorOf({ ...base, maxRetries: 1.5 }).field).toBe("maxRetries");
  });

  it("rejects an empty access token", () => {
    expect(configErrorOf({ ...base, accessToken: "" }).field).toBe("accessToken");
  });
});
