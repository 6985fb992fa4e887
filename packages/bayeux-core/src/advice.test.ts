import { describe, expect, it } from "vitest";

import { decide, giveUpMessage } from "./advice.ts";

describe("decide", () => {
  it("follows retry advice within the budget", () => {
    expect(decide({ reconnect: "retry" }, 1, 3)).toEqual({ action: "follow-retry" });
    expect(decide({ reconnect: "retry" }, 3, 3)).toEqual({ action: "follow-retry" });
  });

  it("follows handshake advice within the budget", () => {
    expect(decide({ reconnect: "handshake" }, 2, 3)).toEqual({ action: "follow-handshake" });
  });

  it("gives up once the retry under consideration exceeds the budget", () => {
    expect(decide({ reconnect: "retry" }, 4, 3)).toEqual({ action: "give-up", reason: "exhausted" });
    expect(decide({ reconnect: "handshake" }, 1, 0)).toEqual({
      action: "give-up",
      reason: "exhausted",
    });
  });

  it("gives up when the server declines reconnection, whatever the budget", () => {
    expect(decide({ reconnect: "none" }, 1, 3)).toEqual({ action: "give-up", reason: "declined" });
    expect(decide({ reconnect: "none" }, 9, 3)).toEqual({ action: "give-up", reason: "declined" });
  });

  it("treats missing advice and advice without reconnect alike", () => {
    expect(decide(undefined, 1, 3)).toEqual({ action: "give-up", reason: "no-advice" });
    expect(decide({ interval: 500 }, 1, 3)).toEqual({ action: "give-up", reason: "no-advice" });
  });
});

describe("giveUpMessage", () => {
  it("prefers the server's error", () => {
    expect(giveUpMessage("exhausted", "400::Error")).toBe("400::Error");
  });

  it("falls back to a message per reason", () => {
    expect(giveUpMessage("exhausted")).toBe("max retries reached");
    expect(giveUpMessage("declined", "")).toBe("server declined reconnection");
    expect(giveUpMessage("no-advice")).toBe("request failed without advice");
  });
});
