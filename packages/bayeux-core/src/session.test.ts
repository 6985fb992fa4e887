import { describe, expect, it } from "vitest";

import { Session } from "./session.ts";

describe("Session", () => {
  it("starts unbound", () => {
    const session = new Session(3);
    expect(session.isBound()).toBe(false);
    expect(session.clientId()).toBeUndefined();
    expect(session.cookies()).toEqual([]);
    expect(session.maxRetries).toBe(3);
  });

  it("replaces cookies on every bind", () => {
    const session = new Session(3);
    session.bind("1234", ["a=1", "b=2"]);
    session.bind("5678", ["c=3"]);
    expect(session.clientId()).toBe("5678");
    expect(session.cookies()).toEqual(["c=3"]);
  });

  it("keeps its own copy of the cookie list", () => {
    const session = new Session(3);
    const cookies = ["a=1"];
    session.bind("1234", cookies);
    cookies.push("b=2");
    expect(session.cookies()).toEqual(["a=1"]);
  });

  it("counts retries per operation", () => {
    const session = new Session(3);
    session.beginOperation();
    expect(session.recordRetry()).toBe(1);
    expect(session.recordRetry()).toBe(2);
    expect(session.retryCount).toBe(2);
    session.endOperation();
    expect(session.retryCount).toBe(0);
  });

  it("forgets everything on reset", () => {
    const session = new Session(3);
    session.bind("1234", ["a=1"]);
    session.recordRetry();
    session.reset();
    expect(session.isBound()).toBe(false);
    expect(session.cookies()).toEqual([]);
    expect(session.retryCount).toBe(0);
  });
});
