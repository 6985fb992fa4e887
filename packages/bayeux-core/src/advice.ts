// Advice interpreter.
//
// Maps server advice and the retry budget to what the engine does next.
// Pure: no session access, no I/O.

import type { Advice } from "@longpoll/bayeux-wire";

/** Why the engine stopped retrying. */
export type GiveUpReason = "declined" | "exhausted" | "no-advice";

/** What to do after a failed response. */
export type AdviceDecision =
  | { action: "follow-handshake" }
  | { action: "follow-retry" }
  | { action: "give-up"; reason: GiveUpReason };

export type AdviceAction = AdviceDecision["action"];

/** Messages used when the server gave no error string. */
export const GIVE_UP_MESSAGES: Readonly<Record<GiveUpReason, string>> = {
  declined: "server declined reconnection",
  exhausted: "max retries reached",
  "no-advice": "request failed without advice",
};

/**
 * Decide how to react to a failed response.
 *
 * `retryCount` is the 1-based number of the retry under consideration, so
 * with `maxRetries = N` an operation is attempted at most `N + 1` times.
 * An advice object without `reconnect` counts as no advice.
 */
export function decide(
  advice: Advice | undefined,
  retryCount: number,
  maxRetries: number,
): AdviceDecision {
  const reconnect = advice?.reconnect;

  if (reconnect === undefined) {
    return { action: "give-up", reason: "no-advice" };
  }
  if (reconnect === "none") {
    return { action: "give-up", reason: "declined" };
  }
  if (retryCount > maxRetries) {
    return { action: "give-up", reason: "exhausted" };
  }
  return reconnect === "handshake" ? { action: "follow-handshake" } : { action: "follow-retry" };
}

/**
 * The message surfaced on give-up: the server's error when it sent one.
 */
export function giveUpMessage(reason: GiveUpReason, serverError?: string): string {
  return serverError || GIVE_UP_MESSAGES[reason];
}
