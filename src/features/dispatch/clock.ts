import { DEADLINE_POLL_MS } from "../../shared/constants.js";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((r) => setTimeout(r, Math.max(0, ms))),
};

/**
 * Waits `ms`, checking the deadline every `pollMs`.
 * Resolves `false` as soon as the deadline is seen, `true` when the full wait elapsed.
 */
export async function waitUntilDeadline(
  clock: Clock,
  ms: number,
  deadline: number,
  pollMs = DEADLINE_POLL_MS
): Promise<boolean> {
  const until = clock.now() + ms;
  for (;;) {
    const now = clock.now();
    if (now >= until) return true;
    if (now >= deadline) return false;
    await clock.sleep(Math.min(pollMs, until - now));
  }
}
