export type DispatchMode = "single-target" | "cyclic";
export type StopReason = "completed" | "deadline-expired" | "fatal-credential" | "aborted";

export type BroadcastSession = {
  readonly mode: DispatchMode;
  readonly startedAt: number;
  readonly deadline: number | null;
  readonly delayMs: number;
  readonly text: string;
  attempts: number;
  delivered: number;
  failed: number;
  rateLimitWaits: number;
  transportCalls: number;
  lastError: string | null;
  stopReason: StopReason | null;
};

export type SessionInit = Pick<BroadcastSession, "mode" | "startedAt" | "deadline" | "delayMs" | "text">;

export type SessionSummary = {
  mode: DispatchMode;
  elapsedMs: number;
  attempts: number;
  delivered: number;
  failed: number;
  rateLimitWaits: number;
  transportCalls: number;
  lastError: string | null;
  stopReason: StopReason;
};

export type SessionManager = {
  tryAcquire(init: SessionInit): BroadcastSession | null;
  release(session: BroadcastSession): void;
  active(): BroadcastSession | null;
};

export function createSessionManager(): SessionManager {
  let current: BroadcastSession | null = null;

  return {
    tryAcquire(init) {
      if (current) return null;
      current = {
        ...init,
        attempts: 0,
        delivered: 0,
        failed: 0,
        rateLimitWaits: 0,
        transportCalls: 0,
        lastError: null,
        stopReason: null,
      };
      return current;
    },
    release(session) {
      if (current === session) current = null;
    },
    active() {
      return current;
    },
  };
}

// process-wide gate shared by every entry point that uses the bot token
export const sessions = createSessionManager();

export function summarize(session: BroadcastSession, now: number): SessionSummary {
  return {
    mode: session.mode,
    elapsedMs: Math.max(0, now - session.startedAt),
    attempts: session.attempts,
    delivered: session.delivered,
    failed: session.failed,
    rateLimitWaits: session.rateLimitWaits,
    transportCalls: session.transportCalls,
    lastError: session.lastError,
    stopReason: session.stopReason ?? "completed",
  };
}
