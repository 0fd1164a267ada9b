import { logError, logInfo } from "../../shared/logger.js";
import { errorMessage } from "../../shared/utils.js";
import { recipientKey, type Recipient } from "../recipients/recipient.js";
import { systemClock, type Clock } from "./clock.js";
import { classifySendError, type DispatchOutcome } from "./outcome.js";
import { safeReporter, type ProgressReporter } from "./reporter.js";
import {
  sessions,
  summarize,
  type BroadcastSession,
  type SessionInit,
  type SessionManager,
  type SessionSummary,
} from "./session.state.js";
import type { ParseMode, TransportPort } from "./transport.js";

export type DispatchDeps = {
  transport: TransportPort;
  reporter: ProgressReporter;
  clock?: Clock;
  sessions?: SessionManager;
};

export type LoopEnv = {
  transport: TransportPort;
  reporter: ProgressReporter;
  clock: Clock;
};

export type DispatchResult = {
  ok: boolean;
  started: boolean;
  message: string;
  summary: SessionSummary | null;
};

export const BUSY_MESSAGE = "Рассылка уже идёт. Дождитесь её завершения.";

export function notStarted(message: string): DispatchResult {
  return { ok: false, started: false, message, summary: null };
}

/** One call to the transport; whatever it throws becomes an outcome. */
export async function attemptDelivery(
  env: LoopEnv,
  session: BroadcastSession,
  recipient: Recipient,
  parseMode?: ParseMode
): Promise<DispatchOutcome> {
  session.transportCalls++;
  try {
    return await env.transport.deliver(recipient, session.text, parseMode);
  } catch (e) {
    logError("dispatch.deliver", e, { chatId: recipientKey(recipient) });
    return classifySendError(e);
  }
}

/**
 * Acquires the session slot, runs `loop`, and always hands back a summary.
 * Errors escaping the loop end the session as `aborted`.
 */
export async function runSession(
  deps: DispatchDeps,
  scope: string,
  init: (now: number) => SessionInit,
  loop: (session: BroadcastSession, env: LoopEnv) => Promise<void>,
  describe: (summary: SessionSummary) => string
): Promise<DispatchResult> {
  const clock = deps.clock ?? systemClock;
  const gate = deps.sessions ?? sessions;
  const reporter = safeReporter(deps.reporter);

  const session = gate.tryAcquire(init(clock.now()));
  if (!session) {
    reporter.report(BUSY_MESSAGE, "warning");
    return notStarted(BUSY_MESSAGE);
  }

  try {
    await loop(session, { transport: deps.transport, reporter, clock });
    session.stopReason ??= "completed";
  } catch (e) {
    session.stopReason = "aborted";
    session.lastError = errorMessage(e);
    // an attempt interrupted mid-way counts as failed
    session.failed = session.attempts - session.delivered;
    logError(scope, e, { mode: session.mode, attempts: session.attempts });
    reporter.report(`Непредвиденная ошибка, сессия прервана: ${session.lastError}`, "error");
  } finally {
    gate.release(session);
  }

  const summary = summarize(session, clock.now());
  const message = describe(summary);
  const ok = summary.delivered > 0;
  reporter.report(message, ok ? "success" : "error");
  logInfo(scope, message, { stopReason: summary.stopReason });
  return { ok, started: true, message, summary };
}
