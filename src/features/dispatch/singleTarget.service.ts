import { truncateText } from "../../shared/utils.js";
import { parseRecipient, recipientKey, type Recipient } from "../recipients/recipient.js";
import { describeOutcome } from "./outcome.js";
import { attemptDelivery, notStarted, runSession, type DispatchDeps, type DispatchResult, type LoopEnv } from "./dispatch.service.js";
import type { BroadcastSession } from "./session.state.js";
import { formatSingleSummary } from "./summary.js";

export type SingleTargetInput = {
  recipient: string;
  text: string;
  count: number;
  delaySec: number;
};

type Validated = { ok: true; recipient: Recipient } | { ok: false; reason: string };

export function validateSingleTarget(input: SingleTargetInput): Validated {
  if (!input.recipient.trim()) return { ok: false, reason: "ID чата для спама не указан." };
  const recipient = parseRecipient(input.recipient);
  if (!recipient) return { ok: false, reason: `Некорректный ID чата или юзернейм: ${input.recipient.trim()}` };
  if (!input.text.trim()) return { ok: false, reason: "Текст для спама пустой." };
  if (!Number.isInteger(input.count) || input.count <= 0) {
    return { ok: false, reason: "Количество сообщений должно быть больше нуля." };
  }
  if (!Number.isFinite(input.delaySec) || input.delaySec < 0) {
    return { ok: false, reason: "Задержка не может быть отрицательной." };
  }
  return { ok: true, recipient };
}

async function singleTargetLoop(
  session: BroadcastSession,
  env: LoopEnv,
  recipient: Recipient,
  count: number
) {
  const { reporter, clock } = env;
  const key = recipientKey(recipient);

  for (let i = 0; i < count; i++) {
    const step = `Спам ${i + 1}/${count}`;
    let pauseMs = session.delayMs;

    session.attempts++;
    let outcome = await attemptDelivery(env, session, recipient);

    if (outcome.kind === "delivered") {
      session.delivered++;
      reporter.report(`${step}: Сообщение в ${key} отправлено.`, "success");
    } else {
      session.failed++;
      session.lastError = describeOutcome(outcome);

      if (outcome.kind === "rate-limited") {
        session.rateLimitWaits++;
        reporter.report(
          `${step}: Поймали Rate Limit для ${key}. Жду ${(outcome.retryAfterMs / 1000).toFixed(1)} сек...`,
          "warning"
        );
        await clock.sleep(outcome.retryAfterMs);
        pauseMs = 0;

        outcome = await attemptDelivery(env, session, recipient);
        if (outcome.kind === "delivered") {
          session.delivered++;
          session.failed--;
          session.lastError = null;
          reporter.report(`${step}: Повторно отправлено в ${key} после Rate Limit.`, "success");
        } else {
          session.lastError = describeOutcome(outcome);
          reporter.report(`${step}: Повторная отправка в ${key} не удалась: ${session.lastError}`, "error");
        }
      } else {
        reporter.report(`${step}: Ошибка отправки в ${key} - ${session.lastError}`, "error");
      }

      if (outcome.kind === "invalid-credential") {
        session.stopReason = "fatal-credential";
        reporter.report("Критическая ошибка (токен), прекращаю спам.", "error");
        return;
      }
    }

    if (i < count - 1 && pauseMs > 0) await clock.sleep(pauseMs);
  }
}

/** Sends `count` copies of one message to one chat. */
export async function runSingleTarget(deps: DispatchDeps, input: SingleTargetInput): Promise<DispatchResult> {
  const v = validateSingleTarget(input);
  if (!v.ok) return notStarted(v.reason);
  const { recipient } = v;

  return runSession(
    deps,
    "dispatch.singleTarget",
    (now) => ({
      mode: "single-target",
      startedAt: now,
      deadline: null,
      delayMs: input.delaySec * 1000,
      text: input.text,
    }),
    async (session, env) => {
      env.reporter.report(
        `Начинаю спам в чат ${recipientKey(recipient)}: ${input.count} сообщений с задержкой ${input.delaySec} сек. ` +
          `Текст: '${truncateText(input.text)}'`,
        "info"
      );
      await singleTargetLoop(session, env, recipient, input.count);
    },
    formatSingleSummary
  );
}
