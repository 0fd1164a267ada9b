import { MIN_CYCLE_MS } from "../../shared/constants.js";
import { truncateText } from "../../shared/utils.js";
import { recipientKey, type Recipient } from "../recipients/recipient.js";
import { waitUntilDeadline } from "./clock.js";
import { describeOutcome } from "./outcome.js";
import { attemptDelivery, notStarted, runSession, type DispatchDeps, type DispatchResult, type LoopEnv } from "./dispatch.service.js";
import type { BroadcastSession } from "./session.state.js";
import { formatCyclicSummary } from "./summary.js";

export type CyclicInput = {
  text: string;
  delaySec: number;
  durationMinutes: number;
  recipients: readonly Recipient[];
};

export const NO_RECIPIENTS_MESSAGE =
  "Не найдено ни одного ID чата в логе. Сначала соберите апдейты: пусть пользователи напишут боту, входящие сообщения попадают в лог.";

export function validateCyclic(input: CyclicInput): string | null {
  if (input.recipients.length === 0) return NO_RECIPIENTS_MESSAGE;
  if (!input.text.trim()) return "Текст для рассылки пустой.";
  if (!Number.isFinite(input.delaySec) || input.delaySec <= 0) return "Задержка должна быть больше нуля.";
  if (!Number.isFinite(input.durationMinutes) || input.durationMinutes <= 0) {
    return "Длительность рассылки должна быть больше нуля.";
  }
  return null;
}

function minutesLeft(deadline: number, now: number) {
  return (Math.max(0, deadline - now) / 60_000).toFixed(1);
}

async function cyclicLoop(
  session: BroadcastSession,
  env: LoopEnv,
  recipients: readonly Recipient[],
  deadline: number
) {
  const { reporter, clock } = env;
  const expired = (line: string) => {
    session.stopReason = "deadline-expired";
    reporter.report(line, "warning");
  };

  while (clock.now() < deadline) {
    reporter.report(`Начинаю новый цикл рассылки (осталось ${minutesLeft(deadline, clock.now())} мин)...`, "info");
    const cycleStart = clock.now();

    for (let i = 0; i < recipients.length; i++) {
      const recipient = recipients[i];
      const key = recipientKey(recipient);

      if (clock.now() >= deadline) {
        expired("Время рассылки истекло, останавливаю текущий цикл.");
        return;
      }

      session.attempts++;
      let pauseMs = session.delayMs;
      let outcome = await attemptDelivery(env, session, recipient);

      if (outcome.kind === "delivered") {
        session.delivered++;
        reporter.report(`Масс-рассылка: отправлено в ${key}.`, "success");
      } else {
          session.failed++;
        session.lastError = `${key}: ${describeOutcome(outcome)}`;

        if (outcome.kind === "rate-limited") {
          session.rateLimitWaits++;
          reporter.report(
            `Масс-рассылка: Поймали Rate Limit для ${key}. Жду ${(outcome.retryAfterMs / 1000).toFixed(1)} сек...`,
            "warning"
          );
          if (!(await waitUntilDeadline(clock, outcome.retryAfterMs, deadline))) {
            expired("Время рассылки истекло во время ожидания Rate Limit.");
            return;
          }
          pauseMs = 0;

          reporter.report(`Масс-рассылка: Повторная отправка в ${key} после Rate Limit...`, "info");
          outcome = await attemptDelivery(env, session, recipient);
          if (outcome.kind === "delivered") {
            session.delivered++;
            session.failed--;
            session.lastError = null;
            reporter.report(`Масс-рассылка: Повторно отправлено в ${key}.`, "success");
          } else {
            session.lastError = `${key}: ${describeOutcome(outcome)} (после ожидания)`;
            reporter.report(`Масс-рассылка: Повторная отправка в ${key} не удалась: ${describeOutcome(outcome)}`, "error");
          }
        } else {
          reporter.report(`Масс-рассылка: Ошибка отправки в ${key} - ${describeOutcome(outcome)}`, "error");
        }

        if (outcome.kind === "invalid-credential") {
          session.stopReason = "fatal-credential";
          reporter.report("Критическая ошибка (токен), прекращаю массовую рассылку.", "error");
          return;
        }
      }

      if (clock.now() >= deadline) {
        expired("Время рассылки истекло после отправки.");
        return;
      }

      if (i < recipients.length - 1 && pauseMs > 0) {
        if (!(await waitUntilDeadline(clock, pauseMs, deadline))) {
          expired("Время рассылки истекло во время задержки между чатами.");
          return;
        }
      }
    }

    const cycleMs = clock.now() - cycleStart;
    if (cycleMs < MIN_CYCLE_MS && clock.now() < deadline) {
      await clock.sleep(MIN_CYCLE_MS - cycleMs);
    }
  }

  session.stopReason = "deadline-expired";
}

/** Sweeps every recipient repeatedly until `durationMinutes` run out. */
export async function runCyclicBroadcast(deps: DispatchDeps, input: CyclicInput): Promise<DispatchResult> {
  const invalid = validateCyclic(input);
  if (invalid) return notStarted(invalid);

  const recipients = [...input.recipients];
  const durationMs = input.durationMinutes * 60_000;

  return runSession(
    deps,
    "dispatch.cyclic",
    (now) => ({
      mode: "cyclic",
      startedAt: now,
      deadline: now + durationMs,
      delayMs: input.delaySec * 1000,
      text: input.text,
    }),
    async (session, env) => {
      const deadline = session.startedAt + durationMs;
      env.reporter.report(`!!! НАЧИНАЮ МАССОВУЮ РАССЫЛКУ ПО ЛОГАМ НА ${input.durationMinutes} МИН !!!`, "warning");
      env.reporter.report(
        `Найдено ${recipients.length} уникальных ID/юзернеймов. Начинаю рассылку с задержкой ${input.delaySec} сек. ` +
          `на ${input.durationMinutes} мин. Текст: '${truncateText(input.text)}'`,
        "info"
      );
      await cyclicLoop(session, env, recipients, deadline);
    },
    formatCyclicSummary
  );
}
