import { STATUS_PREVIEW_LIMIT } from "../../shared/constants.js";
import { formatSeconds, truncateText } from "../../shared/utils.js";
import type { BroadcastSession, SessionSummary, StopReason } from "./session.state.js";

const SINGLE_TITLE: Record<StopReason, string> = {
  completed: "Спам завершен",
  "deadline-expired": "Спам завершен по времени",
  "fatal-credential": "Спам остановлен (токен недействителен)",
  aborted: "Спам прерван",
};

const CYCLIC_TITLE: Record<StopReason, string> = {
  completed: "ЗАВЕРШЕНА",
  "deadline-expired": "ЗАВЕРШЕНА ПО ВРЕМЕНИ",
  "fatal-credential": "ОСТАНОВЛЕНА (токен недействителен)",
  aborted: "ПРЕРВАНА",
};

function withLastError(line: string, lastError: string | null) {
  return lastError ? `${line} Последняя ошибка: ${lastError}` : line;
}

export function formatSingleSummary(s: SessionSummary): string {
  const line =
    `${SINGLE_TITLE[s.stopReason]} за ${formatSeconds(s.elapsedMs)} сек. ` +
    `Успешно отправлено: ${s.delivered}/${s.attempts}. Ошибок: ${s.failed}.`;
  return withLastError(line, s.lastError);
}

export function formatCyclicSummary(s: SessionSummary): string {
  const line =
    `Массовая рассылка ${CYCLIC_TITLE[s.stopReason]} за ${formatSeconds(s.elapsedMs)} сек. ` +
    `(${(s.elapsedMs / 60_000).toFixed(1)} мин). ` +
    `Всего попыток: ${s.attempts}. Успешно: ${s.delivered}. Ошибок: ${s.failed}. ` +
    `Ожиданий Rate Limit: ${s.rateLimitWaits}.`;
  return withLastError(line, s.lastError);
}

export function formatStatus(session: BroadcastSession | null, now: number): string {
  if (!session) return "Сейчас рассылка не идёт.";
  const mode = session.mode === "cyclic" ? "массовая рассылка" : "спам в один чат";
  const lines = [
    `Идёт ${mode}: ${formatSeconds(now - session.startedAt, 0)} сек.`,
    `Текст: '${truncateText(session.text, STATUS_PREVIEW_LIMIT)}'`,
    `Попыток: ${session.attempts}, успешно: ${session.delivered}, ошибок: ${session.failed}, ожиданий Rate Limit: ${session.rateLimitWaits}`,
  ];
  if (session.deadline !== null) {
    const left = Math.max(0, session.deadline - now);
    lines.push(`До конца: ${(left / 60_000).toFixed(1)} мин`);
  }
  if (session.lastError) lines.push(`Последняя ошибка: ${session.lastError}`);
  return lines.join("\n");
}
