import { TelegramError } from "telegraf";
import { DEFAULT_RETRY_AFTER_MS } from "../../shared/constants.js";
import { errorMessage } from "../../shared/utils.js";

export type DispatchOutcome =
  | { kind: "delivered" }
  | { kind: "rate-limited"; retryAfterMs: number }
  | { kind: "invalid-credential" }
  | { kind: "rejected"; reason: string }
  | { kind: "transport-failure"; reason: string };

export const DELIVERED: DispatchOutcome = { kind: "delivered" };

function retryAfterMs(e: TelegramError): number {
  const sec = e.response.parameters?.retry_after;
  return typeof sec === "number" && Number.isFinite(sec) && sec >= 0 ? sec * 1000 : DEFAULT_RETRY_AFTER_MS;
}

/** Maps anything thrown by a send call onto exactly one outcome. */
export function classifySendError(error: unknown): DispatchOutcome {
  if (error instanceof TelegramError) {
    const code = error.response.error_code;
    const description = error.response.description;
    if (code === 429) return { kind: "rate-limited", retryAfterMs: retryAfterMs(error) };
    if (code === 401 || (code === 404 && /^not found$/i.test(description.trim()))) {
      return { kind: "invalid-credential" };
    }
    if (code >= 500) return { kind: "transport-failure", reason: `${code}: ${description}` };
    return { kind: "rejected", reason: `${code}: ${description}` };
  }
  return { kind: "transport-failure", reason: errorMessage(error) };
}

export function describeOutcome(outcome: DispatchOutcome): string {
  switch (outcome.kind) {
    case "delivered":
      return "доставлено";
    case "rate-limited":
      return `Rate Limit: Telegram просит подождать ${(outcome.retryAfterMs / 1000).toFixed(1)} сек.`;
    case "invalid-credential":
      return "токен бота недействителен";
    case "rejected":
      return `Telegram отклонил запрос: ${outcome.reason}`;
    case "transport-failure":
      return `ошибка сети: ${outcome.reason}`;
  }
}
