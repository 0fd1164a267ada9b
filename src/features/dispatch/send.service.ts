import { logError, logInfo } from "../../shared/logger.js";
import { parseRecipient, recipientKey } from "../recipients/recipient.js";
import { appendReceivedLine } from "../updates/receivedLog.service.js";
import { formatOutgoingLogEntry } from "../updates/updateLog.js";
import { describeOutcome } from "./outcome.js";
import type { ParseMode, TransportPort } from "./transport.js";

export type SendResult = { ok: boolean; message: string };

export async function sendSingleMessage(
  transport: TransportPort,
  rawRecipient: string,
  text: string,
  opts: { logPath?: string; parseMode?: ParseMode } = {}
): Promise<SendResult> {
  if (!rawRecipient.trim()) return { ok: false, message: "ID чата не указан." };
  if (!text.trim()) return { ok: false, message: "Текст сообщения пустой." };
  const recipient = parseRecipient(rawRecipient);
  if (!recipient) return { ok: false, message: `Некорректный ID чата или юзернейм: ${rawRecipient.trim()}` };

  const key = recipientKey(recipient);
  const outcome = await transport.deliver(recipient, text, opts.parseMode ?? "HTML");

  if (outcome.kind !== "delivered") {
    const message =
      outcome.kind === "rejected"
        ? `Ошибка при отправке в ${key}: ${describeOutcome(outcome)}. Проверь ID/юзернейм и права бота.`
        : `Ошибка при отправке в ${key}: ${describeOutcome(outcome)}`;
    return { ok: false, message };
  }

  logInfo("dispatch.send", "message sent", { chatId: key });
  if (opts.logPath) {
    try {
      await appendReceivedLine(opts.logPath, formatOutgoingLogEntry(recipient, text));
    } catch (e) {
      logError("dispatch.send.log-outgoing", e, { chatId: key });
    }
  }
  return { ok: true, message: `Сообщение отправлено в чат ${key}` };
}
