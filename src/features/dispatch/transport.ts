import { logWarn } from "../../shared/logger.js";
import { recipientKey, toChatId, type Recipient } from "../recipients/recipient.js";
import { classifySendError, DELIVERED, type DispatchOutcome } from "./outcome.js";

export type ParseMode = "HTML" | "Markdown" | "MarkdownV2";

export interface TransportPort {
  deliver(recipient: Recipient, text: string, parseMode?: ParseMode): Promise<DispatchOutcome>;
}

/** The slice of telegraf's `Telegram` client a transport needs. */
export interface MessageSender {
  sendMessage(chatId: number | string, text: string, extra?: { parse_mode?: ParseMode }): Promise<unknown>;
}

export function createTelegramTransport(telegram: MessageSender): TransportPort {
  return {
    async deliver(recipient, text, parseMode) {
      try {
        await telegram.sendMessage(toChatId(recipient), text, parseMode ? { parse_mode: parseMode } : {});
        return DELIVERED;
      } catch (e) {
        const outcome = classifySendError(e);
        if (outcome.kind === "rate-limited") {
          logWarn("dispatch.transport", "rate limited", {
            chatId: recipientKey(recipient),
            retryAfterMs: outcome.retryAfterMs,
          });
        }
        return outcome;
      }
    },
  };
}
