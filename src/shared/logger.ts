import { TelegramError } from "telegraf";

type Extra = Record<string, unknown>;

export function logError(scope: string, error: unknown, extra?: Extra) {
  const msg = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;
  const payload = { scope, msg, ...(extra || {}) };
  try {
    console.error(`[${new Date().toISOString()}]`, payload);
    if (stack) console.error(stack);
  } catch {
    console.error("logError-fallback", scope, msg);
  }
}

export function logWarn(scope: string, message: string, extra?: Extra) {
  try {
    console.warn(`[${new Date().toISOString()}]`, { scope, message, ...(extra || {}) });
  } catch {
    console.error("logWarn-fallback", scope, message);
  }
}

export function logInfo(scope: string, message: string, extra?: Extra) {
  try {
    console.log(`[${new Date().toISOString()}]`, { scope, message, ...(extra || {}) });
  } catch {
    console.error("logInfo-fallback", scope, message);
  }
}

// Expected Telegram API answers when replying to an admin chat
export function isBenignTelegramError(e: unknown): boolean {
  const d = e instanceof TelegramError ? e.response.description : e instanceof Error ? e.message : "";
  const s = d.toLowerCase();
  return (
    s.includes("bot was blocked by the user") ||
    s.includes("message is not modified") ||
    s.includes("message to edit not found")
  );
}

export function logTelegramError(scope: string, error: unknown, extra?: Extra) {
  if (isBenignTelegramError(error)) return;
  logError(scope, error, extra);
}
