import type { MiddlewareFn } from "telegraf";
import type { MyContext } from "../../shared/types.js";
import { logInfo } from "../../shared/logger.js";

function commandOf(ctx: MyContext): string | undefined {
  const m = ctx.message;
  if (!m || !("text" in m) || !m.text.startsWith("/")) return undefined;
  return m.text.split(/[\s@]/, 1)[0];
}

/** Logs every update once its handlers are done, with the time they took. */
export const traceUpdates: MiddlewareFn<MyContext> = async (ctx, next) => {
  const started = Date.now();
  await next();
  logInfo("bot.update", ctx.updateType, {
    from: ctx.from?.id ?? null,
    chatId: ctx.chat?.id ?? null,
    command: commandOf(ctx),
    ms: Date.now() - started,
  });
};
