import type { MyContext } from "../../shared/types.js";
import { logTelegramError } from "../../shared/logger.js";

type RespondOpts = {
  parseMode?: "Markdown" | "HTML";
};

/** Plain text by default: summaries carry Telegram error descriptions verbatim. */
export async function respond(ctx: MyContext, text: string, opts: RespondOpts = {}) {
  try {
    await ctx.reply(text, opts.parseMode ? { parse_mode: opts.parseMode } : {});
  } catch (e) {
    logTelegramError("respond.reply", e, { chatId: ctx.chat?.id });
  }
}
