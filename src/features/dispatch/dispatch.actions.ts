import type { Telegraf } from "telegraf";
import type { MyContext } from "../../shared/types.js";
import { cfg } from "../../shared/config.js";
import { RECIPIENTS_PREVIEW_COUNT } from "../../shared/constants.js";
import { logError, logTelegramError } from "../../shared/logger.js";
import { denyUnlessAdmin } from "../../app/middlewares/auth.js";
import { respond } from "../../app/ui/respond.js";
import { discoverRecipients } from "../recipients/discovery.service.js";
import { recipientKey } from "../recipients/recipient.js";
import { NO_RECIPIENTS_MESSAGE, runCyclicBroadcast } from "./cyclic.service.js";
import { commandPayload, parseBroadcastArgs, parseSendArgs, parseSpamArgs } from "./dispatch.args.js";
import { BUSY_MESSAGE, type DispatchResult } from "./dispatch.service.js";
import { createLogReporter } from "./reporter.js";
import { sendSingleMessage } from "./send.service.js";
import { sessions } from "./session.state.js";
import { runSingleTarget } from "./singleTarget.service.js";
import { formatStatus } from "./summary.js";
import { createTelegramTransport } from "./transport.js";

function messageText(ctx: MyContext): string {
  const m = ctx.message;
  return m && "text" in m ? m.text : "";
}

// Loops outlive the update handler, so the summary is sent as a new message.
function runDetached(
  bot: Telegraf<MyContext>,
  chatId: number | undefined,
  scope: string,
  job: () => Promise<DispatchResult>
) {
  void job().then(
    async (result) => {
      if (!chatId) return;
      try {
        await bot.telegram.sendMessage(chatId, result.message);
      } catch (e) {
        logTelegramError(`${scope}.summary`, e, { chatId });
      }
    },
    (e: unknown) => logError(scope, e)
  );
}

export function registerDispatchActions(bot: Telegraf<MyContext>) {
  const transport = createTelegramTransport(bot.telegram);
  const reporter = createLogReporter("dispatch.progress");

  bot.command("send", async (ctx) => {
    if (await denyUnlessAdmin(ctx)) return;
    const args = parseSendArgs(commandPayload(messageText(ctx)));
    if (!args.ok) return respond(ctx, args.error);

    const result = await sendSingleMessage(transport, args.value.recipient, args.value.text, {
      logPath: cfg.receivedLogPath,
    });
    await respond(ctx, result.message);
  });

  bot.command("spam", async (ctx) => {
    if (await denyUnlessAdmin(ctx)) return;
    if (sessions.active()) return respond(ctx, BUSY_MESSAGE);
    const args = parseSpamArgs(commandPayload(messageText(ctx)));
    if (!args.ok) return respond(ctx, args.error);

    const input = args.value;
    await respond(ctx, `Запускаю спам в ${input.recipient}: ${input.count} сообщений. Итог пришлю отдельным сообщением.`);
    runDetached(bot, ctx.chat?.id, "dispatch.spam", () => runSingleTarget({ transport, reporter }, input));
  });

  bot.command("broadcast", async (ctx) => {
    if (await denyUnlessAdmin(ctx)) return;
    if (sessions.active()) return respond(ctx, BUSY_MESSAGE);
    const args = parseBroadcastArgs(commandPayload(messageText(ctx)));
    if (!args.ok) return respond(ctx, args.error);

    const { recipients } = await discoverRecipients(cfg.receivedLogPath);
    if (recipients.length === 0) return respond(ctx, NO_RECIPIENTS_MESSAGE);

    const input = { ...args.value, recipients };
    await respond(
      ctx,
      `Запускаю массовую рассылку по ${recipients.length} чатам на ${input.durationMinutes} мин. ` +
        "Это может привести к бану бота. Итог пришлю отдельным сообщением."
    );
    runDetached(bot, ctx.chat?.id, "dispatch.broadcast", () => runCyclicBroadcast({ transport, reporter }, input));
  });

  bot.command("recipients", async (ctx) => {
    if (await denyUnlessAdmin(ctx)) return;
    const { recipients, logFound } = await discoverRecipients(cfg.receivedLogPath);
    if (!logFound) return respond(ctx, `Лог ${cfg.receivedLogPath} ещё не создан. ${NO_RECIPIENTS_MESSAGE}`);
    if (recipients.length === 0) return respond(ctx, NO_RECIPIENTS_MESSAGE);

    const keys = recipients.map(recipientKey);
    const preview = keys.slice(0, RECIPIENTS_PREVIEW_COUNT).join(", ");
    const more = keys.length > RECIPIENTS_PREVIEW_COUNT ? ` ...и еще ${keys.length - RECIPIENTS_PREVIEW_COUNT}` : "";
    await respond(ctx, `Найдено ${keys.length} уникальных ID/юзернеймов: ${preview}${more}`);
  });

  bot.command("status", async (ctx) => {
    if (await denyUnlessAdmin(ctx)) return;
    await respond(ctx, formatStatus(sessions.active(), Date.now()));
  });
}
