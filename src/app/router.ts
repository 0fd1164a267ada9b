import type { Telegraf } from "telegraf";
import type { MyContext } from "../shared/types.js";
import { logError } from "../shared/logger.js";
import { registerDispatchActions } from "../features/dispatch/dispatch.actions.js";
import { registerProfileActions } from "../features/profile/profile.actions.js";
import { denyUnlessAdmin } from "./middlewares/auth.js";
import { respond } from "./ui/respond.js";
import { renderHelpScreen } from "./ui/screens.help.js";

async function showHelp(ctx: MyContext) {
  if (await denyUnlessAdmin(ctx)) return;
  const view = renderHelpScreen();
  await respond(ctx, view.text, { parseMode: view.parseMode });
}

export function registerRouter(bot: Telegraf<MyContext>) {
  bot.start(showHelp);
  bot.help(showHelp);

  bot.catch((err, ctx) => {
    logError("bot.catch", err, { updateId: ctx.update.update_id });
  });

  registerProfileActions(bot);
  registerDispatchActions(bot);
}
