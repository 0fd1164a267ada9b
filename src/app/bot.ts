import { Telegraf } from "telegraf";
import type { MyContext } from "../shared/types.js";
import { cfg } from "../shared/config.js";
import { registerRouter } from "./router.js";
import { auth } from "./middlewares/auth.js";
import { receivedLog } from "./middlewares/receivedLog.js";
import { traceUpdates } from "./middlewares/trace.js";

export function initBot(token: string) {
  const bot = new Telegraf<MyContext>(token);
  bot.use(traceUpdates);
  if (cfg.updatesLogEnabled) bot.use(receivedLog(cfg.receivedLogPath));
  bot.use(auth);
  registerRouter(bot);

  return { bot };
}
