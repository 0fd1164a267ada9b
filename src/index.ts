import { cfg } from "./shared/config.js";
import { logError, logInfo } from "./shared/logger.js";
import { initBot } from "./app/bot.js";

async function main() {
  if (!cfg.botToken) {
    console.error("Добавьте токен бота в файл .env (BOT_TOKEN=...)");
    process.exit(1);
  }
  if (cfg.adminIds.length === 0) {
    console.warn("ADMIN_IDS пуст: команды управления будут недоступны");
  }

  const { bot } = initBot(cfg.botToken);
  process.once("SIGINT", () => bot.stop("SIGINT"));
  process.once("SIGTERM", () => bot.stop("SIGTERM"));

  logInfo("main", "Бот запущен (long polling)", { receivedLog: cfg.receivedLogPath });
  await bot.launch();
}

main().catch((e: unknown) => {
  logError("main.fatal", e);
  process.exit(1);
});
