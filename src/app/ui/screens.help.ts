import { USAGE } from "../../features/dispatch/dispatch.args.js";
import { escapeHtml } from "../../shared/utils.js";

const COMMANDS = [
  "/info - информация о боте",
  "/setname <имя> - сменить имя",
  "/setdesc <текст> - сменить описание",
  "/setabout <текст> - сменить короткое описание",
  "",
  "/recipients - сколько чатов найдено в логе",
  "/status - состояние текущей рассылки",
  "",
  USAGE.send,
  USAGE.spam,
  USAGE.broadcast,
];

export function renderHelpScreen() {
  return {
    text: ["<b>Управление ботом</b>", "", ...COMMANDS.map((l) => escapeHtml(l))].join("\n"),
    parseMode: "HTML" as const,
  };
}
