import { TelegramError } from "telegraf";
import {
  BOT_DESCRIPTION_MAX_LEN,
  BOT_NAME_MAX_LEN,
  BOT_SHORT_DESCRIPTION_MAX_LEN,
} from "../../shared/constants.js";
import { logError, logInfo } from "../../shared/logger.js";
import { errorMessage, escapeHtml } from "../../shared/utils.js";
import { classifySendError } from "../dispatch/outcome.js";

export type BotIdentity = {
  id: number;
  first_name: string;
  username: string;
  can_join_groups: boolean;
  can_read_all_group_messages: boolean;
  supports_inline_queries: boolean;
};

/** The slice of telegraf's `Telegram` client used for profile management. */
export interface ProfileApi {
  getMe(): Promise<BotIdentity>;
  setMyName(name: string): Promise<unknown>;
  setMyDescription(description: string): Promise<unknown>;
  setMyShortDescription(shortDescription: string): Promise<unknown>;
}

export type ProfileResult = { ok: boolean; message: string };

const INVALID_TOKEN_MESSAGE = "Ошибка! Токен недействительный. Проверь и введи правильный.";

function failure(scope: string, action: string, e: unknown): ProfileResult {
  logError(scope, e);
  if (classifySendError(e).kind === "invalid-credential") return { ok: false, message: INVALID_TOKEN_MESSAGE };
  const detail = e instanceof TelegramError ? e.response.description : errorMessage(e);
  return { ok: false, message: `Ошибка при ${action}: ${detail}` };
}

const yesNo = (v: boolean) => (v ? "Да" : "Нет");

export function formatBotInfo(me: BotIdentity): string {
  return [
    "<b>Инфа о боте:</b>",
    `ID: <code>${me.id}</code>`,
    `Имя: ${escapeHtml(me.first_name)}`,
    `Юзернейм: @${escapeHtml(me.username)}`,
    `Может присоединяться к группам: ${yesNo(me.can_join_groups)}`,
    `Читает все сообщения в группе: ${yesNo(me.can_read_all_group_messages)}`,
    `Поддерживает инлайн-запросы: ${yesNo(me.supports_inline_queries)}`,
  ].join("\n");
}

export async function getBotInfo(api: ProfileApi): Promise<ProfileResult> {
  try {
    const me = await api.getMe();
    logInfo("profile.info", `got bot info @${me.username}`);
    return { ok: true, message: formatBotInfo(me) };
  } catch (e) {
    return failure("profile.info", "получении инфы о боте", e);
  }
}

export async function setBotName(api: ProfileApi, name: string): Promise<ProfileResult> {
  const value = name.trim().slice(0, BOT_NAME_MAX_LEN);
  if (!value) return { ok: false, message: "Имя бота не указано." };
  try {
    await api.setMyName(value);
    logInfo("profile.name", "bot name changed", { name: value });
    return { ok: true, message: `Имя бота успешно изменено на: ${value}` };
  } catch (e) {
    return failure("profile.name", "смене имени", e);
  }
}

export async function setBotDescription(api: ProfileApi, description: string): Promise<ProfileResult> {
  const value = description.trim().slice(0, BOT_DESCRIPTION_MAX_LEN);
  try {
    await api.setMyDescription(value);
    logInfo("profile.description", "bot description changed", { length: value.length });
    return { ok: true, message: "Описание бота успешно изменено." };
  } catch (e) {
    return failure("profile.description", "смене описания", e);
  }
}

export async function setBotShortDescription(api: ProfileApi, about: string): Promise<ProfileResult> {
  const value = about.trim().slice(0, BOT_SHORT_DESCRIPTION_MAX_LEN);
  try {
    await api.setMyShortDescription(value);
    logInfo("profile.about", "bot short description changed", { length: value.length });
    return { ok: true, message: "Короткое описание ('О себе') бота успешно изменено." };
  } catch (e) {
    return failure("profile.about", "смене короткого описания", e);
  }
}
