import { TelegramError } from "telegraf";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  getBotInfo,
  setBotDescription,
  setBotName,
  setBotShortDescription,
  type BotIdentity,
  type ProfileApi,
} from "../../src/features/profile/profile.service.js";

const identity: BotIdentity = {
  id: 42,
  first_name: "Test & Bot",
  username: "test_bot",
  can_join_groups: true,
  can_read_all_group_messages: false,
  supports_inline_queries: false,
};

function fakeApi() {
  return {
    getMe: vi.fn<ProfileApi["getMe"]>(async () => identity),
    setMyName: vi.fn<ProfileApi["setMyName"]>(async () => true),
    setMyDescription: vi.fn<ProfileApi["setMyDescription"]>(async () => true),
    setMyShortDescription: vi.fn<ProfileApi["setMyShortDescription"]>(async () => true),
  } satisfies ProfileApi;
}

describe("bot profile", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("renders bot info as HTML", async () => {
    expect(await getBotInfo(fakeApi())).toEqual({
      ok: true,
      message: [
        "<b>Инфа о боте:</b>",
        "ID: <code>42</code>",
        "Имя: Test &amp; Bot",
        "Юзернейм: @test_bot",
        "Может присоединяться к группам: Да",
        "Читает все сообщения в группе: Нет",
        "Поддерживает инлайн-запросы: Нет",
      ].join("\n"),
    });
  });

  it("reports network errors while reading info", async () => {
    const api = fakeApi();
    api.getMe.mockRejectedValueOnce(new Error("socket hang up"));
    expect(await getBotInfo(api)).toEqual({ ok: false, message: "Ошибка при получении инфы о боте: socket hang up" });
  });

  it("trims and caps the bot name", async () => {
    const api = fakeApi();
    const name = "n".repeat(64);

    expect(await setBotName(api, `  ${"n".repeat(70)}`)).toEqual({
      ok: true,
      message: `Имя бота успешно изменено на: ${name}`,
    });
    expect(api.setMyName).toHaveBeenCalledWith(name);
  });

  it("refuses an empty name", async () => {
    const api = fakeApi();
    expect(await setBotName(api, "   ")).toEqual({ ok: false, message: "Имя бота не указано." });
    expect(api.setMyName).not.toHaveBeenCalled();
  });

  it("caps descriptions", async () => {
    const api = fakeApi();
    await setBotDescription(api, "d".repeat(600));
    await setBotShortDescription(api, "s".repeat(200));

    expect(api.setMyDescription).toHaveBeenCalledWith("d".repeat(512));
    expect(api.setMyShortDescription).toHaveBeenCalledWith("s".repeat(120));
  });

  it("names an invalid token", async () => {
    const api = fakeApi();
    api.setMyDescription.mockRejectedValueOnce(new TelegramError({ error_code: 401, description: "Unauthorized" }));
    expect(await setBotDescription(api, "about")).toEqual({
      ok: false,
      message: "Ошибка! Токен недействительный. Проверь и введи правильный.",
    });
  });

  it("passes other api errors through", async () => {
    const api = fakeApi();
    api.setMyShortDescription.mockRejectedValueOnce(
      new TelegramError({ error_code: 400, description: "Bad Request: description is too long" })
    );
    expect(await setBotShortDescription(api, "about")).toEqual({
      ok: false,
      message: "Ошибка при смене короткого описания: Bad Request: description is too long",
    });
  });
});
