import type { Telegraf } from "telegraf";
import type { MyContext } from "../../shared/types.js";
import { denyUnlessAdmin } from "../../app/middlewares/auth.js";
import { respond } from "../../app/ui/respond.js";
import { commandPayload } from "../dispatch/dispatch.args.js";
import { getBotInfo, setBotDescription, setBotName, setBotShortDescription, type ProfileApi } from "./profile.service.js";

function payloadOf(ctx: MyContext) {
  const m = ctx.message;
  return commandPayload(m && "text" in m ? m.text : "");
}

export function registerProfileActions(bot: Telegraf<MyContext>) {
  const api: ProfileApi = bot.telegram;

  bot.command("info", async (ctx) => {
    if (await denyUnlessAdmin(ctx)) return;
    const res = await getBotInfo(api);
    await respond(ctx, res.message, res.ok ? { parseMode: "HTML" } : {});
  });

  bot.command("setname", async (ctx) => {
    if (await denyUnlessAdmin(ctx)) return;
    const res = await setBotName(api, payloadOf(ctx));
    await respond(ctx, res.message);
  });

  bot.command("setdesc", async (ctx) => {
    if (await denyUnlessAdmin(ctx)) return;
    const res = await setBotDescription(api, payloadOf(ctx));
    await respond(ctx, res.message);
  });

  bot.command("setabout", async (ctx) => {
    if (await denyUnlessAdmin(ctx)) return;
    const res = await setBotShortDescription(api, payloadOf(ctx));
    await respond(ctx, res.message);
  });
}
