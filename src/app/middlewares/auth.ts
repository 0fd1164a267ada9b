import type { MiddlewareFn } from "telegraf";
import type { MyContext } from "../../shared/types.js";
import { cfg } from "../../shared/config.js";
import { logTelegramError } from "../../shared/logger.js";

export function isAdminId(tgId: number, adminIds: readonly number[] = cfg.adminIds) {
  return adminIds.includes(tgId);
}

export const auth: MiddlewareFn<MyContext> = async (ctx, next) => {
  ctx.state.isAdmin = ctx.from ? isAdminId(ctx.from.id) : false;
  return next();
};

/** Replies to non-admins and returns `true` when the handler must stop. */
export async function denyUnlessAdmin(ctx: MyContext): Promise<boolean> {
  if (ctx.state.isAdmin) return false;
  try {
    await ctx.reply("Только для админа");
  } catch (e) {
    logTelegramError("auth.deny.reply", e);
  }
  return true;
}
