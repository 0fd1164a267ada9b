import type { MiddlewareFn } from "telegraf";
import type { MyContext } from "../../shared/types.js";
import { logError } from "../../shared/logger.js";
import { appendReceivedLine } from "../../features/updates/receivedLog.service.js";
import { formatUpdateLogEntry } from "../../features/updates/updateLog.js";

/** Appends every incoming update to the received-data log that recipient discovery reads. */
export function receivedLog(logPath: string): MiddlewareFn<MyContext> {
  return async (ctx, next) => {
    try {
      await appendReceivedLine(logPath, formatUpdateLogEntry(ctx.update));
    } catch (e) {
      logError("receivedLog.append", e, { updateId: ctx.update.update_id, logPath });
    }
    return next();
  };
}
