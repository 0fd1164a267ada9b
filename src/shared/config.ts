import dotenv from "dotenv";
dotenv.config({ path: ".env" });

function parseFlag(raw: string | undefined, fallback: boolean) {
  if (raw === undefined || raw.trim() === "") return fallback;
  return !["0", "false", "no", "off"].includes(raw.trim().toLowerCase());
}

export function parseAdminIds(raw: string | undefined): number[] {
  return (raw || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number)
    .filter((n) => Number.isSafeInteger(n));
}

export const cfg = Object.freeze({
  botToken: process.env.BOT_TOKEN || "",
  adminIds: parseAdminIds(process.env.ADMIN_IDS),
  receivedLogPath: process.env.RECEIVED_LOG_PATH || "bot_logs/received_data.log",
  updatesLogEnabled: parseFlag(process.env.UPDATES_LOG_ENABLED, true),
});
