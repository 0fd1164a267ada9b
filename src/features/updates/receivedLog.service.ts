import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { formatTimestamp } from "../../shared/utils.js";

export function formatLogRecord(line: string, now: Date) {
  return `${formatTimestamp(now)} - ${line}\n`;
}

export async function appendReceivedLine(logPath: string, line: string, now = new Date()) {
  await mkdir(dirname(logPath), { recursive: true });
  await appendFile(logPath, formatLogRecord(line, now), "utf-8");
}
