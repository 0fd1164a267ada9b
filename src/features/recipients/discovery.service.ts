import { readFile } from "node:fs/promises";
import { logError, logInfo, logWarn } from "../../shared/logger.js";
import { chatIdRecipient, handleRecipient, recipientKey, uniqueRecipients, type Recipient } from "./recipient.js";

type Pattern = { re: RegExp; make: (match: string) => Recipient };

const HANDLE = "([A-Za-z0-9_]+)";

const PATTERNS: Pattern[] = [
  { re: /Chat: (-?\d+)/, make: chatIdRecipient },
  { re: new RegExp(`Chat: [^;()]*\\(@${HANDLE}\\)`), make: handleRecipient },
  { re: /Sender: (\d+)/, make: chatIdRecipient },
  { re: new RegExp(`Sender: [^;()]*\\(@${HANDLE}\\)`), make: handleRecipient },
  { re: /CallbackQuery: From=(\d+)/, make: chatIdRecipient },
  { re: new RegExp(`CallbackQuery: From=[^;(),]*\\(@${HANDLE}\\)`), make: handleRecipient },
];

// Free text echoed into a line starts at one of these markers and is never searched.
const PAYLOAD_MARKERS = ["Content:", "Data='"];

export function referencePart(line: string): string {
  let cut = line.length;
  for (const marker of PAYLOAD_MARKERS) {
    const at = line.indexOf(marker);
    if (at !== -1 && at < cut) cut = at;
  }
  return line.slice(0, cut);
}

export function extractRecipients(lines: Iterable<string>): Recipient[] {
  const found: Recipient[] = [];
  for (const line of lines) {
    const head = referencePart(line);
    for (const { re, make } of PATTERNS) {
      const m = re.exec(head);
      if (m) found.push(make(m[1]));
    }
  }
  return uniqueRecipients(found);
}

export type DiscoveryResult = {
  recipients: Recipient[];
  logFound: boolean;
};

function isMissingFile(e: unknown) {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export async function discoverRecipients(logPath: string): Promise<DiscoveryResult> {
  let content: string;
  try {
    content = await readFile(logPath, "utf-8");
  } catch (e) {
    if (isMissingFile(e)) {
      logWarn("recipients.discover", "received-data log not found", { logPath });
      return { recipients: [], logFound: false };
    }
    logError("recipients.discover.read", e, { logPath });
    return { recipients: [], logFound: true };
  }

  const recipients = extractRecipients(content.split(/\r?\n/));
  logInfo("recipients.discover", `extracted ${recipients.length} unique recipients`, {
    logPath,
    recipients: recipients.map(recipientKey),
  });
  return { recipients, logFound: true };
}
