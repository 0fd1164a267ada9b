import type { CyclicInput } from "./cyclic.service.js";
import type { SingleTargetInput } from "./singleTarget.service.js";

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

export const USAGE = {
  send: "Использование: /send <ID чата или @юзернейм> <текст>",
  spam: "Использование: /spam <ID чата или @юзернейм> <кол-во> <задержка, сек> <текст>",
  broadcast: "Использование: /broadcast <задержка, сек> <длительность, мин> <текст>",
} as const;

/** Text after `/command` or `/command@bot`, with line breaks of the message body kept. */
export function commandPayload(text: string): string {
  return text.replace(/^\/[A-Za-z0-9_]+(?:@[A-Za-z0-9_]+)?\s*/, "");
}

export function parseNumber(raw: string): number {
  const s = raw.trim().replace(",", ".");
  return /^-?\d+(?:\.\d+)?$/.test(s) ? Number(s) : Number.NaN;
}

function splitArgs(payload: string, count: number): { args: string[]; rest: string } | null {
  const args: string[] = [];
  let rest = payload.trimStart();
  for (let i = 0; i < count; i++) {
    const m = /^(\S+)(?:\s+|$)/.exec(rest);
    if (!m) return null;
    args.push(m[1]);
    rest = rest.slice(m[0].length);
  }
  return { args, rest };
}

export function parseSendArgs(payload: string): Parsed<{ recipient: string; text: string }> {
  const split = splitArgs(payload, 1);
  if (!split || !split.rest.trim()) return { ok: false, error: USAGE.send };
  return { ok: true, value: { recipient: split.args[0], text: split.rest } };
}

export function parseSpamArgs(payload: string): Parsed<SingleTargetInput> {
  const split = splitArgs(payload, 3);
  if (!split || !split.rest.trim()) return { ok: false, error: USAGE.spam };
  const [recipient, countRaw, delayRaw] = split.args;
  const count = parseNumber(countRaw);
  const delaySec = parseNumber(delayRaw);
  if (Number.isNaN(count)) return { ok: false, error: `Количество должно быть числом. ${USAGE.spam}` };
  if (Number.isNaN(delaySec)) return { ok: false, error: `Задержка должна быть числом. ${USAGE.spam}` };
  return { ok: true, value: { recipient, count, delaySec, text: split.rest } };
}

export function parseBroadcastArgs(payload: string): Parsed<Omit<CyclicInput, "recipients">> {
  const split = splitArgs(payload, 2);
  if (!split || !split.rest.trim()) return { ok: false, error: USAGE.broadcast };
  const [delayRaw, durationRaw] = split.args;
  const delaySec = parseNumber(delayRaw);
  const durationMinutes = parseNumber(durationRaw);
  if (Number.isNaN(delaySec)) return { ok: false, error: `Задержка должна быть числом. ${USAGE.broadcast}` };
  if (Number.isNaN(durationMinutes)) {
    return { ok: false, error: `Длительность должна быть числом. ${USAGE.broadcast}` };
  }
  return { ok: true, value: { delaySec, durationMinutes, text: split.rest } };
}
