export type Recipient =
  | { readonly kind: "chat-id"; readonly id: string }
  | { readonly kind: "handle"; readonly handle: string };

const CHAT_ID_RE = /^-?\d+$/;

/** Accepts a decimal chat id (`-100123`) or a handle with or without the leading `@`. */
export function parseRecipient(raw: string): Recipient | null {
  const s = raw.trim();
  if (!s) return null;
  if (CHAT_ID_RE.test(s)) return chatIdRecipient(s);
  const bare = s.replace(/^@+/, "");
  if (!bare || /\s/.test(bare)) return null;
  return { kind: "handle", handle: `@${bare}` };
}

export function chatIdRecipient(id: string): Recipient {
  return { kind: "chat-id", id };
}

export function handleRecipient(name: string): Recipient {
  return { kind: "handle", handle: name.startsWith("@") ? name : `@${name}` };
}

export function recipientKey(r: Recipient): string {
  return r.kind === "chat-id" ? r.id : r.handle;
}

export function toChatId(r: Recipient): number | string {
  return r.kind === "chat-id" ? Number(r.id) : r.handle;
}

/** Drops duplicates, keeping the first occurrence. */
export function uniqueRecipients(list: Iterable<Recipient>): Recipient[] {
  const seen = new Map<string, Recipient>();
  for (const r of list) {
    const key = recipientKey(r);
    if (!seen.has(key)) seen.set(key, r);
  }
  return [...seen.values()];
}
