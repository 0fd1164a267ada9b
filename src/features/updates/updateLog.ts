import type { Message, Update } from "telegraf/types";
import { truncateText } from "../../shared/utils.js";
import type { Recipient } from "../recipients/recipient.js";

type MaybeSize = number | undefined;

function userLabel(username: string | undefined) {
  return username ? `@${username}` : "no username";
}

function sizeLabel(size: MaybeSize) {
  return size ?? "N/A";
}

// Titles are free text; field separators and markers are blanked so a title never reads as a reference field.
function safeTitle(title: string) {
  return title.replace(/[;():='\r\n]/g, " ");
}

function chatLabel(chat: Message["chat"]) {
  if ("username" in chat && chat.username) return `@${chat.username}`;
  if ("title" in chat && chat.title) return safeTitle(chat.title);
  return "Private";
}

export function describeContent(msg: Message): string {
  if ("text" in msg) return `Text: '${truncateText(msg.text)}'`;
  if ("sticker" in msg) return `Sticker: ID=${msg.sticker.file_id}, Emoji=${msg.sticker.emoji ?? "-"}`;
  if ("photo" in msg) {
    const photo = msg.photo[msg.photo.length - 1];
    if (!photo) return "Photo: empty";
    return `Photo: ID=${photo.file_id}, Size=${photo.width}x${photo.height}, FileSize=${sizeLabel(photo.file_size)}`;
  }
  if ("document" in msg) {
    const doc = msg.document;
    return `Document: Name='${doc.file_name ?? ""}', MIME=${doc.mime_type ?? "-"}, ID=${doc.file_id}, FileSize=${sizeLabel(doc.file_size)}`;
  }
  if ("audio" in msg) {
    const a = msg.audio;
    return `Audio: Name='${a.file_name ?? ""}', Title='${a.title ?? ""}', Performer='${a.performer ?? ""}', MIME=${a.mime_type ?? "-"}, ID=${a.file_id}, FileSize=${sizeLabel(a.file_size)}`;
  }
  if ("video" in msg) {
    const v = msg.video;
    return `Video: Name='${v.file_name ?? ""}', MIME=${v.mime_type ?? "-"}, ID=${v.file_id}, FileSize=${sizeLabel(v.file_size)}`;
  }
  if ("voice" in msg) {
    const v = msg.voice;
    return `Voice: MIME=${v.mime_type ?? "-"}, ID=${v.file_id}, FileSize=${sizeLabel(v.file_size)}`;
  }
  return "Other message type";
}

/**
 * One received-data log line per update. Reference fields (`Chat:`, `Sender:`,
 * `CallbackQuery: From=`) always precede the free-text part so recipient
 * discovery can cut the line at `Content:` / `Data='`.
 */
export function formatUpdateLogEntry(update: Update): string {
  const head = `INCOMING; UpdateID: ${update.update_id}; `;

  if ("message" in update) {
    const msg = update.message;
    const chat = `Chat: ${msg.chat.id} (${chatLabel(msg.chat)})`;
    const sender = msg.from
      ? `Sender: ${msg.from.id} (${userLabel(msg.from.username)})`
      : "Sender: unknown";
    return `${head}${chat}; ${sender}; Content: ${describeContent(msg)}`;
  }

  if ("edited_message" in update) {
    const m = update.edited_message;
    return `${head}Edited Message: ChatID=${m.chat.id}, MsgID=${m.message_id}`;
  }

  if ("callback_query" in update) {
    const q = update.callback_query;
    const data = "data" in q ? q.data : "";
    const msgId = q.message ? q.message.message_id : "?";
    return `${head}CallbackQuery: From=${q.from.id} (${userLabel(q.from.username)}), Data='${data}', MsgID=${msgId}`;
  }

  const kinds = Object.keys(update).filter((k) => k !== "update_id");
  return `${head}Unknown update type: ${kinds.join(",") || "empty"}`;
}

export function formatOutgoingLogEntry(recipient: Recipient, text: string): string {
  const chat = recipient.kind === "chat-id" ? recipient.id : `(${recipient.handle})`;
  return `OUTGOING; Chat: ${chat}; Content: Text: '${truncateText(text)}'`;
}
