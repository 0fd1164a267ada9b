import { TEXT_PREVIEW_LIMIT, TEXT_PREVIEW_SUFFIX } from "./constants.js";

export function truncateText(text: string, limit = TEXT_PREVIEW_LIMIT): string {
  return text.length > limit ? text.slice(0, limit) + TEXT_PREVIEW_SUFFIX : text;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatSeconds(ms: number, digits = 2): string {
  return (ms / 1000).toFixed(digits);
}

export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function escapeHtml(s = "") {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
