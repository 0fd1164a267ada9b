export const TEXT_PREVIEW_LIMIT = 150;
export const TEXT_PREVIEW_SUFFIX = "...";

export const DEADLINE_POLL_MS = 100;
export const MIN_CYCLE_MS = 1000;
export const DEFAULT_RETRY_AFTER_MS = 1000;

// Bot API limits for profile texts
export const BOT_NAME_MAX_LEN = 64;
export const BOT_DESCRIPTION_MAX_LEN = 512;
export const BOT_SHORT_DESCRIPTION_MAX_LEN = 120;

export const STATUS_PREVIEW_LIMIT = 40;
export const RECIPIENTS_PREVIEW_COUNT = 10;
