export type { ArchiveBackend } from "./types";
export { BACKENDS, getBackend } from "./registry";
export { buildUrl, parseRateLimitHeaders, sendJson, type SendJsonOptions } from "./http";
export { pullPushBackend } from "./pullpush";
export { arcticShiftBackend } from "./arctic_shift";
