import { env } from "./env";

export const PROJECT_NAME = "nl-query-engine";
export const PORT_BACKEND = env.PORT;

export const DATABASE_URL = env.DATABASE_URL;
export const DOCUMENTS_DATABASE_URL = env.DOCUMENTS_DATABASE_URL;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export const LOG_LEVEL: LogLevel =
  LOG_LEVELS.find((level) => level === env.LOG_LEVEL.toLowerCase()) ?? "info";

export const CACHE_TTL_MS = positive(env.CACHE_TTL_MS, 300_000);
export const CACHE_MAX_ENTRIES = positive(env.CACHE_MAX_ENTRIES, 1000);

export const MAX_PAGE_SIZE = positive(env.MAX_PAGE_SIZE, 200);
export const DEFAULT_PAGE_SIZE = Math.min(positive(env.DEFAULT_PAGE_SIZE, 50), MAX_PAGE_SIZE);

export const SAMPLE_ROWS = positive(env.SAMPLE_ROWS, 25);
export const SAMPLE_VALUES_PER_COLUMN = positive(env.SAMPLE_VALUES_PER_COLUMN, 20);
export const ENABLE_FK_INFERENCE = env.ENABLE_FK_INFERENCE;

export const MATCH_THRESHOLD =
  env.MATCH_THRESHOLD > 0 && env.MATCH_THRESHOLD <= 1 ? env.MATCH_THRESHOLD : 0.8;

export const QUERY_TIMEOUT_MS = positive(env.QUERY_TIMEOUT_MS, 5000);
export const DOCUMENT_SEARCH_TIMEOUT_MS = positive(env.DOCUMENT_SEARCH_TIMEOUT_MS, 3000);
export const DOCUMENT_SEARCH_LIMIT = positive(env.DOCUMENT_SEARCH_LIMIT, 10);

export const HISTORY_LIMIT = positive(env.HISTORY_LIMIT, 50);

// Longest question accepted over HTTP
export const MAX_QUERY_LENGTH = 1000;

function positive(value: number, fallback: number) {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}
