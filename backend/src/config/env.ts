import * as dotenv from "dotenv";
dotenv.config();

export const env = {
  DATABASE_URL: process.env.DATABASE_URL || "",
  DOCUMENTS_DATABASE_URL: process.env.DOCUMENTS_DATABASE_URL || "",
  CORS_ORIGIN: process.env.CORS_ORIGIN || "http://localhost:5173",
  PORT: Number(process.env.PORT_BACKEND || 8787),
  LOG_LEVEL: process.env.LOG_LEVEL || "info",

  CACHE_TTL_MS: Number(process.env.CACHE_TTL_MS || 300_000),
  CACHE_MAX_ENTRIES: Number(process.env.CACHE_MAX_ENTRIES || 1000),

  DEFAULT_PAGE_SIZE: Number(process.env.DEFAULT_PAGE_SIZE || 50),
  MAX_PAGE_SIZE: Number(process.env.MAX_PAGE_SIZE || 200),

  // Schema discovery
  SAMPLE_ROWS: Number(process.env.SAMPLE_ROWS || 25),
  SAMPLE_VALUES_PER_COLUMN: Number(process.env.SAMPLE_VALUES_PER_COLUMN || 20),
  ENABLE_FK_INFERENCE: process.env.ENABLE_FK_INFERENCE !== "false",

  MATCH_THRESHOLD: Number(process.env.MATCH_THRESHOLD || 0.8),

  QUERY_TIMEOUT_MS: Number(process.env.QUERY_TIMEOUT_MS || 5000),
  DOCUMENT_SEARCH_TIMEOUT_MS: Number(process.env.DOCUMENT_SEARCH_TIMEOUT_MS || 3000),
  DOCUMENT_SEARCH_LIMIT: Number(process.env.DOCUMENT_SEARCH_LIMIT || 10),

  HISTORY_LIMIT: Number(process.env.HISTORY_LIMIT || 50),

  // Tracing
  ENABLE_OTEL: process.env.ENABLE_OTEL === "true",
  OTEL_SERVICE_NAME: process.env.OTEL_SERVICE_NAME || "",
  OTEL_EXPORTER_OTLP_ENDPOINT: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4318/v1/traces"
};
