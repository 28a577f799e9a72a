import { register, Counter, Gauge, Histogram } from "prom-client";

// General Metrics
export const requestCounter = new Counter({
  name: "nlq_requests_total",
  help: "Total HTTP requests handled by the query engine",
  labelNames: ["route", "status_code"],
});

export const queryDurationHistogram = new Histogram({
  name: "nlq_query_duration_seconds",
  help: "End-to-end question latency",
  labelNames: ["query_type"],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
});

// Classification Metrics
export const classificationCounter = new Counter({
  name: "nlq_classifications_total",
  help: "Questions classified, by query type.",
  labelNames: ["query_type"],
});

export const notUnderstoodCounter = new Counter({
  name: "nlq_not_understood_total",
  help: "Questions that matched nothing in the schema and carried no free text.",
});

// Schema Discovery Metrics
export const discoveryRunsCounter = new Counter({
  name: "nlq_discovery_runs_total",
  help: "Schema discovery runs, by outcome.",
  labelNames: ["outcome"],
});

export const discoveredTablesGauge = new Gauge({
  name: "nlq_discovered_tables",
  help: "Tables present in the current schema catalog.",
});

export const discoveryTableFailuresCounter = new Counter({
  name: "nlq_discovery_table_failures_total",
  help: "Tables left out of the catalog because introspection failed.",
});

// Hybrid Branch Metrics
export const branchFailuresCounter = new Counter({
  name: "nlq_branch_failures_total",
  help: "Failed branches of hybrid questions.",
  labelNames: ["branch", "code"],
});

// Cache Metrics
export const cacheHitsCounter = new Counter({
  name: "cache_hits_total",
  help: "Total number of cache hits.",
  labelNames: ["cache_name"],
});

export const cacheMissesCounter = new Counter({
  name: "cache_misses_total",
  help: "Total number of cache misses.",
  labelNames: ["cache_name"],
});

export const cacheEvictionsCounter = new Counter({
  name: "cache_evictions_total",
  help: "Total number of cache evictions.",
  labelNames: ["cache_name"],
});

export const cacheSizeGauge = new Gauge({
  name: "cache_entries",
  help: "Entries currently held by the cache.",
  labelNames: ["cache_name"],
});

export async function getMetrics() {
  return await register.metrics();
}

export function getMetricsContentType() {
  return register.contentType;
}
