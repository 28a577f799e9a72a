// Orchestration: the query engine
import { Mutex } from "async-mutex";
import type {
  DocumentHit,
  HistoryRecord,
  QueryPayload,
  QueryResponse,
  SourceRef,
  TableResult,
} from "../../../../shared/types";
import {
  CACHE_MAX_ENTRIES,
  CACHE_TTL_MS,
  DEFAULT_PAGE_SIZE,
  DOCUMENT_SEARCH_LIMIT,
  DOCUMENT_SEARCH_TIMEOUT_MS,
  MATCH_THRESHOLD,
  MAX_PAGE_SIZE,
  QUERY_TIMEOUT_MS,
} from "../../config/constants";
import { queryDurationHistogram } from "../../config/metrics";
import { addEvent, withSpan } from "../../config/otel";
import { openConnection, type StorageConnection } from "../../db/client";
import { NotConnectedError, toError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { withTimeout } from "../../utils/timeout";
import { buildCacheKey, TTLCache, type CacheStats } from "../cache";
import type { DocumentSearch } from "../documents";
import { createExecutor, type StorageExecutor } from "../executors/sql";
import { planIntent, resolvePagination } from "../executors/sql.planner";
import type { DocumentRequest, PlannedQuery, QueryPlan } from "../executors/sql.types";
import { QueryHistory } from "../history";
import { buildMapperIndex, type MapperIndex } from "../mapping/entityMapper";
import { mergeHybrid } from "../merger";
import type { SchemaCatalog } from "../sql/schema_catalog";
import { discoverSchema } from "../sql/schema_discovery";
import { defaultHintRules, type HintRuleSet } from "../sql/schema_hints";
import { classifyQuery } from "./classifier";

export interface EngineConfig {
  connect: (descriptor: string) => Promise<StorageConnection>;
  discover: (connection: StorageConnection, rules: HintRuleSet) => Promise<SchemaCatalog>;
  createExecutor: (connection: StorageConnection, catalog: SchemaCatalog) => StorageExecutor;
  documents: DocumentSearch | null;
  history: QueryHistory;
  rules: HintRuleSet;
  cacheTtlMs: number;
  cacheMaxEntries: number;
  defaultPageSize: number;
  maxPageSize: number;
  queryTimeoutMs: number;
  documentTimeoutMs: number;
  documentLimit: number;
  matchThreshold: number;
  /** Clock for cache expiry. */
  clock: () => number;
}

export type EngineOptions = Partial<EngineConfig>;

export interface RunOptions {
  /** Aborts both branches; an aborted question is never cached. */
  signal?: AbortSignal;
  /** How long this answer stays cached; defaults to the engine's cache TTL. */
  cacheTtlMs?: number;
}

/** Everything tied to one connection. Replaced as a whole on reconnect. */
interface EngineState {
  connection: StorageConnection;
  catalog: SchemaCatalog;
  index: MapperIndex;
  executor: StorageExecutor;
  cache: TTLCache<QueryPayload>;
  inflight: number;
  retired: boolean;
}

const NO_INDEX_NOTE = "No document index is configured; no passages were searched.";

export class QueryEngine {
  private state: EngineState | null = null;
  private readonly connectLock = new Mutex();
  private readonly config: EngineConfig;
  private readonly disposals = new Set<Promise<void>>();

  constructor(options: EngineOptions = {}) {
    this.config = {
      connect: openConnection,
      discover: (connection, rules) => discoverSchema(connection, { rules }),
      createExecutor,
      documents: null,
      history: new QueryHistory(),
      rules: defaultHintRules,
      cacheTtlMs: CACHE_TTL_MS,
      cacheMaxEntries: CACHE_MAX_ENTRIES,
      defaultPageSize: DEFAULT_PAGE_SIZE,
      maxPageSize: MAX_PAGE_SIZE,
      queryTimeoutMs: QUERY_TIMEOUT_MS,
      documentTimeoutMs: DOCUMENT_SEARCH_TIMEOUT_MS,
      documentLimit: DOCUMENT_SEARCH_LIMIT,
      matchThreshold: MATCH_THRESHOLD,
      clock: Date.now,
      ...options,
    };
  }

  get connected(): boolean {
    return this.state !== null;
  }

  /**
   * Connects to `descriptor`, discovers its schema and swaps it in. Questions already
   * running finish against the previous connection, which closes once they drain.
   */
  async discoverSchema(descriptor: string): Promise<SchemaCatalog> {
    return await this.connectLock.runExclusive(async () => {
      const connection = await this.config.connect(descriptor);
      let catalog: SchemaCatalog;
      try {
        catalog = await this.config.discover(connection, this.config.rules);
      } catch (err) {
        await connection.close().catch((closeErr: unknown) =>
          logger.warn({ err: toError(closeErr).message }, "closing a failed connection")
        );
        throw err;
      }

      const previous = this.state;
      this.state = {
        connection,
        catalog,
        index: buildMapperIndex(catalog, this.config.rules),
        executor: this.config.createExecutor(connection, catalog),
        cache: new TTLCache<QueryPayload>("results", this.config.cacheTtlMs, this.config.cacheMaxEntries, this.config.clock),
        inflight: 0,
        retired: false,
      };
      if (previous) this.retire(previous);

      logger.info(
        { dialect: catalog.dialect, tables: catalog.tables.length, target: connection.redacted },
        "schema ready"
      );
      return catalog;
    });
  }

  getSchema(): SchemaCatalog {
    if (!this.state) throw new NotConnectedError();
    return this.state.catalog;
  }

  getHistory(): HistoryRecord[] {
    return this.config.history.list();
  }

  cacheStats(): CacheStats | null {
    return this.state ? this.state.cache.stats() : null;
  }

  classifyAndPlan(text: string, page?: number, pageSize?: number): PlannedQuery {
    if (!this.state) throw new NotConnectedError();
    return this.plan(this.state, text, page, pageSize);
  }

  async runQuery(text: string, page?: number, pageSize?: number, options: RunOptions = {}): Promise<QueryResponse> {
    const started = performance.now();
    const state = this.acquire();
    try {
      return await withSpan(
        "query.run",
        async () => {
          const pagination = resolvePagination(page, pageSize, this.limits());
          const key = buildCacheKey({
            connectionId: state.connection.id,
            query: text,
            page: pagination.page,
            pageSize: pagination.pageSize,
          });

          const cached = await state.cache.get(key);
          if (cached.hit) {
            addEvent("cache.hit", { ageMs: cached.ageMs });
            this.config.history.record(text, cached.value.queryType);
            return this.respond(structuredClone(cached.value), state, started, cached.ageMs);
          }

          let payload: QueryPayload;
          try {
            const planned = this.plan(state, text, pagination.page, pagination.pageSize);
            payload = await this.execute(state, planned, options.signal);
          } catch (err) {
            this.config.history.record(text, "error");
            throw err;
          }

          if (isPartial(payload)) {
            logger.debug({ query: text }, "partial answer, result not cached");
          } else {
            const stored = await state.cache.set(key, structuredClone(payload), {
              ttlMs: options.cacheTtlMs,
              signal: options.signal,
            });
            if (!stored) logger.debug({ query: text }, "request aborted, result not cached");
          }
          this.config.history.record(text, payload.queryType);
          return this.respond(payload, state, started, null);
        },
        { queryLength: text.length }
      );
    } finally {
      this.release(state);
    }
  }

  /** Closes the current connection and the document index, waiting for retired connections. */
  async close(): Promise<void> {
    await this.connectLock.runExclusive(async () => {
      const current = this.state;
      this.state = null;
      if (current) this.retire(current);
      await Promise.all([...this.disposals]);
      await this.config.documents?.close?.();
    });
  }

  private limits() {
    return { defaultPageSize: this.config.defaultPageSize, maxPageSize: this.config.maxPageSize };
  }

  private plan(state: EngineState, text: string, page?: number, pageSize?: number): PlannedQuery {
    const intent = classifyQuery(text, state.index, { threshold: this.config.matchThreshold });
    return planIntent(intent, state.catalog, {
      page,
      pageSize,
      ...this.limits(),
      documentLimit: this.config.documentLimit,
    });
  }

  private async execute(state: EngineState, planned: PlannedQuery, signal?: AbortSignal): Promise<QueryPayload> {
    const { intent, plan, documentRequest } = planned;
    const notes = [...(plan?.notes ?? [])];
    if (documentRequest && !this.config.documents) notes.push(NO_INDEX_NOTE);

    if (intent.kind === "document" && documentRequest) {
      const hits = await this.searchDocuments(documentRequest, signal);
      return { queryType: "document", results: hits, sources: documentSources(hits), notes };
    }

    if (!plan) throw new Error(`No plan was built for a ${intent.kind} question`);
    const sql = state.executor.compile(plan).sql;

    if (intent.kind === "structured" || !documentRequest) {
      const table = await this.runStructured(state, plan, signal);
      return { queryType: "structured", results: table, sources: tableSources(plan), notes, sql };
    }

    const [table, documents] = await Promise.allSettled([
      this.runStructured(state, plan, signal),
      this.searchDocuments(documentRequest, signal),
    ]);
    const results = mergeHybrid(table, documents, emptyTable(plan));
    return {
      queryType: "hybrid",
      results,
      sources: [...(table.status === "fulfilled" ? tableSources(plan) : []), ...documentSources(results.documents)],
      notes,
      sql,
    };
  }

  private async runStructured(state: EngineState, plan: QueryPlan, signal?: AbortSignal): Promise<TableResult> {
    return await withTimeout(
      (branchSignal) => state.executor.execute(plan, { signal: branchSignal }),
      this.config.queryTimeoutMs,
      "structured query",
      signal
    );
  }

  private async searchDocuments(request: DocumentRequest, signal?: AbortSignal): Promise<DocumentHit[]> {
    const documents = this.config.documents;
    if (!documents) return [];
    return await withTimeout(
      (branchSignal) => documents.search(request.query, request.limit, { signal: branchSignal }),
      this.config.documentTimeoutMs,
      "document search",
      signal
    );
  }

  private respond(payload: QueryPayload, state: EngineState, started: number, ageMs: number | null): QueryResponse {
    const elapsed = performance.now() - started;
    queryDurationHistogram.labels(payload.queryType).observe(elapsed / 1000);
    const stats = state.cache.stats();
    return {
      ...payload,
      performance: { responseTimeMs: Math.round(elapsed * 100) / 100 },
      cache: { hit: ageMs !== null, ageMs, hits: stats.hits, misses: stats.misses },
    };
  }

  private acquire(): EngineState {
    const state = this.state;
    if (!state) throw new NotConnectedError();
    state.inflight++;
    return state;
  }

  private release(state: EngineState) {
    state.inflight--;
    if (state.retired && state.inflight === 0) this.dispose(state);
  }

  private retire(state: EngineState) {
    state.retired = true;
    if (state.inflight === 0) this.dispose(state);
  }

  private dispose(state: EngineState) {
    const disposal = state.cache
      .clear()
      .then(() => state.connection.close())
      .catch((err: unknown) => logger.warn({ err: toError(err).message }, "closing a retired connection failed"))
      .finally(() => this.disposals.delete(disposal));
    this.disposals.add(disposal);
  }
}

/** A hybrid answer with a failed branch is served once and never cached. */
function isPartial(payload: QueryPayload): boolean {
  const { results } = payload;
  return !Array.isArray(results) && "partialFailure" in results && results.partialFailure;
}

function emptyTable(plan: QueryPlan): TableResult {
  return { columns: plan.select.map((projection) => projection.alias), rows: [], page: plan.page, pageSize: plan.pageSize };
}

function tableSources(plan: QueryPlan): SourceRef[] {
  return [plan.from, ...plan.joins.map((join) => join.table)].map((name): SourceRef => ({ type: "table", name }));
}

function documentSources(hits: DocumentHit[]): SourceRef[] {
  return hits.map((hit): SourceRef => {
    const { title, source, documentId } = hit.metadata;
    const name = [title, source, documentId].find((value): value is string => typeof value === "string" && value.length > 0);
    return { type: "document", name: name ?? "document", score: hit.score, metadata: hit.metadata };
  });
}
