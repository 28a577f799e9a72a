// Shared types for the HTTP surface

export type QueryType = "structured" | "document" | "hybrid";

export interface TableResult {
  columns: string[];
  rows: Record<string, unknown>[];
  page: number;
  pageSize: number;
}

export interface DocumentHit {
  text: string;
  score: number | null;
  metadata: Record<string, unknown>;
}

export interface BranchError {
  code: string;
  message: string;
}

export interface HybridResult {
  table: TableResult;
  documents: DocumentHit[];
  partialFailure: boolean;
  errors: {
    table?: BranchError;
    documents?: BranchError;
  };
}

export type QueryResults = TableResult | DocumentHit[] | HybridResult;

export interface SourceRef {
  type: "table" | "document";
  name: string;
  score?: number | null;
  metadata?: Record<string, unknown>;
}

/** The part of a query response that is cached. */
export interface QueryPayload {
  queryType: QueryType;
  results: QueryResults;
  sources: SourceRef[];
  notes: string[];
  sql?: string;
}

export interface CacheInfo {
  hit: boolean;
  ageMs: number | null;
  hits: number;
  misses: number;
}

export interface QueryResponse extends QueryPayload {
  performance: { responseTimeMs: number };
  cache: CacheInfo;
}

export interface HistoryRecord {
  id: string;
  query: string;
  queryType: QueryType | "error";
  timestamp: string;
}

export interface SchemaColumnView {
  name: string;
  dataType: string;
  type: string;
  nullable: boolean;
  primaryKey: boolean;
  hints: string[];
}

export interface SchemaTableView {
  name: string;
  primaryKey: string | null;
  hints: string[];
  columns: SchemaColumnView[];
  foreignKeys: { column: string; refTable: string; refColumn: string; inferred: boolean }[];
  sampledRows: number;
}

export interface SchemaView {
  dialect: string;
  discoveredAt: string;
  tables: SchemaTableView[];
}

export interface ErrorBody {
  error: string;
  code: string;
  message: string;
  matched?: { phrase: string; kind: string; confidence: number }[];
  unmatched?: string[];
}
