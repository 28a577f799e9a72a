// Types shared by the entity mapper, classifier, planner, binder and executor.

export type QueryKind = "structured" | "document" | "hybrid";

/** `range` is half-open: lower bound inclusive, upper bound exclusive. */
export type FilterOperator = "eq" | "neq" | "gt" | "gte" | "lt" | "lte" | "between" | "range" | "like";
export type AggregateFn = "count" | "sum" | "avg" | "min" | "max";

export type Scalar = string | number;
export type LiteralValue = Scalar | readonly [Scalar, Scalar];

export interface Token {
  text: string;
  /** Position in the token stream, not in the raw string. */
  index: number;
  kind: "word" | "number" | "date";
}

export type EntityBinding =
  | { kind: "table"; table: string }
  | { kind: "column"; table: string; column: string }
  | { kind: "value"; table: string; column: string; value: string }
  | {
      kind: "literal";
      literalType: "number" | "date";
      value: LiteralValue;
      operator: FilterOperator;
      table?: string;
      column?: string;
    }
  | { kind: "limit"; value: number };

export interface MappedEntity {
  phrase: string;
  /** First and last token index covered, inclusive. */
  start: number;
  end: number;
  binding: EntityBinding;
  confidence: number;
  matchedBy: "name" | "hint" | "value" | "pattern";
}

export interface MappingResult {
  tokens: readonly Token[];
  entities: MappedEntity[];
  freeText: string[];
}

export type OperationShape =
  | { type: "count"; groupBy?: MappedEntity }
  | { type: "aggregate"; fn: Exclude<AggregateFn, "count">; groupBy?: MappedEntity }
  | { type: "lookup" };

export interface QueryIntent {
  kind: QueryKind;
  text: string;
  operation: OperationShape;
  entities: MappedEntity[];
  freeText: string[];
}

export interface ColumnRef {
  table: string;
  column: string;
}

export type PlanProjection =
  | { kind: "column"; ref: ColumnRef; alias: string }
  | { kind: "aggregate"; fn: AggregateFn; ref?: ColumnRef; alias: string };

export interface PlanFilter {
  column: ColumnRef;
  operator: FilterOperator;
  placeholders: string[];
}

export interface PlanParameter {
  placeholder: string;
  value: Scalar;
}

export interface PlanJoin {
  table: string;
  left: ColumnRef;
  right: ColumnRef;
}

export interface PlanOrder {
  /** A projection alias or a column. */
  by: string | ColumnRef;
  direction: "asc" | "desc";
}

export interface QueryPlan {
  operation: OperationShape["type"];
  from: string;
  joins: PlanJoin[];
  select: PlanProjection[];
  filters: PlanFilter[];
  params: PlanParameter[];
  groupBy: ColumnRef[];
  orderBy: PlanOrder[];
  page: number;
  pageSize: number;
  limit: number;
  offset: number;
  notes: string[];
}

export interface CompiledSQL {
  sql: string;
  params: Scalar[];
}

export interface DocumentRequest {
  query: string;
  limit: number;
}

export interface PlannedQuery {
  intent: QueryIntent;
  plan: QueryPlan | null;
  documentRequest: DocumentRequest | null;
}
