// Query planning: turn a classified intent into a structured, parameterized plan.
import { DEFAULT_PAGE_SIZE, DOCUMENT_SEARCH_LIMIT, MAX_PAGE_SIZE } from "../../config/constants";
import { QueryNotUnderstood } from "../../utils/errors";
import {
  declaredForeignKeys,
  findColumn,
  findTable,
  labelColumn,
  type ColumnInfo,
  type SchemaCatalog,
  type TableInfo,
} from "../sql/schema_catalog";
import { isStructuredEntity } from "../orchestration/classifier";
import type {
  AggregateFn,
  ColumnRef,
  EntityBinding,
  FilterOperator,
  LiteralValue,
  MappedEntity,
  PlanFilter,
  PlanJoin,
  PlanOrder,
  PlanParameter,
  PlanProjection,
  PlannedQuery,
  QueryIntent,
  QueryPlan,
  Scalar,
} from "./sql.types";

export interface PaginationLimits {
  defaultPageSize: number;
  maxPageSize: number;
}

export interface Pagination {
  page: number;
  pageSize: number;
  limit: number;
  offset: number;
}

/** Page is at least 1; page size is clamped into [1, maxPageSize]. */
export function resolvePagination(
  page: number | undefined,
  pageSize: number | undefined,
  limits: PaginationLimits = { defaultPageSize: DEFAULT_PAGE_SIZE, maxPageSize: MAX_PAGE_SIZE }
): Pagination {
  const safePage = page !== undefined && Number.isFinite(page) ? Math.max(1, Math.floor(page)) : 1;
  const requested =
    pageSize !== undefined && Number.isFinite(pageSize) ? Math.floor(pageSize) : limits.defaultPageSize;
  const safeSize = Math.min(Math.max(1, requested), limits.maxPageSize);
  return { page: safePage, pageSize: safeSize, limit: safeSize, offset: (safePage - 1) * safeSize };
}

export interface PlanOptions {
  page?: number;
  pageSize?: number;
  defaultPageSize?: number;
  maxPageSize?: number;
  documentLimit?: number;
}

export function reducedJoinNote(primary: string, other: string): string {
  return `Reduced to table "${primary}": no declared foreign key links it directly to "${other}", so conditions on "${other}" were ignored.`;
}

/** Plans both branches a classified intent needs. */
export function planIntent(intent: QueryIntent, catalog: SchemaCatalog, options: PlanOptions = {}): PlannedQuery {
  const documentLimit = options.documentLimit ?? DOCUMENT_SEARCH_LIMIT;
  switch (intent.kind) {
    case "document":
      return { intent, plan: null, documentRequest: { query: intent.text, limit: documentLimit } };
    case "structured":
      return { intent, plan: buildQueryPlan(intent, catalog, options), documentRequest: null };
    case "hybrid":
      return {
        intent,
        plan: buildQueryPlan(intent, catalog, options),
        documentRequest: { query: intent.freeText.join(" "), limit: documentLimit },
      };
  }
}

function tableOf(binding: EntityBinding): string | undefined {
  switch (binding.kind) {
    case "table":
    case "column":
    case "value":
      return binding.table;
    case "literal":
      return binding.table;
    case "limit":
      return undefined;
  }
}

function isRange(value: LiteralValue): value is readonly [Scalar, Scalar] {
  return typeof value === "object";
}

function isYear(value: Scalar): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1000 && value <= 9999;
}

/**
 * Builds a plan over a single primary table. Other tables are joined only through a
 * declared foreign key on either side of a direct link; anything else is dropped with
 * a note. Every identifier in the plan comes from the catalog and every value is a
 * bound parameter.
 */
export function buildQueryPlan(intent: QueryIntent, catalog: SchemaCatalog, options: PlanOptions = {}): QueryPlan {
  const pagination = resolvePagination(options.page, options.pageSize, {
    defaultPageSize: options.defaultPageSize ?? DEFAULT_PAGE_SIZE,
    maxPageSize: options.maxPageSize ?? MAX_PAGE_SIZE,
  });
  const { operation } = intent;
  const groupEntity = operation.type === "lookup" ? undefined : operation.groupBy;
  const entities = intent.entities.filter(isStructuredEntity).sort((a, b) => a.start - b.start);

  const primary = choosePrimaryTable(entities, groupEntity, catalog);
  if (!primary) {
    throw new QueryNotUnderstood("The question did not name a table that could be queried.", {
      matched: intent.entities,
      unmatched: intent.freeText,
    });
  }

  const notes: string[] = [];
  const joins: PlanJoin[] = [];
  const reachable = new Set<string>([primary.name]);
  const reduced = new Set<string>();

  const reach = (tableName: string): boolean => {
    if (reachable.has(tableName)) return true;
    const other = findTable(catalog, tableName);
    const join = other ? directJoin(primary, other) : undefined;
    if (join) {
      joins.push(join);
      reachable.add(tableName);
      return true;
    }
    if (!reduced.has(tableName)) {
      reduced.add(tableName);
      notes.push(reducedJoinNote(primary.name, tableName));
    }
    return false;
  };

  const params: PlanParameter[] = [];
  const bind = (value: Scalar): string => {
    const placeholder = `:p${params.length + 1}`;
    params.push({ placeholder, value });
    return placeholder;
  };

  const filters: PlanFilter[] = [];
  const mentionedColumns: ColumnRef[] = [];
  const filteredColumns: ColumnRef[] = [];
  let rowLimit: number | undefined;

  for (const entity of entities.concat(intent.entities.filter((e) => e.binding.kind === "limit"))) {
    if (entity === groupEntity) continue;
    const { binding } = entity;
    switch (binding.kind) {
      case "value": {
        if (!reach(binding.table)) break;
        const ref = { table: binding.table, column: binding.column };
        filters.push({ column: ref, operator: "eq", placeholders: [bind(binding.value)] });
        filteredColumns.push(ref);
        break;
      }
      case "literal": {
        if (!binding.table || !binding.column || !reach(binding.table)) break;
        const column = findColumn(requireTable(catalog, binding.table), binding.column);
        if (!column) break;
        const ref = { table: binding.table, column: binding.column };
        const { operator, values } = literalCondition(column, binding.operator, binding.value);
        filters.push({ column: ref, operator, placeholders: values.map(bind) });
        filteredColumns.push(ref);
        break;
      }
      case "column":
        if (reach(binding.table)) mentionedColumns.push({ table: binding.table, column: binding.column });
        break;
      case "limit":
        if (binding.value >= 1) rowLimit = Math.min(rowLimit ?? binding.value, binding.value);
        break;
      case "table":
        break;
    }
  }

  for (const entity of intent.entities) {
    if (entity.binding.kind === "literal" && !entity.binding.column) {
      notes.push(`Ignored "${entity.phrase}": no column was recognized near it.`);
    }
  }

  const aliases = new Set<string>();
  const aliasFor = (ref: ColumnRef): string => {
    const alias = aliases.has(ref.column) ? `${ref.table}_${ref.column}` : ref.column;
    aliases.add(alias);
    return alias;
  };

  const select: PlanProjection[] = [];
  const groupBy: ColumnRef[] = [];
  const orderBy: PlanOrder[] = [];

  if (operation.type === "lookup") {
    const explicit = dedupe(mentionedColumns.filter((ref) => !containsRef(filteredColumns, ref)));
    const projected = explicit.length
      ? explicit
      : primary.columns.map((column) => ({ table: primary.name, column: column.name }));
    for (const ref of projected) select.push({ kind: "column", ref, alias: aliasFor(ref) });
    if (primary.primaryKey) orderBy.push({ by: { table: primary.name, column: primary.primaryKey }, direction: "asc" });
  } else {
    const groupRef = groupEntity ? resolveGroup(groupEntity, primary, catalog, reach, notes) : undefined;
    if (groupRef) {
      groupBy.push(groupRef);
      select.push({ kind: "column", ref: groupRef, alias: aliasFor(groupRef) });
    }

    let aggregate: PlanProjection;
    if (operation.type === "count") {
      aggregate = { kind: "aggregate", fn: "count", alias: aliasFor({ table: primary.name, column: "count" }) };
    } else {
      const target = aggregateColumn(operation.fn, mentionedColumns.concat(filteredColumns), primary, catalog, notes, intent);
      aggregate = {
        kind: "aggregate",
        fn: operation.fn,
        ref: target,
        alias: aliasFor({ table: target.table, column: `${operation.fn}_${target.column}` }),
      };
    }
    select.push(aggregate);
    if (groupRef) orderBy.push({ by: aggregate.alias, direction: "desc" });
  }

  const pageSize = rowLimit !== undefined ? Math.min(rowLimit, pagination.pageSize) : pagination.pageSize;
  const offset = (pagination.page - 1) * pageSize;

  return {
    operation: operation.type,
    from: primary.name,
    joins,
    select,
    filters,
    params,
    groupBy,
    orderBy,
    page: pagination.page,
    pageSize,
    limit: pageSize,
    offset,
    notes,
  };
}

function requireTable(catalog: SchemaCatalog, name: string): TableInfo {
  const table = findTable(catalog, name);
  if (!table) throw new Error(`Table "${name}" is not in the catalog`);
  return table;
}

/**
 * The table most of the question points at. Table names weigh double, literals half;
 * the group-by target only counts when nothing else does.
 */
function choosePrimaryTable(
  entities: MappedEntity[],
  groupEntity: MappedEntity | undefined,
  catalog: SchemaCatalog
): TableInfo | undefined {
  const scoring = entities.filter((entity) => entity !== groupEntity);
  const pool = scoring.length ? scoring : entities;

  const scores = new Map<string, { score: number; first: number }>();
  for (const entity of pool) {
    const table = tableOf(entity.binding);
    if (!table) continue;
    const weight = entity.binding.kind === "table" ? 2 : entity.binding.kind === "literal" ? 0.5 : 1;
    const current = scores.get(table) ?? { score: 0, first: entity.start };
    current.score += weight * entity.confidence;
    current.first = Math.min(current.first, entity.start);
    scores.set(table, current);
  }

  const ranked = [...scores.entries()].sort(
    ([nameA, a], [nameB, b]) => b.score - a.score || a.first - b.first || nameA.localeCompare(nameB)
  );
  const best = ranked[0];
  return best ? findTable(catalog, best[0]) : undefined;
}

function directJoin(primary: TableInfo, other: TableInfo): PlanJoin | undefined {
  const outgoing = declaredForeignKeys(primary).find((fk) => fk.refTable === other.name);
  if (outgoing) {
    return {
      table: other.name,
      left: { table: primary.name, column: outgoing.column },
      right: { table: other.name, column: outgoing.refColumn },
    };
  }
  const incoming = declaredForeignKeys(other).find((fk) => fk.refTable === primary.name);
  if (incoming) {
    return {
      table: other.name,
      left: { table: primary.name, column: incoming.refColumn },
      right: { table: other.name, column: incoming.column },
    };
  }
  return undefined;
}

function resolveGroup(
  entity: MappedEntity,
  primary: TableInfo,
  catalog: SchemaCatalog,
  reach: (table: string) => boolean,
  notes: string[]
): ColumnRef | undefined {
  const { binding } = entity;
  if (binding.kind !== "table" && binding.kind !== "column") return undefined;

  if (reach(binding.table)) {
    if (binding.kind === "column") return { table: binding.table, column: binding.column };
    if (binding.table === primary.name) return undefined;
    const other = requireTable(catalog, binding.table);
    const label = labelColumn(other) ?? other.columns.find((column) => column.primaryKey) ?? other.columns[0];
    return { table: other.name, column: label.name };
  }

  const other = findTable(catalog, binding.table);
  const otherHints = new Set(other?.hints ?? []);
  const substitute = primary.columns.find((column) => column.hints.some((hint) => otherHints.has(hint)));
  if (!substitute) return undefined;
  notes.push(`Grouping by "${primary.name}"."${substitute.name}" instead of "${binding.table}".`);
  return { table: primary.name, column: substitute.name };
}

function aggregateColumn(
  fn: Exclude<AggregateFn, "count">,
  candidates: ColumnRef[],
  primary: TableInfo,
  catalog: SchemaCatalog,
  notes: string[],
  intent: QueryIntent
): ColumnRef {
  const named = candidates[0];
  const namedInfo = named ? findColumn(requireTable(catalog, named.table), named.column) : undefined;
  if (named && namedInfo?.type === "numeric") return named;

  const numeric = candidates.find((ref) => findColumn(requireTable(catalog, ref.table), ref.column)?.type === "numeric");
  if (numeric) return numeric;

  const fallback: ColumnInfo | undefined = primary.columns.find((column) => column.type === "numeric");
  if (!fallback) {
    throw new QueryNotUnderstood(`There is no numeric column in "${primary.name}" to compute ${fn} over.`, {
      matched: intent.entities,
      unmatched: intent.freeText,
    });
  }
  notes.push(
    named
      ? `"${named.column}" is not numeric; computing ${fn} over "${fallback.name}".`
      : `No numeric column was named; computing ${fn} over "${fallback.name}".`
  );
  return { table: primary.name, column: fallback.name };
}

/** Years against a date column become half-open ranges, so timestamps late on Dec 31 still count. */
function literalCondition(
  column: ColumnInfo,
  operator: FilterOperator,
  value: LiteralValue
): { operator: FilterOperator; values: Scalar[] } {
  const dateColumn = column.type === "date";
  if (isRange(value)) {
    const [low, high] = value;
    const start = dateColumn && isYear(low) ? yearStart(low) : low;
    if (dateColumn && isYear(high)) return { operator: "range", values: [start, yearStart(high + 1)] };
    return { operator: "between", values: [start, high] };
  }
  if (dateColumn && isYear(value)) {
    const start = yearStart(value);
    const next = yearStart(value + 1);
    switch (operator) {
      case "gt":
      case "gte":
        return { operator: "gte", values: [operator === "gt" ? next : start] };
      case "lt":
      case "lte":
        return { operator: "lt", values: [operator === "lte" ? next : start] };
      default:
        return { operator: "range", values: [start, next] };
    }
  }
  return { operator: operator === "between" ? "eq" : operator, values: [value] };
}

function yearStart(year: number): string {
  return `${year}-01-01`;
}

function containsRef(refs: ColumnRef[], ref: ColumnRef): boolean {
  return refs.some((r) => r.table === ref.table && r.column === ref.column);
}

function dedupe(refs: ColumnRef[]): ColumnRef[] {
  const out: ColumnRef[] = [];
  for (const ref of refs) if (!containsRef(out, ref)) out.push(ref);
  return out;
}
