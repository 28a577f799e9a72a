import { quoteIdentifier, type Dialect } from "../../db/client";
import { findColumn, findTable, type SchemaCatalog } from "../sql/schema_catalog";
import type { ColumnRef, CompiledSQL, PlanFilter, PlanOrder, PlanProjection, QueryPlan, Scalar } from "./sql.types";

interface WhereClause {
  sql: string;
  params: Scalar[];
}

const COMPARISONS = { eq: "=", neq: "<>", gt: ">", gte: ">=", lt: "<", lte: "<=", like: "LIKE" } as const;

/**
 * Renders a plan as one SELECT statement with positional `?` bindings. Every
 * identifier is checked against the catalog and quoted for the dialect; no value
 * is ever spliced into the text.
 */
export function buildSQLFromPlan(plan: QueryPlan, catalog: SchemaCatalog): CompiledSQL {
  const { dialect } = catalog;
  const resolve = (ref: ColumnRef) => resolveColumn(ref, catalog);

  resolveTable(plan.from, catalog);
  const selectList = plan.select.map((projection) => renderProjection(projection, dialect, resolve)).join(", ");

  const joins = plan.joins.map((join) => {
    resolveTable(join.table, catalog);
    return ` JOIN ${quoteIdentifier(dialect, join.table)} ON ${resolve(join.left)} = ${resolve(join.right)}`;
  });

  const where = buildWhere(plan, resolve);
  const groupBy = plan.groupBy.length ? ` GROUP BY ${plan.groupBy.map(resolve).join(", ")}` : "";
  const order = buildOrder(plan.orderBy, plan.select, dialect, resolve);

  const sql =
    `SELECT ${selectList} FROM ${quoteIdentifier(dialect, plan.from)}${joins.join("")}` +
    `${where.sql ? ` WHERE ${where.sql}` : ""}${groupBy}${order} LIMIT ? OFFSET ?`;
  return { sql, params: [...where.params, plan.limit, plan.offset] };
}

function resolveTable(name: string, catalog: SchemaCatalog) {
  const table = findTable(catalog, name);
  if (!table) {
    throw new Error(`Unknown table: ${name}`);
  }
  return table;
}

function resolveColumn(ref: ColumnRef, catalog: SchemaCatalog): string {
  const table = resolveTable(ref.table, catalog);
  if (!findColumn(table, ref.column)) {
    throw new Error(`Unknown column: ${ref.table}.${ref.column}`);
  }
  return `${quoteIdentifier(catalog.dialect, ref.table)}.${quoteIdentifier(catalog.dialect, ref.column)}`;
}

function renderProjection(projection: PlanProjection, dialect: Dialect, resolve: (ref: ColumnRef) => string): string {
  const alias = quoteIdentifier(dialect, projection.alias);
  if (projection.kind === "column") {
    return `${resolve(projection.ref)} AS ${alias}`;
  }
  const argument = projection.ref ? resolve(projection.ref) : "*";
  if (!projection.ref && projection.fn !== "count") {
    throw new Error(`${projection.fn.toUpperCase()} requires a column`);
  }
  return `${projection.fn.toUpperCase()}(${argument}) AS ${alias}`;
}

function buildWhere(plan: QueryPlan, resolve: (ref: ColumnRef) => string): WhereClause {
  if (plan.filters.length === 0) return { sql: "", params: [] };
  const values = new Map(plan.params.map((param) => [param.placeholder, param.value]));
  const clauses: string[] = [];
  const params: Scalar[] = [];

  const take = (filter: PlanFilter, index: number): Scalar => {
    const placeholder = filter.placeholders[index];
    const value = placeholder === undefined ? undefined : values.get(placeholder);
    if (value === undefined) {
      throw new Error(`Missing parameter for ${filter.column.table}.${filter.column.column}`);
    }
    return value;
  };

  for (const filter of plan.filters) {
    const column = resolve(filter.column);
    if (filter.operator === "between" || filter.operator === "range") {
      if (filter.placeholders.length !== 2) {
        throw new Error(`${filter.operator} filter requires two values`);
      }
      clauses.push(filter.operator === "between" ? `${column} BETWEEN ? AND ?` : `(${column} >= ? AND ${column} < ?)`);
      params.push(take(filter, 0), take(filter, 1));
      continue;
    }
    if (filter.placeholders.length !== 1) {
      throw new Error(`Filter on ${filter.column.column} requires one value`);
    }
    clauses.push(`${column} ${COMPARISONS[filter.operator]} ?`);
    params.push(take(filter, 0));
  }
  return { sql: clauses.join(" AND "), params };
}

function buildOrder(
  orderBy: PlanOrder[],
  select: PlanProjection[],
  dialect: Dialect,
  resolve: (ref: ColumnRef) => string
): string {
  const parts: string[] = [];
  for (const item of orderBy) {
    const direction = item.direction.toUpperCase();
    if (typeof item.by === "string") {
      const alias = item.by;
      if (!select.some((projection) => projection.alias === alias)) continue;
      parts.push(`${quoteIdentifier(dialect, alias)} ${direction}`);
    } else {
      parts.push(`${resolve(item.by)} ${direction}`);
    }
  }
  return parts.length ? ` ORDER BY ${parts.join(", ")}` : "";
}
