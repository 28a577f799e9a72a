// Schema discovery: introspect a connection into an immutable, hint-annotated catalog.
import {
  ENABLE_FK_INFERENCE,
  SAMPLE_ROWS,
  SAMPLE_VALUES_PER_COLUMN,
} from "../../config/constants";
import { discoveredTablesGauge, discoveryRunsCounter, discoveryTableFailuresCounter } from "../../config/metrics";
import { withSpan } from "../../config/otel";
import { mapDriverError, type Dialect, type Row, type StorageConnection } from "../../db/client";
import { ConnectionError, IntrospectionError, toError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { normalizeName, splitWords } from "../../utils/text";
import {
  freezeCatalog,
  type ColumnInfo,
  type ForeignKeyRef,
  type LogicalType,
  type SchemaCatalog,
  type TableInfo,
} from "./schema_catalog";
import { defaultHintRules, matchHints, type HintRuleSet } from "./schema_hints";
import { createIntrospector, type Introspector, type RawColumn, type RawForeignKey } from "./introspectors";

export interface DiscoveryOptions {
  sampleRows: number;
  sampleValuesPerColumn: number;
  inferForeignKeys: boolean;
  rules: HintRuleSet;
  /** Clock for `discoveredAt`. */
  now: () => Date;
}

const defaultOptions: DiscoveryOptions = {
  sampleRows: SAMPLE_ROWS,
  sampleValuesPerColumn: SAMPLE_VALUES_PER_COLUMN,
  inferForeignKeys: ENABLE_FK_INFERENCE,
  rules: defaultHintRules,
  now: () => new Date(),
};

interface DescribedTable {
  name: string;
  columns: RawColumn[];
  foreignKeys: RawForeignKey[];
  sampleRows: Row[];
}

export async function discoverSchema(
  connection: StorageConnection,
  options: Partial<DiscoveryOptions> = {}
): Promise<SchemaCatalog> {
  return await discoverCatalog(createIntrospector(connection), connection, options);
}

/**
 * Builds a catalog from an introspector. A table whose columns cannot be read is left
 * out; failures reading its keys or samples only empty those parts.
 */
export async function discoverCatalog(
  introspector: Introspector,
  source: { id: string; dialect: Dialect },
  options: Partial<DiscoveryOptions> = {}
): Promise<SchemaCatalog> {
  const opts: DiscoveryOptions = { ...defaultOptions, ...options };

  return await withSpan(
    "schema.discover",
    async () => {
      let names: string[];
      try {
        names = await introspector.listTables();
      } catch (err) {
        discoveryRunsCounter.labels("failed").inc();
        const mapped = mapDriverError(err, "listing tables");
        if (mapped instanceof ConnectionError) throw mapped;
        throw new IntrospectionError(`Could not list tables: ${mapped.message}`, { cause: err });
      }

      const safeNames = [...new Set(names)].filter((name) => {
        if (isSafeIdentifier(name)) return true;
        logger.warn({ table: name }, "skipping table with an identifier that cannot be quoted safely");
        return false;
      });
      safeNames.sort();

      const described = await Promise.all(safeNames.map((name) => describeTable(introspector, name, opts)));
      const tables = described.filter((table): table is DescribedTable => table !== null);

      const catalog = freezeCatalog({
        connectionId: source.id,
        dialect: source.dialect,
        tables: annotate(tables, opts),
        discoveredAt: opts.now().toISOString(),
      });

      discoveryRunsCounter.labels("succeeded").inc();
      discoveredTablesGauge.set(catalog.tables.length);
      logger.info(
        { tables: catalog.tables.length, skipped: names.length - catalog.tables.length, dialect: source.dialect },
        "schema discovered"
      );
      return catalog;
    },
    { dialect: source.dialect }
  );
}

async function describeTable(
  introspector: Introspector,
  name: string,
  opts: DiscoveryOptions
): Promise<DescribedTable | null> {
  let columns: RawColumn[];
  try {
    columns = (await introspector.columns(name)).filter((column) => {
      if (isSafeIdentifier(column.name)) return true;
      logger.warn({ table: name, column: column.name }, "skipping column with an unsafe identifier");
      return false;
    });
  } catch (err) {
    discoveryTableFailuresCounter.inc();
    logger.warn({ table: name, err: toError(err).message }, "could not read columns, table omitted");
    return null;
  }
  if (columns.length === 0) {
    logger.warn({ table: name }, "table has no readable columns, omitted");
    return null;
  }

  const [foreignKeys, sampleRows] = await Promise.all([
    introspector.foreignKeys(name).catch((err: unknown) => {
      logger.warn({ table: name, err: toError(err).message }, "could not read foreign keys");
      return [];
    }),
    introspector.sampleRows(name, opts.sampleRows).catch((err: unknown) => {
      logger.debug({ table: name, err: toError(err).message }, "could not sample rows");
      return [];
    }),
  ]);

  return { name, columns, foreignKeys, sampleRows: sampleRows.slice(0, opts.sampleRows).map(toSampleRow) };
}

/** Keeps only scalar cells; binary and structured values are never matched against. */
export function toSampleRow(row: Row): Row {
  const out: Row = {};
  for (const [key, value] of Object.entries(row)) {
    if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      out[key] = value;
    } else if (typeof value === "bigint") {
      out[key] = value.toString();
    } else if (value instanceof Date) {
      out[key] = value.toISOString();
    }
  }
  return out;
}

/** Identifiers are always quoted; these characters would still confuse bindings or the driver. */
export function isSafeIdentifier(name: string): boolean {
  return name.length > 0 && !/[?\u0000]/.test(name);
}

function annotate(tables: DescribedTable[], opts: DiscoveryOptions): TableInfo[] {
  const byName = new Map(tables.map((table) => [table.name, table]));
  const tableHints = new Map(tables.map((table) => [table.name, matchHints(table.name, "table", opts.rules)]));

  return tables.map((table) => {
    const declared = resolveDeclaredKeys(table, byName);
    const foreignKeys =
      declared.length === 0 && opts.inferForeignKeys ? inferForeignKeys(table, tables, tableHints, opts.rules) : declared;
    const declaredColumns = new Set(declared.map((fk) => fk.column));

    const columns: ColumnInfo[] = table.columns.map((column) => {
      const type = inferLogicalType(column, declaredColumns.has(column.name));
      return {
        name: column.name,
        dataType: column.dataType,
        type,
        nullable: column.nullable,
        primaryKey: column.primaryKey,
        hints: matchHints(column.name, "column", opts.rules, type),
        sampleValues: type === "text" ? distinctValues(table.sampleRows, column.name, opts.sampleValuesPerColumn) : [],
      };
    });

    return {
      name: table.name,
      columns,
      foreignKeys,
      hints: tableHints.get(table.name) ?? [],
      primaryKey: table.columns.find((column) => column.primaryKey)?.name,
      sampleRows: table.sampleRows,
    };
  });
}

function resolveDeclaredKeys(table: DescribedTable, byName: Map<string, DescribedTable>): ForeignKeyRef[] {
  const refs: ForeignKeyRef[] = [];
  for (const fk of table.foreignKeys) {
    const target = byName.get(fk.refTable);
    if (!target || !table.columns.some((column) => column.name === fk.column)) continue;
    const refColumn = fk.refColumn ?? target.columns.find((column) => column.primaryKey)?.name;
    if (!refColumn || !target.columns.some((column) => column.name === refColumn)) continue;
    refs.push({ column: fk.column, refTable: fk.refTable, refColumn, inferred: false });
  }
  return refs;
}

/**
 * Guesses references for a table with no declared keys: a `<stem>_id` column points at
 * the table whose singular name is the stem, or at a table sharing the stem's hint.
 */
function inferForeignKeys(
  table: DescribedTable,
  tables: DescribedTable[],
  tableHints: Map<string, string[]>,
  rules: HintRuleSet
): ForeignKeyRef[] {
  const refs: ForeignKeyRef[] = [];
  for (const column of table.columns) {
    if (column.primaryKey) continue;
    const words = splitWords(column.name);
    if (words.length < 2 || words[words.length - 1] !== "id") continue;
    const stem = words.slice(0, -1).join(" ");
    const stemName = normalizeName(stem);
    const stemHints = matchHints(stem, "table", rules);

    const candidates = tables.filter((other) => other.name !== table.name);
    const target =
      candidates.find((other) => normalizeName(other.name) === stemName) ??
      candidates.find((other) => (tableHints.get(other.name) ?? []).some((hint) => stemHints.includes(hint)));
    if (!target) continue;

    const refColumn =
      target.columns.find((c) => c.primaryKey)?.name ??
      target.columns.find((c) => c.name.toLowerCase() === "id")?.name ??
      target.columns.find((c) => c.name === column.name)?.name;
    if (!refColumn) continue;

    refs.push({ column: column.name, refTable: target.name, refColumn, inferred: true });
  }
  return refs;
}

export function inferLogicalType(column: RawColumn, isForeignKey: boolean): LogicalType {
  if (isForeignKey) return "foreign-key";
  const words = splitWords(column.name);
  if (column.primaryKey || words[words.length - 1] === "id") return "identifier";
  const dataType = column.dataType.toLowerCase();
  if (/date|time/.test(dataType)) return "date";
  if (/int|numeric|decimal|real|double|float|number|money|serial/.test(dataType)) return "numeric";
  if (words.includes("date") || /_(at|on)$/i.test(column.name)) return "date";
  return "text";
}

function distinctValues(rows: readonly Row[], column: string, limit: number): string[] {
  const values = new Set<string>();
  for (const row of rows) {
    const value = row[column];
    if (typeof value !== "string" && typeof value !== "number") continue;
    const text = String(value).trim();
    if (text) values.add(text);
    if (values.size >= limit) break;
  }
  return [...values];
}
