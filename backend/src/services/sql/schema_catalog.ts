// Schema catalog: the immutable description of a connected store.
import type { SchemaView } from "../../../../shared/types";
import type { Dialect } from "../../db/client";

export const LOGICAL_TYPES = ["numeric", "text", "date", "identifier", "foreign-key"] as const;
export type LogicalType = (typeof LOGICAL_TYPES)[number];

export interface ColumnInfo {
  name: string;
  /** Raw type as reported by the store. */
  dataType: string;
  type: LogicalType;
  nullable: boolean;
  primaryKey: boolean;
  /** Sorted semantic hints, e.g. `salary-like`. */
  hints: readonly string[];
  /** Distinct sampled values, stringified. */
  sampleValues: readonly string[];
}

export interface ForeignKeyRef {
  column: string;
  refTable: string;
  refColumn: string;
  /** Guessed from naming; never used to join. */
  inferred: boolean;
}

export interface TableInfo {
  name: string;
  columns: readonly ColumnInfo[];
  foreignKeys: readonly ForeignKeyRef[];
  hints: readonly string[];
  primaryKey?: string;
  sampleRows: readonly Readonly<Record<string, unknown>>[];
}

export interface SchemaCatalog {
  connectionId: string;
  dialect: Dialect;
  tables: readonly TableInfo[];
  discoveredAt: string;
}

export function freezeCatalog(catalog: SchemaCatalog): SchemaCatalog {
  return deepFreeze(catalog);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !ArrayBuffer.isView(value) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

export function findTable(catalog: SchemaCatalog, name: string): TableInfo | undefined {
  return catalog.tables.find((table) => table.name === name);
}

export function findColumn(table: TableInfo, name: string): ColumnInfo | undefined {
  return table.columns.find((column) => column.name === name);
}

/** The column that best names a row: a name-like column, else the first text column. */
export function labelColumn(table: TableInfo): ColumnInfo | undefined {
  return (
    table.columns.find((column) => column.hints.includes("name-like") && column.type === "text") ??
    table.columns.find((column) => column.type === "text")
  );
}

export function declaredForeignKeys(table: TableInfo): ForeignKeyRef[] {
  return table.foreignKeys.filter((fk) => !fk.inferred);
}

/** Structural equality: tables, columns, logical types, hints and keys. Samples are ignored. */
export function catalogsEqual(a: SchemaCatalog, b: SchemaCatalog): boolean {
  return JSON.stringify(catalogShape(a)) === JSON.stringify(catalogShape(b));
}

function catalogShape(catalog: SchemaCatalog) {
  return {
    dialect: catalog.dialect,
    tables: catalog.tables.map((table) => ({
      name: table.name,
      hints: table.hints,
      primaryKey: table.primaryKey ?? null,
      foreignKeys: table.foreignKeys,
      columns: table.columns.map((column) => ({
        name: column.name,
        dataType: column.dataType,
        type: column.type,
        nullable: column.nullable,
        primaryKey: column.primaryKey,
        hints: column.hints,
      })),
    })),
  };
}

export function toSchemaView(catalog: SchemaCatalog): SchemaView {
  return {
    dialect: catalog.dialect,
    discoveredAt: catalog.discoveredAt,
    tables: catalog.tables.map((table) => ({
      name: table.name,
      primaryKey: table.primaryKey ?? null,
      hints: [...table.hints],
      columns: table.columns.map((column) => ({
        name: column.name,
        dataType: column.dataType,
        type: column.type,
        nullable: column.nullable,
        primaryKey: column.primaryKey,
        hints: [...column.hints],
      })),
      foreignKeys: table.foreignKeys.map((fk) => ({ ...fk })),
      sampledRows: table.sampleRows.length,
    })),
  };
}
