import { vi } from "vitest";
import type { DocumentHit, HybridResult, QueryResults, TableResult } from "../../../shared/types";
import type { Dialect, Row, StorageConnection } from "../../src/db/client";
import type { Introspector, RawColumn, RawForeignKey } from "../../src/services/sql/introspectors";
import type { SchemaCatalog } from "../../src/services/sql/schema_catalog";
import { discoverCatalog, type DiscoveryOptions } from "../../src/services/sql/schema_discovery";

export interface FakeTable {
  name: string;
  columns: RawColumn[];
  foreignKeys?: RawForeignKey[];
  rows?: Row[];
  failColumns?: boolean;
  failSamples?: boolean;
}

export function fakeIntrospector(tables: FakeTable[]): Introspector {
  const byName = (name: string) => {
    const table = tables.find((t) => t.name === name);
    if (!table) throw new Error(`no such table: ${name}`);
    return table;
  };
  return {
    listTables: async () => tables.map((t) => t.name),
    columns: async (name) => {
      const table = byName(name);
      if (table.failColumns) throw new Error("permission denied");
      return table.columns;
    },
    foreignKeys: async (name) => byName(name).foreignKeys ?? [],
    sampleRows: async (name, limit) => {
      const table = byName(name);
      if (table.failSamples) throw new Error("sampling not allowed");
      return (table.rows ?? []).slice(0, limit);
    },
  };
}

const col = (name: string, dataType: string, primaryKey = false): RawColumn => ({
  name,
  dataType,
  nullable: !primaryKey,
  primaryKey,
});

export const departmentsTable: FakeTable = {
  name: "departments",
  columns: [col("dept_id", "INTEGER", true), col("dept_name", "TEXT"), col("manager_id", "INTEGER")],
  rows: [
    { dept_id: 1, dept_name: "Engineering", manager_id: 1 },
    { dept_id: 2, dept_name: "HR", manager_id: 3 },
  ],
};

export const employeesTable: FakeTable = {
  name: "employees",
  columns: [
    col("emp_id", "INTEGER", true),
    col("full_name", "TEXT"),
    col("dept_id", "INTEGER"),
    col("position", "TEXT"),
    col("annual_salary", "REAL"),
    col("join_date", "TEXT"),
    col("office_location", "TEXT"),
  ],
  foreignKeys: [{ column: "dept_id", refTable: "departments", refColumn: "dept_id" }],
  rows: [
    { emp_id: 1, full_name: "Alice Smith", dept_id: 1, position: "Engineer", annual_salary: 120000, join_date: "2020-03-15", office_location: "NY" },
    { emp_id: 2, full_name: "Bob Jones", dept_id: 1, position: "Sr Engineer", annual_salary: 150000, join_date: "2019-07-01", office_location: "SF" },
    { emp_id: 3, full_name: "Carol White", dept_id: 2, position: "HR Manager", annual_salary: 90000, join_date: "2021-01-10", office_location: "NY" },
  ],
};

export const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");

export async function demoCatalog(
  options: { dialect?: Dialect; tables?: FakeTable[]; id?: string } & Partial<DiscoveryOptions> = {}
): Promise<SchemaCatalog> {
  const { dialect = "sqlite", tables = [departmentsTable, employeesTable], id = "conn-1", ...discovery } = options;
  return await discoverCatalog(fakeIntrospector(tables), { id, dialect }, { now: () => FIXED_NOW, ...discovery });
}

/** Employees without a declared foreign key to departments. */
export const undeclaredEmployeesTable: FakeTable = { ...employeesTable, foreignKeys: [] };

export function fakeConnection(id = "conn-1", dialect: Dialect = "sqlite") {
  const close = vi.fn(async () => {});
  const query = vi.fn(async (_sql: string): Promise<Row[]> => []);
  const connection: StorageConnection = { id, dialect, redacted: `${dialect}://fake`, query, close };
  return { connection, close, query };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function tableOf(results: QueryResults): TableResult {
  if (Array.isArray(results) || !("rows" in results)) throw new Error("expected a table result");
  return results;
}

export function hybridOf(results: QueryResults): HybridResult {
  if (Array.isArray(results) || !("partialFailure" in results)) throw new Error("expected a hybrid result");
  return results;
}

export function documentsOf(results: QueryResults): DocumentHit[] {
  if (!Array.isArray(results)) throw new Error("expected document hits");
  return results;
}
