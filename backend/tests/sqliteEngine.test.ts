import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { openConnection, type StorageConnection } from "../src/db/client";
import { QueryEngine } from "../src/services/orchestration/coordinator";
import { findTable } from "../src/services/sql/schema_catalog";
import { discoverSchema } from "../src/services/sql/schema_discovery";
import { UnsupportedDescriptorError } from "../src/utils/errors";
import { FIXED_NOW, tableOf } from "./helpers/fixtures";

const SETUP = [
  "CREATE TABLE departments (dept_id INTEGER PRIMARY KEY, dept_name TEXT NOT NULL, manager_id INTEGER)",
  `CREATE TABLE employees (
    emp_id INTEGER PRIMARY KEY,
    full_name TEXT NOT NULL,
    dept_id INTEGER REFERENCES departments(dept_id),
    position TEXT,
    annual_salary REAL,
    join_date TEXT,
    office_location TEXT
  )`,
  "INSERT INTO departments VALUES (1, 'Engineering', 1), (2, 'HR', 3)",
  `INSERT INTO employees VALUES
    (1, 'Alice Smith', 1, 'Engineer', 120000, '2020-03-15', 'NY'),
    (2, 'Bob Jones', 1, 'Sr Engineer', 150000, '2019-07-01', 'SF'),
    (3, 'Carol White', 2, 'HR Manager', 90000, '2021-01-10', 'NY')`,
];

describe("end to end on an in-memory SQLite store", () => {
  let connection: StorageConnection;
  let engine: QueryEngine;

  beforeAll(async () => {
    connection = await openConnection("sqlite::memory:");
    for (const statement of SETUP) await connection.query(statement);
    engine = new QueryEngine({ connect: async () => connection });
    await engine.discoverSchema("sqlite::memory:");
  });

  afterAll(async () => {
    await engine.close();
  });

  it("discovers tables and declared keys through PRAGMA", async () => {
    const catalog = await discoverSchema(connection, { now: () => FIXED_NOW });
    expect(catalog.dialect).toBe("sqlite");
    expect(catalog.tables.map((t) => t.name)).toEqual(["departments", "employees"]);
    expect(findTable(catalog, "employees")?.foreignKeys).toEqual([
      { column: "dept_id", refTable: "departments", refColumn: "dept_id", inferred: false },
    ]);
    expect(findTable(catalog, "employees")?.primaryKey).toBe("emp_id");
  });

  it("counts rows", async () => {
    const response = await engine.runQuery("How many employees do we have?");
    expect(response.queryType).toBe("structured");
    expect(response.sql).toBe('SELECT COUNT(*) AS "count" FROM "employees" LIMIT ? OFFSET ?');
    expect(tableOf(response.results).rows).toEqual([{ count: 3 }]);
  });

  it("aggregates across a declared join", async () => {
    const response = await engine.runQuery("average salary by department");
    expect(tableOf(response.results).rows).toEqual([
      { dept_name: "Engineering", avg_annual_salary: 135000 },
      { dept_name: "HR", avg_annual_salary: 90000 },
    ]);
  });

  it("filters on a sampled value in a joined table", async () => {
    const response = await engine.runQuery("Show employees in Engineering");
    const table = tableOf(response.results);
    expect(table.rows.map((row) => row.full_name)).toEqual(["Alice Smith", "Bob Jones"]);
    expect(response.sources).toEqual([
      { type: "table", name: "employees" },
      { type: "table", name: "departments" },
    ]);
  });

  it("binds comparison values as parameters", async () => {
    const response = await engine.runQuery("employees with salary over 100k");
    expect(tableOf(response.results).rows.map((row) => row.emp_id)).toEqual([1, 2]);
  });

  it("expands a year into a date range", async () => {
    const response = await engine.runQuery("How many employees joined in 2020?");
    expect(tableOf(response.results).rows).toEqual([{ count: 1 }]);
  });

  it("pages through results", async () => {
    const response = await engine.runQuery("list employees", 2, 2);
    const table = tableOf(response.results);
    expect(table.page).toBe(2);
    expect(table.rows.map((row) => row.emp_id)).toEqual([3]);
  });

  it("rejects unsupported descriptors", async () => {
    await expect(openConnection("mongodb://localhost/test")).rejects.toBeInstanceOf(UnsupportedDescriptorError);
  });
});

describe("binary and timestamp columns on SQLite", () => {
  let connection: StorageConnection;
  let engine: QueryEngine;

  beforeAll(async () => {
    connection = await openConnection("sqlite::memory:");
    await connection.query(
      "CREATE TABLE events (event_id INTEGER PRIMARY KEY, title TEXT, created_at DATETIME, payload BLOB)"
    );
    await connection.query(`INSERT INTO events VALUES
      (1, 'Launch', '2020-12-31 23:30:00', x'0102'),
      (2, 'Kickoff', '2021-01-01 00:00:00', x'03')`);
    engine = new QueryEngine({ connect: async () => connection });
    await engine.discoverSchema("sqlite::memory:");
  });

  afterAll(async () => {
    await engine.close();
  });

  it("keeps tables whose sampled rows hold binary values", () => {
    const events = findTable(engine.getSchema(), "events");
    expect(events?.sampleRows).toEqual([
      { event_id: 1, title: "Launch", created_at: "2020-12-31 23:30:00" },
      { event_id: 2, title: "Kickoff", created_at: "2021-01-01 00:00:00" },
    ]);
    expect(Object.isFrozen(events?.sampleRows[0])).toBe(true);
  });

  it("counts timestamps late on the last day of a year", async () => {
    const response = await engine.runQuery("How many events were created in 2020?");
    expect(response.sql).toBe(
      'SELECT COUNT(*) AS "count" FROM "events" ' +
        'WHERE ("events"."created_at" >= ? AND "events"."created_at" < ?) LIMIT ? OFFSET ?'
    );
    expect(tableOf(response.results).rows).toEqual([{ count: 1 }]);
  });
});
