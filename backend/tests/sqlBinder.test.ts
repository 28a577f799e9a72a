import { beforeAll, describe, expect, it } from "vitest";
import { quoteIdentifier } from "../src/db/client";
import { buildSQLFromPlan } from "../src/services/executors/sql.binder";
import { buildQueryPlan } from "../src/services/executors/sql.planner";
import type { QueryPlan } from "../src/services/executors/sql.types";
import { buildMapperIndex } from "../src/services/mapping/entityMapper";
import { classifyQuery } from "../src/services/orchestration/classifier";
import type { SchemaCatalog } from "../src/services/sql/schema_catalog";
import { demoCatalog } from "./helpers/fixtures";

let catalog: SchemaCatalog;

beforeAll(async () => {
  catalog = await demoCatalog();
});

function countPlan(overrides: Partial<QueryPlan> = {}): QueryPlan {
  return {
    operation: "count",
    from: "employees",
    joins: [],
    select: [{ kind: "aggregate", fn: "count", alias: "count" }],
    filters: [],
    params: [],
    groupBy: [],
    orderBy: [],
    page: 1,
    pageSize: 50,
    limit: 50,
    offset: 0,
    notes: [],
    ...overrides,
  };
}

describe("buildSQLFromPlan", () => {
  it("renders a count with paging bindings", () => {
    expect(buildSQLFromPlan(countPlan(), catalog)).toEqual({
      sql: 'SELECT COUNT(*) AS "count" FROM "employees" LIMIT ? OFFSET ?',
      params: [50, 0],
    });
  });

  it("quotes identifiers for MySQL", async () => {
    const mysql = await demoCatalog({ dialect: "mysql" });
    expect(buildSQLFromPlan(countPlan(), mysql).sql).toBe("SELECT COUNT(*) AS `count` FROM `employees` LIMIT ? OFFSET ?");
  });

  it("renders joins, grouping and ordering", () => {
    const plan = buildQueryPlan(classifyQuery("average salary by department", buildMapperIndex(catalog)), catalog);
    expect(buildSQLFromPlan(plan, catalog)).toEqual({
      sql:
        'SELECT "departments"."dept_name" AS "dept_name", AVG("employees"."annual_salary") AS "avg_annual_salary" ' +
        'FROM "employees" JOIN "departments" ON "employees"."dept_id" = "departments"."dept_id" ' +
        'GROUP BY "departments"."dept_name" ORDER BY "avg_annual_salary" DESC LIMIT ? OFFSET ?',
      params: [50, 0],
    });
  });

  it("binds filter values in order", () => {
    const plan = countPlan({
      filters: [
        { column: { table: "employees", column: "join_date" }, operator: "between", placeholders: [":p1", ":p2"] },
        { column: { table: "employees", column: "annual_salary" }, operator: "gte", placeholders: [":p3"] },
      ],
      params: [
        { placeholder: ":p1", value: "2020-01-01" },
        { placeholder: ":p2", value: "2020-12-31" },
        { placeholder: ":p3", value: 90000 },
      ],
      limit: 10,
      offset: 20,
    });
    expect(buildSQLFromPlan(plan, catalog)).toEqual({
      sql:
        'SELECT COUNT(*) AS "count" FROM "employees" ' +
        'WHERE "employees"."join_date" BETWEEN ? AND ? AND "employees"."annual_salary" >= ? LIMIT ? OFFSET ?',
      params: ["2020-01-01", "2020-12-31", 90000, 10, 20],
    });
  });

  it("renders a range as an inclusive lower and exclusive upper bound", () => {
    const plan = countPlan({
      filters: [{ column: { table: "employees", column: "join_date" }, operator: "range", placeholders: [":p1", ":p2"] }],
      params: [
        { placeholder: ":p1", value: "2020-01-01" },
        { placeholder: ":p2", value: "2021-01-01" },
      ],
    });
    expect(buildSQLFromPlan(plan, catalog)).toEqual({
      sql:
        'SELECT COUNT(*) AS "count" FROM "employees" ' +
        'WHERE ("employees"."join_date" >= ? AND "employees"."join_date" < ?) LIMIT ? OFFSET ?',
      params: ["2020-01-01", "2021-01-01", 50, 0],
    });
  });

  it("rejects identifiers missing from the catalog", () => {
    expect(() => buildSQLFromPlan(countPlan({ from: "payroll" }), catalog)).toThrow("Unknown table: payroll");
    const plan = countPlan({
      select: [{ kind: "column", ref: { table: "employees", column: "password" }, alias: "password" }],
    });
    expect(() => buildSQLFromPlan(plan, catalog)).toThrow("Unknown column: employees.password");
  });

  it("rejects a filter without its parameter", () => {
    const plan = countPlan({
      filters: [{ column: { table: "employees", column: "position" }, operator: "eq", placeholders: [":p1"] }],
    });
    expect(() => buildSQLFromPlan(plan, catalog)).toThrow("Missing parameter for employees.position");
  });

  it("drops ordering by an alias that is not selected", () => {
    const plan = countPlan({ orderBy: [{ by: "nope", direction: "desc" }] });
    expect(buildSQLFromPlan(plan, catalog).sql).toBe('SELECT COUNT(*) AS "count" FROM "employees" LIMIT ? OFFSET ?');
  });
});

describe("quoteIdentifier", () => {
  it("doubles embedded quote characters", () => {
    expect(quoteIdentifier("postgres", 'we"ird')).toBe('"we""ird"');
    expect(quoteIdentifier("mysql", "we`ird")).toBe("`we``ird`");
  });
});
