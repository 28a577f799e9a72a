import { beforeAll, describe, expect, it } from "vitest";
import type { MappedEntity } from "../src/services/executors/sql.types";
import { buildMapperIndex, mapEntities, tokenize, type MapperIndex } from "../src/services/mapping/entityMapper";
import { demoCatalog } from "./helpers/fixtures";

let index: MapperIndex;

beforeAll(async () => {
  index = buildMapperIndex(await demoCatalog());
});

function entityAt(entities: MappedEntity[], phrase: string): MappedEntity {
  const entity = entities.find((e) => e.phrase === phrase);
  if (!entity) throw new Error(`no entity for "${phrase}"`);
  return entity;
}

describe("tokenize", () => {
  it("splits words, numbers and ISO dates", () => {
    const tokens = tokenize("Employees hired after 2023-01-01 earning over $100,000 or 5k");
    expect(tokens.map((t) => t.text)).toEqual([
      "employees",
      "hired",
      "after",
      "2023-01-01",
      "earning",
      "over",
      "100000",
      "or",
      "5k",
    ]);
    expect(tokens.map((t) => t.kind)).toEqual(["word", "word", "word", "date", "word", "word", "number", "word", "number"]);
  });
});

describe("mapEntities", () => {
  it("maps a table name", () => {
    const mapping = mapEntities("How many employees do we have?", index);
    expect(mapping.entities).toEqual([
      {
        phrase: "employees",
        start: 2,
        end: 2,
        binding: { kind: "table", table: "employees" },
        confidence: 1,
        matchedBy: "name",
      },
    ]);
    expect(mapping.freeText).toEqual([]);
  });

  it("maps sampled values and leaves unknown words as free text", () => {
    const mapping = mapEntities("Show me all Python developers in Engineering", index);
    expect(mapping.entities).toEqual([
      {
        phrase: "engineering",
        start: 6,
        end: 6,
        binding: { kind: "value", table: "departments", column: "dept_name", value: "Engineering" },
        confidence: 0.95,
        matchedBy: "value",
      },
    ]);
    expect(mapping.freeText).toEqual(["python", "developers"]);
  });

  it("maps columns through semantic hints", () => {
    const mapping = mapEntities("employees with salary over 100k", index);
    expect(entityAt(mapping.entities, "salary")).toMatchObject({
      binding: { kind: "column", table: "employees", column: "annual_salary" },
      confidence: 0.85,
      matchedBy: "hint",
    });
  });

  it("binds a comparison literal to the nearest column", () => {
    const mapping = mapEntities("employees with salary over 100k", index);
    expect(entityAt(mapping.entities, "100k")).toEqual({
      phrase: "100k",
      start: 4,
      end: 4,
      confidence: 1,
      matchedBy: "pattern",
      binding: {
        kind: "literal",
        literalType: "number",
        value: 100000,
        operator: "gt",
        table: "employees",
        column: "annual_salary",
      },
    });
  });

  it("reads between ranges", () => {
    const mapping = mapEntities("employees hired between 2019 and 2020", index);
    expect(entityAt(mapping.entities, "2019 and 2020").binding).toEqual({
      kind: "literal",
      literalType: "number",
      value: [2019, 2020],
      operator: "between",
      table: "employees",
      column: "join_date",
    });
  });

  it("reads a row limit after top or first", () => {
    const mapping = mapEntities("first 2 employees", index);
    expect(entityAt(mapping.entities, "2").binding).toEqual({ kind: "limit", value: 2 });
    expect(mapping.freeText).toEqual([]);
  });

  it("prefers columns of a table named in the question", () => {
    const employees = mapEntities("names of employees", index);
    expect(entityAt(employees.entities, "names").binding).toEqual({
      kind: "column",
      table: "employees",
      column: "full_name",
    });

    const departments = mapEntities("list department names", index);
    expect(entityAt(departments.entities, "names").binding).toEqual({
      kind: "column",
      table: "departments",
      column: "dept_name",
    });
    expect(entityAt(departments.entities, "department").binding).toEqual({ kind: "table", table: "departments" });
  });

  it("tolerates small misspellings", () => {
    const mapping = mapEntities("How many employes are there?", index);
    expect(entityAt(mapping.entities, "employes")).toMatchObject({
      binding: { kind: "table", table: "employees" },
      confidence: 0.875,
    });
  });

  it("honours the confidence threshold", () => {
    const mapping = mapEntities("salary", index, { threshold: 0.9 });
    expect(mapping.entities).toEqual([]);
    expect(mapping.freeText).toEqual(["salary"]);
  });

  it("never treats operation words as free text", () => {
    expect(mapEntities("average salary", index).freeText).toEqual([]);
  });
});
