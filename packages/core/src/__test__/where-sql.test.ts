import { describe, test, expect } from "vitest";
import { WhereClause } from "../where-clause.js";
import { SqlWhereRenderer } from "../where-sql.js";
import { ErrInvalidFilterValue } from "../errors/basic-errors.js";

describe("SqlWhereRenderer", () => {
  const renderer = new SqlWhereRenderer();

  test("leaf comparison", () => {
    expect(renderer.render({ field: "status", op: "=", value: "active" })).toEqual({
      sql: '"status" = ?',
      params: ["active"],
    });
  });

  test("AND of two leaves", () => {
    const where = WhereClause.and(
      { field: "age", op: ">", value: "18" },
      { field: "country", op: "!=", value: "US" },
    );
    expect(renderer.render(where)).toEqual({
      sql: '("age" > ?) AND ("country" != ?)',
      params: ["18", "US"],
    });
  });

  test("nested OR inside AND", () => {
    const where = WhereClause.and(
      WhereClause.or(
        { field: "role", op: "in", value: ["admin", "owner"] },
        { field: "name", op: "like", value: "%ann%" },
      ),
      { field: "age", op: "<", value: "65" },
    );
    expect(renderer.render(where)).toEqual({
      sql: '(("role" IN (?, ?)) OR ("name" LIKE ?)) AND ("age" < ?)',
      params: ["admin", "owner", "%ann%", "65"],
    });
  });

  test("single-clause group renders without parentheses", () => {
    expect(renderer.render(WhereClause.or({ field: "a", op: "=", value: "1" })).sql).toBe('"a" = ?');
  });

  test("empty groups", () => {
    expect(renderer.render(WhereClause.and())).toEqual({ sql: "1 = 1", params: [] });
    expect(renderer.render(WhereClause.none())).toEqual({ sql: "1 = 0", params: [] });
  });

  test("custom field mapper", () => {
    const jsonRenderer = new SqlWhereRenderer((field) => `json_extract(properties, '$.${field}')`);
    expect(jsonRenderer.render({ field: "status", op: "=", value: "on" }).sql)
      .toBe("json_extract(properties, '$.status') = ?");
  });

  test("identifier quotes are escaped", () => {
    expect(renderer.render({ field: 'we"ird', op: "=", value: "x" }).sql).toBe('"we""ird" = ?');
  });

  test("IN with an empty or scalar value throws", () => {
    expect(() => renderer.render({ field: "role", op: "in", value: [] })).toThrow(
      "Filter on 'role' with operator in expects a non-empty list",
    );
    try {
      renderer.render({ field: "role", op: "in", value: "admin" });
      throw new Error("Expected render() to throw");
    } catch (err) {
      expect(ErrInvalidFilterValue.is(err)).toBe(true);
    }
  });
});

describe("WhereClause", () => {
  test("isLeaf distinguishes leaves from groups", () => {
    expect(WhereClause.isLeaf({ field: "a", op: "=", value: 1 })).toBe(true);
    expect(WhereClause.isLeaf(WhereClause.none())).toBe(false);
  });
});
