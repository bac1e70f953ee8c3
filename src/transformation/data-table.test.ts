import { describe, it, expect } from "vitest";
import {
  cloneTable,
  createTable,
  emptyTable,
  getColumnValues,
  hasColumn,
  isDateColumn,
  isNullish,
  isNumericColumn,
  selectColumns,
  tableShape,
  withColumn,
} from "./data-table";

describe("data table helpers", () => {
  const table = createTable(
    ["id", "amount"],
    [
      { id: "1", amount: 10 },
      { id: "2", amount: null },
    ],
  );

  it("should report the shape as rows by columns", () => {
    expect(tableShape(table)).toEqual([2, 2]);
    expect(tableShape(emptyTable())).toEqual([0, 0]);
  });

  it("should copy rows without sharing them", () => {
    const copy = cloneTable(table);
    copy.rows[0].id = "changed";
    copy.columns.push("extra");

    expect(table.rows[0].id).toBe("1");
    expect(table.columns).toEqual(["id", "amount"]);
  });

  it("should read column values, treating missing keys as null", () => {
    expect(getColumnValues(table, "amount")).toEqual([10, null]);
    expect(getColumnValues(table, "absent")).toEqual([null, null]);
    expect(hasColumn(table, "id")).toBe(true);
    expect(hasColumn(table, "absent")).toBe(false);
  });

  it("should recognise null and undefined as nullish", () => {
    expect(isNullish(null)).toBe(true);
    expect(isNullish(undefined)).toBe(true);
    expect(isNullish(0)).toBe(false);
    expect(isNullish("")).toBe(false);
  });

  it("should classify typed columns by their non-null values", () => {
    const typed = createTable(
      ["when", "amount", "blank"],
      [
        { when: new Date(Date.UTC(2025, 0, 1)), amount: 1, blank: null },
        { when: null, amount: 2.5, blank: null },
      ],
    );

    expect(isDateColumn(typed, "when")).toBe(true);
    expect(isNumericColumn(typed, "amount")).toBe(true);
    expect(isNumericColumn(table, "id")).toBe(false);
    expect(isDateColumn(typed, "blank")).toBe(false);
    expect(isNumericColumn(typed, "blank")).toBe(false);
  });

  it("should append new columns and overwrite existing ones in place", () => {
    const added = withColumn(table, "flag", (_row, index) => index);
    const replaced = withColumn(table, "id", (row) => `#${String(row.id)}`);

    expect(added.columns).toEqual(["id", "amount", "flag"]);
    expect(getColumnValues(added, "flag")).toEqual([0, 1]);
    expect(replaced.columns).toEqual(["id", "amount"]);
    expect(getColumnValues(replaced, "id")).toEqual(["#1", "#2"]);
    expect(getColumnValues(table, "id")).toEqual(["1", "2"]);
  });

  it("should project onto the requested columns in order", () => {
    const projected = selectColumns(table, ["amount", "notes", "id"]);

    expect(projected.columns).toEqual(["amount", "notes", "id"]);
    expect(projected.rows).toEqual([
      { amount: 10, notes: null, id: "1" },
      { amount: null, notes: null, id: "2" },
    ]);
  });
});
