/**
 * @fileoverview In-memory tabular data model shared by the parser, the
 * transformation rules and the output generator.
 */

/**
 * A single cell. Empty CSV fields load as `null`.
 */
export type CellValue = string | number | Date | null;

export type Row = Record<string, CellValue>;

/**
 * Ordered columns plus row records keyed by column name
 */
export interface DataTable {
  columns: string[];
  rows: Row[];
}

/**
 * `[rowCount, columnCount]`
 */
export type TableShape = [number, number];

export function emptyTable(): DataTable {
  return { columns: [], rows: [] };
}

export function createTable(columns: string[], rows: Row[]): DataTable {
  return { columns: [...columns], rows };
}

/**
 * Shallow copy: new column list and new row objects, cell values shared
 */
export function cloneTable(table: DataTable): DataTable {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) => ({ ...row })),
  };
}

export function tableShape(table: DataTable): TableShape {
  return [table.rows.length, table.columns.length];
}

export function hasColumn(table: DataTable, column: string): boolean {
  return table.columns.includes(column);
}

export function getColumnValues(table: DataTable, column: string): CellValue[] {
  return table.rows.map((row) => row[column] ?? null);
}

export function isNullish(value: CellValue | undefined): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * True when the column holds at least one value and every non-null value is a Date
 */
export function isDateColumn(table: DataTable, column: string): boolean {
  const values = getColumnValues(table, column).filter((value) => value !== null);
  return values.length > 0 && values.every((value) => value instanceof Date);
}

/**
 * True when the column holds at least one value and every non-null value is a number
 */
export function isNumericColumn(table: DataTable, column: string): boolean {
  const values = getColumnValues(table, column).filter((value) => value !== null);
  return values.length > 0 && values.every((value) => typeof value === "number");
}

/**
 * Returns a new table with `column` set on every row, appending the column
 * name when it does not exist yet
 */
export function withColumn(
  table: DataTable,
  column: string,
  valueFor: (row: Row, index: number) => CellValue,
): DataTable {
  return {
    columns: hasColumn(table, column) ? [...table.columns] : [...table.columns, column],
    rows: table.rows.map((row, index) => ({ ...row, [column]: valueFor(row, index) })),
  };
}

/**
 * Projects the table onto `columns` in that order, null-filling any that are absent
 */
export function selectColumns(table: DataTable, columns: readonly string[]): DataTable {
  return {
    columns: [...columns],
    rows: table.rows.map((row) => {
      const projected: Row = {};
      for (const column of columns) {
        projected[column] = row[column] ?? null;
      }
      return projected;
    }),
  };
}
