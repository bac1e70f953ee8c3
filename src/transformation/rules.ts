/**
 * @fileoverview Transformation rules
 *
 * Each rule is a pure step from one {@link DataTable} to a new one. Rules
 * never mutate their input; a pipeline is an ordered list of them.
 */

import { Logger } from "../utils/logger";
import {
  cloneTable,
  hasColumn,
  isDateColumn,
  isNumericColumn,
  withColumn,
  type CellValue,
  type DataTable,
  type Row,
} from "./data-table";

const logger = new Logger("TransformationRules");

export interface TransformationRule {
  readonly name: string;
  readonly description: string;
  apply(table: DataTable): DataTable;
}

export type MergeFunction = (row: Row, sourceColumns: readonly string[]) => CellValue;

export const DEFAULT_INPUT_DATE_FORMATS: readonly string[] = [
  "MM/DD/YY",
  "MM/DD/YYYY",
  "MM-DD-YYYY",
  "MM-DD-YY",
  "YYYY-MM-DD",
  "YYYY/MM/DD",
  "DD-MM-YYYY",
  "DD/MM/YYYY",
];

export const DEFAULT_OUTPUT_DATE_FORMAT = "YYYY-MM-DD";

const ISO_DATE_PATTERN =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/** Optional `hh:mm[:ss] [AM|PM]` after a date; the time itself is discarded */
const TIME_SUFFIX = "(?:,?\\s+\\d{1,2}:\\d{2}(?::\\d{2})?(?:\\s*[AaPp]\\.?[Mm]\\.?)?)?";

/** Month-first numeric dates: `1/4/2025`, `01-04-25 10:15 AM` */
const US_DATE_PATTERN = new RegExp(`^(\\d{1,2})([-/])(\\d{1,2})\\2(\\d{4}|\\d{2})${TIME_SUFFIX}$`);

/** `Jan 4, 2025`, `January 4th 2025` */
const MONTH_NAME_FIRST_PATTERN = new RegExp(
  `^([A-Za-z]{3,9})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})${TIME_SUFFIX}$`,
);

/** `4 Jan 2025`, `04-Jan-2025` */
const DAY_FIRST_NAME_PATTERN = new RegExp(
  `^(\\d{1,2})[\\s-]([A-Za-z]{3,9})\\.?[\\s-](\\d{4})${TIME_SUFFIX}$`,
);

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

/**
 * 1-based month for a full or three-letter English month name
 */
function monthFromName(name: string): number | null {
  const lower = name.toLowerCase();
  const index = MONTH_NAMES.findIndex(
    (month) => month === lower || month.slice(0, 3) === lower || (lower === "sept" && month === "september"),
  );
  return index === -1 ? null : index + 1;
}

const DATE_TOKEN_PATTERN = /YYYY|YY|MM|DD/g;

/**
 * Build a UTC midnight date, rejecting rolled-over values such as 02/30
 */
function utcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Two-digit years 00-68 land in 2000-2068, 69-99 in 1969-1999
 */
export function expandTwoDigitYear(year: number): number {
  return year <= 68 ? 2000 + year : 1900 + year;
}

/**
 * Parse Date instances and common date strings: ISO `YYYY-MM-DD` /
 * `YYYY/MM/DD`, month-first `MM/DD/YYYY` or `MM-DD-YY`, and English month
 * names (`Jan 4, 2025`, `4 Jan 2025`). A trailing time part is dropped.
 */
export function parseDateAuto(value: CellValue): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== "string") {
    return null;
  }

  const text = value.trim();

  const iso = ISO_DATE_PATTERN.exec(text);
  if (iso) {
    return utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const us = US_DATE_PATTERN.exec(text);
  if (us) {
    const year = us[4].length === 2 ? expandTwoDigitYear(Number(us[4])) : Number(us[4]);
    return utcDate(year, Number(us[1]), Number(us[3]));
  }

  const monthFirst = MONTH_NAME_FIRST_PATTERN.exec(text);
  if (monthFirst) {
    const month = monthFromName(monthFirst[1]);
    return month === null ? null : utcDate(Number(monthFirst[3]), month, Number(monthFirst[2]));
  }

  const dayFirst = DAY_FIRST_NAME_PATTERN.exec(text);
  if (dayFirst) {
    const month = monthFromName(dayFirst[2]);
    return month === null ? null : utcDate(Number(dayFirst[3]), month, Number(dayFirst[1]));
  }

  return null;
}

/**
 * Parse a string against a format built from `YYYY`, `YY`, `MM` and `DD`
 * tokens. Month and day accept one or two digits.
 */
export function parseDateWithFormat(value: string, format: string): Date | null {
  const order: string[] = [];
  let source = "";
  let lastIndex = 0;

  for (const match of format.matchAll(DATE_TOKEN_PATTERN)) {
    const index = match.index ?? 0;
    source += escapeRegExp(format.slice(lastIndex, index));
    source += match[0] === "YYYY" ? "(\\d{4})" : match[0] === "YY" ? "(\\d{2})" : "(\\d{1,2})";
    order.push(match[0]);
    lastIndex = index + match[0].length;
  }
  source += escapeRegExp(format.slice(lastIndex));

  const parsed = new RegExp(`^${source}$`).exec(value.trim());
  if (!parsed) {
    return null;
  }

  let year: number | undefined;
  let month: number | undefined;
  let day: number | undefined;
  for (let position = 0; position < order.length; position++) {
    const part = Number(parsed[position + 1]);
    const token = order[position];
    if (token === "YYYY") year = part;
    else if (token === "YY") year = expandTwoDigitYear(part);
    else if (token === "MM") month = part;
    else day = part;
  }

  if (year === undefined || month === undefined || day === undefined) {
    return null;
  }
  return utcDate(year, month, day);
}

export function formatDate(date: Date, format: string): string {
  return format.replace(DATE_TOKEN_PATTERN, (token) => {
    switch (token) {
      case "YYYY":
        return String(date.getUTCFullYear()).padStart(4, "0");
      case "YY":
        return String(date.getUTCFullYear() % 100).padStart(2, "0");
      case "MM":
        return String(date.getUTCMonth() + 1).padStart(2, "0");
      default:
        return String(date.getUTCDate()).padStart(2, "0");
    }
  });
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class RenameColumnsRule implements TransformationRule {
  readonly name: string;
  readonly description = "Rename columns according to mapping";
  readonly columnMap: Readonly<Record<string, string>>;

  constructor(columnMap: Record<string, string>, name: string = "rename_columns") {
    this.columnMap = columnMap;
    this.name = name;
  }

  apply(table: DataTable): DataTable {
    const renames = new Map(
      Object.entries(this.columnMap).filter(([source]) => hasColumn(table, source)),
    );

    if (renames.size === 0) {
      logger.warn(`No columns matched for renaming rule ${this.name}`, {
        rule: this.name,
      });
      return cloneTable(table);
    }

    const rename = (column: string): string => renames.get(column) ?? column;
    const columns = Array.from(new Set(table.columns.map(rename)));
    const rows = table.rows.map((row) => {
      const renamed: Row = {};
      for (const column of table.columns) {
        renamed[rename(column)] = row[column] ?? null;
      }
      return renamed;
    });

    return { columns, rows };
  }
}

export class DateFormatRule implements TransformationRule {
  readonly name: string;
  readonly description: string;
  readonly columns: readonly string[];
  readonly inputFormats: readonly string[];
  readonly outputFormat: string;

  constructor(
    columns: string[],
    inputFormats: readonly string[] = DEFAULT_INPUT_DATE_FORMATS,
    outputFormat: string = DEFAULT_OUTPUT_DATE_FORMAT,
    name: string = "standardize_dates",
  ) {
    this.columns = columns;
    this.inputFormats = inputFormats;
    this.outputFormat = outputFormat;
    this.name = name;
    this.description = `Standardize date formats in columns: ${columns.join(", ")}`;
  }

  apply(table: DataTable): DataTable {
    let result = cloneTable(table);

    for (const column of this.columns) {
      if (!hasColumn(result, column)) {
        logger.warn(`Column ${column} not found for date formatting`, { rule: this.name });
        continue;
      }
      if (isDateColumn(result, column)) {
        continue;
      }

      let failures = 0;
      result = withColumn(result, column, (row) => {
        const value = row[column] ?? null;
        if (value === null) {
          return null;
        }

        const parsed = this.parse(value);
        if (parsed === null) {
          failures++;
          return null;
        }
        return formatDate(parsed, this.outputFormat);
      });

      if (failures > 0) {
        logger.warn(`Failed to parse ${failures} date values in column ${column}`, {
          rule: this.name,
          column,
          count: failures,
        });
      }
    }

    return result;
  }

  private parse(value: CellValue): Date | null {
    const automatic = parseDateAuto(value);
    if (automatic !== null || typeof value !== "string") {
      return automatic;
    }

    for (const format of this.inputFormats) {
      const parsed = parseDateWithFormat(value, format);
      if (parsed !== null) {
        return parsed;
      }
    }
    return null;
  }
}

export class NumberFormatRule implements TransformationRule {
  readonly name: string;
  readonly description: string;
  readonly columns: readonly string[];

  constructor(columns: string[], name: string = "standardize_numbers") {
    this.columns = columns;
    this.name = name;
    this.description = `Standardize number formats in columns: ${columns.join(", ")}`;
  }

  apply(table: DataTable): DataTable {
    let result = cloneTable(table);

    for (const column of this.columns) {
      if (!hasColumn(result, column)) {
        logger.warn(`Column ${column} not found for number formatting`, { rule: this.name });
        continue;
      }
      if (isNumericColumn(result, column)) {
        continue;
      }

      let failures = 0;
      result = withColumn(result, column, (row) => {
        const value = row[column] ?? null;
        if (value === null || typeof value === "number") {
          return value;
        }

        const cleaned = typeof value === "string" ? value.replace(/[$,()%]/g, "").trim() : "";
        const parsed = cleaned === "" ? NaN : Number(cleaned);
        if (!Number.isFinite(parsed)) {
          failures++;
          return null;
        }
        return parsed;
      });

      if (failures > 0) {
        logger.warn(`Failed to parse ${failures} numeric values in column ${column}`, {
          rule: this.name,
          column,
          count: failures,
        });
      }
    }

    return result;
  }
}

export class MergeColumnsRule implements TransformationRule {
  readonly name: string;
  readonly description: string;
  readonly sourceColumns: readonly string[];
  readonly targetColumn: string;
  private readonly mergeFn: MergeFunction;

  constructor(
    sourceColumns: string[],
    targetColumn: string,
    mergeFn?: MergeFunction,
    name: string = "merge_columns",
  ) {
    this.sourceColumns = sourceColumns;
    this.targetColumn = targetColumn;
    this.mergeFn = mergeFn ?? firstNonNull;
    this.name = name;
    this.description = `Merge columns ${sourceColumns.join(", ")} into ${targetColumn}`;
  }

  apply(table: DataTable): DataTable {
    const present = this.sourceColumns.filter((column) => hasColumn(table, column));
    if (present.length === 0) {
      logger.warn(`No source columns found for merge rule ${this.name}`, { rule: this.name });
      return cloneTable(table);
    }

    return withColumn(table, this.targetColumn, (row) => this.mergeFn(row, this.sourceColumns));
  }
}

/**
 * Default merge: first non-null value in source column order
 */
export function firstNonNull(row: Row, sourceColumns: readonly string[]): CellValue {
  for (const column of sourceColumns) {
    const value = row[column];
    if (value !== null && value !== undefined) {
      return value;
    }
  }
  return null;
}

export class SplitColumnRule implements TransformationRule {
  readonly name: string;
  readonly description: string;
  readonly sourceColumn: string;
  readonly targetColumns: readonly string[];
  readonly pattern: RegExp;

  constructor(
    sourceColumn: string,
    targetColumns: string[],
    pattern: string | RegExp,
    name: string = "split_column",
  ) {
    this.sourceColumn = sourceColumn;
    this.targetColumns = targetColumns;
    // A global or sticky pattern would carry lastIndex from one row to the next
    this.pattern =
      typeof pattern === "string"
        ? new RegExp(pattern)
        : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
    this.name = name;
    this.description = `Split column ${sourceColumn} into ${targetColumns.join(", ")}`;
  }

  apply(table: DataTable): DataTable {
    if (!hasColumn(table, this.sourceColumn)) {
      logger.warn(`Source column ${this.sourceColumn} not found for split rule ${this.name}`, {
        rule: this.name,
      });
      return cloneTable(table);
    }

    const matches = table.rows.map((row) => {
      const value = row[this.sourceColumn] ?? null;
      return value === null ? null : this.pattern.exec(String(value));
    });

    return this.targetColumns.reduce(
      (result, target, position) =>
        withColumn(result, target, (_row, index) => matches[index]?.[position + 1] ?? null),
      table,
    );
  }
}

export class AddConstantRule implements TransformationRule {
  readonly name: string;
  readonly description: string;
  readonly column: string;
  readonly value: CellValue;

  constructor(column: string, value: CellValue, name: string = "add_constant") {
    this.column = column;
    this.value = value;
    this.name = name;
    this.description = `Add constant column ${column} with value '${String(value)}'`;
  }

  apply(table: DataTable): DataTable {
    return withColumn(table, this.column, () => this.value);
  }
}

export class ForwardFillRule implements TransformationRule {
  readonly name: string;
  readonly description: string;
  readonly columns: readonly string[];

  constructor(columns: string[], name: string = "forward_fill") {
    this.columns = columns;
    this.name = name;
    this.description = `Forward-fill missing values in columns: ${columns.join(", ")}`;
  }

  apply(table: DataTable): DataTable {
    return this.columns
      .filter((column) => hasColumn(table, column))
      .reduce((result, column) => {
        let last: CellValue = null;
        return withColumn(result, column, (row) => {
          const value = row[column] ?? null;
          if (value !== null) {
            last = value;
          }
          return last;
        });
      }, cloneTable(table));
  }
}
