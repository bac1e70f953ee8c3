/**
 * @fileoverview CSV Parser Implementation
 *
 * Parses delimited billing exports into a {@link DataTable}. Handles the
 * delimiters, quoting and header quirks found in payer and card processor
 * exports: BOMs, duplicate or blank header names, ragged rows.
 */

import { readFile } from "fs/promises";
import { ReportFileError, toError } from "../types/errors";
import { createTable, type DataTable, type Row } from "../transformation/data-table";
import { sniffDialect } from "./csv-sniffer";
import { stripBom, tokenizeCSV } from "./csv-tokenizer";
import {
  CSVParsedData,
  CSVParserOptions,
  DEFAULT_CSV_PARSER_OPTIONS,
  ParserErrorCode,
} from "./parser-types";

/**
 * CSV Parser implementation
 */
export class CSVParser {
  private readonly options: CSVParserOptions;

  constructor(options: Partial<CSVParserOptions> = {}) {
    this.options = { ...DEFAULT_CSV_PARSER_OPTIONS, ...options };
  }

  /**
   * Read and parse a file from disk
   *
   * @throws {ReportFileError} When the file cannot be read, is too large, or holds no data
   */
  async parseFile(
    filePath: string,
    correlationId: string,
    overrides: Partial<CSVParserOptions> = {},
  ): Promise<CSVParsedData> {
    const options = { ...this.options, ...overrides };

    let fileBuffer: Buffer;
    try {
      fileBuffer = await readFile(filePath);
    } catch (error) {
      throw new ReportFileError(
        `Unable to read ${filePath}: ${toError(error).message}`,
        correlationId,
        filePath,
        "read",
        { code: ParserErrorCode.IO_ERROR },
      );
    }

    if (fileBuffer.length > options.maxFileSizeBytes) {
      throw new ReportFileError(
        `File size ${fileBuffer.length} bytes exceeds maximum allowed size of ${options.maxFileSizeBytes} bytes`,
        correlationId,
        filePath,
        "read",
        { code: ParserErrorCode.FILE_TOO_LARGE },
      );
    }

    const parsed = this.parseContent(fileBuffer.toString("utf8"), options);
    if (parsed.headers.length === 0 && parsed.rawRows.length === 0) {
      throw new ReportFileError(
        `CSV file ${filePath} contains no data`,
        correlationId,
        filePath,
        "parse",
        { code: ParserErrorCode.INVALID_FORMAT },
      );
    }

    return parsed;
  }

  /**
   * Parse CSV content string
   */
  parseContent(
    content: string,
    overrides: Partial<CSVParserOptions> = {},
  ): CSVParsedData {
    const options = { ...this.options, ...overrides };
    const text = stripBom(content);
    const warnings: string[] = [];

    const sniffed =
      options.delimiter === "auto" || options.quote === "auto"
        ? sniffDialect(text)
        : undefined;
    const dialect = {
      delimiter: options.delimiter === "auto" && sniffed ? sniffed.delimiter : options.delimiter,
      quote: options.quote === "auto" && sniffed ? sniffed.quote : options.quote,
    };

    const rowLimit =
      options.maxRows === undefined ? undefined : options.maxRows + (options.hasHeaders ? 1 : 0);
    const allRows = tokenizeCSV(text, dialect, options.skipEmptyLines, rowLimit);

    let headers: string[] = [];
    let dataRows = allRows;
    if (options.hasHeaders && allRows.length > 0) {
      headers = this.normalizeHeaders(allRows[0], warnings);
      dataRows = allRows.slice(1);
    }

    if (options.maxRows !== undefined) {
      dataRows = dataRows.slice(0, options.maxRows);
    }

    const columnCounts = dataRows.map((row) => row.length);
    const statistics = {
      dataRowCount: dataRows.length,
      inconsistentColumnCounts: this.countInconsistentRows(columnCounts),
      maxColumns: columnCounts.length > 0 ? Math.max(...columnCounts) : headers.length,
      minColumns: columnCounts.length > 0 ? Math.min(...columnCounts) : headers.length,
    };

    if (statistics.inconsistentColumnCounts > 0) {
      warnings.push(
        `${statistics.inconsistentColumnCounts} rows have inconsistent column counts`,
      );
    }

    return {
      headers,
      rawRows: dataRows,
      dialect,
      statistics,
      warnings,
    };
  }

  /**
   * Convert parsed rows into a table. Empty fields become `null`; values
   * past the last header land in generated `column_<n>` columns.
   */
  toDataTable(parsed: CSVParsedData): DataTable {
    const columns = [...parsed.headers];
    const widest = Math.max(columns.length, parsed.statistics.maxColumns);
    for (let i = columns.length; i < widest; i++) {
      columns.push(`column_${i + 1}`);
    }

    const rows = parsed.rawRows.map((raw) => {
      const row: Row = {};
      columns.forEach((column, index) => {
        const value = raw[index];
        row[column] = value === undefined || value === "" ? null : value;
      });
      return row;
    });

    return createTable(columns, rows);
  }

  /**
   * Read a file straight into a table
   */
  async readTable(
    filePath: string,
    correlationId: string,
    overrides: Partial<CSVParserOptions> = {},
  ): Promise<DataTable> {
    const parsed = await this.parseFile(filePath, correlationId, overrides);
    return this.toDataTable(parsed);
  }

  /**
   * Trim header names, name blank ones after their position and suffix
   * duplicates with `.1`, `.2`, ...
   */
  private normalizeHeaders(raw: string[], warnings: string[]): string[] {
    const seen = new Map<string, number>();

    return raw.map((header, index) => {
      let name = header.trim();
      if (name === "") {
        name = `column_${index + 1}`;
        warnings.push(`Blank header at position ${index + 1}, using ${name}`);
      }

      const occurrences = seen.get(name) ?? 0;
      seen.set(name, occurrences + 1);
      if (occurrences > 0) {
        warnings.push(`Duplicate header "${name}" renamed to "${name}.${occurrences}"`);
        return `${name}.${occurrences}`;
      }
      return name;
    });
  }

  /**
   * Count rows whose column count differs from the most common one
   */
  private countInconsistentRows(columnCounts: number[]): number {
    if (columnCounts.length === 0) return 0;

    const counts = new Map<number, number>();
    for (const value of columnCounts) {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    const [mostCommon] = Array.from(counts.entries()).reduce((a, b) =>
      b[1] > a[1] ? b : a,
    );

    return columnCounts.filter((count) => count !== mostCommon).length;
  }
}
