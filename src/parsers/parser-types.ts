/**
 * @fileoverview Parser Type Definitions
 *
 * Core types used by the CSV sniffer and parser: dialect description,
 * parser options and the structure of parsed content.
 */

/**
 * Delimiter and quote character of a delimited text file
 */
export interface CSVDialect {
  delimiter: string;
  quote: string;
}

export interface CSVParserOptions {
  /** CSV delimiter character, or "auto" to sniff it */
  delimiter: string;

  /** Quote character, or "auto" to sniff it */
  quote: string;

  /** Whether first row contains headers */
  hasHeaders: boolean;

  /** Skip empty lines */
  skipEmptyLines: boolean;

  /** Maximum number of data rows to keep (all rows when undefined) */
  maxRows?: number;

  /** Maximum file size to process (in bytes) */
  maxFileSizeBytes: number;
}

/**
 * Default parser options
 */
export const DEFAULT_CSV_PARSER_OPTIONS: CSVParserOptions = {
  delimiter: "auto",
  quote: "auto",
  hasHeaders: true,
  skipEmptyLines: true,
  maxFileSizeBytes: 50 * 1024 * 1024, // 50MB
};

/**
 * CSV-specific parsed data structure
 */
export interface CSVParsedData {
  /** Column headers, de-duplicated (empty when parsed without headers) */
  headers: string[];

  /** Data rows as arrays of raw strings (header excluded) */
  rawRows: string[][];

  /** Dialect used for parsing */
  dialect: CSVDialect;

  /** Statistics about the data */
  statistics: {
    dataRowCount: number;
    inconsistentColumnCounts: number;
    maxColumns: number;
    minColumns: number;
  };

  /** Data quality warnings collected while parsing */
  warnings: string[];
}

/**
 * Error codes for parser failures
 */
export enum ParserErrorCode {
  FILE_TOO_LARGE = "FILE_TOO_LARGE",
  INVALID_FORMAT = "INVALID_FORMAT",
  PARSING_ERROR = "PARSING_ERROR",
  IO_ERROR = "IO_ERROR",
}
