/**
 * @fileoverview CSV Output Generator
 *
 * Serializes a {@link DataTable} to delimited text in table column order.
 * Null cells become empty fields; dates are written with the configured
 * date format.
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { toError } from "../types/errors";
import type { CellValue, DataTable } from "../transformation/data-table";
import { formatDate } from "../transformation/rules";
import { Logger } from "../utils/logger";

/**
 * Configuration options for CSV generation
 */
export interface CSVGeneratorConfig {
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Quote character for fields containing special characters (default: '"') */
  quote?: string;
  /** Line ending style (default: '\n') */
  lineEnding?: "\n" | "\r\n";
  /** Whether to include headers in output (default: true) */
  includeHeaders?: boolean;
  /** Date format for Date cells (default: 'YYYY-MM-DD') */
  dateFormat?: string;
  /** Whether to quote all fields (default: false - only quote when necessary) */
  quoteAll?: boolean;
}

export interface CSVGenerationStats {
  totalRecords: number;
  fieldCount: number;
  outputSizeBytes: number;
}

export interface CSVGenerationResult {
  success: boolean;
  csvContent?: string;
  stats?: CSVGenerationStats;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export class CSVGenerator {
  private logger: Logger;
  private config: Required<CSVGeneratorConfig>;

  constructor(config: CSVGeneratorConfig = {}, logger?: Logger) {
    this.logger = logger || new Logger("CSVGenerator");
    this.config = { ...CSVGenerator.getDefaultConfig(), ...config };
  }

  generateCSV(table: DataTable, correlationId: string): CSVGenerationResult {
    const lines: string[] = [];

    if (this.config.includeHeaders) {
      lines.push(table.columns.map((column) => this.escapeField(column)).join(this.config.delimiter));
    }

    for (const row of table.rows) {
      lines.push(
        table.columns
          .map((column) => this.escapeField(this.formatValue(row[column] ?? null)))
          .join(this.config.delimiter),
      );
    }

    const csvContent = lines.length > 0 ? lines.join(this.config.lineEnding) + this.config.lineEnding : "";

    this.logger.debug("CSV generation completed", {
      correlationId,
      recordCount: table.rows.length,
      fieldCount: table.columns.length,
      outputSize: csvContent.length,
    });

    return {
      success: true,
      csvContent,
      stats: {
        totalRecords: table.rows.length,
        fieldCount: table.columns.length,
        outputSizeBytes: Buffer.byteLength(csvContent, "utf8"),
      },
    };
  }

  /**
   * Generate CSV and write it to `outputPath`, creating parent directories
   */
  async writeCSV(
    table: DataTable,
    outputPath: string,
    correlationId: string,
  ): Promise<CSVGenerationResult> {
    const result = this.generateCSV(table, correlationId);

    try {
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, result.csvContent ?? "", "utf8");
    } catch (error) {
      const cause = toError(error);
      this.logger.error("CSV write failed", cause, { correlationId, outputPath });
      return {
        success: false,
        error: {
          code: "CSV_WRITE_ERROR",
          message: `CSV write failed: ${cause.message}`,
          details: { outputPath, recordCount: table.rows.length },
        },
      };
    }

    this.logger.info("CSV written", {
      correlationId,
      outputPath,
      recordCount: table.rows.length,
    });
    return result;
  }

  private formatValue(value: CellValue): string {
    if (value === null) {
      return "";
    }
    if (value instanceof Date) {
      return formatDate(value, this.config.dateFormat);
    }
    return String(value);
  }

  /**
   * Escape a field value for CSV output
   */
  private escapeField(value: string): string {
    const needsQuoting =
      this.config.quoteAll ||
      value.includes(this.config.delimiter) ||
      value.includes(this.config.quote) ||
      value.includes("\n") ||
      value.includes("\r") ||
      value.startsWith(" ") ||
      value.endsWith(" ");

    if (!needsQuoting) {
      return value;
    }

    // Escape quotes by doubling them
    const escapedValue = value
      .split(this.config.quote)
      .join(this.config.quote + this.config.quote);

    return `${this.config.quote}${escapedValue}${this.config.quote}`;
  }

  static getDefaultConfig(): Required<CSVGeneratorConfig> {
    return {
      delimiter: ",",
      quote: '"',
      lineEnding: "\n",
      includeHeaders: true,
      dateFormat: "YYYY-MM-DD",
      quoteAll: false,
    };
  }
}
