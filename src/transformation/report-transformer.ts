/**
 * @fileoverview Report Transformer
 *
 * Turns a recognized billing report into the canonical transaction table:
 * detect (unless a format is given), run the format's rule pipeline, force
 * the canonical column set, then validate. Every failure is reported in the
 * returned metadata; `transform` never rejects.
 */

import { FormatDetectionResult, ReportFormatDetector } from "../detection/format-detector";
import { FormatRegistry } from "../detection/format-registry";
import { CSVParser } from "../parsers/csv-parser";
import { generateCorrelationId, toError } from "../types/errors";
import { createCorrelatedLogger, logDataQualityIssue } from "../utils/logger";
import {
  emptyTable,
  getColumnValues,
  hasColumn,
  isDateColumn,
  selectColumns,
  tableShape,
  type DataTable,
  type TableShape,
} from "./data-table";
import { createDefaultPipelines, type TransformationPipeline } from "./pipelines";
import type { TransformationRule } from "./rules";

export const CANONICAL_COLUMNS = [
  "transaction_id",
  "transaction_date",
  "patient_id",
  "provider_id",
  "provider_name",
  "cash_applied",
  "insurance_payment",
  "patient_payment",
  "adjustment_amount",
  "payer_name",
  "payment_type",
  "claim_number",
  "cpt_code",
  "diagnosis_code",
  "service_date",
  "notes",
] as const;

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

const REQUIRED_COLUMNS: readonly CanonicalColumn[] = [
  "transaction_date",
  "cash_applied",
  "provider_name",
];

const VALIDATED_DATE_COLUMNS: readonly CanonicalColumn[] = ["transaction_date", "service_date"];

const STRICT_ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export type TransformationErrorType = "detection_failed" | "pipeline_missing" | "execution_failed";

export interface TransformationLogEntry {
  rule: string;
  description: string;
  beforeShape: TableShape;
  afterShape: TableShape;
}

export interface ValidationIssue {
  type: "missing_required" | "negative_values" | "date_format";
  column: string;
  count: number;
  message: string;
}

export interface TransformationSuccess {
  success: boolean;
  errorType?: undefined;
  format: string;
  filePath: string;
  transformationLog: TransformationLogEntry[];
  validationErrors: ValidationIssue[];
  detection?: FormatDetectionResult;
}

export interface TransformationFailure {
  success: false;
  error: string;
  errorType: TransformationErrorType;
  filePath: string;
  format?: string;
  detection?: FormatDetectionResult;
}

export type TransformationMetadata = TransformationSuccess | TransformationFailure;

export interface TransformationOutcome {
  table: DataTable;
  metadata: TransformationMetadata;
}

export class ReportTransformer {
  readonly detector: ReportFormatDetector;
  private readonly pipelines: Map<string, TransformationPipeline>;
  private readonly parser = new CSVParser();

  constructor(
    detector: ReportFormatDetector,
    pipelines: Map<string, TransformationPipeline> = createDefaultPipelines(),
  ) {
    this.detector = detector;
    this.pipelines = new Map(pipelines);
  }

  registerPipeline(formatName: string, rules: readonly TransformationRule[]): void {
    this.pipelines.set(formatName, [...rules]);
  }

  listPipelines(): string[] {
    return Array.from(this.pipelines.keys());
  }

  async transform(filePath: string, formatName?: string): Promise<TransformationOutcome> {
    const correlationId = generateCorrelationId();
    const logger = createCorrelatedLogger(correlationId, {
      filePath,
      operation: "transform_report",
    });
    logger.info("Transforming report");

    let format = formatName;
    let detection: FormatDetectionResult | undefined;

    if (!format) {
      detection = await this.detector.detectFormat(filePath);
      if (detection.formatName === null) {
        logger.error("Could not detect file format");
        return failure({
          error: "Could not detect file format",
          errorType: "detection_failed",
          filePath,
          detection,
        });
      }
      format = detection.formatName;
      logger.info(`Detected format: ${format} (confidence: ${detection.confidence.toFixed(2)})`, {
        formatName: format,
      });
    }

    const pipeline = this.pipelines.get(format);
    if (!pipeline) {
      const error = `No transformation pipeline defined for format ${format}`;
      logger.error(error, undefined, { formatName: format });
      return failure({ error, errorType: "pipeline_missing", filePath, format, detection });
    }

    try {
      let table = await this.parser.readTable(filePath, correlationId);
      const transformationLog: TransformationLogEntry[] = [];

      for (const rule of pipeline) {
        const beforeShape = tableShape(table);
        table = rule.apply(table);
        transformationLog.push({
          rule: rule.name,
          description: rule.description,
          beforeShape,
          afterShape: tableShape(table),
        });
      }

      table = selectColumns(table, CANONICAL_COLUMNS);
      const validationErrors = this.validateTransformation(table, format);

      logger.info("Report transformed", {
        formatName: format,
        rowCount: table.rows.length,
        validationErrorCount: validationErrors.length,
      });

      return {
        table,
        metadata: {
          format,
          filePath,
          transformationLog,
          validationErrors,
          success: validationErrors.length === 0,
          detection,
        },
      };
    } catch (error) {
      const cause = toError(error);
      logger.error("Error transforming report", cause, { formatName: format });
      return failure({
        error: cause.message,
        errorType: "execution_failed",
        filePath,
        format,
        detection,
      });
    }
  }

  /**
   * Data quality checks over a canonical table. Each finding is also logged
   * as a data quality issue against `transformed_data`.
   */
  validateTransformation(table: DataTable, formatName: string): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    for (const column of REQUIRED_COLUMNS) {
      const missing = getColumnValues(table, column).filter((value) => value === null).length;
      if (missing > 0) {
        issues.push({
          type: "missing_required",
          column,
          count: missing,
          message: `Missing ${missing} values in required column ${column}`,
        });
      }
    }

    if (hasColumn(table, "cash_applied")) {
      const negative = getColumnValues(table, "cash_applied").filter(
        (value) => typeof value === "number" && value < 0,
      ).length;
      if (negative > 0) {
        issues.push({
          type: "negative_values",
          column: "cash_applied",
          count: negative,
          message: `Found ${negative} negative values in cash_applied column`,
        });
      }
    }

    for (const column of VALIDATED_DATE_COLUMNS) {
      if (!hasColumn(table, column) || isDateColumn(table, column)) {
        continue;
      }

      const invalid = getColumnValues(table, column).filter(
        (value) => value !== null && !isStrictIsoDate(value),
      );
      if (invalid.length > 0) {
        issues.push({
          type: "date_format",
          column,
          count: invalid.length,
          message: `Date format issues in ${column}: unable to parse "${String(invalid[0])}" as an ISO date`,
        });
      }
    }

    for (const issue of issues) {
      logDataQualityIssue("transformed_data", issue.column, issue.message, issue.count, {
        formatName,
      });
    }

    return issues;
  }
}

function isStrictIsoDate(value: unknown): boolean {
  if (value instanceof Date) {
    return !Number.isNaN(value.getTime());
  }
  if (typeof value !== "string") {
    return false;
  }

  const match = STRICT_ISO_DATE.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function failure(metadata: Omit<TransformationFailure, "success">): TransformationOutcome {
  return { table: emptyTable(), metadata: { ...metadata, success: false } };
}

export interface TransformFileOptions {
  /** Transformer to use; one backed by the configured registry otherwise */
  transformer?: ReportTransformer;
}

export type TransformFileResult = TransformationMetadata & {
  rowCount?: number;
  columnCount?: number;
};

/**
 * Transform a file and return its metadata, with row and column counts
 * when the resulting table is not empty
 */
export async function transformFile(
  filePath: string,
  formatName?: string,
  options: TransformFileOptions = {},
): Promise<TransformFileResult> {
  const transformer =
    options.transformer ?? new ReportTransformer(new ReportFormatDetector(new FormatRegistry()));
  const { table, metadata } = await transformer.transform(filePath, formatName);

  if (table.rows.length === 0) {
    return metadata;
  }
  return { ...metadata, rowCount: table.rows.length, columnCount: table.columns.length };
}
