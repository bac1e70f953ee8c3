/**
 * @fileoverview Batch Processor
 *
 * Runs every report in a directory through a {@link ReportTransformer}.
 * Files are processed one at a time in path order; a failing file is
 * recorded and the batch moves on.
 */

import { readdir } from "fs/promises";
import { basename, extname, join } from "path";
import { CSVGenerator } from "../output/csv-generator";
import type { ReportTransformer, TransformationErrorType } from "../transformation/report-transformer";
import { generateCorrelationId } from "../types/errors";
import { createCorrelatedLogger } from "../utils/logger";

export interface BatchOptions {
  /** Descend into subdirectories (default: false) */
  recursive?: boolean;
  /** File extensions to pick up, case-insensitive (default: ['.csv']) */
  extensions?: string[];
  /** When set, each transformed table is written here as `<name>.normalized.csv` */
  outputDir?: string;
}

export interface BatchFileResult {
  filePath: string;
  formatName: string | null;
  success: boolean;
  rowCount: number;
  validationErrorCount: number;
  outputPath?: string;
  error?: string;
  errorType?: BatchErrorType;
}

/** Transformation failures plus `write_failed` for output that could not be written */
export type BatchErrorType = TransformationErrorType | "write_failed";

export interface BatchSummary {
  directory: string;
  filesFound: number;
  /** Files whose format was known, given or detected */
  recognized: number;
  /** Files that produced a canonical table, whether or not it could be written */
  transformed: number;
  /** Transformed and written files with no validation findings */
  validated: number;
  /** Files that could not be transformed or whose output could not be written */
  failed: number;
  results: BatchFileResult[];
}

export class BatchProcessor {
  private readonly generator = new CSVGenerator();

  constructor(private readonly transformer: ReportTransformer) {}

  async processDirectory(directory: string, options: BatchOptions = {}): Promise<BatchSummary> {
    const correlationId = generateCorrelationId();
    const logger = createCorrelatedLogger(correlationId, {
      operation: "batch_process",
      directory,
    });

    const extensions = (options.extensions ?? [".csv"]).map((extension) => extension.toLowerCase());
    const files = await this.findFiles(directory, extensions, options.recursive ?? false);
    logger.info(`Found ${files.length} files to process`, { filesFound: files.length });

    const results: BatchFileResult[] = [];
    for (const filePath of files) {
      results.push(await this.processFile(filePath, options.outputDir, correlationId));
    }

    const summary: BatchSummary = {
      directory,
      filesFound: files.length,
      recognized: results.filter((result) => result.formatName !== null).length,
      transformed: results.filter(
        (result) => result.errorType === undefined || result.errorType === "write_failed",
      ).length,
      validated: results.filter((result) => result.success).length,
      failed: results.filter((result) => result.errorType !== undefined).length,
      results,
    };

    logger.info("Batch processing completed", {
      filesFound: summary.filesFound,
      transformed: summary.transformed,
      validated: summary.validated,
      failed: summary.failed,
    });

    return summary;
  }

  private async processFile(
    filePath: string,
    outputDir: string | undefined,
    correlationId: string,
  ): Promise<BatchFileResult> {
    const { table, metadata } = await this.transformer.transform(filePath);

    if (metadata.errorType !== undefined) {
      return {
        filePath,
        formatName: metadata.format ?? null,
        success: false,
        rowCount: 0,
        validationErrorCount: 0,
        error: metadata.error,
        errorType: metadata.errorType,
      };
    }

    const result: BatchFileResult = {
      filePath,
      formatName: metadata.format,
      success: metadata.success,
      rowCount: table.rows.length,
      validationErrorCount: metadata.validationErrors.length,
    };

    if (outputDir !== undefined) {
      const outputPath = join(outputDir, `${basename(filePath, extname(filePath))}.normalized.csv`);
      const written = await this.generator.writeCSV(table, outputPath, correlationId);
      if (written.success) {
        result.outputPath = outputPath;
      } else {
        result.success = false;
        result.error = written.error?.message ?? `Unable to write ${outputPath}`;
        result.errorType = "write_failed";
      }
    }

    return result;
  }

  private async findFiles(
    directory: string,
    extensions: string[],
    recursive: boolean,
  ): Promise<string[]> {
    const entries = await readdir(directory, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      const entryPath = join(directory, entry.name);
      if (entry.isDirectory()) {
        if (recursive) {
          files.push(...(await this.findFiles(entryPath, extensions, recursive)));
        }
      } else if (entry.isFile() && extensions.includes(extname(entry.name).toLowerCase())) {
        files.push(entryPath);
      }
    }

    return files.sort();
  }
}
