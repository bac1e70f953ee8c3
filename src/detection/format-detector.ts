/**
 * @fileoverview Report Format Detector
 *
 * Scores a delimited report against every profile in a {@link FormatRegistry}
 * and reports the best match together with its source-to-canonical column map.
 */

import { basename } from "path";
import { environmentConfig } from "../config/environment";
import { CSVParser } from "../parsers/csv-parser";
import { completeLines, readSample, sniffDialect, sniffHasHeader } from "../parsers/csv-sniffer";
import { generateCorrelationId, ReportFileError, toError } from "../types/errors";
import { createCorrelatedLogger } from "../utils/logger";
import { FormatProfile } from "./format-profile";
import { FormatRegistry } from "./format-registry";

/** Below this confidence no format is reported */
export const DETECTION_THRESHOLD = 0.5;

/** Per-column matches at or below this score are discarded */
export const COLUMN_MATCH_THRESHOLD = 0.5;

/** Confidence assigned to a profile that misses a required slot */
export const MISSING_REQUIRED_CONFIDENCE = 0.2;

/**
 * Canonical slots every recognized report must fill. Each slot is satisfied
 * by any of the listed canonical columns.
 */
export const REQUIRED_SLOTS: Readonly<Record<string, readonly string[]>> = {
  transaction_date: ["transaction_date"],
  amount: ["amount", "cash_applied", "insurance_payment", "patient_payment"],
  provider_name: ["provider_name"],
};

/** Sample values kept per header when learning a format */
const LEARNED_SAMPLE_VALUES = 5;

/**
 * Outcome of scoring one profile against a header row
 */
export interface ProfileMatchResult {
  confidence: number;
  columnMap: Record<string, string>;
  confidenceScores: Record<string, number>;
  matchedColumns: number;
  totalColumns: number;
}

export interface FormatDetectionResultDict {
  format_name: string | null;
  confidence: number;
  column_map: Record<string, string>;
  confidence_scores: Record<string, number>;
  metadata: Record<string, unknown>;
}

export class FormatDetectionResult {
  readonly formatName: string | null;
  readonly confidence: number;
  readonly columnMap: Record<string, string>;
  readonly confidenceScores: Record<string, number>;
  readonly metadata: Record<string, unknown>;

  constructor(
    formatName: string | null,
    confidence: number,
    columnMap: Record<string, string> = {},
    confidenceScores: Record<string, number> = {},
    metadata: Record<string, unknown> = {},
  ) {
    this.formatName = formatName;
    this.confidence = confidence;
    this.columnMap = columnMap;
    this.confidenceScores = confidenceScores;
    this.metadata = metadata;
  }

  toDict(): FormatDetectionResultDict {
    return {
      format_name: this.formatName,
      confidence: this.confidence,
      column_map: this.columnMap,
      confidence_scores: this.confidenceScores,
      metadata: this.metadata,
    };
  }

  getSummary(): string {
    if (!this.formatName) {
      return "No format detected";
    }

    const lines = [
      `Detected format: ${this.formatName} (confidence: ${this.confidence.toFixed(2)})`,
      "Column mapping:",
    ];
    for (const [source, canonical] of Object.entries(this.columnMap)) {
      const score = this.confidenceScores[source] ?? 0;
      lines.push(`  ${source} -> ${canonical} (confidence: ${score.toFixed(2)})`);
    }
    return lines.join("\n");
  }
}

/**
 * Score one profile against a header row
 */
export function matchProfile(headers: string[], profile: FormatProfile): ProfileMatchResult {
  const columnMap: Record<string, string> = {};
  const confidenceScores: Record<string, number> = {};

  for (const header of headers) {
    const { column, score } = profile.matchColumn(header);
    if (column !== null && score > COLUMN_MATCH_THRESHOLD) {
      columnMap[header] = column;
      confidenceScores[header] = score;
    }
  }

  const matchedColumns = Object.keys(columnMap).length;
  const mapped = new Set(Object.values(columnMap));
  const hasRequired = Object.values(REQUIRED_SLOTS).every((aliases) =>
    aliases.some((alias) => mapped.has(alias)),
  );

  let confidence = MISSING_REQUIRED_CONFIDENCE;
  if (hasRequired && headers.length > 0) {
    const scores = Object.values(confidenceScores);
    const averageScore = scores.reduce((sum, score) => sum + score, 0) / scores.length;
    confidence = 0.5 * (matchedColumns / headers.length) + 0.5 * averageScore;
  }

  return {
    confidence,
    columnMap,
    confidenceScores,
    matchedColumns,
    totalColumns: headers.length,
  };
}

export class ReportFormatDetector {
  readonly registry: FormatRegistry;
  private readonly parser = new CSVParser();

  constructor(registry: FormatRegistry) {
    this.registry = registry;
  }

  /**
   * Detect the format of a delimited report. Never rejects: failures come
   * back as a zero-confidence result carrying `metadata.error`.
   */
  async detectFormat(
    filePath: string,
    sampleRows: number = environmentConfig.detectionSampleRows,
  ): Promise<FormatDetectionResult> {
    const correlationId = generateCorrelationId();
    const logger = createCorrelatedLogger(correlationId, {
      filePath,
      operation: "detect_format",
    });
    logger.info("Detecting report format");

    try {
      const sample = completeLines(await readSample(filePath, environmentConfig.sniffSampleBytes));
      const dialect = sniffDialect(sample);

      if (!sniffHasHeader(sample, dialect)) {
        logger.warn("File does not appear to have a header row");
        return new FormatDetectionResult(null, 0, {}, {}, { error: "No header detected" });
      }

      const parsed = await this.parser.parseFile(filePath, correlationId, {
        ...dialect,
        maxRows: sampleRows,
      });

      const results = this.registry
        .getProfiles()
        .map((profile) => ({ name: profile.name, result: matchProfile(parsed.headers, profile) }))
        .sort((a, b) => b.result.confidence - a.result.confidence);

      const [best] = results;
      if (!best) {
        return new FormatDetectionResult(null, 0, {}, {}, { error: "No format profiles registered" });
      }

      const top = results.slice(0, 3);
      if (best.result.confidence < DETECTION_THRESHOLD) {
        logger.warn("Low confidence format detection", {
          confidence: best.result.confidence,
        });
        return new FormatDetectionResult(null, best.result.confidence, {}, {}, {
          candidates: top.map(({ name }) => name),
          candidateScores: Object.fromEntries(top.map(({ name, result }) => [name, result.confidence])),
        });
      }

      logger.info("Report format detected", {
        formatName: best.name,
        confidence: best.result.confidence,
      });
      return new FormatDetectionResult(
        best.name,
        best.result.confidence,
        best.result.columnMap,
        best.result.confidenceScores,
        { fullResults: Object.fromEntries(top.map(({ name, result }) => [name, result])) },
      );
    } catch (error) {
      const cause = toError(error);
      logger.error("Error detecting report format", cause);
      return new FormatDetectionResult(null, 0, {}, {}, { error: cause.message });
    }
  }

  /**
   * Register a new profile from a sample file. The profile starts with no
   * column mappings; `updateMapping` fills them in later.
   *
   * @throws {ReportFileError} When the sample cannot be read or parsed
   */
  async learnFromSample(
    filePath: string,
    formatName: string,
    description?: string,
  ): Promise<FormatProfile> {
    const correlationId = generateCorrelationId();
    const logger = createCorrelatedLogger(correlationId, {
      filePath,
      formatName,
      operation: "learn_format",
    });
    logger.info("Learning format from sample");

    try {
      const table = await this.parser.readTable(filePath, correlationId);

      const sampleValues: Record<string, string[]> = {};
      for (const column of table.columns) {
        sampleValues[column] = table.rows
          .map((row) => row[column])
          .filter((value) => value !== null && value !== undefined)
          .slice(0, LEARNED_SAMPLE_VALUES)
          .map((value) => String(value));
      }

      const profile = new FormatProfile(formatName, {
        description,
        columnMappings: {},
        sampleValues,
        metadata: {
          sourceHeaders: table.columns,
          sourceFile: basename(filePath),
        },
      });

      this.registry.addProfile(profile);
      return profile;
    } catch (error) {
      const cause = toError(error);
      logger.error("Error learning format from sample", cause);
      if (cause instanceof ReportFileError) {
        throw cause;
      }
      throw new ReportFileError(
        `Unable to learn format from ${filePath}: ${cause.message}`,
        correlationId,
        filePath,
        "parse",
      );
    }
  }

  /**
   * Merge exact header mappings into a registered profile and persist them
   *
   * @returns false when no profile of that name exists
   */
  updateMapping(formatName: string, mappings: Record<string, string>): boolean {
    const profile = this.registry.getProfile(formatName);
    if (!profile) {
      createCorrelatedLogger(generateCorrelationId(), { formatName }).error(
        `Format ${formatName} not found`,
      );
      return false;
    }

    Object.assign(profile.columnMappings, mappings);
    this.registry.saveRegistry();
    return true;
  }

  async getColumnMapping(filePath: string): Promise<Record<string, string>> {
    const result = await this.detectFormat(filePath);
    return result.columnMap;
  }
}
