/**
 * @fileoverview Billing report normalizer
 *
 * Recognizes the layout of a billing or payment CSV export and rewrites it
 * into the canonical transaction table.
 *
 * @example
 * ```ts
 * const registry = new FormatRegistry("config/format-registry.json");
 * const transformer = new ReportTransformer(new ReportFormatDetector(registry));
 * const { table, metadata } = await transformer.transform("exports/card-payments.csv");
 * ```
 */

export * from "./detection";
export * from "./transformation";
export * from "./parsers";
export * from "./output";
export { BatchProcessor } from "./processors/batch-processor";
export type {
  BatchErrorType,
  BatchFileResult,
  BatchOptions,
  BatchSummary,
} from "./processors/batch-processor";
export * from "./types";
export { environmentConfig, getEnvironmentConfig } from "./config/environment";
export { createCorrelatedLogger, logDataQualityIssue, Logger, logger } from "./utils/logger";
export type { LogContext } from "./utils/logger";
