/**
 * @fileoverview Transformation Module Exports
 */

export * from "./data-table";
export * from "./rules";
export { createDefaultPipelines } from "./pipelines";
export type { TransformationPipeline } from "./pipelines";
export {
  CANONICAL_COLUMNS,
  ReportTransformer,
  transformFile,
} from "./report-transformer";
export type {
  CanonicalColumn,
  TransformationErrorType,
  TransformationFailure,
  TransformationLogEntry,
  TransformationMetadata,
  TransformationOutcome,
  TransformationSuccess,
  TransformFileOptions,
  TransformFileResult,
  ValidationIssue,
} from "./report-transformer";
