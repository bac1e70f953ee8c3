/**
 * @fileoverview Format detection exports
 */

export * from "./format-profile";
export { createDefaultProfiles, FormatRegistry } from "./format-registry";
export type { FormatRegistryDocument } from "./format-registry";
export {
  COLUMN_MATCH_THRESHOLD,
  DETECTION_THRESHOLD,
  FormatDetectionResult,
  matchProfile,
  MISSING_REQUIRED_CONFIDENCE,
  ReportFormatDetector,
  REQUIRED_SLOTS,
} from "./format-detector";
export type { FormatDetectionResultDict, ProfileMatchResult } from "./format-detector";
