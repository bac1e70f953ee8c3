export { CSVGenerator } from "./csv-generator";
export type {
  CSVGenerationResult,
  CSVGenerationStats,
  CSVGeneratorConfig,
} from "./csv-generator";
