/**
 * @fileoverview Parser Module Exports
 */

export * from "./parser-types";
export { CSVParser } from "./csv-parser";
export {
  completeLines,
  detectDelimiter,
  detectQuote,
  readSample,
  sniffDialect,
  sniffHasHeader,
} from "./csv-sniffer";
export type { SniffedSample } from "./csv-sniffer";
export { stripBom, tokenizeCSV } from "./csv-tokenizer";
