/**
 * @fileoverview Format Profile
 *
 * A named descriptor of one known billing report layout. Profiles map
 * source headers to canonical transaction columns, first through exact
 * header mappings, then through per-column regex patterns, and finally
 * through fuzzy name similarity.
 */

import levenshtein from "fast-levenshtein";
import { toError } from "../types/errors";
import { Logger } from "../utils/logger";

/** Score for a header listed in `columnMappings` */
export const EXACT_MATCH_SCORE = 1.0;

/** Score for a header matched by one of a column's patterns */
export const PATTERN_MATCH_SCORE = 0.9;

/** Similarity must exceed this to count as a match */
export const SIMILARITY_THRESHOLD = 0.7;

/**
 * Best canonical column for a source header
 */
export interface ColumnMatch {
  column: string | null;
  score: number;
}

export interface FormatProfileOptions {
  description?: string;
  headerPatterns?: Record<string, string[]>;
  columnMappings?: Record<string, string>;
  sampleValues?: Record<string, unknown[]>;
  dataTypes?: Record<string, string>;
  metadata?: Record<string, unknown>;
}

/**
 * On-disk representation, as stored in the registry JSON
 */
export interface FormatProfileDict {
  name: string;
  description: string;
  header_patterns: Record<string, string[]>;
  column_mappings: Record<string, string>;
  sample_values: Record<string, string[]>;
  data_types: Record<string, string>;
  metadata: Record<string, unknown>;
}

const profileLogger = new Logger("FormatProfile");

/**
 * Normalized Levenshtein similarity, 1.0 for identical strings
 */
export function stringSimilarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) {
    return 1;
  }
  return 1 - levenshtein.get(a, b) / maxLen;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function readStringRecord(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === "string") {
        result[key] = entry;
      }
    }
  }
  return result;
}

function readStringListRecord(value: unknown): Record<string, string[]> {
  const result: Record<string, string[]> = {};
  if (isRecord(value)) {
    for (const [key, entry] of Object.entries(value)) {
      if (Array.isArray(entry)) {
        result[key] = entry.map((item) => String(item));
      }
    }
  }
  return result;
}

export class FormatProfile {
  readonly name: string;
  readonly description: string;
  readonly headerPatterns: Record<string, string[]>;
  readonly columnMappings: Record<string, string>;
  readonly sampleValues: Record<string, unknown[]>;
  readonly dataTypes: Record<string, string>;
  readonly metadata: Record<string, unknown>;

  constructor(name: string, options: FormatProfileOptions = {}) {
    this.name = name;
    this.description = options.description ?? `Format profile for ${name}`;
    this.headerPatterns = options.headerPatterns ?? {};
    this.columnMappings = options.columnMappings ?? {};
    this.sampleValues = options.sampleValues ?? {};
    this.dataTypes = options.dataTypes ?? {};
    this.metadata = options.metadata ?? {};
  }

  /**
   * Match a source header to a canonical column
   *
   * Exact mappings win outright, then the first column with a matching
   * pattern (in insertion order), then the most similar column name when
   * its similarity exceeds {@link SIMILARITY_THRESHOLD}.
   */
  matchColumn(header: string): ColumnMatch {
    if (Object.prototype.hasOwnProperty.call(this.columnMappings, header)) {
      return { column: this.columnMappings[header], score: EXACT_MATCH_SCORE };
    }

    for (const [column, patterns] of Object.entries(this.headerPatterns)) {
      if (patterns.some((pattern) => this.testPattern(pattern, header))) {
        return { column, score: PATTERN_MATCH_SCORE };
      }
    }

    const lowered = header.toLowerCase();
    let bestColumn: string | null = null;
    let bestScore = 0;
    for (const column of Object.keys(this.headerPatterns)) {
      const similarity = stringSimilarity(lowered, column.toLowerCase());
      if (similarity > bestScore) {
        bestScore = similarity;
        bestColumn = column;
      }
    }

    if (bestColumn !== null && bestScore > SIMILARITY_THRESHOLD) {
      return { column: bestColumn, score: bestScore };
    }

    return { column: null, score: 0 };
  }

  toDict(): FormatProfileDict {
    const sampleValues: Record<string, string[]> = {};
    for (const [column, values] of Object.entries(this.sampleValues)) {
      sampleValues[column] = values.map((value) => String(value));
    }

    return {
      name: this.name,
      description: this.description,
      header_patterns: this.headerPatterns,
      column_mappings: this.columnMappings,
      sample_values: sampleValues,
      data_types: this.dataTypes,
      metadata: this.metadata,
    };
  }

  /**
   * Build a profile from its stored form, tolerating missing optional keys
   *
   * @throws {Error} When `name` is missing or not a string
   */
  static fromDict(data: unknown): FormatProfile {
    if (!isRecord(data) || typeof data.name !== "string" || data.name === "") {
      throw new Error("Format profile entry is missing a name");
    }

    return new FormatProfile(data.name, {
      description: typeof data.description === "string" ? data.description : undefined,
      headerPatterns: readStringListRecord(data.header_patterns),
      columnMappings: readStringRecord(data.column_mappings),
      sampleValues: readStringListRecord(data.sample_values),
      dataTypes: readStringRecord(data.data_types),
      metadata: isRecord(data.metadata) ? data.metadata : {},
    });
  }

  private testPattern(pattern: string, header: string): boolean {
    try {
      return new RegExp(pattern, "i").test(header);
    } catch (error) {
      profileLogger.warn("Skipping invalid header pattern", {
        formatName: this.name,
        pattern,
        error: toError(error).message,
      });
      return false;
    }
  }
}
