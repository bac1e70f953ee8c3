/**
 * @fileoverview CSV dialect and header sniffing
 *
 * Works on a leading sample of a file: picks the delimiter whose field
 * counts are most consistent across lines, the quote character, and votes
 * on whether the first row is a header by comparing it against the type
 * profile of the rows below it.
 */

import { open } from "fs/promises";
import { stripBom, tokenizeCSV } from "./csv-tokenizer";
import type { CSVDialect } from "./parser-types";

const CANDIDATE_DELIMITERS = [",", ";", "\t", "|"];
const CANDIDATE_QUOTES = ['"', "'"];

/** Rows below the header considered when voting */
const HEADER_VOTE_ROWS = 20;

export interface SniffedSample {
  /** Sample text, BOM stripped */
  text: string;
  /** True when the file is longer than the sample */
  truncated: boolean;
}

/**
 * Reads at most `byteCount` leading bytes of a file. The handle is closed on every path.
 */
export async function readSample(
  filePath: string,
  byteCount: number,
): Promise<SniffedSample> {
  const handle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(byteCount);
    const { bytesRead } = await handle.read(buffer, 0, byteCount, 0);
    const { size } = await handle.stat();
    return {
      text: stripBom(buffer.subarray(0, bytesRead).toString("utf8")),
      truncated: size > bytesRead,
    };
  } finally {
    await handle.close();
  }
}

/**
 * Drops the last line of a truncated sample, which is usually cut mid-record
 */
export function completeLines(sample: SniffedSample): string {
  if (!sample.truncated) {
    return sample.text;
  }
  const lastBreak = Math.max(sample.text.lastIndexOf("\n"), sample.text.lastIndexOf("\r"));
  return lastBreak > 0 ? sample.text.slice(0, lastBreak) : sample.text;
}

/**
 * Detect the quote character: the candidate seen most often right after a
 * field boundary
 */
export function detectQuote(sample: string): string {
  let best = CANDIDATE_QUOTES[0];
  let bestCount = 0;

  for (const quote of CANDIDATE_QUOTES) {
    const boundary = new RegExp(`(^|[\\n\\r,;\\t|])${quote}`, "g");
    const count = (sample.match(boundary) || []).length;
    if (count > bestCount) {
      best = quote;
      bestCount = count;
    }
  }

  return best;
}

/**
 * Detect the most likely delimiter in the sample
 *
 * Scores each candidate by its mean field separators per row divided by
 * one plus the variance, counting only separators outside quotes.
 */
export function detectDelimiter(sample: string, quote: string): string {
  const scores: Record<string, number> = {};

  for (const delimiter of CANDIDATE_DELIMITERS) {
    const rows = tokenizeCSV(sample, { delimiter, quote }, true).slice(0, 10);
    if (rows.length === 0) {
      scores[delimiter] = 0;
      continue;
    }

    const counts = rows.map((row) => row.length - 1);
    const avgCount = counts.reduce((a, b) => a + b, 0) / counts.length;
    const variance =
      counts.reduce((sum, count) => sum + Math.pow(count - avgCount, 2), 0) /
      counts.length;

    scores[delimiter] = avgCount > 0 ? avgCount / (1 + variance) : 0;
  }

  const [bestDelimiter, bestScore] = Object.entries(scores).reduce((a, b) =>
    b[1] > a[1] ? b : a,
  );

  // Single-column files have no separators at all
  return bestScore === 0 ? "," : bestDelimiter;
}

export function sniffDialect(sample: string): CSVDialect {
  const quote = detectQuote(sample);
  return { delimiter: detectDelimiter(sample, quote), quote };
}

type ColumnType = "int" | "float" | number;

function classifyValue(value: string): ColumnType {
  const trimmed = value.trim();
  if (/^[+-]?\d+$/.test(trimmed)) {
    return "int";
  }
  if (trimmed !== "" && Number.isFinite(Number(trimmed))) {
    return "float";
  }
  return value.length;
}

function fitsType(value: string, type: "int" | "float"): boolean {
  const classified = classifyValue(value);
  return type === "int" ? classified === "int" : classified === "int" || classified === "float";
}

/**
 * Votes on whether the first row of the sample is a header
 *
 * Every column whose values below the first row share one type (integer,
 * float, or a fixed string length) casts a vote: a first-row value that
 * does not fit that type counts for a header, one that fits counts against.
 */
export function sniffHasHeader(sample: string, dialect: CSVDialect): boolean {
  const rows = tokenizeCSV(sample, dialect, true);
  if (rows.length < 2) {
    return false;
  }

  const header = rows[0];
  const columnTypes = new Map<number, ColumnType | null>();
  for (let i = 0; i < header.length; i++) {
    columnTypes.set(i, null);
  }

  for (const row of rows.slice(1, HEADER_VOTE_ROWS + 1)) {
    if (row.length !== header.length) {
      continue;
    }

    for (const [index, knownType] of Array.from(columnTypes.entries())) {
      const thisType = classifyValue(row[index]);
      if (knownType === null) {
        columnTypes.set(index, thisType);
      } else if (knownType !== thisType) {
        // Inconsistent column, it gets no vote
        columnTypes.delete(index);
      }
    }
  }

  let votes = 0;
  for (const [index, type] of Array.from(columnTypes.entries())) {
    if (type === null) {
      continue;
    }
    if (typeof type === "number") {
      votes += header[index].length !== type ? 1 : -1;
    } else {
      votes += fitsType(header[index], type) ? -1 : 1;
    }
  }

  return votes > 0;
}
