/**
 * @fileoverview Quote-aware CSV tokenizer shared by the sniffer and the parser
 */

import type { CSVDialect } from "./parser-types";

/**
 * Parse CSV content respecting quotes and line breaks. A quote opens a
 * quoted field only at the start of a field; anywhere else it is literal.
 * Tokenizing stops once `rowLimit` rows have been collected.
 */
export function tokenizeCSV(
  content: string,
  dialect: CSVDialect,
  skipEmptyLines: boolean,
  rowLimit?: number,
): string[][] {
  const { delimiter, quote } = dialect;
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentField = "";
  let inQuotes = false;
  let i = 0;

  const pushRow = (): void => {
    currentRow.push(currentField);

    if (
      !skipEmptyLines ||
      currentRow.length > 1 ||
      (currentRow.length === 1 && currentRow[0].trim().length > 0)
    ) {
      rows.push(currentRow);
    }

    currentRow = [];
    currentField = "";
  };

  while (i < content.length) {
    const char = content[i];
    const nextChar = i + 1 < content.length ? content[i + 1] : "";

    if (char === quote && inQuotes) {
      if (nextChar === quote) {
        // Escaped quote
        currentField += quote;
        i += 2;
      } else {
        inQuotes = false;
        i++;
      }
    } else if (char === quote && currentField === "") {
      inQuotes = true;
      i++;
    } else if ((char === "\n" || char === "\r") && !inQuotes) {
      pushRow();
      if (rowLimit !== undefined && rows.length >= rowLimit) {
        return rows.slice(0, rowLimit);
      }

      // Skip \r\n combination
      if (char === "\r" && nextChar === "\n") {
        i += 2;
      } else {
        i++;
      }
    } else if (char === delimiter && !inQuotes) {
      currentRow.push(currentField);
      currentField = "";
      i++;
    } else {
      // Regular character (including line breaks within quotes)
      currentField += char;
      i++;
    }
  }

  // A trailing newline leaves nothing pending
  if (currentField.length > 0 || currentRow.length > 0) {
    pushRow();
  }

  return rowLimit === undefined ? rows : rows.slice(0, rowLimit);
}

/**
 * Strips a leading UTF-8 byte order mark
 */
export function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}
