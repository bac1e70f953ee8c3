import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "path";
import { createTempDir, removeTempDir, writeFixture } from "../__fixtures__/reports";
import { ReportFileError } from "../types/errors";
import { CSVParser } from "./csv-parser";
import { tokenizeCSV } from "./csv-tokenizer";
import { ParserErrorCode } from "./parser-types";

describe("CSVParser", () => {
  let parser: CSVParser;

  beforeEach(() => {
    parser = new CSVParser();
  });

  describe("parseContent", () => {
    it("should parse simple CSV with headers", () => {
      const result = parser.parseContent("name,age\nJohn,30\nJane,25\n");

      expect(result.headers).toEqual(["name", "age"]);
      expect(result.rawRows).toEqual([
        ["John", "30"],
        ["Jane", "25"],
      ]);
      expect(result.dialect).toEqual({ delimiter: ",", quote: '"' });
      expect(result.statistics.dataRowCount).toBe(2);
      expect(result.warnings).toEqual([]);
    });

    it("should parse CSV without headers", () => {
      const result = parser.parseContent("John,30\nJane,25", { hasHeaders: false });

      expect(result.headers).toEqual([]);
      expect(result.rawRows).toHaveLength(2);
    });

    it("should honour an explicit dialect", () => {
      const result = parser.parseContent("a;b\n'x;y';2\n", { delimiter: ";", quote: "'" });

      expect(result.rawRows).toEqual([["x;y", "2"]]);
    });

    it("should keep quoted line breaks and handle CRLF", () => {
      const result = parser.parseContent('a,b\r\n"line1\nline2",2\r\n');

      expect(result.rawRows).toEqual([["line1\nline2", "2"]]);
    });

    it("should name blank headers and suffix duplicates", () => {
      const result = parser.parseContent("a,,a\n1,2,3\n");

      expect(result.headers).toEqual(["a", "column_2", "a.1"]);
      expect(result.warnings).toEqual([
        "Blank header at position 2, using column_2",
        'Duplicate header "a" renamed to "a.1"',
      ]);
    });

    it("should limit data rows", () => {
      const result = parser.parseContent("n\n1\n2\n3\n", { maxRows: 2 });

      expect(result.rawRows).toEqual([["1"], ["2"]]);
    });

    it("should keep a quote inside an unquoted field as a literal character", () => {
      const result = parser.parseContent('A,Notes,B\n1,5" wide,x\n2,ok,y\n3,ok,z\n');

      expect(result.rawRows).toEqual([
        ["1", '5" wide', "x"],
        ["2", "ok", "y"],
        ["3", "ok", "z"],
      ]);
      expect(result.statistics.dataRowCount).toBe(3);
    });

    it("should still unescape doubled quotes inside quoted fields", () => {
      const result = parser.parseContent('a,b\n"say ""hi""",it\'s\n', { quote: '"' });

      expect(result.rawRows).toEqual([['say "hi"', "it's"]]);
    });

    it("should count rows with inconsistent widths", () => {
      const result = parser.parseContent("a,b\n1,2\n3\n4,5\n");

      expect(result.statistics.inconsistentColumnCounts).toBe(1);
      expect(result.warnings).toEqual(["1 rows have inconsistent column counts"]);
    });
  });

  describe("tokenizeCSV", () => {
    const dialect = { delimiter: ",", quote: '"' };

    it("should stop once the row limit is reached", () => {
      expect(tokenizeCSV("h\n1\n2\n3\n4\n", dialect, true, 3)).toEqual([["h"], ["1"], ["2"]]);
    });

    it("should not count skipped blank lines toward the limit", () => {
      expect(tokenizeCSV("h\n\n1\n\n2\n3\n", dialect, true, 2)).toEqual([["h"], ["1"]]);
    });

    it("should return everything when the limit exceeds the row count", () => {
      expect(tokenizeCSV("h\n1", dialect, true, 10)).toEqual([["h"], ["1"]]);
    });
  });

  describe("toDataTable", () => {
    it("should turn empty fields into null", () => {
      const table = parser.toDataTable(parser.parseContent("a,b\n1,\n3\n"));

      expect(table.rows).toEqual([
        { a: "1", b: null },
        { a: "3", b: null },
      ]);
    });

    it("should name columns past the last header", () => {
      const table = parser.toDataTable(parser.parseContent("a,b\n1,2,3\n"));

      expect(table.columns).toEqual(["a", "b", "column_3"]);
      expect(table.rows).toEqual([{ a: "1", b: "2", column_3: "3" }]);
    });
  });

  describe("parseFile", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = createTempDir();
    });

    afterEach(() => {
      removeTempDir(tempDir);
    });

    it("should read a file into a table", async () => {
      const filePath = writeFixture(tempDir, "data.csv", "\uFEFFid;amount\n1;10.5\n");

      const table = await parser.readTable(filePath, "test-correlation");

      expect(table.columns).toEqual(["id", "amount"]);
      expect(table.rows).toEqual([{ id: "1", amount: "10.5" }]);
    });

    it("should reject missing files", async () => {
      const error = await parser
        .parseFile(join(tempDir, "missing.csv"), "test-correlation")
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ReportFileError);
      expect(error).toMatchObject({ operation: "read", correlationId: "test-correlation" });
    });

    it("should reject files over the size limit", async () => {
      const filePath = writeFixture(tempDir, "big.csv", "a,b\n1,2\n");

      await expect(
        parser.parseFile(filePath, "test-correlation", { maxFileSizeBytes: 4 }),
      ).rejects.toMatchObject({ context: { code: ParserErrorCode.FILE_TOO_LARGE } });
    });

    it("should reject empty files", async () => {
      const filePath = writeFixture(tempDir, "empty.csv", "");

      await expect(parser.parseFile(filePath, "test-correlation")).rejects.toThrow(
        `CSV file ${filePath} contains no data`,
      );
    });
  });
});
