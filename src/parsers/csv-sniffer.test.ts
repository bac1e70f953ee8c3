import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "fs";
import { join } from "path";
import { createTempDir, removeTempDir } from "../__fixtures__/reports";
import {
  completeLines,
  detectDelimiter,
  detectQuote,
  readSample,
  sniffDialect,
  sniffHasHeader,
} from "./csv-sniffer";

describe("csv-sniffer", () => {
  describe("sniffDialect", () => {
    it("should detect comma, semicolon, tab and pipe delimiters", () => {
      expect(sniffDialect("a,b,c\n1,2,3\n").delimiter).toBe(",");
      expect(sniffDialect("a;b;c\n1;2;3\n").delimiter).toBe(";");
      expect(sniffDialect("a\tb\tc\n1\t2\t3\n").delimiter).toBe("\t");
      expect(sniffDialect("a|b|c\n1|2|3\n").delimiter).toBe("|");
    });

    it("should ignore delimiters inside quoted fields", () => {
      expect(sniffDialect('"name","note"\n"x","a;b;c"\n"y","d;e"\n')).toEqual({
        delimiter: ",",
        quote: '"',
      });
    });

    it("should detect single quotes", () => {
      expect(detectQuote("'a';'b'\n'1';'2'\n")).toBe("'");
    });

    it("should default to a comma for single-column samples", () => {
      expect(detectDelimiter("name\nalpha\nbeta\n", '"')).toBe(",");
    });
  });

  describe("sniffHasHeader", () => {
    const dialect = { delimiter: ",", quote: '"' };

    it("should recognize a text header over numeric rows", () => {
      expect(sniffHasHeader("id,amount\n1,10.5\n2,20.25\n", dialect)).toBe(true);
    });

    it("should reject a first row that fits the column types", () => {
      expect(sniffHasHeader("1,2,3\n4,5,6\n7,8,9\n", dialect)).toBe(false);
    });

    it("should need at least two rows", () => {
      expect(sniffHasHeader("id,amount\n", dialect)).toBe(false);
    });
  });

  describe("completeLines", () => {
    it("should drop the partial last line of a truncated sample", () => {
      expect(completeLines({ text: "a,b\n1,2\n3,", truncated: true })).toBe("a,b\n1,2");
    });

    it("should keep untruncated samples whole", () => {
      expect(completeLines({ text: "a,b\n1,2", truncated: false })).toBe("a,b\n1,2");
    });
  });

  describe("readSample", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = createTempDir();
    });

    afterEach(() => {
      removeTempDir(tempDir);
    });

    it("should strip the byte order mark", async () => {
      const filePath = join(tempDir, "bom.csv");
      writeFileSync(filePath, "\uFEFFa,b\n1,2\n", "utf8");

      expect(await readSample(filePath, 4096)).toEqual({ text: "a,b\n1,2\n", truncated: false });
    });

    it("should flag samples shorter than the file", async () => {
      const filePath = join(tempDir, "long.csv");
      writeFileSync(filePath, "a,b\n1,2\n3,4\n", "utf8");

      expect(await readSample(filePath, 6)).toEqual({ text: "a,b\n1,", truncated: true });
    });

    it("should reject missing files", async () => {
      await expect(readSample(join(tempDir, "missing.csv"), 10)).rejects.toThrow("ENOENT");
    });
  });
});
