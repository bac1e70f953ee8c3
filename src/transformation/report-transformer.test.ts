import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { join } from "path";
import {
  CONTINUATION_CSV,
  CREDIT_CARD_CSV,
  GENERIC_CSV,
  INSURANCE_CSV,
  createTempDir,
  removeTempDir,
  writeFixture,
} from "../__fixtures__/reports";
import { ReportFormatDetector } from "../detection/format-detector";
import { FormatRegistry } from "../detection/format-registry";
import { createTable, selectColumns } from "./data-table";
import { CANONICAL_COLUMNS, ReportTransformer, transformFile } from "./report-transformer";
import { AddConstantRule, RenameColumnsRule } from "./rules";

describe("ReportTransformer", () => {
  let tempDir: string;
  let transformer: ReportTransformer;

  beforeEach(() => {
    tempDir = createTempDir();
    const registry = new FormatRegistry(join(tempDir, "format-registry.json"));
    transformer = new ReportTransformer(new ReportFormatDetector(registry));
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTempDir(tempDir);
  });

  describe("transform", () => {
    it("should detect and normalize a credit card report", async () => {
      const filePath = writeFixture(tempDir, "card.csv", CREDIT_CARD_CSV);

      const { table, metadata } = await transformer.transform(filePath);

      expect(table.columns).toEqual([...CANONICAL_COLUMNS]);
      expect(table.rows).toHaveLength(2);
      expect(table.rows[0]).toMatchObject({
        transaction_id: "9690",
        transaction_date: "2025-01-04",
        patient_id: "Kate Martin",
        cash_applied: 55,
        provider_name: "Tammy Maxey",
        payment_type: "credit_card",
        payer_name: null,
        notes: null,
      });
      expect(table.rows[1].cash_applied).toBe(120.5);

      if (metadata.errorType !== undefined) throw new Error(metadata.error);
      expect(metadata.format).toBe("credit_card_payment");
      expect(metadata.success).toBe(true);
      expect(metadata.validationErrors).toEqual([]);
      expect(metadata.detection?.formatName).toBe("credit_card_payment");
      expect(metadata.transformationLog.map((entry) => entry.rule)).toEqual([
        "rename_columns",
        "standardize_dates",
        "standardize_numbers",
        "add_constant",
      ]);
      expect(metadata.transformationLog[0]).toMatchObject({
        beforeShape: [2, 13],
        afterShape: [2, 13],
      });
    });

    it("should fall back to the check amount when cash applied is blank", async () => {
      const filePath = writeFixture(tempDir, "claims.csv", INSURANCE_CSV);

      const { table, metadata } = await transformer.transform(filePath);

      expect(metadata.format).toBe("insurance_claims");
      expect(table.rows.map((row) => row.cash_applied)).toEqual([80, 250]);
      expect(table.rows.map((row) => row.insurance_payment)).toEqual([100, 250]);
      expect(table.rows[0]).toMatchObject({
        transaction_id: "1",
        transaction_date: "2025-01-15",
        payer_name: "Acme Health",
        payment_type: "insurance",
      });
    });

    it("should forward-fill continuation rows", async () => {
      const filePath = writeFixture(tempDir, "continuation.csv", CONTINUATION_CSV);

      const { table, metadata } = await transformer.transform(filePath, "payments_continuation");

      expect(metadata.success).toBe(true);
      expect(table.rows).toHaveLength(2);
      expect(table.rows[1]).toMatchObject({
        transaction_date: "2025-01-10",
        payer_name: "Acme Health",
        provider_name: "Dr. Placeholder",
        cash_applied: 200,
        payment_type: "insurance",
      });
      expect(metadata.detection).toBeUndefined();
    });

    it("should report detection failures", async () => {
      const filePath = writeFixture(tempDir, "generic.csv", GENERIC_CSV);

      const { table, metadata } = await transformer.transform(filePath);

      expect(table.rows).toEqual([]);
      expect(table.columns).toEqual([]);
      expect(metadata).toMatchObject({
        success: false,
        error: "Could not detect file format",
        errorType: "detection_failed",
      });
      expect(metadata.detection?.metadata.candidates).toEqual([
        "credit_card_payment",
        "insurance_claims",
      ]);
    });

    it("should report a missing pipeline separately from detection failures", async () => {
      const filePath = writeFixture(tempDir, "card.csv", CREDIT_CARD_CSV);

      const { table, metadata } = await transformer.transform(filePath, "remittance_advice");

      expect(table.rows).toEqual([]);
      expect(metadata).toMatchObject({
        success: false,
        error: "No transformation pipeline defined for format remittance_advice",
        errorType: "pipeline_missing",
        format: "remittance_advice",
      });
    });

    it("should report execution failures", async () => {
      const { table, metadata } = await transformer.transform(
        join(tempDir, "missing.csv"),
        "credit_card_payment",
      );

      expect(table.rows).toEqual([]);
      expect(metadata.errorType).toBe("execution_failed");
      expect(metadata.filePath).toBe(join(tempDir, "missing.csv"));
    });
  });

  describe("pipelines", () => {
    it("should list the built-in pipelines", () => {
      expect(transformer.listPipelines()).toEqual([
        "credit_card_payment",
        "insurance_claims",
        "payments_continuation",
      ]);
    });

    it("should run registered pipelines", async () => {
      transformer.registerPipeline("clinic_export", [
        new RenameColumnsRule({ Doctor: "provider_name", Paid: "cash_applied" }),
        new AddConstantRule("notes", "imported"),
      ]);
      const filePath = writeFixture(tempDir, "clinic.csv", "Doctor,Paid\nDr. Placeholder,12\n");

      const { table, metadata } = await transformer.transform(filePath, "clinic_export");

      expect(transformer.listPipelines()).toContain("clinic_export");
      expect(table.rows[0]).toMatchObject({
        provider_name: "Dr. Placeholder",
        cash_applied: "12",
        notes: "imported",
      });
      // transaction_date is absent from this export
      expect(metadata.success).toBe(false);
    });
  });

  describe("validateTransformation", () => {
    it("should flag missing required values and negative amounts", () => {
      const table = selectColumns(
        createTable(
          ["transaction_date", "cash_applied", "provider_name"],
          [
            { transaction_date: "2025-01-01", cash_applied: 10, provider_name: null },
            { transaction_date: "2025-01-02", cash_applied: -10, provider_name: "Dr. Placeholder" },
          ],
        ),
        CANONICAL_COLUMNS,
      );

      const issues = transformer.validateTransformation(table, "credit_card_payment");

      expect(issues).toEqual([
        {
          type: "missing_required",
          column: "provider_name",
          count: 1,
          message: "Missing 1 values in required column provider_name",
        },
        {
          type: "negative_values",
          column: "cash_applied",
          count: 1,
          message: "Found 1 negative values in cash_applied column",
        },
      ]);
    });

    it("should flag dates that are not ISO formatted", () => {
      const table = selectColumns(
        createTable(
          ["transaction_date", "cash_applied", "provider_name"],
          [
            { transaction_date: "01/02/2025", cash_applied: 1, provider_name: "A" },
            { transaction_date: "2025-02-30", cash_applied: 1, provider_name: "A" },
            { transaction_date: "2025-03-01", cash_applied: 1, provider_name: "A" },
          ],
        ),
        CANONICAL_COLUMNS,
      );

      expect(transformer.validateTransformation(table, "credit_card_payment")).toEqual([
        {
          type: "date_format",
          column: "transaction_date",
          count: 2,
          message: 'Date format issues in transaction_date: unable to parse "01/02/2025" as an ISO date',
        },
      ]);
    });

    it("should log each finding as a data quality issue", () => {
      const warnSpy = vi.mocked(console.warn);
      const table = selectColumns(
        createTable(["cash_applied"], [{ cash_applied: 5 }]),
        CANONICAL_COLUMNS,
      );

      transformer.validateTransformation(table, "credit_card_payment");

      const messages = warnSpy.mock.calls.map((call) => JSON.parse(String(call[0])).message);
      expect(messages).toEqual([
        "transformed_data.transaction_date: Missing 1 values in required column transaction_date (1 rows affected)",
        "transformed_data.provider_name: Missing 1 values in required column provider_name (1 rows affected)",
      ]);
    });
  });
});

describe("transformFile", () => {
  it("should add row and column counts for non-empty results", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const tempDir = createTempDir();
    try {
      const registry = new FormatRegistry(join(tempDir, "format-registry.json"));
      const transformer = new ReportTransformer(new ReportFormatDetector(registry));
      const filePath = writeFixture(tempDir, "card.csv", CREDIT_CARD_CSV);

      const result = await transformFile(filePath, undefined, { transformer });

      expect(result.rowCount).toBe(2);
      expect(result.columnCount).toBe(16);
      expect(result.format).toBe("credit_card_payment");
    } finally {
      vi.restoreAllMocks();
      removeTempDir(tempDir);
    }
  });
});
