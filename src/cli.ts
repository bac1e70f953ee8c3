#!/usr/bin/env node
/**
 * @fileoverview Command line entry point
 *
 *   detect <file>
 *   list
 *   learn <file> <name> [-d description]
 *   transform <file> [-f format] [-o output.csv]
 *   batch <dir> [-r] [-o outputDir]
 *
 * Every command accepts `--registry <path>` to override FORMAT_REGISTRY_PATH.
 */

import { parseArgs } from "util";
import { ReportFormatDetector } from "./detection/format-detector";
import { FormatRegistry } from "./detection/format-registry";
import { CSVGenerator } from "./output/csv-generator";
import { BatchProcessor } from "./processors/batch-processor";
import { ReportTransformer } from "./transformation/report-transformer";
import { generateCorrelationId, toError } from "./types/errors";
import { logger } from "./utils/logger";

export const USAGE = [
  "Usage: report-normalizer <command> [options]",
  "",
  "Commands:",
  "  detect <file>                          Detect the format of a report",
  "  list                                   List known formats",
  "  learn <file> <name> [-d description]   Register a format from a sample file",
  "  transform <file> [-f format] [-o out]  Transform a report to the canonical layout",
  "  batch <dir> [-r] [-o outputDir]        Transform every CSV in a directory",
].join("\n");

function parseCommandLine(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    options: {
      format: { type: "string", short: "f" },
      output: { type: "string", short: "o" },
      description: { type: "string", short: "d" },
      recursive: { type: "boolean", short: "r", default: false },
      registry: { type: "string" },
    },
  });
}

export type OutputWriter = (line: string) => void;

/**
 * Run one CLI command and resolve to its exit code
 */
export async function runCli(
  argv: string[],
  write: OutputWriter = (line) => process.stdout.write(`${line}\n`),
): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    write(toError(error).message);
    write(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  const [command, ...args] = positionals;

  const registry = new FormatRegistry(values.registry);
  const detector = new ReportFormatDetector(registry);

  switch (command) {
    case "detect": {
      const [filePath] = args;
      if (!filePath) break;

      const result = await detector.detectFormat(filePath);
      write(result.getSummary());
      const candidates = result.metadata.candidates;
      if (result.formatName === null && Array.isArray(candidates)) {
        write(`Candidates: ${candidates.join(", ")}`);
      }
      if (typeof result.metadata.error === "string") {
        write(`Error: ${result.metadata.error}`);
      }
      return result.formatName === null ? 1 : 0;
    }

    case "list": {
      const profiles = registry.getProfiles();
      write(`Known formats (${profiles.length}):`);
      for (const profile of profiles) {
        write(`  - ${profile.name}: ${profile.description}`);
      }
      return 0;
    }

    case "learn": {
      const [filePath, formatName] = args;
      if (!filePath || !formatName) break;

      const profile = await detector.learnFromSample(filePath, formatName, values.description);
      write(`Learned format ${profile.name} from ${filePath}`);
      return 0;
    }

    case "transform": {
      const [filePath] = args;
      if (!filePath) break;

      const transformer = new ReportTransformer(detector);
      const { table, metadata } = await transformer.transform(filePath, values.format);
      if (metadata.errorType !== undefined) {
        write(`Error: ${metadata.error}`);
        return 1;
      }

      write(`Format: ${metadata.format}`);
      write(`Rows: ${table.rows.length}`);
      for (const issue of metadata.validationErrors) {
        write(`Validation: ${issue.message}`);
      }

      if (values.output) {
        const written = await new CSVGenerator().writeCSV(table, values.output, generateCorrelationId());
        if (!written.success) {
          write(`Error: ${written.error?.message ?? "CSV write failed"}`);
          return 1;
        }
        write(`Written to ${values.output}`);
      }
      return 0;
    }

    case "batch": {
      const [directory] = args;
      if (!directory) break;

      const processor = new BatchProcessor(new ReportTransformer(detector));
      const summary = await processor.processDirectory(directory, {
        recursive: values.recursive,
        outputDir: values.output,
      });
      write(`Files found: ${summary.filesFound}`);
      write(`Recognized: ${summary.recognized}`);
      write(`Transformed: ${summary.transformed}`);
      write(`Validated: ${summary.validated}`);
      write(`Failed: ${summary.failed}`);
      for (const result of summary.results.filter((entry) => entry.error !== undefined)) {
        write(`  ${result.filePath}: ${result.error}`);
      }
      return summary.failed > 0 ? 1 : 0;
    }
  }

  write(USAGE);
  return 2;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error("Command failed", toError(error));
      process.exitCode = 1;
    });
}
