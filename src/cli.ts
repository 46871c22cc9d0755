import { readFile } from "node:fs/promises";
import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { PdfRowExtractor } from "./index.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { PdfRowExtractionOptions, RowBuilderMode } from "./types.js";

export interface CliOptions {
  mode: RowBuilderMode;
  rowThreshold?: number;
  snapTolerance?: number;
  mergeGap?: number;
  mergeRuns: boolean;
  skipBadPages?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export interface CliIo {
  readFile(filePath: string): Promise<Uint8Array>;
  write(text: string): void;
  extractor?: PdfRowExtractor;
  logger?: Logger;
}

const defaultIo: CliIo = {
  readFile: filePath => readFile(filePath),
  write: text => {
    process.stdout.write(text);
  },
};

export interface FailureSink {
  writeErr(text: string): void;
  exit(code: number): void;
}

const processSink: FailureSink = {
  writeErr: text => {
    process.stderr.write(text);
  },
  exit: code => process.exit(code),
};

/** Last-resort handler for the command: the message goes to stderr and the exit code is 1. */
export function reportFailure(err: unknown, sink: FailureSink = processSink): void {
  const message = err instanceof Error ? err.message : String(err);
  sink.writeErr(`Error while extracting rows: ${message}\n`);
  sink.exit(1);
}

function parseTolerance(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative number.");
  }
  return n;
}

export function toExtractionOptions(opts: CliOptions, logger: Logger): PdfRowExtractionOptions {
  return {
    mode: opts.mode,
    rowThreshold: opts.rowThreshold,
    columnSnapTolerance: opts.snapTolerance,
    columnMergeGap: opts.mergeGap,
    mergeRuns: opts.mergeRuns,
    onPageError: opts.skipBadPages ? "skip" : "abort",
    logger,
  };
}

export function buildProgram(io: CliIo = defaultIo): Command {
  const program = new Command();

  program
    .name("pdf-layout-rows")
    .description("Print the table rows found in a PDF as tab-delimited lines")
    .argument("<pdf-file>", "Path to the PDF")
    .addOption(
      new Option("-m, --mode <mode>", "Row building strategy")
        .choices(["basic", "column-exact"])
        .default("basic")
    )
    .option("--row-threshold <n>", "Max y0 distance within a row (default: 5 basic, 8 column-exact)", parseTolerance)
    .option("--snap-tolerance <n>", "Column snap tolerance (default: 5)", parseTolerance)
    .option("--merge-gap <n>", "Column merge gap tolerance (default: 10)", parseTolerance)
    .option("--no-merge-runs", "Keep pdf.js text runs as separate fragments")
    .option("--skip-bad-pages", "Skip pages whose layout cannot be read instead of failing")
    .option("--json", "Print structured page rows as JSON")
    .option("-v, --verbose", "Log debug output to stderr")
    .action(async (file: string, opts: CliOptions) => {
      const logger = io.logger ?? createConsoleLogger(Boolean(opts.verbose));
      const resolvedPath = path.resolve(file);
      logger.debug("Reading PDF", { path: resolvedPath });

      const data = await io.readFile(resolvedPath);
      const extractor = io.extractor ?? new PdfRowExtractor();
      const { pages, lines } = await extractor.extractRows(data, toExtractionOptions(opts, logger));

      if (opts.json) {
        io.write(JSON.stringify(pages, null, 2) + "\n");
        return;
      }
      if (lines.length > 0) {
        io.write(lines.join("\n") + "\n");
      }
    });

  return program;
}
