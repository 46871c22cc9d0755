import path from "node:path";
import { describe, expect, it } from "vitest";
import { buildProgram, reportFailure, toExtractionOptions, type CliIo } from "../src/cli.js";
import {
  DocumentLayoutError,
  PdfRowExtractor,
  silentLogger,
  type LoadPageLayoutOptions,
  type PageLayout,
} from "../src/index.js";
import { page } from "./helpers/fragments.js";

class StubExtractor extends PdfRowExtractor {
  constructor(private readonly pages: PageLayout[]) {
    super();
  }

  protected loadPages(
    _buffer: ArrayBuffer | Uint8Array,
    _options: LoadPageLayoutOptions
  ): Promise<PageLayout[]> {
    return Promise.resolve(this.pages);
  }
}

const layout = page(0, [
  { text: "Item", x0: 10, y0: 700, x1: 40 },
  { text: "Cost", x0: 100, y0: 700, x1: 125 },
  { text: "Pen", x0: 10, y0: 690, x1: 28 },
  { text: "1.20", x0: 101, y0: 690, x1: 120 },
]);

function createIo() {
  const written: string[] = [];
  const readPaths: string[] = [];
  const io: CliIo = {
    readFile: async filePath => {
      readPaths.push(filePath);
      return new Uint8Array([0]);
    },
    write: text => {
      written.push(text);
    },
    extractor: new StubExtractor([layout]),
    logger: silentLogger,
  };
  return { io, written, readPaths };
}

function quiet(program: ReturnType<typeof buildProgram>) {
  return program.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });
}

describe("cli", () => {
  it("prints tab-delimited rows", async () => {
    const { io, written, readPaths } = createIo();

    await quiet(buildProgram(io)).parseAsync(["node", "pdf-layout-rows", "table.pdf"]);

    expect(readPaths).toEqual([path.resolve("table.pdf")]);
    expect(written.join("")).toBe("\t Item \t Cost \t\n\t Pen \t 1.20 \t\n");
  });

  it("prints structured pages with --json", async () => {
    const { io, written } = createIo();

    await quiet(buildProgram(io)).parseAsync([
      "node",
      "pdf-layout-rows",
      "table.pdf",
      "--mode",
      "column-exact",
      "--json",
    ]);

    expect(JSON.parse(written.join(""))).toEqual([
      {
        pageIndex: 0,
        rows: [
          ["Item", "Cost"],
          ["Pen", "1.20"],
        ],
        columns: [
          { xmin: 10, xmax: 40 },
          { xmin: 100, xmax: 125 },
        ],
        shapeCount: 0,
      },
    ]);
  });

  it("rejects an unknown mode", async () => {
    const { io } = createIo();

    await expect(
      quiet(buildProgram(io)).parseAsync(["node", "pdf-layout-rows", "table.pdf", "--mode", "fuzzy"])
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
  });

  it("rejects a negative tolerance", async () => {
    const { io } = createIo();

    await expect(
      quiet(buildProgram(io)).parseAsync(["node", "pdf-layout-rows", "table.pdf", "--merge-gap", "-3"])
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
  });

  it("writes nothing for a document without rows", async () => {
    const { io, written } = createIo();
    io.extractor = new StubExtractor([page(0, [])]);

    await quiet(buildProgram(io)).parseAsync(["node", "pdf-layout-rows", "empty.pdf"]);

    expect(written).toEqual([]);
  });
});

describe("reportFailure", () => {
  it("writes the message to stderr and exits with code 1 when extraction fails", async () => {
    const { io } = createIo();
    io.readFile = async () => {
      throw new DocumentLayoutError("Could not open PDF: Invalid PDF structure.", null);
    };
    const errors: string[] = [];
    const codes: number[] = [];

    await quiet(buildProgram(io))
      .parseAsync(["node", "pdf-layout-rows", "broken.pdf"])
      .catch((err: unknown) =>
        reportFailure(err, { writeErr: text => errors.push(text), exit: code => codes.push(code) })
      );

    expect(errors).toEqual(["Error while extracting rows: Could not open PDF: Invalid PDF structure.\n"]);
    expect(codes).toEqual([1]);
  });

  it("reports values that are not errors as text", () => {
    const errors: string[] = [];
    const codes: number[] = [];

    reportFailure("disk full", { writeErr: text => errors.push(text), exit: code => codes.push(code) });

    expect(errors).toEqual(["Error while extracting rows: disk full\n"]);
    expect(codes).toEqual([1]);
  });
});

describe("toExtractionOptions", () => {
  it("maps command-line flags onto extraction options", () => {
    const options = toExtractionOptions(
      {
        mode: "column-exact",
        rowThreshold: 6,
        snapTolerance: 4,
        mergeGap: 12,
        mergeRuns: false,
        skipBadPages: true,
      },
      silentLogger
    );

    expect(options).toEqual({
      mode: "column-exact",
      rowThreshold: 6,
      columnSnapTolerance: 4,
      columnMergeGap: 12,
      mergeRuns: false,
      onPageError: "skip",
      logger: silentLogger,
    });
  });

  it("aborts on bad pages unless asked to skip", () => {
    expect(toExtractionOptions({ mode: "basic", mergeRuns: true }, silentLogger).onPageError).toBe("abort");
  });
});
