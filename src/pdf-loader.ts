import { getDocument, OPS } from "pdfjs-dist/legacy/build/pdf.mjs";
import { resolveLoadOptions, type ResolvedLoadOptions } from "./config.js";
import { DocumentLayoutError } from "./errors.js";
import { shapesFromOperatorList } from "./shape-reader.js";
import { mergeTextRuns, type TextRun } from "./text-merger.js";
import type { LayoutElement, LoadPageLayoutOptions, PageLayout } from "./types.js";

type PdfDocument = Awaited<ReturnType<typeof getDocument>["promise"]>;

/**
 * Read every page of a PDF into layout elements: text containers from the text content,
 * then the painted rectangles and straight lines from the operator list.
 */
export async function loadPageLayouts(
  buffer: ArrayBuffer | Uint8Array,
  options: LoadPageLayoutOptions = {}
): Promise<PageLayout[]> {
  const settings = resolveLoadOptions(options);
  const { logger } = settings;

  // pdf.js may detach the buffer it is given, so hand it a copy.
  const data = buffer instanceof Uint8Array ? new Uint8Array(buffer) : new Uint8Array(buffer.slice(0));
  const loadingTask = getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: 0,
  });

  let pdf: PdfDocument;
  try {
    pdf = await loadingTask.promise;
  } catch (err) {
    await loadingTask.destroy();
    throw new DocumentLayoutError(`Could not open PDF: ${describe(err)}`, null, { cause: err });
  }

  try {
    const pages: PageLayout[] = [];

    for (let pageIndex = 0; pageIndex < pdf.numPages; pageIndex++) {
      try {
        pages.push(await loadPage(pdf, pageIndex, settings));
      } catch (err) {
        const error = new DocumentLayoutError(
          `Could not read layout of page ${pageIndex}: ${describe(err)}`,
          pageIndex,
          { cause: err }
        );
        if (settings.onPageError === "abort") throw error;
        logger.warn("Skipping page with unreadable layout", { pageIndex, reason: describe(err) });
      }
    }

    logger.debug("Loaded page layouts", { pages: pages.length, numPages: pdf.numPages });
    return pages;
  } finally {
    await loadingTask.destroy();
  }
}

async function loadPage(
  pdf: PdfDocument,
  pageIndex: number,
  settings: ResolvedLoadOptions
): Promise<PageLayout> {
  const page = await pdf.getPage(pageIndex + 1);
  const viewport = page.getViewport({ scale: 1.0 });
  const textContent = await page.getTextContent();

  const runs: TextRun[] = [];

  for (const item of textContent.items) {
    // Marked-content entries carry no text.
    if (!("str" in item)) continue;
    const str = item.str;
    if (!str.trim()) continue;

    // transform = [a, b, c, d, e, f]
    const x = Number(item.transform[4]);
    const y = Number(item.transform[5]);
    // Rough estimate for height
    const height = Math.abs(Number(item.transform[3])) || item.height || 10;

    runs.push({ text: str, bbox: { x0: x, y0: y, x1: x + item.width, y1: y + height } });
  }

  const containers: LayoutElement[] = settings.mergeRuns
    ? mergeTextRuns(runs, settings)
    : runs.map((run): LayoutElement => ({ kind: "text-container", text: run.text, bbox: run.bbox }));
  const shapes = shapesFromOperatorList(await page.getOperatorList(), OPS);
  const elements = [...containers, ...shapes];

  settings.logger.debug("Read page layout", {
    pageIndex,
    runs: runs.length,
    containers: containers.length,
    shapes: shapes.length,
  });

  page.cleanup();

  return {
    pageIndex,
    width: viewport.width,
    height: viewport.height,
    elements,
  };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
