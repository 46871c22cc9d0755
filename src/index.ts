import { loadPageLayouts } from "./pdf-loader.js";
import { createRowBuilder, extractRowsFromPage } from "./row-builder.js";
import { serializePages } from "./serializer.js";
import type {
  ExtractedRows,
  LoadPageLayoutOptions,
  PageLayout,
  PageRows,
  PdfRowExtractionOptions,
  PdfRowExtractorApi,
  RowExtractionOptions,
} from "./types.js";

export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export {
  MODE_PRESETS,
  DEFAULT_COLUMN_MERGE_GAP,
  DEFAULT_COLUMN_SNAP_TOLERANCE,
  DEFAULT_MERGE_OPTIONS,
  resolveRowOptions,
  resolveLoadOptions,
} from "./config.js";
export {
  clusterRows,
  discoverColumnIntervals,
  mergeColumnIntervals,
  resolveColumnIntervals,
} from "./geometry.js";
export {
  BasicRowBuilder,
  ColumnExactRowBuilder,
  cleanFragmentText,
  createRowBuilder,
  extractRowsFromPage,
  fragmentsFromPage,
  type RowBuilder,
} from "./row-builder.js";
export { serializeRow, serializePages, serializeTable, parseRow } from "./serializer.js";
export { mergeTextRuns } from "./text-merger.js";
export { loadPageLayouts } from "./pdf-loader.js";
export { shapesFromOperatorList, type PathOps, type OperatorList } from "./shape-reader.js";

/**
 * Rebuild rows for every page. Pages are processed independently and the result is
 * ordered by pageIndex, whatever order the layouts came in.
 */
export function reconstructDocument(
  pages: readonly PageLayout[],
  options: RowExtractionOptions = {}
): PageRows[] {
  const builder = createRowBuilder(options);
  return pages
    .map(page => extractRowsFromPage(page, builder))
    .sort((a, b) => a.pageIndex - b.pageIndex);
}

export function reconstructPage(page: PageLayout, options: RowExtractionOptions = {}): PageRows {
  return extractRowsFromPage(page, options);
}

export class PdfRowExtractor implements PdfRowExtractorApi {
  async extractRows(
    buffer: ArrayBuffer | Uint8Array,
    options: PdfRowExtractionOptions = {}
  ): Promise<ExtractedRows> {
    // Validate options before parsing the PDF.
    const builder = createRowBuilder(options);
    const layouts = await this.loadPages(buffer, options);

    const pages = layouts
      .map(page => extractRowsFromPage(page, builder))
      .sort((a, b) => a.pageIndex - b.pageIndex);

    options.logger?.debug("Rebuilt rows", {
      mode: builder.mode,
      pages: pages.length,
      rows: pages.reduce((sum, page) => sum + page.rows.length, 0),
    });

    return { pages, lines: serializePages(pages) };
  }

  async extractPageRows(
    buffer: ArrayBuffer | Uint8Array,
    options: PdfRowExtractionOptions = {}
  ): Promise<PageRows[]> {
    const { pages } = await this.extractRows(buffer, options);
    return pages;
  }

  async extractRowStrings(
    buffer: ArrayBuffer | Uint8Array,
    options: PdfRowExtractionOptions = {}
  ): Promise<string[]> {
    const { lines } = await this.extractRows(buffer, options);
    return lines;
  }

  protected loadPages(
    buffer: ArrayBuffer | Uint8Array,
    options: LoadPageLayoutOptions
  ): Promise<PageLayout[]> {
    return loadPageLayouts(buffer, options);
  }
}

export async function extractRowStringsFromPdf(
  buffer: ArrayBuffer | Uint8Array,
  options: PdfRowExtractionOptions = {}
): Promise<string[]> {
  return new PdfRowExtractor().extractRowStrings(buffer, options);
}
