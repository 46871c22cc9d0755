import type { Logger } from "./logger.js";

/** Axis-aligned box in page units, origin at the bottom-left corner. */
export interface BBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface TextContainerElement {
  kind: "text-container";
  text: string; // may span several lines
  bbox: BBox;
}

export interface RectangleElement {
  kind: "rectangle";
  bbox: BBox;
}

export interface LineElement {
  kind: "line";
  bbox: BBox;
}

export type LayoutElement = TextContainerElement | RectangleElement | LineElement;

export interface PageLayout {
  pageIndex: number; // zero-based
  width: number;
  height: number;
  elements: LayoutElement[];
}

export interface TextFragment {
  readonly text: string;
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
  readonly pageHeight: number;
}

export interface ColumnInterval {
  xmin: number;
  xmax: number;
}

export type RowBuilderMode = "basic" | "column-exact";

/**
 * Which fragment a candidate's y0 is compared against when deciding row membership:
 * the row's first member, or the fragment appended just before it.
 */
export type RowAnchor = "first" | "previous";

export interface PageRows {
  pageIndex: number;
  rows: string[][];
  /** Resolved column intervals; empty in basic mode. */
  columns: ColumnInterval[];
  /** Rectangles and lines seen on the page. Not used for grouping. */
  shapeCount: number;
}

export interface RowExtractionOptions {
  mode?: RowBuilderMode; // default: "basic"

  // Tolerances in PDF units
  rowThreshold?: number; // default: 5 (basic), 8 (column-exact)
  rowAnchor?: RowAnchor; // default: "first" (basic), "previous" (column-exact)
  columnSnapTolerance?: number; // default: 5
  columnMergeGap?: number; // default: 10

  logger?: Logger;
}

export interface TextRunMergeOptions {
  /** Largest x gap between two runs that still join them. */
  horizontalMergeGap?: number; // default: 10
  /** Largest baseline difference for two runs to count as one line. */
  verticalMergeGap?: number; // default: 3
  /** Gaps wider than this get a space inserted between the joined texts. */
  spaceWidth?: number; // default: 2.5
}

export interface LoadPageLayoutOptions {
  mergeRuns?: boolean; // default: true
  mergeOptions?: TextRunMergeOptions;
  /** What to do when a single page cannot be read. */
  onPageError?: "abort" | "skip"; // default: "abort"
  logger?: Logger;
}

export type PdfRowExtractionOptions = RowExtractionOptions & LoadPageLayoutOptions;

export interface ExtractedRows {
  pages: PageRows[];
  lines: string[];
}

export interface PdfRowExtractorApi {
  extractRows(buffer: ArrayBuffer | Uint8Array, options?: PdfRowExtractionOptions): Promise<ExtractedRows>;
  extractPageRows(
    buffer: ArrayBuffer | Uint8Array,
    options?: PdfRowExtractionOptions
  ): Promise<PageRows[]>;
  extractRowStrings(
    buffer: ArrayBuffer | Uint8Array,
    options?: PdfRowExtractionOptions
  ): Promise<string[]>;
}
