import type {
  ColumnInterval,
  PageLayout,
  PageRows,
  RowBuilderMode,
  RowExtractionOptions,
  TextFragment,
} from "./types.js";
import { resolveRowOptions, type ResolvedRowOptions } from "./config.js";
import {
  clusterRows,
  findColumnIndex,
  resolveColumnIntervals,
  sortRowByX,
} from "./geometry.js";

export interface BuiltRows {
  rows: string[][];
  columns: ColumnInterval[];
}

/**
 * Turns one page's fragments into rows of cell strings.
 * Implementations hold no per-page state; every call starts from scratch.
 */
export interface RowBuilder {
  readonly mode: RowBuilderMode;
  buildRows(fragments: readonly TextFragment[]): BuiltRows;
}

/** Collapse whitespace runs (newlines included) to one space and trim. */
export function cleanFragmentText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Blank fragments never reach clustering or column discovery. */
function withText(fragments: readonly TextFragment[]): TextFragment[] {
  return fragments.filter(fragment => cleanFragmentText(fragment.text) !== "");
}

export class BasicRowBuilder implements RowBuilder {
  readonly mode = "basic";

  constructor(private readonly options: ResolvedRowOptions) {}

  buildRows(fragments: readonly TextFragment[]): BuiltRows {
    const clustered = clusterRows(withText(fragments), {
      rowThreshold: this.options.rowThreshold,
      anchor: this.options.rowAnchor,
    });

    const rows = clustered.map(row =>
      sortRowByX(row).map(fragment => cleanFragmentText(fragment.text))
    );

    return { rows, columns: [] };
  }
}

/**
 * Aligns every row to column intervals inferred over the whole page. Fragments that fit no
 * interval are dropped, fragments sharing an interval are joined with a space, and empty
 * slots are removed, so rows line up by content order rather than by column index.
 */
export class ColumnExactRowBuilder implements RowBuilder {
  readonly mode = "column-exact";

  constructor(private readonly options: ResolvedRowOptions) {}

  buildRows(fragments: readonly TextFragment[]): BuiltRows {
    const { rowThreshold, rowAnchor, columnSnapTolerance, columnMergeGap, logger } =
      this.options;

    const sortedRows = clusterRows(withText(fragments), { rowThreshold, anchor: rowAnchor }).map(
      sortRowByX
    );
    const columns = resolveColumnIntervals(sortedRows, columnSnapTolerance, columnMergeGap);

    const rows: string[][] = [];
    let dropped = 0;

    for (const row of sortedRows) {
      const slots = new Array<string>(columns.length).fill("");

      for (const fragment of row) {
        const text = cleanFragmentText(fragment.text);
        const colIndex = findColumnIndex(fragment, columns, columnSnapTolerance);
        if (colIndex === -1) {
          dropped++;
          continue;
        }
        slots[colIndex] = slots[colIndex] === "" ? text : `${slots[colIndex]} ${text}`;
      }

      const cells = slots.filter(slot => slot !== "");
      if (cells.length > 0) rows.push(cells);
    }

    if (dropped > 0) {
      logger.debug("Dropped fragments that fit no column", { dropped, columns: columns.length });
    }

    return { rows, columns };
  }
}

export function createRowBuilder(options: RowExtractionOptions = {}): RowBuilder {
  const resolved = resolveRowOptions(options);
  switch (resolved.mode) {
    case "column-exact":
      return new ColumnExactRowBuilder(resolved);
    default:
      return new BasicRowBuilder(resolved);
  }
}

/**
 * Fragments of a page's text containers, in appearance order. Containers whose trimmed
 * text is empty are left out.
 */
export function fragmentsFromPage(page: PageLayout): TextFragment[] {
  const fragments: TextFragment[] = [];
  for (const element of page.elements) {
    if (element.kind !== "text-container") continue;
    const text = element.text.trim();
    if (!text) continue;
    fragments.push({
      text,
      x0: element.bbox.x0,
      y0: element.bbox.y0,
      x1: element.bbox.x1,
      y1: element.bbox.y1,
      pageHeight: page.height,
    });
  }
  return fragments;
}

/**
 * Main per-page entry: layout elements in, rows of cells out. A page without usable text
 * yields zero rows.
 */
export function extractRowsFromPage(
  page: PageLayout,
  builderOrOptions: RowBuilder | RowExtractionOptions = {}
): PageRows {
  const builder = isRowBuilder(builderOrOptions)
    ? builderOrOptions
    : createRowBuilder(builderOrOptions);

  const fragments = fragmentsFromPage(page);
  const shapeCount = page.elements.filter(el => el.kind !== "text-container").length;

  if (fragments.length === 0) {
    return { pageIndex: page.pageIndex, rows: [], columns: [], shapeCount };
  }

  const { rows, columns } = builder.buildRows(fragments);
  return { pageIndex: page.pageIndex, rows, columns, shapeCount };
}

function isRowBuilder(value: RowBuilder | RowExtractionOptions): value is RowBuilder {
  return "buildRows" in value && typeof value.buildRows === "function";
}
