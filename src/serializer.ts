import type { PageRows } from "./types.js";

const CELL_SEPARATOR = " \t ";

/**
 * Tab-delimited form of one row: `"\t " + cells.join(" \t ") + " \t"`.
 * Downstream consumers split on the tab, so the layout must not change.
 */
export function serializeRow(cells: readonly string[]): string {
  return "\t " + cells.join(CELL_SEPARATOR) + " \t";
}

/** Serialized lines of every page, pages in ascending index order. */
export function serializePages(pages: readonly PageRows[]): string[] {
  return [...pages]
    .sort((a, b) => a.pageIndex - b.pageIndex)
    .flatMap(page => page.rows.map(serializeRow));
}

export function serializeTable(pages: readonly PageRows[]): string {
  return serializePages(pages).join("\n");
}

/**
 * Inverse of serializeRow: split on tabs, drop the empty outer tokens and the single
 * padding space on each side of a cell.
 */
export function parseRow(line: string): string[] {
  const tokens = line.split("\t");
  if (tokens.length < 2) return [];
  return tokens.slice(1, -1).map(token => token.slice(1, -1));
}
