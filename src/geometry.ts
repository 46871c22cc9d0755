import type { ColumnInterval, RowAnchor, TextFragment } from "./types.js";

export interface RowClusterOptions {
  rowThreshold: number;
  anchor: RowAnchor;
}

interface RowAccumulator {
  rows: TextFragment[][];
  current: TextFragment[];
  referenceY: number | null;
}

/**
 * Group fragments into visual rows, top row first.
 *
 * Fragments are visited by descending y0 (PDF y grows upwards). A fragment joins the open
 * row while its y0 stays strictly within `rowThreshold` of the anchor: the row's first
 * member for "first", the previously added fragment for "previous". With "previous" the
 * tolerance is chained, so a long run can drift further than the threshold and still form
 * one row.
 */
export function clusterRows(
  fragments: readonly TextFragment[],
  options: RowClusterOptions
): TextFragment[][] {
  // Array.prototype.sort is stable, ties keep their appearance order.
  const sorted = [...fragments].sort((a, b) => b.y0 - a.y0);

  const initial: RowAccumulator = { rows: [], current: [], referenceY: null };

  const result = sorted.reduce<RowAccumulator>((acc, fragment) => {
    if (acc.referenceY === null) {
      return { rows: acc.rows, current: [fragment], referenceY: fragment.y0 };
    }

    if (Math.abs(fragment.y0 - acc.referenceY) < options.rowThreshold) {
      acc.current.push(fragment);
      const referenceY = options.anchor === "previous" ? fragment.y0 : acc.referenceY;
      return { rows: acc.rows, current: acc.current, referenceY };
    }

    acc.rows.push(acc.current);
    return { rows: acc.rows, current: [fragment], referenceY: fragment.y0 };
  }, initial);

  if (result.current.length > 0) {
    result.rows.push(result.current);
  }
  return result.rows;
}

export function sortRowByX(row: readonly TextFragment[]): TextFragment[] {
  return [...row].sort((a, b) => a.x0 - b.x0);
}

/**
 * First-fit interval discovery. Fragments are visited row by row, left to right inside a
 * row; the first interval whose snapped span contains the fragment's x0 grows to cover it.
 * The result depends on visitation order.
 */
export function discoverColumnIntervals(
  rows: readonly (readonly TextFragment[])[],
  snapTolerance: number
): ColumnInterval[] {
  const intervals: ColumnInterval[] = [];

  for (const row of rows) {
    for (const fragment of row) {
      const hit = intervals.find(
        col => fragment.x0 >= col.xmin - snapTolerance && fragment.x0 <= col.xmax + snapTolerance
      );
      if (hit) {
        hit.xmin = Math.min(hit.xmin, fragment.x0);
        hit.xmax = Math.max(hit.xmax, fragment.x1);
      } else {
        intervals.push({ xmin: fragment.x0, xmax: fragment.x1 });
      }
    }
  }

  return intervals;
}

/**
 * Sort by xmin and fold every interval that starts within `mergeGap` of the previous
 * one's end into it. Running it again on its own output changes nothing.
 */
export function mergeColumnIntervals(
  intervals: readonly ColumnInterval[],
  mergeGap: number
): ColumnInterval[] {
  const sorted = [...intervals].sort((a, b) => a.xmin - b.xmin);

  return sorted.reduce<ColumnInterval[]>((merged, col) => {
    const last = merged[merged.length - 1];
    if (last && col.xmin <= last.xmax + mergeGap) {
      last.xmax = Math.max(last.xmax, col.xmax);
    } else {
      merged.push({ xmin: col.xmin, xmax: col.xmax });
    }
    return merged;
  }, []);
}

export function resolveColumnIntervals(
  rows: readonly (readonly TextFragment[])[],
  snapTolerance: number,
  mergeGap: number
): ColumnInterval[] {
  return mergeColumnIntervals(discoverColumnIntervals(rows, snapTolerance), mergeGap);
}

/** Index of the first interval that fully holds [x0, x1] within the snap tolerance, or -1. */
export function findColumnIndex(
  fragment: Pick<TextFragment, "x0" | "x1">,
  columns: readonly ColumnInterval[],
  snapTolerance: number
): number {
  return columns.findIndex(
    col => fragment.x0 >= col.xmin - snapTolerance && fragment.x1 <= col.xmax + snapTolerance
  );
}
