import type { BBox, TextContainerElement } from "./types.js";

export interface TextRun {
  text: string;
  bbox: BBox;
}

export interface TextRunMergeSettings {
  horizontalMergeGap: number;
  verticalMergeGap: number;
  spaceWidth: number;
}

/**
 * pdf.js splits a visual phrase into several runs (per font change, per kerning break).
 * Join runs that share a baseline and sit close together into one text container, the way
 * a layout analyser would box them.
 */
export function mergeTextRuns(
  runs: readonly TextRun[],
  settings: TextRunMergeSettings
): TextContainerElement[] {
  const lines = groupRunsIntoLines(runs, settings.verticalMergeGap);
  const merged: TextContainerElement[] = [];

  for (const line of lines) {
    let current: TextRun | null = null;

    for (const run of line) {
      if (!current) {
        current = { text: run.text, bbox: { ...run.bbox } };
        continue;
      }

      const gap = run.bbox.x0 - current.bbox.x1;
      if (gap <= settings.horizontalMergeGap) {
        current = joinRuns(current, run, gap > settings.spaceWidth);
      } else {
        merged.push(toContainer(current));
        current = { text: run.text, bbox: { ...run.bbox } };
      }
    }

    if (current) merged.push(toContainer(current));
  }

  return merged;
}

function groupRunsIntoLines(runs: readonly TextRun[], verticalMergeGap: number): TextRun[][] {
  const sorted = [...runs].sort((a, b) => {
    const yDiff = b.bbox.y0 - a.bbox.y0;
    if (Math.abs(yDiff) > 0.001) return yDiff;
    return a.bbox.x0 - b.bbox.x0;
  });

  const lines: TextRun[][] = [];
  let lineY = 0;

  for (const run of sorted) {
    const line = lines[lines.length - 1];
    if (line && Math.abs(run.bbox.y0 - lineY) <= verticalMergeGap) {
      line.push(run);
    } else {
      lines.push([run]);
      lineY = run.bbox.y0;
    }
  }

  return lines.map(line => line.sort((a, b) => a.bbox.x0 - b.bbox.x0));
}

function joinRuns(left: TextRun, right: TextRun, needsSpace: boolean): TextRun {
  const boundaryHasSpace = /\s$/.test(left.text) || /^\s/.test(right.text);
  const separator = needsSpace && !boundaryHasSpace ? " " : "";
  return {
    text: left.text + separator + right.text,
    bbox: {
      x0: Math.min(left.bbox.x0, right.bbox.x0),
      y0: Math.min(left.bbox.y0, right.bbox.y0),
      x1: Math.max(left.bbox.x1, right.bbox.x1),
      y1: Math.max(left.bbox.y1, right.bbox.y1),
    },
  };
}

function toContainer(run: TextRun): TextContainerElement {
  return { kind: "text-container", text: run.text, bbox: run.bbox };
}
