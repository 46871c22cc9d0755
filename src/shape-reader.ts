import type { BBox, LayoutElement } from "./types.js";

type Matrix = [number, number, number, number, number, number];

/** The pdf.js operator codes the shape reader looks at. */
export interface PathOps {
  save: number;
  restore: number;
  transform: number;
  constructPath: number;
  moveTo: number;
  lineTo: number;
  curveTo: number;
  curveTo2: number;
  curveTo3: number;
  closePath: number;
  rectangle: number;
  stroke: number;
  closeStroke: number;
  fill: number;
  eoFill: number;
  fillStroke: number;
  eoFillStroke: number;
  closeFillStroke: number;
  closeEOFillStroke: number;
  endPath: number;
}

export interface OperatorList {
  fnArray: readonly number[];
  argsArray: readonly unknown[];
}

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

function multiply(m: Matrix, ctm: Matrix): Matrix {
  return [
    m[0] * ctm[0] + m[1] * ctm[2],
    m[0] * ctm[1] + m[1] * ctm[3],
    m[2] * ctm[0] + m[3] * ctm[2],
    m[2] * ctm[1] + m[3] * ctm[3],
    m[4] * ctm[0] + m[5] * ctm[2] + ctm[4],
    m[4] * ctm[1] + m[5] * ctm[3] + ctm[5],
  ];
}

function apply(ctm: Matrix, x: number, y: number): [number, number] {
  return [ctm[0] * x + ctm[2] * y + ctm[4], ctm[1] * x + ctm[3] * y + ctm[5]];
}

function boundsOf(points: ReadonlyArray<[number, number]>): BBox {
  const xs = points.map(p => p[0]);
  const ys = points.map(p => p[1]);
  return { x0: Math.min(...xs), y0: Math.min(...ys), x1: Math.max(...xs), y1: Math.max(...ys) };
}

function toNumbers(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  return value.filter((n): n is number => typeof n === "number");
}

function toMatrix(value: unknown): Matrix | null {
  const n = toNumbers(value);
  if (n.length < 6) return null;
  return [n[0], n[1], n[2], n[3], n[4], n[5]];
}

/**
 * Rectangles (`re`) and straight two-point segments that get painted, in PDF user space
 * (origin bottom-left). Curves and multi-segment paths are skipped; clipping paths ended
 * with `n` are never painted and produce nothing.
 */
export function shapesFromOperatorList(list: OperatorList, ops: PathOps): LayoutElement[] {
  const shapes: LayoutElement[] = [];
  const stack: Matrix[] = [];
  const painting = new Set([
    ops.stroke,
    ops.closeStroke,
    ops.fill,
    ops.eoFill,
    ops.fillStroke,
    ops.eoFillStroke,
    ops.closeFillStroke,
    ops.closeEOFillStroke,
  ]);

  let ctm = IDENTITY;
  let pending: LayoutElement[] = [];

  for (let i = 0; i < list.fnArray.length; i++) {
    const fn = list.fnArray[i];
    const args: unknown = list.argsArray[i];

    if (fn === ops.save) {
      stack.push(ctm);
    } else if (fn === ops.restore) {
      ctm = stack.pop() ?? IDENTITY;
    } else if (fn === ops.transform) {
      const m = toMatrix(args);
      if (m) ctm = multiply(m, ctm);
    } else if (fn === ops.constructPath) {
      const [subOps, coords] = Array.isArray(args) ? args : [];
      pending.push(...pathShapes(toNumbers(subOps), toNumbers(coords), ops, ctm));
    } else if (painting.has(fn)) {
      shapes.push(...pending);
      pending = [];
    } else if (fn === ops.endPath) {
      pending = [];
    }
  }

  return shapes;
}

function pathShapes(
  subOps: readonly number[],
  coords: readonly number[],
  ops: PathOps,
  ctm: Matrix
): LayoutElement[] {
  const shapes: LayoutElement[] = [];
  let segment: Array<[number, number]> = [];
  let skip = false;
  let j = 0;

  const flush = () => {
    if (!skip && segment.length === 2) {
      shapes.push({ kind: "line", bbox: boundsOf(segment) });
    }
    segment = [];
    skip = false;
  };

  for (const op of subOps) {
    if (op === ops.rectangle) {
      flush();
      const [x, y, w, h] = coords.slice(j, j + 4);
      j += 4;
      const corners: Array<[number, number]> = [
        apply(ctm, x, y),
        apply(ctm, x + w, y),
        apply(ctm, x + w, y + h),
        apply(ctm, x, y + h),
      ];
      shapes.push({ kind: "rectangle", bbox: boundsOf(corners) });
    } else if (op === ops.moveTo) {
      flush();
      segment.push(apply(ctm, coords[j], coords[j + 1]));
      j += 2;
    } else if (op === ops.lineTo) {
      segment.push(apply(ctm, coords[j], coords[j + 1]));
      j += 2;
    } else if (op === ops.curveTo) {
      skip = true;
      j += 6;
    } else if (op === ops.curveTo2 || op === ops.curveTo3) {
      skip = true;
      j += 4;
    } else if (op === ops.closePath) {
      skip = true;
    }
  }
  flush();

  return shapes;
}
