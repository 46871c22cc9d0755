import type { LayoutElement, PageLayout, TextFragment } from "../../src/index.js";

export function frag(text: string, x0: number, y0: number, x1 = x0 + 20, height = 10): TextFragment {
  return { text, x0, y0, x1, y1: y0 + height, pageHeight: 792 };
}

export function page(
  pageIndex: number,
  texts: Array<{ text: string; x0: number; y0: number; x1: number }>
): PageLayout {
  return {
    pageIndex,
    width: 612,
    height: 792,
    elements: texts.map((t): LayoutElement => ({
      kind: "text-container",
      text: t.text,
      bbox: { x0: t.x0, y0: t.y0, x1: t.x1, y1: t.y0 + 10 },
    })),
  };
}
