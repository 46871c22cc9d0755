/**
 * Raised when the layout source cannot produce a page. `pageIndex` is null when the
 * document itself could not be opened.
 */
export class DocumentLayoutError extends Error {
  readonly pageIndex: number | null;

  constructor(message: string, pageIndex: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentLayoutError";
    this.pageIndex = pageIndex;
  }
}

export class InvalidOptionsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid row extraction options: ${issues.join("; ")}`);
    this.name = "InvalidOptionsError";
    this.issues = issues;
  }
}
