import { z } from "zod";
import { InvalidOptionsError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  LoadPageLayoutOptions,
  RowAnchor,
  RowBuilderMode,
  RowExtractionOptions,
} from "./types.js";

const toleranceSchema = z.number().finite().nonnegative();

export const RowBuilderModeSchema = z.enum(["basic", "column-exact"]);
export const RowAnchorSchema = z.enum(["first", "previous"]);

export const RowExtractionOptionsSchema = z.object({
  mode: RowBuilderModeSchema.optional(),
  rowThreshold: z.number().finite().positive().optional(),
  rowAnchor: RowAnchorSchema.optional(),
  columnSnapTolerance: toleranceSchema.optional(),
  columnMergeGap: toleranceSchema.optional(),
});

export const TextRunMergeOptionsSchema = z.object({
  horizontalMergeGap: toleranceSchema.optional(),
  verticalMergeGap: toleranceSchema.optional(),
  spaceWidth: toleranceSchema.optional(),
});

export const LoadPageLayoutOptionsSchema = z.object({
  mergeRuns: z.boolean().optional(),
  mergeOptions: TextRunMergeOptionsSchema.optional(),
  onPageError: z.enum(["abort", "skip"]).optional(),
});

export interface ModePreset {
  rowThreshold: number;
  rowAnchor: RowAnchor;
}

export const MODE_PRESETS: Readonly<Record<RowBuilderMode, ModePreset>> = {
  basic: { rowThreshold: 5, rowAnchor: "first" },
  "column-exact": { rowThreshold: 8, rowAnchor: "previous" },
};

export const DEFAULT_COLUMN_SNAP_TOLERANCE = 5;
export const DEFAULT_COLUMN_MERGE_GAP = 10;

export const DEFAULT_MERGE_OPTIONS = {
  horizontalMergeGap: 10,
  verticalMergeGap: 3,
  spaceWidth: 2.5,
} as const;

export interface ResolvedRowOptions {
  mode: RowBuilderMode;
  rowThreshold: number;
  rowAnchor: RowAnchor;
  columnSnapTolerance: number;
  columnMergeGap: number;
  logger: Logger;
}

export interface ResolvedLoadOptions {
  mergeRuns: boolean;
  horizontalMergeGap: number;
  verticalMergeGap: number;
  spaceWidth: number;
  onPageError: "abort" | "skip";
  logger: Logger;
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map(issue => `${issue.path.join(".") || "options"}: ${issue.message}`)
    );
  }
  return result.data;
}

/** Fill in mode presets and defaults. Explicit values always win over the preset. */
export function resolveRowOptions(options: RowExtractionOptions = {}): ResolvedRowOptions {
  const parsed = parseOrThrow(RowExtractionOptionsSchema, options);
  const mode = parsed.mode ?? "basic";
  const preset = MODE_PRESETS[mode];

  return {
    mode,
    rowThreshold: parsed.rowThreshold ?? preset.rowThreshold,
    rowAnchor: parsed.rowAnchor ?? preset.rowAnchor,
    columnSnapTolerance: parsed.columnSnapTolerance ?? DEFAULT_COLUMN_SNAP_TOLERANCE,
    columnMergeGap: parsed.columnMergeGap ?? DEFAULT_COLUMN_MERGE_GAP,
    logger: options.logger ?? silentLogger,
  };
}

export function resolveLoadOptions(options: LoadPageLayoutOptions = {}): ResolvedLoadOptions {
  const parsed = parseOrThrow(LoadPageLayoutOptionsSchema, options);
  const merge = parsed.mergeOptions ?? {};

  return {
    mergeRuns: parsed.mergeRuns ?? true,
    horizontalMergeGap: merge.horizontalMergeGap ?? DEFAULT_MERGE_OPTIONS.horizontalMergeGap,
    verticalMergeGap: merge.verticalMergeGap ?? DEFAULT_MERGE_OPTIONS.verticalMergeGap,
    spaceWidth: merge.spaceWidth ?? DEFAULT_MERGE_OPTIONS.spaceWidth,
    onPageError: parsed.onPageError ?? "abort",
    logger: options.logger ?? silentLogger,
  };
}
