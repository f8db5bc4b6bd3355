import { z } from "zod";
import { AsrConfusion } from "../types/models";

export const MIN_HORIZONTAL_MARGIN = 0.06;
export const MIN_VERTICAL_MARGIN = 0.1;

const asrConfusionSchema = z.object({
  heard: z.string().min(1).max(80),
  intended: z.string().min(1).max(80),
});

export const DEFAULT_ASR_CONFUSIONS: AsrConfusion[] = [
  { heard: "hostel", intended: "hostile" },
  { heard: "warner discovery", intended: "warner bros. discovery" },
  { heard: "live translations", intended: "live translation" },
];

export const DEFAULT_CANONICAL_TERMS: string[] = ["Warner Bros. Discovery", "Live Translation", "Gmail"];

// Known bad caption forms, matched case-insensitively inside a cue.
export const DEFAULT_BAD_TERMS: string[] = ["hostel bid", "warner brothers", "father -son"];

export const captionConfigSchema = z
  .object({
    maxLines: z.number().int().min(1).max(4).optional().default(2),
    maxCharsPerLine: z.number().int().min(8).max(120).optional().default(42),
    maxCueDurationS: z.number().positive().max(30).optional().default(2.0),
    minCueDurationS: z.number().min(0).max(10).optional().default(0.6),
    safeMarginHorizontalFraction: z.number().min(0).max(0.45).optional().default(0.07),
    safeMarginVerticalFraction: z.number().min(0).max(0.45).optional().default(0.12),
    verbatimPolicy: z.enum(["audio", "script"]).optional().default("audio"),
    qcMode: z.enum(["off", "warn", "strict", "broadcast"]).optional().default("warn"),
    avDeltaToleranceS: z.number().min(0).optional().default(0.25),
    subtitleEndDeltaToleranceS: z.number().min(0).optional().default(0.25),
    lateStartToleranceS: z.number().min(0).optional().default(0.2),
    lateStartFraction: z.number().gt(0).lt(1).optional(),
    maxCps: z.number().positive().optional().default(17),
    targetCps: z.number().positive().optional().default(15),
    driftAvgToleranceS: z.number().min(0).optional().default(0.8),
    driftMaxToleranceS: z.number().min(0).optional().default(2.0),
    broadcastDriftToleranceS: z.number().min(0).optional().default(0.25),
    earlyEndToleranceS: z.number().min(0).optional().default(0.2),
    maxCueChangesPerTenSeconds: z.number().positive().optional().default(5),
    medianCueDurationFloorS: z.number().min(0).optional().default(1.5),
    broadcastMedianCueDurationFloorS: z.number().min(0).optional().default(1.0),
    maxOrphanLineRate: z.number().min(0).max(1).optional().default(0.05),
    strictLayout: z.boolean().optional().default(false),
    asrConfusions: z.array(asrConfusionSchema).max(200).optional().default(DEFAULT_ASR_CONFUSIONS),
    canonicalTerms: z.array(z.string().min(1).max(120)).max(200).optional().default(DEFAULT_CANONICAL_TERMS),
    badTerms: z.array(z.string().min(1).max(120)).max(200).optional().default(DEFAULT_BAD_TERMS),
  })
  .strict()
  .refine((config) => config.minCueDurationS <= config.maxCueDurationS, {
    message: "minCueDurationS must not exceed maxCueDurationS",
    path: ["minCueDurationS"],
  })
  .refine((config) => config.targetCps <= config.maxCps, {
    message: "targetCps must not exceed maxCps",
    path: ["targetCps"],
  });

export type CaptionConfigInput = z.input<typeof captionConfigSchema>;

export type CaptionConfig = Readonly<
  Omit<z.output<typeof captionConfigSchema>, "asrConfusions" | "canonicalTerms" | "badTerms">
> & {
  readonly asrConfusions: readonly AsrConfusion[];
  readonly canonicalTerms: readonly string[];
  readonly badTerms: readonly string[];
};

/**
 * Validates overrides, raises margins to their enforced minimums and freezes
 * the result. Throws a ZodError on invalid input.
 */
export const resolveCaptionConfig = (input: unknown = {}): CaptionConfig => {
  const parsed = captionConfigSchema.parse(input);
  return Object.freeze({
    ...parsed,
    safeMarginHorizontalFraction: Math.max(parsed.safeMarginHorizontalFraction, MIN_HORIZONTAL_MARGIN),
    safeMarginVerticalFraction: Math.max(parsed.safeMarginVerticalFraction, MIN_VERTICAL_MARGIN),
    asrConfusions: Object.freeze(parsed.asrConfusions.map((entry) => Object.freeze({ ...entry }))),
    canonicalTerms: Object.freeze([...parsed.canonicalTerms]),
    badTerms: Object.freeze([...parsed.badTerms]),
  });
};

/** Copy of `values` without its undefined entries. */
export const definedEntries = (values: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
