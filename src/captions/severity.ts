import { QC_MODE_ORDER, QcMode, Severity, VerbatimPolicy, ViolationKind } from "../types/models";

type EnforcedMode = Exclude<QcMode, "off">;

const TIMING: Record<EnforcedMode, Severity> = { warn: "warn", strict: "fail", broadcast: "fail" };
const TEXT_STYLE: Record<EnforcedMode, Severity> = { warn: "warn", strict: "warn", broadcast: "fail" };
const ADVISORY: Record<EnforcedMode, Severity> = { warn: "warn", strict: "warn", broadcast: "warn" };

export const SEVERITY_TABLE: Readonly<Record<ViolationKind, Readonly<Record<EnforcedMode, Severity>>>> = {
  max_duration: TIMING,
  min_duration: TIMING,
  max_cps: TIMING,
  av_duration_delta: TIMING,
  subtitle_end_delta: TIMING,
  late_start: TIMING,
  safe_area_exceeded: TIMING,
  drift: TIMING,
  verbatim_mismatch: TIMING,
  early_end: TIMING,
  cue_change_rate: TIMING,
  median_duration: TIMING,
  orphan_line: TIMING,
  end_punctuation: TEXT_STYLE,
  dangling_tail: TEXT_STYLE,
  forbidden_line_start: TEXT_STYLE,
  forbidden_line_end: TEXT_STYLE,
  canonical_term_missing: TEXT_STYLE,
  cps_target: ADVISORY,
  sentence_case: ADVISORY,
  bad_term: ADVISORY,
  bracket_only: ADVISORY,
  metadata_tokens: ADVISORY,
};

// Under the audio policy the captions follow the recording, so wording checks stay advisory.
const AUDIO_ADVISORY: ReadonlySet<ViolationKind> = new Set(["verbatim_mismatch", "canonical_term_missing"]);

export const modeAtLeast = (mode: QcMode, threshold: QcMode): boolean =>
  QC_MODE_ORDER.indexOf(mode) >= QC_MODE_ORDER.indexOf(threshold);

/** `null` means the check does not run in this mode. */
export const severityFor = (kind: ViolationKind, mode: QcMode, policy: VerbatimPolicy): Severity | null => {
  if (mode === "off") {
    return null;
  }
  if (policy === "audio" && AUDIO_ADVISORY.has(kind)) {
    return "warn";
  }
  return SEVERITY_TABLE[kind][mode];
};
