export type QueueJobName = "buildCaptions";

export interface Word {
  text: string;
  start: number;
  end: number;
}

export interface Segment {
  start: number;
  end: number;
  text: string;
  words?: Word[];
}

export type TimingSource =
  | { kind: "word"; segment: Segment; words: Word[] }
  | { kind: "segment"; segment: Segment }
  | { kind: "none"; segment: Segment };

export interface Cue {
  readonly index: number;
  readonly start: number;
  readonly end: number;
  readonly lines: readonly string[];
}

export type VerbatimPolicy = "audio" | "script";

export type QcMode = "off" | "warn" | "strict" | "broadcast";

export const QC_MODE_ORDER: readonly QcMode[] = ["off", "warn", "strict", "broadcast"];

export type Severity = "warn" | "fail";

export type QcStatus = "pass" | "warn" | "fail";

export type ViolationKind =
  | "end_punctuation"
  | "dangling_tail"
  | "forbidden_line_start"
  | "forbidden_line_end"
  | "min_duration"
  | "max_duration"
  | "max_cps"
  | "cps_target"
  | "sentence_case"
  | "safe_area_exceeded"
  | "av_duration_delta"
  | "subtitle_end_delta"
  | "late_start"
  | "drift"
  | "verbatim_mismatch"
  | "early_end"
  | "cue_change_rate"
  | "median_duration"
  | "orphan_line"
  | "canonical_term_missing"
  | "bad_term"
  | "bracket_only"
  | "metadata_tokens";

export interface Violation {
  kind: ViolationKind;
  cueIndex?: number;
  message: string;
  severity: Severity;
  measured?: number;
  limit?: number;
}

export interface VerbatimResult {
  status: "pass" | "mismatch";
  firstMismatchIndex?: number;
  sample?: {
    expected: string | null;
    actual: string | null;
  };
  referenceLength: number;
  candidateLength: number;
  lengthMismatch: boolean;
}

export interface AsrConfusion {
  heard: string;
  intended: string;
}

export interface VerbatimReport {
  policy: VerbatimPolicy;
  scriptVsCaptions: VerbatimResult | null;
  scriptVsAsr: VerbatimResult | null;
  asrVsCaptions: VerbatimResult | null;
  asrConfusions: AsrConfusion[];
}

export interface SafeAreaMargins {
  horizontal: number;
  vertical: number;
}

export interface SafeAreaResult {
  bbox: {
    width: number;
    height: number;
  };
  withinBounds: boolean;
  safeRect: {
    x: number;
    y: number;
    width: number;
    height: number;
  };
  margins: SafeAreaMargins;
}

export interface NumericStats {
  min: number;
  max: number;
  avg: number;
  median: number;
}

export interface CueMetrics {
  index: number;
  start: number;
  end: number;
  duration: number;
  chars: number;
  cps: number;
  gapBefore: number | null;
}

export interface QcMetrics {
  cueCount: number;
  coverage: number;
  duration: NumericStats | null;
  cps: NumericStats | null;
  gap: NumericStats | null;
  drift: { avg: number; max: number } | null;
  audioDuration: number;
  videoDuration: number | null;
  avDelta: number | null;
  subtitleStart: number | null;
  subtitleEnd: number | null;
  subtitleEndDelta: number | null;
  lateStart: boolean;
  cuesPerTenSeconds: number;
  /** Transitions between cues, so a single cue never counts as a change. */
  cueChangesPerTenSeconds: number;
  orphanLineRate: number | null;
}

export interface StyleSummary {
  fontFamily: string;
  fontSize: number;
  outline: number;
  shadow: number;
  playResX: number;
  playResY: number;
  marginL: number;
  marginR: number;
  marginV: number;
}

export interface QcReport {
  mode: QcMode;
  policy: VerbatimPolicy;
  status: QcStatus;
  metrics: QcMetrics;
  cues: CueMetrics[];
  safeArea: SafeAreaResult;
  subtitleLayoutOk: boolean;
  style: StyleSummary | null;
  verbatimDiff: VerbatimReport | null;
  warnings: string[];
  violations: Violation[];
}

export interface RenderProfile {
  name: string;
  width: number;
  height: number;
  fps: number;
  safeArea: {
    top: number;
    bottom: number;
    left: number;
    right: number;
  };
  subtitleFont: string;
  fontSize: number;
  outline: number;
  shadow: number;
}

export type RunStatus = "pending" | "completed" | "failed";

export interface RunRecord {
  id: string;
  profile: string;
  script?: string;
  scriptPath?: string;
  segments?: Segment[];
  audioPath?: string;
  audioDuration?: number;
  videoDuration?: number;
  overrides?: Record<string, unknown>;
  status: RunStatus;
  qcStatus?: QcStatus;
  srtPath?: string;
  srtUrl?: string;
  vttPath?: string;
  vttUrl?: string;
  assPath?: string;
  assUrl?: string;
  reportPath?: string;
  reportUrl?: string;
  error?: string;
  createdAt: string;
  updatedAt: string;
}

export interface BuildResult {
  runId: string;
  qcStatus: QcStatus;
  cueCount: number;
  srtUrl: string;
  vttUrl: string;
  assUrl: string;
  reportUrl: string;
}

export interface JobView<T = unknown> {
  jobId: string;
  status: "queued" | "running" | "succeeded" | "failed";
  progress: number;
  error?: string;
  result?: T;
}
