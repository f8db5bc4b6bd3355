import { CaptionConfig } from "../config/captionConfig";
import {
  Cue,
  CueMetrics,
  NumericStats,
  QcMetrics,
  QcReport,
  QcStatus,
  SafeAreaResult,
  Segment,
  StyleSummary,
  VerbatimReport,
  VerbatimResult,
  Violation,
  ViolationKind,
} from "../types/models";
import { cueText } from "./cueBuilder";
import { tokenize } from "./normalizer";
import { severityFor } from "./severity";
import {
  containsTerm,
  endsSentence,
  hasMetadataToken,
  isBracketOnly,
  isDanglingTail,
  isForbiddenEdgeWord,
  startsLowercase,
} from "./textRules";

export interface QcInput {
  cues: readonly Cue[];
  segments: readonly Segment[];
  audioDuration: number;
  videoDuration?: number;
  safeArea: SafeAreaResult;
  verbatim: VerbatimReport;
  style?: StyleSummary;
  /** Authored script, used for canonical term retention. */
  script?: string;
  config: CaptionConfig;
}

// Cue times are quantized to milliseconds.
const TIMING_SLACK_S = 0.001;

const ORPHAN_MAX_CHARS = 3;
const ORPHAN_MAX_DURATION_S = 1.8;

const round = (value: number, digits = 3): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const stats = (values: readonly number[]): NumericStats | null => {
  if (!values.length) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
  return {
    min: round(sorted[0]),
    max: round(sorted[sorted.length - 1]),
    avg: round(values.reduce((sum, value) => sum + value, 0) / values.length),
    median: round(median),
  };
};

const nearestDistance = (value: number, references: readonly number[]): number =>
  references.reduce((best, reference) => Math.min(best, Math.abs(value - reference)), Number.POSITIVE_INFINITY);

/**
 * Word timing: each cue start against the nearest word start. Segment timing:
 * each segment start against the nearest cue start. A single untimed segment
 * has nothing to drift from.
 */
export const computeDrift = (
  cues: readonly Cue[],
  segments: readonly Segment[],
): { avg: number; max: number } | null => {
  if (!cues.length) {
    return null;
  }
  const wordStarts = segments.flatMap((segment) => (segment.words ?? []).map((word) => word.start));
  const cueStarts = cues.map((cue) => cue.start);

  let distances: number[];
  if (wordStarts.length) {
    distances = cueStarts.map((start) => nearestDistance(start, wordStarts));
  } else if (segments.length > 1) {
    distances = segments
      .filter((segment) => segment.text.trim().length > 0)
      .map((segment) => nearestDistance(segment.start, cueStarts));
  } else {
    return null;
  }

  if (!distances.length) {
    return null;
  }
  return {
    avg: round(distances.reduce((sum, value) => sum + value, 0) / distances.length),
    max: round(Math.max(...distances)),
  };
};

/** A two-line cue whose one line is a lone short word, shown too briefly to read as a unit. */
export const hasOrphanLine = (cue: Cue): boolean =>
  cue.lines.length === 2 &&
  cue.end - cue.start < ORPHAN_MAX_DURATION_S &&
  cue.lines.some((line) => {
    const words = tokenize(line);
    return words.length === 1 && words[0].length <= ORPHAN_MAX_CHARS;
  });

const describeMismatch = (label: string, result: VerbatimResult): string => {
  const index = result.firstMismatchIndex ?? 0;
  const expected = result.sample?.expected ?? "<end>";
  const actual = result.sample?.actual ?? "<end>";
  const lengths = result.lengthMismatch ? ` (${result.referenceLength} vs ${result.candidateLength} tokens)` : "";
  return `${label} diverge at token ${index}: expected "${expected}", got "${actual}"${lengths}`;
};

const hasMismatch = (report: VerbatimReport): boolean =>
  [report.scriptVsCaptions, report.scriptVsAsr, report.asrVsCaptions].some((result) => result?.status === "mismatch");

export const evaluateQc = (input: QcInput): QcReport => {
  const { cues, segments, audioDuration, videoDuration, safeArea, verbatim, config } = input;
  const mode = config.qcMode;
  const policy = config.verbatimPolicy;
  const violations: Violation[] = [];
  const warnings: string[] = [];

  const report = (kind: ViolationKind, message: string, details: Partial<Violation> = {}): void => {
    const severity = severityFor(kind, mode, policy);
    if (severity) {
      violations.push({ kind, message, severity, ...details });
    }
  };

  const cueMetrics: CueMetrics[] = cues.map((cue, position) => {
    const duration = cue.end - cue.start;
    const chars = cueText(cue).length;
    const previous = cues[position - 1];
    return {
      index: cue.index,
      start: cue.start,
      end: cue.end,
      duration: round(duration),
      chars,
      cps: round(duration > 0 ? chars / duration : 0, 2),
      gapBefore: previous ? round(cue.start - previous.end) : null,
    };
  });

  const drift = computeDrift(cues, segments);
  const first = cues[0];
  const last = cues[cues.length - 1];
  const totalShown = cueMetrics.reduce((sum, metric) => sum + (metric.end - metric.start), 0);
  const avDelta = videoDuration !== undefined ? round(Math.abs(videoDuration - audioDuration)) : null;
  const subtitleEndDelta = last ? round(Math.abs(last.end - audioDuration)) : null;
  const lateStart =
    !!first &&
    (first.start > config.lateStartToleranceS + TIMING_SLACK_S ||
      (config.lateStartFraction !== undefined && first.start > audioDuration * config.lateStartFraction));
  const cueChanges = Math.max(0, cues.length - 1);
  const orphanCues = cues.filter(hasOrphanLine);

  const metrics: QcMetrics = {
    cueCount: cues.length,
    coverage: audioDuration > 0 ? round(totalShown / audioDuration) : 0,
    duration: stats(cueMetrics.map((metric) => metric.end - metric.start)),
    cps: stats(cueMetrics.map((metric) => metric.cps)),
    gap: stats(cueMetrics.flatMap((metric) => (metric.gapBefore === null ? [] : [metric.gapBefore]))),
    drift,
    audioDuration,
    videoDuration: videoDuration ?? null,
    avDelta,
    subtitleStart: first ? first.start : null,
    subtitleEnd: last ? last.end : null,
    subtitleEndDelta,
    lateStart,
    cuesPerTenSeconds: audioDuration > 0 ? round((cues.length / audioDuration) * 10, 2) : 0,
    cueChangesPerTenSeconds: audioDuration > 0 ? round((cueChanges / audioDuration) * 10, 2) : 0,
    orphanLineRate: cues.length ? round(orphanCues.length / cues.length) : null,
  };

  cues.forEach((cue, position) => {
    const { duration, cps } = cueMetrics[position];
    const text = cueText(cue);
    const tokens = tokenize(text);
    const previous = cues[position - 1];
    const next = cues[position + 1];
    const clampedFinal = !next && audioDuration - cue.end <= 0.01;

    if (duration < config.minCueDurationS - TIMING_SLACK_S && !clampedFinal) {
      report("min_duration", `Cue ${cue.index} lasts ${duration}s (min ${config.minCueDurationS}s)`, {
        cueIndex: cue.index,
        measured: duration,
        limit: config.minCueDurationS,
      });
    }
    if (duration > config.maxCueDurationS + TIMING_SLACK_S) {
      report("max_duration", `Cue ${cue.index} lasts ${duration}s (max ${config.maxCueDurationS}s)`, {
        cueIndex: cue.index,
        measured: duration,
        limit: config.maxCueDurationS,
      });
    }
    if (cps > config.maxCps) {
      report("max_cps", `Cue ${cue.index} reads at ${cps} cps (max ${config.maxCps})`, {
        cueIndex: cue.index,
        measured: cps,
        limit: config.maxCps,
      });
    } else if (cps > config.targetCps) {
      report("cps_target", `Cue ${cue.index} reads at ${cps} cps (target ${config.targetCps})`, {
        cueIndex: cue.index,
        measured: cps,
        limit: config.targetCps,
      });
    }

    const opensSentence = !previous || endsSentence(cueText(previous));
    if (opensSentence && startsLowercase(text)) {
      report("sentence_case", `Cue ${cue.index} starts a sentence in lowercase`, { cueIndex: cue.index });
    }

    if (!endsSentence(text)) {
      report("end_punctuation", `Cue ${cue.index} does not end with terminal punctuation`, { cueIndex: cue.index });
    }

    const lastToken = tokens[tokens.length - 1];
    if (lastToken && isDanglingTail(lastToken)) {
      report("dangling_tail", `Cue ${cue.index} ends on "${lastToken}"`, { cueIndex: cue.index });
    }

    if (cue.lines.length > 1) {
      cue.lines.forEach((line, lineIndex) => {
        const words = tokenize(line);
        const head = words[0];
        const tail = words[words.length - 1];
        if (head && isForbiddenEdgeWord(head)) {
          report("forbidden_line_start", `Cue ${cue.index} line ${lineIndex + 1} starts with "${head}"`, {
            cueIndex: cue.index,
          });
        }
        if (tail && isForbiddenEdgeWord(tail)) {
          report("forbidden_line_end", `Cue ${cue.index} line ${lineIndex + 1} ends with "${tail}"`, {
            cueIndex: cue.index,
          });
        }
      });
    }

    const badTerm = config.badTerms.find((term) => containsTerm(text, term));
    if (badTerm) {
      report("bad_term", `Cue ${cue.index} contains "${badTerm}"`, { cueIndex: cue.index });
    }
    if (isBracketOnly(text)) {
      report("bracket_only", `Cue ${cue.index} holds only a bracketed annotation`, { cueIndex: cue.index });
    }
    if (hasMetadataToken(text)) {
      report("metadata_tokens", `Cue ${cue.index} contains production metadata`, { cueIndex: cue.index });
    }
  });

  if (!safeArea.withinBounds) {
    warnings.push(
      `Subtitle layout ${safeArea.bbox.width}x${safeArea.bbox.height} exceeds safe area ${round(safeArea.safeRect.width, 1)}x${round(safeArea.safeRect.height, 1)}`,
    );
    report("safe_area_exceeded", "Densest cue does not fit inside the safe area", {
      measured: safeArea.bbox.width,
      limit: round(safeArea.safeRect.width, 1),
    });
  }

  if (avDelta !== null && avDelta > config.avDeltaToleranceS) {
    report("av_duration_delta", `Video and audio durations differ by ${avDelta}s`, {
      measured: avDelta,
      limit: config.avDeltaToleranceS,
    });
  }

  if (subtitleEndDelta !== null && subtitleEndDelta > config.subtitleEndDeltaToleranceS) {
    report("subtitle_end_delta", `Last cue ends ${subtitleEndDelta}s away from the audio end`, {
      measured: subtitleEndDelta,
      limit: config.subtitleEndDeltaToleranceS,
    });
  }

  if (last && audioDuration - last.end > config.earlyEndToleranceS + TIMING_SLACK_S) {
    report("early_end", `Captions end ${round(audioDuration - last.end)}s before the audio does`, {
      measured: round(audioDuration - last.end),
      limit: config.earlyEndToleranceS,
    });
  }

  if (first && lateStart) {
    report("late_start", `First cue appears ${round(first.start)}s after the audio starts`, {
      measured: round(first.start),
      limit: config.lateStartToleranceS,
    });
  }

  if (metrics.cueChangesPerTenSeconds > config.maxCueChangesPerTenSeconds) {
    report(
      "cue_change_rate",
      `Cues change ${metrics.cueChangesPerTenSeconds} times per 10s (max ${config.maxCueChangesPerTenSeconds})`,
      { measured: metrics.cueChangesPerTenSeconds, limit: config.maxCueChangesPerTenSeconds },
    );
  }

  const medianFloor = mode === "broadcast" ? config.broadcastMedianCueDurationFloorS : config.medianCueDurationFloorS;
  const medianDuration = metrics.duration?.median;
  if (medianDuration !== undefined && medianDuration < medianFloor - TIMING_SLACK_S) {
    report("median_duration", `Median cue lasts ${medianDuration}s (floor ${medianFloor}s)`, {
      measured: medianDuration,
      limit: medianFloor,
    });
  }

  if (metrics.orphanLineRate !== null && metrics.orphanLineRate > config.maxOrphanLineRate) {
    report(
      "orphan_line",
      `Orphan lines in cues ${orphanCues.map((cue) => cue.index).join(", ")} (rate ${metrics.orphanLineRate}, max ${config.maxOrphanLineRate})`,
      { measured: metrics.orphanLineRate, limit: config.maxOrphanLineRate },
    );
  }

  if (drift) {
    const broadcast = mode === "broadcast";
    const avgLimit = broadcast ? config.broadcastDriftToleranceS : config.driftAvgToleranceS;
    const maxLimit = broadcast ? config.broadcastDriftToleranceS : config.driftMaxToleranceS;
    if (drift.avg > avgLimit || drift.max > maxLimit) {
      report("drift", `Cue timing drifts from speech (avg ${drift.avg}s, max ${drift.max}s)`, {
        measured: drift.max,
        limit: maxLimit,
      });
    }
  }

  if (policy === "script" && verbatim.scriptVsCaptions?.status === "mismatch") {
    report("verbatim_mismatch", describeMismatch("Script and captions", verbatim.scriptVsCaptions));
  }
  if (policy === "audio" && verbatim.scriptVsAsr?.status === "mismatch") {
    const message = describeMismatch("Script and transcript", verbatim.scriptVsAsr);
    warnings.push(message);
    report("verbatim_mismatch", message);
  }

  if (input.script) {
    const script = input.script;
    const captions = cues.map(cueText).join(" ");
    const missing = config.canonicalTerms.filter((term) => containsTerm(script, term) && !containsTerm(captions, term));
    if (missing.length) {
      report("canonical_term_missing", `Captions drop canonical terms: ${missing.join(", ")}`);
    }
  }
  verbatim.asrConfusions.forEach((entry) => {
    warnings.push(`Possible ASR confusion: heard "${entry.heard}", script says "${entry.intended}"`);
  });

  const status: QcStatus = violations.some((violation) => violation.severity === "fail")
    ? "fail"
    : violations.length
      ? "warn"
      : "pass";

  const includeDiff = mode === "broadcast" || (mode !== "off" && hasMismatch(verbatim));

  return Object.freeze({
    mode,
    policy,
    status,
    metrics,
    cues: cueMetrics,
    safeArea,
    subtitleLayoutOk: safeArea.withinBounds,
    style: input.style ?? null,
    verbatimDiff: includeDiff ? verbatim : null,
    warnings,
    violations,
  });
};
