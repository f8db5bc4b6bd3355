import { CaptionConfig } from "../config/captionConfig";
import { profileMargins } from "../renderers/profiles";
import {
  Cue,
  QcReport,
  RenderProfile,
  SafeAreaResult,
  Segment,
  StyleSummary,
  VerbatimReport,
} from "../types/models";
import { cuesToAss, cuesToSrt, cuesToVtt, styleFromProfile } from "../utils/subtitles";
import { projectScriptOntoSegments, scriptSegment } from "./alignment";
import { buildCues, cueText } from "./cueBuilder";
import { InvalidCaptionInputError, LayoutExceedsSafeAreaError, VerbatimMismatchError } from "./errors";
import { normalize } from "./normalizer";
import { evaluateQc } from "./qcAggregator";
import { GlyphMetrics, validateSafeArea } from "./safeArea";
import { buildVerbatimReport } from "./verbatimChecker";

export interface CaptionSource {
  script?: string;
  segments?: readonly Segment[];
  audioDuration: number;
  videoDuration?: number;
}

export interface CaptionPipelineInput extends CaptionSource {
  profile: RenderProfile;
  glyphMetrics?: GlyphMetrics;
}

export interface PreparedCaptions {
  source: CaptionSource;
  timing: readonly Segment[];
  cues: readonly Cue[];
  verbatim: VerbatimReport;
}

export interface ProfileEvaluation {
  profile: string;
  safeArea: SafeAreaResult;
  style: StyleSummary;
  report: QcReport;
}

export interface CaptionPipelineResult extends ProfileEvaluation {
  cues: readonly Cue[];
  srt: string;
  vtt: string;
  ass: string;
  verbatim: VerbatimReport;
}

const transcriptText = (segments: readonly Segment[]): string =>
  segments
    .map((segment) => (segment.words?.length ? segment.words.map((word) => word.text).join(" ") : segment.text))
    .map((text) => normalize(text, "verbatim"))
    .filter(Boolean)
    .join(" ");

const freezeCues = (cues: readonly Cue[]): readonly Cue[] =>
  Object.freeze(cues.map((cue) => Object.freeze({ ...cue, lines: Object.freeze([...cue.lines]) })));

/** Timing, cue building and verbatim comparison; shared by every render profile. */
export const prepareCaptions = (source: CaptionSource, config: CaptionConfig): PreparedCaptions => {
  const { audioDuration } = source;
  if (!Number.isFinite(audioDuration) || audioDuration <= 0) {
    throw new InvalidCaptionInputError("audioDuration must be a positive number of seconds");
  }

  const script = normalize(source.script ?? "", "verbatim");
  const segments = source.segments ?? [];
  const asr = transcriptText(segments);
  if (!script && !asr) {
    throw new InvalidCaptionInputError("Either a script or transcript segments with text are required");
  }

  const policy = config.verbatimPolicy;
  if (policy === "script" && !script) {
    throw new InvalidCaptionInputError("Script verbatim policy requires a script");
  }

  let timing: readonly Segment[];
  if (!asr) {
    timing = [scriptSegment(script, audioDuration)];
  } else if (policy === "script") {
    timing = projectScriptOntoSegments(script, segments);
  } else {
    timing = segments;
  }

  const cues = buildCues(timing, policy, {
    maxLines: config.maxLines,
    maxCharsPerLine: config.maxCharsPerLine,
    maxCueDurationS: config.maxCueDurationS,
    minCueDurationS: config.minCueDurationS,
    audioDuration,
  });

  const verbatim = buildVerbatimReport(
    policy,
    {
      script: script || undefined,
      asr: asr || undefined,
      captions: cues.map(cueText).join(" "),
    },
    config.asrConfusions,
  );

  return { source, timing, cues: freezeCues(cues), verbatim };
};

export const evaluateProfile = (
  prepared: PreparedCaptions,
  profile: RenderProfile,
  config: CaptionConfig,
  glyphMetrics?: GlyphMetrics,
): ProfileEvaluation => {
  const margins = profileMargins(profile, {
    horizontal: config.safeMarginHorizontalFraction,
    vertical: config.safeMarginVerticalFraction,
  });
  const safeArea = validateSafeArea(
    {
      fontSize: profile.fontSize,
      outlineWidth: profile.outline,
      frameWidth: profile.width,
      frameHeight: profile.height,
      maxLines: config.maxLines,
      maxCharsPerLine: config.maxCharsPerLine,
      margins,
    },
    glyphMetrics,
  );
  const style = styleFromProfile(profile, config);

  const report = evaluateQc({
    cues: prepared.cues,
    segments: prepared.timing,
    audioDuration: prepared.source.audioDuration,
    videoDuration: prepared.source.videoDuration,
    safeArea,
    verbatim: prepared.verbatim,
    style,
    script: prepared.source.script,
    config,
  });

  return { profile: profile.name, safeArea, style, report };
};

/** Builds cues once, then audits them independently for each profile. */
export const evaluateProfiles = (
  source: CaptionSource,
  profiles: readonly RenderProfile[],
  config: CaptionConfig,
  glyphMetrics?: GlyphMetrics,
): ProfileEvaluation[] => {
  const prepared = prepareCaptions(source, config);
  return profiles.map((profile) => evaluateProfile(prepared, profile, config, glyphMetrics));
};

/**
 * Single pass from script/transcript to cues, subtitle files and a QC report.
 * Threshold violations land in the report; only malformed input, a script
 * mismatch under strict/broadcast and, when `strictLayout` is set, a layout
 * overflow are thrown.
 */
export const runCaptionPipeline = (input: CaptionPipelineInput, config: CaptionConfig): CaptionPipelineResult => {
  const prepared = prepareCaptions(input, config);
  const evaluation = evaluateProfile(prepared, input.profile, config, input.glyphMetrics);
  const { report } = evaluation;

  const scriptResult = prepared.verbatim.scriptVsCaptions;
  const enforcing = config.qcMode === "strict" || config.qcMode === "broadcast";
  if (config.verbatimPolicy === "script" && enforcing && scriptResult?.status === "mismatch") {
    throw new VerbatimMismatchError(scriptResult, report);
  }
  if (config.strictLayout && !evaluation.safeArea.withinBounds) {
    throw new LayoutExceedsSafeAreaError(report);
  }

  return {
    ...evaluation,
    cues: prepared.cues,
    srt: cuesToSrt(prepared.cues),
    vtt: cuesToVtt(prepared.cues),
    ass: cuesToAss(prepared.cues, evaluation.style),
    verbatim: prepared.verbatim,
  };
};
