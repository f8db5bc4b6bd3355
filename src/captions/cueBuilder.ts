import { Cue, Segment, TimingSource, VerbatimPolicy, Word } from "../types/models";
import { MalformedTimingError } from "./errors";
import { fitsLayout, wrapCueLines } from "./lineWrap";
import { finalizeTokens, tokenize } from "./normalizer";
import { endsSentence, isDanglingTail } from "./textRules";

export interface CueBuildOptions {
  maxLines?: number;
  maxCharsPerLine?: number;
  maxCueDurationS?: number;
  minCueDurationS?: number;
  /** Defaults to the end of the last segment. */
  audioDuration?: number;
}

type ResolvedOptions = Required<Omit<CueBuildOptions, "audioDuration">>;

interface DraftCue {
  start: number;
  end: number;
  words: string[];
}

type Span = Pick<Segment, "start" | "end">;

interface PreparedSegment {
  source: TimingSource;
  tokens: string[];
}

export const END_EPSILON_S = 0.001;
const FLOAT_SLACK = 1e-9;

const DEFAULT_OPTIONS: ResolvedOptions = {
  maxLines: 2,
  maxCharsPerLine: 42,
  maxCueDurationS: 2.0,
  minCueDurationS: 0.6,
};

export const quantize = (seconds: number): number => Math.round(seconds * 1000) / 1000;

const isValidTime = (value: number): boolean => Number.isFinite(value) && value >= 0;

const validateTiming = (segments: readonly Segment[]): void => {
  segments.forEach((segment, index) => {
    if (!isValidTime(segment.start) || !isValidTime(segment.end)) {
      throw new MalformedTimingError(`Segment ${index} has a negative or non-finite timestamp`, index);
    }
    if (segment.end < segment.start) {
      throw new MalformedTimingError(`Segment ${index} ends before it starts`, index);
    }
    if (index > 0 && segment.start < segments[index - 1].start) {
      throw new MalformedTimingError(`Segment ${index} starts before segment ${index - 1}`, index);
    }

    segment.words?.forEach((word, wordIndex) => {
      if (!isValidTime(word.start) || !isValidTime(word.end) || word.end < word.start) {
        throw new MalformedTimingError(`Segment ${index} word ${wordIndex} has invalid timestamps`, index);
      }
      const previous = segment.words?.[wordIndex - 1];
      if (previous && word.start < previous.start) {
        throw new MalformedTimingError(`Segment ${index} words are not ordered by start time`, index);
      }
    });
  });
};

export const resolveTimingSource = (segment: Segment, segmentCount: number): TimingSource => {
  if (segment.words?.length) {
    return { kind: "word", segment, words: segment.words };
  }
  return segmentCount === 1 ? { kind: "none", segment } : { kind: "segment", segment };
};

const prepareSegments = (segments: readonly Segment[], policy: VerbatimPolicy): PreparedSegment[] => {
  const raw = segments.map((segment) => {
    const words = (segment.words ?? [])
      .map((word) => ({ ...word, text: word.text.trim() }))
      .filter((word) => word.text.length > 0);
    const tokens = words.length ? words.map((word) => word.text) : tokenize(segment.text);
    return { segment, words, tokens };
  });

  // Finalize runs over the whole stream so sentence boundaries cross segments.
  let finalized: Array<string | null> | null = null;
  if (policy === "audio") {
    finalized = finalizeTokens(raw.flatMap((entry) => entry.tokens));
  }

  let offset = 0;
  return raw.map(({ segment, words, tokens }) => {
    const mapped = tokens.map((token, index) => (finalized ? finalized[offset + index] : token));
    offset += tokens.length;

    const keptTokens = mapped.filter((token): token is string => token !== null);
    const keptWords: Word[] = [];
    words.forEach((word, index) => {
      const text = mapped[index];
      if (text !== null && text !== undefined) {
        keptWords.push({ ...word, text });
      }
    });

    const prepared: Segment = keptWords.length ? { ...segment, words: keptWords } : { ...segment, words: undefined };
    return { source: resolveTimingSource(prepared, segments.length), tokens: keptTokens };
  });
};

const buildWordCues = (words: readonly Word[], segment: Segment, options: ResolvedOptions): DraftCue[] => {
  const { maxLines, maxCharsPerLine, maxCueDurationS, minCueDurationS } = options;
  const drafts: DraftCue[] = [];
  let group: Word[] = [];

  const flush = (): void => {
    if (group.length) {
      drafts.push({
        start: group[0].start,
        end: group[group.length - 1].end,
        words: group.map((word) => word.text),
      });
    }
    group = [];
  };

  for (const word of words) {
    if (group.length) {
      const duration = word.end - group[0].start;
      const candidate = [...group.map((entry) => entry.text), word.text];
      const overLimit = duration > maxCueDurationS + FLOAT_SLACK;

      if (overLimit || !fitsLayout(candidate, maxLines, maxCharsPerLine)) {
        const tail = group[group.length - 1];
        const carryTail =
          group.length > 1 &&
          isDanglingTail(tail.text) &&
          word.end - tail.start <= maxCueDurationS + FLOAT_SLACK &&
          fitsLayout([tail.text, word.text], maxLines, maxCharsPerLine);

        if (carryTail) {
          group.pop();
          flush();
          group = [tail];
        } else {
          flush();
        }
      }
    }

    group.push(word);
    if (endsSentence(word.text) && word.end - group[0].start >= minCueDurationS) {
      flush();
    }
  }
  flush();

  const last = drafts[drafts.length - 1];
  if (last) {
    last.end = Math.max(last.end, Math.min(segment.end, last.start + maxCueDurationS));
  }
  return drafts;
};

/** Splits tokens into `count` non-empty groups of roughly equal character weight. */
export const balancedGroups = (tokens: readonly string[], count: number): string[][] => {
  const weights = tokens.map((token) => token.length + 1);
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  const groups: string[][] = [];
  let index = 0;
  let consumed = 0;

  for (let groupIndex = 0; groupIndex < count; groupIndex += 1) {
    const groupsAfter = count - groupIndex - 1;
    const boundary = (total * (groupIndex + 1)) / count;
    const group: string[] = [];

    while (index < tokens.length) {
      if (group.length) {
        const tokensAfter = tokens.length - index - 1;
        if (tokensAfter < groupsAfter || consumed + weights[index] / 2 > boundary) {
          break;
        }
      }
      group.push(tokens[index]);
      consumed += weights[index];
      index += 1;
    }
    groups.push(group);
  }

  return groups;
};

const allocateByLength = (groups: readonly string[][], span: Span): DraftCue[] => {
  const lengths = groups.map((group) => group.join(" ").length);
  const total = lengths.reduce((sum, length) => sum + length, 0);
  const duration = span.end - span.start;
  let cumulative = 0;

  return groups.map((group, index) => {
    const start = span.start + (duration * cumulative) / total;
    cumulative += lengths[index];
    const end = index === groups.length - 1 ? span.end : span.start + (duration * cumulative) / total;
    return { start, end, words: [...group] };
  });
};

const buildProportionalCues = (tokens: readonly string[], span: Span, options: ResolvedOptions): DraftCue[] => {
  const { maxLines, maxCharsPerLine, maxCueDurationS } = options;
  const duration = span.end - span.start;
  const minimum = Math.min(tokens.length, Math.max(1, Math.ceil(duration / maxCueDurationS - FLOAT_SLACK)));

  for (let count = minimum; count < tokens.length; count += 1) {
    const drafts = allocateByLength(balancedGroups(tokens, count), span);
    const acceptable = drafts.every(
      (draft) =>
        draft.words.length === 1 ||
        (fitsLayout(draft.words, maxLines, maxCharsPerLine) && draft.end - draft.start <= maxCueDurationS + FLOAT_SLACK),
    );
    if (acceptable) {
      return drafts;
    }
  }

  return allocateByLength(balancedGroups(tokens, tokens.length), span);
};

/** Re-splits a cue over its own span when merged words no longer fit the layout. */
const relayout = (draft: DraftCue, options: ResolvedOptions): DraftCue[] =>
  fitsLayout(draft.words, options.maxLines, options.maxCharsPerLine)
    ? [draft]
    : buildProportionalCues(draft.words, draft, options);

const mergeInto = (target: DraftCue, words: readonly string[], end: number, options: ResolvedOptions): DraftCue[] =>
  relayout({ start: target.start, end, words: [...target.words, ...words] }, options);

// Drafts with no time left after overlap resolution, including instantaneous
// segments, fold into the previous cue or lead into the next one.
const resolveOverlaps = (drafts: DraftCue[], options: ResolvedOptions): DraftCue[] => {
  const result: DraftCue[] = [];
  let leading: string[] = [];

  for (const draft of drafts) {
    const previous = result[result.length - 1];
    if (previous && draft.start < previous.end) {
      draft.start = previous.end;
    }

    if (draft.end - draft.start < END_EPSILON_S) {
      if (previous) {
        result.pop();
        result.push(...mergeInto(previous, draft.words, Math.max(previous.end, draft.end), options));
      } else {
        leading.push(...draft.words);
      }
      continue;
    }

    result.push(...relayout({ ...draft, words: [...leading, ...draft.words] }, options));
    leading = [];
  }

  if (leading.length) {
    const start = drafts[0].start;
    result.push(...relayout({ start, end: start + options.maxCueDurationS, words: leading }, options));
  }
  return result;
};

const clampToAudio = (drafts: DraftCue[], limit: number, options: ResolvedOptions): DraftCue[] => {
  const result: DraftCue[] = [];
  for (const draft of drafts) {
    if (draft.start >= limit - END_EPSILON_S) {
      const previous = result.pop();
      if (previous) {
        result.push(...mergeInto(previous, draft.words, limit, options));
      }
      continue;
    }
    draft.end = Math.min(draft.end, limit);
    result.push(draft);
  }
  return result;
};

const enforceDurations = (drafts: DraftCue[], limit: number, options: ResolvedOptions): void => {
  drafts.forEach((draft, index) => {
    if (draft.end - draft.start < options.minCueDurationS) {
      const ceiling = drafts[index + 1]?.start ?? limit;
      draft.end = Math.max(draft.end, Math.min(draft.start + options.minCueDurationS, ceiling));
    }
    draft.end = Math.min(draft.end, draft.start + options.maxCueDurationS);
  });
};

/**
 * Turns timed segments into display cues. Throws MalformedTimingError before
 * producing anything when timestamps are invalid.
 */
export const buildCues = (
  segments: readonly Segment[],
  policy: VerbatimPolicy,
  options: CueBuildOptions = {},
): Cue[] => {
  const resolved: ResolvedOptions = {
    maxLines: options.maxLines ?? DEFAULT_OPTIONS.maxLines,
    maxCharsPerLine: options.maxCharsPerLine ?? DEFAULT_OPTIONS.maxCharsPerLine,
    maxCueDurationS: options.maxCueDurationS ?? DEFAULT_OPTIONS.maxCueDurationS,
    minCueDurationS: options.minCueDurationS ?? DEFAULT_OPTIONS.minCueDurationS,
  };

  validateTiming(segments);
  if (options.audioDuration !== undefined && !(Number.isFinite(options.audioDuration) && options.audioDuration > 0)) {
    throw new MalformedTimingError("Audio duration must be a positive number");
  }
  if (!segments.length) {
    return [];
  }

  const audioEnd = options.audioDuration ?? segments[segments.length - 1].end;
  const limit = audioEnd - END_EPSILON_S;

  const drafts: DraftCue[] = [];
  for (const { source, tokens } of prepareSegments(segments, policy)) {
    const { segment } = source;
    if (!tokens.length) {
      continue;
    }
    if (segment.end <= segment.start) {
      drafts.push({ start: segment.start, end: segment.start, words: [...tokens] });
      continue;
    }
    switch (source.kind) {
      case "word":
        drafts.push(...buildWordCues(source.words, segment, resolved));
        break;
      case "segment":
      case "none":
        drafts.push(...buildProportionalCues(tokens, segment, resolved));
        break;
    }
  }

  const placed = clampToAudio(resolveOverlaps(drafts, resolved), limit, resolved);
  enforceDurations(placed, limit, resolved);

  return placed.map((draft, index) => {
    const start = quantize(draft.start);
    const end = Math.max(quantize(draft.end), start + END_EPSILON_S);
    return {
      index: index + 1,
      start,
      end: quantize(end),
      lines: wrapCueLines(draft.words, resolved.maxLines, resolved.maxCharsPerLine),
    };
  });
};

export const cueText = (cue: Cue): string => cue.lines.join(" ");
