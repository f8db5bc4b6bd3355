import { Segment } from "../types/models";
import { normalize, tokenize } from "./normalizer";

/** Script-only input: one untimed segment covering the whole narration. */
export const scriptSegment = (script: string, duration: number): Segment => ({
  start: 0,
  end: duration,
  text: normalize(script, "verbatim"),
});

const segmentTokenCount = (segment: Segment): number =>
  segment.words?.length ? segment.words.length : tokenize(segment.text).length;

/**
 * Replaces transcript wording with the authored script while keeping the
 * transcript's timing. Word-for-word when the token counts line up, otherwise
 * proportional to each segment's share of transcript tokens.
 */
export const projectScriptOntoSegments = (script: string, segments: readonly Segment[]): Segment[] => {
  const scriptTokens = tokenize(script);
  const counts = segments.map(segmentTokenCount);
  const totalCount = counts.reduce((sum, count) => sum + count, 0);
  const everyWordTimed = segments.every((segment) => segment.words?.length || !segment.text.trim());

  if (everyWordTimed && totalCount === scriptTokens.length) {
    let cursor = 0;
    return segments.map((segment) => {
      const words = (segment.words ?? []).map((word) => {
        const text = scriptTokens[cursor];
        cursor += 1;
        return { ...word, text };
      });
      return { ...segment, text: words.map((word) => word.text).join(" "), words };
    });
  }

  if (totalCount === 0) {
    const first = segments[0];
    const last = segments[segments.length - 1];
    return first && last ? [{ start: first.start, end: last.end, text: scriptTokens.join(" ") }] : [];
  }

  let cursor = 0;
  let cumulative = 0;
  return segments.map((segment, index) => {
    cumulative += counts[index];
    const until = index === segments.length - 1 ? scriptTokens.length : Math.round((scriptTokens.length * cumulative) / totalCount);
    const text = scriptTokens.slice(cursor, until).join(" ");
    cursor = until;
    return { start: segment.start, end: segment.end, text };
  });
};
