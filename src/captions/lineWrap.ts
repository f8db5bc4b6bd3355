import { isForbiddenEdgeWord } from "./textRules";

const EDGE_PENALTY = 8;

const greedyLines = (words: readonly string[], maxCharsPerLine: number): string[] => {
  const lines: string[] = [];
  let current = words[0];

  for (let index = 1; index < words.length; index += 1) {
    const candidate = `${current} ${words[index]}`;
    if (candidate.length <= maxCharsPerLine) {
      current = candidate;
    } else {
      lines.push(current);
      current = words[index];
    }
  }

  lines.push(current);
  return lines;
};

// Two lines of near-equal length, avoiding a break next to a function word.
const balancedTwoLines = (words: readonly string[], maxCharsPerLine: number): string[] | null => {
  let best: { lines: string[]; score: number } | null = null;

  for (let split = 1; split < words.length; split += 1) {
    const top = words.slice(0, split).join(" ");
    const bottom = words.slice(split).join(" ");
    if (top.length > maxCharsPerLine || bottom.length > maxCharsPerLine) {
      continue;
    }

    let score = Math.abs(top.length - bottom.length);
    if (isForbiddenEdgeWord(words[split - 1])) {
      score += EDGE_PENALTY;
    }
    if (isForbiddenEdgeWord(words[split])) {
      score += EDGE_PENALTY;
    }

    if (!best || score < best.score) {
      best = { lines: [top, bottom], score };
    }
  }

  return best ? best.lines : null;
};

/**
 * Splits a cue's words into display lines. Breaks only between words; a word
 * longer than the line budget stays whole on its own line.
 */
export const wrapCueLines = (words: readonly string[], maxLines: number, maxCharsPerLine: number): string[] => {
  if (!words.length) {
    return [];
  }

  const text = words.join(" ");
  if (text.length <= maxCharsPerLine || words.length === 1) {
    return [text];
  }

  if (maxLines === 2) {
    const balanced = balancedTwoLines(words, maxCharsPerLine);
    if (balanced) {
      return balanced;
    }
  }

  return greedyLines(words, maxCharsPerLine);
};

export const fitsLayout = (words: readonly string[], maxLines: number, maxCharsPerLine: number): boolean => {
  if (words.length <= 1) {
    return true;
  }
  const lines = wrapCueLines(words, maxLines, maxCharsPerLine);
  return lines.length <= maxLines && lines.every((line) => line.length <= maxCharsPerLine);
};
