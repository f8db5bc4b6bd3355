import { VerbatimPolicy } from "../types/models";
import { endsSentence, isFiller } from "./textRules";

export type NormalizeMode = "verbatim" | "finalize";

export const tokenize = (text: string): string[] => text.split(/\s+/).filter(Boolean);

/** Case-insensitive keys used by the verbatim checker. */
export const comparisonTokens = (text: string): string[] => tokenize(text).map((token) => token.toLowerCase());

const capitalize = (token: string): string => token.replace(/\p{L}/u, (letter) => letter.toUpperCase());

const withTerminalPunctuation = (token: string): string => {
  if (endsSentence(token)) {
    return token;
  }
  return `${token.replace(/[,;:]+$/, "")}.`;
};

/**
 * Token-level finalize pass. Removed fillers come back as `null` so callers
 * holding parallel timing data keep their positions.
 */
export const finalizeTokens = (tokens: readonly string[]): Array<string | null> => {
  const result: Array<string | null> = [];
  let sentenceStart = true;
  let lastKept = -1;

  tokens.forEach((token) => {
    if (isFiller(token)) {
      result.push(null);
      return;
    }
    result.push(sentenceStart ? capitalize(token) : token);
    sentenceStart = endsSentence(token);
    lastKept = result.length - 1;
  });

  const last = result[lastKept];
  if (lastKept >= 0 && typeof last === "string") {
    result[lastKept] = withTerminalPunctuation(last);
  }
  return result;
};

export const normalize = (text: string, mode: NormalizeMode, policy?: VerbatimPolicy): string => {
  const tokens = tokenize(text);
  if (mode === "verbatim" || policy === "script") {
    return tokens.join(" ");
  }
  return finalizeTokens(tokens)
    .filter((token): token is string => token !== null)
    .join(" ");
};
