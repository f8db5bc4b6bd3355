import { AsrConfusion, VerbatimPolicy, VerbatimReport, VerbatimResult } from "../types/models";
import { comparisonTokens } from "./normalizer";

export const checkVerbatim = (reference: readonly string[], candidate: readonly string[]): VerbatimResult => {
  const shorter = Math.min(reference.length, candidate.length);
  const lengthMismatch = reference.length !== candidate.length;
  const base = {
    referenceLength: reference.length,
    candidateLength: candidate.length,
    lengthMismatch,
  };

  for (let index = 0; index < shorter; index += 1) {
    if (reference[index].toLowerCase() !== candidate[index].toLowerCase()) {
      return {
        ...base,
        status: "mismatch",
        firstMismatchIndex: index,
        sample: { expected: reference[index], actual: candidate[index] },
      };
    }
  }

  if (lengthMismatch) {
    return {
      ...base,
      status: "mismatch",
      firstMismatchIndex: shorter,
      sample: {
        expected: reference[shorter] ?? null,
        actual: candidate[shorter] ?? null,
      },
    };
  }

  return { ...base, status: "pass" };
};

export const compareTexts = (reference: string, candidate: string): VerbatimResult =>
  checkVerbatim(comparisonTokens(reference), comparisonTokens(candidate));

const containsPhrase = (haystack: string, phrase: string): boolean => {
  const escaped = phrase.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(^|[^\\p{L}\\p{N}])${escaped}($|[^\\p{L}\\p{N}])`, "u").test(haystack.toLowerCase());
};

/** Known mis-hearings present in the transcript where the script has the intended wording. */
export const findAsrConfusions = (
  scriptText: string,
  asrText: string,
  table: readonly AsrConfusion[],
): AsrConfusion[] =>
  table.filter(
    (entry) =>
      containsPhrase(asrText, entry.heard) &&
      containsPhrase(scriptText, entry.intended) &&
      !containsPhrase(asrText, entry.intended),
  );

export interface VerbatimStreams {
  script?: string;
  asr?: string;
  captions: string;
}

export const buildVerbatimReport = (
  policy: VerbatimPolicy,
  streams: VerbatimStreams,
  confusionTable: readonly AsrConfusion[],
): VerbatimReport => {
  const { script, asr, captions } = streams;
  const hasScript = typeof script === "string" && script.trim().length > 0;
  const hasAsr = typeof asr === "string" && asr.trim().length > 0;

  return {
    policy,
    scriptVsCaptions: hasScript ? compareTexts(script, captions) : null,
    scriptVsAsr: hasScript && hasAsr ? compareTexts(script, asr) : null,
    asrVsCaptions: hasAsr ? compareTexts(asr, captions) : null,
    asrConfusions: hasScript && hasAsr ? findAsrConfusions(script, asr, confusionTable) : [],
  };
};
