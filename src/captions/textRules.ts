// Words a caption line should neither start nor end on.
export const FORBIDDEN_TOKENS: ReadonlySet<string> = new Set([
  "and",
  "but",
  "or",
  "so",
  "to",
  "of",
  "for",
  "from",
  "with",
  "in",
  "on",
  "at",
  "by",
  "as",
  "the",
  "a",
  "an",
]);

export const DANGLING_TAIL_WORDS: ReadonlySet<string> = new Set([
  ...FORBIDDEN_TOKENS,
  "because",
  "if",
  "than",
  "that",
  "when",
  "while",
]);

export const FILLER_TOKENS: ReadonlySet<string> = new Set(["um", "umm", "uh", "uhh", "erm", "er", "ah", "hmm", "mm"]);

const TERMINAL_PUNCTUATION = /[.!?]["')\]]*$/;
const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;
const BRACKETED_NON_SPEECH = /^[[(][^\])]*[\])]$/;
const BRACKET_ONLY_TEXT = /^\W*[[(].*[\])]\W*$/;
const METADATA_WORDS = /\b(anchor|asterisk|narrator|speaker|sfx|music)\b/i;

/** Lower-cased word with surrounding punctuation removed. */
export const bareWord = (token: string): string => token.replace(EDGE_PUNCTUATION, "").toLowerCase();

export const endsSentence = (token: string): boolean => TERMINAL_PUNCTUATION.test(token);

export const isForbiddenEdgeWord = (token: string): boolean => FORBIDDEN_TOKENS.has(bareWord(token));

export const isDanglingTail = (token: string): boolean => {
  if (endsSentence(token) || /[,;:]$/.test(token)) {
    return false;
  }
  return DANGLING_TAIL_WORDS.has(bareWord(token));
};

export const isFiller = (token: string): boolean => {
  if (BRACKETED_NON_SPEECH.test(token)) {
    return true;
  }
  // "Um," still counts; "um." ending a sentence is kept so punctuation survives.
  if (endsSentence(token)) {
    return false;
  }
  return FILLER_TOKENS.has(bareWord(token));
};

export const firstLetter = (text: string): string | undefined => text.match(/\p{L}/u)?.[0];

export const startsLowercase = (text: string): boolean => {
  const letter = firstLetter(text);
  return letter !== undefined && letter !== letter.toUpperCase() && letter === letter.toLowerCase();
};

/** Cue text that is nothing but a bracketed annotation, e.g. "[music]". */
export const isBracketOnly = (text: string): boolean => BRACKET_ONLY_TEXT.test(text.trim());

/** Production labels that leaked into spoken text. */
export const hasMetadataToken = (text: string): boolean => METADATA_WORDS.test(text);

export const containsTerm = (text: string, term: string): boolean => text.toLowerCase().includes(term.toLowerCase());
