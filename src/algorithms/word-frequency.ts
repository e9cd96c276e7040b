import { type WordFrequency } from '../types/word.js';
import * as errors from '../errors.js';

export const DEFAULT_TOP_N = 50;

/** Tokens this short or shorter are never counted. */
const MIN_WORD_LENGTH = 3;

// Anything that is not a letter, combining mark or digit separates words.
const WORD_SEPARATOR = /[^\p{L}\p{M}\p{N}]+/u;

export interface FrequencyOptions {
  /** Maximum number of words returned (default 50). */
  topN?: number;
  /** Words never counted. Case-insensitive. */
  stopwords?: Iterable<string>;
}

export interface FrequencyAnalysis {
  words: WordFrequency[];
  /** Number of kept words, the denominator of every percentage. */
  total: number;
}

/**
 * Counts the significant words in a text, along with how many words were kept.
 *
 * Words are lower-cased, must be longer than two characters and must not be
 * stopwords. Results are sorted by count, most frequent first; words with equal
 * counts keep the order in which they first appear.
 *
 * @param text Raw prose.
 * @returns Up to `topN` words with their counts and share of all kept words.
 */
export function analyzeText(text: string, options: FrequencyOptions = {}): FrequencyAnalysis {
  const topN = options.topN ?? DEFAULT_TOP_N;
  if (!Number.isInteger(topN) || topN < 0) {
    throw new Error(errors.invalidArgument(`topN must be a non-negative integer, got ${String(topN)}.`).content[0].text);
  }

  const ignored = new Set<string>();
  for (const word of options.stopwords ?? []) {
    ignored.add(word.toLowerCase());
  }

  const words = text
    .toLowerCase()
    .split(WORD_SEPARATOR)
    .filter((w) => Array.from(w).length >= MIN_WORD_LENGTH && !ignored.has(w));

  // Map preserves first-occurrence order, and Array.prototype.sort is stable
  const counts = new Map<string, number>();
  for (const word of words) {
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  const total = words.length;
  const ranked = [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, topN)
    .map(([word, count]) => ({
      word,
      count,
      percentage: total > 0 ? (count / total) * 100 : 0,
    }));
  return { words: ranked, total };
}

/**
 * The ranked words of `analyzeText`, without the total.
 */
export function analyzeWordFrequencies(text: string, options: FrequencyOptions = {}): WordFrequency[] {
  return analyzeText(text, options).words;
}
