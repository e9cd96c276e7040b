import { describe, it, expect, beforeAll } from 'vitest';
import { analyzeWordFrequencies, analyzeText, DEFAULT_TOP_N } from './word-frequency.js';
import { loadStopwordsFile } from '../io/stopwords-io.js';

const SAMPLE = 'The moon and the stars. Moon light, moon glow; stars!';

describe('analyzeWordFrequencies', () => {
  let stopwords: string[] = [];

  beforeAll(async () => {
    stopwords = await loadStopwordsFile();
  });

  it('counts significant words, most frequent first', () => {
    const result = analyzeWordFrequencies(SAMPLE, { stopwords });

    expect(result.map((w) => [w.word, w.count])).toEqual([
      ['moon', 3],
      ['stars', 2],
      ['light', 1],
      ['glow', 1],
    ]);
  });

  it('computes percentages against the kept words only', () => {
    const result = analyzeWordFrequencies(SAMPLE, { stopwords });

    // 7 words survive filtering: moon×3, stars×2, light, glow
    expect(result[0].percentage).toBeCloseTo((3 / 7) * 100, 10);
    expect(result[1].percentage).toBeCloseTo((2 / 7) * 100, 10);
    const sum = result.reduce((acc, w) => acc + w.percentage, 0);
    expect(sum).toBeCloseTo(100, 10);
  });

  it('drops words of two characters or fewer', () => {
    const result = analyzeWordFrequencies('ox ox ox go cat');
    expect(result).toEqual([{ word: 'cat', count: 1, percentage: 100 }]);
  });

  it('keeps accented letters and digits inside words', () => {
    const result = analyzeWordFrequencies('Café café naïve 2024 2024');
    expect(result.map((w) => [w.word, w.count])).toEqual([
      ['café', 2],
      ['2024', 2],
      ['naïve', 1],
    ]);
  });

  it('splits on punctuation and apostrophes', () => {
    const result = analyzeWordFrequencies("night's-end...night");
    expect(result.map((w) => w.word)).toEqual(['night', 'end']);
    expect(result[0].count).toBe(2);
  });

  it('ignores extra stopwords case-insensitively', () => {
    const result = analyzeWordFrequencies(SAMPLE, { stopwords: [...stopwords, 'MOON'] });
    expect(result.map((w) => w.word)).toEqual(['stars', 'light', 'glow']);
    expect(result[0].percentage).toBeCloseTo(50, 10);
  });

  it('truncates to topN', () => {
    expect(analyzeWordFrequencies(SAMPLE, { topN: 2, stopwords }).map((w) => w.word)).toEqual(['moon', 'stars']);
    expect(analyzeWordFrequencies(SAMPLE, { topN: 0, stopwords })).toEqual([]);
  });

  it('defaults topN to 50', () => {
    const text = Array.from({ length: 60 }, (_, i) => `word${String(i)}`).join(' ');
    expect(DEFAULT_TOP_N).toBe(50);
    expect(analyzeWordFrequencies(text)).toHaveLength(50);
  });

  it('returns an empty list for empty or stopword-only text', () => {
    expect(analyzeWordFrequencies('')).toEqual([]);
    expect(analyzeWordFrequencies('the and of with', { stopwords })).toEqual([]);
  });

  it('rejects a negative or fractional topN', () => {
    expect(() => analyzeWordFrequencies(SAMPLE, { topN: -1 })).toThrow(
      'Invalid argument: topN must be a non-negative integer, got -1.',
    );
    expect(() => analyzeWordFrequencies(SAMPLE, { topN: 1.5 })).toThrow('topN must be');
  });

  it('counts every word when no stopwords are given', () => {
    const result = analyzeWordFrequencies('the moon and the sea');
    expect(result.map((w) => [w.word, w.count])).toEqual([
      ['the', 2],
      ['moon', 1],
      ['and', 1],
      ['sea', 1],
    ]);
  });
});

describe('analyzeText', () => {
  it('reports the number of kept words as the total', async () => {
    const analysis = analyzeText(SAMPLE, { stopwords: await loadStopwordsFile(), topN: 1 });

    // moon×3, stars×2, light, glow survive; topN does not shrink the total
    expect(analysis.total).toBe(7);
    expect(analysis.words).toEqual([{ word: 'moon', count: 3, percentage: (3 / 7) * 100 }]);
  });

  it('reports a zero total for text without kept words', () => {
    expect(analyzeText('ox go')).toEqual({ words: [], total: 0 });
  });
});
