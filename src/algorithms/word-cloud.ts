import { type WordFrequency, type StyledWord, type Badge, type Caption, type WordCloud } from '../types/word.js';
import { arrangeFlow, type FlowOptions } from './flow-arrange.js';
import { measureBadge, type BadgeMetrics } from './badge-measure.js';
import * as errors from '../errors.js';

export const DEFAULT_MAX_WORDS = 40;
export const DEFAULT_MIN_FONT_SIZE = 12;
export const DEFAULT_MAX_FONT_SIZE = 40;
export const DEFAULT_MIN_OPACITY = 0.6;
export const DEFAULT_MAX_OPACITY = 1.0;

export const EMPTY_CLOUD_MESSAGE = 'No significant words found';

/**
 * Blue, purple, pink, orange, green, teal, indigo, cyan, mint, red.
 */
export const DEFAULT_PALETTE: readonly string[] = [
  '#007AFF',
  '#AF52DE',
  '#FF2D55',
  '#FF9500',
  '#34C759',
  '#30B0C7',
  '#5856D6',
  '#32ADE6',
  '#00C7BE',
  '#FF3B30',
];

export interface StyleOptions {
  /** Number of words shown (default 40). */
  maxWords?: number;
  minFontSize?: number;
  maxFontSize?: number;
  minOpacity?: number;
  maxOpacity?: number;
  /** Colors cycled by display rank. */
  palette?: readonly string[];
}

export interface ComposeOptions extends StyleOptions, FlowOptions {
  metrics?: BadgeMetrics;
  /** Word to highlight and describe in the caption. */
  highlight?: string;
}

function fail(message: string): never {
  throw new Error(errors.invalidArgument(message).content[0].text);
}

/**
 * Styles the leading words of a frequency list for display.
 *
 * Font size and opacity scale linearly between their bounds. The top of the
 * scale is the most frequent word of the whole list and the bottom is the least
 * frequent displayed word, so a truncated tail does not stretch the scale.
 * When every displayed word has the same count, all sit mid-scale.
 *
 * @param frequencies Words sorted most frequent first.
 */
export function styleWordCloud(frequencies: readonly WordFrequency[], options: StyleOptions = {}): StyledWord[] {
  const maxWords = options.maxWords ?? DEFAULT_MAX_WORDS;
  const minFont = options.minFontSize ?? DEFAULT_MIN_FONT_SIZE;
  const maxFont = options.maxFontSize ?? DEFAULT_MAX_FONT_SIZE;
  const minOpacity = options.minOpacity ?? DEFAULT_MIN_OPACITY;
  const maxOpacity = options.maxOpacity ?? DEFAULT_MAX_OPACITY;
  const palette = options.palette ?? DEFAULT_PALETTE;

  if (!Number.isInteger(maxWords) || maxWords < 0) {
    fail(`maxWords must be a non-negative integer, got ${String(maxWords)}.`);
  }
  if (palette.length === 0) {
    fail('palette must contain at least one color.');
  }

  const displayed = frequencies.slice(0, maxWords);
  if (displayed.length === 0) return [];

  const maxCount = frequencies[0].count;
  const minCount = displayed[displayed.length - 1].count;
  const range = maxCount - minCount;

  return displayed.map((freq, index) => {
    const normalized = range > 0 ? (freq.count - minCount) / range : 0.5;
    return {
      word: freq.word,
      count: freq.count,
      percentage: freq.percentage,
      index,
      fontSize: minFont + normalized * (maxFont - minFont),
      opacity: minOpacity + normalized * (maxOpacity - minOpacity),
      color: palette[index % palette.length],
    };
  });
}

/**
 * Caption text for a word, e.g. `"love"` / `15 occurrences (5.2%)`.
 */
export function describeWord(freq: WordFrequency): Caption {
  return {
    label: `"${freq.word}"`,
    detail: `${String(freq.count)} occurrences (${freq.percentage.toFixed(1)}%)`,
  };
}

/**
 * Styles, measures and flow-arranges a frequency list into a word cloud.
 */
export function composeWordCloud(frequencies: readonly WordFrequency[], options: ComposeOptions = {}): WordCloud {
  const styled = styleWordCloud(frequencies, options);
  const sizes = styled.map((w) => measureBadge(w.word, w.fontSize, options.metrics));
  const arrangement = arrangeFlow(sizes, { maxWidth: options.maxWidth, spacing: options.spacing });

  const highlight = options.highlight?.toLowerCase();
  const badges: Badge[] = styled.map((w, i) => ({
    ...w,
    x: arrangement.positions[i].x,
    y: arrangement.positions[i].y,
    width: sizes[i].width,
    height: sizes[i].height,
    highlighted: w.word === highlight,
  }));

  const cloud: WordCloud = {
    width: arrangement.width,
    height: arrangement.height,
    badges,
  };

  // Words past maxWords can still be described, they just have no badge
  const described = highlight === undefined ? undefined : frequencies.find((f) => f.word === highlight);
  if (described) {
    cloud.caption = describeWord(described);
  }
  if (frequencies.length === 0) {
    cloud.emptyMessage = EMPTY_CLOUD_MESSAGE;
  }
  return cloud;
}
