import { type Size } from '../types/geometry.js';

/** Padding between a badge's edge and its text. */
export const BADGE_PADDING_X = 6;
export const BADGE_PADDING_Y = 2;

export interface BadgeMetrics {
  /** Average glyph advance as a fraction of the font size (default 0.55). */
  charWidthRatio?: number;
  /** Line box height as a fraction of the font size (default 1.2). */
  lineHeightRatio?: number;
}

export const DEFAULT_CHAR_WIDTH_RATIO = 0.55;
export const DEFAULT_LINE_HEIGHT_RATIO = 1.2;

/**
 * Estimates the size of a word badge from an average glyph width.
 *
 * There are no font metrics on the server, so this is an approximation good
 * enough for layout. Callers with real measurements should pass them to
 * `arrangeFlow` directly.
 */
export function measureBadge(word: string, fontSize: number, metrics: BadgeMetrics = {}): Size {
  const charWidth = fontSize * (metrics.charWidthRatio ?? DEFAULT_CHAR_WIDTH_RATIO);
  const lineHeight = fontSize * (metrics.lineHeightRatio ?? DEFAULT_LINE_HEIGHT_RATIO);
  const glyphs = Array.from(word).length;

  return {
    width: glyphs * charWidth + BADGE_PADDING_X * 2,
    height: lineHeight + BADGE_PADDING_Y * 2,
  };
}
