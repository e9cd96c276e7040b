import { type Badge, type WordCloud } from '../types/word.js';

export interface SvgOptions {
  /** Header text (default "Word Frequency"). */
  title?: string;
  /** Card padding on every side (default 16). */
  padding?: number;
}

const HEADER_HEIGHT = 24;
const SECTION_GAP = 8;
const CLOUD_PADDING_Y = 8;
const CAPTION_HEIGHT = 16;
const EMPTY_HEIGHT = 100;
const MIN_CONTENT_WIDTH = 200;
const BADGE_RADIUS = 4;
const CARD_RADIUS = 12;
const HIGHLIGHT_SCALE = 1.1;
const FONT_FAMILY = 'ui-rounded, system-ui, sans-serif';
const SECONDARY_COLOR = '#8E8E93';

/**
 * Formats a coordinate with at most two decimals.
 */
export function fmt(n: number): string {
  return String(Math.round(n * 100) / 100);
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function renderBadge(badge: Badge, originX: number, originY: number): string {
  const x = originX + badge.x;
  const y = originY + badge.y;
  const cx = x + badge.width / 2;
  const cy = y + badge.height / 2;
  // Highlighted badges grow around their centre without moving neighbours
  const transform = badge.highlighted
    ? ` transform="translate(${fmt(cx)} ${fmt(cy)}) scale(${String(HIGHLIGHT_SCALE)}) translate(${fmt(-cx)} ${fmt(-cy)})"`
    : '';

  return [
    `<g${transform}>`,
    `<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(badge.width)}" height="${fmt(badge.height)}" rx="${String(BADGE_RADIUS)}" fill="${escapeXml(badge.color)}" fill-opacity="${badge.highlighted ? '0.2' : '0.1'}"/>`,
    `<text x="${fmt(cx)}" y="${fmt(cy)}" text-anchor="middle" dominant-baseline="central" font-size="${fmt(badge.fontSize)}" font-weight="500" fill="${escapeXml(badge.color)}" fill-opacity="${fmt(badge.opacity)}">${escapeXml(badge.word)}</text>`,
    '</g>',
  ].join('\n');
}

/**
 * Paints a composed word cloud onto an SVG card: header, badges, and the
 * caption of the highlighted word.
 *
 * @returns A standalone SVG document, one element per line.
 */
export function renderWordCloudSvg(cloud: WordCloud, options: SvgOptions = {}): string {
  const padding = options.padding ?? 16;
  const title = options.title ?? 'Word Frequency';
  const contentWidth = Math.max(cloud.width, MIN_CONTENT_WIDTH);
  const body: string[] = [];

  let y = padding;
  body.push(
    `<text x="${fmt(padding)}" y="${fmt(y + HEADER_HEIGHT / 2)}" dominant-baseline="central" font-size="15" font-weight="600" fill="currentColor">${escapeXml(title)}</text>`,
  );
  y += HEADER_HEIGHT + SECTION_GAP;

  if (cloud.emptyMessage !== undefined) {
    body.push(
      `<text x="${fmt(padding + contentWidth / 2)}" y="${fmt(y + EMPTY_HEIGHT / 2)}" text-anchor="middle" dominant-baseline="central" font-size="13" font-style="italic" fill="${SECONDARY_COLOR}">${escapeXml(cloud.emptyMessage)}</text>`,
    );
    y += EMPTY_HEIGHT;
  } else {
    y += CLOUD_PADDING_Y;
    for (const badge of cloud.badges) {
      body.push(renderBadge(badge, padding, y));
    }
    y += cloud.height + CLOUD_PADDING_Y;
  }

  if (cloud.caption) {
    y += SECTION_GAP;
    const baseline = y + CAPTION_HEIGHT / 2;
    body.push(
      `<text x="${fmt(padding)}" y="${fmt(baseline)}" dominant-baseline="central" font-size="11" font-weight="500" fill="currentColor">${escapeXml(cloud.caption.label)}</text>`,
      `<text x="${fmt(padding + contentWidth)}" y="${fmt(baseline)}" text-anchor="end" dominant-baseline="central" font-size="11" fill="${SECONDARY_COLOR}">${escapeXml(cloud.caption.detail)}</text>`,
    );
    y += CAPTION_HEIGHT;
  }

  const width = contentWidth + padding * 2;
  const height = y + padding;

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(width)}" height="${fmt(height)}" viewBox="0 0 ${fmt(width)} ${fmt(height)}" font-family="${FONT_FAMILY}">`,
    `<rect width="${fmt(width)}" height="${fmt(height)}" rx="${String(CARD_RADIUS)}" fill="#FFFFFF"/>`,
    ...body,
    '</svg>',
  ].join('\n');
}
