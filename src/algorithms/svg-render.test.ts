import { describe, it, expect } from 'vitest';
import { renderWordCloudSvg, escapeXml, fmt } from './svg-render.js';
import { type Badge, type WordCloud } from '../types/word.js';

function badge(overrides: Partial<Badge> & Pick<Badge, 'word' | 'x' | 'y'>): Badge {
  return {
    count: 1,
    percentage: 10,
    index: 0,
    fontSize: 20,
    opacity: 1,
    color: '#007AFF',
    width: 52,
    height: 24,
    highlighted: false,
    ...overrides,
  };
}

describe('fmt', () => {
  it('rounds to at most two decimals', () => {
    expect(fmt(1 / 3)).toBe('0.33');
    expect(fmt(12)).toBe('12');
    expect(fmt(-42)).toBe('-42');
    expect(fmt(0.6000000001)).toBe('0.6');
  });
});

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml(`<b>&"it's"`)).toBe('&lt;b&gt;&amp;&quot;it&apos;s&quot;');
  });
});

describe('renderWordCloudSvg', () => {
  const cloud: WordCloud = {
    width: 122,
    height: 56,
    badges: [
      badge({ word: 'moon', x: 0, y: 0 }),
      badge({ word: 'glow', x: 0, y: 32, index: 1, opacity: 0.6, color: '#AF52DE', highlighted: true }),
    ],
    caption: { label: '"glow"', detail: '1 occurrences (16.7%)' },
  };

  it('sizes the card around header, badges and caption', () => {
    const lines = renderWordCloudSvg(cloud).split('\n');

    expect(lines[0]).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="232" height="160" viewBox="0 0 232 160" font-family="ui-rounded, system-ui, sans-serif">',
    );
    expect(lines[1]).toBe('<rect width="232" height="160" rx="12" fill="#FFFFFF"/>');
    expect(lines[2]).toBe(
      '<text x="16" y="28" dominant-baseline="central" font-size="15" font-weight="600" fill="currentColor">Word Frequency</text>',
    );
    expect(lines[lines.length - 1]).toBe('</svg>');
  });

  it('draws each badge offset by the padding and header', () => {
    const lines = renderWordCloudSvg(cloud).split('\n');

    expect(lines.slice(3, 6)).toEqual([
      '<g>',
      '<rect x="16" y="56" width="52" height="24" rx="4" fill="#007AFF" fill-opacity="0.1"/>',
      '<text x="42" y="68" text-anchor="middle" dominant-baseline="central" font-size="20" font-weight="500" fill="#007AFF" fill-opacity="1">moon</text>',
    ]);
  });

  it('scales a highlighted badge around its centre and darkens its fill', () => {
    const lines = renderWordCloudSvg(cloud).split('\n');

    expect(lines.slice(7, 10)).toEqual([
      '<g transform="translate(42 100) scale(1.1) translate(-42 -100)">',
      '<rect x="16" y="88" width="52" height="24" rx="4" fill="#AF52DE" fill-opacity="0.2"/>',
      '<text x="42" y="100" text-anchor="middle" dominant-baseline="central" font-size="20" font-weight="500" fill="#AF52DE" fill-opacity="0.6">glow</text>',
    ]);
  });

  it('writes the caption below the badges', () => {
    const lines = renderWordCloudSvg(cloud).split('\n');

    expect(lines.slice(11, 13)).toEqual([
      '<text x="16" y="136" dominant-baseline="central" font-size="11" font-weight="500" fill="currentColor">&quot;glow&quot;</text>',
      '<text x="216" y="136" text-anchor="end" dominant-baseline="central" font-size="11" fill="#8E8E93">1 occurrences (16.7%)</text>',
    ]);
  });

  it('renders the empty message in place of badges', () => {
    const svg = renderWordCloudSvg({ width: 0, height: 0, badges: [], emptyMessage: 'No significant words found' });
    const lines = svg.split('\n');

    expect(lines[0]).toContain('width="232" height="164"');
    expect(lines[3]).toBe(
      '<text x="116" y="98" text-anchor="middle" dominant-baseline="central" font-size="13" font-style="italic" fill="#8E8E93">No significant words found</text>',
    );
  });

  it('honours a custom title and padding, escaping the title', () => {
    const lines = renderWordCloudSvg(cloud, { title: 'Act <I>', padding: 0 }).split('\n');

    expect(lines[0]).toContain('width="200" height="128"');
    expect(lines[2]).toBe(
      '<text x="0" y="12" dominant-baseline="central" font-size="15" font-weight="600" fill="currentColor">Act &lt;I&gt;</text>',
    );
  });

  it('escapes words in badge text', () => {
    const svg = renderWordCloudSvg({ width: 52, height: 24, badges: [badge({ word: 'a&b', x: 0, y: 0 })] });
    expect(svg).toContain('>a&amp;b</text>');
  });
});
