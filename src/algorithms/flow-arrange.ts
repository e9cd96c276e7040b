import { type Point, type Size, isValidLength } from '../types/geometry.js';
import * as errors from '../errors.js';

export const DEFAULT_SPACING = 8;

export interface FlowOptions {
  /** Wrap width. Omitted or `Infinity` means a single unbounded line. */
  maxWidth?: number;
  /** Gap between items on a line and between lines (default 8). */
  spacing?: number;
}

export interface Arrangement {
  /** Right-most edge reached by any item. */
  width: number;
  /** Bottom of the last line. */
  height: number;
  /** One position per input item, in input order. */
  positions: Point[];
  /** Copies of the input sizes, in input order. */
  sizes: Size[];
}

function fail(message: string): never {
  throw new Error(errors.invalidArgument(message).content[0].text);
}

function validate(items: readonly Size[], maxWidth: number, spacing: number): void {
  if (Number.isNaN(maxWidth) || maxWidth < 0) {
    fail(`maxWidth must be a non-negative number, got ${String(maxWidth)}.`);
  }
  if (!isValidLength(spacing)) {
    fail(`spacing must be a finite non-negative number, got ${String(spacing)}.`);
  }
  items.forEach((item, i) => {
    if (!isValidLength(item.width) || !isValidLength(item.height)) {
      fail(`item ${String(i)} has invalid size ${String(item.width)}×${String(item.height)}; sizes must be finite and non-negative.`);
    }
  });
}

/**
 * Arranges items left to right, wrapping onto a new line when the next item
 * would overflow `maxWidth`.
 *
 * The first item of a line is always placed, even when it is wider than
 * `maxWidth`, so oversized items get a line of their own instead of being
 * dropped. Line height is the tallest item on that line.
 *
 * @param items Measured item sizes in display order.
 * @returns Positions in input order and the bounding size of all placed items.
 */
export function arrangeFlow(items: readonly Size[], options: FlowOptions = {}): Arrangement {
  const maxWidth = options.maxWidth ?? Number.POSITIVE_INFINITY;
  const spacing = options.spacing ?? DEFAULT_SPACING;
  validate(items, maxWidth, spacing);

  const positions: Point[] = [];
  const sizes: Size[] = [];

  let cursorX = 0;
  let cursorY = 0;
  let lineHeight = 0; // Tallest item on the current line
  let maxRight = 0;

  for (const item of items) {
    sizes.push({ width: item.width, height: item.height });

    if (cursorX + item.width > maxWidth && cursorX > 0) {
      cursorX = 0;
      cursorY += lineHeight + spacing;
      lineHeight = 0;
    }

    positions.push({ x: cursorX, y: cursorY });

    cursorX += item.width + spacing;
    lineHeight = Math.max(lineHeight, item.height);
    // cursorX already includes the trailing gap
    maxRight = Math.max(maxRight, cursorX - spacing);
  }

  return {
    width: maxRight,
    height: cursorY + lineHeight,
    positions,
    sizes,
  };
}
