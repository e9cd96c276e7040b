/**
 * Plain geometry types shared by the layout algorithms.
 *
 * All values are real numbers in the same unit (points when rendering SVG).
 */

/** Measured width and height of a laid-out item. Both must be non-negative. */
export interface Size {
    width: number;
    height: number;
}

/** Top-left corner of a placed item, relative to the container origin. */
export interface Point {
    x: number;
    y: number;
}

/**
 * Returns true if the value is a finite, non-negative number.
 */
export function isValidLength(value: number): boolean {
    return Number.isFinite(value) && value >= 0;
}
