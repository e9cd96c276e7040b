/**
 * Core types for word frequency data.
 */

/**
 * A significant word and how often it appears in the analyzed text.
 */
export interface WordFrequency {
    word: string;
    count: number;
    /** Share of all kept words, 0-100. */
    percentage: number;
}

/**
 * A word prepared for display in a word cloud.
 * `index` is the word's rank in the displayed list and drives color cycling.
 */
export interface StyledWord extends WordFrequency {
    index: number;
    fontSize: number;
    /** Text opacity, 0-1. */
    opacity: number;
    /** CSS color string (hex in the default palette). */
    color: string;
}

/**
 * A styled word placed on the cloud surface.
 */
export interface Badge extends StyledWord {
    x: number;
    y: number;
    width: number;
    height: number;
    highlighted: boolean;
}

/**
 * Caption shown below the cloud for the highlighted word.
 */
export interface Caption {
    /** Quoted word, e.g. `"love"` */
    label: string;
    /** e.g. `15 occurrences (5.2%)` */
    detail: string;
}

/**
 * A composed word cloud: positioned badges plus the bounding size that encloses them.
 */
export interface WordCloud {
    width: number;
    height: number;
    badges: Badge[];
    caption?: Caption;
    /** Set when there were no words to display. */
    emptyMessage?: string;
}
