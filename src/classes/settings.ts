import { type SettingsConfig } from '../types/settings.js';
import { type FrequencyOptions, DEFAULT_TOP_N } from '../algorithms/word-frequency.js';
import {
    type ComposeOptions,
    DEFAULT_MAX_WORDS,
    DEFAULT_MIN_FONT_SIZE,
    DEFAULT_MAX_FONT_SIZE,
    DEFAULT_MIN_OPACITY,
    DEFAULT_MAX_OPACITY,
    DEFAULT_PALETTE,
} from '../algorithms/word-cloud.js';
import { DEFAULT_SPACING } from '../algorithms/flow-arrange.js';
import { DEFAULT_CHAR_WIDTH_RATIO, DEFAULT_LINE_HEIGHT_RATIO } from '../algorithms/badge-measure.js';

/**
 * Read-only server settings: the values of a wordcloud.json file merged over
 * the built-in defaults. Tool handlers receive an instance explicitly and
 * layer per-call arguments on top via the option builders.
 */
export class SettingsClass {
    /** Path the settings were loaded from, or null for built-in defaults. */
    public readonly path: string | null;

    private readonly _data: SettingsConfig;

    /** The built-in stopword list, loaded by the caller. */
    private readonly _builtinStopwords: readonly string[];

    private constructor(filePath: string | null, data: SettingsConfig, builtinStopwords: readonly string[]) {
        this.path = filePath;
        this._data = structuredClone(data);
        this._builtinStopwords = [...builtinStopwords];
    }

    /**
     * Settings with every value at its default.
     */
    static defaults(builtinStopwords: readonly string[] = []): SettingsClass {
        return new SettingsClass(null, {}, builtinStopwords);
    }

    /**
     * Wraps validated settings data loaded from `filePath`.
     */
    static fromJSON(filePath: string | null, data: SettingsConfig, builtinStopwords: readonly string[] = []): SettingsClass {
        return new SettingsClass(filePath, data, builtinStopwords);
    }

    get maxWords(): number {
        return this._data.max_words ?? DEFAULT_MAX_WORDS;
    }

    get topN(): number {
        return this._data.top_n ?? DEFAULT_TOP_N;
    }

    get spacing(): number {
        return this._data.spacing ?? DEFAULT_SPACING;
    }

    /** Undefined means clouds are laid out on a single unbounded line. */
    get maxWidth(): number | undefined {
        return this._data.max_width;
    }

    get palette(): string[] {
        return [...(this._data.palette ?? DEFAULT_PALETTE)];
    }

    get extraStopwords(): string[] {
        return [...(this._data.extra_stopwords ?? [])];
    }

    /** Built-in stopwords followed by the extra ones. */
    get stopwords(): string[] {
        return [...this._builtinStopwords, ...this.extraStopwords];
    }

    /**
     * Options for `analyzeWordFrequencies`, with an optional per-call topN.
     */
    frequencyOptions(topN?: number): FrequencyOptions {
        return {
            topN: topN ?? this.topN,
            stopwords: this.stopwords,
        };
    }

    /**
     * Options for `composeWordCloud`. Per-call overrides win over settings.
     */
    cloudOptions(overrides: Pick<ComposeOptions, 'maxWords' | 'maxWidth' | 'spacing' | 'highlight'> = {}): ComposeOptions {
        const font = this._data.font ?? {};
        const opacity = this._data.opacity ?? {};
        return {
            maxWords: overrides.maxWords ?? this.maxWords,
            maxWidth: overrides.maxWidth ?? this.maxWidth,
            spacing: overrides.spacing ?? this.spacing,
            highlight: overrides.highlight,
            minFontSize: font.min_size ?? DEFAULT_MIN_FONT_SIZE,
            maxFontSize: font.max_size ?? DEFAULT_MAX_FONT_SIZE,
            minOpacity: opacity.min ?? DEFAULT_MIN_OPACITY,
            maxOpacity: opacity.max ?? DEFAULT_MAX_OPACITY,
            palette: this.palette,
            metrics: {
                charWidthRatio: font.char_width_ratio ?? DEFAULT_CHAR_WIDTH_RATIO,
                lineHeightRatio: font.line_height_ratio ?? DEFAULT_LINE_HEIGHT_RATIO,
            },
        };
    }

    /**
     * Returns a summary of the effective settings.
     */
    info() {
        return {
            path: this.path,
            ...this.cloudOptions(),
            topN: this.topN,
            extraStopwords: this.extraStopwords,
        };
    }
}
