/**
 * Core types for the wordcloud.json settings file.
 *
 * Every field is optional; missing values fall back to the built-in defaults
 * in SettingsClass. Tool arguments override these per call.
 */

export interface FontSettings {
    /** Font size of the least frequent displayed word */
    min_size?: number;
    /** Font size of the most frequent word */
    max_size?: number;
    /** Average glyph advance as a fraction of the font size */
    char_width_ratio?: number;
    /** Line box height as a fraction of the font size */
    line_height_ratio?: number;
}

export interface OpacitySettings {
    min?: number;
    max?: number;
}

/**
 * The complete structure of the wordcloud.json file.
 */
export interface SettingsConfig {
    /** Maximum number of words shown in a cloud */
    max_words?: number;
    /** Maximum number of words returned by frequency analysis */
    top_n?: number;
    /** Gap between badges, horizontally and between lines */
    spacing?: number;
    /** Default wrap width for clouds; omitted means unbounded */
    max_width?: number;
    font?: FontSettings;
    opacity?: OpacitySettings;
    /** Colors cycled over the displayed words */
    palette?: string[];
    /** Words ignored in addition to the built-in stopword list */
    extra_stopwords?: string[];
}
