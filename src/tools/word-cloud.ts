import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as path from 'node:path';
import { analyzeWordFrequencies } from '../algorithms/word-frequency.js';
import { composeWordCloud } from '../algorithms/word-cloud.js';
import { renderWordCloudSvg } from '../algorithms/svg-render.js';
import { type SettingsClass } from '../classes/settings.js';
import { saveSvgFile } from '../io/svg-io.js';
import { resolveText } from './text-source.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `word_cloud` tool.
 *
 * - `format: json` (default): the composed cloud with badge positions and styles
 * - `format: svg`: the rendered SVG, or written to `output_path` when given
 */
const wordCloudInputSchema = {
    text: z.string().optional().describe('Text to visualize'),
    path: z.string().optional().describe('Path to a UTF-8 text file to visualize (instead of text)'),
    max_words: z.number().int().nonnegative().optional().describe('Number of words shown'),
    max_width: z.number().optional().describe('Wrap width for the badges. Omit for the server setting.'),
    spacing: z.number().optional().describe('Gap between badges and between lines'),
    highlight: z.string().optional().describe('Word to highlight and describe in the caption'),
    format: z.enum(['json', 'svg']).optional().describe('Output format (default json)'),
    output_path: z.string().optional().describe('For svg: file to write the SVG to instead of returning it'),
    title: z.string().optional().describe('For svg: header text (default "Word Frequency")'),
};

/**
 * Registers the `word_cloud` tool on the MCP server.
 */
export function registerWordCloudTool(server: McpServer, settings: SettingsClass): void {
    server.registerTool(
        'word_cloud',
        {
            title: 'Word Cloud',
            description: 'Build a word cloud from a text: frequent words get larger, more opaque badges, flow-wrapped to max_width. Returns JSON layout or SVG.',
            inputSchema: wordCloudInputSchema,
        },
        async (args) => {
            const format = args.format ?? 'json';
            if (args.output_path !== undefined && format !== 'svg') {
                return errors.svgOutputRequiresSvgFormat();
            }

            const source = await resolveText('word_cloud', args.text, args.path);
            if ('isError' in source) {
                return source;
            }

            let cloud;
            try {
                const frequencies = analyzeWordFrequencies(source.text, settings.frequencyOptions());
                cloud = composeWordCloud(frequencies, settings.cloudOptions({
                    maxWords: args.max_words,
                    maxWidth: args.max_width,
                    spacing: args.spacing,
                    highlight: args.highlight,
                }));
            } catch (e: unknown) {
                return errors.domainError(errors.messageOf(e));
            }

            if (format === 'json') {
                return {
                    content: [{
                        type: 'text' as const,
                        text: JSON.stringify(cloud),
                    }],
                };
            }

            const svg = renderWordCloudSvg(cloud, { title: args.title });
            if (args.output_path === undefined) {
                return {
                    content: [{
                        type: 'text' as const,
                        text: svg,
                    }],
                };
            }

            const outputPath = path.resolve(args.output_path);
            try {
                await saveSvgFile(outputPath, svg);
            } catch (e: unknown) {
                return errors.domainError(errors.messageOf(e));
            }

            return {
                content: [{
                    type: 'text' as const,
                    text: JSON.stringify({
                        message: `Word cloud with ${String(cloud.badges.length)} word(s) written.`,
                        path: outputPath,
                        width: cloud.width,
                        height: cloud.height,
                    }),
                }],
            };
        },
    );
}
