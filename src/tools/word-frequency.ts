import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { analyzeText } from '../algorithms/word-frequency.js';
import { type SettingsClass } from '../classes/settings.js';
import { resolveText } from './text-source.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `word_frequency` tool.
 */
const wordFrequencyInputSchema = {
    text: z.string().optional().describe('Text to analyze'),
    path: z.string().optional().describe('Path to a UTF-8 text file to analyze (instead of text)'),
    top_n: z.number().int().nonnegative().optional().describe('Maximum number of words returned'),
};

/**
 * Registers the `word_frequency` tool on the MCP server.
 */
export function registerWordFrequencyTool(server: McpServer, settings: SettingsClass): void {
    server.registerTool(
        'word_frequency',
        {
            title: 'Word Frequency',
            description: 'Count the significant words in a text (stopwords and words of two letters or fewer are skipped), most frequent first. `total` is the number of words kept, the base of every percentage.',
            inputSchema: wordFrequencyInputSchema,
        },
        async (args) => {
            const source = await resolveText('word_frequency', args.text, args.path);
            if ('isError' in source) {
                return source;
            }

            let analysis;
            try {
                analysis = analyzeText(source.text, settings.frequencyOptions(args.top_n));
            } catch (e: unknown) {
                return errors.domainError(errors.messageOf(e));
            }

            return {
                content: [{
                    type: 'text' as const,
                    text: JSON.stringify(analysis),
                }],
            };
        },
    );
}
