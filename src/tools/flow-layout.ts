import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { arrangeFlow } from '../algorithms/flow-arrange.js';
import { type SettingsClass } from '../classes/settings.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `flow_layout` tool.
 * Range checks are left to `arrangeFlow` so every caller gets the same messages.
 */
const flowLayoutInputSchema = {
    items: z.array(z.object({
        width: z.number(),
        height: z.number(),
    })).describe('Measured item sizes in display order'),
    max_width: z.number().optional().describe('Wrap width. Omit for a single unbounded line.'),
    spacing: z.number().optional().describe('Gap between items and between lines (defaults to the server setting)'),
};

/**
 * Registers the `flow_layout` tool on the MCP server.
 */
export function registerFlowLayoutTool(server: McpServer, settings: SettingsClass): void {
    server.registerTool(
        'flow_layout',
        {
            title: 'Flow Layout',
            description: 'Arrange sized boxes left to right, wrapping to a new line when the next box would exceed max_width. Returns one position per item plus the bounding size.',
            inputSchema: flowLayoutInputSchema,
        },
        (args) => {
            let arrangement;
            try {
                arrangement = arrangeFlow(args.items, {
                    maxWidth: args.max_width,
                    spacing: args.spacing ?? settings.spacing,
                });
            } catch (e: unknown) {
                return errors.domainError(errors.messageOf(e));
            }

            return {
                content: [{
                    type: 'text' as const,
                    text: JSON.stringify(arrangement),
                }],
            };
        },
    );
}
