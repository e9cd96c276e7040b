import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type SettingsClass } from './classes/settings.js';
import { registerFlowLayoutTool } from './tools/flow-layout.js';
import { registerWordFrequencyTool } from './tools/word-frequency.js';
import { registerWordCloudTool } from './tools/word-cloud.js';

export const SERVER_NAME = 'wordcloud-mcp';
export const SERVER_VERSION = '1.0.0';

/**
 * Builds the MCP server with every tool registered against the given settings.
 */
export function createServer(settings: SettingsClass): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    'get_status',
    { description: 'Get the status of the word cloud server and its effective settings' },
    () => ({
      content: [{ type: 'text', text: JSON.stringify({ status: 'running', settings: settings.info() }) }],
    }),
  );

  registerFlowLayoutTool(server, settings);
  registerWordFrequencyTool(server, settings);
  registerWordCloudTool(server, settings);

  return server;
}
