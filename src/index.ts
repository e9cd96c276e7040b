#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';
import { loadSettings, resolveSettingsPath } from './io/settings-io.js';

async function main() {
  const settings = await loadSettings(resolveSettingsPath(process.argv.slice(2), process.env));
  if (settings.path !== null) {
    console.error(`Loaded settings from ${settings.path}`);
  }

  const server = createServer(settings);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Word Cloud MCP Server running on stdio');
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
