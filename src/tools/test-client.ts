import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';

/**
 * Connects an SDK client to the server over an in-process transport pair.
 */
export async function connectClient(server: McpServer): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: 'wordcloud-test-client', version: '1.0.0' });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  return client;
}

export interface ToolText {
  isError: boolean;
  text: string;
}

/**
 * Calls a tool and returns its first text block.
 */
export async function callTool(client: Client, name: string, args: Record<string, unknown>): Promise<ToolText> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first.type !== 'text') {
    throw new Error(`Tool ${name} returned a ${first.type} block instead of text`);
  }
  return { isError: result.isError === true, text: first.text };
}
