/**
 * MCP Server initialization and transport
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './tools/index.js';
import { interceptConsole, mcpLogger } from './logger.js';
import { getVersion } from '../../shared/version.js';
import type { WordGraphEngine } from '../../core/engine.js';
import type { GraphToolEngine } from './tools/shared.js';

export function createMcpServer(engine: GraphToolEngine): McpServer {
  const server = new McpServer({
    name: 'wordgraph',
    version: getVersion(),
  });
  registerAllTools(server, engine);
  return server;
}

export async function startMcpServer(engine: WordGraphEngine): Promise<McpServer> {
  // Must run before anything can write to stdout
  interceptConsole();

  const server = createMcpServer(engine);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  mcpLogger.info('MCP server started (stdio transport)');
  return server;
}
