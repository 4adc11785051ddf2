/**
 * Register the word graph MCP tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { GraphToolEngine } from './shared.js';
import { registerFindPathsTool } from './wordgraph-find-paths.js';
import { registerGetNeighborhoodTool } from './wordgraph-get-neighborhood.js';
import { registerGetRelationsTool } from './wordgraph-get-relations.js';

export function registerAllTools(
  server: McpServer,
  engine: GraphToolEngine,
): void {
  registerFindPathsTool(server, engine);
  registerGetNeighborhoodTool(server, engine);
  registerGetRelationsTool(server, engine);
}
