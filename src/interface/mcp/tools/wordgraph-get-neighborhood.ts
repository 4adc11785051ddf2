/**
 * wordgraph_get_neighborhood - Level-bounded subgraph around a word
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { toMcpError } from '../errors.js';
import { logSlowTool } from '../logger.js';
import {
  CONTENT_WARNING,
  WORD_REF_DESCRIPTION,
  jsonContent,
  type GraphToolEngine,
} from './shared.js';

export const GET_NEIGHBORHOOD_TOOL = 'wordgraph_get_neighborhood';

export const getNeighborhoodShape = {
  word: z.union([z.string().min(1), z.number().int()]).describe(WORD_REF_DESCRIPTION),
  max_level: z
    .number()
    .int()
    .optional()
    .describe('Levels to expand (default: 3, clamped to 1-5)'),
  max_nodes: z
    .number()
    .int()
    .optional()
    .describe('Maximum words returned (default: 100, clamped to 1-200)'),
  max_edges_per_node: z
    .number()
    .int()
    .optional()
    .describe('Relations followed per word; 0 or omitted = all'),
};

const getNeighborhoodInput = z.object(getNeighborhoodShape);

export function createGetNeighborhoodHandler(engine: GraphToolEngine) {
  return async (input: z.infer<typeof getNeighborhoodInput>) => {
    const startTime = performance.now();

    try {
      const result = await engine.getNeighborhood({
        word: input.word,
        max_level: input.max_level,
        max_nodes: input.max_nodes,
        max_edges_per_node: input.max_edges_per_node,
      });

      const queryTimeMs = Math.round(performance.now() - startTime);
      logSlowTool(GET_NEIGHBORHOOD_TOOL, queryTimeMs, 200);

      return jsonContent({ ...result, query_time_ms: queryTimeMs });
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerGetNeighborhoodTool(server: McpServer, engine: GraphToolEngine): void {
  server.tool(
    GET_NEIGHBORHOOD_TOOL,
    [
      'Get the words within a few relations of a word, as nodes and edges.',
      'Nodes carry their breadth-first level; edges point the way they were reached',
      'and keep the stored direction in `direction`.',
      '`truncated` is true when the node cap stopped the expansion.',
      CONTENT_WARNING,
    ].join('\n'),
    getNeighborhoodShape,
    createGetNeighborhoodHandler(engine),
  );
}
