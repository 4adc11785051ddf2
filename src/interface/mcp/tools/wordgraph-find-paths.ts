/**
 * wordgraph_find_paths - Simple paths between two words
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

export const FIND_PATHS_TOOL = 'wordgraph_find_paths';

export const findPathsShape = {
  source: z.union([z.string().min(1), z.number().int()]).describe(WORD_REF_DESCRIPTION),
  target: z.union([z.string().min(1), z.number().int()]).describe(WORD_REF_DESCRIPTION),
  max_paths: z
    .number()
    .int()
    .optional()
    .describe('Stop after this many paths (default from config, usually 10)'),
  min_length: z
    .number()
    .int()
    .optional()
    .describe('Shortest path to report, in relations (default: 1)'),
  max_length: z
    .number()
    .int()
    .optional()
    .describe('Longest path to explore, in relations (default: 10)'),
};

const findPathsInput = z.object(findPathsShape);

export function createFindPathsHandler(engine: GraphToolEngine) {
  return async (input: z.infer<typeof findPathsInput>) => {
    const startTime = performance.now();

    try {
      const result = await engine.findPaths({
        source: input.source,
        target: input.target,
        max_paths: input.max_paths,
        min_length: input.min_length,
        max_length: input.max_length,
      });

      const queryTimeMs = Math.round(performance.now() - startTime);
      logSlowTool(FIND_PATHS_TOOL, queryTimeMs, 500);

      return jsonContent({ ...result, query_time_ms: queryTimeMs });
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerFindPathsTool(server: McpServer, engine: GraphToolEngine): void {
  server.tool(
    FIND_PATHS_TOOL,
    [
      'Find simple paths between two words in the word relation graph.',
      'Relations are followed in either direction; each path lists its words,',
      'the relation ids used, its length and the product of relation strengths.',
      'Shorter paths tend to come first.',
      CONTENT_WARNING,
    ].join('\n'),
    findPathsShape,
    createFindPathsHandler(engine),
  );
}
