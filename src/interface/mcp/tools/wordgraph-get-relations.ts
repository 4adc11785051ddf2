/**
 * wordgraph_get_relations - Relations touching a word
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { toMcpError } from '../errors.js';
import {
  CONTENT_WARNING,
  WORD_REF_DESCRIPTION,
  jsonContent,
  type GraphToolEngine,
} from './shared.js';

export const GET_RELATIONS_TOOL = 'wordgraph_get_relations';

export const getRelationsShape = {
  word: z.union([z.string().min(1), z.number().int()]).describe(WORD_REF_DESCRIPTION),
  direction: z
    .enum(['outgoing', 'incoming', 'both'])
    .default('both')
    .describe('Stored direction relative to the word (default: both)'),
};

const getRelationsInput = z.object(getRelationsShape);

export function createGetRelationsHandler(engine: GraphToolEngine) {
  return async (input: z.infer<typeof getRelationsInput>) => {
    try {
      const result = engine.listRelations({
        word: input.word,
        direction: input.direction,
      });
      return jsonContent(result);
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerGetRelationsTool(server: McpServer, engine: GraphToolEngine): void {
  server.tool(
    GET_RELATIONS_TOOL,
    [
      'List the relations of a word with both endpoints, type, strength and description.',
      CONTENT_WARNING,
    ].join('\n'),
    getRelationsShape,
    createGetRelationsHandler(engine),
  );
}
