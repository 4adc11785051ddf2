/**
 * Tests for MCP tool registration
 */

import { describe, it, expect, vi } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerAllTools } from './index.js';
import type { GraphToolEngine } from './shared.js';

describe('registerAllTools', () => {
  it('registers the three graph tools', () => {
    const server = new McpServer({ name: 'wordgraph-test', version: '0.0.0' });
    const tool = vi.spyOn(server, 'tool');
    const engine: GraphToolEngine = {
      findPaths: vi.fn(),
      getNeighborhood: vi.fn(),
      listRelations: vi.fn(),
    };

    registerAllTools(server, engine);

    expect(tool.mock.calls.map((call) => call[0])).toEqual([
      'wordgraph_find_paths',
      'wordgraph_get_neighborhood',
      'wordgraph_get_relations',
    ]);
  });
});
