/**
 * Tests for wordgraph_get_neighborhood MCP tool
 */

import { describe, it, expect, vi } from 'vitest';
import {
  createGetNeighborhoodHandler,
  GET_NEIGHBORHOOD_TOOL,
} from './wordgraph-get-neighborhood.js';
import type { GraphToolEngine } from './shared.js';
import { StoreUnavailableError } from '../../../shared/errors.js';
import { WORDGRAPH_ERROR } from '../errors.js';
import { makeSampleNeighborhoodOutput, parseToolText } from './__test-helpers.js';

describe(GET_NEIGHBORHOOD_TOOL, () => {
  function setup() {
    const sampleOutput = makeSampleNeighborhoodOutput();
    const getNeighborhood = vi.fn<GraphToolEngine['getNeighborhood']>();
    getNeighborhood.mockResolvedValue(sampleOutput);
    const engine: GraphToolEngine = {
      findPaths: vi.fn(),
      getNeighborhood,
      listRelations: vi.fn(),
    };
    return { getNeighborhood, handler: createGetNeighborhoodHandler(engine), sampleOutput };
  }

  it('returns nodes, edges and truncated with query_time_ms', async () => {
    const { handler, sampleOutput } = setup();

    const result = await handler({ word: 'cat' });

    expect(parseToolText(result)).toEqual({
      center: sampleOutput.center,
      nodes: sampleOutput.nodes,
      edges: sampleOutput.edges,
      truncated: false,
      query_time_ms: expect.any(Number),
    });
  });

  it('forwards the bounds to engine.getNeighborhood', async () => {
    const { getNeighborhood, handler } = setup();

    await handler({ word: 1, max_level: 2, max_nodes: 50, max_edges_per_node: 0 });

    expect(getNeighborhood).toHaveBeenCalledWith({
      word: 1,
      max_level: 2,
      max_nodes: 50,
      max_edges_per_node: 0,
    });
  });

  it('maps a store failure to STORE_UNAVAILABLE', async () => {
    const { getNeighborhood, handler } = setup();
    getNeighborhood.mockRejectedValue(
      new StoreUnavailableError('adjacency', new Error('database is locked')),
    );

    await expect(handler({ word: 'cat' })).rejects.toMatchObject({
      code: WORDGRAPH_ERROR.STORE_UNAVAILABLE,
      message: expect.stringContaining('database is locked'),
    });
  });
});
