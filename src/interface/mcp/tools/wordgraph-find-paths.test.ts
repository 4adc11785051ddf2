/**
 * Tests for wordgraph_find_paths MCP tool
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { createFindPathsHandler, findPathsShape } from './wordgraph-find-paths.js';
import type { GraphToolEngine } from './shared.js';
import { InvalidArgumentError, WordNotFoundError } from '../../../shared/errors.js';
import { WORDGRAPH_ERROR } from '../errors.js';
import { makeSampleFindPathsOutput, parseToolText } from './__test-helpers.js';

describe('wordgraph_find_paths', () => {
  function setup(findPaths = vi.fn<GraphToolEngine['findPaths']>()) {
    const sampleOutput = makeSampleFindPathsOutput();
    findPaths.mockResolvedValue(sampleOutput);
    const engine: GraphToolEngine = {
      findPaths,
      getNeighborhood: vi.fn(),
      listRelations: vi.fn(),
    };
    return { findPaths, handler: createFindPathsHandler(engine), sampleOutput };
  }

  it('returns the engine result with query_time_ms as a single text block', async () => {
    const { handler, sampleOutput } = setup();

    const result = await handler({ source: 'cat', target: 'lion' });

    expect(result.content).toHaveLength(1);
    expect(parseToolText(result)).toEqual({
      ...sampleOutput,
      query_time_ms: expect.any(Number),
    });
  });

  it('forwards words and bounds to engine.findPaths', async () => {
    const { findPaths, handler } = setup();

    await handler({ source: 1, target: 'lion', max_paths: 3, max_length: 4 });

    expect(findPaths).toHaveBeenCalledWith({
      source: 1,
      target: 'lion',
      max_paths: 3,
      min_length: undefined,
      max_length: 4,
    });
  });

  it('maps a missing word to NOT_FOUND', async () => {
    const findPaths = vi.fn<GraphToolEngine['findPaths']>();
    const { handler } = setup(findPaths);
    findPaths.mockRejectedValue(new WordNotFoundError('zebra'));

    const error: unknown = await handler({ source: 'zebra', target: 'lion' }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(McpError);
    expect(error).toMatchObject({ code: WORDGRAPH_ERROR.NOT_FOUND });
  });

  it('maps invalid bounds to InvalidParams', async () => {
    const findPaths = vi.fn<GraphToolEngine['findPaths']>();
    const { handler } = setup(findPaths);
    findPaths.mockRejectedValue(
      new InvalidArgumentError('maxLength must be >= minLength', 'maxLength'),
    );

    await expect(
      handler({ source: 'cat', target: 'lion', min_length: 3, max_length: 2 }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it('accepts word ids and rejects empty text in its input schema', () => {
    const input = z.object(findPathsShape);

    expect(input.parse({ source: 4, target: 'lion' })).toEqual({ source: 4, target: 'lion' });
    expect(input.safeParse({ source: '', target: 'lion' }).success).toBe(false);
    expect(input.safeParse({ source: 'cat', target: 'lion', max_paths: 1.5 }).success).toBe(
      false,
    );
  });
});
