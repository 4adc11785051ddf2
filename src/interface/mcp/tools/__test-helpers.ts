/**
 * Shared fixtures for MCP tool tests
 */

import type {
  FindPathsOutput,
  GetNeighborhoodOutput,
  ListRelationsOutput,
  WordSummary,
} from '../../../shared/types.js';

export const cat: WordSummary = { id: 1, word: 'Cat', normalized_word: 'cat' };
export const feline: WordSummary = { id: 2, word: 'feline', normalized_word: 'feline' };
export const lion: WordSummary = { id: 3, word: 'lion', normalized_word: 'lion' };

export function makeSampleFindPathsOutput(): FindPathsOutput {
  return {
    source: cat,
    target: lion,
    paths: [
      {
        words: [cat, feline, lion],
        path: [1, 2, 3],
        relations: [10, 11],
        length: 2,
        total_strength: 0.72,
      },
    ],
    total_found: 1,
  };
}

export function makeSampleNeighborhoodOutput(): GetNeighborhoodOutput {
  return {
    center: cat,
    nodes: [
      { id: 1, word: 'Cat', level: 0 },
      { id: 2, word: 'feline', level: 1 },
    ],
    edges: [
      {
        relation_id: 10,
        source: 1,
        target: 2,
        level: 1,
        direction: 'outgoing',
        strength: 0.9,
        relation_type: 'synonym',
      },
    ],
    truncated: false,
  };
}

export function makeSampleRelationsOutput(): ListRelationsOutput {
  return {
    word: feline,
    relations: [
      {
        id: 10,
        source: cat,
        target: feline,
        strength: 0.9,
        relation_type: 'synonym',
        title: null,
        description: '',
        created_at: '2026-01-01 00:00:00',
        updated_at: '2026-01-01 00:00:00',
      },
    ],
    total: 1,
  };
}

/** Parse the single text block a tool returns. */
export function parseToolText(result: { content: Array<{ type: 'text'; text: string }> }): unknown {
  const [first] = result.content;
  if (!first) {
    throw new Error('tool returned no content');
  }
  return JSON.parse(first.text);
}
