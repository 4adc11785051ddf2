/**
 * In-memory GraphAccessor for traversal tests
 */

import type { RelationType } from '../../shared/types.js';
import { WordNotFoundError } from '../../shared/errors.js';
import type { AdjacencyEdge, GraphAccessor, GraphWord } from './types.js';

export interface MemoryRelation {
  id: number;
  source: number;
  target: number;
  strength?: number;
  type?: RelationType | null;
}

export interface MemoryGraph extends GraphAccessor {
  /** Number of adjacency() calls made so far */
  readonly adjacencyCalls: number;
  /** Remove a word but keep its relations, simulating a stale store */
  removeWordOnly(id: number): void;
}

/**
 * Words are given as `[id, text]` pairs. Adjacency is returned in relation
 * insertion order unless `reverseAdjacency` is set.
 */
export function createMemoryGraph(
  words: Array<[number, string]>,
  relations: MemoryRelation[],
  options: { reverseAdjacency?: boolean; failAdjacencyOn?: number } = {},
): MemoryGraph {
  const wordMap = new Map<number, GraphWord>(
    words.map(([id, text]) => [id, { id, word: text, normalizedWord: text.toLowerCase() }]),
  );
  let calls = 0;

  return {
    get adjacencyCalls() {
      return calls;
    },

    removeWordOnly(id: number) {
      wordMap.delete(id);
    },

    async getWord(wordId: number) {
      return wordMap.get(wordId) ?? null;
    },

    async adjacency(wordId: number) {
      calls++;
      if (options.failAdjacencyOn === wordId) {
        throw new Error(`adjacency read failed for ${wordId}`);
      }
      if (!wordMap.has(wordId)) {
        throw new WordNotFoundError(wordId);
      }
      const edges: AdjacencyEdge[] = [];
      for (const rel of relations) {
        if (rel.source === wordId) {
          edges.push({
            neighborId: rel.target,
            relationId: rel.id,
            direction: 'outgoing',
            strength: rel.strength ?? 1.0,
            relationType: rel.type ?? null,
          });
        } else if (rel.target === wordId) {
          edges.push({
            neighborId: rel.source,
            relationId: rel.id,
            direction: 'incoming',
            strength: rel.strength ?? 1.0,
            relationType: rel.type ?? null,
          });
        }
      }
      return options.reverseAdjacency ? edges.reverse() : edges;
    },
  };
}

/**
 * A -> B (synonym, 0.9), B -> C (derivation, 0.7), A -> D (antonym, 0.5)
 */
export function createSampleGraph(): MemoryGraph {
  return createMemoryGraph(
    [
      [1, 'A'],
      [2, 'B'],
      [3, 'C'],
      [4, 'D'],
    ],
    [
      { id: 1, source: 1, target: 2, strength: 0.9, type: 'synonym' },
      { id: 2, source: 2, target: 3, strength: 0.7, type: 'derivation' },
      { id: 3, source: 1, target: 4, strength: 0.5, type: 'antonym' },
    ],
  );
}
