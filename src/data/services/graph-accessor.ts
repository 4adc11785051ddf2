import type { WordRepository } from '../repositories/word-repository.js';
import type { RelationRepository } from '../repositories/relation-repository.js';
import type { RelationRow, WordRow } from '../types.js';
import type {
  AdjacencyEdge,
  GraphAccessor,
  GraphWord,
} from '../../core/graph/types.js';
import {
  StoreUnavailableError,
  WordNotFoundError,
  WordGraphError,
  toError,
} from '../../shared/errors.js';

/**
 * Orient a stored relation from the point of view of `wordId`.
 */
export function toAdjacencyEdge(wordId: number, row: RelationRow): AdjacencyEdge {
  const outgoing = row.source_word_id === wordId;
  return {
    neighborId: outgoing ? row.target_word_id : row.source_word_id,
    relationId: row.id,
    direction: outgoing ? 'outgoing' : 'incoming',
    strength: row.strength,
    relationType: row.relation_type,
  };
}

function toGraphWord(row: WordRow): GraphWord {
  return { id: row.id, word: row.word, normalizedWord: row.normalized_word };
}

/**
 * Run a store read, turning driver failures into StoreUnavailableError.
 */
export function readStore<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof WordGraphError) throw err;
    throw new StoreUnavailableError(operation, toError(err));
  }
}

/**
 * GraphAccessor over the SQLite repositories.
 * Adjacency comes back ordered by relation id, so traversals are reproducible.
 */
export function createGraphAccessor(
  words: WordRepository,
  relations: RelationRepository,
): GraphAccessor {
  return {
    async getWord(wordId: number): Promise<GraphWord | null> {
      const row = readStore('getWord', () => words.findById(wordId));
      return row ? toGraphWord(row) : null;
    },

    async adjacency(wordId: number): Promise<AdjacencyEdge[]> {
      return readStore('adjacency', () => {
        if (!words.findById(wordId)) {
          throw new WordNotFoundError(wordId);
        }
        return relations
          .findIncident(wordId)
          .map((row) => toAdjacencyEdge(wordId, row));
      });
    },
  };
}
