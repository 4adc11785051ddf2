/**
 * Traversal-facing graph types.
 *
 * The core never sees storage rows: everything it reads arrives through a
 * {@link GraphAccessor}, which is injected per engine rather than shared.
 */

import type {
  EdgeDirection,
  RelationId,
  RelationType,
  WordId,
} from '../../shared/types.js';

export interface GraphWord {
  id: WordId;
  word: string;
  normalizedWord: string;
}

/** One relation seen from a given word. */
export interface AdjacencyEdge {
  neighborId: WordId;
  relationId: RelationId;
  /** `outgoing` when the word is the stored source, `incoming` when it is the target. */
  direction: EdgeDirection;
  strength: number;
  relationType: RelationType | null;
}

/**
 * Read-only view of the word/relation store.
 *
 * Implementations may return adjacency in any order; traversal results are
 * only reproducible when that order is stable.
 */
export interface GraphAccessor {
  getWord(wordId: WordId): Promise<GraphWord | null>;
  /**
   * Every relation where `wordId` is source or target.
   * Rejects with WordNotFoundError when the word does not exist.
   */
  adjacency(wordId: WordId): Promise<AdjacencyEdge[]>;
}

export interface Path {
  path: WordId[];
  relations: RelationId[];
  length: number;
  totalStrength: number;
}

export interface PathSearchOptions {
  maxPaths?: number;
  minLength?: number;
  maxLength?: number;
}

export interface SubgraphEdge {
  relationId: RelationId;
  /** The node the edge was reached from. */
  source: WordId;
  target: WordId;
  /** Level at which `target` was first discovered. */
  level: number;
  direction: EdgeDirection;
  strength: number;
  relationType: RelationType | null;
}

export interface Subgraph {
  center: WordId;
  nodeIds: WordId[];
  nodeLevels: Map<WordId, number>;
  edges: SubgraphEdge[];
  /** Expansion stopped because the node cap was reached. */
  truncated: boolean;
}

export interface NeighborhoodOptions {
  maxLevel?: number;
  maxNodes?: number;
  /** Absent, zero or negative means unbounded. */
  maxEdgesPerNode?: number;
}
