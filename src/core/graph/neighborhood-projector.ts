/**
 * NeighborhoodProjector - level-bounded subgraph around a center word
 *
 * Returns ids and edge triples only; callers attach word content themselves.
 */

import type { WordId } from '../../shared/types.js';
import { WordNotFoundError } from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import type {
  GraphAccessor,
  NeighborhoodOptions,
  Subgraph,
  SubgraphEdge,
} from './types.js';

export const NEIGHBORHOOD_DEFAULTS = {
  maxLevel: 3,
  maxNodes: 100,
} as const;

export interface NeighborhoodLimits {
  /** Upper clamp for maxLevel */
  maxLevelLimit: number;
  /** Upper clamp for maxNodes */
  maxNodesLimit: number;
}

export const DEFAULT_NEIGHBORHOOD_LIMITS: NeighborhoodLimits = {
  maxLevelLimit: 5,
  maxNodesLimit: 200,
};

export interface NeighborhoodBounds {
  maxLevel: number;
  maxNodes: number;
  /** null = unbounded */
  maxEdgesPerNode: number | null;
}

function clampInt(value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(value)));
}

/**
 * Clamp caller bounds into range. Unlike path search, bad neighborhood bounds
 * never fail the request.
 */
export function resolveNeighborhoodBounds(
  options: NeighborhoodOptions = {},
  limits: NeighborhoodLimits = DEFAULT_NEIGHBORHOOD_LIMITS,
): NeighborhoodBounds {
  const maxLevelLimit = Math.max(1, limits.maxLevelLimit);
  const maxNodesLimit = Math.max(1, limits.maxNodesLimit);
  const cap = options.maxEdgesPerNode;
  return {
    maxLevel: clampInt(
      options.maxLevel,
      Math.min(NEIGHBORHOOD_DEFAULTS.maxLevel, maxLevelLimit),
      1,
      maxLevelLimit,
    ),
    maxNodes: clampInt(
      options.maxNodes,
      Math.min(NEIGHBORHOOD_DEFAULTS.maxNodes, maxNodesLimit),
      1,
      maxNodesLimit,
    ),
    maxEdgesPerNode:
      cap !== undefined && Number.isFinite(cap) && cap >= 1 ? Math.floor(cap) : null,
  };
}

export function edgeKey(from: WordId, to: WordId): string {
  return `${from}-${to}`;
}

export class NeighborhoodProjector {
  private readonly logger: Logger;

  constructor(
    private readonly accessor: GraphAccessor,
    private readonly limits: NeighborhoodLimits = DEFAULT_NEIGHBORHOOD_LIMITS,
  ) {
    this.logger = createLogger('NeighborhoodProjector');
  }

  /**
   * Breadth-first expansion from `centerId`.
   *
   * Stops immediately once a new node would exceed `maxNodes`; work already
   * queued at the same level is dropped and the result is marked truncated.
   * A relation already recorded in one direction is not recorded again in the
   * other, even when a distinct relation links the pair the other way.
   */
  async project(centerId: WordId, options?: NeighborhoodOptions): Promise<Subgraph> {
    const { maxLevel, maxNodes, maxEdgesPerNode } = resolveNeighborhoodBounds(
      options,
      this.limits,
    );

    const center = await this.accessor.getWord(centerId);
    if (!center) throw new WordNotFoundError(centerId);

    const nodeIds = new Set<WordId>([centerId]);
    const levels = new Map<WordId, number>([[centerId, 0]]);
    const seenEdges = new Set<string>();
    const edges: SubgraphEdge[] = [];
    const queue: Array<{ node: WordId; level: number }> = [{ node: centerId, level: 0 }];
    let truncated = false;

    expand: for (let head = 0; head < queue.length; head++) {
      const entry = queue[head];
      if (entry === undefined) continue;
      const { node: current, level } = entry;
      if (level >= maxLevel) continue;

      let adjacency = await this.accessor.adjacency(current);
      if (maxEdgesPerNode !== null && adjacency.length > maxEdgesPerNode) {
        adjacency = adjacency.slice(0, maxEdgesPerNode);
      }

      for (const edge of adjacency) {
        const neighbor = edge.neighborId;

        // Relations can outlive their words in stores without cascading deletes.
        if (!nodeIds.has(neighbor) && !(await this.accessor.getWord(neighbor))) {
          continue;
        }

        if (!nodeIds.has(neighbor) && nodeIds.size >= maxNodes) {
          truncated = true;
          break expand;
        }

        const forward = edgeKey(current, neighbor);
        const reverse = edgeKey(neighbor, current);
        const isNew = !levels.has(neighbor);
        if (isNew) {
          levels.set(neighbor, level + 1);
        }

        if (!seenEdges.has(forward) && !seenEdges.has(reverse)) {
          seenEdges.add(forward);
          edges.push({
            relationId: edge.relationId,
            source: current,
            target: neighbor,
            level: levels.get(neighbor) ?? level + 1,
            direction: edge.direction,
            strength: edge.strength,
            relationType: edge.relationType,
          });
        }

        nodeIds.add(neighbor);
        if (isNew) {
          queue.push({ node: neighbor, level: level + 1 });
        }
      }
    }

    this.logger.debug(
      `center ${centerId}: ${nodeIds.size} node(s), ${edges.length} edge(s)${truncated ? ', truncated' : ''}`,
    );

    return {
      center: centerId,
      nodeIds: [...nodeIds],
      nodeLevels: levels,
      edges,
      truncated,
    };
  }
}
