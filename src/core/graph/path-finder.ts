/**
 * PathFinder - bounded enumeration of simple paths between two words
 *
 * Partial paths sit in a FIFO queue, so shorter paths tend to surface first.
 * Which paths are returned under `maxPaths` depends on the accessor's
 * adjacency order.
 */

import type { WordId } from '../../shared/types.js';
import { InvalidArgumentError, WordNotFoundError } from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import type { GraphAccessor, Path, PathSearchOptions } from './types.js';

export const PATH_DEFAULTS = {
  maxPaths: 10,
  minLength: 1,
  maxLength: 10,
} as const;

export interface PathBounds {
  maxPaths: number;
  minLength: number;
  maxLength: number;
}

interface PartialPath {
  terminal: WordId;
  nodes: WordId[];
  relations: number[];
  strength: number;
}

/**
 * Resolve defaults and reject malformed bounds.
 */
export function resolvePathBounds(options: PathSearchOptions = {}): PathBounds {
  const bounds: PathBounds = {
    maxPaths: options.maxPaths ?? PATH_DEFAULTS.maxPaths,
    minLength: options.minLength ?? PATH_DEFAULTS.minLength,
    maxLength: options.maxLength ?? PATH_DEFAULTS.maxLength,
  };

  for (const [name, value] of Object.entries(bounds)) {
    if (!Number.isInteger(value)) {
      throw new InvalidArgumentError(`${name} must be an integer, got ${value}`, name);
    }
  }
  if (bounds.maxPaths <= 0) {
    throw new InvalidArgumentError(
      `maxPaths must be positive, got ${bounds.maxPaths}`,
      'maxPaths',
    );
  }
  if (bounds.minLength < 0) {
    throw new InvalidArgumentError(
      `minLength must not be negative, got ${bounds.minLength}`,
      'minLength',
    );
  }
  if (bounds.maxLength < bounds.minLength) {
    throw new InvalidArgumentError(
      `maxLength (${bounds.maxLength}) must be >= minLength (${bounds.minLength})`,
      'maxLength',
    );
  }
  return bounds;
}

export class PathFinder {
  private readonly logger: Logger;

  constructor(private readonly accessor: GraphAccessor) {
    this.logger = createLogger('PathFinder');
  }

  async findPaths(
    sourceId: WordId,
    targetId: WordId,
    options?: PathSearchOptions,
  ): Promise<Path[]> {
    const { maxPaths, minLength, maxLength } = resolvePathBounds(options);

    const [source, target] = await Promise.all([
      this.accessor.getWord(sourceId),
      this.accessor.getWord(targetId),
    ]);
    if (!source) throw new WordNotFoundError(sourceId);
    if (!target) throw new WordNotFoundError(targetId);

    if (sourceId === targetId) {
      return minLength <= 0
        ? [{ path: [sourceId], relations: [], length: 0, totalStrength: 1.0 }]
        : [];
    }

    const found: Path[] = [];
    const queue: PartialPath[] = [
      { terminal: sourceId, nodes: [sourceId], relations: [], strength: 1.0 },
    ];
    let expanded = 0;

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      if (current === undefined) continue;

      const length = current.relations.length;
      if (length >= maxLength) continue;

      const adjacency = await this.accessor.adjacency(current.terminal);
      expanded++;

      for (const edge of adjacency) {
        if (current.nodes.includes(edge.neighborId)) continue;

        const extended: PartialPath = {
          terminal: edge.neighborId,
          nodes: [...current.nodes, edge.neighborId],
          relations: [...current.relations, edge.relationId],
          strength: current.strength * edge.strength,
        };

        if (edge.neighborId === targetId) {
          const newLength = length + 1;
          if (newLength >= minLength && newLength <= maxLength) {
            found.push({
              path: extended.nodes,
              relations: extended.relations,
              length: newLength,
              totalStrength: extended.strength,
            });
            if (found.length >= maxPaths) {
              this.logger.debug(
                `${sourceId} -> ${targetId}: path cap ${maxPaths} reached after ${expanded} expansions`,
              );
              return found;
            }
          }
        } else if (await this.accessor.getWord(edge.neighborId)) {
          // A relation can outlive its word; such a neighbor leads nowhere.
          queue.push(extended);
        }
      }
    }

    this.logger.debug(
      `${sourceId} -> ${targetId}: ${found.length} path(s), ${expanded} expansions`,
    );
    return found;
  }
}
