/**
 * wordgraph configuration types
 */

import type { LogLevel } from '../shared/logger.js';

export interface WordGraphConfig {
  /** Traversal defaults and hard limits */
  graph: {
    max_paths: number;
    min_length: number;
    max_length: number;
    max_level: number;
    max_nodes: number;
    /** 0 = unbounded */
    max_edges_per_node: number;
    max_level_limit: number;
    max_nodes_limit: number;
  };

  /** Logging */
  log: {
    level: LogLevel;
    file: string | null;
  };
}
