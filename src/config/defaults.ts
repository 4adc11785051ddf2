import type { WordGraphConfig } from './types.js';

export const DEFAULT_CONFIG: WordGraphConfig = {
  graph: {
    max_paths: 10,
    min_length: 1,
    max_length: 10,
    max_level: 3,
    max_nodes: 100,
    max_edges_per_node: 0,
    max_level_limit: 5,
    max_nodes_limit: 200,
  },
  log: {
    level: 'info',
    file: null,
  },
};
