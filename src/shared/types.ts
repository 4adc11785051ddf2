/**
 * Shared types used across the engine, CLI and MCP layers
 */

// --- Word ---

export type WordId = number;
export type RelationId = number;

/** A word referenced by id, or by its display/normalized text. */
export type WordRef = WordId | string;

export interface WordSummary {
  id: WordId;
  word: string;
  normalized_word: string;
}

export interface WordDetail extends WordSummary {
  description: string;
  created_at: string;
  updated_at: string;
}

export interface AddWordInput {
  word: string;
  description?: string;
}

// --- Relation ---

export const RELATION_TYPES = [
  'synonym',
  'antonym',
  'homophone',
  'homonym',
  'derivation',
  'homoglyph',
  'paronym',
  'hypernym',
  'hyponym',
  'holonym',
  'meronym',
  'related',
  'variant',
  'abbreviation',
  'plural',
  'past_tense',
  'custom',
] as const;

export type RelationType = (typeof RELATION_TYPES)[number];

export function isRelationType(value: unknown): value is RelationType {
  return typeof value === 'string' && (RELATION_TYPES as readonly string[]).includes(value);
}

export type EdgeDirection = 'outgoing' | 'incoming';

export interface RelationInfo {
  id: RelationId;
  source: WordSummary;
  target: WordSummary;
  strength: number;
  relation_type: RelationType | null;
  title: string | null;
  description: string;
  created_at: string;
  updated_at: string;
}

export interface AddRelationInput {
  source: WordRef;
  target: WordRef;
  strength?: number;
  relation_type?: RelationType | null;
  title?: string | null;
  description?: string;
}

export interface UpdateRelationInput {
  strength?: number;
  title?: string | null;
  description?: string;
}

export interface ListRelationsInput {
  word: WordRef;
  direction?: EdgeDirection | 'both';
}

export interface ListRelationsOutput {
  word: WordSummary;
  relations: RelationInfo[];
  total: number;
}

// --- Paths ---

export interface FindPathsInput {
  source: WordRef;
  target: WordRef;
  max_paths?: number;
  min_length?: number;
  max_length?: number;
}

export interface PathOutput {
  words: WordSummary[];
  path: WordId[];
  relations: RelationId[];
  length: number;
  total_strength: number;
}

export interface FindPathsOutput {
  source: WordSummary;
  target: WordSummary;
  paths: PathOutput[];
  total_found: number;
}

// --- Neighborhood ---

export interface GetNeighborhoodInput {
  word: WordRef;
  max_level?: number;
  max_nodes?: number;
  max_edges_per_node?: number;
}

export interface NeighborhoodNode {
  id: WordId;
  word: string;
  level: number;
}

export interface NeighborhoodEdge {
  relation_id: RelationId;
  source: WordId;
  target: WordId;
  level: number;
  direction: EdgeDirection;
  strength: number;
  relation_type: RelationType | null;
}

export interface GetNeighborhoodOutput {
  center: WordSummary;
  nodes: NeighborhoodNode[];
  edges: NeighborhoodEdge[];
  truncated: boolean;
}

// --- Import ---

export interface ImportResult {
  words_created: number;
  words_existing: number;
  relations_created: number;
  relations_skipped: number;
}

// --- Init / Status ---

export interface InitResult {
  config_path: string;
  db_path: string;
  created: boolean;
}

export interface StatusOutput {
  initialized: boolean;
  total_words: number;
  total_relations: number;
  relations_by_type: Record<string, number>;
  db_size_bytes: number;
}
