/**
 * Data layer row types
 * Direct mappings of the SQLite tables
 */

import type Database from 'better-sqlite3';
import type { RelationType } from '../shared/types.js';

/** ISO 8601 timestamp string */
export type ISODateString = string;

// --- Word ---

export interface WordRow {
  id: number;
  word: string;
  normalized_word: string;
  description: string;
  created_at: ISODateString;
  updated_at: ISODateString;
}

export interface WordInsert {
  word: string;
  description?: string;
}

// --- Relation ---

export interface RelationRow {
  id: number;
  source_word_id: number;
  target_word_id: number;
  strength: number;
  relation_type: RelationType | null;
  title: string | null;
  description: string;
  created_at: ISODateString;
  updated_at: ISODateString;
}

export interface RelationInsert {
  source_word_id: number;
  target_word_id: number;
  strength?: number;
  relation_type?: RelationType | null;
  title?: string | null;
  description?: string;
}

export interface RelationUpdate {
  strength?: number;
  title?: string | null;
  description?: string;
}

// --- Migration ---

export interface Migration {
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}
