import type { StatementCache } from '../statement-cache.js';
import type { RelationRow, RelationInsert, RelationUpdate } from '../types.js';
import {
  DuplicateRelationError,
  InvalidArgumentError,
  WordNotFoundError,
} from '../../shared/errors.js';

export interface RelationRepository {
  findById(id: number): RelationRow | null;
  /** Relations stored as source -> target (one direction only). */
  findBetween(sourceWordId: number, targetWordId: number): RelationRow[];
  findBySource(wordId: number): RelationRow[];
  findByTarget(wordId: number): RelationRow[];
  /** Relations where the word is source or target, ordered by relation id. */
  findIncident(wordId: number): RelationRow[];
  findDuplicate(relation: RelationInsert): RelationRow | null;
  create(relation: RelationInsert): RelationRow;
  update(id: number, update: RelationUpdate): RelationRow | null;
  deleteById(id: number): boolean;
  count(): number;
  countByType(): Record<string, number>;
}

export const DEFAULT_STRENGTH = 1.0;

export function assertStrength(strength: number): void {
  if (!Number.isFinite(strength) || strength < 0 || strength > 1) {
    throw new InvalidArgumentError(
      `Relation strength must be between 0 and 1, got ${strength}`,
      'strength',
    );
  }
}

export function createRelationRepository(cache: StatementCache): RelationRepository {
  const stmts = cache.scope('relations');

  function wordExists(id: number): boolean {
    const stmt = stmts.get('word_exists', 'SELECT 1 AS found FROM words WHERE id = ?');
    return stmt.get(id) !== undefined;
  }

  return {
    findById(id: number): RelationRow | null {
      const stmt = stmts.get('select_by_id', 'SELECT * FROM word_relations WHERE id = ?');
      return (stmt.get(id) as RelationRow | undefined) ?? null;
    },

    findBetween(sourceWordId: number, targetWordId: number): RelationRow[] {
      const stmt = stmts.get(
        'select_between',
        `SELECT * FROM word_relations
         WHERE source_word_id = ? AND target_word_id = ?
         ORDER BY id`,
      );
      return stmt.all(sourceWordId, targetWordId) as RelationRow[];
    },

    findBySource(wordId: number): RelationRow[] {
      const stmt = stmts.get(
        'select_by_source',
        'SELECT * FROM word_relations WHERE source_word_id = ? ORDER BY id',
      );
      return stmt.all(wordId) as RelationRow[];
    },

    findByTarget(wordId: number): RelationRow[] {
      const stmt = stmts.get(
        'select_by_target',
        'SELECT * FROM word_relations WHERE target_word_id = ? ORDER BY id',
      );
      return stmt.all(wordId) as RelationRow[];
    },

    findIncident(wordId: number): RelationRow[] {
      const stmt = stmts.get(
        'select_incident',
        `SELECT * FROM word_relations
         WHERE source_word_id = ? OR target_word_id = ?
         ORDER BY id`,
      );
      return stmt.all(wordId, wordId) as RelationRow[];
    },

    findDuplicate(relation: RelationInsert): RelationRow | null {
      const stmt = stmts.get(
        'select_duplicate',
        `SELECT * FROM word_relations
         WHERE source_word_id = ? AND target_word_id = ?
           AND COALESCE(relation_type, '') = COALESCE(?, '')`,
      );
      const row = stmt.get(
        relation.source_word_id,
        relation.target_word_id,
        relation.relation_type ?? null,
      ) as RelationRow | undefined;
      return row ?? null;
    },

    create(relation: RelationInsert): RelationRow {
      if (relation.source_word_id === relation.target_word_id) {
        throw new InvalidArgumentError(
          'A relation cannot link a word to itself',
          'target',
        );
      }
      const strength = relation.strength ?? DEFAULT_STRENGTH;
      assertStrength(strength);

      if (!wordExists(relation.source_word_id)) {
        throw new WordNotFoundError(relation.source_word_id);
      }
      if (!wordExists(relation.target_word_id)) {
        throw new WordNotFoundError(relation.target_word_id);
      }
      if (this.findDuplicate(relation)) {
        throw new DuplicateRelationError(
          relation.source_word_id,
          relation.target_word_id,
          relation.relation_type ?? null,
        );
      }

      const now = new Date().toISOString();
      const stmt = stmts.get(
        'insert',
        `INSERT INTO word_relations
           (source_word_id, target_word_id, strength, relation_type, title, description, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      );
      const result = stmt.run(
        relation.source_word_id,
        relation.target_word_id,
        strength,
        relation.relation_type ?? null,
        relation.title ?? null,
        relation.description ?? '',
        now,
        now,
      );

      return {
        id: Number(result.lastInsertRowid),
        source_word_id: relation.source_word_id,
        target_word_id: relation.target_word_id,
        strength,
        relation_type: relation.relation_type ?? null,
        title: relation.title ?? null,
        description: relation.description ?? '',
        created_at: now,
        updated_at: now,
      };
    },

    update(id: number, update: RelationUpdate): RelationRow | null {
      const existing = this.findById(id);
      if (!existing) return null;

      const strength = update.strength ?? existing.strength;
      assertStrength(strength);

      const stmt = stmts.get(
        'update',
        `UPDATE word_relations
         SET strength = ?, title = ?, description = ?, updated_at = ?
         WHERE id = ?`,
      );
      const now = new Date().toISOString();
      const title = update.title !== undefined ? update.title : existing.title;
      const description = update.description ?? existing.description;
      stmt.run(strength, title, description, now, id);

      return { ...existing, strength, title, description, updated_at: now };
    },

    deleteById(id: number): boolean {
      const stmt = stmts.get('delete_by_id', 'DELETE FROM word_relations WHERE id = ?');
      return stmt.run(id).changes > 0;
    },

    count(): number {
      const stmt = stmts.get('count', 'SELECT COUNT(*) AS cnt FROM word_relations');
      return (stmt.get() as { cnt: number }).cnt;
    },

    countByType(): Record<string, number> {
      const stmt = stmts.get(
        'count_by_type',
        `SELECT COALESCE(relation_type, 'untyped') AS type, COUNT(*) AS cnt
         FROM word_relations
         GROUP BY COALESCE(relation_type, 'untyped')
         ORDER BY type`,
      );
      const rows = stmt.all() as Array<{ type: string; cnt: number }>;
      const counts: Record<string, number> = {};
      for (const row of rows) {
        counts[row.type] = row.cnt;
      }
      return counts;
    },
  };
}
