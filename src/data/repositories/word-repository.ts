import type { StatementCache } from '../statement-cache.js';
import type { WordRow, WordInsert } from '../types.js';
import { InvalidArgumentError } from '../../shared/errors.js';
import { cleanWord, normalizeWord } from '../../shared/word-text.js';

export interface WordRepository {
  findById(id: number): WordRow | null;
  findByText(text: string): WordRow | null;
  findAll(options?: {
    sortBy?: 'word' | 'created_at' | 'id';
    order?: 'asc' | 'desc';
    limit?: number;
    offset?: number;
  }): WordRow[];
  /**
   * Insert a word unless its normalized form is already present, in which case
   * the existing row is returned untouched.
   */
  create(word: WordInsert): { row: WordRow; created: boolean };
  updateDescription(id: number, description: string): WordRow | null;
  deleteById(id: number): boolean;
  count(): number;
}

export function createWordRepository(cache: StatementCache): WordRepository {
  const stmts = cache.scope('words');

  return {
    findById(id: number): WordRow | null {
      const stmt = stmts.get('select_by_id', 'SELECT * FROM words WHERE id = ?');
      return (stmt.get(id) as WordRow | undefined) ?? null;
    },

    findByText(text: string): WordRow | null {
      const stmt = stmts.get(
        'select_by_normalized',
        'SELECT * FROM words WHERE normalized_word = ?',
      );
      return (stmt.get(normalizeWord(text)) as WordRow | undefined) ?? null;
    },

    findAll(options?: {
      sortBy?: 'word' | 'created_at' | 'id';
      order?: 'asc' | 'desc';
      limit?: number;
      offset?: number;
    }): WordRow[] {
      // Column and direction come from closed sets, so they can be inlined.
      const sortCol = options?.sortBy === 'created_at' || options?.sortBy === 'id'
        ? options.sortBy
        : 'normalized_word';
      const sortOrder = options?.order === 'desc' ? 'desc' : 'asc';
      const limit = options?.limit ?? -1;
      const offset = options?.offset ?? 0;

      const stmt = stmts.get(
        `select_all_${sortCol}_${sortOrder}`,
        `SELECT * FROM words ORDER BY ${sortCol} ${sortOrder}, id ASC LIMIT ? OFFSET ?`,
      );
      return stmt.all(limit, offset) as WordRow[];
    },

    create(word: WordInsert): { row: WordRow; created: boolean } {
      const display = cleanWord(word.word);
      if (display === '') {
        throw new InvalidArgumentError('Word text must not be empty', 'word');
      }

      const existing = this.findByText(display);
      if (existing) {
        return { row: existing, created: false };
      }

      const now = new Date().toISOString();
      const stmt = stmts.get(
        'insert',
        `INSERT INTO words (word, normalized_word, description, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?)`,
      );
      const result = stmt.run(
        display,
        normalizeWord(display),
        word.description ?? '',
        now,
        now,
      );

      return {
        row: {
          id: Number(result.lastInsertRowid),
          word: display,
          normalized_word: normalizeWord(display),
          description: word.description ?? '',
          created_at: now,
          updated_at: now,
        },
        created: true,
      };
    },

    updateDescription(id: number, description: string): WordRow | null {
      const stmt = stmts.get(
        'update_description',
        'UPDATE words SET description = ?, updated_at = ? WHERE id = ?',
      );
      const result = stmt.run(description, new Date().toISOString(), id);
      if (result.changes === 0) return null;
      return this.findById(id);
    },

    deleteById(id: number): boolean {
      const stmt = stmts.get('delete_by_id', 'DELETE FROM words WHERE id = ?');
      return stmt.run(id).changes > 0;
    },

    count(): number {
      const stmt = stmts.get('count', 'SELECT COUNT(*) AS cnt FROM words');
      return (stmt.get() as { cnt: number }).cnt;
    },
  };
}
