/**
 * Bulk import of words and relations from a JSON document.
 *
 * ```json
 * {
 *   "words": ["light", { "word": "dark", "description": "without light" }],
 *   "relations": [{ "source": "light", "target": "dark", "relation_type": "antonym" }]
 * }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { RELATION_TYPES, type ImportResult } from '../../shared/types.js';
import { GraphImportError, toError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import { normalizeWord } from '../../shared/word-text.js';
import type { DatabaseManager } from '../../data/database-manager.js';

const logger = createLogger('GraphImport');

const wordText = z.string().trim().min(1, 'word text must not be empty');

const wordEntrySchema = z.union([
  wordText,
  z.object({
    word: wordText,
    description: z.string().optional(),
  }),
]);

const relationEntrySchema = z.object({
  source: wordText,
  target: wordText,
  relation_type: z.enum(RELATION_TYPES).nullable().optional(),
  strength: z.number().min(0).max(1).optional(),
  title: z.string().nullable().optional(),
  description: z.string().optional(),
});

export const graphDocumentSchema = z.object({
  words: z.array(wordEntrySchema).default([]),
  relations: z.array(relationEntrySchema).default([]),
});

export type GraphDocument = z.infer<typeof graphDocumentSchema>;

/**
 * Parse and validate import JSON. `origin` names the input in error messages.
 */
export function parseGraphDocument(text: string, origin = 'input'): GraphDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new GraphImportError(`${origin} is not valid JSON`, toError(err));
  }

  const parsed = graphDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new GraphImportError(
      `Invalid graph document in ${origin}: ${where}: ${issue?.message ?? 'invalid value'}`,
    );
  }
  return parsed.data;
}

export async function readGraphDocument(filePath: string): Promise<GraphDocument> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new GraphImportError(`Cannot read import file ${filePath}`, toError(err));
  }
  return parseGraphDocument(text, filePath);
}

/**
 * Write a parsed document into the store in one transaction.
 * Relation endpoints that are not listed under `words` are created on the fly;
 * relations that already exist are skipped.
 */
export function importGraphDocument(db: DatabaseManager, doc: GraphDocument): ImportResult {
  const result: ImportResult = {
    words_created: 0,
    words_existing: 0,
    relations_created: 0,
    relations_skipped: 0,
  };

  db.transaction(() => {
    const ids = new Map<string, number>();

    const ensureWord = (text: string, description?: string): number => {
      const key = normalizeWord(text);
      const known = ids.get(key);
      if (known !== undefined) return known;

      const { row, created } = db.words.create({ word: text, description });
      if (created) result.words_created++;
      else result.words_existing++;
      ids.set(key, row.id);
      return row.id;
    };

    for (const entry of doc.words) {
      if (typeof entry === 'string') ensureWord(entry);
      else ensureWord(entry.word, entry.description);
    }

    doc.relations.forEach((rel, index) => {
      const sourceId = ensureWord(rel.source);
      const targetId = ensureWord(rel.target);
      if (sourceId === targetId) {
        throw new GraphImportError(
          `relations.${index}: "${rel.source}" cannot be related to itself`,
        );
      }

      const insert = {
        source_word_id: sourceId,
        target_word_id: targetId,
        strength: rel.strength,
        relation_type: rel.relation_type ?? null,
        title: rel.title ?? null,
        description: rel.description,
      };
      if (db.relations.findDuplicate(insert)) {
        result.relations_skipped++;
        return;
      }
      db.relations.create(insert);
      result.relations_created++;
    });
  });

  logger.info(
    `imported ${result.words_created} new word(s), ${result.relations_created} relation(s); ` +
      `${result.relations_skipped} duplicate relation(s) skipped`,
  );
  return result;
}
