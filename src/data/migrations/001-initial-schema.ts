import type { Migration } from '../types.js';
import { RELATION_TYPES } from '../../shared/types.js';

const RELATION_TYPE_LIST = RELATION_TYPES.map((t) => `'${t}'`).join(',');

const INITIAL_SCHEMA_SQL = `
-- schema_version
CREATE TABLE IF NOT EXISTS schema_version (
    version     INTEGER PRIMARY KEY,
    applied_at  TEXT    NOT NULL,
    description TEXT
);

-- words
CREATE TABLE IF NOT EXISTS words (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    word            TEXT    NOT NULL,
    normalized_word TEXT    NOT NULL UNIQUE,
    description     TEXT    NOT NULL DEFAULT '',
    created_at      TEXT    NOT NULL,
    updated_at      TEXT    NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_words_word ON words(word);

-- word_relations
CREATE TABLE IF NOT EXISTS word_relations (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    source_word_id  INTEGER NOT NULL
                            REFERENCES words(id) ON DELETE CASCADE,
    target_word_id  INTEGER NOT NULL
                            REFERENCES words(id) ON DELETE CASCADE,
    strength        REAL    NOT NULL DEFAULT 1.0
                            CHECK(strength >= 0.0 AND strength <= 1.0),
    relation_type   TEXT    CHECK(relation_type IS NULL OR relation_type IN (${RELATION_TYPE_LIST})),
    title           TEXT,
    description     TEXT    NOT NULL DEFAULT '',
    created_at      TEXT    NOT NULL,
    updated_at      TEXT    NOT NULL,
    CHECK(source_word_id <> target_word_id)
);

-- One relation per (source, target, type); untyped relations share the '' slot
CREATE UNIQUE INDEX IF NOT EXISTS idx_word_relations_pk
    ON word_relations(source_word_id, target_word_id, COALESCE(relation_type, ''));

CREATE INDEX IF NOT EXISTS idx_word_relations_source ON word_relations(source_word_id);
CREATE INDEX IF NOT EXISTS idx_word_relations_target ON word_relations(target_word_id);
CREATE INDEX IF NOT EXISTS idx_word_relations_type ON word_relations(relation_type);
`;

export const migration001: Migration = {
  version: 1,
  description: 'Create words and word_relations',
  up: (db) => {
    db.exec(INITIAL_SCHEMA_SQL);
    db.prepare(
      'INSERT INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)',
    ).run(1, new Date().toISOString(), 'Create words and word_relations');
  },
};
