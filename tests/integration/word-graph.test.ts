/**
 * Integration tests: engine against a real project directory
 *
 * Drives WordGraphEngine through init, writes, import and both traversals,
 * with the SQLite store on disk under a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import Database from 'better-sqlite3';
import { WordGraphEngine, createWordGraphEngine } from '../../src/core/engine.js';
import {
  DuplicateRelationError,
  EngineNotInitializedError,
  InvalidArgumentError,
  RelationNotFoundError,
  StoreUnavailableError,
  WordNotFoundError,
} from '../../src/shared/errors.js';

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'wordgraph-it-'));
}

describe('Word graph - integration', () => {
  let tmpDir: string;
  let engine: WordGraphEngine;

  beforeEach(() => {
    tmpDir = createTempDir();
    engine = new WordGraphEngine(tmpDir);
  });

  afterEach(async () => {
    await engine.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  /** A -> B (synonym, 0.9), B -> C (derivation, 0.7), A -> D (antonym, 0.5) */
  async function seedSample() {
    await engine.initialize();
    const a = engine.addWord({ word: 'alpha' }).word.id;
    const b = engine.addWord({ word: 'beta' }).word.id;
    const c = engine.addWord({ word: 'gamma' }).word.id;
    const d = engine.addWord({ word: 'delta' }).word.id;
    const ab = engine.addRelation({ source: a, target: b, strength: 0.9, relation_type: 'synonym' });
    const bc = engine.addRelation({
      source: b,
      target: c,
      strength: 0.7,
      relation_type: 'derivation',
    });
    const ad = engine.addRelation({ source: a, target: d, strength: 0.5, relation_type: 'antonym' });
    return { a, b, c, d, ab: ab.id, bc: bc.id, ad: ad.id };
  }

  // -------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------

  it('should create config and database on initialize', async () => {
    const result = await engine.initialize();

    expect(result.created).toBe(true);
    expect(fs.existsSync(result.config_path)).toBe(true);
    expect(fs.existsSync(result.db_path)).toBe(true);
    expect(engine.configExists()).toBe(true);
  });

  it('should keep an existing config on a second initialize', async () => {
    await engine.initialize();
    await engine.close();

    const again = new WordGraphEngine(tmpDir);
    const result = await again.initialize();
    await again.close();

    expect(result.created).toBe(false);
  });

  it('should start from an empty store on a forced initialize', async () => {
    await seedSample();

    const result = await engine.initialize({ force: true });

    expect(result.created).toBe(true);
    expect(engine.getStatus().total_words).toBe(0);
  });

  it('should reject calls before initialization', () => {
    expect(() => engine.getStatus()).toThrow(EngineNotInitializedError);
  });

  it('should reopen persisted data with createWordGraphEngine', async () => {
    await seedSample();
    await engine.close();

    engine = await createWordGraphEngine(tmpDir);

    expect(engine.initialized).toBe(true);
    expect(engine.getWord('gamma').word).toBe('gamma');
    expect(engine.getStatus().total_relations).toBe(3);
  });

  it('should leave the engine unopened when no config exists', async () => {
    engine = await createWordGraphEngine(tmpDir);
    expect(engine.initialized).toBe(false);
  });

  // -------------------------------------------------------
  // Paths
  // -------------------------------------------------------

  it('should find alpha -> beta -> gamma', async () => {
    const ids = await seedSample();

    const result = await engine.findPaths({ source: 'alpha', target: 'gamma', max_length: 5 });

    expect(result.total_found).toBe(1);
    expect(result.source.id).toBe(ids.a);
    expect(result.target.id).toBe(ids.c);
    expect(result.paths).toEqual([
      {
        words: [
          { id: ids.a, word: 'alpha', normalized_word: 'alpha' },
          { id: ids.b, word: 'beta', normalized_word: 'beta' },
          { id: ids.c, word: 'gamma', normalized_word: 'gamma' },
        ],
        path: [ids.a, ids.b, ids.c],
        relations: [ids.ab, ids.bc],
        length: 2,
        total_strength: expect.closeTo(0.63, 10),
      },
    ]);
  });

  it('should return no paths for an unreachable word', async () => {
    await seedSample();
    engine.addWord({ word: 'omega' });

    const result = await engine.findPaths({ source: 'alpha', target: 'omega' });

    expect(result.paths).toEqual([]);
    expect(result.total_found).toBe(0);
  });

  it('should check bounds before resolving words', async () => {
    await seedSample();

    await expect(
      engine.findPaths({ source: 'nowhere', target: 'alpha', max_paths: 0 }),
    ).rejects.toThrow(InvalidArgumentError);
    await expect(engine.findPaths({ source: 'nowhere', target: 'alpha' })).rejects.toThrow(
      WordNotFoundError,
    );
  });

  // -------------------------------------------------------
  // Neighborhood
  // -------------------------------------------------------

  it('should project the first level around alpha', async () => {
    const ids = await seedSample();

    const result = await engine.getNeighborhood({ word: 'alpha', max_level: 1 });

    expect(result.center.id).toBe(ids.a);
    expect(result.nodes).toEqual([
      { id: ids.a, word: 'alpha', level: 0 },
      { id: ids.b, word: 'beta', level: 1 },
      { id: ids.d, word: 'delta', level: 1 },
    ]);
    expect(result.edges).toEqual([
      {
        relation_id: ids.ab,
        source: ids.a,
        target: ids.b,
        level: 1,
        direction: 'outgoing',
        strength: 0.9,
        relation_type: 'synonym',
      },
      {
        relation_id: ids.ad,
        source: ids.a,
        target: ids.d,
        level: 1,
        direction: 'outgoing',
        strength: 0.5,
        relation_type: 'antonym',
      },
    ]);
    expect(result.truncated).toBe(false);
  });

  it('should return only the center for an isolated word', async () => {
    await engine.initialize();
    const id = engine.addWord({ word: 'hermit' }).word.id;

    const result = await engine.getNeighborhood({ word: id });

    expect(result.nodes).toEqual([{ id, word: 'hermit', level: 0 }]);
    expect(result.edges).toEqual([]);
  });

  // -------------------------------------------------------
  // Words and relations
  // -------------------------------------------------------

  it('should report word lookups on a broken store as StoreUnavailableError', async () => {
    await seedSample();
    const other = new Database(path.join(tmpDir, '.wordgraph', 'wordgraph.db'));
    other.exec('DROP TABLE word_relations; DROP TABLE words;');
    other.close();

    expect(() => engine.getWord('alpha')).toThrow(StoreUnavailableError);
    await expect(engine.findPaths({ source: 'alpha', target: 'gamma' })).rejects.toThrow(
      'Word store unavailable during resolveWord',
    );
  });

  it('should deduplicate words by normalized text', async () => {
    await engine.initialize();
    const first = engine.addWord({ word: 'Ocean' });
    const second = engine.addWord({ word: '  OCEAN ' });

    expect(second.created).toBe(false);
    expect(second.word.id).toBe(first.word.id);
    expect(engine.listWords().map((w) => w.word)).toEqual(['Ocean']);
  });

  it('should resolve a numeric string as an id when no word matches', async () => {
    const ids = await seedSample();
    expect(engine.getWord(String(ids.b)).word).toBe('beta');
  });

  it('should reject duplicate relations', async () => {
    await seedSample();

    expect(() =>
      engine.addRelation({ source: 'alpha', target: 'beta', relation_type: 'synonym' }),
    ).toThrow(DuplicateRelationError);
  });

  it('should list relations by direction', async () => {
    const ids = await seedSample();

    const out = engine.listRelations({ word: 'beta', direction: 'outgoing' });
    const incoming = engine.listRelations({ word: 'beta', direction: 'incoming' });
    const both = engine.listRelations({ word: 'beta' });

    expect(out.relations.map((r) => r.id)).toEqual([ids.bc]);
    expect(incoming.relations.map((r) => r.id)).toEqual([ids.ab]);
    expect(both.total).toBe(2);
    expect(both.relations[0]?.source.word).toBe('alpha');
  });

  it('should return relations between two words in one direction', async () => {
    const ids = await seedSample();

    expect(engine.getRelationsBetween('alpha', 'beta').map((r) => r.id)).toEqual([ids.ab]);
    expect(engine.getRelationsBetween('beta', 'alpha')).toEqual([]);
  });

  it('should update and delete relations', async () => {
    const ids = await seedSample();

    const updated = engine.updateRelation(ids.ab, { strength: 0.2, description: 'loose' });
    expect(updated).toMatchObject({ strength: 0.2, description: 'loose', relation_type: 'synonym' });

    engine.deleteRelation(ids.ab);
    expect(() => engine.getRelation(ids.ab)).toThrow(RelationNotFoundError);
    expect(() => engine.deleteRelation(ids.ab)).toThrow(RelationNotFoundError);
  });

  it('should remove relations with a deleted word', async () => {
    await seedSample();

    const result = engine.deleteWord('alpha');

    expect(result.word.word).toBe('alpha');
    expect(result.relations_removed).toBe(2);
    expect(engine.getStatus().total_relations).toBe(1);
    expect(() => engine.getWord('alpha')).toThrow(WordNotFoundError);
  });

  // -------------------------------------------------------
  // Import and status
  // -------------------------------------------------------

  it('should import a graph file and traverse it', async () => {
    await engine.initialize();
    const file = path.join(tmpDir, 'graph.json');
    fs.writeFileSync(
      file,
      JSON.stringify({
        words: ['big', 'large'],
        relations: [
          { source: 'big', target: 'large', relation_type: 'synonym', strength: 0.8 },
          { source: 'large', target: 'huge', relation_type: 'related', strength: 0.5 },
        ],
      }),
      'utf-8',
    );

    const result = await engine.importGraph(file);

    expect(result).toEqual({
      words_created: 3,
      words_existing: 0,
      relations_created: 2,
      relations_skipped: 0,
    });
    const paths = await engine.findPaths({ source: 'big', target: 'huge' });
    expect(paths.paths.map((p) => p.words.map((w) => w.word))).toEqual([['big', 'large', 'huge']]);
    expect(paths.paths[0]?.total_strength).toBeCloseTo(0.4, 10);
  });

  it('should report status counts', async () => {
    await seedSample();

    const status = engine.getStatus();

    expect(status.initialized).toBe(true);
    expect(status.total_words).toBe(4);
    expect(status.total_relations).toBe(3);
    expect(status.relations_by_type).toEqual({ antonym: 1, derivation: 1, synonym: 1 });
    expect(status.db_size_bytes).toBeGreaterThan(0);
  });

  it('should apply neighborhood limits from config', async () => {
    await engine.initialize();
    const configPath = path.join(tmpDir, '.wordgraph', 'config.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({ graph: { max_nodes_limit: 2 } }),
      'utf-8',
    );
    await engine.close();
    engine = await createWordGraphEngine(tmpDir);

    engine.addWord({ word: 'hub' });
    for (const leaf of ['one', 'two', 'three']) {
      engine.addRelation({
        source: engine.addWord({ word: 'hub' }).word.id,
        target: engine.addWord({ word: leaf }).word.id,
      });
    }

    const result = await engine.getNeighborhood({ word: 'hub', max_nodes: 50 });

    expect(result.nodes.map((n) => n.word)).toEqual(['hub', 'one']);
    expect(result.truncated).toBe(true);
  });
});
