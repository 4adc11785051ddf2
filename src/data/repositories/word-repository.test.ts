import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { StatementCache } from '../statement-cache.js';
import { runMigrations } from '../migrations/index.js';
import { createWordRepository } from './word-repository.js';
import type { WordRepository } from './word-repository.js';
import { InvalidArgumentError } from '../../shared/errors.js';

describe('WordRepository', () => {
  let db: Database.Database;
  let cache: StatementCache;
  let repo: WordRepository;

  beforeEach(() => {
    db = new Database(':memory:');
    db.pragma('foreign_keys = ON');
    runMigrations(db);
    cache = new StatementCache(db);
    repo = createWordRepository(cache);
  });

  afterEach(() => {
    cache.clear();
    db.close();
  });

  it('should create a word and find it by id', () => {
    const { row, created } = repo.create({ word: 'Lantern', description: 'a portable lamp' });

    expect(created).toBe(true);
    expect(row.word).toBe('Lantern');
    expect(row.normalized_word).toBe('lantern');
    expect(repo.findById(row.id)).toEqual(row);
  });

  it('should clean whitespace but keep case in the display form', () => {
    const { row } = repo.create({ word: '  ice   cream ' });

    expect(row.word).toBe('ice cream');
    expect(row.normalized_word).toBe('ice cream');
    expect(row.description).toBe('');
  });

  it('should return the existing row for a differently cased duplicate', () => {
    const first = repo.create({ word: 'Harbor' });
    const second = repo.create({ word: 'HARBOR', description: 'ignored' });

    expect(second.created).toBe(false);
    expect(second.row.id).toBe(first.row.id);
    expect(second.row.description).toBe('');
    expect(repo.count()).toBe(1);
  });

  it('should reject empty word text', () => {
    expect(() => repo.create({ word: '   ' })).toThrow(InvalidArgumentError);
    expect(repo.count()).toBe(0);
  });

  it('should find by text regardless of case and spacing', () => {
    const { row } = repo.create({ word: 'Night Owl' });

    expect(repo.findByText('night   owl')?.id).toBe(row.id);
    expect(repo.findByText('NIGHT OWL')?.id).toBe(row.id);
    expect(repo.findByText('day owl')).toBeNull();
  });

  it('should return null for a missing id', () => {
    expect(repo.findById(404)).toBeNull();
  });

  it('should list words sorted by normalized text by default', () => {
    repo.create({ word: 'cherry' });
    repo.create({ word: 'Apple' });
    repo.create({ word: 'banana' });

    expect(repo.findAll().map((w) => w.word)).toEqual(['Apple', 'banana', 'cherry']);
    expect(repo.findAll({ order: 'desc' }).map((w) => w.word)).toEqual([
      'cherry',
      'banana',
      'Apple',
    ]);
  });

  it('should list words by id with limit and offset', () => {
    repo.create({ word: 'one' });
    repo.create({ word: 'two' });
    repo.create({ word: 'three' });

    const page = repo.findAll({ sortBy: 'id', limit: 2, offset: 1 });

    expect(page.map((w) => w.word)).toEqual(['two', 'three']);
  });

  it('should update the description', () => {
    const { row } = repo.create({ word: 'anchor' });

    const updated = repo.updateDescription(row.id, 'holds a ship in place');

    expect(updated?.description).toBe('holds a ship in place');
    expect(repo.updateDescription(999, 'nothing')).toBeNull();
  });

  it('should delete by id', () => {
    const { row } = repo.create({ word: 'ephemeral' });

    expect(repo.deleteById(row.id)).toBe(true);
    expect(repo.deleteById(row.id)).toBe(false);
    expect(repo.findById(row.id)).toBeNull();
  });
});
