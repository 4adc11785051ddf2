/**
 * WordGraphEngine - Core Layer facade
 *
 * The CLI and the MCP server reach the store and the traversals only through
 * this class. Words may be referenced by id or by text everywhere.
 */

import type { WordGraphConfig } from '../config/types.js';
import {
  loadConfig,
  saveConfig,
  configExists as configExistsOnDisk,
  cleanConfig as cleanConfigOnDisk,
  resolveConfigPath,
  resolveDbPath,
} from '../config/config.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type {
  AddRelationInput,
  AddWordInput,
  FindPathsInput,
  FindPathsOutput,
  GetNeighborhoodInput,
  GetNeighborhoodOutput,
  ImportResult,
  InitResult,
  ListRelationsInput,
  ListRelationsOutput,
  RelationId,
  RelationInfo,
  StatusOutput,
  UpdateRelationInput,
  WordDetail,
  WordRef,
  WordSummary,
} from '../shared/types.js';
import {
  EngineNotInitializedError,
  RelationNotFoundError,
  WordNotFoundError,
} from '../shared/errors.js';
import { DatabaseManager } from '../data/database-manager.js';
import { readStore } from '../data/services/graph-accessor.js';
import type { RelationRow, WordRow } from '../data/types.js';
import { PathFinder, resolvePathBounds } from './graph/path-finder.js';
import { NeighborhoodProjector } from './graph/neighborhood-projector.js';
import { importGraphDocument, readGraphDocument } from './importer/graph-import.js';
import {
  configureLogger,
  createLogger,
  closeLogger,
  type Logger,
  type LogLevel,
} from '../shared/logger.js';

export interface EngineOptions {
  /** Overrides `log.level` from the config file. */
  logLevel?: LogLevel;
}

export interface InitOptions {
  /** Remove an existing `.wordgraph/` (config and database) first. */
  force?: boolean;
}

export interface ListWordsOptions {
  limit?: number;
  offset?: number;
}

interface EngineState {
  config: WordGraphConfig;
  db: DatabaseManager;
  pathFinder: PathFinder;
  projector: NeighborhoodProjector;
}

function toSummary(row: WordRow): WordSummary {
  return { id: row.id, word: row.word, normalized_word: row.normalized_word };
}

function toDetail(row: WordRow): WordDetail {
  return {
    ...toSummary(row),
    description: row.description,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export class WordGraphEngine {
  private state: EngineState | null = null;
  private readonly cwd: string;
  private readonly options: EngineOptions;
  private readonly logger: Logger;

  constructor(cwd: string, options: EngineOptions = {}) {
    this.cwd = cwd;
    this.options = options;
    this.logger = createLogger('WordGraphEngine');
    if (options.logLevel) {
      configureLogger({ level: options.logLevel });
    }
  }

  // --- Lifecycle ---

  /**
   * Create `.wordgraph/` with a default config (unless one exists) and open
   * the database, running migrations.
   */
  async initialize(options: InitOptions = {}): Promise<InitResult> {
    const configPath = resolveConfigPath(this.cwd);
    if (options.force === true) {
      await this.cleanConfig();
    }
    const created = !configExistsOnDisk(this.cwd);

    if (created) {
      this.logger.info(`Initializing word graph in ${this.cwd}`);
      saveConfig(this.cwd, DEFAULT_CONFIG);
    }

    await this.loadExisting();

    return {
      config_path: configPath,
      db_path: resolveDbPath(this.cwd),
      created,
    };
  }

  /**
   * Open an existing project (for use by createWordGraphEngine).
   */
  async loadExisting(): Promise<void> {
    if (this.state) return;

    const config = loadConfig(this.cwd);
    configureLogger({
      level: this.options.logLevel ?? config.log.level,
      file: config.log.file,
    });

    const db = new DatabaseManager({ dbPath: resolveDbPath(this.cwd) });
    db.initialize();

    this.state = {
      config,
      db,
      pathFinder: new PathFinder(db.graph),
      projector: new NeighborhoodProjector(db.graph, {
        maxLevelLimit: config.graph.max_level_limit,
        maxNodesLimit: config.graph.max_nodes_limit,
      }),
    };
  }

  get initialized(): boolean {
    return this.state !== null;
  }

  configExists(): boolean {
    return configExistsOnDisk(this.cwd);
  }

  getConfig(): WordGraphConfig {
    return this.requireState().config;
  }

  /**
   * Close the database and delete `.wordgraph/`.
   */
  async cleanConfig(): Promise<void> {
    await this.close();
    cleanConfigOnDisk(this.cwd);
  }

  async close(): Promise<void> {
    if (this.state) {
      this.state.db.close();
      this.state = null;
    }
    closeLogger();
  }

  // --- Words ---

  addWord(input: AddWordInput): { word: WordDetail; created: boolean } {
    const { db } = this.requireState();
    const { row, created } = db.words.create({
      word: input.word,
      description: input.description,
    });
    if (created) {
      this.logger.debug(`added word ${row.id} "${row.word}"`);
    }
    return { word: toDetail(row), created };
  }

  getWord(ref: WordRef): WordDetail {
    return toDetail(this.resolveWord(ref));
  }

  listWords(options: ListWordsOptions = {}): WordDetail[] {
    const { db } = this.requireState();
    return db.words
      .findAll({ sortBy: 'word', limit: options.limit, offset: options.offset })
      .map(toDetail);
  }

  /**
   * Delete a word and, through the cascade, every relation touching it.
   */
  deleteWord(ref: WordRef): { word: WordSummary; relations_removed: number } {
    const { db } = this.requireState();
    const row = this.resolveWord(ref);
    return db.transaction(() => {
      const relationsRemoved = db.relations.findIncident(row.id).length;
      db.words.deleteById(row.id);
      return { word: toSummary(row), relations_removed: relationsRemoved };
    });
  }

  // --- Relations ---

  addRelation(input: AddRelationInput): RelationInfo {
    const { db } = this.requireState();
    const source = this.resolveWord(input.source);
    const target = this.resolveWord(input.target);
    const row = db.relations.create({
      source_word_id: source.id,
      target_word_id: target.id,
      strength: input.strength,
      relation_type: input.relation_type ?? null,
      title: input.title ?? null,
      description: input.description,
    });
    return this.toRelationInfo(row);
  }

  getRelation(id: RelationId): RelationInfo {
    const { db } = this.requireState();
    const row = db.relations.findById(id);
    if (!row) throw new RelationNotFoundError(id);
    return this.toRelationInfo(row);
  }

  updateRelation(id: RelationId, input: UpdateRelationInput): RelationInfo {
    const { db } = this.requireState();
    const row = db.relations.update(id, input);
    if (!row) throw new RelationNotFoundError(id);
    return this.toRelationInfo(row);
  }

  deleteRelation(id: RelationId): void {
    const { db } = this.requireState();
    if (!db.relations.deleteById(id)) {
      throw new RelationNotFoundError(id);
    }
  }

  /** Relations stored from `source` to `target`, in that direction only. */
  getRelationsBetween(source: WordRef, target: WordRef): RelationInfo[] {
    const { db } = this.requireState();
    const s = this.resolveWord(source);
    const t = this.resolveWord(target);
    return db.relations.findBetween(s.id, t.id).map((row) => this.toRelationInfo(row));
  }

  listRelations(input: ListRelationsInput): ListRelationsOutput {
    const { db } = this.requireState();
    const word = this.resolveWord(input.word);
    const direction = input.direction ?? 'both';

    let rows: RelationRow[];
    if (direction === 'outgoing') rows = db.relations.findBySource(word.id);
    else if (direction === 'incoming') rows = db.relations.findByTarget(word.id);
    else rows = db.relations.findIncident(word.id);

    const relations = rows.map((row) => this.toRelationInfo(row));
    return { word: toSummary(word), relations, total: relations.length };
  }

  // --- Traversal ---

  async findPaths(input: FindPathsInput): Promise<FindPathsOutput> {
    const { config, pathFinder } = this.requireState();

    // Bounds are checked before either word is looked up.
    const bounds = resolvePathBounds({
      maxPaths: input.max_paths ?? config.graph.max_paths,
      minLength: input.min_length ?? config.graph.min_length,
      maxLength: input.max_length ?? config.graph.max_length,
    });

    const source = this.resolveWord(input.source);
    const target = this.resolveWord(input.target);

    const paths = await pathFinder.findPaths(source.id, target.id, bounds);
    const lookup = this.wordLookup();

    return {
      source: toSummary(source),
      target: toSummary(target),
      paths: paths.map((p) => ({
        words: p.path.map(lookup),
        path: p.path,
        relations: p.relations,
        length: p.length,
        total_strength: p.totalStrength,
      })),
      total_found: paths.length,
    };
  }

  async getNeighborhood(input: GetNeighborhoodInput): Promise<GetNeighborhoodOutput> {
    const { config, projector } = this.requireState();
    const center = this.resolveWord(input.word);

    const subgraph = await projector.project(center.id, {
      maxLevel: input.max_level ?? config.graph.max_level,
      maxNodes: input.max_nodes ?? config.graph.max_nodes,
      maxEdgesPerNode: input.max_edges_per_node ?? config.graph.max_edges_per_node,
    });
    const lookup = this.wordLookup();

    return {
      center: toSummary(center),
      nodes: subgraph.nodeIds.map((id) => ({
        id,
        word: lookup(id).word,
        level: subgraph.nodeLevels.get(id) ?? 0,
      })),
      edges: subgraph.edges.map((e) => ({
        relation_id: e.relationId,
        source: e.source,
        target: e.target,
        level: e.level,
        direction: e.direction,
        strength: e.strength,
        relation_type: e.relationType,
      })),
      truncated: subgraph.truncated,
    };
  }

  // --- Import ---

  async importGraph(filePath: string): Promise<ImportResult> {
    const { db } = this.requireState();
    const doc = await readGraphDocument(filePath);
    return importGraphDocument(db, doc);
  }

  // --- Status ---

  getStatus(): StatusOutput {
    const { db } = this.requireState();
    return {
      initialized: true,
      total_words: db.words.count(),
      total_relations: db.relations.count(),
      relations_by_type: db.relations.countByType(),
      db_size_bytes: db.fileSize(),
    };
  }

  // --- Internal helpers ---

  private requireState(): EngineState {
    if (!this.state) {
      throw new EngineNotInitializedError();
    }
    return this.state;
  }

  /**
   * Numbers are ids; strings are matched on their normalized form, and a
   * string of digits that matches no word falls back to an id lookup.
   */
  private resolveWord(ref: WordRef): WordRow {
    const { db } = this.requireState();
    const row = readStore('resolveWord', () => {
      if (typeof ref === 'number') return db.words.findById(ref);
      const byText = db.words.findByText(ref);
      if (byText || !/^\d+$/.test(ref.trim())) return byText;
      return db.words.findById(Number(ref.trim()));
    });
    if (!row) throw new WordNotFoundError(ref);
    return row;
  }

  /** Memoized id -> summary lookup for decorating traversal results. */
  private wordLookup(): (id: number) => WordSummary {
    const { db } = this.requireState();
    const cache = new Map<number, WordSummary>();
    return (id: number) => {
      const cached = cache.get(id);
      if (cached) return cached;
      const row = readStore('getWord', () => db.words.findById(id));
      if (!row) throw new WordNotFoundError(id);
      const summary = toSummary(row);
      cache.set(id, summary);
      return summary;
    };
  }

  private toRelationInfo(row: RelationRow): RelationInfo {
    const lookup = this.wordLookup();
    return {
      id: row.id,
      source: lookup(row.source_word_id),
      target: lookup(row.target_word_id),
      strength: row.strength,
      relation_type: row.relation_type,
      title: row.title,
      description: row.description,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }
}

export async function createWordGraphEngine(
  cwd: string,
  options?: EngineOptions,
): Promise<WordGraphEngine> {
  const engine = new WordGraphEngine(cwd, options);
  if (configExistsOnDisk(cwd)) {
    await engine.loadExisting();
  }
  return engine;
}
