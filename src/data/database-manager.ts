import Database from 'better-sqlite3';
import { DatabaseError, toError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { StatementCache } from './statement-cache.js';
import { runMigrations } from './migrations/index.js';
import {
  createWordRepository,
  type WordRepository,
} from './repositories/word-repository.js';
import {
  createRelationRepository,
  type RelationRepository,
} from './repositories/relation-repository.js';
import { createGraphAccessor } from './services/graph-accessor.js';
import type { GraphAccessor } from '../core/graph/types.js';

const logger = createLogger('DatabaseManager');

export interface DatabaseManagerOptions {
  dbPath: string;
  readonly?: boolean;
}

export class DatabaseManager {
  private db: Database.Database | null = null;
  private statementCache: StatementCache | null = null;
  private readonly dbPath: string;
  private readonly readonlyMode: boolean;

  private _wordRepo: WordRepository | null = null;
  private _relationRepo: RelationRepository | null = null;
  private _graphAccessor: GraphAccessor | null = null;

  constructor(options: DatabaseManagerOptions) {
    this.dbPath = options.dbPath;
    this.readonlyMode = options.readonly ?? false;
  }

  /**
   * Open the connection, apply pragmas and run pending migrations.
   */
  initialize(): void {
    try {
      this.db = new Database(this.dbPath, {
        readonly: this.readonlyMode,
      });

      if (!this.readonlyMode) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('cache_size = -16000');
      this.db.pragma('temp_store = MEMORY');
      this.db.pragma('foreign_keys = ON');

      if (!this.readonlyMode) {
        const applied = runMigrations(this.db);
        if (applied.length > 0) {
          logger.debug(`applied migrations ${applied.join(', ')} to ${this.dbPath}`);
        }
      }

      this.statementCache = new StatementCache(this.db);
    } catch (err) {
      if (this.db?.open) this.db.close();
      this.db = null;
      throw new DatabaseError(
        `Failed to initialize database at ${this.dbPath}`,
        toError(err),
      );
    }
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  getDb(): Database.Database {
    if (!this.db) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  getStatementCache(): StatementCache {
    if (!this.statementCache) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.statementCache;
  }

  // --- Repository accessors ---

  get words(): WordRepository {
    if (!this._wordRepo) {
      this._wordRepo = createWordRepository(this.getStatementCache());
    }
    return this._wordRepo;
  }

  get relations(): RelationRepository {
    if (!this._relationRepo) {
      this._relationRepo = createRelationRepository(this.getStatementCache());
    }
    return this._relationRepo;
  }

  /** Read-only traversal view over the word and relation tables. */
  get graph(): GraphAccessor {
    if (!this._graphAccessor) {
      this._graphAccessor = createGraphAccessor(this.words, this.relations);
    }
    return this._graphAccessor;
  }

  /**
   * Run `fn` in one write transaction. A throw rolls every write back.
   */
  transaction<T>(fn: () => T): T {
    return this.getStatementCache().transaction(fn);
  }

  /** Database size in bytes (page_count * page_size). */
  fileSize(): number {
    const db = this.getDb();
    const pageCount = db.pragma('page_count', { simple: true });
    const pageSize = db.pragma('page_size', { simple: true });
    return typeof pageCount === 'number' && typeof pageSize === 'number'
      ? pageCount * pageSize
      : 0;
  }

  /**
   * Checkpoint the WAL and close the connection.
   */
  close(): void {
    if (!this.db) return;

    try {
      this._wordRepo = null;
      this._relationRepo = null;
      this._graphAccessor = null;

      if (this.statementCache) {
        this.statementCache.clear();
        this.statementCache = null;
      }

      if (!this.readonlyMode) {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
      }

      this.db.close();
      this.db = null;
    } catch (err) {
      throw new DatabaseError('Failed to close database', toError(err));
    }
  }
}
