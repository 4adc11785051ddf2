import type Database from 'better-sqlite3';
import type { Statement } from 'better-sqlite3';

/**
 * Prepared statement cache.
 * Statements are compiled once per key and reused for the life of the connection.
 */
export class StatementCache {
  private cache: Map<string, Statement>;
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.cache = new Map();
  }

  /**
   * Fetch the statement for `key`, compiling `sql` on first use.
   */
  get(key: string, sql: string): Statement {
    let stmt = this.cache.get(key);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.cache.set(key, stmt);
    }
    return stmt;
  }

  /**
   * A view of this cache whose keys are prefixed with `namespace`, so that
   * repositories cannot collide on statement keys.
   */
  scope(namespace: string): Pick<StatementCache, 'get'> {
    return {
      get: (key: string, sql: string) => this.get(`${namespace}:${key}`, sql),
    };
  }

  /**
   * Run `fn` inside a single write transaction.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Drop every cached statement. Call before closing the connection.
   */
  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
