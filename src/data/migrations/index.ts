import type Database from 'better-sqlite3';
import type { Migration } from '../types.js';
import { MigrationError, toError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import { migration001 } from './001-initial-schema.js';

const migrations: Migration[] = [migration001];

const logger = createLogger('migrations');

/**
 * Apply every migration newer than the recorded schema version, each in its
 * own transaction. Returns the versions that were applied.
 */
export function runMigrations(
  db: Database.Database,
  available: Migration[] = migrations,
): number[] {
  const currentVersion = getSchemaVersion(db);
  const pending = available
    .filter((m) => m.version > currentVersion)
    .sort((a, b) => a.version - b.version);

  const applied: number[] = [];
  for (const migration of pending) {
    try {
      db.transaction(() => {
        migration.up(db);
      })();
    } catch (err) {
      throw new MigrationError(migration.version, toError(err));
    }
    logger.debug(`Applied migration ${migration.version}: ${migration.description}`);
    applied.push(migration.version);
  }
  return applied;
}

export function getSchemaVersion(db: Database.Database): number {
  const tableExists = db
    .prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'",
    )
    .get() as { name: string } | undefined;

  if (!tableExists) {
    return 0;
  }

  const row = db
    .prepare('SELECT MAX(version) AS max_version FROM schema_version')
    .get() as { max_version: number | null } | undefined;

  return row?.max_version ?? 0;
}

export { migrations };
