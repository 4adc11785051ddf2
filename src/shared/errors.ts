/**
 * wordgraph error hierarchy
 */

export class WordGraphError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'WordGraphError';
  }
}

// --- Config ---

export class ConfigError extends WordGraphError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Configuration not found: ${path}. Run 'wordgraph init' first.`);
    this.name = 'ConfigNotFoundError';
  }
}

export class EngineNotInitializedError extends WordGraphError {
  constructor() {
    super(
      'Word graph not initialized. Call initialize() or loadExisting() first.',
      'NOT_INITIALIZED',
    );
    this.name = 'EngineNotInitializedError';
  }
}

// --- Database ---

export class DatabaseError extends WordGraphError {
  constructor(message: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', cause);
    this.name = 'DatabaseError';
  }
}

export class MigrationError extends DatabaseError {
  constructor(version: number, cause?: Error) {
    super(`Migration to version ${version} failed`, cause);
    this.name = 'MigrationError';
  }
}

/**
 * The graph store could not be read. Raised from inside a traversal, which is
 * then abandoned as a whole.
 */
export class StoreUnavailableError extends WordGraphError {
  constructor(operation: string, cause?: Error) {
    super(`Word store unavailable during ${operation}`, 'STORE_UNAVAILABLE', cause);
    this.name = 'StoreUnavailableError';
  }
}

// --- Lookup ---

export class WordNotFoundError extends WordGraphError {
  constructor(identifier: string | number) {
    super(`Word not found: ${identifier}`, 'WORD_NOT_FOUND');
    this.name = 'WordNotFoundError';
  }
}

export class RelationNotFoundError extends WordGraphError {
  constructor(relationId: number) {
    super(`Relation not found: ${relationId}`, 'RELATION_NOT_FOUND');
    this.name = 'RelationNotFoundError';
  }
}

// --- Input ---

export class InvalidArgumentError extends WordGraphError {
  constructor(
    message: string,
    public readonly argument?: string,
  ) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export class DuplicateRelationError extends WordGraphError {
  constructor(sourceWordId: number, targetWordId: number, relationType: string | null) {
    super(
      `Relation already exists: ${sourceWordId} -[${relationType ?? 'untyped'}]-> ${targetWordId}`,
      'DUPLICATE_RELATION',
    );
    this.name = 'DuplicateRelationError';
  }
}

// --- Import ---

export class GraphImportError extends WordGraphError {
  constructor(message: string, cause?: Error) {
    super(message, 'IMPORT_ERROR', cause);
    this.name = 'GraphImportError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
