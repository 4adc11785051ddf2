/**
 * 3-layer error display: Error / Cause / Hint
 */

import { formatDim, formatError, formatHint } from './formatter.js';
import { printJsonError } from './json-output.js';
import type { GlobalOptions } from '../utils/global-options.js';
import { WordGraphError } from '../../../shared/errors.js';

export interface ErrorDisplay {
  code?: string;
  message: string;
  cause?: string;
  hint?: string;
  stack?: string;
}

export function toErrorDisplay(error: unknown): ErrorDisplay {
  if (error instanceof WordGraphError) {
    return {
      code: error.code,
      message: error.message,
      cause: error.cause?.message,
      hint: getHintForCode(error.code),
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return {
      message: error.message,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function getHintForCode(code: string): string | undefined {
  switch (code) {
    case 'CONFIG_ERROR':
      return "Check .wordgraph/config.json, or run 'wordgraph init --force' to reset it.";
    case 'NOT_INITIALIZED':
      return "Run 'wordgraph init' first.";
    case 'DATABASE_ERROR':
      return 'Check that .wordgraph/wordgraph.db is readable and not locked by another process.';
    case 'STORE_UNAVAILABLE':
      return 'The word store could not be read. Retry, or check the database file.';
    case 'WORD_NOT_FOUND':
      return "Check the spelling, or pass --by-id with a numeric word id.";
    case 'RELATION_NOT_FOUND':
      return "List relations with 'wordgraph relations <word>'.";
    case 'INVALID_ARGUMENT':
      return 'Check the option values; see --help for accepted ranges.';
    case 'DUPLICATE_RELATION':
      return 'Use a different relation type, or update the existing relation.';
    case 'IMPORT_ERROR':
      return 'Check the import file: { "words": [...], "relations": [...] }.';
    default:
      return undefined;
  }
}

export function renderError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): void {
  if (globals.json) {
    printJsonError({
      code: error.code,
      message: error.message,
      cause: error.cause,
      hint: error.hint,
    });
    return;
  }

  const lines: string[] = [];
  lines.push(formatError(error.message));

  if (error.cause) {
    lines.push(`  Cause: ${error.cause}`);
  }

  if (error.hint) {
    lines.push(`  ${formatHint(error.hint)}`);
  }

  if (globals.verbose && error.stack) {
    lines.push('');
    lines.push(formatDim(error.stack));
  }

  process.stderr.write(lines.join('\n') + '\n');
}

export function exitWithError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): never {
  renderError(error, globals);
  process.exit(1);
}

export function handleCommandError(error: unknown, globals: GlobalOptions): never {
  exitWithError(toErrorDisplay(error), globals);
}
