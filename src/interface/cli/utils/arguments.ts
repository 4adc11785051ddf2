/**
 * Commander argument parsers
 */

import { InvalidArgumentError as CommanderArgumentError } from 'commander';
import { InvalidArgumentError } from '../../../shared/errors.js';
import { isRelationType, RELATION_TYPES } from '../../../shared/types.js';
import type { RelationType, WordRef } from '../../../shared/types.js';

/** Range checks are left to the engine so CLI and MCP report them alike. */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new CommanderArgumentError('Not an integer.');
  }
  return Number.parseInt(value, 10);
}

export function parseStrength(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new CommanderArgumentError('Not a number.');
  }
  return n;
}

export function parseRelationType(value: string): RelationType {
  if (!isRelationType(value)) {
    throw new CommanderArgumentError(`Expected one of: ${RELATION_TYPES.join(', ')}.`);
  }
  return value;
}

/**
 * With `--by-id` a word argument must be a positive integer id; otherwise it
 * is looked up as text.
 */
export function toWordRef(value: string, byId: boolean, argument = 'word'): WordRef {
  if (!byId) return value;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) <= 0) {
    throw new InvalidArgumentError(`${argument} must be a word id with --by-id, got "${value}"`, argument);
  }
  return Number(trimmed);
}
