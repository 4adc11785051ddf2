import { describe, it, expect } from 'vitest';
import { getHintForCode, toErrorDisplay } from './error-display.js';
import { StoreUnavailableError, WordNotFoundError } from '../../../shared/errors.js';

describe('toErrorDisplay', () => {
  it('carries code, cause and hint for word graph errors', () => {
    const display = toErrorDisplay(
      new StoreUnavailableError('adjacency', new Error('database is locked')),
    );

    expect(display).toMatchObject({
      code: 'STORE_UNAVAILABLE',
      message: 'Word store unavailable during adjacency',
      cause: 'database is locked',
      hint: 'The word store could not be read. Retry, or check the database file.',
    });
  });

  it('keeps the message of plain errors without a code', () => {
    const display = toErrorDisplay(new RangeError('out of range'));
    expect(display.code).toBeUndefined();
    expect(display.message).toBe('out of range');
  });

  it('stringifies non-errors', () => {
    expect(toErrorDisplay(42)).toEqual({ message: '42' });
  });
});

describe('getHintForCode', () => {
  it('points at --by-id for missing words', () => {
    expect(getHintForCode(new WordNotFoundError('zebra').code)).toContain('--by-id');
  });

  it('has no hint for unknown codes', () => {
    expect(getHintForCode('SOMETHING_ELSE')).toBeUndefined();
  });
});
