import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  configureLogger,
  createLogger,
  formatMessage,
  getLogLevel,
  isLogLevel,
} from './logger.js';

describe('logger', () => {
  afterEach(() => {
    configureLogger({ level: 'info' });
    vi.restoreAllMocks();
  });

  it('formats level tag, message and extra arguments', () => {
    const line = formatMessage('warn', 'slow query', ['words', { ms: 12 }]);
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN  slow query words \{"ms":12\}$/);
  });

  it('renders Error arguments by their message', () => {
    const line = formatMessage('error', 'import failed:', [new Error('bad row')]);
    expect(line).toMatch(/ ERROR import failed: bad row$/);
  });

  it('writes prefixed messages at or above the configured level to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    configureLogger({ level: 'warn' });
    const logger = createLogger('test');

    logger.info('hidden');
    logger.warn('shown');

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toMatch(/WARN  \[test\] shown\n$/);
  });

  it('keeps the level when none is given', () => {
    configureLogger({ level: 'debug' });
    configureLogger({});
    expect(getLogLevel()).toBe('debug');
  });

  it('recognizes log level names', () => {
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(1)).toBe(false);
  });
});
