import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  cleanConfig,
  configExists,
  loadConfig,
  resolveConfigPath,
  resolveDbPath,
  saveConfig,
} from './config.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, ConfigNotFoundError } from '../shared/errors.js';

describe('config', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'wordgraph-config-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  function writeRawConfig(text: string): void {
    mkdirSync(join(cwd, '.wordgraph'), { recursive: true });
    writeFileSync(resolveConfigPath(cwd), text, 'utf-8');
  }

  it('resolves paths under .wordgraph', () => {
    expect(resolveConfigPath(cwd)).toBe(join(cwd, '.wordgraph', 'config.json'));
    expect(resolveDbPath(cwd)).toBe(join(cwd, '.wordgraph', 'wordgraph.db'));
  });

  it('throws ConfigNotFoundError when no config exists', () => {
    expect(configExists(cwd)).toBe(false);
    expect(() => loadConfig(cwd)).toThrow(ConfigNotFoundError);
  });

  it('round-trips the defaults through saveConfig', () => {
    saveConfig(cwd, DEFAULT_CONFIG);

    expect(configExists(cwd)).toBe(true);
    expect(loadConfig(cwd)).toEqual(DEFAULT_CONFIG);
  });

  it('fills missing keys from the defaults', () => {
    writeRawConfig(JSON.stringify({ graph: { max_paths: 3 }, log: { file: '/tmp/wg.log' } }));

    const config = loadConfig(cwd);

    expect(config.graph).toEqual({ ...DEFAULT_CONFIG.graph, max_paths: 3 });
    expect(config.log).toEqual({ level: 'info', file: '/tmp/wg.log' });
  });

  it('accepts an empty object', () => {
    writeRawConfig('{}');
    expect(loadConfig(cwd)).toEqual(DEFAULT_CONFIG);
  });

  it('rejects malformed JSON', () => {
    writeRawConfig('{ graph: ');
    expect(() => loadConfig(cwd)).toThrow(ConfigError);
    expect(() => loadConfig(cwd)).toThrow(/^Failed to load config from /);
  });

  it('names the offending key for schema violations', () => {
    writeRawConfig(JSON.stringify({ graph: { max_nodes: 0 } }));
    expect(() => loadConfig(cwd)).toThrow(/: graph\.max_nodes: /);

    writeRawConfig(JSON.stringify({ log: { level: 'loud' } }));
    expect(() => loadConfig(cwd)).toThrow(/: log\.level: /);
  });

  it('rejects max_length below min_length', () => {
    writeRawConfig(JSON.stringify({ graph: { min_length: 4, max_length: 2 } }));
    expect(() => loadConfig(cwd)).toThrow('graph.max_length must be >= graph.min_length');
  });

  it('cleanConfig removes the directory', () => {
    saveConfig(cwd, DEFAULT_CONFIG);
    cleanConfig(cwd);
    expect(existsSync(join(cwd, '.wordgraph'))).toBe(false);
  });
});
