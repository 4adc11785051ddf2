/**
 * Configuration loading and validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { WordGraphConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, ConfigNotFoundError } from '../shared/errors.js';
import { LOG_LEVELS } from '../shared/logger.js';

const CONFIG_DIR = '.wordgraph';
const CONFIG_FILE = 'config.json';
const DB_FILE = 'wordgraph.db';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const configFileSchema = z.object({
  graph: z
    .object({
      max_paths: positiveInt,
      min_length: nonNegativeInt,
      max_length: nonNegativeInt,
      max_level: positiveInt,
      max_nodes: positiveInt,
      max_edges_per_node: nonNegativeInt,
      max_level_limit: positiveInt,
      max_nodes_limit: positiveInt,
    })
    .partial()
    .optional(),
  log: z
    .object({
      level: z.enum(LOG_LEVELS),
      file: z.string().nullable(),
    })
    .partial()
    .optional(),
});

type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Resolve the .wordgraph directory path from a given working directory.
 */
export function resolveWordGraphDir(cwd: string): string {
  return path.join(cwd, CONFIG_DIR);
}

export function resolveConfigPath(cwd: string): string {
  return path.join(resolveWordGraphDir(cwd), CONFIG_FILE);
}

export function resolveDbPath(cwd: string): string {
  return path.join(resolveWordGraphDir(cwd), DB_FILE);
}

export function configExists(cwd: string): boolean {
  return fs.existsSync(resolveConfigPath(cwd));
}

/**
 * Load config from disk, merging with defaults.
 */
export function loadConfig(cwd: string): WordGraphConfig {
  const configPath = resolveConfigPath(cwd);

  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined,
    );
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '(root)';
    throw new ConfigError(
      `Invalid config in ${configPath}: ${where}: ${issue?.message ?? 'invalid value'}`,
    );
  }

  const config = mergeWithDefaults(parsed.data);
  if (config.graph.max_length < config.graph.min_length) {
    throw new ConfigError(
      `Invalid config in ${configPath}: graph.max_length must be >= graph.min_length`,
    );
  }
  return config;
}

export function saveConfig(cwd: string, config: WordGraphConfig): void {
  const dir = resolveWordGraphDir(cwd);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const configPath = resolveConfigPath(cwd);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Delete the .wordgraph directory.
 */
export function cleanConfig(cwd: string): void {
  const dir = resolveWordGraphDir(cwd);
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

function mergeWithDefaults(partial: ConfigFile): WordGraphConfig {
  const graph = partial.graph ?? {};
  const log = partial.log ?? {};
  return {
    graph: {
      max_paths: graph.max_paths ?? DEFAULT_CONFIG.graph.max_paths,
      min_length: graph.min_length ?? DEFAULT_CONFIG.graph.min_length,
      max_length: graph.max_length ?? DEFAULT_CONFIG.graph.max_length,
      max_level: graph.max_level ?? DEFAULT_CONFIG.graph.max_level,
      max_nodes: graph.max_nodes ?? DEFAULT_CONFIG.graph.max_nodes,
      max_edges_per_node: graph.max_edges_per_node ?? DEFAULT_CONFIG.graph.max_edges_per_node,
      max_level_limit: graph.max_level_limit ?? DEFAULT_CONFIG.graph.max_level_limit,
      max_nodes_limit: graph.max_nodes_limit ?? DEFAULT_CONFIG.graph.max_nodes_limit,
    },
    log: {
      level: log.level ?? DEFAULT_CONFIG.log.level,
      file: log.file !== undefined ? log.file : DEFAULT_CONFIG.log.file,
    },
  };
}
