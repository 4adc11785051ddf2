/**
 * wordgraph logging
 *
 * Every line goes to stderr (stdout carries --json output and MCP JSON-RPC)
 * and, when `log.file` is set in .wordgraph/config.json, is appended there too.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** null closes the current log file; undefined leaves it open. */
  file?: string | null;
}

let threshold: LogLevel = 'info';
let fileSink: fs.WriteStream | null = null;

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function configureLogger(options: LoggerOptions): void {
  if (options.level) {
    threshold = options.level;
  }
  if (options.file === undefined) return;

  closeLogger();
  if (options.file) {
    fs.mkdirSync(path.dirname(options.file), { recursive: true });
    fileSink = fs.createWriteStream(options.file, { flags: 'a' });
  }
}

export function closeLogger(): void {
  fileSink?.end();
  fileSink = null;
}

function renderArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.message;
  return JSON.stringify(arg);
}

/** `[2026-01-01T00:00:00.000Z] WARN  message extra...` */
export function formatMessage(level: LogLevel, message: string, args: unknown[]): string {
  const extra = args.length > 0 ? ' ' + args.map(renderArg).join(' ') : '';
  return `[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)} ${message}${extra}`;
}

function emit(level: LogLevel, message: string, args: unknown[]): void {
  if (severity(level) < severity(threshold)) return;
  const line = formatMessage(level, message, args) + '\n';
  process.stderr.write(line);
  fileSink?.write(line);
}

/**
 * Logger tagged with a component name, e.g. `[PathFinder]`.
 */
export function createLogger(scope?: string): Logger {
  const tag = scope ? `[${scope}] ` : '';
  const at =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]): void =>
      emit(level, tag + message, args);

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
  };
}
