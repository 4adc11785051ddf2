/**
 * CLI output formatter with picocolors
 */

import pc from 'picocolors';
import type { GlobalOptions } from '../utils/global-options.js';
import type { RelationType, WordSummary } from '../../../shared/types.js';

let colors: ReturnType<typeof pc.createColors> = pc;

/**
 * Apply --no-color. picocolors already honours NO_COLOR and non-TTY stdout.
 */
export function applyColorOption(globals: GlobalOptions): void {
  colors = globals.noColor ? pc.createColors(false) : pc;
}

export function formatSuccess(message: string): string {
  return colors.green(`OK ${message}`);
}

export function formatWarning(message: string): string {
  return colors.yellow(`WARN ${message}`);
}

export function formatError(message: string): string {
  return colors.red(`Error: ${message}`);
}

export function formatHint(message: string): string {
  return colors.cyan(`Hint: ${message}`);
}

export function formatDim(text: string): string {
  return colors.dim(text);
}

export function formatBold(text: string): string {
  return colors.bold(text);
}

export function formatStrength(strength: number): string {
  return colors.dim(`strength: ${strength.toFixed(2)}`);
}

/** `word #id` */
export function formatWord(word: Pick<WordSummary, 'id' | 'word'>): string {
  return `${colors.bold(word.word)} ${colors.dim(`#${word.id}`)}`;
}

export function formatRelationType(type: RelationType | null): string {
  return colors.magenta(type ?? 'untyped');
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

