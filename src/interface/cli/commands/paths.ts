/**
 * wordgraph paths - Enumerate simple paths between two words
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { parseInteger, toWordRef } from '../utils/arguments.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatDim, formatStrength, formatWord } from '../output/formatter.js';
import type { FindPathsOutput } from '../../../shared/types.js';

interface PathsOptions {
  maxPaths?: number;
  minLength?: number;
  maxLength?: number;
  byId: boolean;
}

export function pathsCommand(): Command {
  return new Command('paths')
    .description('Find simple paths between two words, following relations in either direction')
    .argument('<source>', 'Start word')
    .argument('<target>', 'End word')
    .option('--max-paths <n>', 'Stop after this many paths (default from config)', parseInteger)
    .option('--min-length <n>', 'Shortest path, in relations', parseInteger)
    .option('--max-length <n>', 'Longest path, in relations', parseInteger)
    .option('--by-id', 'Treat word arguments as numeric ids', false)
    .action(async (source: string, target: string, options: PathsOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const result = await engine.findPaths({
          source: toWordRef(source, options.byId, 'source'),
          target: toWordRef(target, options.byId, 'target'),
          max_paths: options.maxPaths,
          min_length: options.minLength,
          max_length: options.maxLength,
        });
        await engine.close();

        if (globals.json) {
          printJson(result);
        } else if (!globals.quiet) {
          renderPaths(result);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function renderPaths(result: FindPathsOutput): void {
  process.stderr.write('\n');
  process.stderr.write(
    `  ${formatBold(`${result.total_found} path(s)`)} ${formatWord(result.source)} -> ${formatWord(result.target)}\n\n`,
  );

  if (result.paths.length === 0) {
    process.stderr.write('  No paths found.\n\n');
    return;
  }

  result.paths.forEach((p, i) => {
    const chain = p.words.map((w) => w.word).join(' -> ');
    process.stderr.write(`  ${formatDim(`${i + 1}.`)} ${chain}\n`);
    process.stderr.write(
      `     ${formatDim(`length ${p.length}, relations ${p.relations.join(', ') || '-'}`)}  ${formatStrength(p.total_strength)}\n`,
    );
  });
  process.stderr.write('\n');
}
