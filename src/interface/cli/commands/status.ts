/**
 * wordgraph status - Word and relation counts
 */

import { Command } from 'commander';
import { logLevelFor, resolveGlobalOptions } from '../utils/global-options.js';
import { createWordGraphEngine } from '../../../core/engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatBytes, formatSuccess, formatWarning } from '../output/formatter.js';
import type { StatusOutput } from '../../../shared/types.js';

const NOT_INITIALIZED: StatusOutput = {
  initialized: false,
  total_words: 0,
  total_relations: 0,
  relations_by_type: {},
  db_size_bytes: 0,
};

export function statusCommand(): Command {
  return new Command('status')
    .description('Display word graph status')
    .option('--check', 'Exit with non-zero code if the project is not initialized')
    .action(async (options: { check?: boolean }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await createWordGraphEngine(globals.cwd, { logLevel: logLevelFor(globals) });
        const status = engine.initialized ? engine.getStatus() : NOT_INITIALIZED;
        await engine.close();

        if (globals.json) {
          printJson(status);
        } else if (!globals.quiet) {
          process.stderr.write('\n');
          process.stderr.write(
            `  ${formatBold('wordgraph')} ${status.initialized ? formatSuccess('initialized') : formatWarning('not initialized')}\n`,
          );
          process.stderr.write(`  ${formatBold('Words:')}      ${status.total_words}\n`);
          process.stderr.write(`  ${formatBold('Relations:')}  ${status.total_relations}\n`);
          for (const [type, count] of Object.entries(status.relations_by_type)) {
            process.stderr.write(`    ${type.padEnd(14)} ${count}\n`);
          }
          process.stderr.write(`  ${formatBold('DB size:')}    ${formatBytes(status.db_size_bytes)}\n`);
          process.stderr.write('\n');
        }

        if (options.check && !status.initialized) {
          process.exit(1);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
