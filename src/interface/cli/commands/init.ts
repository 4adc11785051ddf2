/**
 * wordgraph init - Create .wordgraph/ with a default config and an empty database
 */

import { Command } from 'commander';
import { logLevelFor, resolveGlobalOptions } from '../utils/global-options.js';
import { WordGraphEngine } from '../../../core/engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatDim, formatSuccess } from '../output/formatter.js';

export function initCommand(): Command {
  return new Command('init')
    .description('Create .wordgraph/ with a default config and an empty word database')
    .option('--force', 'Delete an existing config and database first', false)
    .action(async (options: { force: boolean }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = new WordGraphEngine(globals.cwd, { logLevel: logLevelFor(globals) });
        const result = await engine.initialize({ force: options.force });
        await engine.close();

        if (globals.json) {
          printJson(result);
        } else if (!globals.quiet) {
          process.stderr.write('\n');
          process.stderr.write(
            (result.created
              ? formatSuccess('Word graph initialized')
              : formatSuccess('Word graph already initialized')) + '\n',
          );
          process.stderr.write(`  ${formatBold('Config:')}   ${result.config_path}\n`);
          process.stderr.write(`  ${formatBold('Database:')} ${result.db_path}\n`);
          process.stderr.write(
            `\n  ${formatDim("Next: 'wordgraph add-word <word>' or 'wordgraph import <file>'")}\n\n`,
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
