/**
 * wordgraph import - Bulk load words and relations from a JSON file
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatSuccess } from '../output/formatter.js';

export function importCommand(): Command {
  return new Command('import')
    .description('Import words and relations from a JSON file ({ "words": [...], "relations": [...] })')
    .argument('<file>', 'Path to the JSON file')
    .action(async (file: string, _options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const result = await engine.importGraph(resolve(globals.cwd, file));
        await engine.close();

        if (globals.json) {
          printJson(result);
        } else if (!globals.quiet) {
          process.stderr.write('\n');
          process.stderr.write(formatSuccess(`Imported ${file}`) + '\n');
          process.stderr.write(
            `  ${formatBold('Words:')}     ${result.words_created} new, ${result.words_existing} existing\n`,
          );
          process.stderr.write(
            `  ${formatBold('Relations:')} ${result.relations_created} new, ${result.relations_skipped} duplicate\n\n`,
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
