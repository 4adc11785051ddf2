/**
 * wordgraph add-word - Add a word to the graph
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess, formatWarning, formatWord } from '../output/formatter.js';

export function addWordCommand(): Command {
  return new Command('add-word')
    .description('Add a word (an existing word with the same normalized text is reused)')
    .argument('<word>', 'Word text')
    .option('-d, --description <text>', 'Description of the word')
    .action(async (word: string, options: { description?: string }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const result = engine.addWord({ word, description: options.description });
        await engine.close();

        if (globals.json) {
          printJson(result);
        } else if (!globals.quiet) {
          const label = formatWord(result.word);
          process.stderr.write(
            (result.created
              ? formatSuccess(`Added ${label}`)
              : formatWarning(`Already present: ${label}`)) + '\n',
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
