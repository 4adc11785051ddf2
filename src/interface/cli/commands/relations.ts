/**
 * wordgraph relations - List relations touching a word
 */

import { Command, Option } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { toWordRef } from '../utils/arguments.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import {
  formatBold,
  formatDim,
  formatRelationType,
  formatStrength,
  formatWord,
} from '../output/formatter.js';
import type { EdgeDirection, ListRelationsOutput } from '../../../shared/types.js';

interface RelationsOptions {
  direction: EdgeDirection | 'both';
  byId: boolean;
}

export function relationsCommand(): Command {
  return new Command('relations')
    .description('List the relations of a word')
    .argument('<word>', 'Word')
    .addOption(
      new Option('--direction <dir>', 'Which stored direction to list')
        .choices(['outgoing', 'incoming', 'both'] as const)
        .default('both'),
    )
    .option('--by-id', 'Treat the word argument as a numeric id', false)
    .action(async (word: string, options: RelationsOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const result = engine.listRelations({
          word: toWordRef(word, options.byId),
          direction: options.direction,
        });
        await engine.close();

        if (globals.json) {
          printJson(result);
        } else if (!globals.quiet) {
          renderRelations(result);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function renderRelations(result: ListRelationsOutput): void {
  process.stderr.write('\n');
  process.stderr.write(
    `  ${formatBold(`${result.total} relation(s)`)} for ${formatWord(result.word)}\n\n`,
  );
  for (const r of result.relations) {
    process.stderr.write(
      `  ${formatDim(`#${r.id}`)} ${formatWord(r.source)} -[${formatRelationType(r.relation_type)}]-> ${formatWord(r.target)} ${formatStrength(r.strength)}\n`,
    );
    if (r.title) {
      process.stderr.write(`      ${formatDim(r.title)}\n`);
    }
  }
  if (result.total > 0) process.stderr.write('\n');
}
