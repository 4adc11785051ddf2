/**
 * wordgraph add-relation - Relate two words
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { parseRelationType, parseStrength, toWordRef } from '../utils/arguments.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import {
  formatRelationType,
  formatStrength,
  formatSuccess,
  formatWord,
} from '../output/formatter.js';
import type { RelationType } from '../../../shared/types.js';

interface AddRelationOptions {
  type?: RelationType;
  strength?: number;
  title?: string;
  description?: string;
  byId: boolean;
}

export function addRelationCommand(): Command {
  return new Command('add-relation')
    .description('Add a directed relation from <source> to <target>')
    .argument('<source>', 'Source word')
    .argument('<target>', 'Target word')
    .option('-t, --type <type>', 'Relation type (synonym, antonym, ...)', parseRelationType)
    .option('-s, --strength <n>', 'Strength between 0 and 1 (default 1.0)', parseStrength)
    .option('--title <text>', 'Short label')
    .option('-d, --description <text>', 'Description')
    .option('--by-id', 'Treat word arguments as numeric ids', false)
    .action(async (source: string, target: string, options: AddRelationOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const relation = engine.addRelation({
          source: toWordRef(source, options.byId, 'source'),
          target: toWordRef(target, options.byId, 'target'),
          relation_type: options.type ?? null,
          strength: options.strength,
          title: options.title ?? null,
          description: options.description,
        });
        await engine.close();

        if (globals.json) {
          printJson(relation);
        } else if (!globals.quiet) {
          process.stderr.write(
            formatSuccess(
              `Relation #${relation.id}: ${formatWord(relation.source)} -[${formatRelationType(relation.relation_type)}]-> ${formatWord(relation.target)} ${formatStrength(relation.strength)}`,
            ) + '\n',
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
