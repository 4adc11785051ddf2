/**
 * CLI entry point - creates the commander.js program with all commands
 */

import { Command } from 'commander';
import { addGlobalOptions, resolveGlobalOptions } from './utils/global-options.js';
import { applyColorOption } from './output/formatter.js';
import { initCommand } from './commands/init.js';
import { addWordCommand } from './commands/add-word.js';
import { addRelationCommand } from './commands/add-relation.js';
import { importCommand } from './commands/import.js';
import { pathsCommand } from './commands/paths.js';
import { neighborhoodCommand } from './commands/neighborhood.js';
import { relationsCommand } from './commands/relations.js';
import { statusCommand } from './commands/status.js';
import { serveCommand } from './commands/serve.js';
import { versionCommand } from './commands/version.js';
import { getVersion } from '../../shared/version.js';

export function createCli(): Command {
  const program = new Command('wordgraph')
    .description('Word relation graph - paths and neighborhoods between words')
    .version(getVersion(), '-V, --version');

  addGlobalOptions(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    applyColorOption(resolveGlobalOptions(actionCommand));
  });

  program.addCommand(initCommand());
  program.addCommand(addWordCommand());
  program.addCommand(addRelationCommand());
  program.addCommand(importCommand());
  program.addCommand(pathsCommand());
  program.addCommand(neighborhoodCommand());
  program.addCommand(relationsCommand());
  program.addCommand(statusCommand());
  program.addCommand(serveCommand());
  program.addCommand(versionCommand());

  return program;
}
