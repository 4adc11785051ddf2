/**
 * wordgraph version - Display version information
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { printJson } from '../output/json-output.js';
import { getVersion } from '../../../shared/version.js';

export function versionCommand(): Command {
  return new Command('version')
    .description('Display version information')
    .action((_options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      const version = getVersion();

      if (globals.json) {
        printJson({ name: 'wordgraph', version, node: process.version });
      } else {
        process.stdout.write(`wordgraph v${version}\n`);
      }
    });
}
