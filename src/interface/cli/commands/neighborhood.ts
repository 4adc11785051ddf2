/**
 * wordgraph neighborhood - Level-bounded subgraph around a word
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { parseInteger, toWordRef } from '../utils/arguments.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import {
  formatBold,
  formatDim,
  formatRelationType,
  formatWarning,
  formatWord,
} from '../output/formatter.js';
import type { GetNeighborhoodOutput } from '../../../shared/types.js';

interface NeighborhoodOptions {
  maxLevel?: number;
  maxNodes?: number;
  maxEdges?: number;
  byId: boolean;
}

export function neighborhoodCommand(): Command {
  return new Command('neighborhood')
    .description('Show the words within a number of relations of <word>')
    .argument('<word>', 'Center word')
    .option('--max-level <n>', 'Levels to expand (clamped to 1..max_level_limit)', parseInteger)
    .option('--max-nodes <n>', 'Node cap (clamped to 1..max_nodes_limit)', parseInteger)
    .option('--max-edges <n>', 'Relations followed per word; 0 = all', parseInteger)
    .option('--by-id', 'Treat the word argument as a numeric id', false)
    .action(async (word: string, options: NeighborhoodOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const result = await engine.getNeighborhood({
          word: toWordRef(word, options.byId),
          max_level: options.maxLevel,
          max_nodes: options.maxNodes,
          max_edges_per_node: options.maxEdges,
        });
        await engine.close();

        if (globals.json) {
          printJson(result);
        } else if (!globals.quiet) {
          renderNeighborhood(result);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function renderNeighborhood(result: GetNeighborhoodOutput): void {
  const names = new Map(result.nodes.map((n) => [n.id, n.word]));

  process.stderr.write('\n');
  process.stderr.write(
    `  ${formatBold(`Neighborhood of`)} ${formatWord(result.center)}: ${result.nodes.length} word(s), ${result.edges.length} relation(s)\n`,
  );
  if (result.truncated) {
    process.stderr.write(`  ${formatWarning('node cap reached; result truncated')}\n`);
  }

  const byLevel = new Map<number, string[]>();
  for (const node of result.nodes) {
    const words = byLevel.get(node.level) ?? [];
    words.push(node.word);
    byLevel.set(node.level, words);
  }
  process.stderr.write('\n');
  for (const [level, words] of [...byLevel.entries()].sort((a, b) => a[0] - b[0])) {
    process.stderr.write(`  ${formatDim(`L${level}`)} ${words.join(', ')}\n`);
  }

  if (result.edges.length > 0) {
    process.stderr.write(`\n  ${formatBold('Relations:')}\n`);
    for (const e of result.edges) {
      const arrow = e.direction === 'outgoing' ? '->' : '<-';
      process.stderr.write(
        `    ${names.get(e.source) ?? e.source} ${arrow}[${formatRelationType(e.relation_type)}] ${names.get(e.target) ?? e.target} ${formatDim(`#${e.relation_id}`)}\n`,
      );
    }
  }
  process.stderr.write('\n');
}
