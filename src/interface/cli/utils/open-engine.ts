import { createWordGraphEngine, type WordGraphEngine } from '../../../core/engine.js';
import { ConfigNotFoundError } from '../../../shared/errors.js';
import { resolveConfigPath } from '../../../config/config.js';
import { logLevelFor, type GlobalOptions } from './global-options.js';

/**
 * Open the project in `--cwd`. Commands other than `init` need an existing
 * `.wordgraph/config.json`.
 */
export async function openEngine(globals: GlobalOptions): Promise<WordGraphEngine> {
  const engine = await createWordGraphEngine(globals.cwd, { logLevel: logLevelFor(globals) });
  if (!engine.initialized) {
    throw new ConfigNotFoundError(resolveConfigPath(globals.cwd));
  }
  return engine;
}
