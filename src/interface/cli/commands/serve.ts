/**
 * wordgraph serve - Run the MCP server over stdio
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { handleCommandError } from '../output/error-display.js';
import { startMcpServer } from '../../mcp/server.js';
import { toError } from '../../../shared/errors.js';

export function serveCommand(): Command {
  return new Command('serve')
    .description('Start the MCP server on stdio (stdout carries JSON-RPC only)')
    .action(async (_options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const server = await startMcpServer(engine);

        let shuttingDown = false;

        const gracefulShutdown = async (signal: string) => {
          if (shuttingDown) return;
          shuttingDown = true;

          process.stderr.write(`[wordgraph] Received ${signal}. Shutting down...\n`);

          let exitCode = 0;
          try {
            await server.close();
            await engine.close();
          } catch (err) {
            process.stderr.write(`[wordgraph] Shutdown failed: ${toError(err).message}\n`);
            exitCode = 1;
          }

          process.exit(exitCode);
        };

        process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
        process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
