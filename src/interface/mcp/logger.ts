/**
 * MCP serve-mode logging
 * stdout is reserved for the MCP protocol (JSON-RPC); everything else goes
 * through the shared logger to stderr and the optional log file.
 */

import { createLogger } from '../../shared/logger.js';

export const mcpLogger = createLogger('mcp');

/**
 * Warn when a tool call exceeds its latency target.
 */
export function logSlowTool(tool: string, elapsedMs: number, targetMs: number): void {
  if (elapsedMs > targetMs) {
    mcpLogger.warn(`${tool} took ${elapsedMs}ms (target: <${targetMs}ms)`);
  }
}

/**
 * Route console.log/info to the logger so stray writes cannot corrupt the
 * JSON-RPC stream. console.warn and console.error already use stderr.
 */
export function interceptConsole(): void {
  console.log = (...args: unknown[]) => {
    mcpLogger.info(args.map(String).join(' '));
  };
  console.info = (...args: unknown[]) => {
    mcpLogger.info(args.map(String).join(' '));
  };
}
