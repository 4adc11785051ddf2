/**
 * MCP error code definitions and error conversion
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import {
  ConfigError,
  DatabaseError,
  DuplicateRelationError,
  EngineNotInitializedError,
  InvalidArgumentError,
  RelationNotFoundError,
  StoreUnavailableError,
  WordGraphError,
  WordNotFoundError,
} from '../../shared/errors.js';

export const WORDGRAPH_ERROR = {
  NOT_FOUND: -32001,
  NOT_INITIALIZED: -32002,
  STORE_UNAVAILABLE: -32003,
} as const;

export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (error instanceof WordNotFoundError || error instanceof RelationNotFoundError) {
    return new McpError(WORDGRAPH_ERROR.NOT_FOUND, error.message);
  }

  if (error instanceof InvalidArgumentError || error instanceof DuplicateRelationError) {
    return new McpError(ErrorCode.InvalidParams, error.message);
  }

  if (error instanceof StoreUnavailableError || error instanceof DatabaseError) {
    const cause = error.cause ? ` (${error.cause.message})` : '';
    return new McpError(WORDGRAPH_ERROR.STORE_UNAVAILABLE, `${error.message}${cause}`);
  }

  if (error instanceof EngineNotInitializedError || error instanceof ConfigError) {
    return new McpError(WORDGRAPH_ERROR.NOT_INITIALIZED, error.message);
  }

  if (error instanceof WordGraphError) {
    return new McpError(ErrorCode.InternalError, error.message);
  }

  return new McpError(
    ErrorCode.InternalError,
    error instanceof Error ? error.message : 'Unknown error',
  );
}
