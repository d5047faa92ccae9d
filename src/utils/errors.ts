import { LuaRestoreError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the luarestore CLI
 */

export class ConfigError extends LuaRestoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class FileSystemError extends LuaRestoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends LuaRestoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

/**
 * A file in the graph could not be read. Node-local: the node is marked
 * `error` and discovery continues.
 */
export class ReadError extends LuaRestoreError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`Failed to read ${path}: ${describeCause(cause)}`, ErrorCodes.READ_ERROR, { path, cause });
    this.name = 'ReadError';
  }
}

/**
 * The start file could not be read; no graph can be built.
 */
export class RootReadError extends LuaRestoreError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`Cannot read start file ${path}: ${describeCause(cause)}`, ErrorCodes.ROOT_READ_ERROR, { path, cause });
    this.name = 'RootReadError';
  }
}

export class GraphInvariantError extends LuaRestoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.GRAPH_INVARIANT, details);
    this.name = 'GraphInvariantError';
  }
}

export class DiscoveryCancelledError extends LuaRestoreError {
  constructor(message: string = 'Discovery cancelled') {
    super(message, ErrorCodes.CANCELLED);
    this.name = 'DiscoveryCancelledError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof LuaRestoreError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      // Ctrl-C during discovery: exit quietly
      if (error instanceof DiscoveryCancelledError) {
        process.exit(130);
        return;
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
