/**
 * Common types and interfaces for the luarestore CLI application
 */

// Configuration types

/**
 * Effective configuration for one restoration run.
 * Paths are absolute once loaded (see utils/config-yml.ts).
 */
export interface RestoreConfig {
  /** Ordered search roots; earlier roots win */
  searchRoots: string[];
  /** Ordered source-file extensions, e.g. ['.lua.unluac', '.lua'] */
  extensions: string[];
  /** Also try `<module>/init<ext>` under each root */
  packageInit: boolean;
  /** Files deeper than this are discovered but never read */
  maxDepth: number;
  /** Worklist items read concurrently */
  concurrency: number;
  /** Per-file read timeout */
  readTimeoutMs: number;
  /** Directory restored files are written to */
  outputDir: string;
}

/**
 * Raw shape of luarestore.yml before validation.
 */
export interface RestoreConfigYml {
  searchRoots?: string[];
  extensions?: string[];
  packageInit?: boolean;
  maxDepth?: number;
  concurrency?: number;
  readTimeoutMs?: number;
  outputDir?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Error types
export class LuaRestoreError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LuaRestoreError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  READ_ERROR = 'READ_ERROR',
  ROOT_READ_ERROR = 'ROOT_READ_ERROR',
  GRAPH_INVARIANT = 'GRAPH_INVARIANT',
  CANCELLED = 'CANCELLED',
  VALIDATION_ERROR = 'VALIDATION_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
