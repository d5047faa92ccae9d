/**
 * Shared constants for the luarestore CLI application
 * Single source of truth for file names, extensions and run defaults.
 */

export const FILE_PATTERNS = {
  CONFIG_YML: 'luarestore.yml',
  UNLUAC_SUFFIX: '.lua.unluac',
  LUA_SUFFIX: '.lua',
  PACKAGE_INIT: 'init',
} as const;

/**
 * Extension priority when resolving module identifiers.
 * Decompiled output is preferred over any plain source lying next to it.
 */
export const DEFAULT_EXTENSIONS: readonly string[] = [FILE_PATTERNS.UNLUAC_SUFFIX, FILE_PATTERNS.LUA_SUFFIX];

export const DEFAULTS = {
  MAX_DEPTH: 10,
  CONCURRENCY: 4,
  READ_TIMEOUT_MS: 10_000,
  OUTPUT_DIR: 'output',
} as const;

export const MODULE_SEPARATOR = '.';
