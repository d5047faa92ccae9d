import * as yaml from 'js-yaml';
import { dirname, isAbsolute, join, resolve } from 'path';
import { RestoreConfig, RestoreConfigYml } from '../types/index.js';
import { DEFAULTS, DEFAULT_EXTENSIONS, FILE_PATTERNS } from '../constants/index.js';
import { ConfigError } from './errors.js';
import { exists, readTextFile } from './fs.js';
import { logger } from './logger.js';

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'searchRoots',
  'extensions',
  'packageInit',
  'maxDepth',
  'concurrency',
  'readTimeoutMs',
  'outputDir'
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringList(raw: Record<string, unknown>, key: string, source: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string' && item.length > 0)) {
    throw new ConfigError(`${source}: '${key}' must be a list of non-empty strings`, { key, value });
  }
  return value;
}

function readInteger(raw: Record<string, unknown>, key: string, source: string, min: number): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`${source}: '${key}' must be an integer >= ${min}`, { key, value });
  }
  return value;
}

/**
 * Validate the parsed contents of a luarestore.yml
 */
export function validateRestoreConfigYml(raw: unknown, source: string): RestoreConfigYml {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`);
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`${source}: ignoring unknown key '${key}'`);
    }
  }

  const config: RestoreConfigYml = {};

  const searchRoots = readStringList(raw, 'searchRoots', source);
  if (searchRoots) {
    if (searchRoots.length === 0) {
      throw new ConfigError(`${source}: 'searchRoots' must not be empty`);
    }
    config.searchRoots = searchRoots;
  }

  const extensions = readStringList(raw, 'extensions', source);
  if (extensions) {
    validateExtensions(extensions, source);
    config.extensions = extensions;
  }

  if (raw.packageInit !== undefined && raw.packageInit !== null) {
    if (typeof raw.packageInit !== 'boolean') {
      throw new ConfigError(`${source}: 'packageInit' must be true or false`, { value: raw.packageInit });
    }
    config.packageInit = raw.packageInit;
  }

  config.maxDepth = readInteger(raw, 'maxDepth', source, 0);
  config.concurrency = readInteger(raw, 'concurrency', source, 1);
  config.readTimeoutMs = readInteger(raw, 'readTimeoutMs', source, 1);

  if (raw.outputDir !== undefined && raw.outputDir !== null) {
    if (typeof raw.outputDir !== 'string' || raw.outputDir.length === 0) {
      throw new ConfigError(`${source}: 'outputDir' must be a non-empty string`, { value: raw.outputDir });
    }
    config.outputDir = raw.outputDir;
  }

  return config;
}

export function validateExtensions(extensions: readonly string[], source: string): void {
  if (extensions.length === 0) {
    throw new ConfigError(`${source}: 'extensions' must not be empty`);
  }
  for (const ext of extensions) {
    if (!ext.startsWith('.') || ext.length < 2) {
      throw new ConfigError(`${source}: extension '${ext}' must start with '.'`, { extension: ext });
    }
  }
}

/**
 * Parse luarestore.yml file with validation
 */
export async function parseRestoreConfigYml(configPath: string): Promise<RestoreConfigYml> {
  let content: string;
  try {
    content = await readTextFile(configPath);
  } catch (error) {
    throw new ConfigError(`Failed to read ${configPath}: ${error instanceof Error ? error.message : String(error)}`, { configPath });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`, { configPath });
  }

  return validateRestoreConfigYml(parsed, configPath);
}

export interface LoadConfigOptions {
  /** Start file of the run; its directory is the default search root */
  startFile: string;
  /** Working directory for relative paths (default process.cwd()) */
  cwd?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Values from CLI flags; win over the file */
  overrides?: Partial<RestoreConfig>;
}

/**
 * Locate, parse and merge configuration into an effective RestoreConfig.
 * Relative paths in the file are resolved against the file's directory;
 * relative paths in overrides against cwd.
 */
export async function loadRestoreConfig(options: LoadConfigOptions): Promise<RestoreConfig> {
  const cwd = options.cwd ?? process.cwd();
  const startFile = resolve(cwd, options.startFile);

  let fileConfig: RestoreConfigYml = {};
  let baseDir = cwd;

  if (options.configPath) {
    const configPath = resolve(cwd, options.configPath);
    if (!(await exists(configPath))) {
      throw new ConfigError(`Config file not found: ${configPath}`, { configPath });
    }
    fileConfig = await parseRestoreConfigYml(configPath);
    baseDir = dirname(configPath);
    logger.debug(`Loaded config from ${configPath}`);
  } else {
    const implicitPath = join(cwd, FILE_PATTERNS.CONFIG_YML);
    if (await exists(implicitPath)) {
      fileConfig = await parseRestoreConfigYml(implicitPath);
      logger.debug(`Loaded config from ${implicitPath}`);
    }
  }

  const fromFile = (p: string): string => (isAbsolute(p) ? p : resolve(baseDir, p));
  const fromCwd = (p: string): string => (isAbsolute(p) ? p : resolve(cwd, p));
  const overrides = options.overrides ?? {};

  const searchRoots = overrides.searchRoots?.length
    ? overrides.searchRoots.map(fromCwd)
    : fileConfig.searchRoots?.map(fromFile) ?? [dirname(startFile)];

  const extensions = overrides.extensions?.length
    ? overrides.extensions
    : fileConfig.extensions ?? [...DEFAULT_EXTENSIONS];
  validateExtensions(extensions, 'extensions');

  const outputDir = overrides.outputDir
    ? fromCwd(overrides.outputDir)
    : fromFile(fileConfig.outputDir ?? DEFAULTS.OUTPUT_DIR);

  const config: RestoreConfig = {
    searchRoots,
    extensions,
    packageInit: overrides.packageInit ?? fileConfig.packageInit ?? false,
    maxDepth: overrides.maxDepth ?? fileConfig.maxDepth ?? DEFAULTS.MAX_DEPTH,
    concurrency: overrides.concurrency ?? fileConfig.concurrency ?? DEFAULTS.CONCURRENCY,
    readTimeoutMs: overrides.readTimeoutMs ?? fileConfig.readTimeoutMs ?? DEFAULTS.READ_TIMEOUT_MS,
    outputDir
  };

  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 0) {
    throw new ConfigError(`maxDepth must be an integer >= 0, got ${config.maxDepth}`);
  }
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    throw new ConfigError(`concurrency must be an integer >= 1, got ${config.concurrency}`);
  }

  return config;
}
