import { Command, InvalidArgumentError } from 'commander';
import type { RestoreConfig } from '../types/index.js';
import type { FileSystemPort, OutputPort } from '../core/ports/index.js';

/**
 * Options shared by every command that runs discovery.
 */
export interface DiscoveryCommandOptions {
  config?: string;
  root?: string[];
  ext?: string[];
  packageInit?: boolean;
  maxDepth?: number;
  concurrency?: number;
  timeout?: number;
}

/**
 * Collaborators a command runs against; the CLI uses the defaults, tests
 * swap them out.
 */
export interface CommandEnvironment {
  cwd?: string;
  output?: OutputPort;
  fileSystem?: FileSystemPort;
  signal?: AbortSignal;
  /** ANSI colors in human-readable output */
  color?: boolean;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function addDiscoveryOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'configuration file (default: ./luarestore.yml when present)')
    .option('-r, --root <dir>', 'search root, repeatable; earlier roots win', collect)
    .option('-e, --ext <ext>', 'source-file extension, repeatable; earlier extensions win', collect)
    .option('--package-init', 'also resolve a.b to a/b/init<ext>')
    .option('--max-depth <n>', 'do not read files deeper than n', parseInteger)
    .option('--concurrency <n>', 'files read in parallel', parseInteger)
    .option('--timeout <ms>', 'per-file read timeout', parseInteger);
}

export function toConfigOverrides(options: DiscoveryCommandOptions): Partial<RestoreConfig> {
  const overrides: Partial<RestoreConfig> = {};
  if (options.root?.length) overrides.searchRoots = options.root;
  if (options.ext?.length) overrides.extensions = options.ext;
  if (options.packageInit) overrides.packageInit = true;
  if (options.maxDepth !== undefined) overrides.maxDepth = options.maxDepth;
  if (options.concurrency !== undefined) overrides.concurrency = options.concurrency;
  if (options.timeout !== undefined) overrides.readTimeoutMs = options.timeout;
  return overrides;
}

/**
 * Run `fn` with an AbortSignal that fires on Ctrl-C.
 */
export async function withInterruptSignal<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
