import { Command } from 'commander';
import pc from 'picocolors';
import { dirname, resolve } from 'path';

import type { CommandResult } from '../types/index.js';
import { analyzeProject } from '../core/analysis.js';
import { consoleOutput, type RestorerPort } from '../core/ports/index.js';
import { RestorationExecutor, type RestoreExecutionResult } from '../core/restore/restore-executor.js';
import { loadRestoreConfig } from '../utils/config-yml.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatPathForDisplay, pluralize } from '../utils/formatters.js';
import {
  addDiscoveryOptions,
  toConfigOverrides,
  withInterruptSignal,
  type CommandEnvironment,
  type DiscoveryCommandOptions
} from './shared-options.js';

interface RestoreOptions extends DiscoveryCommandOptions {
  out?: string;
  dryRun?: boolean;
}

interface RestoreEnvironment extends CommandEnvironment {
  restorer?: RestorerPort;
}

export async function restoreCommand(
  startFile: string,
  options: RestoreOptions,
  env: RestoreEnvironment = {}
): Promise<CommandResult<RestoreExecutionResult>> {
  const cwd = env.cwd ?? process.cwd();
  const output = env.output ?? consoleOutput;
  const colors = pc.createColors(env.color ?? false);

  const config = await loadRestoreConfig({
    startFile,
    cwd,
    configPath: options.config,
    overrides: { ...toConfigOverrides(options), outputDir: options.out }
  });

  const { plan } = await analyzeProject(resolve(cwd, startFile), config, {
    fileSystem: env.fileSystem,
    signal: env.signal
  });

  const executor = new RestorationExecutor({
    outputDir: config.outputDir,
    // Files outside every search root are mirrored relative to the start file
    sourceRoots: [...config.searchRoots, dirname(plan.rootKey)],
    extensions: config.extensions,
    packageInit: config.packageInit,
    restorer: env.restorer,
    dryRun: options.dryRun
  });
  const execution = await executor.execute(plan);

  for (const result of execution.results) {
    const target = result.outputPath ? formatPathForDisplay(result.outputPath, cwd) : '';
    const source = formatPathForDisplay(result.nodeKey, cwd);
    switch (result.status) {
      case 'restored':
        output.success(`${source} -> ${target}`);
        break;
      case 'fallback':
        output.warn(`${source} -> ${target} ${colors.dim(`(original kept: ${result.reason ?? 'unknown'})`)}`);
        break;
      case 'skipped':
        output.message(colors.dim(`- ${source} skipped (${result.reason ?? 'unknown'})`));
        break;
      case 'failed':
        output.error(`${source}: ${result.reason ?? 'write failed'}`);
        break;
    }
  }

  const { summary } = execution;
  const verb = options.dryRun ? 'Would restore' : 'Restored';
  output.info(
    `${verb} ${pluralize(summary.restored + summary.fallback, 'file')} ` +
    `(${summary.fallback} kept original, ${summary.skipped} skipped, ${summary.failed} failed)`
  );

  return {
    success: execution.success,
    data: execution,
    error: execution.success ? undefined : `${pluralize(summary.failed, 'file')} could not be written`
  };
}

export function setupRestoreCommand(program: Command): void {
  addDiscoveryOptions(
    program
      .command('restore')
      .description('Restore a decompiled Lua file and its dependencies in dependency order')
      .argument('<start-file>', 'decompiled file to start from')
  )
    .option('-o, --out <dir>', 'output directory (default: outputDir from config, or ./output)')
    .option('--dry-run', 'show what would be written without writing')
    .action(withErrorHandling(async (startFile: string, options: RestoreOptions, command: Command) => {
      const globals = command.optsWithGlobals<{ cwd?: string }>();
      const result = await withInterruptSignal((signal) =>
        restoreCommand(startFile, options, { cwd: globals.cwd, signal, color: pc.isColorSupported })
      );
      if (!result.success) {
        throw new Error(result.error);
      }
    }));
}
