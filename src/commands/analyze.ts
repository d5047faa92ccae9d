import { Command } from 'commander';
import pc from 'picocolors';
import { resolve } from 'path';

import type { CommandResult } from '../types/index.js';
import type { RestorationPlan } from '../core/resolution/types.js';
import { analyzeProject } from '../core/analysis.js';
import { consoleOutput, type OutputPort } from '../core/ports/index.js';
import { loadRestoreConfig } from '../utils/config-yml.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatCyclePath, formatPathForDisplay, formatSummaryLines, pluralize } from '../utils/formatters.js';
import {
  addDiscoveryOptions,
  toConfigOverrides,
  withInterruptSignal,
  type CommandEnvironment,
  type DiscoveryCommandOptions
} from './shared-options.js';

interface AnalyzeOptions extends DiscoveryCommandOptions {
  json?: boolean;
}

/**
 * JSON form of a plan; file contents are left out.
 */
export function planToJson(plan: RestorationPlan): Record<string, unknown> {
  return {
    root: plan.rootKey,
    order: plan.records.map((record) => ({
      file: record.nodeKey,
      state: record.state,
      dependencies: record.resolvedDependencyKeys
    })),
    cycles: plan.cycles,
    unresolved: plan.unresolvedReferences,
    summary: plan.summary
  };
}

function printPlan(plan: RestorationPlan, output: OutputPort, cwd: string, color: boolean): void {
  const colors = pc.createColors(color);
  const display = (key: string): string => formatPathForDisplay(key, cwd);

  output.info(colors.bold(`Processing order (${pluralize(plan.records.length, 'file')}):`));
  plan.records.forEach((record, index) => {
    const marker = record.state === 'error'
      ? colors.red(' (read error)')
      : record.state === 'unresolved'
        ? colors.dim(' (not read)')
        : '';
    output.message(`  ${index + 1}. ${display(record.nodeKey)}${marker}`);
  });

  if (plan.cycles.length > 0) {
    output.warn(colors.yellow(`${pluralize(plan.cycles.length, 'cycle group')} detected:`));
    for (const cycle of plan.cycles) {
      output.message(`  ${formatCyclePath(cycle, cwd)}`);
    }
  }

  if (plan.unresolvedReferences.length > 0) {
    output.warn(colors.yellow(`${pluralize(plan.unresolvedReferences.length, 'unresolved require')}:`));
    for (const entry of plan.unresolvedReferences) {
      output.message(`  ${entry.identifier} ${colors.dim(`(required by ${display(entry.nodeKey)})`)}`);
    }
  }

  output.note(formatSummaryLines(plan.summary).join('\n'), 'Summary');
}

export async function analyzeCommand(
  startFile: string,
  options: AnalyzeOptions,
  env: CommandEnvironment = {}
): Promise<CommandResult<RestorationPlan>> {
  const cwd = env.cwd ?? process.cwd();
  const output = env.output ?? consoleOutput;

  const config = await loadRestoreConfig({
    startFile,
    cwd,
    configPath: options.config,
    overrides: toConfigOverrides(options)
  });

  const { plan } = await analyzeProject(resolve(cwd, startFile), config, {
    fileSystem: env.fileSystem,
    signal: env.signal
  });

  if (options.json) {
    output.message(JSON.stringify(planToJson(plan), null, 2));
  } else {
    printPlan(plan, output, cwd, env.color ?? false);
  }

  return { success: true, data: plan };
}

export function setupAnalyzeCommand(program: Command): void {
  addDiscoveryOptions(
    program
      .command('analyze')
      .description('Discover dependencies of a decompiled Lua file and print the processing order')
      .argument('<start-file>', 'decompiled file to start from')
  )
    .option('--json', 'print the plan as JSON')
    .action(withErrorHandling(async (startFile: string, options: AnalyzeOptions, command: Command) => {
      const globals = command.optsWithGlobals<{ cwd?: string }>();
      await withInterruptSignal((signal) =>
        analyzeCommand(startFile, options, { cwd: globals.cwd, signal, color: pc.isColorSupported })
      );
    }));
}
