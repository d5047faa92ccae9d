/**
 * Analysis pipeline shared by the analyze and restore commands:
 * configuration -> resolver -> discovery -> restoration plan.
 */

import type { RestoreConfig } from '../types/index.js';
import type { FileSystemPort } from './ports/index.js';
import {
  PathResolver,
  buildRestorationPlan,
  discover,
  type DiscoveryResult,
  type RestorationPlan
} from './resolution/index.js';
import { logger } from '../utils/logger.js';

export interface AnalyzeOptions {
  fileSystem?: FileSystemPort;
  signal?: AbortSignal;
}

export interface AnalysisResult {
  discovery: DiscoveryResult;
  plan: RestorationPlan;
}

export async function analyzeProject(
  startFile: string,
  config: RestoreConfig,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const resolver = new PathResolver({
    searchRoots: config.searchRoots,
    extensions: config.extensions,
    packageInit: config.packageInit,
    fileSystem: options.fileSystem
  });

  logger.info(`Discovering dependencies of ${startFile}`);
  const discovery = await discover(startFile, {
    resolver,
    fileSystem: options.fileSystem,
    maxDepth: config.maxDepth,
    concurrency: config.concurrency,
    readTimeoutMs: config.readTimeoutMs,
    signal: options.signal
  });

  const plan = buildRestorationPlan(discovery);
  for (const cycle of plan.cycles) {
    logger.warn(`Circular dependency: ${cycle.examplePath.join(' -> ')}`);
  }
  logger.info(`Found ${plan.summary.totalNodes} files (${plan.summary.cycleGroupCount} cycle groups)`);

  return { discovery, plan };
}
