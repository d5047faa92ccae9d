/**
 * Restoration executor.
 * Walks a restoration plan in order, asks the restorer for each file and
 * writes the result under the output directory.
 */

import type { RestorerPort, RestoredDependency } from '../ports/restorer.js';
import { passthroughRestorer } from '../ports/restorer.js';
import type { RestorationPlan, RestorationRecord } from '../resolution/types.js';
import { moduleNameForPath } from '../resolution/module-name.js';
import { writeTextFile } from '../../utils/fs.js';
import { describeCause } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { mapOutputPath } from './output-paths.js';

export type FileRestoreStatus = 'restored' | 'fallback' | 'skipped' | 'failed';

export interface FileRestoreResult {
  nodeKey: string;
  status: FileRestoreStatus;
  outputPath?: string;
  /** Why a file was skipped, fell back or failed */
  reason?: string;
}

export interface RestoreSummary {
  total: number;
  restored: number;
  fallback: number;
  skipped: number;
  failed: number;
}

export interface RestoreExecutionResult {
  /** False when any file failed to be written */
  success: boolean;
  results: FileRestoreResult[];
  summary: RestoreSummary;
}

export interface RestoreExecutorOptions {
  outputDir: string;
  /** Roots output paths and module names are computed against */
  sourceRoots: string[];
  extensions: string[];
  packageInit?: boolean;
  restorer?: RestorerPort;
  /** Compute results without writing anything */
  dryRun?: boolean;
}

export class RestorationExecutor {
  private readonly restorer: RestorerPort;

  constructor(private readonly options: RestoreExecutorOptions) {
    this.restorer = options.restorer ?? passthroughRestorer;
  }

  async execute(plan: RestorationPlan): Promise<RestoreExecutionResult> {
    const results: FileRestoreResult[] = [];
    const restored = new Map<string, string>();
    // output path -> node that writes it
    const claimed = new Map<string, string>();

    logger.info(`Restoring ${plan.records.length} files`);

    for (const record of plan.records) {
      const result = await this.restoreRecord(record, restored, claimed);
      results.push(result);
    }

    const summary = this.summarize(results);
    logger.info(`Restored ${summary.restored}, fallback ${summary.fallback}, skipped ${summary.skipped}, failed ${summary.failed}`);

    return { success: summary.failed === 0, results, summary };
  }

  private async restoreRecord(
    record: RestorationRecord,
    restored: Map<string, string>,
    claimed: Map<string, string>
  ): Promise<FileRestoreResult> {
    const { nodeKey } = record;

    if (record.state === 'error') {
      return { nodeKey, status: 'skipped', reason: 'read error' };
    }
    if (record.content === undefined) {
      return { nodeKey, status: 'skipped', reason: 'not read' };
    }

    const outputPath = mapOutputPath(nodeKey, this.options.sourceRoots, this.options.outputDir);
    const owner = claimed.get(outputPath);
    if (owner !== undefined) {
      logger.warn(`Not restoring ${nodeKey}: ${outputPath} is already written from ${owner}`);
      return { nodeKey, status: 'skipped', outputPath, reason: `output path already used by ${owner}` };
    }
    claimed.set(outputPath, nodeKey);

    const dependencies: RestoredDependency[] = [];
    for (const depKey of record.resolvedDependencyKeys) {
      const content = restored.get(depKey);
      // Cycle members restored later are not available yet
      if (content === undefined) continue;
      dependencies.push({ nodeKey: depKey, moduleName: this.moduleName(depKey), content });
    }

    let text: string;
    let status: FileRestoreStatus = 'restored';
    let reason: string | undefined;
    try {
      text = await this.restorer.restore({
        nodeKey,
        moduleName: this.moduleName(nodeKey),
        content: record.content,
        dependencies
      });
      if (text.trim() === '') {
        text = record.content;
        status = 'fallback';
        reason = 'restorer returned no content';
      }
    } catch (error) {
      text = record.content;
      status = 'fallback';
      reason = describeCause(error);
    }

    if (status === 'fallback') {
      logger.warn(`Keeping original content of ${nodeKey}: ${reason}`);
    }
    restored.set(nodeKey, text);

    if (this.options.dryRun) {
      return { nodeKey, status, outputPath, reason };
    }

    try {
      await writeTextFile(outputPath, text);
    } catch (error) {
      logger.error(`Failed to write ${outputPath}`, error);
      return { nodeKey, status: 'failed', outputPath, reason: describeCause(error) };
    }
    return { nodeKey, status, outputPath, reason };
  }

  private moduleName(nodeKey: string): string | undefined {
    return moduleNameForPath(nodeKey, this.options.sourceRoots, this.options.extensions, this.options.packageInit);
  }

  private summarize(results: FileRestoreResult[]): RestoreSummary {
    const summary: RestoreSummary = { total: results.length, restored: 0, fallback: 0, skipped: 0, failed: 0 };
    for (const result of results) {
      summary[result.status]++;
    }
    return summary;
  }
}
