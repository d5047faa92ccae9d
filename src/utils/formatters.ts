import { relative, isAbsolute } from 'path';
import type { CycleGroup, RestorationSummary } from '../core/resolution/types.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user.
 *
 * - Uses relative paths from cwd for paths inside it
 * - Falls back to the absolute path otherwise
 *
 * @example
 * formatPathForDisplay('/work/lua/a.lua', '/work') // => 'lua/a.lua'
 * formatPathForDisplay('/elsewhere/a.lua', '/work') // => '/elsewhere/a.lua'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  return path;
}

/**
 * `a.lua -> b.lua -> a.lua`
 */
export function formatCyclePath(cycle: CycleGroup, cwd: string = process.cwd()): string {
  return cycle.examplePath.map((key) => formatPathForDisplay(key, cwd)).join(' -> ');
}

/**
 * Summary block lines, one count per line.
 */
export function formatSummaryLines(summary: RestorationSummary): string[] {
  return [
    `Files:                ${summary.totalNodes}`,
    `Dependencies:         ${summary.edgeCount}`,
    `Unresolved requires:  ${summary.unresolvedReferenceCount}`,
    `Dynamic requires:     ${summary.dynamicReferenceCount}`,
    `Malformed requires:   ${summary.malformedReferenceCount}`,
    `Read errors:          ${summary.errorCount}`,
    `Cycle groups:         ${summary.cycleGroupCount}`
  ];
}

export function pluralize(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
