/**
 * Where a restored file is written.
 */

import { basename, isAbsolute, join, relative } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';

/**
 * `x.lua.unluac` -> `x.lua`; other names are kept.
 */
export function restoredFileName(name: string): string {
  if (name.endsWith(FILE_PATTERNS.UNLUAC_SUFFIX)) {
    return name.slice(0, name.length - FILE_PATTERNS.UNLUAC_SUFFIX.length) + FILE_PATTERNS.LUA_SUFFIX;
  }
  return name;
}

/**
 * Output path for a source file: its path relative to the first source root
 * containing it, re-rooted under `outputDir`. Files outside every root keep
 * only their file name.
 */
export function mapOutputPath(nodeKey: string, sourceRoots: readonly string[], outputDir: string): string {
  for (const root of sourceRoots) {
    const rel = relative(root, nodeKey);
    if (rel && !rel.startsWith('..') && !isAbsolute(rel)) {
      return join(outputDir, restoredFileName(rel));
    }
  }
  return join(outputDir, restoredFileName(basename(nodeKey)));
}
