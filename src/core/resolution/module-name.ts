/**
 * Logical module identifiers (`a.b.c`) and their mapping to relative paths.
 */

import { isAbsolute, relative, sep } from 'path';
import { FILE_PATTERNS, MODULE_SEPARATOR } from '../../constants/index.js';

const IDENTIFIER_PATTERN = /^[A-Za-z0-9_-]+(?:\.[A-Za-z0-9_-]+)*$/;

/**
 * Whether a string is a dot-separated module identifier.
 * Empty segments, path delimiters and whitespace are rejected, so a valid
 * identifier can never name a path outside its search root.
 */
export function isLogicalIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

export function identifierSegments(identifier: string): string[] {
  return identifier.split(MODULE_SEPARATOR);
}

/**
 * The identifier a file would be required by: first search root containing
 * the file wins, the first matching extension is stripped.
 * Returns undefined for files outside every root or with another extension.
 */
export function moduleNameForPath(
  filePath: string,
  searchRoots: readonly string[],
  extensions: readonly string[],
  packageInit = false
): string | undefined {
  for (const root of searchRoots) {
    const rel = relative(root, filePath);
    if (!rel || rel.startsWith('..') || isAbsolute(rel)) continue;

    const ext = extensions.find((e) => rel.endsWith(e));
    if (!ext) continue;

    const segments = rel.slice(0, rel.length - ext.length).split(sep);
    if (packageInit && segments.length > 1 && segments[segments.length - 1] === FILE_PATTERNS.PACKAGE_INIT) {
      segments.pop();
    }

    const name = segments.join(MODULE_SEPARATOR);
    if (isLogicalIdentifier(name)) return name;
  }
  return undefined;
}
