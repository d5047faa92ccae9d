/**
 * Path resolver: logical module identifier -> file under an ordered list of
 * search roots.
 *
 * Candidate order for `a.b` with roots [r1, r2] and extensions [.lua.unluac, .lua]:
 *   r1/a/b.lua.unluac, r1/a/b.lua, (r1/a/b/init.lua.unluac, r1/a/b/init.lua),
 *   r2/a/b.lua.unluac, ...
 * Root priority always dominates extension priority.
 */

import { join, resolve } from 'path';
import type { FileSystemPort } from '../ports/filesystem.js';
import { nodeFileSystem } from '../ports/node-filesystem.js';
import { DEFAULT_EXTENSIONS, FILE_PATTERNS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { identifierSegments, isLogicalIdentifier } from './module-name.js';
import type { PathResolverOptions, ResolveResult } from './types.js';

export class PathResolver {
  private readonly searchRoots: string[];
  private readonly extensions: readonly string[];
  private readonly packageInit: boolean;
  private readonly fileSystem: FileSystemPort;
  /** Resolved-path cache; lives as long as this resolver (one discovery run) */
  private readonly cache = new Map<string, Promise<ResolveResult>>();

  constructor(options: PathResolverOptions) {
    if (options.searchRoots.length === 0) {
      throw new ValidationError('at least one search root is required');
    }
    const extensions = options.extensions ?? DEFAULT_EXTENSIONS;
    if (extensions.length === 0) {
      throw new ValidationError('at least one source-file extension is required');
    }
    for (const ext of extensions) {
      if (!ext.startsWith('.') || ext.length < 2) {
        throw new ValidationError(`extension '${ext}' must start with '.'`);
      }
    }

    // Duplicates would only repeat probes; keep first occurrence
    this.searchRoots = [...new Set(options.searchRoots.map((root) => resolve(root)))];
    this.extensions = [...extensions];
    this.packageInit = options.packageInit ?? false;
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
  }

  getSearchRoots(): string[] {
    return [...this.searchRoots];
  }

  /**
   * All paths probed for an identifier, in priority order.
   * Empty for strings that are not logical identifiers.
   */
  candidatePaths(identifier: string): string[] {
    if (!isLogicalIdentifier(identifier)) return [];

    const segments = identifierSegments(identifier);
    const candidates: string[] = [];
    for (const root of this.searchRoots) {
      const base = join(root, ...segments);
      for (const ext of this.extensions) {
        candidates.push(base + ext);
      }
      if (this.packageInit) {
        for (const ext of this.extensions) {
          candidates.push(join(base, FILE_PATTERNS.PACKAGE_INIT + ext));
        }
      }
    }
    return candidates;
  }

  /**
   * Resolve an identifier to the first existing candidate.
   * Concurrent lookups of the same identifier share one probe.
   */
  resolve(identifier: string): Promise<ResolveResult> {
    const cached = this.cache.get(identifier);
    if (cached) return cached;

    const pending = this.probe(identifier);
    this.cache.set(identifier, pending);
    pending.catch(() => {
      // Never cache a failed probe
      this.cache.delete(identifier);
    });
    return pending;
  }

  /**
   * Forget every resolution; later lookups probe the filesystem again.
   */
  clearCache(): void {
    this.cache.clear();
  }

  private async probe(identifier: string): Promise<ResolveResult> {
    const candidates = this.candidatePaths(identifier);
    const perRoot = candidates.length / this.searchRoots.length;

    for (let i = 0; i < candidates.length; i++) {
      if (await this.fileSystem.isFile(candidates[i])) {
        return {
          kind: 'resolved',
          identifier,
          path: candidates[i],
          root: this.searchRoots[Math.floor(i / perRoot)]
        };
      }
    }

    return { kind: 'unresolved', identifier, tried: candidates };
  }
}
