/**
 * Discovery driver.
 * Walks outward from the start file, reading each file once, extracting its
 * requires and resolving them, until no new reachable file remains.
 *
 * The worklist is FIFO. Up to `concurrency` items are inspected at a time
 * (read + extract + resolve, no graph access); their outcomes are then
 * applied to the graph one by one, in worklist order, by this loop alone.
 * The graph therefore has a single writer and the result does not depend on
 * which read finishes first.
 *
 * Nodes are keyed by real path, so a file reached through a symlink and
 * through its target is one node.
 */

import { resolve } from 'path';
import type { FileSystemPort } from '../ports/filesystem.js';
import { nodeFileSystem } from '../ports/node-filesystem.js';
import { DEFAULTS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { DiscoveryCancelledError, ReadError, RootReadError, ValidationError } from '../../utils/errors.js';
import { DependencyGraph } from './dependency-graph.js';
import { linearize } from './linearizer.js';
import type { PathResolver } from './path-resolver.js';
import { countReferences, extractReferences, listIdentifiers } from './reference-extractor.js';
import type { DiscoveryOptions, DiscoveryResult, ResolveResult } from './types.js';

/** One extracted identifier; `target` is the canonical key it resolved to */
interface InspectedReference {
  identifier: string;
  target?: string;
}

type Inspection =
  | {
      ok: true;
      key: string;
      content: string;
      identifiers: string[];
      references: InspectedReference[];
      dynamic: number;
      malformed: number;
    }
  | { ok: false; key: string; error: Error };

function positiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export class DiscoveryDriver {
  private readonly resolver: PathResolver;
  private readonly fileSystem: FileSystemPort;
  private readonly maxDepth: number;
  private readonly concurrency: number;
  private readonly readTimeoutMs: number;
  private readonly signal?: AbortSignal;

  constructor(options: DiscoveryOptions) {
    this.resolver = options.resolver;
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.maxDepth = options.maxDepth ?? DEFAULTS.MAX_DEPTH;
    if (!Number.isInteger(this.maxDepth) || this.maxDepth < 0) {
      throw new ValidationError(`maxDepth must be a non-negative integer, got ${this.maxDepth}`);
    }
    this.concurrency = positiveInteger(options.concurrency ?? DEFAULTS.CONCURRENCY, 'concurrency');
    this.readTimeoutMs = positiveInteger(options.readTimeoutMs ?? DEFAULTS.READ_TIMEOUT_MS, 'readTimeoutMs');
    this.signal = options.signal;
  }

  /**
   * Build the graph reachable from `startFile` and linearize it.
   * Throws RootReadError when the start file cannot be read and
   * DiscoveryCancelledError when the signal fires; in both cases no graph is
   * returned.
   */
  async run(startFile: string): Promise<DiscoveryResult> {
    const graph = new DependencyGraph();
    const rootKey = await this.canonicalRoot(startFile);
    graph.addNode(rootKey, { depth: 0 });

    const worklist: string[] = [rootKey];
    logger.debug(`Starting discovery at ${rootKey}`, { concurrency: this.concurrency, maxDepth: this.maxDepth });

    while (worklist.length > 0) {
      this.throwIfCancelled();

      const batch = worklist.splice(0, this.concurrency);
      const readable: string[] = [];
      for (const key of batch) {
        const depth = graph.get(key)?.depth ?? 0;
        if (depth > this.maxDepth) {
          graph.markUnresolved(key);
          logger.debug(`Not reading ${key}: depth ${depth} exceeds ${this.maxDepth}`);
          continue;
        }
        graph.beginReading(key);
        readable.push(key);
      }

      const inspections = await Promise.all(readable.map((key) => this.inspect(key)));
      this.throwIfCancelled();

      for (const inspection of inspections) {
        this.apply(graph, inspection, rootKey, worklist);
      }
    }

    graph.seal();
    const snapshot = graph.snapshot();
    const linearization = linearize(snapshot);

    logger.debug(`Discovery finished`, {
      nodes: snapshot.keys.length,
      edges: snapshot.edgeCount,
      cycles: linearization.cycles.length
    });

    return { rootKey, graph, snapshot, linearization };
  }

  /**
   * Read, extract and resolve one file. Never rejects; touches no graph state.
   */
  private async inspect(key: string): Promise<Inspection> {
    let content: string;
    try {
      content = await this.fileSystem.readFile(key, { signal: this.readSignal() });
    } catch (error) {
      return { ok: false, key, error: new ReadError(key, error) };
    }

    try {
      const extraction = extractReferences(content);
      const identifiers = listIdentifiers(extraction);
      const counts = countReferences(extraction);
      const references = await Promise.all(identifiers.map((id) => this.resolveReference(id)));
      return {
        ok: true,
        key,
        content,
        identifiers,
        references,
        dynamic: counts.dynamic,
        malformed: counts.malformed
      };
    } catch (error) {
      return { ok: false, key, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  /**
   * Apply one inspection to the graph. The only place discovery mutates it.
   */
  private apply(graph: DependencyGraph, inspection: Inspection, rootKey: string, worklist: string[]): void {
    const { key } = inspection;

    if (!inspection.ok) {
      if (key === rootKey) {
        throw new RootReadError(key, inspection.error);
      }
      graph.markError(key, inspection.error);
      logger.warn(`Skipping ${key}: ${inspection.error.message}`);
      return;
    }

    graph.setContent(key, inspection.content);
    const depth = (graph.get(key)?.depth ?? 0) + 1;
    const unresolved: string[] = [];

    for (const { identifier, target } of inspection.references) {
      if (target === undefined) {
        if (!unresolved.includes(identifier)) {
          unresolved.push(identifier);
          logger.warn(`Unresolved module '${identifier}' required by ${key}`);
        }
        continue;
      }

      const isNew = !graph.has(target);
      graph.addEdge(key, target, { depth });
      if (isNew) worklist.push(target);
    }

    graph.recordReferences(key, {
      rawReferences: inspection.identifiers,
      unresolvedReferences: unresolved,
      dynamicReferences: inspection.dynamic,
      malformedReferences: inspection.malformed
    });
    graph.markResolved(key);

    logger.debug(`Resolved ${key}`, {
      references: inspection.identifiers.length,
      unresolved: unresolved.length,
      dynamic: inspection.dynamic
    });
  }

  /**
   * Node key of the start file: absolute, symlinks followed.
   */
  private async canonicalRoot(startFile: string): Promise<string> {
    const requested = resolve(startFile);
    try {
      return await this.fileSystem.realpath(requested);
    } catch (error) {
      throw new RootReadError(requested, error);
    }
  }

  private async resolveReference(identifier: string): Promise<InspectedReference> {
    const resolution: ResolveResult = await this.resolver.resolve(identifier);
    if (resolution.kind === 'unresolved') {
      return { identifier };
    }
    return { identifier, target: await this.canonicalKey(resolution.path) };
  }

  /**
   * Several paths can name one file (symlinks); the graph keys it by its real path.
   */
  private async canonicalKey(filePath: string): Promise<string> {
    const absolute = resolve(filePath);
    try {
      return await this.fileSystem.realpath(absolute);
    } catch (error) {
      // Vanished since it was probed; the read will report it
      logger.debug(`Cannot canonicalize ${absolute}`, error);
      return absolute;
    }
  }

  private readSignal(): AbortSignal {
    const timeout = AbortSignal.timeout(this.readTimeoutMs);
    return this.signal ? AbortSignal.any([this.signal, timeout]) : timeout;
  }

  private throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw new DiscoveryCancelledError();
    }
  }
}

/**
 * Convenience wrapper: one driver, one run.
 */
export function discover(startFile: string, options: DiscoveryOptions): Promise<DiscoveryResult> {
  return new DiscoveryDriver(options).run(startFile);
}
