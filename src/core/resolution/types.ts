/**
 * Types for the module resolution engine.
 * Used by the path resolver, reference extractor, dependency graph,
 * linearizer and discovery driver.
 */

import type { FileSystemPort } from '../ports/filesystem.js';

// ============================================================================
// Reference extraction
// ============================================================================

/**
 * One `require` site found in a file.
 * Only `identifier` references take part in resolution; the other two kinds
 * are counted for reporting.
 */
export type ExtractedReference =
  | { kind: 'identifier'; identifier: string; line: number }
  | { kind: 'dynamic'; expression: string; line: number }
  | { kind: 'malformed'; raw: string; line: number };

export interface ExtractionResult {
  /** In source order, duplicates preserved */
  references: ExtractedReference[];
}

// ============================================================================
// Path resolution
// ============================================================================

export type ResolveResult =
  | {
      kind: 'resolved';
      identifier: string;
      /** Canonical absolute path of the matched file */
      path: string;
      /** Search root the match was found under */
      root: string;
    }
  | {
      kind: 'unresolved';
      identifier: string;
      /** Candidates probed, in order */
      tried: string[];
    };

export interface PathResolverOptions {
  /** Ordered search roots; earlier roots win */
  searchRoots: string[];
  /** Ordered extensions; default ['.lua.unluac', '.lua'] */
  extensions?: readonly string[];
  /** Try `<module>/init<ext>` after the direct candidates of each root */
  packageInit?: boolean;
  fileSystem?: FileSystemPort;
}

// ============================================================================
// Dependency graph
// ============================================================================

/**
 * Lifecycle of a node.
 * discovered -> reading -> resolved | error; nodes cut off by maxDepth end
 * as `unresolved` without ever being read.
 */
export type NodeState =
  | 'discovered'
  | 'reading'
  | 'resolved'
  | 'unresolved'
  | 'error';

export interface GraphNode {
  /** Canonical absolute path */
  key: string;
  state: NodeState;
  /** Identifiers found in the text, duplicates and order preserved */
  rawReferences: string[];
  /** Set once, on the first successful read */
  content?: string;
  /** Keys of nodes this file requires */
  dependencies: Set<string>;
  /** Identifiers that matched no file, in order */
  unresolvedReferences: string[];
  dynamicReferences: number;
  malformedReferences: number;
  /** Distance from the start file along the first discovery path */
  depth: number;
  /** Cause recorded by markError */
  error?: Error;
}

/**
 * Frozen view of a node.
 */
export interface NodeView {
  readonly key: string;
  readonly state: NodeState;
  readonly rawReferences: readonly string[];
  readonly content?: string;
  /** Sorted */
  readonly dependencies: readonly string[];
  readonly unresolvedReferences: readonly string[];
  readonly dynamicReferences: number;
  readonly malformedReferences: number;
  readonly depth: number;
  readonly error?: Error;
}

export interface GraphSnapshot {
  readonly nodes: ReadonlyMap<string, NodeView>;
  /** Sorted */
  readonly keys: readonly string[];
  readonly edgeCount: number;
}

// ============================================================================
// Linearization
// ============================================================================

/**
 * A strongly connected component that is an actual cycle: more than one
 * member, or a single member requiring itself.
 */
export interface CycleGroup {
  /** Sorted */
  members: string[];
  /** Starts and ends at the smallest member, e.g. [A, B, A] */
  examplePath: string[];
}

export interface ComponentInfo {
  /** Sorted */
  members: string[];
  /** Smallest member key; used as the sort tie-break */
  representative: string;
  isCycle: boolean;
}

export interface Linearization {
  /** Dependencies before dependents */
  order: string[];
  cycles: CycleGroup[];
  /** Components in emission order */
  components: ComponentInfo[];
}

// ============================================================================
// Discovery
// ============================================================================

export interface DiscoveryOptions {
  resolver: import('./path-resolver.js').PathResolver;
  fileSystem?: FileSystemPort;
  /** Files deeper than this are not read (default 10) */
  maxDepth?: number;
  /** Worklist items processed concurrently (default 4) */
  concurrency?: number;
  /** Per-file read timeout (default 10000) */
  readTimeoutMs?: number;
  /** Cancels the run between worklist batches */
  signal?: AbortSignal;
}

export interface DiscoveryResult {
  /** Canonical key of the start file */
  rootKey: string;
  graph: import('./dependency-graph.js').DependencyGraph;
  snapshot: GraphSnapshot;
  linearization: Linearization;
}

// ============================================================================
// Restoration plan
// ============================================================================

export interface RestorationRecord {
  nodeKey: string;
  /** Undefined for nodes that were never read */
  content?: string;
  /** Sorted */
  resolvedDependencyKeys: string[];
  state: NodeState;
}

export interface UnresolvedReferenceEntry {
  nodeKey: string;
  identifier: string;
}

export interface RestorationSummary {
  totalNodes: number;
  edgeCount: number;
  unresolvedReferenceCount: number;
  dynamicReferenceCount: number;
  malformedReferenceCount: number;
  errorCount: number;
  cycleGroupCount: number;
}

export interface RestorationPlan {
  rootKey: string;
  records: RestorationRecord[];
  cycles: CycleGroup[];
  unresolvedReferences: UnresolvedReferenceEntry[];
  summary: RestorationSummary;
}
