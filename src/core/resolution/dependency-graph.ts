/**
 * Dependency graph: key-indexed node arena with edges stored as keys.
 *
 * Edges point dependent -> dependency. Nodes are never removed during a run;
 * once sealed the graph rejects every mutation, so a snapshot taken for
 * linearization cannot go stale.
 */

import { GraphInvariantError } from '../../utils/errors.js';
import type { GraphNode, GraphSnapshot, NodeState, NodeView } from './types.js';

export interface NodeInit {
  depth?: number;
}

export interface ReferenceRecord {
  rawReferences: string[];
  unresolvedReferences: string[];
  dynamicReferences: number;
  malformedReferences: number;
}

function createNode(key: string, init: NodeInit = {}): GraphNode {
  return {
    key,
    state: 'discovered',
    rawReferences: [],
    dependencies: new Set(),
    unresolvedReferences: [],
    dynamicReferences: 0,
    malformedReferences: 0,
    depth: init.depth ?? 0
  };
}

function freezeNode(node: GraphNode): NodeView {
  return Object.freeze({
    key: node.key,
    state: node.state,
    rawReferences: Object.freeze([...node.rawReferences]),
    content: node.content,
    dependencies: Object.freeze([...node.dependencies].sort()),
    unresolvedReferences: Object.freeze([...node.unresolvedReferences]),
    dynamicReferences: node.dynamicReferences,
    malformedReferences: node.malformedReferences,
    depth: node.depth,
    error: node.error
  });
}

export class DependencyGraph {
  private readonly nodes = new Map<string, GraphNode>();
  /** Reverse index: dependency -> dependents */
  private readonly dependents = new Map<string, Set<string>>();
  private edges = 0;
  private sealed = false;

  /**
   * Insert a node if it is not present yet. Returns the (possibly existing) node.
   */
  addNode(key: string, init: NodeInit = {}): NodeView {
    this.assertMutable();
    let node = this.nodes.get(key);
    if (!node) {
      node = createNode(key, init);
      this.nodes.set(key, node);
    }
    return freezeNode(node);
  }

  /**
   * Record that `fromKey` requires `toKey`. Idempotent.
   * Creates `toKey` in state `discovered` when it is new.
   * Returns true only when a new edge was added.
   */
  addEdge(fromKey: string, toKey: string, init: NodeInit = {}): boolean {
    this.assertMutable();
    const from = this.require(fromKey);

    if (!this.nodes.has(toKey)) {
      this.nodes.set(toKey, createNode(toKey, init));
    }
    if (from.dependencies.has(toKey)) return false;

    from.dependencies.add(toKey);
    let reverse = this.dependents.get(toKey);
    if (!reverse) {
      reverse = new Set();
      this.dependents.set(toKey, reverse);
    }
    reverse.add(fromKey);
    this.edges++;
    return true;
  }

  /**
   * Mark a node as a dead end. Its node and already-recorded edges are kept.
   */
  markError(key: string, cause: Error): void {
    this.assertMutable();
    const node = this.require(key);
    node.state = 'error';
    node.error = cause;
  }

  beginReading(key: string): void {
    this.transition(key, ['discovered'], 'reading');
  }

  /**
   * Cache a node's text. Content is write-once.
   */
  setContent(key: string, content: string): void {
    this.assertMutable();
    const node = this.require(key);
    if (node.content !== undefined) {
      throw new GraphInvariantError(`Content of ${key} is already set`, { key });
    }
    node.content = content;
  }

  recordReferences(key: string, record: ReferenceRecord): void {
    this.assertMutable();
    const node = this.require(key);
    node.rawReferences.push(...record.rawReferences);
    node.unresolvedReferences.push(...record.unresolvedReferences);
    node.dynamicReferences += record.dynamicReferences;
    node.malformedReferences += record.malformedReferences;
  }

  markResolved(key: string): void {
    this.transition(key, ['reading'], 'resolved');
  }

  /**
   * Node left unread (beyond the depth limit).
   */
  markUnresolved(key: string): void {
    this.transition(key, ['discovered'], 'unresolved');
  }

  has(key: string): boolean {
    return this.nodes.has(key);
  }

  get(key: string): NodeView | undefined {
    const node = this.nodes.get(key);
    return node ? freezeNode(node) : undefined;
  }

  getState(key: string): NodeState | undefined {
    return this.nodes.get(key)?.state;
  }

  /** Insertion order */
  keys(): string[] {
    return [...this.nodes.keys()];
  }

  get size(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges;
  }

  /** Direct dependencies, sorted */
  getDependencies(key: string): string[] {
    return [...(this.nodes.get(key)?.dependencies ?? [])].sort();
  }

  /** Direct dependents, sorted */
  getDependents(key: string): string[] {
    return [...(this.dependents.get(key) ?? [])].sort();
  }

  /**
   * Every node reachable from `key` through dependency edges, sorted.
   * `key` itself is included only when it lies on a cycle.
   */
  getTransitiveDependencies(key: string): string[] {
    const seen = new Set<string>();
    const stack = [...(this.nodes.get(key)?.dependencies ?? [])];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      for (const dep of this.nodes.get(next)?.dependencies ?? []) {
        if (!seen.has(dep)) stack.push(dep);
      }
    }
    return [...seen].sort();
  }

  /**
   * Stop accepting mutations. Called once discovery has quiesced.
   */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Immutable view of the whole graph.
   */
  snapshot(): GraphSnapshot {
    const nodes = new Map<string, NodeView>();
    const keys = [...this.nodes.keys()].sort();
    for (const key of keys) {
      const node = this.nodes.get(key);
      if (node) nodes.set(key, freezeNode(node));
    }
    return Object.freeze({ nodes: new ReadonlyNodeMap(nodes), keys: Object.freeze(keys), edgeCount: this.edges });
  }

  private require(key: string): GraphNode {
    const node = this.nodes.get(key);
    if (!node) {
      throw new GraphInvariantError(`Unknown node ${key}`, { key });
    }
    return node;
  }

  private transition(key: string, from: NodeState[], to: NodeState): void {
    this.assertMutable();
    const node = this.require(key);
    if (!from.includes(node.state)) {
      throw new GraphInvariantError(`Cannot move ${key} from ${node.state} to ${to}`, { key, state: node.state, to });
    }
    node.state = to;
  }

  private assertMutable(): void {
    if (this.sealed) {
      throw new GraphInvariantError('Graph is sealed; no mutation after discovery');
    }
  }
}

/**
 * Read-only view over a snapshot's nodes; exposes no mutating methods.
 */
class ReadonlyNodeMap implements ReadonlyMap<string, NodeView> {
  private readonly nodes: Map<string, NodeView>;

  constructor(nodes: Map<string, NodeView>) {
    this.nodes = nodes;
  }

  get size(): number {
    return this.nodes.size;
  }

  get(key: string): NodeView | undefined {
    return this.nodes.get(key);
  }

  has(key: string): boolean {
    return this.nodes.has(key);
  }

  forEach(callback: (value: NodeView, key: string, map: ReadonlyMap<string, NodeView>) => void, thisArg?: unknown): void {
    this.nodes.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.nodes.entries();
  }

  keys() {
    return this.nodes.keys();
  }

  values() {
    return this.nodes.values();
  }

  [Symbol.iterator]() {
    return this.nodes[Symbol.iterator]();
  }
}
