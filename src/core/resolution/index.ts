/**
 * Module resolution engine.
 * Public exports for path resolution, reference extraction, graph building,
 * linearization and discovery.
 */

export { PathResolver } from './path-resolver.js';
export { extractReferences, listIdentifiers, countReferences } from './reference-extractor.js';
export { DependencyGraph } from './dependency-graph.js';
export { linearize, findStronglyConnectedComponents, findCyclePath } from './linearizer.js';
export { DiscoveryDriver, discover } from './discovery-driver.js';
export { buildRestorationPlan } from './restoration-plan.js';
export { isLogicalIdentifier, moduleNameForPath } from './module-name.js';

export type { NodeInit, ReferenceRecord } from './dependency-graph.js';
export type {
  ExtractedReference,
  ExtractionResult,
  ResolveResult,
  PathResolverOptions,
  NodeState,
  GraphNode,
  NodeView,
  GraphSnapshot,
  CycleGroup,
  ComponentInfo,
  Linearization,
  DiscoveryOptions,
  DiscoveryResult,
  RestorationRecord,
  RestorationSummary,
  RestorationPlan,
  UnresolvedReferenceEntry
} from './types.js';
