/**
 * Restoration plan: the hand-off from the resolution engine to the
 * restoration and reporting collaborators.
 */

import type {
  DiscoveryResult,
  RestorationPlan,
  RestorationRecord,
  RestorationSummary,
  UnresolvedReferenceEntry
} from './types.js';

/**
 * Ordered records, cycle report and summary counts for a finished discovery.
 */
export function buildRestorationPlan(result: DiscoveryResult): RestorationPlan {
  const { snapshot, linearization } = result;
  const records: RestorationRecord[] = [];
  const unresolvedReferences: UnresolvedReferenceEntry[] = [];

  const summary: RestorationSummary = {
    totalNodes: snapshot.keys.length,
    edgeCount: snapshot.edgeCount,
    unresolvedReferenceCount: 0,
    dynamicReferenceCount: 0,
    malformedReferenceCount: 0,
    errorCount: 0,
    cycleGroupCount: linearization.cycles.length
  };

  for (const key of linearization.order) {
    const node = snapshot.nodes.get(key);
    if (!node) continue;

    records.push({
      nodeKey: key,
      content: node.content,
      resolvedDependencyKeys: [...node.dependencies],
      state: node.state
    });

    for (const identifier of node.unresolvedReferences) {
      unresolvedReferences.push({ nodeKey: key, identifier });
    }
    summary.unresolvedReferenceCount += node.unresolvedReferences.length;
    summary.dynamicReferenceCount += node.dynamicReferences;
    summary.malformedReferenceCount += node.malformedReferences;
    if (node.state === 'error') summary.errorCount++;
  }

  return {
    rootKey: result.rootKey,
    records,
    cycles: linearization.cycles.map((cycle) => ({
      members: [...cycle.members],
      examplePath: [...cycle.examplePath]
    })),
    unresolvedReferences,
    summary
  };
}
