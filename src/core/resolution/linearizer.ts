/**
 * Cycle detection and linearization.
 *
 * 1. Tarjan's algorithm (iterative) splits the snapshot into strongly
 *    connected components.
 * 2. Components are sorted over the condensation graph with Kahn's algorithm,
 *    dependencies first. Among ready components the one with the smallest
 *    representative key goes next.
 * 3. Members of a cycle group are emitted together, in key order. There is
 *    no true dependency order inside a cycle; key order keeps it reproducible.
 */

import type { ComponentInfo, CycleGroup, GraphSnapshot, Linearization, NodeView } from './types.js';

function dependenciesOf(snapshot: GraphSnapshot, key: string): readonly string[] {
  return snapshot.nodes.get(key)?.dependencies ?? [];
}

/**
 * Strongly connected components, each sorted, in Tarjan emission order.
 * Roots and neighbours are visited in key order so the result is stable.
 */
export function findStronglyConnectedComponents(snapshot: GraphSnapshot): string[][] {
  const index = new Map<string, number>();
  const lowlink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];
  let counter = 0;

  interface Frame {
    key: string;
    deps: readonly string[];
    next: number;
  }

  const open = (key: string, work: Frame[]): void => {
    index.set(key, counter);
    lowlink.set(key, counter);
    counter++;
    stack.push(key);
    onStack.add(key);
    work.push({ key, deps: dependenciesOf(snapshot, key), next: 0 });
  };

  for (const root of snapshot.keys) {
    if (index.has(root)) continue;

    const work: Frame[] = [];
    open(root, work);

    while (work.length > 0) {
      const frame = work[work.length - 1];

      if (frame.next < frame.deps.length) {
        const dep = frame.deps[frame.next++];
        if (!snapshot.nodes.has(dep)) continue;
        if (!index.has(dep)) {
          open(dep, work);
        } else if (onStack.has(dep)) {
          lowlink.set(frame.key, Math.min(lowlink.get(frame.key) ?? 0, index.get(dep) ?? 0));
        }
        continue;
      }

      work.pop();
      const low = lowlink.get(frame.key) ?? 0;
      if (low === index.get(frame.key)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.key);
        components.push(component.sort());
      }

      const parent = work[work.length - 1];
      if (parent) {
        lowlink.set(parent.key, Math.min(lowlink.get(parent.key) ?? 0, low));
      }
    }
  }

  return components;
}

function hasSelfLoop(node: NodeView | undefined): boolean {
  return node !== undefined && node.dependencies.includes(node.key);
}

/**
 * Shortest cycle from the smallest member back to itself, staying inside the
 * group. Breadth-first with neighbours in key order.
 */
export function findCyclePath(snapshot: GraphSnapshot, members: readonly string[]): string[] {
  const start = members[0];
  const inGroup = new Set(members);
  const parent = new Map<string, string>();
  const visited = new Set<string>([start]);
  const queue: string[] = [start];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;

    for (const dep of dependenciesOf(snapshot, current)) {
      if (!inGroup.has(dep)) continue;
      if (dep === start) {
        const path: string[] = [];
        let step: string | undefined = current;
        while (step !== undefined && step !== start) {
          path.push(step);
          step = parent.get(step);
        }
        path.push(start);
        path.reverse();
        path.push(start);
        return path;
      }
      if (!visited.has(dep)) {
        visited.add(dep);
        parent.set(dep, current);
        queue.push(dep);
      }
    }
  }

  // Unreachable for a real cycle group
  return [start];
}

/**
 * Insert into an array kept in descending order, so the smallest item is
 * always popped from the end.
 */
function insertDescending(items: string[], value: string): void {
  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (items[mid] > value) lo = mid + 1;
    else hi = mid;
  }
  items.splice(lo, 0, value);
}

/**
 * Deterministic, cycle-tolerant processing order for a graph snapshot.
 */
export function linearize(snapshot: GraphSnapshot): Linearization {
  const sccs = findStronglyConnectedComponents(snapshot);

  const componentOf = new Map<string, number>();
  const components: ComponentInfo[] = sccs.map((members, id) => {
    for (const key of members) componentOf.set(key, id);
    return {
      members,
      representative: members[0],
      isCycle: members.length > 1 || hasSelfLoop(snapshot.nodes.get(members[0]))
    };
  });

  // Condensation: remaining[c] = distinct components c still waits for
  const remaining = new Array<number>(components.length).fill(0);
  const waiting = components.map(() => new Set<number>());
  for (const key of snapshot.keys) {
    const self = componentOf.get(key);
    if (self === undefined) continue;
    for (const dep of dependenciesOf(snapshot, key)) {
      const target = componentOf.get(dep);
      if (target === undefined || target === self || waiting[target].has(self)) continue;
      waiting[target].add(self);
      remaining[self]++;
    }
  }

  const byRepresentative = new Map<string, number>();
  const ready: string[] = [];
  components.forEach((component, id) => {
    byRepresentative.set(component.representative, id);
    if (remaining[id] === 0) insertDescending(ready, component.representative);
  });

  const order: string[] = [];
  const emitted: ComponentInfo[] = [];
  const cycles: CycleGroup[] = [];

  while (ready.length > 0) {
    const representative = ready.pop();
    const id = representative === undefined ? undefined : byRepresentative.get(representative);
    if (id === undefined) break;

    const component = components[id];
    emitted.push(component);
    order.push(...component.members);
    if (component.isCycle) {
      cycles.push({ members: [...component.members], examplePath: findCyclePath(snapshot, component.members) });
    }

    for (const dependent of waiting[id]) {
      remaining[dependent]--;
      if (remaining[dependent] === 0) {
        insertDescending(ready, components[dependent].representative);
      }
    }
  }

  return { order, cycles, components: emitted };
}
