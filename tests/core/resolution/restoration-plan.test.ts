import { describe, it, expect } from 'vitest';
import { discover } from '../../../src/core/resolution/discovery-driver.js';
import { PathResolver } from '../../../src/core/resolution/path-resolver.js';
import { buildRestorationPlan } from '../../../src/core/resolution/restoration-plan.js';
import { MemoryFileSystem, projectPath } from '../../test-helpers.js';

const LUA = projectPath('lua');
const lua = (name: string): string => projectPath('lua', `${name}.lua.unluac`);

describe('buildRestorationPlan', () => {
  it('should list records in processing order with cycle, unresolved and summary data', async () => {
    const fs = new MemoryFileSystem()
      .addFile(lua('main'), 'require "a"\nrequire "bad"\nrequire "missing"\nrequire(x)\nrequire("")')
      .addFile(lua('a'), 'require "b"')
      .addFile(lua('b'), 'require "a"\nrequire "gone"')
      .failRead(lua('bad'));
    const result = await discover(lua('main'), {
      resolver: new PathResolver({ searchRoots: [LUA], fileSystem: fs }),
      fileSystem: fs,
    });

    const plan = buildRestorationPlan(result);

    expect(plan.rootKey).toBe(lua('main'));
    expect(plan.records).toEqual([
      { nodeKey: lua('a'), content: 'require "b"', resolvedDependencyKeys: [lua('b')], state: 'resolved' },
      { nodeKey: lua('b'), content: 'require "a"\nrequire "gone"', resolvedDependencyKeys: [lua('a')], state: 'resolved' },
      { nodeKey: lua('bad'), content: undefined, resolvedDependencyKeys: [], state: 'error' },
      {
        nodeKey: lua('main'),
        content: 'require "a"\nrequire "bad"\nrequire "missing"\nrequire(x)\nrequire("")',
        resolvedDependencyKeys: [lua('a'), lua('bad')],
        state: 'resolved',
      },
    ]);
    expect(plan.cycles).toEqual([{ members: [lua('a'), lua('b')], examplePath: [lua('a'), lua('b'), lua('a')] }]);
    expect(plan.unresolvedReferences).toEqual([
      { nodeKey: lua('b'), identifier: 'gone' },
      { nodeKey: lua('main'), identifier: 'missing' },
    ]);
    expect(plan.summary).toEqual({
      totalNodes: 4,
      edgeCount: 4,
      unresolvedReferenceCount: 2,
      dynamicReferenceCount: 1,
      malformedReferenceCount: 1,
      errorCount: 1,
      cycleGroupCount: 1,
    });
  });

  it('should produce a single record for a file without requires', async () => {
    const fs = new MemoryFileSystem().addFile(lua('main'), 'return 1');
    const result = await discover(lua('main'), {
      resolver: new PathResolver({ searchRoots: [LUA], fileSystem: fs }),
      fileSystem: fs,
    });

    const plan = buildRestorationPlan(result);
    expect(plan.records.map((record) => record.nodeKey)).toEqual([lua('main')]);
    expect(plan.cycles).toEqual([]);
    expect(plan.summary.edgeCount).toBe(0);
  });
});
