import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { discover } from '../../../src/core/resolution/discovery-driver.js';
import { PathResolver } from '../../../src/core/resolution/path-resolver.js';
import { buildRestorationPlan } from '../../../src/core/resolution/restoration-plan.js';
import type { RestorationPlan } from '../../../src/core/resolution/types.js';
import type { RestoreRequest, RestorerPort } from '../../../src/core/ports/restorer.js';
import { RestorationExecutor } from '../../../src/core/restore/restore-executor.js';
import { DEFAULT_EXTENSIONS } from '../../../src/constants/index.js';
import { MemoryFileSystem, projectPath } from '../../test-helpers.js';

const LUA = projectPath('lua');
const lua = (name: string): string => projectPath('lua', `${name}.lua.unluac`);

async function planFor(files: MemoryFileSystem, startFile = lua('main')): Promise<RestorationPlan> {
  const result = await discover(startFile, {
    resolver: new PathResolver({ searchRoots: [LUA], fileSystem: files }),
    fileSystem: files,
  });
  return buildRestorationPlan(result);
}

/**
 * Upper-cases content and remembers every request.
 */
function recordingRestorer(): RestorerPort & { requests: RestoreRequest[] } {
  const requests: RestoreRequest[] = [];
  return {
    requests,
    async restore(request) {
      requests.push(request);
      return request.content.toUpperCase();
    },
  };
}

describe('RestorationExecutor', () => {
  let tmpDir: string;
  let outputDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'luarestore-executor-'));
    outputDir = path.join(tmpDir, 'out');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function executor(restorer: RestorerPort, dryRun = false): RestorationExecutor {
    return new RestorationExecutor({ outputDir, sourceRoots: [LUA], extensions: [...DEFAULT_EXTENSIONS], restorer, dryRun });
  }

  it('should restore in plan order and hand over restored dependencies', async () => {
    const plan = await planFor(new MemoryFileSystem()
      .addFile(lua('main'), 'require "util"')
      .addFile(lua('util'), 'return {}'));
    const restorer = recordingRestorer();

    const result = await executor(restorer).execute(plan);

    expect(restorer.requests.map((r) => r.nodeKey)).toEqual([lua('util'), lua('main')]);
    expect(restorer.requests[1]).toEqual({
      nodeKey: lua('main'),
      moduleName: 'main',
      content: 'require "util"',
      dependencies: [{ nodeKey: lua('util'), moduleName: 'util', content: 'RETURN {}' }],
    });
    expect(result.success).toBe(true);
    expect(result.summary).toEqual({ total: 2, restored: 2, fallback: 0, skipped: 0, failed: 0 });
    expect(await fs.readFile(path.join(outputDir, 'util.lua'), 'utf8')).toBe('RETURN {}');
    expect(await fs.readFile(path.join(outputDir, 'main.lua'), 'utf8')).toBe('REQUIRE "UTIL"');
  });

  it('should leave out cycle members that are not restored yet', async () => {
    const plan = await planFor(new MemoryFileSystem()
      .addFile(lua('main'), 'require "a"')
      .addFile(lua('a'), 'require "b"')
      .addFile(lua('b'), 'require "a"'));
    const restorer = recordingRestorer();

    await executor(restorer).execute(plan);

    const [a, b] = restorer.requests;
    expect(a.nodeKey).toBe(lua('a'));
    expect(a.dependencies).toEqual([]);
    expect(b.dependencies.map((d) => d.nodeKey)).toEqual([lua('a')]);
  });

  it('should keep the original content when the restorer fails or returns nothing', async () => {
    const plan = await planFor(new MemoryFileSystem()
      .addFile(lua('main'), 'require "a"\nrequire "b"')
      .addFile(lua('a'), 'local a = 1')
      .addFile(lua('b'), 'local b = 2'));
    const restorer: RestorerPort = {
      async restore(request) {
        if (request.nodeKey === lua('a')) throw new Error('service unavailable');
        if (request.nodeKey === lua('b')) return '   ';
        return request.content;
      },
    };

    const result = await executor(restorer).execute(plan);

    expect(result.results.slice(0, 2)).toEqual([
      { nodeKey: lua('a'), status: 'fallback', outputPath: path.join(outputDir, 'a.lua'), reason: 'service unavailable' },
      { nodeKey: lua('b'), status: 'fallback', outputPath: path.join(outputDir, 'b.lua'), reason: 'restorer returned no content' },
    ]);
    expect(result.success).toBe(true);
    expect(await fs.readFile(path.join(outputDir, 'a.lua'), 'utf8')).toBe('local a = 1');
  });

  it('should skip files that were never read', async () => {
    const plan = await planFor(new MemoryFileSystem()
      .addFile(lua('main'), 'require "broken"')
      .failRead(lua('broken')));

    const result = await executor(recordingRestorer()).execute(plan);

    expect(result.results[0]).toEqual({ nodeKey: lua('broken'), status: 'skipped', reason: 'read error' });
    expect(result.summary).toEqual({ total: 2, restored: 1, fallback: 0, skipped: 1, failed: 0 });
    await expect(fs.access(path.join(outputDir, 'broken.lua'))).rejects.toThrow();
  });

  it('should skip a file whose output path is already taken', async () => {
    const start = projectPath('lua', 'x.lua');
    const plan = await planFor(new MemoryFileSystem()
      .addFile(start, 'require "x"')
      .addFile(lua('x'), 'return 1'), start);

    const result = await executor(recordingRestorer()).execute(plan);

    expect(result.results).toEqual([
      { nodeKey: lua('x'), status: 'restored', outputPath: path.join(outputDir, 'x.lua'), reason: undefined },
      {
        nodeKey: start,
        status: 'skipped',
        outputPath: path.join(outputDir, 'x.lua'),
        reason: `output path already used by ${lua('x')}`,
      },
    ]);
    expect(await fs.readFile(path.join(outputDir, 'x.lua'), 'utf8')).toBe('RETURN 1');
  });

  it('should write nothing in dry-run mode', async () => {
    const plan = await planFor(new MemoryFileSystem().addFile(lua('main'), 'return 1'));

    const result = await executor(recordingRestorer(), true).execute(plan);

    expect(result.results).toEqual([
      { nodeKey: lua('main'), status: 'restored', outputPath: path.join(outputDir, 'main.lua'), reason: undefined },
    ]);
    await expect(fs.access(outputDir)).rejects.toThrow();
  });

  it('should report files that cannot be written', async () => {
    const blocker = path.join(tmpDir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    outputDir = path.join(blocker, 'out');
    const plan = await planFor(new MemoryFileSystem().addFile(lua('main'), 'return 1'));

    const result = await executor(recordingRestorer()).execute(plan);

    expect(result.success).toBe(false);
    expect(result.summary.failed).toBe(1);
    expect(result.results[0].status).toBe('failed');
    expect(result.results[0].reason).toBe(`File system error: Failed to write file: ${path.join(outputDir, 'main.lua')}`);
  });
});
