/**
 * Tests for discovery: graph construction, error handling, limits and
 * determinism. All file access goes through MemoryFileSystem.
 */

import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { discover, DiscoveryDriver } from '../../../src/core/resolution/discovery-driver.js';
import { PathResolver } from '../../../src/core/resolution/path-resolver.js';
import type { DiscoveryOptions } from '../../../src/core/resolution/types.js';
import { DiscoveryCancelledError, ReadError, RootReadError, ValidationError } from '../../../src/utils/errors.js';
import { MemoryFileSystem, projectPath } from '../../test-helpers.js';

const LUA = projectPath('lua');

function lua(name: string): string {
  return projectPath('lua', `${name}.lua.unluac`);
}

function options(fs: MemoryFileSystem, extra: Partial<DiscoveryOptions> = {}): DiscoveryOptions {
  return {
    resolver: new PathResolver({ searchRoots: [LUA], fileSystem: fs }),
    fileSystem: fs,
    ...extra,
  };
}

function diamond(): MemoryFileSystem {
  return new MemoryFileSystem()
    .addFile(lua('main'), 'local b = require "b"\nlocal c = require("c")\n')
    .addFile(lua('b'), 'return require "d"')
    .addFile(lua('c'), "local d = require 'd'\nreturn d")
    .addFile(lua('d'), 'return {}');
}

describe('discover', () => {
  describe('graph construction', () => {
    it('should order a diamond dependencies first', async () => {
      const fs = diamond();
      const result = await discover(lua('main'), options(fs));

      expect(result.rootKey).toBe(lua('main'));
      expect(result.linearization.order).toEqual([lua('d'), lua('b'), lua('c'), lua('main')]);
      expect(result.snapshot.edgeCount).toBe(4);
      expect(result.linearization.cycles).toEqual([]);
      expect(result.snapshot.keys.map((key) => result.snapshot.nodes.get(key)?.state))
        .toEqual(['resolved', 'resolved', 'resolved', 'resolved']);
    });

    it('should read every file once, in worklist order', async () => {
      const fs = diamond();
      await discover(lua('main'), options(fs));
      expect(fs.reads).toEqual([lua('main'), lua('b'), lua('c'), lua('d')]);
    });

    it('should cache content and references on each node', async () => {
      const fs = diamond();
      const { graph } = await discover(lua('main'), options(fs));

      const main = graph.get(lua('main'));
      expect(main?.content).toBe('local b = require "b"\nlocal c = require("c")\n');
      expect(main?.rawReferences).toEqual(['b', 'c']);
      expect(main?.dependencies).toEqual([lua('b'), lua('c')]);
      expect(graph.get(lua('d'))?.depth).toBe(2);
    });

    it('should seal the graph when discovery ends', async () => {
      const { graph } = await discover(lua('main'), options(diamond()));
      expect(graph.isSealed()).toBe(true);
    });

    it('should resolve a relative start file to an absolute key', async () => {
      const fs = new MemoryFileSystem().addFile(lua('main'), '');
      const start = path.relative(process.cwd(), lua('main'));
      const result = await discover(start, options(fs));
      expect(result.rootKey).toBe(lua('main'));
    });

    it('should key a file reached through a symlink by its real path', async () => {
      const fs = new MemoryFileSystem()
        .addFile(lua('main'), 'require "util"\nrequire "alias"')
        .addFile(lua('util'), 'return {}')
        .addLink(lua('alias'), lua('util'));
      const result = await discover(lua('main'), options(fs));

      expect(result.snapshot.keys).toEqual([lua('main'), lua('util')]);
      expect(result.snapshot.edgeCount).toBe(1);
      expect(result.graph.get(lua('main'))?.dependencies).toEqual([lua('util')]);
      expect(fs.reads).toEqual([lua('main'), lua('util')]);
    });

    it('should key a linked start file by its target', async () => {
      const fs = new MemoryFileSystem()
        .addFile(lua('main'), '')
        .addLink(lua('entry'), lua('main'));
      const result = await discover(lua('entry'), options(fs));
      expect(result.rootKey).toBe(lua('main'));
    });

    it('should record one edge for repeated requires of a module', async () => {
      const fs = new MemoryFileSystem()
        .addFile(lua('main'), 'require "a"\nrequire "a"')
        .addFile(lua('a'), '');
      const result = await discover(lua('main'), options(fs));

      expect(result.snapshot.edgeCount).toBe(1);
      expect(result.graph.get(lua('main'))?.rawReferences).toEqual(['a', 'a']);
    });
  });

  describe('cycles', () => {
    it('should terminate on a cycle and report it', async () => {
      const fs = new MemoryFileSystem()
        .addFile(lua('main'), 'require "a"')
        .addFile(lua('a'), 'require "b"')
        .addFile(lua('b'), 'require "a"');
      const result = await discover(lua('main'), options(fs));

      expect(result.linearization.order).toEqual([lua('a'), lua('b'), lua('main')]);
      expect(result.linearization.cycles).toEqual([
        { members: [lua('a'), lua('b')], examplePath: [lua('a'), lua('b'), lua('a')] },
      ]);
      expect(fs.reads).toEqual([lua('main'), lua('a'), lua('b')]);
    });

    it('should report a file requiring itself', async () => {
      const fs = new MemoryFileSystem().addFile(lua('main'), 'require "main"');
      const result = await discover(lua('main'), options(fs));

      expect(result.linearization.cycles).toEqual([
        { members: [lua('main')], examplePath: [lua('main'), lua('main')] },
      ]);
    });
  });

  describe('unresolved and irregular references', () => {
    it('should keep unresolved identifiers on the node, once each', async () => {
      const fs = new MemoryFileSystem().addFile(lua('main'), 'require "missing"\nrequire "missing"\nrequire "gone"');
      const { graph } = await discover(lua('main'), options(fs));

      const main = graph.get(lua('main'));
      expect(main?.state).toBe('resolved');
      expect(main?.unresolvedReferences).toEqual(['missing', 'gone']);
      expect(main?.dependencies).toEqual([]);
    });

    it('should count dynamic and malformed references without following them', async () => {
      const fs = new MemoryFileSystem().addFile(lua('main'), 'require(name)\nrequire("a..b")\nrequire("x" .. y)');
      const { graph } = await discover(lua('main'), options(fs));

      const main = graph.get(lua('main'));
      expect(main?.dynamicReferences).toBe(2);
      expect(main?.malformedReferences).toBe(1);
      expect(graph.size).toBe(1);
    });
  });

  describe('read failures', () => {
    it('should mark an unreadable dependency as an error and keep going', async () => {
      const fs = diamond().failRead(lua('b'));
      const result = await discover(lua('main'), options(fs));

      const b = result.graph.get(lua('b'));
      expect(b?.state).toBe('error');
      expect(b?.error).toBeInstanceOf(ReadError);
      expect(b?.error?.message).toBe(`Failed to read ${lua('b')}: EACCES: permission denied`);
      expect(b?.content).toBeUndefined();
      expect(result.graph.getState(lua('d'))).toBe('resolved');
      expect(result.linearization.order).toEqual([lua('b'), lua('d'), lua('c'), lua('main')]);
    });

    it('should fail the run when the start file cannot be read', async () => {
      const fs = new MemoryFileSystem();
      await expect(discover(lua('main'), options(fs))).rejects.toThrow(RootReadError);
      await expect(discover(lua('main'), options(fs))).rejects.toThrow(`Cannot read start file ${lua('main')}`);
    });

    it('should treat a read that outlives the timeout as a read error', async () => {
      const fs = new MemoryFileSystem()
        .addFile(lua('main'), 'require "slow"')
        .addFile(lua('slow'), '')
        .delayRead(lua('slow'), 500);
      const result = await discover(lua('main'), options(fs, { readTimeoutMs: 20 }));

      expect(result.graph.getState(lua('slow'))).toBe('error');
      expect(result.graph.get(lua('slow'))?.error).toBeInstanceOf(ReadError);
    });
  });

  describe('limits', () => {
    function chain(): MemoryFileSystem {
      return new MemoryFileSystem()
        .addFile(lua('main'), 'require "a"')
        .addFile(lua('a'), 'require "b"')
        .addFile(lua('b'), 'require "c"')
        .addFile(lua('c'), '');
    }

    it('should leave nodes beyond maxDepth unread', async () => {
      const fs = chain();
      const { graph } = await discover(lua('main'), options(fs, { maxDepth: 1 }));

      expect(fs.reads).toEqual([lua('main'), lua('a')]);
      expect(graph.getState(lua('b'))).toBe('unresolved');
      expect(graph.get(lua('b'))?.content).toBeUndefined();
      expect(graph.has(lua('c'))).toBe(false);
    });

    it('should read only the start file with maxDepth 0', async () => {
      const fs = chain();
      const { linearization } = await discover(lua('main'), options(fs, { maxDepth: 0 }));

      expect(fs.reads).toEqual([lua('main')]);
      expect(linearization.order).toEqual([lua('a'), lua('main')]);
    });

    it('should reject invalid limits', () => {
      const fs = chain();
      expect(() => new DiscoveryDriver(options(fs, { concurrency: 0 }))).toThrow(ValidationError);
      expect(() => new DiscoveryDriver(options(fs, { maxDepth: -1 }))).toThrow(ValidationError);
      expect(() => new DiscoveryDriver(options(fs, { readTimeoutMs: 1.5 }))).toThrow(ValidationError);
    });
  });

  describe('determinism', () => {
    it('should build the same graph whatever order reads finish in', async () => {
      const slow = diamond().delayRead(lua('b'), 30);
      const fast = diamond();

      const concurrent = await discover(lua('main'), options(slow, { concurrency: 4 }));
      const serial = await discover(lua('main'), options(fast, { concurrency: 1 }));

      expect(concurrent.graph.keys()).toEqual(serial.graph.keys());
      expect(concurrent.snapshot.keys).toEqual(serial.snapshot.keys);
      expect(concurrent.linearization).toEqual(serial.linearization);
    });
  });

  describe('cancellation', () => {
    it('should stop before reading when already cancelled', async () => {
      const fs = diamond();
      const controller = new AbortController();
      controller.abort();

      await expect(discover(lua('main'), options(fs, { signal: controller.signal }))).rejects.toThrow(DiscoveryCancelledError);
      expect(fs.reads).toEqual([]);
    });

    it('should stop while a read is in flight', async () => {
      const fs = diamond().delayRead(lua('main'), 500);
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      await expect(discover(lua('main'), options(fs, { signal: controller.signal }))).rejects.toThrow('Discovery cancelled');
      expect(fs.reads).toEqual([lua('main')]);
    });
  });
});
