import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { mapOutputPath, restoredFileName } from '../../../src/core/restore/output-paths.js';
import { projectPath } from '../../test-helpers.js';

const OUT = projectPath('out');

describe('restoredFileName', () => {
  it('should turn decompiled names into plain Lua names', () => {
    expect(restoredFileName('http.lua.unluac')).toBe('http.lua');
    expect(restoredFileName(path.join('luci', 'http.lua.unluac'))).toBe(path.join('luci', 'http.lua'));
  });

  it('should keep other names', () => {
    expect(restoredFileName('util.lua')).toBe('util.lua');
  });
});

describe('mapOutputPath', () => {
  it('should mirror the path below the containing root', () => {
    expect(mapOutputPath(projectPath('lua', 'luci', 'http.lua.unluac'), [projectPath('lua')], OUT))
      .toBe(path.join(OUT, 'luci', 'http.lua'));
  });

  it('should use the first root that contains the file', () => {
    const roots = [projectPath('lua', 'luci'), projectPath('lua')];
    expect(mapOutputPath(projectPath('lua', 'luci', 'http.lua.unluac'), roots, OUT)).toBe(path.join(OUT, 'http.lua'));
  });

  it('should fall back to the file name outside every root', () => {
    expect(mapOutputPath(projectPath('elsewhere', 'x.lua.unluac'), [projectPath('lua')], OUT)).toBe(path.join(OUT, 'x.lua'));
  });
});
