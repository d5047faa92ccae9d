/**
 * Node Filesystem Adapter (Default)
 *
 * FileSystemPort backed by fs/promises via utils/fs.ts.
 */

import type { FileSystemPort, ReadFileOptions } from './filesystem.js';
import { isFile, readTextFile, realPath } from '../../utils/fs.js';

export const nodeFileSystem: FileSystemPort = {
  readFile(path: string, options?: ReadFileOptions): Promise<string> {
    return readTextFile(path, { signal: options?.signal });
  },

  isFile(path: string): Promise<boolean> {
    return isFile(path);
  },

  realpath(path: string): Promise<string> {
    return realPath(path);
  },
};
