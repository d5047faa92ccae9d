/**
 * Core Ports
 *
 * Re-exports all port interfaces and default implementations.
 * These ports define the boundary between the resolution engine and
 * external concerns (disk, terminal, restoration service).
 */

export type { OutputPort } from './output.js';
export type { FileSystemPort, ReadFileOptions } from './filesystem.js';
export type { RestorerPort, RestoreRequest, RestoredDependency } from './restorer.js';
export { consoleOutput } from './console-output.js';
export { nodeFileSystem } from './node-filesystem.js';
export { passthroughRestorer } from './restorer.js';
