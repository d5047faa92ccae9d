/**
 * Filesystem Port Interface
 *
 * The only way the resolution engine touches the disk. Discovery reads file
 * contents through it and the path resolver probes candidate paths through it.
 */

export interface ReadFileOptions {
  /** Aborts the read (timeout or run cancellation) */
  signal?: AbortSignal;
}

export interface FileSystemPort {
  /** Read a whole file as UTF-8 text; rejects when it cannot be read */
  readFile(path: string, options?: ReadFileOptions): Promise<string>;

  /** Whether a regular file exists at the path */
  isFile(path: string): Promise<boolean>;

  /** Canonical path of an existing file, symlinks followed */
  realpath(path: string): Promise<string>;
}
