/**
 * File Walker Utility
 *
 * Walks a directory tree and yields file paths. Entries are visited in
 * name order so repository loading is deterministic across platforms.
 */

import { promises as fs, type Dirent } from 'fs';
import { join } from 'path';

/**
 * Filter predicate for file walking
 */
export type FileFilter = (path: string, isDirectory: boolean) => boolean | Promise<boolean>;

export interface WalkOptions {
  /**
   * Filter predicate to include/exclude files and directories
   */
  filter?: FileFilter;
}

/**
 * Async generator that walks a directory tree and yields file paths
 *
 * @example
 * for await (const filePath of walkFiles('/path/to/repo')) {
 *   console.log(filePath);
 * }
 */
export async function* walkFiles(
  dir: string,
  options: WalkOptions = {}
): AsyncGenerator<string> {
  yield* walkFilesInternal(dir, options.filter);
}

async function* walkFilesInternal(
  dir: string,
  filter: FileFilter | undefined
): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    // Ignore permission errors and continue
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'EACCES' || code === 'EPERM') {
      return;
    }
    throw error;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    // Symlinks are not followed
    if (entry.isSymbolicLink()) continue;

    const fullPath = join(dir, entry.name);
    const isDirectory = entry.isDirectory();

    if (filter && !(await filter(fullPath, isDirectory))) {
      continue;
    }

    if (isDirectory) {
      yield* walkFilesInternal(fullPath, filter);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }
}
