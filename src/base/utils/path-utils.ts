import * as path from 'path';
import type { FileSystem } from '../fs/types.js';
import { nodeFileSystem } from '../fs/node-file-system.js';

export type DirectoryPredicate = (dir: string) => boolean;

/**
 * Walk from startDir up to the filesystem root and return the first directory
 * for which the predicate holds. The root itself is tested before giving up.
 *
 * A predicate that throws counts as a miss for that directory.
 */
export function findUpward(startDir: string, predicate: DirectoryPredicate): string | undefined {
  let current = path.resolve(startDir);

  for (;;) {
    let matched = false;
    try {
      matched = predicate(current);
    } catch {
      matched = false;
    }
    if (matched) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

export interface UpwardFileMatch {
  /** Directory the file was found in */
  dir: string;
  /** Absolute path of the matched file */
  file: string;
}

/**
 * Find the nearest ancestor holding one of the given files.
 * Within a directory, names are tried in order.
 */
export function findFileUpward(
  startDir: string,
  names: readonly string[],
  fs: FileSystem = nodeFileSystem
): UpwardFileMatch | undefined {
  let file: string | undefined;

  const dir = findUpward(startDir, (candidate) => {
    for (const name of names) {
      const filePath = path.join(candidate, name);
      if (fs.isFile(filePath)) {
        file = filePath;
        return true;
      }
    }
    return false;
  });

  if (dir === undefined || file === undefined) {
    return undefined;
  }
  return { dir, file };
}

/**
 * Path of target relative to base, or target unchanged when it lies outside base
 */
export function relativeTo(base: string, target: string): string {
  const relative = path.relative(base, target);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return target;
  }
  return relative;
}
