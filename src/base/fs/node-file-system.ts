/**
 * Node.js FileSystem Adapter
 *
 * Implements the FileSystem port using node's fs module and fast-glob.
 */

import * as fs from 'fs';
import fg from 'fast-glob';
import type { FileSystem } from './types.js';

function statOrNull(filepath: string): fs.Stats | null {
  try {
    return fs.statSync(filepath, { throwIfNoEntry: false }) ?? null;
  } catch {
    // EACCES and friends count as "not there"
    return null;
  }
}

export class NodeFileSystem implements FileSystem {
  exists(filepath: string): boolean {
    return statOrNull(filepath) !== null;
  }

  isFile(filepath: string): boolean {
    return statOrNull(filepath)?.isFile() ?? false;
  }

  isDirectory(filepath: string): boolean {
    return statOrNull(filepath)?.isDirectory() ?? false;
  }

  readFile(filepath: string): string {
    return fs.readFileSync(filepath, 'utf-8');
  }

  writeFile(filepath: string, content: string): void {
    fs.writeFileSync(filepath, content, 'utf-8');
  }

  rename(from: string, to: string): void {
    fs.renameSync(from, to);
  }

  remove(filepath: string): void {
    fs.rmSync(filepath, { force: true });
  }

  findFiles(rootDir: string, patterns: string[], ignore: string[] = []): string[] {
    if (!this.isDirectory(rootDir)) {
      return [];
    }

    return fg
      .sync(patterns, {
        cwd: rootDir,
        absolute: true,
        onlyFiles: true,
        ignore,
        suppressErrors: true,
      })
      .sort();
  }
}

/**
 * Shared default instance
 */
export const nodeFileSystem = new NodeFileSystem();
