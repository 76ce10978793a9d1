/**
 * FileSystem Port
 *
 * Synchronous filesystem interface used by project classification, config loading
 * and command discovery. Everything runs once at start-up, so blocking calls are fine.
 */

export interface FileSystem {
  /**
   * Check if a path exists (file or directory)
   */
  exists(filepath: string): boolean;

  /**
   * Check if a path is a regular file
   */
  isFile(filepath: string): boolean;

  /**
   * Check if a path is a directory
   */
  isDirectory(filepath: string): boolean;

  /**
   * Read a file's content as UTF-8 string. Throws when the file cannot be read.
   */
  readFile(filepath: string): string;

  /**
   * Write content to a file, replacing it. Throws on failure.
   */
  writeFile(filepath: string, content: string): void;

  /**
   * Rename a file, replacing the target if it exists
   */
  rename(from: string, to: string): void;

  /**
   * Delete a file; a missing file is not an error
   */
  remove(filepath: string): void;

  /**
   * Find files matching glob patterns below rootDir
   *
   * @returns Absolute paths, sorted
   */
  findFiles(rootDir: string, patterns: string[], ignore?: string[]): string[];
}
