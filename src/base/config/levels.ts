/**
 * Configuration Levels - Path resolution for hierarchical config
 *
 * Finds the configuration root and lists the candidate files in the order
 * they are merged (lowest priority first).
 */

import * as path from 'path';
import type { FileSystem } from '../fs/types.js';
import { nodeFileSystem } from '../fs/node-file-system.js';
import { findUpward } from '../utils/path-utils.js';
import {
  ALTERNATE_CONFIG_DIR,
  CONFIG_DIRECTORY_FILES,
  LEGACY_CONFIG_FILE,
  PRIMARY_CONFIG_DIR,
  SETTINGS_FILE_NAME,
  type ConfigSourceKind,
} from './types.js';

/**
 * A candidate configuration file
 */
export interface ConfigFileInfo {
  kind: ConfigSourceKind;
  path: string;
  exists: boolean;
}

/**
 * A directory is a config root when it holds the legacy file or the primary settings file
 */
export function isConfigRoot(dir: string, fs: FileSystem = nodeFileSystem): boolean {
  return (
    fs.isFile(path.join(dir, LEGACY_CONFIG_FILE)) ||
    fs.isFile(path.join(dir, PRIMARY_CONFIG_DIR, SETTINGS_FILE_NAME))
  );
}

/**
 * Find the nearest config root at or above startDir
 */
export function findConfigRoot(
  startDir: string,
  fs: FileSystem = nodeFileSystem
): string | undefined {
  return findUpward(startDir, (dir) => isConfigRoot(dir, fs));
}

function directoryFiles(
  root: string,
  dirName: string,
  kind: ConfigSourceKind,
  fs: FileSystem
): ConfigFileInfo[] {
  const dir = path.join(root, dirName);
  if (!fs.isDirectory(dir)) {
    return [];
  }

  return CONFIG_DIRECTORY_FILES.map((fileName) => {
    const filePath = path.join(dir, fileName);
    return { kind, path: filePath, exists: fs.isFile(filePath) };
  });
}

/**
 * All candidate config files under a root, lowest priority first
 *
 * 1. Legacy single file
 * 2. Primary directory (settings, then deploy)
 * 3. Alternate directory (settings, then deploy)
 */
export function getConfigFiles(root: string, fs: FileSystem = nodeFileSystem): ConfigFileInfo[] {
  const legacyPath = path.join(root, LEGACY_CONFIG_FILE);

  return [
    { kind: 'legacy', path: legacyPath, exists: fs.isFile(legacyPath) },
    ...directoryFiles(root, PRIMARY_CONFIG_DIR, 'primary', fs),
    ...directoryFiles(root, ALTERNATE_CONFIG_DIR, 'alternate', fs),
  ];
}

/**
 * Path of the legacy config file in a directory (the file `save` writes)
 */
export function getLegacyConfigPath(dir: string): string {
  return path.join(dir, LEGACY_CONFIG_FILE);
}
