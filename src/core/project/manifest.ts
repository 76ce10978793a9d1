/**
 * Project manifest lookup and classification rules
 */

import type { FileSystem } from '../../base/fs/types.js';
import { nodeFileSystem } from '../../base/fs/node-file-system.js';
import { findFileUpward, type UpwardFileMatch } from '../../base/utils/path-utils.js';
import { validateManifest, type Manifest } from '../../base/utils/config-validator.js';
import { errorMessage, logger } from '../../base/utils/logger.js';
import {
  CLI_PACKAGE_NAME,
  FRAMEWORK_PACKAGE_NAME,
  MANIFEST_FILES,
  type ContextLabel,
} from './types.js';

/**
 * Find the nearest manifest at or above startDir
 */
export function findManifest(
  startDir: string,
  fs: FileSystem = nodeFileSystem
): UpwardFileMatch | undefined {
  return findFileUpward(startDir, MANIFEST_FILES, fs);
}

/**
 * Read and validate a manifest file
 *
 * @returns undefined when the file cannot be read, is not JSON, or is not an object
 */
export function readManifest(file: string, fs: FileSystem = nodeFileSystem): Manifest | undefined {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFile(file));
  } catch (error) {
    logger.warn('Project', 'Ignoring unreadable manifest', { file, error: errorMessage(error) });
    return undefined;
  }

  const result = validateManifest(data);
  if (!result.valid || !result.data) {
    logger.warn('Project', 'Ignoring invalid manifest', { file, errors: result.errors });
    return undefined;
  }
  return result.data;
}

/**
 * Apply the manifest rules in order; undefined when none decides
 */
export function classifyManifest(manifest: Manifest): ContextLabel | undefined {
  if (manifest.name === CLI_PACKAGE_NAME) {
    return 'cli-tool';
  }
  if (manifest.name === FRAMEWORK_PACKAGE_NAME) {
    return 'framework';
  }
  if (manifest.type === 'wordpress-plugin') {
    return 'plugin';
  }
  if (manifest.type === 'wordpress-theme') {
    return 'theme';
  }

  const requirement = manifest.require?.[FRAMEWORK_PACKAGE_NAME];
  if (requirement !== undefined && requirement !== null) {
    return 'plugin';
  }

  return undefined;
}
