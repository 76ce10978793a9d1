/**
 * Content scan - last-resort detection of framework-based projects without
 * a usable manifest
 */

import type { FileSystem } from '../../base/fs/types.js';
import { nodeFileSystem } from '../../base/fs/node-file-system.js';
import { errorMessage, logger } from '../../base/utils/logger.js';
import { isVerboseDebugEnabled } from '../../base/utils/debug.js';
import { isProjectMainFile } from './headers.js';

export const SCAN_PATTERNS = ['**/*.php'];
export const SCAN_IGNORE = ['**/vendor/**', '**/node_modules/**'];

/**
 * Find the first PHP file below startDir, in sorted path order, that looks
 * like a framework-based plugin or theme main file
 */
export function scanForMainFile(
  startDir: string,
  fs: FileSystem = nodeFileSystem
): string | undefined {
  let files: string[];
  try {
    files = fs.findFiles(startDir, SCAN_PATTERNS, SCAN_IGNORE);
  } catch (error) {
    logger.debug('Project', 'Content scan failed', { startDir, error: errorMessage(error) });
    return undefined;
  }

  for (const file of files) {
    let content: string;
    try {
      content = fs.readFile(file);
    } catch (error) {
      logger.debug('Project', 'Skipping unreadable file', { file, error: errorMessage(error) });
      continue;
    }

    if (isProjectMainFile(content)) {
      return file;
    }
    if (isVerboseDebugEnabled('project')) {
      logger.debug('Project', 'No project header', { file });
    }
  }

  return undefined;
}
