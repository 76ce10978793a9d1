/**
 * Project Identifier - Locate a project's main file and readme
 */

import * as path from 'path';
import type { FileSystem } from '../../base/fs/types.js';
import { nodeFileSystem } from '../../base/fs/node-file-system.js';
import { errorMessage, logger } from '../../base/utils/logger.js';
import { isProjectMainFile, parseHeaders } from './headers.js';
import {
  FRAMEWORK_HEADER,
  FRAMEWORK_MAIN_FILE,
  README_FILE,
  type ProjectHeaders,
  type ProjectInfo,
} from './types.js';

function readOrUndefined(file: string, fs: FileSystem): string | undefined {
  try {
    return fs.readFile(file);
  } catch (error) {
    logger.debug('Project', 'Could not read file', { file, error: errorMessage(error) });
    return undefined;
  }
}

function readmeIn(dir: string, fs: FileSystem): string | null {
  const readme = path.join(dir, README_FILE);
  return fs.isFile(readme) ? readme : null;
}

/**
 * Identify the project in dir (no upward search)
 *
 * A framework checkout has wpmoo.php with the framework header. Otherwise the
 * first top-level PHP file, in sorted order, with a plugin or theme header that
 * mentions the framework is the main file of a plugin.
 */
export function identifyProject(dir: string, fs: FileSystem = nodeFileSystem): ProjectInfo {
  const root = path.resolve(dir);

  const frameworkFile = path.join(root, FRAMEWORK_MAIN_FILE);
  if (fs.isFile(frameworkFile) && readOrUndefined(frameworkFile, fs)?.includes(FRAMEWORK_HEADER)) {
    return { found: true, type: 'framework', mainFile: frameworkFile, readmeFile: readmeIn(root, fs) };
  }

  for (const file of fs.findFiles(root, ['*.php'])) {
    const content = readOrUndefined(file, fs);
    if (content !== undefined && isProjectMainFile(content)) {
      return { found: true, type: 'plugin', mainFile: file, readmeFile: readmeIn(root, fs) };
    }
  }

  return { found: false, type: 'unknown', mainFile: null, readmeFile: null };
}

/**
 * Header fields of the project's main file, or undefined when there is none
 */
export function readProjectHeaders(
  dir: string,
  fs: FileSystem = nodeFileSystem
): { file: string; headers: ProjectHeaders } | undefined {
  const info = identifyProject(dir, fs);
  if (!info.mainFile) {
    return undefined;
  }

  const content = readOrUndefined(info.mainFile, fs);
  if (content === undefined) {
    return undefined;
  }
  return { file: info.mainFile, headers: parseHeaders(content) };
}
