/**
 * Project Classifier - Decide which kind of project a directory belongs to
 *
 * Rules, first match wins:
 * 1. Nearest manifest at or above the start directory (name, then type, then require)
 * 2. Content scan of PHP files below the start directory
 * 3. unknown
 */

import * as path from 'path';
import type { FileSystem } from '../../base/fs/types.js';
import { nodeFileSystem } from '../../base/fs/node-file-system.js';
import { logger } from '../../base/utils/logger.js';
import { relativeTo } from '../../base/utils/path-utils.js';
import { classifyManifest, findManifest, readManifest } from './manifest.js';
import { scanForMainFile } from './content-scan.js';
import type { ContextLabel } from './types.js';

/**
 * Classify the project containing startDir
 *
 * Never throws; anything that cannot be read counts as absent.
 */
export function classify(startDir: string, fs: FileSystem = nodeFileSystem): ContextLabel {
  const resolvedStart = path.resolve(startDir);

  const match = findManifest(resolvedStart, fs);
  if (match) {
    const manifest = readManifest(match.file, fs);
    const label = manifest ? classifyManifest(manifest) : undefined;
    if (label) {
      logger.debug('Project', 'Classified from manifest', { file: match.file, context: label });
      return label;
    }
    logger.debug('Project', 'Manifest did not decide the context', { file: match.file });
  }

  const mainFile = scanForMainFile(resolvedStart, fs);
  if (mainFile) {
    logger.warn('Project', 'Context guessed from file contents', {
      file: relativeTo(resolvedStart, mainFile),
      context: 'plugin',
      hint: 'Set "type" in composer.json to make detection explicit',
    });
    return 'plugin';
  }

  logger.debug('Project', 'No project markers found', { startDir: resolvedStart });
  return 'unknown';
}
