import { z } from 'zod';
import type { FileSystem } from '../fs/types.js';
import { nodeFileSystem } from '../fs/node-file-system.js';
import { findFileUpward } from './path-utils.js';

const PackageVersionSchema = z.object({ version: z.string() });

const UNKNOWN_VERSION = '0.0.0';

/**
 * Version of moo itself, read from the nearest package.json above this module
 */
export function getToolVersion(fs: FileSystem = nodeFileSystem): string {
  const match = findFileUpward(__dirname, ['package.json'], fs);
  if (!match) {
    return UNKNOWN_VERSION;
  }

  try {
    const result = PackageVersionSchema.safeParse(JSON.parse(fs.readFile(match.file)));
    return result.success ? result.data.version : UNKNOWN_VERSION;
  } catch {
    return UNKNOWN_VERSION;
  }
}
