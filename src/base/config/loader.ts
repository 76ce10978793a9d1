/**
 * Configuration Loader - Load YAML settings files
 *
 * A file that cannot be read or parsed contributes an empty tree; it never
 * aborts loading of the other files.
 */

import { parse } from 'yaml';
import type { FileSystem } from '../fs/types.js';
import { nodeFileSystem } from '../fs/node-file-system.js';
import { errorMessage, logger } from '../utils/logger.js';
import { isConfigTree, setEntry } from './merger.js';
import { getConfigFiles, type ConfigFileInfo } from './levels.js';
import type { ConfigSource, ConfigTree, ConfigValue } from './types.js';

/**
 * Narrow a parsed YAML document to a config value, dropping anything that is not plain data
 */
function toConfigValue(value: unknown): ConfigValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    const items: ConfigValue[] = [];
    for (const item of value) {
      const converted = toConfigValue(item);
      if (converted !== undefined) items.push(converted);
    }
    return items;
  }
  if (isConfigTree(value)) {
    return toConfigTree(value);
  }
  return undefined;
}

function toConfigTree(value: Record<string, unknown>): ConfigTree {
  const tree: ConfigTree = {};
  for (const [key, raw] of Object.entries(value)) {
    const converted = toConfigValue(raw);
    if (converted !== undefined) setEntry(tree, key, converted);
  }
  return tree;
}

/**
 * Parse YAML text into a tree
 *
 * An empty document is an empty tree. A document whose top level is not a
 * mapping is rejected.
 */
export function parseConfigText(content: string): ConfigTree {
  const document: unknown = parse(content);

  if (document === null || document === undefined) {
    return {};
  }
  if (!isConfigTree(document)) {
    throw new Error('top level of a config file must be a mapping');
  }
  return toConfigTree(document);
}

/**
 * Load a single config file into a source
 */
export function loadConfigFile(info: ConfigFileInfo, fs: FileSystem = nodeFileSystem): ConfigSource {
  try {
    const tree = parseConfigText(fs.readFile(info.path));
    logger.debug('Config', 'Loaded config file', { file: info.path, kind: info.kind });
    return { kind: info.kind, path: info.path, tree };
  } catch (error) {
    const message = errorMessage(error);
    logger.warn('Config', 'Ignoring unreadable config file', {
      file: info.path,
      error: message,
      hint: 'Check the YAML syntax',
    });
    return { kind: info.kind, path: info.path, tree: {}, error: message };
  }
}

/**
 * Load every existing config file under a root, lowest priority first
 */
export function loadAllSources(root: string, fs: FileSystem = nodeFileSystem): ConfigSource[] {
  return getConfigFiles(root, fs)
    .filter((info) => info.exists)
    .map((info) => loadConfigFile(info, fs));
}

/**
 * List which config files exist under a root
 */
export function getExistingConfigFiles(root: string, fs: FileSystem = nodeFileSystem): string[] {
  return getConfigFiles(root, fs)
    .filter((info) => info.exists)
    .map((info) => info.path);
}
