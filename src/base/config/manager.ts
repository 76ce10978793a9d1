/**
 * Configuration Store - Hierarchical project configuration
 *
 * Configuration hierarchy (merged in order, later overrides earlier):
 * 1. wpmoo-config.yml (legacy single file)
 * 2. wpmoo-config/wpmoo-settings.yml, wpmoo-config/deploy.yml
 * 3. config/wpmoo-settings.yml, config/deploy.yml
 *
 * The root is the nearest directory at or above the start directory holding
 * wpmoo-config.yml or wpmoo-config/wpmoo-settings.yml.
 */

import * as path from 'path';
import { randomBytes } from 'crypto';
import { stringify } from 'yaml';
import type { FileSystem } from '../fs/types.js';
import { nodeFileSystem } from '../fs/node-file-system.js';
import { errorMessage, logger } from '../utils/logger.js';
import { findConfigRoot, getLegacyConfigPath } from './levels.js';
import { loadAllSources } from './loader.js';
import { cloneTree, cloneValue, createMergeSummary, lookup, mergeSources } from './merger.js';
import type {
  ConfigSource,
  ConfigStoreOptions,
  ConfigTree,
  ConfigValue,
  LoadedConfig,
} from './types.js';

/**
 * Locate the config root from startDir and merge every source under it
 */
export function loadConfig(startDir: string, fs: FileSystem = nodeFileSystem): LoadedConfig {
  const resolvedStart = path.resolve(startDir);
  const root = findConfigRoot(resolvedStart, fs);

  if (root === undefined) {
    logger.debug('Config', 'No config root found', { startDir: resolvedStart });
    return { root: resolvedStart, found: false, tree: {}, sources: [] };
  }

  const sources = loadAllSources(root, fs);
  logger.debug('Config', 'Resolved config root', { root, sources: sources.length });

  return { root, found: true, tree: mergeSources(sources), sources };
}

/**
 * Configuration Store
 *
 * Loads once at construction; the tree does not change afterwards.
 */
export class ConfigStore {
  private readonly fs: FileSystem;
  private readonly loaded: LoadedConfig;

  constructor(options: ConfigStoreOptions) {
    this.fs = options.fs ?? nodeFileSystem;
    this.loaded = loadConfig(options.startDir, this.fs);
  }

  /**
   * Get a value by dotted key, or the default when any segment is missing
   *
   * Mappings and lists come back as copies.
   */
  get(key: string): ConfigValue | undefined;
  get<T>(key: string, defaultValue: T): ConfigValue | T;
  get<T>(key: string, defaultValue?: T): ConfigValue | T | undefined {
    const value = lookup(this.loaded.tree, key);
    return value === undefined ? defaultValue : cloneValue(value);
  }

  /**
   * Snapshot of the whole merged tree
   */
  all(): ConfigTree {
    return cloneTree(this.loaded.tree);
  }

  /**
   * Whether any configuration value was loaded
   */
  isLoaded(): boolean {
    return Object.keys(this.loaded.tree).length > 0;
  }

  /**
   * Directory the config was found in, or the start directory when none was
   */
  getProjectRoot(): string {
    return this.loaded.root;
  }

  /**
   * Whether a config marker was found while walking upward
   */
  hasProjectRoot(): boolean {
    return this.loaded.found;
  }

  /**
   * Loaded sources in merge order (lowest priority first)
   */
  getSources(): readonly ConfigSource[] {
    return this.loaded.sources.map((source) => ({ ...source, tree: cloneTree(source.tree) }));
  }

  /**
   * Get debug summary of configuration
   */
  getDebugSummary(): string {
    return createMergeSummary(this.loaded.found ? this.loaded.root : null, this.loaded.sources);
  }

  /**
   * Write data as the legacy config file in dir, replacing any existing one
   *
   * The file is written next to the target and renamed over it, so readers
   * see either the old or the new content. The loaded tree is not updated.
   *
   * @returns false when the file could not be written
   */
  save(dir: string, data: ConfigTree): boolean {
    const target = getLegacyConfigPath(dir);
    const temp = path.join(
      dir,
      `.${path.basename(target)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
    );

    try {
      this.fs.writeFile(temp, stringify(data, { indent: 2 }));
      this.fs.rename(temp, target);
      logger.debug('Config', 'Saved config file', { file: target });
      return true;
    } catch (error) {
      logger.error('Config', 'Failed to save config file', {
        file: target,
        error: errorMessage(error),
      });
      this.discardTemp(temp);
      return false;
    }
  }

  private discardTemp(temp: string): void {
    try {
      this.fs.remove(temp);
    } catch (error) {
      logger.debug('Config', 'Could not remove temporary file', {
        file: temp,
        error: errorMessage(error),
      });
    }
  }
}
