/**
 * Configuration Types - Hierarchical project configuration
 *
 * Configuration hierarchy (priority from low to high):
 * 1. Legacy: wpmoo-config.yml in the project root
 * 2. Primary: wpmoo-config/wpmoo-settings.yml, then wpmoo-config/deploy.yml
 * 3. Alternate: config/wpmoo-settings.yml, then config/deploy.yml
 */

import type { FileSystem } from '../fs/types.js';

// =============================================================================
// Tree Types
// =============================================================================

export type ConfigScalar = string | number | boolean | null;

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigTree;

/**
 * Parsed configuration mapping
 */
export interface ConfigTree {
  [key: string]: ConfigValue;
}

// =============================================================================
// Sources
// =============================================================================

/**
 * Where a configuration file sits in the hierarchy
 */
export type ConfigSourceKind = 'legacy' | 'primary' | 'alternate';

/**
 * One loaded configuration file
 */
export interface ConfigSource {
  kind: ConfigSourceKind;
  path: string;
  /** Parsed content; empty when the file could not be parsed */
  tree: ConfigTree;
  /** Parse or read error, if the file contributed nothing because of one */
  error?: string;
}

/**
 * Result of a load: the root the config was found in and the merged tree
 */
export interface LoadedConfig {
  /** Config root, or the start directory when no marker was found */
  root: string;
  /** Whether a config marker was actually found */
  found: boolean;
  tree: ConfigTree;
  sources: ConfigSource[];
}

export interface ConfigStoreOptions {
  /** Directory to start the upward search from */
  startDir: string;
  fs?: FileSystem;
}

// =============================================================================
// Constants
// =============================================================================

export const LEGACY_CONFIG_FILE = 'wpmoo-config.yml';
export const PRIMARY_CONFIG_DIR = 'wpmoo-config';
export const ALTERNATE_CONFIG_DIR = 'config';
export const SETTINGS_FILE_NAME = 'wpmoo-settings.yml';
export const DEPLOY_FILE_NAME = 'deploy.yml';

/**
 * Files read from each config directory, lowest priority first
 */
export const CONFIG_DIRECTORY_FILES = [SETTINGS_FILE_NAME, DEPLOY_FILE_NAME] as const;
