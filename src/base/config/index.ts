/**
 * Config Module Exports
 */

export { ConfigStore, loadConfig } from './manager.js';
export {
  deepMerge,
  mergeSources,
  lookup,
  isConfigTree,
  createMergeSummary,
  cloneTree,
  cloneValue,
  setEntry,
} from './merger.js';
export { loadAllSources, loadConfigFile, parseConfigText, getExistingConfigFiles } from './loader.js';
export {
  findConfigRoot,
  isConfigRoot,
  getConfigFiles,
  getLegacyConfigPath,
  type ConfigFileInfo,
} from './levels.js';
export type {
  ConfigScalar,
  ConfigValue,
  ConfigTree,
  ConfigSource,
  ConfigSourceKind,
  ConfigStoreOptions,
  LoadedConfig,
} from './types.js';
export {
  LEGACY_CONFIG_FILE,
  PRIMARY_CONFIG_DIR,
  ALTERNATE_CONFIG_DIR,
  SETTINGS_FILE_NAME,
  DEPLOY_FILE_NAME,
  CONFIG_DIRECTORY_FILES,
} from './types.js';
