/**
 * moo - Project-aware CLI core
 *
 * Resolves the kind of project a directory belongs to, merges its layered
 * configuration and decides which commands are available there.
 */

// Path walking & filesystem
export {
  findUpward,
  findFileUpward,
  relativeTo,
  type DirectoryPredicate,
  type UpwardFileMatch,
} from './base/utils/path-utils.js';
export { NodeFileSystem, nodeFileSystem } from './base/fs/node-file-system.js';
export type { FileSystem } from './base/fs/types.js';

// Project classification
export {
  classify,
  classifyManifest,
  findManifest,
  readManifest,
  scanForMainFile,
  identifyProject,
  readProjectHeaders,
  parseHeaders,
  isProjectMainFile,
  CONTEXT_LABELS,
  MANIFEST_FILES,
  type ContextLabel,
  type ProjectInfo,
  type ProjectHeaders,
} from './core/project/index.js';

// Configuration
export {
  ConfigStore,
  loadConfig,
  deepMerge,
  lookup,
  findConfigRoot,
  getConfigFiles,
  type ConfigTree,
  type ConfigValue,
  type ConfigSource,
  type ConfigSourceKind,
  type LoadedConfig,
} from './base/config/index.js';

// Commands
export {
  CommandRegistry,
  selectGroups,
  COMMAND_GROUPS,
  type CommandDescriptor,
  type CommandGroup,
  type RegisteredCommand,
  type UnitLoader,
} from './core/commands/index.js';
export { BaseCommand, CommandError, executeCommand } from './commands/base-command.js';
export {
  ExitCode,
  type Command,
  type CommandContext,
  type CommandFlags,
  type CommandMeta,
  type CommandOutput,
} from './commands/types.js';

// CLI
export { bootstrap, type BootstrapOptions } from './cli/bootstrap.js';
export { dispatch, type DispatchEnvironment } from './cli/dispatcher.js';
export { parseArgs, type ParsedArgs } from './cli/args.js';

// Utilities
export { logger, LogLevel } from './base/utils/logger.js';
export { getDebugConfig, isDebugEnabled, resetDebugConfig } from './base/utils/debug.js';
