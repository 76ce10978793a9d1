/**
 * Resolve everything a command run needs for one working directory
 */

import type { FileSystem } from '../base/fs/types.js';
import { nodeFileSystem } from '../base/fs/node-file-system.js';
import { ConfigStore } from '../base/config/index.js';
import { logger } from '../base/utils/logger.js';
import { CommandRegistry, type UnitLoader } from '../core/commands/index.js';
import { classify } from '../core/project/index.js';
import type { CommandOutput } from '../commands/types.js';
import type { DispatchEnvironment } from './dispatcher.js';
import { createConsoleOutput } from './ui.js';

export interface BootstrapOptions {
  fs?: FileSystem;
  commandsDir?: string;
  loader?: UnitLoader;
  output?: CommandOutput;
}

/**
 * Classify the project, load its configuration and build the registry
 *
 * Classification and config lookup walk upward independently and may settle
 * on different directories.
 */
export function bootstrap(cwd: string, options: BootstrapOptions = {}): DispatchEnvironment {
  const fs = options.fs ?? nodeFileSystem;

  const context = classify(cwd, fs);
  const config = new ConfigStore({ startDir: cwd, fs });
  const registry = new CommandRegistry({ commandsDir: options.commandsDir, fs, loader: options.loader });
  registry.build(context);

  logger.debug('CLI', 'Environment ready', {
    cwd,
    context,
    configRoot: config.hasProjectRoot() ? config.getProjectRoot() : null,
    commands: registry.size,
  });

  return {
    cwd,
    context,
    config,
    fs,
    registry,
    output: options.output ?? createConsoleOutput(),
  };
}
