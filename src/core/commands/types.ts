/**
 * Command Registry Types
 */

import type { FileSystem } from '../../base/fs/types.js';
import type { Command } from '../../commands/types.js';

/**
 * Command group; each one is a directory under the commands root
 */
export type CommandGroup = 'common' | 'framework' | 'plugin';

export const COMMAND_GROUPS: readonly CommandGroup[] = ['common', 'framework', 'plugin'];

/**
 * A registered command as shown to users
 */
export interface CommandDescriptor {
  group: CommandGroup;
  /** `<group>/<path without extension>#<export name>` */
  id: string;
  name: string;
  description: string;
  usage?: string;
  /** Unit the command was loaded from */
  file: string;
}

/**
 * A discovered command together with a way to create it
 */
export interface RegisteredCommand {
  descriptor: CommandDescriptor;
  create: () => Command;
}

/**
 * Loads an implementation unit and returns its exports
 */
export type UnitLoader = (file: string) => unknown;

export interface CommandRegistryOptions {
  /** Directory holding one subdirectory per group */
  commandsDir?: string;
  fs?: FileSystem;
  loader?: UnitLoader;
}
