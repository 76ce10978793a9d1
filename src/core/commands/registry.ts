/**
 * Command Registry - Commands visible in the current project context
 */

import * as path from 'path';
import type { FileSystem } from '../../base/fs/types.js';
import { nodeFileSystem } from '../../base/fs/node-file-system.js';
import { logger } from '../../base/utils/logger.js';
import type { ContextLabel } from '../project/types.js';
import { discoverGroup, requireUnit } from './discovery.js';
import { selectGroups } from './groups.js';
import type {
  CommandDescriptor,
  CommandGroup,
  CommandRegistryOptions,
  RegisteredCommand,
  UnitLoader,
} from './types.js';

/**
 * Built-in command directory (src/commands, or dist/src/commands once built)
 */
export const DEFAULT_COMMANDS_DIR = path.resolve(__dirname, '..', '..', 'commands');

export class CommandRegistry {
  private readonly commandsDir: string;
  private readonly fs: FileSystem;
  private readonly loader: UnitLoader;
  private commands: Map<string, RegisteredCommand> = new Map();
  private selectedGroups: CommandGroup[] = [];
  private built = false;

  constructor(options: CommandRegistryOptions = {}) {
    this.commandsDir = options.commandsDir ?? DEFAULT_COMMANDS_DIR;
    this.fs = options.fs ?? nodeFileSystem;
    this.loader = options.loader ?? requireUnit;
  }

  /**
   * Discover and register the commands of every group visible in context
   *
   * Can be called once; the command set is fixed afterwards.
   */
  build(context: ContextLabel): readonly CommandDescriptor[] {
    if (this.built) {
      throw new Error('Command registry is already built');
    }
    this.built = true;
    this.selectedGroups = selectGroups(context);

    for (const group of this.selectedGroups) {
      for (const command of discoverGroup(group, this.commandsDir, this.fs, this.loader)) {
        this.register(command);
      }
    }

    logger.debug('Registry', 'Registry built', {
      context,
      groups: this.selectedGroups.join(','),
      commands: this.commands.size,
    });
    return this.list();
  }

  private register(command: RegisteredCommand): void {
    const { name, id } = command.descriptor;
    const existing = this.commands.get(name);

    if (existing) {
      logger.warn('Registry', `Duplicate command name "${name}"`, {
        kept: existing.descriptor.id,
        skipped: id,
      });
      return;
    }

    this.commands.set(name, command);
  }

  get(name: string): RegisteredCommand | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  /**
   * Descriptors in registration order
   */
  list(): CommandDescriptor[] {
    return Array.from(this.commands.values(), (command) => command.descriptor);
  }

  groups(): readonly CommandGroup[] {
    return this.selectedGroups;
  }

  get size(): number {
    return this.commands.size;
  }
}
