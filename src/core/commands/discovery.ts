/**
 * Command Discovery - Find command classes in a group directory
 *
 * Every implementation unit below the group directory is loaded, and each of
 * its exports is inspected in declaration order. An export is a command when
 * it is a class that declares its own `static meta` and has a `run` method.
 * Anything else (abstract bases, helpers, constants) is skipped.
 */

import * as path from 'path';
import type { FileSystem } from '../../base/fs/types.js';
import { errorMessage, logger } from '../../base/utils/logger.js';
import { isVerboseDebugEnabled } from '../../base/utils/debug.js';
import { validateCommandMeta } from '../../base/utils/config-validator.js';
import type { Command } from '../../commands/types.js';
import type { CommandGroup, RegisteredCommand, UnitLoader } from './types.js';

export const UNIT_PATTERNS = ['**/*.{ts,js,cjs}'];
export const UNIT_IGNORE = ['**/*.d.ts', '**/*.test.*', '**/*.spec.*', '**/*.map'];

/**
 * Load a unit with CommonJS require
 */
export const requireUnit: UnitLoader = (file) => {
  const unitExports: unknown = require(file);
  return unitExports;
};

/**
 * Implementation units of a group, sorted by path
 */
export function findUnits(groupDir: string, fs: FileSystem): string[] {
  return fs.findFiles(groupDir, UNIT_PATTERNS, UNIT_IGNORE);
}

/**
 * `<group>/<relative path without extension>#<export name>`, with forward slashes
 */
export function commandId(group: CommandGroup, groupDir: string, file: string, exportName: string): string {
  const relative = path.relative(groupDir, file).split(path.sep).join('/');
  const withoutExtension = relative.slice(0, relative.length - path.extname(relative).length);
  return `${group}/${withoutExtension}#${exportName}`;
}

type CommandConstructor = new () => Command;

/**
 * A class whose prototype has a run method
 */
function isRunnableClass(value: unknown): value is CommandConstructor {
  if (typeof value !== 'function') {
    return false;
  }
  const prototype: unknown = value.prototype;
  return (
    typeof prototype === 'object' &&
    prototype !== null &&
    typeof Reflect.get(prototype, 'run') === 'function'
  );
}

/**
 * Exports of a unit as [name, value] pairs in declaration order
 */
function exportEntries(unitExports: unknown): Array<[string, unknown]> {
  if (typeof unitExports === 'function') {
    return [['default', unitExports]];
  }
  if (typeof unitExports === 'object' && unitExports !== null) {
    return Object.entries(unitExports);
  }
  return [];
}

/**
 * Commands exported by one loaded unit
 */
export function commandsFromUnit(
  group: CommandGroup,
  groupDir: string,
  file: string,
  unitExports: unknown
): RegisteredCommand[] {
  const commands: RegisteredCommand[] = [];

  for (const [exportName, value] of exportEntries(unitExports)) {
    if (typeof value !== 'function' || !Object.prototype.hasOwnProperty.call(value, 'meta')) {
      continue;
    }
    if (!isRunnableClass(value)) {
      if (isVerboseDebugEnabled('discovery')) {
        logger.debug('Discovery', 'Export has meta but no run method', { file, export: exportName });
      }
      continue;
    }

    const id = commandId(group, groupDir, file, exportName);
    const meta = validateCommandMeta(Reflect.get(value, 'meta'));
    if (!meta.valid || !meta.data) {
      logger.warn('Discovery', 'Skipping command with invalid meta', {
        id,
        errors: meta.errors,
        hint: 'static meta needs a name and a description',
      });
      continue;
    }

    const { name, description, usage } = meta.data;
    commands.push({
      descriptor: { group, id, name, description, ...(usage ? { usage } : {}), file },
      create: () => new value(),
    });
  }

  return commands;
}

/**
 * Discover every command in one group directory
 *
 * A unit that fails to load is skipped with a warning.
 */
export function discoverGroup(
  group: CommandGroup,
  commandsDir: string,
  fs: FileSystem,
  loader: UnitLoader
): RegisteredCommand[] {
  const groupDir = path.join(commandsDir, group);
  const units = findUnits(groupDir, fs);
  logger.debug('Discovery', 'Scanning command group', { group, dir: groupDir, units: units.length });

  const commands: RegisteredCommand[] = [];
  for (const file of units) {
    let unitExports: unknown;
    try {
      unitExports = loader(file);
    } catch (error) {
      logger.warn('Discovery', 'Failed to load command unit', {
        file,
        error: errorMessage(error),
        hint: 'Check the file for syntax errors',
      });
      continue;
    }

    commands.push(...commandsFromUnit(group, groupDir, file, unitExports));
  }

  return commands;
}
