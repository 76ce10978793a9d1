/**
 * Command Registry Module Exports
 */

export { CommandRegistry, DEFAULT_COMMANDS_DIR } from './registry.js';
export { selectGroups } from './groups.js';
export { commandId, commandsFromUnit, discoverGroup, findUnits, requireUnit } from './discovery.js';
export type {
  CommandDescriptor,
  CommandGroup,
  CommandRegistryOptions,
  RegisteredCommand,
  UnitLoader,
} from './types.js';
export { COMMAND_GROUPS } from './types.js';
