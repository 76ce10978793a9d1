import { stringify } from 'yaml';
import type { ConfigValue } from '../../../base/config/index.js';
import { BaseCommand } from '../../base-command.js';

/**
 * Shared formatting for the config commands. Declares no meta of its own, so
 * discovery never registers it.
 */
export abstract class ConfigCommand extends BaseCommand {
  /**
   * Scalars print as-is; mappings and lists print as YAML
   */
  protected formatValue(value: ConfigValue): string {
    if (value === null) {
      return 'null';
    }
    if (typeof value === 'object') {
      return stringify(value, { indent: 2 }).trimEnd();
    }
    return String(value);
  }
}
