import type { ContextLabel } from '../project/types.js';
import type { CommandGroup } from './types.js';

/**
 * Groups visible in a context, in registration order
 *
 * common is always there; framework tooling is available inside the framework
 * and anything built on it; plugin tooling only inside plugins and themes.
 */
export function selectGroups(context: ContextLabel): CommandGroup[] {
  const groups: CommandGroup[] = ['common'];

  if (context === 'framework' || context === 'plugin' || context === 'theme') {
    groups.push('framework');
  }
  if (context === 'plugin' || context === 'theme') {
    groups.push('plugin');
  }

  return groups;
}
