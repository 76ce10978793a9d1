/**
 * CLI UI - Terminal output for moo
 */

import chalk from 'chalk';
import type { CommandOutput } from '../commands/types.js';
import type { CommandDescriptor, CommandGroup } from '../core/commands/index.js';
import type { ContextLabel } from '../core/project/index.js';

// ============================================================================
// Colors & Styles
// ============================================================================

export const colors = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,
  muted: chalk.dim,
  highlight: chalk.bold.white,
};

// ============================================================================
// Output
// ============================================================================

/**
 * Command output on the terminal: results on stdout, problems on stderr
 */
export function createConsoleOutput(): CommandOutput {
  return {
    line: (text = '') => console.log(text),
    info: (message) => console.log(colors.info('ℹ ') + message),
    success: (message) => console.log(colors.success('✓ ') + message),
    warn: (message) => console.error(colors.warning('! ') + message),
    error: (message) => console.error(colors.error('✗ Error: ') + message),
  };
}

// ============================================================================
// Command Listing
// ============================================================================

/**
 * Lines of the command list, grouped in registration order
 */
export function formatCommandList(
  commands: CommandDescriptor[],
  groups: readonly CommandGroup[],
  context: ContextLabel
): string[] {
  const lines: string[] = [
    `${colors.highlight('moo')} ${colors.muted(`(${context} context)`)}`,
    '',
    'Usage: moo <command> [arguments] [--flags]',
    '',
    'Available commands:',
  ];

  const width = Math.max(0, ...commands.map((command) => command.name.length)) + 2;

  for (const group of groups) {
    const inGroup = commands.filter((command) => command.group === group);
    if (inGroup.length === 0) continue;

    lines.push(`  ${colors.primary(group)}`);
    for (const command of inGroup) {
      lines.push(`    ${colors.highlight(command.name.padEnd(width))}${command.description}`);
    }
  }

  lines.push('', `Run ${colors.primary('moo help <command>')} for details on one command.`);
  return lines;
}

/**
 * Lines of the help text for one command
 */
export function formatCommandHelp(command: CommandDescriptor): string[] {
  const usage = command.usage ? `moo ${command.name} ${command.usage}` : `moo ${command.name}`;
  return [
    colors.highlight(command.name),
    '',
    `  ${command.description}`,
    '',
    `Usage: ${usage}`,
    colors.muted(`Defined in ${command.id}`),
  ];
}
