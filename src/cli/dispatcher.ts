/**
 * Dispatcher - Route a parsed command line to a registered command
 */

import type { ConfigStore } from '../base/config/index.js';
import type { FileSystem } from '../base/fs/types.js';
import { logger } from '../base/utils/logger.js';
import { executeCommand } from '../commands/base-command.js';
import { ExitCode, type CommandOutput } from '../commands/types.js';
import type { CommandRegistry } from '../core/commands/index.js';
import type { ContextLabel } from '../core/project/index.js';
import { parseArgs } from './args.js';
import { formatCommandHelp, formatCommandList } from './ui.js';

export interface DispatchEnvironment {
  cwd: string;
  context: ContextLabel;
  config: ConfigStore;
  fs: FileSystem;
  registry: CommandRegistry;
  output: CommandOutput;
}

function printList(env: DispatchEnvironment): void {
  const lines = formatCommandList(env.registry.list(), env.registry.groups(), env.context);
  for (const line of lines) {
    env.output.line(line);
  }
}

function printHelp(env: DispatchEnvironment, name: string): number {
  const command = env.registry.get(name);
  if (!command) {
    return unknownCommand(env, name);
  }

  for (const line of formatCommandHelp(command.descriptor)) {
    env.output.line(line);
  }
  return ExitCode.Success;
}

function unknownCommand(env: DispatchEnvironment, name: string): number {
  env.output.error(`Unknown command "${name}" in ${env.context} context`);
  env.output.line();
  printList(env);
  return ExitCode.Usage;
}

/**
 * Run the command named by argv and return its exit code
 *
 * - no command, `list`, or a bare `--help`: print the command list
 * - `help <name>` or `<name> --help`: print that command's usage
 * - anything unregistered: error, the list, and exit code 2
 */
export async function dispatch(argv: string[], env: DispatchEnvironment): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.command === undefined || parsed.command === 'list') {
    printList(env);
    return ExitCode.Success;
  }

  if (parsed.command === 'help') {
    const name = parsed.args[0];
    if (name === undefined) {
      printList(env);
      return ExitCode.Success;
    }
    return printHelp(env, name);
  }

  if (parsed.help) {
    return printHelp(env, parsed.command);
  }

  const registered = env.registry.get(parsed.command);
  if (!registered) {
    return unknownCommand(env, parsed.command);
  }

  logger.debug('CLI', 'Running command', { id: registered.descriptor.id, args: parsed.args.length });

  return executeCommand(registered.create(), {
    cwd: env.cwd,
    context: env.context,
    config: env.config,
    fs: env.fs,
    args: parsed.args,
    flags: parsed.flags,
    output: env.output,
  });
}
