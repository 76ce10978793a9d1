/**
 * Base Command - Shared behavior for built-in commands
 */

import { errorMessage, logger } from '../base/utils/logger.js';
import { ExitCode, type Command, type CommandContext } from './types.js';

/**
 * Thrown by commands to stop with a message and a specific exit code
 */
export class CommandError extends Error {
  constructor(
    message: string,
    readonly exitCode: number = ExitCode.Failure
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

/**
 * Run a command and turn whatever it throws into an exit code
 */
export async function executeCommand(command: Command, ctx: CommandContext): Promise<number> {
  try {
    const code = await command.run(ctx);
    return Number.isInteger(code) ? code : ExitCode.Failure;
  } catch (error) {
    if (error instanceof CommandError) {
      ctx.output.error(error.message);
      return error.exitCode;
    }

    logger.error('Command', 'Command failed', { error: errorMessage(error) });
    ctx.output.error(errorMessage(error));
    return ExitCode.Failure;
  }
}

export abstract class BaseCommand implements Command {
  abstract run(ctx: CommandContext): number | Promise<number>;

  execute(ctx: CommandContext): Promise<number> {
    return executeCommand(this, ctx);
  }

  /**
   * Positional argument at index, or a usage error naming it
   */
  protected requireArg(ctx: CommandContext, index: number, label: string): string {
    const value = ctx.args[index];
    if (value === undefined || value === '') {
      throw new CommandError(`Missing argument: ${label}`, ExitCode.Usage);
    }
    return value;
  }

  /**
   * Boolean flag; "--force", "--force=true" and "--force=1" all count
   */
  protected hasFlag(ctx: CommandContext, name: string): boolean {
    const value = ctx.flags[name];
    return value === true || value === 'true' || value === '1';
  }

  /**
   * String flag value, or undefined when absent or given without a value
   */
  protected stringFlag(ctx: CommandContext, name: string): string | undefined {
    const value = ctx.flags[name];
    return typeof value === 'string' ? value : undefined;
  }
}
