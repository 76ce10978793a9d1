import { CommandError } from '../../base-command.js';
import { ExitCode, type CommandContext, type CommandMeta } from '../../types.js';
import { ConfigCommand } from './config-command.js';

export class ConfigGetCommand extends ConfigCommand {
  static meta: CommandMeta = {
    name: 'config:get',
    description: 'Print one configuration value by dotted key',
    usage: '<key> [--default=<value>]',
  };

  run(ctx: CommandContext): number {
    const key = this.requireArg(ctx, 0, 'key');
    const value = ctx.config.get(key);

    if (value === undefined) {
      const fallback = this.stringFlag(ctx, 'default');
      if (fallback === undefined) {
        throw new CommandError(`No value for "${key}"`);
      }
      ctx.output.line(fallback);
      return ExitCode.Success;
    }

    ctx.output.line(this.formatValue(value));
    return ExitCode.Success;
  }
}
