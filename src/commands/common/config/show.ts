import { ExitCode, type CommandContext, type CommandMeta } from '../../types.js';
import { ConfigCommand } from './config-command.js';

export class ConfigShowCommand extends ConfigCommand {
  static meta: CommandMeta = {
    name: 'config:show',
    description: 'Print the merged configuration',
    usage: '[--sources]',
  };

  run(ctx: CommandContext): number {
    const { config, output } = ctx;

    if (this.hasFlag(ctx, 'sources')) {
      for (const line of config.getDebugSummary().split('\n')) {
        output.line(line);
      }
      output.line();
    }

    if (!config.isLoaded()) {
      output.info('No configuration loaded');
      return ExitCode.Success;
    }

    output.line(this.formatValue(config.all()));
    return ExitCode.Success;
  }
}
