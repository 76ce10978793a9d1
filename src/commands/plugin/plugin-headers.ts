import { relativeTo } from '../../base/utils/path-utils.js';
import { readProjectHeaders } from '../../core/project/identifier.js';
import { PROJECT_HEADER_FIELDS } from '../../core/project/headers.js';
import { BaseCommand, CommandError } from '../base-command.js';
import { ExitCode, type CommandContext, type CommandMeta } from '../types.js';

export class PluginHeadersCommand extends BaseCommand {
  static meta: CommandMeta = {
    name: 'plugin:headers',
    description: 'Show the header fields of the main plugin or theme file',
  };

  run(ctx: CommandContext): number {
    const result = readProjectHeaders(ctx.cwd, ctx.fs);
    if (!result) {
      throw new CommandError('No plugin main file found in this directory');
    }

    ctx.output.info(relativeTo(ctx.cwd, result.file));

    const width = Math.max(...PROJECT_HEADER_FIELDS.map(([label]) => label.length)) + 2;
    for (const [label, field] of PROJECT_HEADER_FIELDS) {
      const value = result.headers[field];
      if (value !== undefined) {
        ctx.output.line(`${`${label}:`.padEnd(width)}${value}`);
      }
    }
    return ExitCode.Success;
  }
}
