import { relativeTo } from '../../base/utils/path-utils.js';
import { identifyProject } from '../../core/project/identifier.js';
import { BaseCommand } from '../base-command.js';
import { ExitCode, type CommandContext, type CommandMeta } from '../types.js';

export class ProjectIdentifyCommand extends BaseCommand {
  static meta: CommandMeta = {
    name: 'project:identify',
    description: 'Show the main file and readme of the project in this directory',
  };

  run(ctx: CommandContext): number {
    const info = identifyProject(ctx.cwd, ctx.fs);

    if (!info.found || !info.mainFile) {
      ctx.output.warn('No framework or plugin main file found in this directory');
      return ExitCode.Failure;
    }

    ctx.output.line(`Type:       ${info.type}`);
    ctx.output.line(`Main file:  ${relativeTo(ctx.cwd, info.mainFile)}`);
    ctx.output.line(`Readme:     ${info.readmeFile ? relativeTo(ctx.cwd, info.readmeFile) : '(none)'}`);
    return ExitCode.Success;
  }
}
