import { getToolVersion } from '../../base/utils/version.js';
import { relativeTo } from '../../base/utils/path-utils.js';
import { findManifest } from '../../core/project/manifest.js';
import { BaseCommand } from '../base-command.js';
import { ExitCode, type CommandContext, type CommandMeta } from '../types.js';

/**
 * Show what moo knows about the current directory
 */
export class InfoCommand extends BaseCommand {
  static meta: CommandMeta = {
    name: 'info',
    description: 'Show the project context, roots and configuration sources',
  };

  run(ctx: CommandContext): number {
    const { output, config } = ctx;
    const manifest = findManifest(ctx.cwd, ctx.fs);

    output.info(`moo ${getToolVersion()}`);
    output.line(`Context:       ${ctx.context}`);
    output.line(`Manifest:      ${manifest ? manifest.file : '(none)'}`);
    output.line(`Config root:   ${config.hasProjectRoot() ? config.getProjectRoot() : '(none)'}`);

    const sources = config.getSources();
    output.line(`Config files:  ${sources.length === 0 ? '(none)' : ''}`.trimEnd());
    for (const source of sources) {
      const note = source.error ? ` (ignored: ${source.error})` : '';
      output.line(`  ${relativeTo(config.getProjectRoot(), source.path)}${note}`);
    }

    return ExitCode.Success;
  }
}
