import * as path from 'path';
import { stringify } from 'yaml';
import { isConfigTree, type ConfigStore, type ConfigTree } from '../../base/config/index.js';
import { BaseCommand } from '../base-command.js';
import { ExitCode, type CommandContext, type CommandMeta } from '../types.js';

export const SVN_BASE_URL = 'https://plugins.svn.wordpress.org';

/**
 * The deploy subtree with defaults filled in
 *
 * svn_url defaults to the plugin directory URL named after the project root,
 * dry_run to false. Other keys pass through unchanged.
 */
export function resolveDeploySettings(config: ConfigStore): ConfigTree {
  const configured = config.get('deploy');
  const deploy: ConfigTree = isConfigTree(configured) ? configured : {};

  const svnUrl = deploy['svn_url'];
  const dryRun = deploy['dry_run'];

  return {
    ...deploy,
    svn_url:
      typeof svnUrl === 'string' && svnUrl !== ''
        ? svnUrl
        : `${SVN_BASE_URL}/${path.basename(config.getProjectRoot())}/`,
    dry_run: typeof dryRun === 'boolean' ? dryRun : false,
  };
}

export class DeploySettingsCommand extends BaseCommand {
  static meta: CommandMeta = {
    name: 'deploy:settings',
    description: 'Show the deploy settings with defaults applied',
    usage: '[--json]',
  };

  run(ctx: CommandContext): number {
    const settings = resolveDeploySettings(ctx.config);

    const text = this.hasFlag(ctx, 'json')
      ? JSON.stringify(settings, null, 2)
      : stringify({ deploy: settings }, { indent: 2 }).trimEnd();
    ctx.output.line(text);
    return ExitCode.Success;
  }
}
