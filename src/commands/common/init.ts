import * as path from 'path';
import { getLegacyConfigPath, type ConfigTree } from '../../base/config/index.js';
import { BaseCommand, CommandError } from '../base-command.js';
import { ExitCode, type CommandContext, type CommandMeta } from '../types.js';

/**
 * Lowercase, dash-separated form of a project name
 */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Starting configuration for a project directory
 */
export function createInitialConfig(name: string): ConfigTree {
  return {
    project: {
      name,
      slug: slugify(name),
    },
    deploy: {
      dry_run: false,
    },
  };
}

/**
 * Write a fresh wpmoo-config.yml in the current directory
 */
export class InitCommand extends BaseCommand {
  static meta: CommandMeta = {
    name: 'init',
    description: 'Create wpmoo-config.yml in the current directory',
    usage: '[--name=<project name>] [--force]',
  };

  run(ctx: CommandContext): number {
    const target = getLegacyConfigPath(ctx.cwd);

    if (ctx.fs.exists(target) && !this.hasFlag(ctx, 'force')) {
      throw new CommandError(`${target} already exists (use --force to overwrite)`);
    }

    const name = this.stringFlag(ctx, 'name') ?? path.basename(ctx.cwd);
    if (!ctx.config.save(ctx.cwd, createInitialConfig(name))) {
      throw new CommandError(`Could not write ${target}`);
    }

    ctx.output.success(`Created ${target}`);
    return ExitCode.Success;
  }
}
