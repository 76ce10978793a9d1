/**
 * Command Types
 *
 * A command is a class with a `static meta` and a `run` method. The registry
 * discovers commands by that shape alone; extending BaseCommand is optional.
 */

import type { ConfigStore } from '../base/config/index.js';
import type { FileSystem } from '../base/fs/types.js';
import type { ContextLabel } from '../core/project/index.js';

export interface CommandMeta {
  /** Name typed on the command line, e.g. "config:get" */
  name: string;
  description: string;
  /** Argument synopsis shown by help, e.g. "<key> [--default=<value>]" */
  usage?: string;
}

export enum ExitCode {
  Success = 0,
  Failure = 1,
  Usage = 2,
}

export type CommandFlags = Record<string, string | boolean>;

/**
 * Where commands write their output
 */
export interface CommandOutput {
  line(text?: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface CommandContext {
  /** Directory moo was invoked from */
  cwd: string;
  context: ContextLabel;
  config: ConfigStore;
  /** Filesystem the project is read and written through */
  fs: FileSystem;
  /** Positional arguments after the command name */
  args: string[];
  flags: CommandFlags;
  output: CommandOutput;
}

export interface Command {
  run(ctx: CommandContext): number | Promise<number>;
}
