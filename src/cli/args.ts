import type { CommandFlags } from '../commands/types.js';

export interface ParsedArgs {
  /** First positional argument */
  command?: string;
  /** Remaining positional arguments */
  args: string[];
  flags: CommandFlags;
  help: boolean;
}

/**
 * Split argv into command, positional arguments and flags
 *
 * Supports `--name=value`, `--name value`, bare `--flag`, `-h` and `--` to end
 * flag parsing. A flag followed by another flag or nothing is boolean.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: CommandFlags = {};
  let help = false;
  let flagsEnded = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (flagsEnded || !arg.startsWith('-') || arg === '-') {
      positional.push(arg);
      continue;
    }
    if (arg === '--') {
      flagsEnded = true;
      continue;
    }
    if (arg === '-h' || arg === '--help') {
      help = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq >= 0) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }

      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        flags[body] = next;
        i++;
      } else {
        flags[body] = true;
      }
      continue;
    }

    // Short flags other than -h are plain booleans: -f, -abc
    for (const letter of arg.slice(1)) {
      flags[letter] = true;
    }
  }

  const [command, ...args] = positional;
  return { command, args, flags, help };
}
