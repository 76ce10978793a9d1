/**
 * Test helpers for running commands in process
 */

import { ConfigStore } from '../base/config/index.js';
import type { FileSystem } from '../base/fs/types.js';
import { nodeFileSystem } from '../base/fs/node-file-system.js';
import type { ContextLabel } from '../core/project/index.js';
import type { CommandContext, CommandFlags, CommandOutput } from './types.js';

export type OutputKind = 'line' | 'info' | 'success' | 'warn' | 'error';

export interface MemoryOutput extends CommandOutput {
  entries: Array<[OutputKind, string]>;
  /** Text of every entry of one kind */
  of(kind: OutputKind): string[];
}

/**
 * Output that records everything instead of printing it
 */
export function createMemoryOutput(): MemoryOutput {
  const entries: Array<[OutputKind, string]> = [];
  return {
    entries,
    of: (kind) => entries.filter(([k]) => k === kind).map(([, text]) => text),
    line: (text = '') => entries.push(['line', text]),
    info: (message) => entries.push(['info', message]),
    success: (message) => entries.push(['success', message]),
    warn: (message) => entries.push(['warn', message]),
    error: (message) => entries.push(['error', message]),
  };
}

export interface TestContextOptions {
  cwd: string;
  context?: ContextLabel;
  args?: string[];
  flags?: CommandFlags;
  fs?: FileSystem;
}

export function createTestContext(
  options: TestContextOptions
): CommandContext & { output: MemoryOutput } {
  const fs = options.fs ?? nodeFileSystem;
  return {
    cwd: options.cwd,
    context: options.context ?? 'unknown',
    config: new ConfigStore({ startDir: options.cwd, fs }),
    fs,
    args: options.args ?? [],
    flags: options.flags ?? {},
    output: createMemoryOutput(),
  };
}
