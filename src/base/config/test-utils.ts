/**
 * Shared test utilities for filesystem-backed tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { stringify } from 'yaml';

export interface TestProject {
  tempDir: string;
  projectDir: string;
  cleanup: () => Promise<void>;
}

/**
 * Create a test project directory inside a fresh temp directory
 */
export async function createTestProject(prefix = 'moo-test-'): Promise<TestProject> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const projectDir = path.join(tempDir, 'project');

  await fs.mkdir(projectDir, { recursive: true });

  return {
    tempDir,
    projectDir,
    cleanup: async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    },
  };
}

/**
 * Write a file below dir, creating parent directories
 */
export async function writeFile(dir: string, relativePath: string, content: string): Promise<string> {
  const filePath = path.join(dir, relativePath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  return filePath;
}

/**
 * Write a YAML config file below dir
 */
export async function writeConfig(
  dir: string,
  relativePath: string,
  data: Record<string, unknown>
): Promise<string> {
  return writeFile(dir, relativePath, stringify(data));
}

/**
 * Write a JSON manifest below dir
 */
export async function writeManifest(
  dir: string,
  data: Record<string, unknown>,
  fileName = 'composer.json'
): Promise<string> {
  return writeFile(dir, fileName, JSON.stringify(data, null, 2));
}
