/**
 * Config Levels Tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { findConfigRoot, getConfigFiles, isConfigRoot } from './levels.js';
import { createTestProject, writeConfig, type TestProject } from './test-utils.js';

describe('isConfigRoot', () => {
  let test: TestProject;

  beforeEach(async () => {
    test = await createTestProject('moo-levels-');
  });

  afterEach(() => test.cleanup());

  it('should accept the legacy single file', async () => {
    await writeConfig(test.projectDir, 'wpmoo-config.yml', { project: { name: 'Foo' } });
    expect(isConfigRoot(test.projectDir)).toBe(true);
  });

  it('should accept the settings file in the config directory', async () => {
    await writeConfig(test.projectDir, 'wpmoo-config/wpmoo-settings.yml', { project: { name: 'Foo' } });
    expect(isConfigRoot(test.projectDir)).toBe(true);
  });

  it('should not accept a config directory holding only deploy settings', async () => {
    await writeConfig(test.projectDir, 'wpmoo-config/deploy.yml', { deploy: { zip: true } });
    expect(isConfigRoot(test.projectDir)).toBe(false);
  });

  it('should not accept a directory named like the legacy file', async () => {
    await fs.mkdir(path.join(test.projectDir, 'wpmoo-config.yml'));
    expect(isConfigRoot(test.projectDir)).toBe(false);
  });
});

describe('findConfigRoot', () => {
  let test: TestProject;

  beforeEach(async () => {
    test = await createTestProject('moo-levels-');
  });

  afterEach(() => test.cleanup());

  it('should find the root from a nested directory', async () => {
    await writeConfig(test.projectDir, 'wpmoo-config.yml', {});
    const subDir = path.join(test.projectDir, 'src', 'admin');
    await fs.mkdir(subDir, { recursive: true });

    expect(findConfigRoot(subDir)).toBe(test.projectDir);
  });

  it('should prefer the nearer marker', async () => {
    await writeConfig(test.projectDir, 'wpmoo-config.yml', {});
    const nested = path.join(test.projectDir, 'packages', 'child');
    await writeConfig(nested, 'wpmoo-config/wpmoo-settings.yml', {});

    expect(findConfigRoot(path.join(nested, 'src'))).toBe(nested);
  });

  it('should return undefined when there is no marker', async () => {
    const subDir = path.join(test.projectDir, 'a', 'b');
    await fs.mkdir(subDir, { recursive: true });

    expect(findConfigRoot(subDir)).toBeUndefined();
  });
});

describe('getConfigFiles', () => {
  let test: TestProject;

  beforeEach(async () => {
    test = await createTestProject('moo-levels-');
  });

  afterEach(() => test.cleanup());

  it('should list files in merge order', async () => {
    await fs.mkdir(path.join(test.projectDir, 'wpmoo-config'));
    await fs.mkdir(path.join(test.projectDir, 'config'));
    await writeConfig(test.projectDir, 'config/deploy.yml', {});

    const files = getConfigFiles(test.projectDir);

    expect(files.map((f) => path.relative(test.projectDir, f.path))).toEqual([
      'wpmoo-config.yml',
      path.join('wpmoo-config', 'wpmoo-settings.yml'),
      path.join('wpmoo-config', 'deploy.yml'),
      path.join('config', 'wpmoo-settings.yml'),
      path.join('config', 'deploy.yml'),
    ]);
    expect(files.map((f) => f.kind)).toEqual(['legacy', 'primary', 'primary', 'alternate', 'alternate']);
    expect(files.map((f) => f.exists)).toEqual([false, false, false, false, true]);
  });

  it('should skip config directories that do not exist', () => {
    const files = getConfigFiles(test.projectDir);

    expect(files).toEqual([
      { kind: 'legacy', path: path.join(test.projectDir, 'wpmoo-config.yml'), exists: false },
    ]);
  });
});
