/**
 * Project Identifier Tests
 */

import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { identifyProject, readProjectHeaders } from './identifier.js';
import { createTestProject, writeFile, type TestProject } from '../../base/config/test-utils.js';

const FRAMEWORK_MAIN = `<?php
/**
 * Plugin Name: WPMoo Framework
 * Version: 0.4.0
 */
`;

const PLUGIN_MAIN = `<?php
/**
 * Plugin Name: Starter
 * Version: 1.0.0
 * Text Domain: starter
 */

require __DIR__ . '/vendor/wpmoo/wpmoo/wpmoo.php';
`;

describe('identifyProject', () => {
  let test: TestProject;

  beforeEach(async () => {
    test = await createTestProject('moo-identify-');
  });

  afterEach(() => test.cleanup());

  it('should identify a framework checkout', async () => {
    await writeFile(test.projectDir, 'wpmoo.php', FRAMEWORK_MAIN);
    await writeFile(test.projectDir, 'readme.txt', '=== WPMoo ===\n');

    expect(identifyProject(test.projectDir)).toEqual({
      found: true,
      type: 'framework',
      mainFile: path.join(test.projectDir, 'wpmoo.php'),
      readmeFile: path.join(test.projectDir, 'readme.txt'),
    });
  });

  it('should identify a plugin by its top-level main file', async () => {
    await writeFile(test.projectDir, 'a-helpers.php', '<?php\n// wpmoo helpers\n');
    await writeFile(test.projectDir, 'starter.php', PLUGIN_MAIN);

    expect(identifyProject(test.projectDir)).toEqual({
      found: true,
      type: 'plugin',
      mainFile: path.join(test.projectDir, 'starter.php'),
      readmeFile: null,
    });
  });

  it('should not treat a wpmoo.php without the framework header as the framework', async () => {
    await writeFile(test.projectDir, 'wpmoo.php', PLUGIN_MAIN);

    const info = identifyProject(test.projectDir);

    expect(info.type).toBe('plugin');
    expect(info.mainFile).toBe(path.join(test.projectDir, 'wpmoo.php'));
  });

  it('should ignore PHP files in subdirectories', async () => {
    await writeFile(test.projectDir, 'src/starter.php', PLUGIN_MAIN);

    expect(identifyProject(test.projectDir)).toEqual({
      found: false,
      type: 'unknown',
      mainFile: null,
      readmeFile: null,
    });
  });
});

describe('readProjectHeaders', () => {
  let test: TestProject;

  beforeEach(async () => {
    test = await createTestProject('moo-identify-');
  });

  afterEach(() => test.cleanup());

  it('should read the headers of the main file', async () => {
    await writeFile(test.projectDir, 'starter.php', PLUGIN_MAIN);

    expect(readProjectHeaders(test.projectDir)).toEqual({
      file: path.join(test.projectDir, 'starter.php'),
      headers: { pluginName: 'Starter', version: '1.0.0', textDomain: 'starter' },
    });
  });

  it('should return undefined without a main file', () => {
    expect(readProjectHeaders(test.projectDir)).toBeUndefined();
  });
});
