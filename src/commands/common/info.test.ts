import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'path';
import { InfoCommand } from './info.js';
import { createTestContext } from '../test-utils.js';
import {
  createTestProject,
  writeConfig,
  writeManifest,
  type TestProject,
} from '../../base/config/test-utils.js';

describe('InfoCommand', () => {
  let test: TestProject;

  beforeEach(async () => {
    test = await createTestProject('moo-info-');
  });

  afterEach(() => test.cleanup());

  it('should show the context, manifest and config files', async () => {
    await writeManifest(test.projectDir, { type: 'wordpress-plugin' });
    await writeConfig(test.projectDir, 'wpmoo-config.yml', { project: { name: 'Foo' } });
    await writeConfig(test.projectDir, 'config/deploy.yml', { deploy: {} });
    const ctx = createTestContext({ cwd: test.projectDir, context: 'plugin' });

    expect(await new InfoCommand().execute(ctx)).toBe(0);

    expect(ctx.output.of('info')).toEqual(['moo 0.1.0']);
    expect(ctx.output.of('line')).toEqual([
      'Context:       plugin',
      `Manifest:      ${path.join(test.projectDir, 'composer.json')}`,
      `Config root:   ${test.projectDir}`,
      'Config files:',
      '  wpmoo-config.yml',
      `  ${path.join('config', 'deploy.yml')}`,
    ]);
  });

  it('should show placeholders outside a project', async () => {
    const ctx = createTestContext({ cwd: test.projectDir });

    await new InfoCommand().execute(ctx);

    expect(ctx.output.of('line')).toEqual([
      'Context:       unknown',
      'Manifest:      (none)',
      'Config root:   (none)',
      'Config files:  (none)',
    ]);
  });
});
