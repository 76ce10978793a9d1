/**
 * Path Utilities Tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { findUpward, findFileUpward, relativeTo } from './path-utils.js';
import { createTestProject, writeFile, type TestProject } from '../config/test-utils.js';

describe('findUpward', () => {
  it('should return undefined at the filesystem root when nothing matches', () => {
    const root = path.parse(process.cwd()).root;
    expect(findUpward(root, () => false)).toBeUndefined();
  });

  it('should test the filesystem root itself', () => {
    const root = path.parse(process.cwd()).root;
    const visited: string[] = [];

    const found = findUpward(path.join(root, 'a', 'b'), (dir) => {
      visited.push(dir);
      return dir === root;
    });

    expect(found).toBe(root);
    expect(visited).toEqual([path.join(root, 'a', 'b'), path.join(root, 'a'), root]);
  });

  it('should return the start directory when it matches', () => {
    const start = path.join(path.parse(process.cwd()).root, 'x', 'y');
    expect(findUpward(start, () => true)).toBe(start);
  });

  it('should resolve relative start directories', () => {
    expect(findUpward('.', () => true)).toBe(process.cwd());
  });

  it('should treat a throwing predicate as a miss', () => {
    const root = path.parse(process.cwd()).root;
    const start = path.join(root, 'a', 'b');

    const found = findUpward(start, (dir) => {
      if (dir === start) throw new Error('EACCES');
      return true;
    });

    expect(found).toBe(path.join(root, 'a'));
  });
});

describe('findFileUpward', () => {
  let test: TestProject;

  beforeEach(async () => {
    test = await createTestProject('moo-path-');
  });

  afterEach(() => test.cleanup());

  it('should find the nearest ancestor holding a file', async () => {
    await writeFile(test.projectDir, 'composer.json', '{}');
    const subDir = path.join(test.projectDir, 'src', 'deep');
    await fs.mkdir(subDir, { recursive: true });

    expect(findFileUpward(subDir, ['composer.json'])).toEqual({
      dir: test.projectDir,
      file: path.join(test.projectDir, 'composer.json'),
    });
  });

  it('should try names in order within a directory', async () => {
    await writeFile(test.projectDir, 'composer.json', '{}');
    await writeFile(test.projectDir, 'manifest.json', '{}');

    const match = findFileUpward(test.projectDir, ['composer.json', 'manifest.json']);

    expect(match?.file).toBe(path.join(test.projectDir, 'composer.json'));
  });

  it('should prefer a nearer directory over an earlier name', async () => {
    await writeFile(test.projectDir, 'composer.json', '{}');
    await writeFile(test.projectDir, 'child/manifest.json', '{}');

    const match = findFileUpward(path.join(test.projectDir, 'child'), ['composer.json', 'manifest.json']);

    expect(match?.file).toBe(path.join(test.projectDir, 'child', 'manifest.json'));
  });

  it('should ignore directories with the wanted name', async () => {
    await fs.mkdir(path.join(test.projectDir, 'manifest.json'));

    expect(findFileUpward(test.projectDir, ['manifest.json'])).toBeUndefined();
  });
});

describe('relativeTo', () => {
  it('should return paths inside the base relative to it', () => {
    expect(relativeTo('/proj', '/proj/src/a.php')).toBe(path.join('src', 'a.php'));
  });

  it('should return paths outside the base unchanged', () => {
    expect(relativeTo('/proj', '/other/a.php')).toBe('/other/a.php');
    expect(relativeTo('/proj', '/proj')).toBe('/proj');
  });
});
