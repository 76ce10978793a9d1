/**
 * Config Merger Tests
 */

import { describe, it, expect } from '@jest/globals';
import { deepMerge, mergeSources, lookup, createMergeSummary, setEntry } from './merger.js';
import type { ConfigSource, ConfigTree } from './types.js';

describe('deepMerge', () => {
  it('should merge simple objects', () => {
    expect(deepMerge({ a: 1, b: 2 }, { b: 3, c: 4 })).toEqual({ a: 1, b: 3, c: 4 });
  });

  it('should merge nested mappings key by key', () => {
    expect(deepMerge({ a: { x: 1, y: 2 } }, { a: { y: 3 } })).toEqual({ a: { x: 1, y: 3 } });
  });

  it('should merge several levels deep', () => {
    const base: ConfigTree = { deploy: { svn: { url: 'a', user: 'me' }, zip: true } };
    const override: ConfigTree = { deploy: { svn: { url: 'b' } } };

    expect(deepMerge(base, override)).toEqual({
      deploy: { svn: { url: 'b', user: 'me' }, zip: true },
    });
  });

  it('should replace arrays instead of concatenating them', () => {
    expect(deepMerge({ items: ['a', 'b'] }, { items: ['c'] })).toEqual({ items: ['c'] });
  });

  it('should replace a mapping with a scalar and a scalar with a mapping', () => {
    expect(deepMerge({ a: { x: 1 } }, { a: 'flat' })).toEqual({ a: 'flat' });
    expect(deepMerge({ a: 'flat' }, { a: { x: 1 } })).toEqual({ a: { x: 1 } });
  });

  it('should let an explicit null override a value', () => {
    expect(deepMerge({ a: { x: 1 } }, { a: null })).toEqual({ a: null });
  });

  it('should not modify its inputs', () => {
    const base: ConfigTree = { a: { x: 1 } };
    const override: ConfigTree = { a: { y: 2 } };

    deepMerge(base, override);

    expect(base).toEqual({ a: { x: 1 } });
    expect(override).toEqual({ a: { y: 2 } });
  });

  it('should not share objects with its inputs', () => {
    const base: ConfigTree = { keep: { x: 1 } };
    const override: ConfigTree = { list: ['a'], nested: { y: 2 } };

    const merged = deepMerge(base, override);

    expect(merged).toEqual({ keep: { x: 1 }, list: ['a'], nested: { y: 2 } });
    expect(merged['keep']).not.toBe(base['keep']);
    expect(merged['list']).not.toBe(override['list']);
    expect(merged['nested']).not.toBe(override['nested']);
  });

  it('should merge a __proto__ key as a plain key', () => {
    const override: ConfigTree = {};
    setEntry(override, '__proto__', { polluted: true });

    const merged = deepMerge({ a: 1 }, override);

    expect(Object.keys(merged)).toEqual(['a', '__proto__']);
    expect(Object.getPrototypeOf(merged)).toBe(Object.prototype);
    expect(lookup(merged, '__proto__.polluted')).toBe(true);
  });
});

describe('mergeSources', () => {
  it('should merge sources in order with later sources winning', () => {
    const sources: ConfigSource[] = [
      { kind: 'legacy', path: '/p/wpmoo-config.yml', tree: { project: { name: 'Foo', slug: 'foo' } } },
      { kind: 'primary', path: '/p/wpmoo-config/wpmoo-settings.yml', tree: { project: { name: 'Bar' } } },
      { kind: 'alternate', path: '/p/config/deploy.yml', tree: { deploy: { zip: true } } },
    ];

    expect(mergeSources(sources)).toEqual({
      project: { name: 'Bar', slug: 'foo' },
      deploy: { zip: true },
    });
  });

  it('should return an empty tree for no sources', () => {
    expect(mergeSources([])).toEqual({});
  });
});

describe('lookup', () => {
  const tree: ConfigTree = {
    project: { name: 'Foo', tags: ['a', 'b'], empty: null },
    version: '1.0.0',
  };

  it('should resolve dotted paths', () => {
    expect(lookup(tree, 'project.name')).toBe('Foo');
    expect(lookup(tree, 'version')).toBe('1.0.0');
  });

  it('should return subtrees', () => {
    expect(lookup(tree, 'project')).toEqual({ name: 'Foo', tags: ['a', 'b'], empty: null });
  });

  it('should index lists with numeric segments', () => {
    expect(lookup(tree, 'project.tags.1')).toBe('b');
    expect(lookup(tree, 'project.tags.first')).toBeUndefined();
  });

  it('should treat missing keys, null values and scalars on the way as absent', () => {
    expect(lookup(tree, 'project.missing')).toBeUndefined();
    expect(lookup(tree, 'project.empty')).toBeUndefined();
    expect(lookup(tree, 'version.major')).toBeUndefined();
  });

  it('should be case-sensitive', () => {
    expect(lookup(tree, 'Project.name')).toBeUndefined();
  });
});

describe('createMergeSummary', () => {
  it('should list sources in order and mark ignored ones', () => {
    const summary = createMergeSummary('/p', [
      { kind: 'legacy', path: '/p/wpmoo-config.yml', tree: {} },
      { kind: 'primary', path: '/p/wpmoo-config/deploy.yml', tree: {}, error: 'bad indent' },
    ]);

    expect(summary).toBe(
      [
        'Configuration root: /p',
        'Sources (in priority order):',
        '  legacy - /p/wpmoo-config.yml',
        '  primary - /p/wpmoo-config/deploy.yml [ignored: bad indent]',
      ].join('\n')
    );
  });

  it('should report a missing root', () => {
    expect(createMergeSummary(null, [])).toBe('No configuration root found');
  });
});
