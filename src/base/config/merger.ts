/**
 * Configuration Merger - Merge trees from multiple sources
 *
 * Implements the merge strategy:
 * - Objects: Deep merge recursively
 * - Everything else (scalars, arrays, null): Higher priority replaces lower as a whole
 */

import type { ConfigSource, ConfigTree, ConfigValue } from './types.js';

/**
 * Check if a value is a plain mapping
 */
export function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a key as an own property, so keys such as `__proto__` stay plain data
 */
export function setEntry(tree: ConfigTree, key: string, value: ConfigValue): void {
  Object.defineProperty(tree, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Deep copy of a value; mappings are rebuilt with own keys
 */
export function cloneValue(value: ConfigValue): ConfigValue {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isConfigTree(value)) {
    return cloneTree(value);
  }
  return value;
}

export function cloneTree(tree: ConfigTree): ConfigTree {
  const copy: ConfigTree = {};
  for (const key of Object.keys(tree)) {
    setEntry(copy, key, cloneValue(tree[key]));
  }
  return copy;
}

/**
 * Deep merge two trees
 *
 * Neither input is modified and the result shares no objects with them.
 * Arrays are never concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result = cloneTree(base);

  for (const key of Object.keys(override)) {
    const baseValue = Object.prototype.hasOwnProperty.call(result, key) ? result[key] : undefined;
    const overrideValue = override[key];

    if (isConfigTree(baseValue) && isConfigTree(overrideValue)) {
      setEntry(result, key, deepMerge(baseValue, overrideValue));
    } else {
      setEntry(result, key, cloneValue(overrideValue));
    }
  }

  return result;
}

/**
 * Merge all configuration sources into a single tree
 *
 * Sources should be in priority order (lowest first).
 * Each source is merged on top of the previous result.
 */
export function mergeSources(sources: ConfigSource[]): ConfigTree {
  let merged: ConfigTree = {};

  for (const source of sources) {
    merged = deepMerge(merged, source.tree);
  }

  return merged;
}

/**
 * Walk a dotted key through a tree
 *
 * Numeric segments index into arrays. Null counts as absent.
 */
export function lookup(tree: ConfigTree, key: string): ConfigValue | undefined {
  let current: ConfigValue | undefined = tree;

  for (const segment of key.split('.')) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) return undefined;
      current = current[Number(segment)];
    } else if (isConfigTree(current)) {
      current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined;
    } else {
      return undefined;
    }

    if (current === undefined || current === null) {
      return undefined;
    }
  }

  return current;
}

/**
 * Create a debug summary of the merge process
 */
export function createMergeSummary(root: string | null, sources: ConfigSource[]): string {
  if (root === null) {
    return 'No configuration root found';
  }

  const lines: string[] = [`Configuration root: ${root}`, 'Sources (in priority order):'];

  if (sources.length === 0) {
    lines.push('  (none)');
  }

  for (const source of sources) {
    const marker = source.error ? ` [ignored: ${source.error}]` : '';
    lines.push(`  ${source.kind} - ${source.path}${marker}`);
  }

  return lines.join('\n');
}
