/**
 * Header detection and parsing for plugin and theme main files
 */

import type { ProjectHeaders } from './types.js';

const FRAMEWORK_MENTION = /wpmoo/i;
const PROJECT_HEADER = /^[ \t/*#@]*(?:Plugin|Theme) Name:/im;

/**
 * Header labels as they appear in the file, mapped to their field
 */
export const PROJECT_HEADER_FIELDS: ReadonlyArray<[label: string, field: keyof ProjectHeaders]> = [
  ['Plugin Name', 'pluginName'],
  ['Theme Name', 'themeName'],
  ['Description', 'description'],
  ['Version', 'version'],
  ['Author', 'author'],
  ['Text Domain', 'textDomain'],
  ['Requires at least', 'requiresWordPress'],
  ['Requires PHP', 'requiresPhp'],
  ['License', 'license'],
];

/** Only the top of a file is searched for headers */
const HEADER_SCAN_BYTES = 8192;

/**
 * Whether content looks like the main file of a framework-based plugin or theme:
 * it mentions the framework and carries a Plugin Name or Theme Name header.
 */
export function isProjectMainFile(content: string): boolean {
  return FRAMEWORK_MENTION.test(content) && PROJECT_HEADER.test(content);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Strip the comment closer and surrounding space from a header value
 */
function cleanHeaderValue(value: string): string {
  return value.replace(/\s*(?:\*\/|\?>).*$/, '').trim();
}

/**
 * Read header fields from the start of a file
 */
export function parseHeaders(content: string): ProjectHeaders {
  const head = content.slice(0, HEADER_SCAN_BYTES).replace(/\r\n?/g, '\n');
  const headers: ProjectHeaders = {};

  for (const [label, field] of PROJECT_HEADER_FIELDS) {
    const pattern = new RegExp(`^[ \\t/*#@]*${escapeRegExp(label)}:(.*)$`, 'im');
    const match = pattern.exec(head);
    if (!match) continue;

    const value = cleanHeaderValue(match[1] ?? '');
    if (value) {
      headers[field] = value;
    }
  }

  return headers;
}
