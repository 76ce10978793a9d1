/**
 * Project Types - Context labels and project information
 */

/**
 * Kind of project moo is running inside
 */
export type ContextLabel = 'cli-tool' | 'framework' | 'plugin' | 'theme' | 'unknown';

export const CONTEXT_LABELS: readonly ContextLabel[] = [
  'cli-tool',
  'framework',
  'plugin',
  'theme',
  'unknown',
];

/**
 * Manifest file names, checked in this order inside each directory
 */
export const MANIFEST_FILES = ['composer.json', 'manifest.json'] as const;

export const CLI_PACKAGE_NAME = 'wpmoo/wpmoo-cli';
export const FRAMEWORK_PACKAGE_NAME = 'wpmoo/wpmoo';

export const FRAMEWORK_MAIN_FILE = 'wpmoo.php';
export const FRAMEWORK_HEADER = 'Plugin Name: WPMoo Framework';
export const README_FILE = 'readme.txt';

/**
 * Result of identifying a project's main files
 */
export interface ProjectInfo {
  found: boolean;
  type: 'framework' | 'plugin' | 'unknown';
  /** File carrying the project header */
  mainFile: string | null;
  readmeFile: string | null;
}

/**
 * Header fields read from a plugin or theme main file
 */
export interface ProjectHeaders {
  pluginName?: string;
  themeName?: string;
  description?: string;
  version?: string;
  author?: string;
  textDomain?: string;
  requiresWordPress?: string;
  requiresPhp?: string;
  license?: string;
}
