/**
 * Project Module Exports
 */

export { classify } from './classifier.js';
export { classifyManifest, findManifest, readManifest } from './manifest.js';
export { scanForMainFile } from './content-scan.js';
export { identifyProject, readProjectHeaders } from './identifier.js';
export { isProjectMainFile, parseHeaders, PROJECT_HEADER_FIELDS } from './headers.js';
export type { ContextLabel, ProjectInfo, ProjectHeaders } from './types.js';
export { CONTEXT_LABELS, MANIFEST_FILES } from './types.js';
