/**
 * Skills System - Module exports
 */

export * from './types.js';
export { parseManifest, extractBodyReferences, declaredReferences } from './parser.js';
export type { ParseManifestOptions } from './parser.js';
export { ManifestLoader } from './loader.js';
export type { ManifestLoaderOptions } from './loader.js';
export { ReferenceResolver } from './references.js';
