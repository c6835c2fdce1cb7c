export { inheritedClosure, cleanProfile, removedKeys } from './resolver.js';
export { cleanProfileDir, cleanBundleFile, MIN_HOISTED_PROPERTIES } from './engine.js';
export type { CleanDirOptions, CleanBundleOptions } from './engine.js';
