export { bundleProfiles, assertBundleName, heldByParent, privatizationMap, rewriteReferences, removeRelocated } from './synthesizer.js';
export type { BundleOptions } from './synthesizer.js';
export { combineProfiles } from './combine.js';
export type { CombineOptions } from './combine.js';
