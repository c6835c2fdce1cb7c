export { directChildren, findDescendants, findParent, ancestorChain } from './graph.js';
export { commonProperties, sharedInherits, NEVER_HOIST_KEYS } from './common.js';
export { classifyProfiles, referencesProfile } from './classifier.js';
export type { Classification } from './classifier.js';
