import { findParent } from '../inheritance/graph.js';
import { sortProperties } from '../parser/ini.js';
import type { Profile, ProfileProperties } from '../types.js';

/**
 * Effective properties a profile receives from its ancestors. Nearer
 * ancestors win; `inherits` itself is never inherited. A parent already on
 * the chain ends the walk.
 */
export function inheritedClosure(
  profile: Profile,
  corpus: Profile[],
  visited: Set<Profile> = new Set([profile]),
): ProfileProperties {
  const parent = findParent(profile, corpus);
  if (!parent || visited.has(parent)) return {};
  visited.add(parent);

  const inherited = inheritedClosure(parent, corpus, visited);
  for (const [key, value] of Object.entries(parent.properties)) {
    if (key === 'inherits') continue;
    inherited[key] = value;
  }

  return inherited;
}

/** Properties of `profile` minus those its ancestors already set to the same value. */
export function cleanProfile(profile: Profile, corpus: Profile[]): ProfileProperties {
  const inherited = inheritedClosure(profile, corpus);
  const cleaned: ProfileProperties = {};

  for (const [key, value] of Object.entries(profile.properties)) {
    if (key === 'inherits' || !Object.hasOwn(inherited, key) || inherited[key] !== value) {
      cleaned[key] = value;
    }
  }

  return sortProperties(cleaned);
}

export function removedKeys(before: ProfileProperties, after: ProfileProperties): string[] {
  return Object.keys(before).filter(key => !Object.hasOwn(after, key)).sort();
}
