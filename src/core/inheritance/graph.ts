import { inheritsFrom } from '../names.js';
import type { Profile } from '../types.js';

export function directChildren(profiles: Profile[], parentName: string): Profile[] {
  return profiles.filter(p => inheritsFrom(p, parentName));
}

/**
 * All profiles that inherit, directly or transitively, from any seed name.
 * Breadth-first; each profile appears once, in order of discovery, and
 * circular references terminate.
 */
export function findDescendants(profiles: Profile[], seedNames: string[]): Profile[] {
  const descendants: Profile[] = [];
  const found = new Set<string>();
  const visited = new Set<string>();
  const queue = [...seedNames];

  while (queue.length > 0) {
    const parentName = queue.shift();
    if (parentName === undefined || visited.has(parentName)) continue;
    visited.add(parentName);

    for (const child of directChildren(profiles, parentName)) {
      if (found.has(child.name)) continue;
      found.add(child.name);
      descendants.push(child);
      queue.push(child.name);
    }
  }

  return descendants;
}

/**
 * The profile `profile` inherits from: the first match in corpus order,
 * never the profile itself.
 */
export function findParent(profile: Profile, profiles: Profile[]): Profile | undefined {
  if (!profile.properties.inherits) return undefined;
  return profiles.find(p => p !== profile && inheritsFrom(profile, p.name));
}

/** Parent, grandparent, ... up to the root. Empty when no parent resolves. */
export function ancestorChain(profile: Profile, profiles: Profile[]): Profile[] {
  const chain: Profile[] = [];
  const visited = new Set<Profile>([profile]);

  let current = findParent(profile, profiles);
  while (current && !visited.has(current)) {
    visited.add(current);
    chain.push(current);
    current = findParent(current, profiles);
  }

  return chain;
}
