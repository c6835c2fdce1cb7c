import { coreName, displayName, stripTypePrefix } from '../names.js';
import type { Profile } from '../types.js';

export interface Classification {
  /** Profiles no other selected profile inherits from. They stay where they are. */
  leaves: Profile[];
  /** Profiles with at least one child inside the selection. */
  internal: Profile[];
}

/**
 * Does an `inherits` value point at the profile with this display name?
 * Matches on the prefix-stripped name or on the core name, so a child may
 * leave out the tags of a tagged parent.
 */
export function referencesProfile(inheritsValue: string | undefined, parentDisplay: string): boolean {
  if (!inheritsValue) return false;

  const inheritsBare = stripTypePrefix(inheritsValue);
  if (inheritsBare === parentDisplay) return true;

  return coreName(inheritsBare) === coreName(parentDisplay);
}

export function classifyProfiles(selection: Profile[]): Classification {
  const leaves: Profile[] = [];
  const internal: Profile[] = [];

  for (const candidate of selection) {
    const display = displayName(candidate);
    const hasChild = selection.some(other =>
      other !== candidate && referencesProfile(other.properties.inherits, display)
    );

    if (hasChild) {
      internal.push(candidate);
    } else {
      leaves.push(candidate);
    }
  }

  return { leaves, internal };
}
