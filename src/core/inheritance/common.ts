import { sortProperties } from '../parser/ini.js';
import type { Profile, ProfileProperties } from '../types.js';

/**
 * Keys that describe one specific profile (printer conditions, vendor and
 * model identifiers, the inheritance pointer) and are never moved into a
 * synthesized parent.
 */
export const NEVER_HOIST_KEYS: readonly string[] = [
  'compatible_printers_condition',
  'compatible_printers',
  'filament_vendor',
  'printer_model',
  'nozzle_diameter',
  'inherits',
];

export function commonProperties(profiles: Pick<Profile, 'properties'>[]): ProfileProperties {
  if (profiles.length === 0) return {};

  const [first, ...rest] = profiles;
  const common: ProfileProperties = {};

  for (const [key, value] of Object.entries(first.properties)) {
    if (NEVER_HOIST_KEYS.includes(key)) continue;
    if (rest.every(p => Object.hasOwn(p.properties, key) && p.properties[key] === value)) {
      common[key] = value;
    }
  }

  return sortProperties(common);
}

/**
 * The `inherits` value shared by every profile, when they all agree.
 * `agreed` is false when at least two profiles disagree; `value` is
 * undefined when they agree on having no parent.
 */
export function sharedInherits(profiles: Pick<Profile, 'properties'>[]): { agreed: boolean; value?: string } {
  const values = new Set(profiles.map(p => p.properties.inherits));
  if (values.size !== 1) return { agreed: false };

  const [value] = values;
  return { agreed: true, value };
}
