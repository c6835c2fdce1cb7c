import { normalizeProfileName } from './names.js';
import type { Profile, ProfileFilter } from './types.js';

const NOZZLE_RE = /nozzle_diameter\[0\]==(\d*\.?\d+)/;
const BARE_NUMBER_RE = /^\d*\.?\d+$/;

export interface PrintFilterValues {
  tags: string[];
  layer?: string;
  nozzle?: string;
}

export interface FilamentFilterValues {
  filamentType?: string;
  vendor?: string;
}

export function printFilterValues(profile: Pick<Profile, 'name' | 'properties'>): PrintFilterValues {
  const fromProperty = (profile.properties.land_fm_tags ?? '')
    .split(',')
    .map(tag => tag.trim().toLowerCase())
    .filter(Boolean);
  const fromName = normalizeProfileName(profile.name).tags.map(tag => tag.toLowerCase());

  const nozzle = profile.properties.compatible_printers_condition?.match(NOZZLE_RE);

  return {
    tags: [...new Set([...fromProperty, ...fromName])],
    layer: profile.properties.layer_height?.trim().toLowerCase(),
    nozzle: nozzle ? `${nozzle[1]}mm` : undefined,
  };
}

export function filamentFilterValues(profile: Pick<Profile, 'properties'>): FilamentFilterValues {
  return {
    filamentType: profile.properties.filament_type?.trim().toLowerCase(),
    vendor: profile.properties.filament_vendor?.trim().toLowerCase(),
  };
}

export function filterValues(
  profile: Pick<Profile, 'name' | 'properties'>,
  type: ProfileFilter['type'],
): PrintFilterValues | FilamentFilterValues {
  return type === 'print' ? printFilterValues(profile) : filamentFilterValues(profile);
}

/**
 * Lengths compare as lower-case text with `mm` appended to bare numbers, so
 * `0.2`, `0.2mm` and ` 0.2MM ` are equal. `0.20` and `0.2` are not.
 */
export function normalizeLength(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim().toLowerCase();
  if (!trimmed) return undefined;
  return BARE_NUMBER_RE.test(trimmed) ? `${trimmed}mm` : trimmed;
}

/** Every criterion the filter sets must match; an empty filter matches everything. */
export function matchesFilter(profile: Pick<Profile, 'name' | 'properties'>, filter: ProfileFilter): boolean {
  if (filter.type === 'filament') {
    const values = filamentFilterValues(profile);
    if (filter.filamentType && values.filamentType !== filter.filamentType.trim().toLowerCase()) return false;
    if (filter.vendor && values.vendor !== filter.vendor.trim().toLowerCase()) return false;
    return true;
  }

  const values = printFilterValues(profile);
  if (filter.tag && !values.tags.includes(filter.tag.trim().toLowerCase())) return false;
  if (filter.layerHeight && normalizeLength(values.layer) !== normalizeLength(filter.layerHeight)) return false;
  if (filter.nozzle && normalizeLength(values.nozzle) !== normalizeLength(filter.nozzle)) return false;
  return true;
}

export function selectProfiles<T extends Pick<Profile, 'name' | 'properties'>>(profiles: T[], filter: ProfileFilter): T[] {
  return profiles.filter(p => matchesFilter(p, filter));
}

export function isEmptyFilter(filter: ProfileFilter): boolean {
  return filter.type === 'print'
    ? !filter.tag && !filter.layerHeight && !filter.nozzle
    : !filter.filamentType && !filter.vendor;
}
