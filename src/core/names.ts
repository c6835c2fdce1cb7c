import type { Profile, StanzaType } from './types.js';

const TYPE_PREFIX_RE = /^(print|filament):\s*/;
const TAG_RE = /@([^\s*]+)/g;
const UNSAFE_FILENAME_RE = /[<>:"|?*\\/\x00-\x1f\x7f]/g;

export interface NormalizedName {
  baseName: string;
  tags: string[];
}

export function stripTypePrefix(name: string): string {
  return name.replace(TYPE_PREFIX_RE, '');
}

export function qualifyName(type: StanzaType, displayName: string): string {
  return `${type}: ${displayName}`;
}

/**
 * Display name of a qualified profile name. Unlike `stripTypePrefix` this
 * understands every stanza type, including `printer_model`.
 */
export function displayName(profile: Pick<Profile, 'type' | 'name'>): string {
  const prefix = `${profile.type}:`;
  return profile.name.startsWith(prefix)
    ? profile.name.slice(prefix.length).trimStart()
    : profile.name;
}

/**
 * Split a profile name into its base name and `@tags`. Tags may appear
 * anywhere in the name; the base name keeps the remaining text with
 * whitespace collapsed.
 */
export function normalizeProfileName(name: string): NormalizedName {
  const withoutPrefix = stripTypePrefix(name);
  const tags = [...withoutPrefix.matchAll(TAG_RE)].map(m => m[1]);
  const baseName = withoutPrefix.replace(TAG_RE, '').trim().replace(/\s+/g, ' ');

  return { baseName, tags };
}

export function coreName(name: string): string {
  return normalizeProfileName(name).baseName;
}

export function coreNameEquals(a: string, b: string): boolean {
  return coreName(a) === coreName(b);
}

/**
 * Does `profile` inherit from `parentName`? Matching is graduated because
 * hand-edited files disagree on prefixes and whitespace: exact, trimmed,
 * prefix-stripped, then prefix-stripped and trimmed. Tags are significant.
 */
export function inheritsFrom(profile: Pick<Profile, 'properties'>, parentName: string): boolean {
  const inherits = profile.properties.inherits;
  if (!inherits) return false;

  if (inherits === parentName) return true;
  if (inherits.trim() === parentName.trim()) return true;

  const inheritsBare = stripTypePrefix(inherits);
  const parentBare = stripTypePrefix(parentName);
  if (inheritsBare === parentBare) return true;

  return inheritsBare.trim() === parentBare.trim();
}

export function isPrivatized(display: string): boolean {
  return display.length >= 2 && display.startsWith('*') && display.endsWith('*');
}

export function privatizeName(display: string): string {
  return isPrivatized(display) ? display : `*${display}*`;
}

export function sanitizeFilename(name: string): string {
  return name.replace(/[^\w\s@.\-()]+/g, '_').trim();
}

/** File name (without `.ini`) for a profile name, tags included. */
export function filenameFor(name: string): string {
  return sanitizeFilename(stripTypePrefix(name));
}

/** Characters that NTFS or macOS would reject, in order of first appearance. */
export function findUnsafeFilenameChars(name: string): string[] {
  return [...new Set(name.match(UNSAFE_FILENAME_RE) ?? [])];
}
