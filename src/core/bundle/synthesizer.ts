import { existsSync, mkdirSync, unlinkSync } from 'node:fs';
import { basename, join } from 'node:path';
import { loadCorpus, groupByFile } from '../corpus.js';
import { classifyProfiles, referencesProfile } from '../inheritance/classifier.js';
import { commonProperties, sharedInherits } from '../inheritance/common.js';
import { displayName, findUnsafeFilenameChars, isPrivatized, privatizeName, qualifyName } from '../names.js';
import { parseProfileFile, sortProperties, writeError, writeProfileFile } from '../parser/ini.js';
import { mergeVendorInfo, readBundleFile, writeBundleFile } from '../parser/vendor.js';
import type { BundleResult, Diagnostic, Profile, ProfileProperties, ProfileType, VendorInfo } from '../types.js';

export interface BundleOptions {
  /** Profiles picked by the caller's filter, all of `type`. */
  selection: Profile[];
  bundleName: string;
  type: ProfileType;
  /** Directory holding every profile of `type`; references are rewritten across all of it. */
  profileDir: string;
  bundleDir: string;
  vendor: VendorInfo;
}

/**
 * Move the internal profiles of a selection into a vendor bundle.
 *
 * Internal profiles (those another selected profile inherits from) are
 * privatized as `*Name*`, stripped of the properties they share, and made to
 * inherit from a synthetic `*<bundle>*` parent holding those properties.
 * Every reference to them in the profile directory is repointed, and they are
 * removed from their original files. Leaves stay where they are.
 *
 * When the bundle already has that parent it is left as it is, and moved
 * profiles only drop the shared values the parent already holds.
 *
 * Re-running with the same selection is safe: profiles already present in
 * the bundle by qualified name are not added twice. Nothing is rolled back if
 * a later step fails.
 */
export function bundleProfiles(options: BundleOptions): BundleResult {
  const { selection, bundleName, type, profileDir, bundleDir } = options;

  assertBundleName(bundleName);
  if (selection.length === 0) {
    throw new Error('No profiles selected to bundle');
  }

  if (!existsSync(bundleDir)) {
    mkdirSync(bundleDir, { recursive: true });
  }
  const bundleFile = join(bundleDir, `${bundleName}.ini`);

  const corpus = loadCorpus(profileDir, type);
  const diagnostics: Diagnostic[] = [...corpus.diagnostics];

  const { leaves, internal } = classifyProfiles(selection);
  if (internal.length === 0) {
    return {
      status: 'nothing-to-bundle',
      bundleFile,
      leaves: leaves.map(p => p.name),
      diagnostics,
    };
  }

  const { document, diagnostics: bundleDiagnostics } = readBundleFile(bundleFile);
  diagnostics.push(...bundleDiagnostics);
  const existingNames = new Set(document.profiles.map(p => p.name));

  const renamed = privatizationMap(internal);
  const common = commonProperties(internal);
  const shared = sharedInherits(internal);

  const parentDisplay = privatizeName(bundleName);
  const parentName = qualifyName(type, parentDisplay);
  const additions: Profile[] = [];

  const existingParent = document.profiles.find(p => p.name === parentName);
  const parentCreated = existingParent === undefined;
  const hoisted = existingParent ? heldByParent(common, existingParent) : common;
  if (parentCreated) {
    const properties = { ...common };
    if (shared.agreed && shared.value !== undefined) {
      properties.inherits = shared.value;
    }
    additions.push({
      filePath: bundleFile,
      type,
      name: parentName,
      properties: sortProperties(properties),
      comments: [],
      lines: [],
    });
  }

  const moved: string[] = [];
  const skipped: string[] = [];

  for (const profile of internal) {
    const display = displayName(profile);
    const name = qualifyName(type, renamed[display] ?? display);

    if (existingNames.has(name) || additions.some(p => p.name === name)) {
      skipped.push(name);
      continue;
    }

    const properties = { ...profile.properties };
    for (const key of Object.keys(hoisted)) {
      delete properties[key];
    }
    properties.inherits = parentDisplay;

    additions.push({
      ...profile,
      filePath: bundleFile,
      name,
      properties: sortProperties(properties),
    });
    moved.push(profile.name);
  }

  writeBundleFile(
    bundleFile,
    [...document.profiles, ...additions],
    bundleName,
    mergeVendorInfo(document.vendor, options.vendor),
  );

  const filesUpdated = rewriteReferences(corpus.files, type, renamed, diagnostics);
  const filesDeleted = removeRelocated(internal, type, diagnostics);

  return {
    status: 'bundled',
    bundleFile,
    parentName,
    parentCreated,
    commonPropertyCount: Object.keys(hoisted).length,
    renamed,
    moved,
    skipped,
    leaves: leaves.map(p => p.name),
    filesUpdated,
    filesDeleted,
    diagnostics,
  };
}

/**
 * Common properties an existing bundle parent already sets to the same value.
 * Only these may be dropped from profiles moved under a parent that is reused.
 */
export function heldByParent(common: ProfileProperties, parent: Profile): ProfileProperties {
  const held: ProfileProperties = {};
  for (const [key, value] of Object.entries(common)) {
    if (Object.hasOwn(parent.properties, key) && parent.properties[key] === value) {
      held[key] = value;
    }
  }
  return held;
}

export function assertBundleName(bundleName: string): void {
  if (!bundleName.trim()) {
    throw new Error('A bundle name is required');
  }
  const unsafe = findUnsafeFilenameChars(bundleName);
  if (unsafe.length > 0) {
    throw new Error(`Bundle name contains unsafe characters: ${unsafe.join(' ')}`);
  }
}

/** Display name to privatized display name; already privatized names are left out. */
export function privatizationMap(profiles: Profile[]): Record<string, string> {
  const renamed: Record<string, string> = {};
  for (const profile of profiles) {
    const display = displayName(profile);
    if (!isPrivatized(display)) {
      renamed[display] = privatizeName(display);
    }
  }
  return renamed;
}

/**
 * Repoint every `inherits` that names a renamed profile, by exact or core
 * name, in every file of the profile directory. Returns the files written.
 */
export function rewriteReferences(
  files: string[],
  type: ProfileType,
  renamed: Record<string, string>,
  diagnostics: Diagnostic[],
): string[] {
  const written: string[] = [];
  const entries = Object.entries(renamed);
  if (entries.length === 0) return written;

  for (const file of files) {
    if (!existsSync(file)) continue;

    const parsed = parseProfileFile(file, type);
    diagnostics.push(...parsed.diagnostics);

    let changed = false;
    for (const profile of parsed.profiles) {
      const inherits = profile.properties.inherits;
      const match = entries.find(([original]) => referencesProfile(inherits, original));
      if (!match || inherits === match[1]) continue;

      profile.properties.inherits = match[1];
      changed = true;
      diagnostics.push({
        severity: 'info',
        message: `${profile.name} inherits: ${inherits} -> ${match[1]}`,
        file,
        profile: profile.name,
      });
    }

    if (!changed) continue;

    try {
      writeProfileFile(file, parsed.profiles);
      written.push(file);
    } catch (err) {
      diagnostics.push(writeError(file, err));
    }
  }

  return written;
}

/**
 * Remove relocated profiles from the files they came from. A file left
 * without profiles is deleted. Returns the deleted files.
 */
export function removeRelocated(relocated: Profile[], type: ProfileType, diagnostics: Diagnostic[]): string[] {
  const deleted: string[] = [];

  for (const [file, profiles] of groupByFile(relocated)) {
    if (!existsSync(file)) {
      diagnostics.push({ severity: 'info', message: `${basename(file)} no longer exists`, file });
      continue;
    }

    const names = new Set(profiles.map(p => p.name));
    const parsed = parseProfileFile(file, type);
    diagnostics.push(...parsed.diagnostics);

    const remaining = parsed.profiles.filter(p => !names.has(p.name));
    if (remaining.length === parsed.profiles.length) continue;

    try {
      if (remaining.length === 0) {
        unlinkSync(file);
        deleted.push(file);
      } else {
        writeProfileFile(file, remaining);
      }
    } catch (err) {
      diagnostics.push(writeError(file, err));
    }
  }

  return deleted;
}
