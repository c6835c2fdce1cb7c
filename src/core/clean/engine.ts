import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { groupByFile, listProfileFiles, loadBundleProfiles, loadCorpus } from '../corpus.js';
import { commonProperties, sharedInherits } from '../inheritance/common.js';
import { inheritsFrom, privatizeName, qualifyName } from '../names.js';
import { parseProfileFile, sortProperties, writeError, writeProfileFile } from '../parser/ini.js';
import { mergeVendorInfo, readBundleFile, writeBundleFile } from '../parser/vendor.js';
import { STANZA_TYPES } from '../types.js';
import type {
  BundleCleanResult, CleanResult, Diagnostic, Profile, ProfileChange, ProfileProperties, ProfileType,
  StanzaType, VendorInfo,
} from '../types.js';
import { cleanProfile, removedKeys } from './resolver.js';

/** A bundle parent is only synthesized when at least this many properties are shared. */
export const MIN_HOISTED_PROPERTIES = 3;

export interface CleanDirOptions {
  type: ProfileType;
  profileDir: string;
  /** Bundles consulted for inheritance; never written. */
  vendorDir?: string;
}

/** Drop every property a profile already inherits with the same value. */
export function cleanProfileDir(options: CleanDirOptions): CleanResult {
  const { type, profileDir, vendorDir } = options;

  if (!existsSync(profileDir)) {
    throw new Error(`Directory '${profileDir}' does not exist`);
  }

  const target = loadCorpus(profileDir, type);
  const vendor = loadBundleProfiles(vendorDir ? listProfileFiles(vendorDir) : [], type);
  const corpus = [...target.profiles, ...vendor.profiles];

  const result: CleanResult = {
    type,
    profileDir,
    filesProcessed: 0,
    filesChanged: [],
    propertiesRemoved: 0,
    changes: [],
    diagnostics: [...target.diagnostics, ...vendor.diagnostics],
  };

  for (const [file, profiles] of groupByFile(target.profiles)) {
    result.filesProcessed++;

    const changes: ProfileChange[] = [];
    const cleaned = profiles.map(profile => {
      const properties = cleanProfile(profile, corpus);
      const removed = removedKeys(profile.properties, properties);
      if (removed.length > 0) {
        changes.push({ profile: profile.name, file, removed });
      }
      return { ...profile, properties };
    });

    if (changes.length === 0) continue;

    try {
      writeProfileFile(file, cleaned);
      result.filesChanged.push(file);
      result.changes.push(...changes);
      result.propertiesRemoved += changes.reduce((sum, c) => sum + c.removed.length, 0);
    } catch (err) {
      result.diagnostics.push(writeError(file, err));
    }
  }

  return result;
}

export interface CleanBundleOptions {
  bundleName: string;
  bundleDir: string;
  /** Profile directory per type, scanned for external parents and children. */
  profileDirs: Partial<Record<StanzaType, string>>;
  vendor: VendorInfo;
}

/**
 * Restructure a bundle around a synthetic `*<bundle>*` parent per stanza
 * type and clean the profiles that inherit from it.
 *
 * For each type with two or more profiles: when at least
 * `MIN_HOISTED_PROPERTIES` values are shared they move into the parent,
 * otherwise each profile is only cleaned against its ancestors. A second
 * pass moves whatever the parent's children still share. Finally, profiles
 * in the profile directories that inherit from the bundle are cleaned.
 */
export function cleanBundleFile(options: CleanBundleOptions): BundleCleanResult {
  const { bundleName, bundleDir, profileDirs } = options;
  const bundleFile = join(bundleDir, `${bundleName}.ini`);

  if (!existsSync(bundleFile)) {
    throw new Error(`Bundle file not found: ${bundleName}.ini`);
  }

  const { document, diagnostics: readDiagnostics } = readBundleFile(bundleFile);
  const diagnostics: Diagnostic[] = [...readDiagnostics];

  let types = STANZA_TYPES.filter(t => document.profiles.some(p => p.type === t));
  if (types.length === 0) {
    types = ['print'];
    diagnostics.push({
      severity: 'warning',
      message: `Could not determine profile types of ${bundleName}.ini, assuming print profiles`,
      file: bundleFile,
    });
  }

  const otherBundles = listProfileFiles(bundleDir).filter(f => f !== bundleFile);
  const external = new Map<StanzaType, Profile[]>();
  for (const type of types) {
    const dir = profileDirs[type];
    const own = dir ? loadCorpus(dir, type) : undefined;
    const bundles = loadBundleProfiles(otherBundles, type);
    external.set(type, [...(own?.profiles ?? []), ...bundles.profiles]);
    diagnostics.push(...(own?.diagnostics ?? []), ...bundles.diagnostics);
  }

  const parentDisplay = privatizeName(bundleName);
  const result: BundleCleanResult = {
    bundleFile,
    types,
    changed: false,
    parentsCreated: [],
    propertiesRemoved: 0,
    profilesChanged: 0,
    hoisted: {},
    externalFilesChanged: [],
    diagnostics,
  };
  const changedProfiles = new Set<string>();

  const record = (profile: Profile, before: ProfileProperties) => {
    const removed = removedKeys(before, profile.properties).length;
    if (removed === 0) return;
    result.propertiesRemoved += removed;
    changedProfiles.add(profile.name);
  };

  const optimized: Profile[] = [];

  for (const type of types) {
    const group = document.profiles
      .filter(p => p.type === type)
      .map(p => ({ ...p, properties: { ...p.properties } }));

    if (group.length < 2) {
      optimized.push(...group);
      continue;
    }

    const common = commonProperties(group);

    if (Object.keys(common).length < MIN_HOISTED_PROPERTIES) {
      const corpus = [...group, ...(external.get(type) ?? [])];
      const cleaned = group.map(profile => {
        const properties = cleanProfile(profile, corpus);
        const next = { ...profile, properties };
        record(next, profile.properties);
        return next;
      });
      optimized.push(...cleaned);
      continue;
    }

    const shared = sharedInherits(group);
    const parentProperties: ProfileProperties = { ...common };
    if (shared.agreed && shared.value !== undefined) {
      parentProperties.inherits = shared.value;
    }

    const parentName = qualifyName(type, parentDisplay);
    let parent = group.find(p => p.name === parentName);
    if (parent) {
      parent.properties = sortProperties(parentProperties);
    } else {
      parent = {
        filePath: bundleFile,
        type,
        name: parentName,
        properties: sortProperties(parentProperties),
        comments: [],
        lines: [],
      };
      result.parentsCreated.push(parentName);
    }
    result.hoisted[type] = { ...common };

    optimized.push(parent);
    for (const child of group) {
      if (child === parent) continue;

      const before = child.properties;
      const properties = { ...before };
      for (const key of Object.keys(common)) {
        delete properties[key];
      }
      properties.inherits = parentDisplay;
      child.properties = sortProperties(properties);
      record(child, before);
      optimized.push(child);
    }
  }

  hoistSharedChildProperties(optimized, types, parentDisplay, result, record);

  result.changed = result.propertiesRemoved > 0 || result.parentsCreated.length > 0;

  cleanExternalChildren(document.profiles, optimized, types, profileDirs, external, result, changedProfiles);
  result.profilesChanged = changedProfiles.size;

  if (result.changed) {
    try {
      writeBundleFile(bundleFile, optimized, bundleName, mergeVendorInfo(document.vendor, options.vendor));
    } catch (err) {
      diagnostics.push(writeError(bundleFile, err));
    }
  }

  return result;
}

/** Second pass: move values every child of a bundle parent shares into the parent. */
function hoistSharedChildProperties(
  optimized: Profile[],
  types: StanzaType[],
  parentDisplay: string,
  result: BundleCleanResult,
  record: (profile: Profile, before: ProfileProperties) => void,
): void {
  for (const type of types) {
    const parentName = qualifyName(type, parentDisplay);
    const parent = optimized.find(p => p.name === parentName);
    if (!parent) continue;

    const children = optimized.filter(p =>
      p.type === type && p !== parent && p.properties.inherits === parentDisplay
    );
    if (children.length < 2) continue;

    const additional = commonProperties(children);
    if (Object.keys(additional).length === 0) continue;

    parent.properties = sortProperties({ ...parent.properties, ...additional });
    result.hoisted[type] = sortProperties({ ...result.hoisted[type], ...additional });

    for (const child of children) {
      const before = child.properties;
      const properties = { ...before };
      for (const key of Object.keys(additional)) {
        delete properties[key];
      }
      child.properties = properties;
      record(child, before);
    }
  }
}

/** Clean profile-directory profiles that inherit from any profile of the bundle. */
function cleanExternalChildren(
  bundled: Profile[],
  optimized: Profile[],
  types: StanzaType[],
  profileDirs: Partial<Record<StanzaType, string>>,
  external: Map<StanzaType, Profile[]>,
  result: BundleCleanResult,
  changedProfiles: Set<string>,
): void {
  const bundledNames = bundled.map(p => p.name);

  for (const type of types) {
    const dir = profileDirs[type];
    if (!dir) continue;

    const corpus = [...optimized.filter(p => p.type === type), ...(external.get(type) ?? [])];

    for (const file of listProfileFiles(dir)) {
      const parsed = parseProfileFile(file, type);
      result.diagnostics.push(...parsed.diagnostics);

      let removed = 0;
      const cleaned = parsed.profiles.map(profile => {
        if (!bundledNames.some(name => inheritsFrom(profile, name))) return profile;

        const properties = cleanProfile(profile, corpus);
        const count = removedKeys(profile.properties, properties).length;
        if (count === 0) return profile;

        removed += count;
        changedProfiles.add(profile.name);
        return { ...profile, properties };
      });

      if (removed === 0) continue;

      try {
        writeProfileFile(file, cleaned);
        result.externalFilesChanged.push(file);
        result.propertiesRemoved += removed;
      } catch (err) {
        result.diagnostics.push(writeError(file, err));
      }
    }
  }
}
