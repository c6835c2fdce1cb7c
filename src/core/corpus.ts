import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { parseProfileFile } from './parser/ini.js';
import { readBundleFile } from './parser/vendor.js';
import type { Diagnostic, Profile, StanzaType } from './types.js';

export interface Corpus {
  files: string[];
  profiles: Profile[];
  diagnostics: Diagnostic[];
}

/**
 * `.ini` files of a directory in lexicographic order. The order decides
 * which profile wins when two files declare the same name.
 */
export function listProfileFiles(dir: string): string[] {
  if (!existsSync(dir)) return [];

  return readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile() && entry.name.endsWith('.ini'))
    .map(entry => join(dir, entry.name))
    .sort();
}

export function loadProfileFiles(files: string[], type: StanzaType): Corpus {
  const profiles: Profile[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const file of files) {
    const result = parseProfileFile(file, type);
    profiles.push(...result.profiles);
    diagnostics.push(...result.diagnostics);
  }

  return { files, profiles, diagnostics };
}

/** Every profile of one type found in a profile directory. */
export function loadCorpus(dir: string, type: StanzaType): Corpus {
  return loadProfileFiles(listProfileFiles(dir), type);
}

/**
 * Profiles of one type held by bundle files. Bundles mix stanza types and
 * start with a `[vendor]` stanza, so they are read with the bundle reader.
 */
export function loadBundleProfiles(files: string[], type: StanzaType): Corpus {
  const profiles: Profile[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const file of files) {
    const { document, diagnostics: fileDiagnostics } = readBundleFile(file);
    profiles.push(...document.profiles.filter(p => p.type === type));
    diagnostics.push(...fileDiagnostics);
  }

  return { files, profiles, diagnostics };
}

export function mergeCorpora(...corpora: Corpus[]): Corpus {
  return {
    files: corpora.flatMap(c => c.files),
    profiles: corpora.flatMap(c => c.profiles),
    diagnostics: corpora.flatMap(c => c.diagnostics),
  };
}

/** Group profiles by owning file, keeping first-seen file order. */
export function groupByFile(profiles: Profile[]): Map<string, Profile[]> {
  const groups = new Map<string, Profile[]>();
  for (const profile of profiles) {
    const group = groups.get(profile.filePath);
    if (group) {
      group.push(profile);
    } else {
      groups.set(profile.filePath, [profile]);
    }
  }
  return groups;
}
