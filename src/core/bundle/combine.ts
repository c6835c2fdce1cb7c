import { existsSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { groupByFile } from '../corpus.js';
import { commonProperties, sharedInherits } from '../inheritance/common.js';
import { filenameFor, findUnsafeFilenameChars, qualifyName } from '../names.js';
import { formatProperties, parseProfileFile, sortProperties, writeError, writeProfileFile } from '../parser/ini.js';
import type { CombineResult, Diagnostic, Profile, ProfileType } from '../types.js';

export interface CombineOptions {
  selection: Profile[];
  parentName: string;
  type: ProfileType;
}

/**
 * Factor the properties shared by a selection into a new parent profile.
 *
 * The parent is a header-less file next to the first selected profile; its
 * file name is its profile name. Selected profiles drop the shared keys and
 * inherit the parent. Profiles that inherit from the selection are not
 * touched.
 */
export function combineProfiles(options: CombineOptions): CombineResult {
  const { selection, parentName, type } = options;

  if (!parentName.trim()) {
    throw new Error('A parent profile name is required');
  }
  const unsafe = findUnsafeFilenameChars(parentName);
  if (unsafe.length > 0) {
    throw new Error(`Parent name contains unsafe characters: ${unsafe.join(' ')}`);
  }
  if (selection.length === 0) {
    throw new Error('No profiles selected to combine');
  }

  const filename = filenameFor(parentName);
  const parentFile = join(dirname(selection[0].filePath), `${filename}.ini`);
  if (selection.some(p => p.filePath === parentFile)) {
    throw new Error(`${filename}.ini already holds a selected profile`);
  }

  const common = commonProperties(selection);
  const shared = sharedInherits(selection);
  const inherits = shared.agreed ? shared.value : undefined;
  const diagnostics: Diagnostic[] = [];

  if (existsSync(parentFile)) {
    diagnostics.push({ severity: 'warning', message: `Replacing existing ${filename}.ini`, file: parentFile });
  }

  const lines = [
    ...(inherits !== undefined ? [`inherits = ${inherits}`] : []),
    ...formatProperties(common),
  ];
  writeFileSync(parentFile, lines.map(line => `${line}\n`).join(''), 'utf-8');

  const selected = new Set(selection.map(p => p.name));
  const filesUpdated: string[] = [];

  for (const file of groupByFile(selection).keys()) {
    const parsed = parseProfileFile(file, type);
    diagnostics.push(...parsed.diagnostics);
    if (parsed.profiles.length === 0) continue;

    const rewritten = parsed.profiles.map(profile => {
      if (!selected.has(profile.name)) return profile;

      const properties = { ...profile.properties };
      for (const key of Object.keys(common)) {
        delete properties[key];
      }
      properties.inherits = filename;
      return { ...profile, properties: sortProperties(properties) };
    });

    try {
      writeProfileFile(file, rewritten);
      filesUpdated.push(file);
    } catch (err) {
      diagnostics.push(writeError(file, err));
    }
  }

  return {
    parentFile,
    parentName: qualifyName(type, filename),
    inherits,
    commonProperties: common,
    filesUpdated,
    diagnostics,
  };
}
