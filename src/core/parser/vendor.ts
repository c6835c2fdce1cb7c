import { readFileSync, writeFileSync } from 'node:fs';
import {
  cleanLine, defaultProfileName, ensureDir, formatProperties, readError, retainedComments, scanStanzas,
} from './ini.js';
import { displayName } from '../names.js';
import { STANZA_TYPES } from '../types.js';
import type { Diagnostic, Profile, VendorInfo } from '../types.js';

const VENDOR_HEADER_RE = /^\[vendor\]$/;
const ANY_HEADER_RE = /^\[.*\]$/;
const PROPERTY_RE = /^(\w+)\s*=\s*(.*)$/;

export interface BundleDocument {
  filePath: string;
  /** Profiles of every stanza type, in file order. */
  profiles: Profile[];
  /** Metadata of an existing `[vendor]` stanza, if the file has one. */
  vendor?: Partial<VendorInfo> & { name?: string };
}

export function parseBundleText(text: string, filePath: string): BundleDocument {
  const profiles = scanStanzas(text, {
    types: STANZA_TYPES,
    filePath,
    defaultType: 'print',
    defaultName: defaultProfileName(filePath),
    emptyDefault: false,
  });

  return { filePath, profiles, vendor: parseVendorStanza(text) };
}

/**
 * Read a bundle file. A missing file is an empty bundle; an unreadable one
 * is reported and treated as empty.
 */
export function readBundleFile(filePath: string): { document: BundleDocument; diagnostics: Diagnostic[] } {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    return {
      document: { filePath, profiles: [] },
      diagnostics: missing ? [] : [readError(filePath, err)],
    };
  }

  return { document: parseBundleText(text, filePath), diagnostics: [] };
}

export function parseVendorStanza(text: string): BundleDocument['vendor'] {
  let inVendor = false;
  let found = false;
  const values: Record<string, string> = {};

  for (const line of text.split('\n')) {
    const clean = cleanLine(line);
    if (VENDOR_HEADER_RE.test(clean)) {
      inVendor = true;
      found = true;
      continue;
    }
    if (ANY_HEADER_RE.test(clean)) {
      inVendor = false;
      continue;
    }
    const match = inVendor ? clean.match(PROPERTY_RE) : null;
    if (match) values[match[1]] = match[2].trim();
  }

  if (!found) return undefined;

  return {
    repoId: values.repo_id,
    configVersion: values.config_version,
    name: values.name,
  };
}

export function serializeVendorStanza(bundleName: string, vendor: VendorInfo): string[] {
  return [
    '[vendor]',
    `repo_id = ${vendor.repoId}`,
    '# Vendor name will be shown by the Config Wizard.',
    `name = ${bundleName}`,
    '# Configuration version of this file. Config file will only be installed, if the config_version differs.',
    '# This means, the server may force the PrusaSlicer configuration to be downgraded.',
    `config_version = ${vendor.configVersion}`,
    '',
  ];
}

/** Bundle headers never have a space after the colon. */
export function formatBundleHeader(profile: Pick<Profile, 'type' | 'name'>): string {
  return `[${profile.type}:${displayName(profile)}]`;
}

/** Bundle text: the `[vendor]` stanza, then every profile with its header. */
export function serializeBundleFile(profiles: Profile[], bundleName: string, vendor: VendorInfo): string {
  const out = serializeVendorStanza(bundleName, vendor);

  for (const profile of profiles) {
    out.push(formatBundleHeader(profile), ...retainedComments(profile), ...formatProperties(profile.properties));
    out.push('');
  }

  return out.join('\n') + '\n';
}

export function writeBundleFile(filePath: string, profiles: Profile[], bundleName: string, vendor: VendorInfo): void {
  ensureDir(filePath);
  writeFileSync(filePath, serializeBundleFile(profiles, bundleName, vendor), 'utf-8');
}

/** Vendor metadata to write: what the file already declares wins over configuration. */
export function mergeVendorInfo(existing: BundleDocument['vendor'], fallback: VendorInfo): VendorInfo {
  return {
    repoId: existing?.repoId || fallback.repoId,
    configVersion: existing?.configVersion || fallback.configVersion,
  };
}
