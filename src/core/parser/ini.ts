import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { basename, dirname } from 'node:path';
import { displayName, qualifyName } from '../names.js';
import type { Diagnostic, ParseResult, Profile, ProfileProperties, StanzaType } from '../types.js';

const HEADER_RE = /^\[(.*)\]$/;
const PROPERTY_RE = /^(\w+)\s*=\s*(.*)$/;
const COMMENT_RE = /^\s*#/;

export function cleanLine(line: string): string {
  return line.split('#')[0].trim();
}

export function defaultProfileName(filePath: string): string {
  return basename(filePath, '.ini');
}

interface StanzaDraft {
  type: StanzaType;
  name: string;
  properties: ProfileProperties;
  comments: string[];
  lines: string[];
}

export interface ScanOptions {
  /** Stanza types recognised as profile headers; every other `[...]` stanza is skipped. */
  types: readonly StanzaType[];
  filePath: string;
  /** Type and name given to content found before the first header. */
  defaultType: StanzaType;
  defaultName: string;
  /** Emit an empty default profile when nothing at all was found. */
  emptyDefault: boolean;
}

/**
 * Scan stanza text into profiles. Lines are kept verbatim in `lines` so that
 * interleaved comments survive a rewrite; `#` starts a comment anywhere.
 */
export function scanStanzas(text: string, options: ScanOptions): Profile[] {
  const profiles: Profile[] = [];
  const lines = splitLines(text);

  let current: StanzaDraft | null = null;
  let prelude: StanzaDraft = draft(options.defaultType, options.defaultName);
  let skipping = false;

  const flush = (stanza: StanzaDraft) => {
    profiles.push({ filePath: options.filePath, ...stanza });
  };

  for (const line of lines) {
    const clean = cleanLine(line);

    const headerMatch = clean.match(HEADER_RE);
    if (headerMatch) {
      // A prelude without properties is not a profile; its comments move to the first stanza.
      let carried: StanzaDraft | null = null;
      if (current) {
        flush(current);
      } else if (Object.keys(prelude.properties).length > 0) {
        flush(prelude);
      } else {
        carried = prelude;
      }
      prelude = draft(options.defaultType, options.defaultName);

      const header = parseHeader(headerMatch[1], options.types);
      if (header) {
        current = draft(header.type, header.display);
        current.lines.push(line);
        if (carried) {
          current.lines.push(...carried.lines);
          current.comments.push(...carried.comments);
        }
        skipping = false;
      } else {
        current = null;
        skipping = true;
      }
      continue;
    }

    if (skipping) continue;

    const target = current ?? prelude;
    const propertyMatch = clean.match(PROPERTY_RE);
    if (propertyMatch) {
      target.properties[propertyMatch[1].trim()] = propertyMatch[2].trim();
    } else if (COMMENT_RE.test(line)) {
      target.comments.push(line);
    }
    target.lines.push(line);
  }

  if (current) {
    flush(current);
  } else if (hasContent(prelude)) {
    flush(prelude);
  }

  if (profiles.length === 0 && options.emptyDefault) {
    flush(draft(options.defaultType, options.defaultName));
  }

  return profiles;
}

/**
 * Parse the profiles of one type from stanza text. Content before the first
 * header belongs to a default profile named after the file; an empty file
 * yields a single empty default profile.
 */
export function parseStanzas(text: string, type: StanzaType, defaultName: string, filePath: string): Profile[] {
  return scanStanzas(text, {
    types: [type],
    filePath,
    defaultType: type,
    defaultName,
    emptyDefault: true,
  });
}

export function parseProfileFile(filePath: string, type: StanzaType): ParseResult {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return { profiles: [], diagnostics: [readError(filePath, err)] };
  }

  return {
    profiles: parseStanzas(text, type, defaultProfileName(filePath), filePath),
    diagnostics: [],
  };
}

export function formatHeader(profile: Pick<Profile, 'type' | 'name'>): string {
  if (!profile.name.includes('*')) return `[${profile.name}]`;

  // Bundled (privatized) stanzas are written as [print:*Name*]
  return `[${profile.type}:${displayName(profile)}]`;
}

export function sortProperties(properties: ProfileProperties): ProfileProperties {
  const sorted: ProfileProperties = {};
  for (const key of Object.keys(properties).sort()) {
    sorted[key] = properties[key];
  }
  return sorted;
}

export function formatProperties(properties: ProfileProperties): string[] {
  return Object.keys(properties).sort().map(key => `${key} = ${properties[key]}`);
}

/** Comment lines of a stanza worth re-emitting: not headers, properties or blanks. */
export function retainedComments(profile: Pick<Profile, 'lines'>): string[] {
  return profile.lines.filter(line => {
    const clean = cleanLine(line);
    if (!clean) return COMMENT_RE.test(line);
    if (PROPERTY_RE.test(clean) || HEADER_RE.test(clean)) return false;
    return line.includes('#');
  });
}

export interface SerializeOptions {
  /** Name of the file's implicit default profile, which is written without a header when empty. */
  defaultName?: string;
}

export function serializeProfile(profile: Profile, withHeader: boolean): string[] {
  const out: string[] = [];
  if (withHeader) out.push(formatHeader(profile));
  out.push(...retainedComments(profile));
  out.push(...formatProperties(profile.properties));
  return out;
}

/**
 * Serialize profiles in their given order. Properties are always
 * alphabetized and each stanza is followed by exactly one blank line.
 */
export function serializeStanzas(profiles: Profile[], options: SerializeOptions = {}): string {
  const out: string[] = [];

  for (const profile of profiles) {
    const isEmptyDefault = options.defaultName !== undefined
      && profile.name === qualifyName(profile.type, options.defaultName)
      && Object.keys(profile.properties).length === 0
      && profile.comments.length === 0;

    out.push(...serializeProfile(profile, !isEmptyDefault));
    if (out.length > 0 && out[out.length - 1] !== '') out.push('');
  }

  return out.length > 0 ? out.join('\n') + '\n' : '';
}

export function writeProfileFile(filePath: string, profiles: Profile[]): void {
  ensureDir(filePath);
  writeFileSync(filePath, serializeStanzas(profiles, { defaultName: defaultProfileName(filePath) }), 'utf-8');
}

export function ensureDir(filePath: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function readError(filePath: string, err: unknown): Diagnostic {
  return {
    severity: 'error',
    message: `Could not read ${basename(filePath)}: ${errorMessage(err)}`,
    file: filePath,
  };
}

export function writeError(filePath: string, err: unknown): Diagnostic {
  return {
    severity: 'error',
    message: `Could not write ${basename(filePath)}: ${errorMessage(err)}`,
    file: filePath,
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function parseHeader(inner: string, types: readonly StanzaType[]): { type: StanzaType; display: string } | null {
  const colon = inner.indexOf(':');
  if (colon === -1) return null;

  const type = types.find(t => t === inner.slice(0, colon).trim());
  if (!type) return null;

  return { type, display: inner.slice(colon + 1).trim() };
}

function draft(type: StanzaType, display: string): StanzaDraft {
  return {
    type,
    name: qualifyName(type, display),
    properties: {},
    comments: [],
    lines: [],
  };
}

function hasContent(stanza: StanzaDraft): boolean {
  return Object.keys(stanza.properties).length > 0 || stanza.comments.length > 0;
}

function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map(l => l.replace(/\r$/, ''));
}
