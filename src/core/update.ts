import { groupByFile } from './corpus.js';
import { parseProfileFile, sortProperties, writeError, writeProfileFile } from './parser/ini.js';
import { applyAdjustment, formatValue, parseAdjustment, parseValue, ValueFormatError } from './value.js';
import type { Adjustment } from './value.js';
import type { Diagnostic, Profile, ProfileProperties, PropertyChange, StanzaType, UpdateResult } from './types.js';

export type PropertyUpdate =
  | { kind: 'absolute'; property: string; value: string }
  | { kind: 'relative'; property: string; adjustment: Adjustment };

const RELATIVE_RE = /^(\w+)==([+-]\d*\.?\d*(?:%|mm)?)$/;
const ABSOLUTE_RE = /^(\w+)=(.+)$/;

/**
 * `key=value` sets a value; `key==+N[unit]` and `key==-N[unit]` adjust a
 * numeric one.
 */
export function parseUpdateExpression(expression: string): PropertyUpdate {
  const relative = expression.match(RELATIVE_RE);
  if (relative) {
    return { kind: 'relative', property: relative[1], adjustment: parseAdjustment(relative[2]) };
  }

  const absolute = expression.match(ABSOLUTE_RE);
  if (absolute) {
    return { kind: 'absolute', property: absolute[1], value: absolute[2] };
  }

  throw new ValueFormatError(
    `Invalid update expression: ${expression} (expected property=value or property==+/-amount)`,
  );
}

export interface UpdatePreview {
  properties: ProfileProperties;
  changes: PropertyChange[];
  diagnostics: Diagnostic[];
}

/** Apply updates to a copy of a profile's properties. Updates run in order. */
export function previewUpdates(profile: Profile, updates: PropertyUpdate[]): UpdatePreview {
  const properties = { ...profile.properties };
  const changes: PropertyChange[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const update of updates) {
    const oldValue = Object.hasOwn(properties, update.property) ? properties[update.property] : undefined;

    if (update.kind === 'absolute') {
      properties[update.property] = update.value;
      changes.push({ property: update.property, oldValue, newValue: update.value });
      continue;
    }

    if (oldValue === undefined) {
      diagnostics.push({
        severity: 'warning',
        message: `Property '${update.property}' not found in ${profile.name}, skipping relative update`,
        file: profile.filePath,
        profile: profile.name,
      });
      continue;
    }

    try {
      const newValue = formatValue(applyAdjustment(parseValue(oldValue), update.adjustment));
      properties[update.property] = newValue;
      changes.push({ property: update.property, oldValue, newValue });
    } catch (err) {
      if (!(err instanceof ValueFormatError)) throw err;
      diagnostics.push({
        severity: 'warning',
        message: `Could not apply relative update to ${update.property} in ${profile.name}: ${err.message}`,
        file: profile.filePath,
        profile: profile.name,
      });
    }
  }

  return { properties: sortProperties(properties), changes, diagnostics };
}

/**
 * Update every selected profile and rewrite the files that hold them. Each
 * file is re-read so that profiles outside the selection are kept as they are.
 */
export function applyUpdates(selection: Profile[], updates: PropertyUpdate[], type: StanzaType): UpdateResult {
  const result: UpdateResult = { changes: [], filesWritten: [], diagnostics: [] };

  for (const [file, profiles] of groupByFile(selection)) {
    const updated = new Map<string, ProfileProperties>();

    for (const profile of profiles) {
      const preview = previewUpdates(profile, updates);
      result.diagnostics.push(...preview.diagnostics);
      if (preview.changes.length === 0) continue;

      updated.set(profile.name, preview.properties);
      result.changes.push({ profile: profile.name, file, changes: preview.changes });
    }

    if (updated.size === 0) continue;

    const parsed = parseProfileFile(file, type);
    result.diagnostics.push(...parsed.diagnostics);
    if (parsed.diagnostics.some(d => d.severity === 'error')) continue;

    const rewritten = parsed.profiles.map(profile => {
      const properties = updated.get(profile.name);
      return properties ? { ...profile, properties } : profile;
    });

    try {
      writeProfileFile(file, rewritten);
      result.filesWritten.push(file);
    } catch (err) {
      result.diagnostics.push(writeError(file, err));
    }
  }

  return result;
}
