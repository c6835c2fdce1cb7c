import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import {
  mergeVendorInfo, parseBundleText, readBundleFile, serializeBundleFile, writeBundleFile,
} from '../../../src/core/parser/vendor.js';
import { DEFAULT_VENDOR } from '../../../src/core/types.js';
import { createWorkspace, makeProfile, readFile, removeWorkspace, writeFile } from '../../helpers.js';

const FIXTURE = fileURLToPath(new URL('../../fixtures/sample-bundle.ini', import.meta.url));

const VENDOR_HEADER = (name: string, repoId: string, configVersion: string) => [
  '[vendor]',
  `repo_id = ${repoId}`,
  '# Vendor name will be shown by the Config Wizard.',
  `name = ${name}`,
  '# Configuration version of this file. Config file will only be installed, if the config_version differs.',
  '# This means, the server may force the PrusaSlicer configuration to be downgraded.',
  `config_version = ${configVersion}`,
  '',
];

describe('parseBundleText', () => {
  it('should read every stanza type in file order', () => {
    const { document } = readBundleFile(FIXTURE);

    expect(document.profiles.map(p => p.name)).toEqual([
      'printer_model: MK4S',
      'filament: *SampleFilament*',
      'print: *Sample*',
      'print: *Sample Fast*',
    ]);
    expect(document.profiles.map(p => p.type)).toEqual(['printer_model', 'filament', 'print', 'print']);
    expect(document.profiles[3].properties).toEqual({ inherits: '*Sample*', perimeters: '3' });
  });

  it('should read the vendor metadata', () => {
    const { document } = readBundleFile(FIXTURE);
    expect(document.vendor).toEqual({ repoId: 'sample-repo', configVersion: '1.2.3', name: 'Sample' });
  });

  it('should have no vendor metadata without a vendor stanza', () => {
    const document = parseBundleText('[print:*A*]\nx = 1\n', '/v/A.ini');
    expect(document.vendor).toBeUndefined();
    expect(document.profiles).toHaveLength(1);
  });
});

describe('serializeBundleFile', () => {
  it('should write the vendor stanza first and compact headers', () => {
    const parent = makeProfile('*B*', { layer_height: '0.2', fill_density: '20%' });
    const text = serializeBundleFile([parent], 'B', DEFAULT_VENDOR);

    expect(text).toBe([
      ...VENDOR_HEADER('B', 'non-prusa-fff', '2.1.0'),
      '[print:*B*]',
      'fill_density = 20%',
      'layer_height = 0.2',
      '',
      '',
    ].join('\n'));
  });

  it('should rewrite the fixture without losing stanzas or comments', () => {
    const { document } = readBundleFile(FIXTURE);
    const text = serializeBundleFile(document.profiles, 'Sample', mergeVendorInfo(document.vendor, DEFAULT_VENDOR));

    expect(text).toBe([
      ...VENDOR_HEADER('Sample', 'sample-repo', '1.2.3'),
      '[printer_model:MK4S]',
      'name = Original Prusa MK4S',
      '',
      '[filament:*SampleFilament*]',
      'filament_type = PETG',
      'temperature = 240',
      '',
      '[print:*Sample*]',
      '# shared by every sample print',
      'layer_height = 0.2',
      'perimeters = 2',
      '',
      '[print:*Sample Fast*]',
      'inherits = *Sample*',
      'perimeters = 3',
      '',
      '',
    ].join('\n'));
  });
});

describe('mergeVendorInfo', () => {
  it('should prefer values already in the file', () => {
    expect(mergeVendorInfo({ repoId: 'custom' }, DEFAULT_VENDOR)).toEqual({
      repoId: 'custom',
      configVersion: '2.1.0',
    });
  });

  it('should fall back to configuration without a vendor stanza', () => {
    expect(mergeVendorInfo(undefined, { repoId: 'r', configVersion: '9' })).toEqual({ repoId: 'r', configVersion: '9' });
  });
});

describe('bundle files', () => {
  let dir: string;

  beforeEach(() => {
    dir = createWorkspace();
  });

  afterEach(() => {
    removeWorkspace(dir);
  });

  it('should treat a missing bundle as empty without diagnostics', () => {
    const { document, diagnostics } = readBundleFile(join(dir, 'vendor', 'None.ini'));

    expect(document.profiles).toEqual([]);
    expect(diagnostics).toEqual([]);
  });

  it('should write a bundle that reads back', () => {
    const file = join(dir, 'vendor', 'Kit.ini');
    writeBundleFile(file, [makeProfile('*Kit*', { perimeters: '2' }, file)], 'Kit', DEFAULT_VENDOR);

    const { document } = readBundleFile(file);
    expect(document.profiles.map(p => p.name)).toEqual(['print: *Kit*']);
    expect(document.vendor?.name).toBe('Kit');
    expect(readFile(file).startsWith('[vendor]\nrepo_id = non-prusa-fff\n')).toBe(true);
  });

  it('should report a directory in place of a bundle file', () => {
    writeFile(dir, 'vendor/Kit.ini/placeholder.txt', '');
    const { document, diagnostics } = readBundleFile(join(dir, 'vendor', 'Kit.ini'));

    expect(document.profiles).toEqual([]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].severity).toBe('error');
  });
});
