import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { assertBundleName, bundleProfiles, heldByParent, privatizationMap } from '../../../src/core/bundle/synthesizer.js';
import { loadCorpus } from '../../../src/core/corpus.js';
import { DEFAULT_VENDOR } from '../../../src/core/types.js';
import { createWorkspace, makeProfile, readFile, removeWorkspace, writeFile } from '../../helpers.js';

const VENDOR_HEADER = (name: string, repoId = 'non-prusa-fff', configVersion = '2.1.0') => [
  '[vendor]',
  `repo_id = ${repoId}`,
  '# Vendor name will be shown by the Config Wizard.',
  `name = ${name}`,
  '# Configuration version of this file. Config file will only be installed, if the config_version differs.',
  '# This means, the server may force the PrusaSlicer configuration to be downgraded.',
  `config_version = ${configVersion}`,
  '',
];

describe('bundleProfiles', () => {
  let dir: string;
  let printDir: string;
  let bundleDir: string;

  beforeEach(() => {
    dir = createWorkspace();
    printDir = join(dir, 'print');
    bundleDir = join(dir, 'vendor');
  });

  afterEach(() => {
    removeWorkspace(dir);
  });

  const bundle = (bundleName: string, selection = loadCorpus(printDir, 'print').profiles) =>
    bundleProfiles({ selection, bundleName, type: 'print', profileDir: printDir, bundleDir, vendor: DEFAULT_VENDOR });

  it('should move internal profiles under a synthesized parent', () => {
    const parentFile = writeFile(dir, 'print/parent.ini', '[print:Parent]\nlayer_height = 0.2\nfill_density = 20%\n');
    const childFile = writeFile(dir, 'print/child.ini', '[print:Child]\ninherits = Parent\nperimeters = 3\n');

    const result = bundle('B');

    expect(result.status).toBe('bundled');
    if (result.status !== 'bundled') return;

    expect(result.parentName).toBe('print: *B*');
    expect(result.parentCreated).toBe(true);
    expect(result.commonPropertyCount).toBe(2);
    expect(result.renamed).toEqual({ Parent: '*Parent*' });
    expect(result.moved).toEqual(['print: Parent']);
    expect(result.skipped).toEqual([]);
    expect(result.leaves).toEqual(['print: Child']);
    expect(result.filesUpdated).toEqual([childFile]);
    expect(result.filesDeleted).toEqual([parentFile]);

    expect(readFile(join(bundleDir, 'B.ini'))).toBe([
      ...VENDOR_HEADER('B'),
      '[print:*B*]',
      'fill_density = 20%',
      'layer_height = 0.2',
      '',
      '[print:*Parent*]',
      'inherits = *B*',
      '',
      '',
    ].join('\n'));
    expect(readFile(childFile)).toBe('[print: Child]\ninherits = *Parent*\nperimeters = 3\n\n');
    expect(existsSync(parentFile)).toBe(false);
  });

  it('should not add profiles twice when run again', () => {
    writeFile(dir, 'print/parent.ini', '[print:Parent]\nlayer_height = 0.2\nfill_density = 20%\n');
    writeFile(dir, 'print/child.ini', '[print:Child]\ninherits = Parent\nperimeters = 3\n');
    const selection = loadCorpus(printDir, 'print').profiles;

    bundle('B', selection);
    const first = readFile(join(bundleDir, 'B.ini'));
    const second = bundle('B', selection);

    expect(second.status).toBe('bundled');
    if (second.status !== 'bundled') return;

    expect(second.parentCreated).toBe(false);
    expect(second.skipped).toEqual(['print: *Parent*']);
    expect(second.moved).toEqual([]);
    expect(second.filesUpdated).toEqual([]);
    expect(second.filesDeleted).toEqual([]);
    expect(second.diagnostics.map(d => d.message)).toContain('parent.ini no longer exists');
    expect(readFile(join(bundleDir, 'B.ini'))).toBe(first);
  });

  it('should keep the other profiles of a file a parent moves out of', () => {
    const file = writeFile(dir, 'print/all.ini', [
      '[print:Parent]',
      'layer_height = 0.2',
      '',
      '[print:Child]',
      'inherits = Parent',
      'first_layer_height = 0.3',
      '',
    ].join('\n'));

    const result = bundle('B');

    expect(result.status).toBe('bundled');
    if (result.status !== 'bundled') return;
    expect(result.moved).toEqual(['print: Parent']);
    expect(result.filesUpdated).toEqual([file]);
    expect(result.filesDeleted).toEqual([]);
    expect(readFile(file)).toBe('[print: Child]\nfirst_layer_height = 0.3\ninherits = *Parent*\n\n');
  });

  it('should keep values an existing bundle parent does not hold', () => {
    writeFile(dir, 'print/p1.ini', '[print:P1]\na = 1\n');
    writeFile(dir, 'print/c1.ini', '[print:C1]\ninherits = P1\n');
    bundle('B');

    writeFile(dir, 'print/p2.ini', '[print:P2]\na = 1\nx = 7\n');
    const c2 = writeFile(dir, 'print/c2.ini', '[print:C2]\ninherits = P2\n');
    const selection = loadCorpus(printDir, 'print').profiles
      .filter(p => p.name === 'print: P2' || p.name === 'print: C2');

    const result = bundle('B', selection);

    expect(result.status).toBe('bundled');
    if (result.status !== 'bundled') return;
    expect(result.parentCreated).toBe(false);
    expect(result.commonPropertyCount).toBe(1);
    expect(result.moved).toEqual(['print: P2']);
    expect(result.filesUpdated).toEqual([c2]);

    expect(readFile(join(bundleDir, 'B.ini'))).toBe([
      ...VENDOR_HEADER('B'),
      '[print:*B*]',
      'a = 1',
      '',
      '[print:*P1*]',
      'inherits = *B*',
      '',
      '[print:*P2*]',
      'inherits = *B*',
      'x = 7',
      '',
      '',
    ].join('\n'));
    expect(readFile(c2)).toBe('[print: C2]\ninherits = *P2*\n\n');
  });

  it('should keep tags in the privatized name', () => {
    writeFile(dir, 'print/parent.ini', '[print:Parent @test]\nlayer_height = 0.2\n');
    const childFile = writeFile(dir, 'print/child.ini', '[print:Child]\ninherits = Parent\n');

    const result = bundle('Tagged');

    expect(result.status).toBe('bundled');
    if (result.status !== 'bundled') return;
    expect(result.renamed).toEqual({ 'Parent @test': '*Parent @test*' });
    expect(readFile(childFile)).toBe('[print: Child]\ninherits = *Parent @test*\n\n');
  });

  it('should hoist a shared parent reference into the bundle parent', () => {
    const a = writeFile(dir, 'print/a.ini', '[print:A]\ninherits = System\nlayer_height = 0.2\nperimeters = 2\n');
    const b = writeFile(dir, 'print/b.ini', '[print:B]\ninherits = System\nlayer_height = 0.2\nperimeters = 3\n');
    const c = writeFile(dir, 'print/c.ini', '[print:C]\ninherits = A\n');
    const d = writeFile(dir, 'print/d.ini', '[print:D]\ninherits = B\n');

    const result = bundle('Bn');

    expect(result.status).toBe('bundled');
    if (result.status !== 'bundled') return;
    expect(result.filesUpdated).toEqual([c, d]);
    expect(result.filesDeleted).toEqual([a, b]);

    expect(readFile(join(bundleDir, 'Bn.ini'))).toBe([
      ...VENDOR_HEADER('Bn'),
      '[print:*Bn*]',
      'inherits = System',
      'layer_height = 0.2',
      '',
      '[print:*A*]',
      'inherits = *Bn*',
      'perimeters = 2',
      '',
      '[print:*B*]',
      'inherits = *Bn*',
      'perimeters = 3',
      '',
      '',
    ].join('\n'));
    expect(readFile(c)).toBe('[print: C]\ninherits = *A*\n\n');
    expect(readFile(d)).toBe('[print: D]\ninherits = *B*\n\n');
  });

  it('should keep the vendor metadata of an existing bundle', () => {
    writeFile(dir, 'vendor/Kit.ini', '[vendor]\nrepo_id = my-repo\nconfig_version = 0.9.0\n');
    writeFile(dir, 'print/parent.ini', '[print:Parent]\nlayer_height = 0.2\n');
    writeFile(dir, 'print/child.ini', '[print:Child]\ninherits = Parent\n');

    bundle('Kit');

    expect(readFile(join(bundleDir, 'Kit.ini')).startsWith(VENDOR_HEADER('Kit', 'my-repo', '0.9.0').join('\n'))).toBe(true);
  });

  it('should report when no profile has a child in the selection', () => {
    const file = writeFile(dir, 'print/solo.ini', '[print:Solo]\nperimeters = 2\n');

    const result = bundle('Empty');

    expect(result.status).toBe('nothing-to-bundle');
    expect(result.leaves).toEqual(['print: Solo']);
    expect(existsSync(bundleDir)).toBe(true);
    expect(existsSync(join(bundleDir, 'Empty.ini'))).toBe(false);
    expect(readFile(file)).toBe('[print:Solo]\nperimeters = 2\n');
  });

  it('should refuse an empty selection', () => {
    expect(() => bundle('B', [])).toThrow('No profiles selected to bundle');
  });
});

describe('assertBundleName', () => {
  it('should reject blank and unsafe names', () => {
    expect(() => assertBundleName('  ')).toThrow('A bundle name is required');
    expect(() => assertBundleName('My/Kit')).toThrow('Bundle name contains unsafe characters: /');
    expect(() => assertBundleName('My Kit')).not.toThrow();
  });
});

describe('privatizationMap', () => {
  it('should leave already privatized names out', () => {
    expect(privatizationMap([makeProfile('Base'), makeProfile('*Kit*')])).toEqual({ Base: '*Base*' });
  });
});

describe('heldByParent', () => {
  it('should keep only values the parent sets identically', () => {
    const parent = makeProfile('*Kit*', { a: '1', b: '2' });
    expect(heldByParent({ a: '1', b: '3', c: '4' }, parent)).toEqual({ a: '1' });
  });
});
