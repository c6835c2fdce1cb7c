import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join, resolve } from 'node:path';
import { profileDirFor, readSavedConfig, resolveConfig, saveConfig } from '../../src/core/config.js';
import { createWorkspace, removeWorkspace, writeFile } from '../helpers.js';

describe('resolveConfig', () => {
  let root: string;

  beforeEach(() => {
    root = createWorkspace();
  });

  afterEach(() => {
    removeWorkspace(root);
  });

  it('should default to directories under the project root', () => {
    const config = resolveConfig(root, {}, {});

    expect(config.projectRoot).toBe(resolve(root));
    expect(config.printDir).toBe(join(root, 'print'));
    expect(config.filamentDir).toBe(join(root, 'filament'));
    expect(config.vendorDir).toBe(join(root, 'vendor'));
    expect(config.vendor).toEqual({ repoId: 'non-prusa-fff', configVersion: '2.1.0' });
    expect(config.warnings).toEqual([]);
  });

  it('should read the saved configuration', () => {
    writeFile(root, '.profman.json', JSON.stringify({ printDir: 'profiles/print', vendor: { repoId: 'my-repo' } }));

    const config = resolveConfig(root, {}, {});
    expect(config.printDir).toBe(join(root, 'profiles', 'print'));
    expect(config.vendor).toEqual({ repoId: 'my-repo', configVersion: '2.1.0' });
  });

  it('should let the environment and then overrides win', () => {
    writeFile(root, '.profman.json', JSON.stringify({ printDir: 'saved' }));
    const env = { PROFMAN_PRINT_DIR: '/elsewhere/print', PROFMAN_VENDOR_DIR: 'bundles' };

    const fromEnv = resolveConfig(root, {}, env);
    expect(fromEnv.printDir).toBe('/elsewhere/print');
    expect(fromEnv.vendorDir).toBe(join(root, 'bundles'));

    const fromFlag = resolveConfig(root, { printDir: 'flag' }, env);
    expect(fromFlag.printDir).toBe(join(root, 'flag'));
  });

  it('should ignore an invalid file with a warning', () => {
    writeFile(root, '.profman.json', JSON.stringify({ printDir: 5 }));

    const config = resolveConfig(root, {}, {});
    expect(config.printDir).toBe(join(root, 'print'));
    expect(config.warnings).toHaveLength(1);
    expect(config.warnings[0]).toMatch(/^Ignoring \.profman\.json: printDir: /);
  });

  it('should ignore malformed JSON with a warning', () => {
    writeFile(root, '.profman.json', '{ not json');

    const config = resolveConfig(root, {}, {});
    expect(config.warnings).toHaveLength(1);
    expect(config.vendorDir).toBe(join(root, 'vendor'));
  });

  it('should pick the directory for a profile type', () => {
    const config = resolveConfig(root, {}, {});
    expect(profileDirFor(config, 'print')).toBe(config.printDir);
    expect(profileDirFor(config, 'filament')).toBe(config.filamentDir);
  });
});

describe('saveConfig', () => {
  let root: string;

  beforeEach(() => {
    root = createWorkspace();
  });

  afterEach(() => {
    removeWorkspace(root);
  });

  it('should merge into the saved file', () => {
    saveConfig(root, { printDir: 'p' });
    saveConfig(root, { vendor: { configVersion: '3.0.0' } });

    expect(readSavedConfig(root)).toEqual({ printDir: 'p', vendor: { configVersion: '3.0.0' } });
  });
});
