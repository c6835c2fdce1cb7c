import { describe, it, expect } from 'vitest';
import { parseCleanTarget } from '../../src/cli/commands/clean.js';

describe('parseCleanTarget', () => {
  it('should clean both profile types by default', () => {
    expect(parseCleanTarget()).toEqual({ kind: 'types', types: ['print', 'filament'] });
  });

  it('should clean a single profile type', () => {
    expect(parseCleanTarget('filament')).toEqual({ kind: 'types', types: ['filament'] });
  });

  it('should take a bundle name after "bundle" or on its own', () => {
    expect(parseCleanTarget('bundle', 'Kit')).toEqual({ kind: 'bundle', bundleName: 'Kit' });
    expect(parseCleanTarget('Kit')).toEqual({ kind: 'bundle', bundleName: 'Kit' });
  });

  it('should reject incomplete or extra arguments', () => {
    expect(() => parseCleanTarget('bundle')).toThrow('Usage: clean bundle <name>');
    expect(() => parseCleanTarget('print', 'Kit')).toThrow('Usage: clean [print|filament|bundle] [name]');
  });
});
