import { describe, it, expect } from 'vitest';
import { cleanProfile, inheritedClosure, removedKeys } from '../../../src/core/clean/resolver.js';
import { makeProfile } from '../../helpers.js';

const grand = makeProfile('Grand', { layer_height: '0.2', perimeters: '2', speed: '50' });
const parent = makeProfile('Parent', { inherits: 'Grand', perimeters: '3' });
const child = makeProfile('Child', {
  inherits: 'Parent',
  layer_height: '0.2',
  perimeters: '3',
  speed: '60',
  fill_density: '20%',
});
const corpus = [grand, parent, child];

describe('inheritedClosure', () => {
  it('should let nearer ancestors win', () => {
    expect(inheritedClosure(child, corpus)).toEqual({ layer_height: '0.2', perimeters: '3', speed: '50' });
  });

  it('should be empty for a root profile', () => {
    expect(inheritedClosure(grand, corpus)).toEqual({});
  });
});

describe('cleanProfile', () => {
  it('should drop values equal to inherited ones', () => {
    expect(cleanProfile(child, corpus)).toEqual({ fill_density: '20%', inherits: 'Parent', speed: '60' });
  });

  it('should keep properties when the parent is not in the corpus', () => {
    const orphan = makeProfile('Orphan', { inherits: 'Missing', x: '1' });
    expect(cleanProfile(orphan, [orphan])).toEqual({ inherits: 'Missing', x: '1' });
  });

  it('should stop at an inheritance cycle', () => {
    const a = makeProfile('A', { inherits: 'B', x: '1' });
    const b = makeProfile('B', { inherits: 'A', x: '1', y: '2' });

    expect(cleanProfile(a, [a, b])).toEqual({ inherits: 'B' });
  });

  it('should clean against a same-named profile from another file', () => {
    const user = makeProfile('System', { inherits: 'System', brim: '0' }, '/print/user.ini');
    const system = makeProfile('System', { brim: '0' }, '/vendor/Kit.ini');

    expect(cleanProfile(user, [user, system])).toEqual({ inherits: 'System' });
  });
});

describe('removedKeys', () => {
  it('should list keys missing afterwards in order', () => {
    expect(removedKeys({ b: '1', a: '2', c: '3' }, { c: '3' })).toEqual(['a', 'b']);
  });
});
