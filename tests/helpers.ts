import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { qualifyName } from '../src/core/names.js';
import type { Profile, ProfileProperties, StanzaType } from '../src/core/types.js';

export function createWorkspace(): string {
  return mkdtempSync(join(tmpdir(), 'profman-test-'));
}

export function removeWorkspace(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeFile(root: string, relativePath: string, content: string): string {
  const path = join(root, relativePath);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf-8');
  return path;
}

export function readFile(path: string): string {
  return readFileSync(path, 'utf-8');
}

export function makeProfile(
  display: string,
  properties: ProfileProperties = {},
  filePath = '/profiles/test.ini',
  type: StanzaType = 'print',
): Profile {
  return {
    filePath,
    type,
    name: qualifyName(type, display),
    properties,
    comments: [],
    lines: [],
  };
}
