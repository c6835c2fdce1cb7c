import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { errorMessage } from './parser/ini.js';
import { DEFAULT_VENDOR } from './types.js';
import type { ProfileType, ProfmanConfig } from './types.js';

export const CONFIG_FILE = '.profman.json';

const savedConfigSchema = z.object({
  printDir: z.string().min(1).optional(),
  filamentDir: z.string().min(1).optional(),
  vendorDir: z.string().min(1).optional(),
  vendor: z.object({
    repoId: z.string().min(1).optional(),
    configVersion: z.string().min(1).optional(),
  }).optional(),
});

export type SavedConfig = z.infer<typeof savedConfigSchema>;

export interface ConfigOverrides {
  printDir?: string;
  filamentDir?: string;
  vendorDir?: string;
}

export function getConfigPath(projectRoot: string): string {
  return join(projectRoot, CONFIG_FILE);
}

/**
 * Resolve directories and vendor metadata for a project. Later sources win:
 * defaults, `.profman.json`, `PROFMAN_*_DIR` environment variables, then
 * explicit overrides. Relative paths resolve against the project root.
 */
export function resolveConfig(
  projectRoot?: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ProfmanConfig {
  const root = projectRoot ? resolve(projectRoot) : process.cwd();
  const warnings: string[] = [];
  const saved = readSavedConfig(root, warnings);

  const dir = (override: string | undefined, envValue: string | undefined, savedValue: string | undefined, fallback: string) =>
    resolve(root, override || envValue || savedValue || fallback);

  return {
    projectRoot: root,
    printDir: dir(overrides.printDir, env.PROFMAN_PRINT_DIR, saved.printDir, 'print'),
    filamentDir: dir(overrides.filamentDir, env.PROFMAN_FILAMENT_DIR, saved.filamentDir, 'filament'),
    vendorDir: dir(overrides.vendorDir, env.PROFMAN_VENDOR_DIR, saved.vendorDir, 'vendor'),
    vendor: {
      repoId: saved.vendor?.repoId ?? DEFAULT_VENDOR.repoId,
      configVersion: saved.vendor?.configVersion ?? DEFAULT_VENDOR.configVersion,
    },
    warnings,
  };
}

export function readSavedConfig(projectRoot: string, warnings: string[] = []): SavedConfig {
  const configPath = getConfigPath(projectRoot);
  if (!existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    warnings.push(`Ignoring ${CONFIG_FILE}: ${errorMessage(err)}`);
    return {};
  }

  const parsed = savedConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    warnings.push(`Ignoring ${CONFIG_FILE}: ${issues.join('; ')}`);
    return {};
  }

  return parsed.data;
}

/** Merge `config` into the project's saved configuration file. */
export function saveConfig(projectRoot: string, config: SavedConfig): SavedConfig {
  const existing = readSavedConfig(projectRoot);
  const merged: SavedConfig = {
    ...existing,
    ...config,
    vendor: config.vendor || existing.vendor ? { ...existing.vendor, ...config.vendor } : undefined,
  };

  writeFileSync(getConfigPath(projectRoot), JSON.stringify(merged, null, 2) + '\n', 'utf-8');
  return merged;
}

export function profileDirFor(config: ProfmanConfig, type: ProfileType): string {
  return type === 'print' ? config.printDir : config.filamentDir;
}
