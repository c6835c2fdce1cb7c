import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { relative } from 'node:path';
import { resolveConfig, profileDirFor } from '../core/config.js';
import { loadCorpus } from '../core/corpus.js';
import { isEmptyFilter, selectProfiles } from '../core/filter.js';
import { errorMessage } from '../core/parser/ini.js';
import { PROFILE_TYPES } from '../core/types.js';
import type { Corpus } from '../core/corpus.js';
import type { Diagnostic, Profile, ProfileFilter, ProfileType, ProfmanConfig } from '../core/types.js';

export interface ProjectOptions {
  project: string;
  verbose?: boolean;
}

export interface DirectoryOptions {
  profileDir?: string;
  bundleDir?: string;
}

export interface FilterOptions {
  tag?: string;
  subProfile?: string;
  nozzle?: string;
  layerHeight?: string;
  type?: string;
  vendor?: string;
}

export type SelectionOptions = ProjectOptions & DirectoryOptions & FilterOptions;

export function parseProfileType(value: string): ProfileType {
  const type = PROFILE_TYPES.find(t => t === value);
  if (!type) {
    throw new InvalidArgumentError(`Use 'print' or 'filament'.`);
  }
  return type;
}

export function addProjectOptions(cmd: Command): Command {
  return cmd.option('-p, --project <path>', 'Project root path', process.cwd());
}

export function addVerboseOption(cmd: Command): Command {
  return cmd.option('--verbose', 'Show informational messages', false);
}

export function addFilterOptions(cmd: Command): Command {
  return cmd
    .option('--tag <tag>', 'Filter print profiles by tag')
    .option('--sub-profile <tag>', 'Same as --tag')
    .option('--nozzle <diameter>', 'Filter print profiles by nozzle diameter (0.4 or 0.4mm)')
    .option('--layer-height <height>', 'Filter print profiles by layer height (0.2 or 0.2mm)')
    .option('--type <type>', 'Filter filament profiles by filament type (e.g. PETG)')
    .option('--vendor <vendor>', 'Filter filament profiles by vendor');
}

export function addDirectoryOptions(cmd: Command): Command {
  return cmd
    .option('--profile-dir <dir>', 'Profile directory (default: ./print or ./filament)')
    .option('--bundle-dir <dir>', 'Bundle directory (default: ./vendor)');
}

export function toFilter(type: ProfileType, options: FilterOptions): ProfileFilter {
  if (type === 'filament') {
    return { type, filamentType: options.type, vendor: options.vendor };
  }
  return {
    type,
    tag: options.tag ?? options.subProfile,
    layerHeight: options.layerHeight,
    nozzle: options.nozzle,
  };
}

export function configFor(type: ProfileType | undefined, options: ProjectOptions & DirectoryOptions): ProfmanConfig {
  const config = resolveConfig(options.project, {
    printDir: type === 'print' ? options.profileDir : undefined,
    filamentDir: type === 'filament' ? options.profileDir : undefined,
    vendorDir: options.bundleDir,
  });
  for (const warning of config.warnings) {
    console.log(chalk.yellow('⚠') + ` ${warning}`);
  }
  return config;
}

export interface Selection {
  config: ProfmanConfig;
  profileDir: string;
  corpus: Corpus;
  selection: Profile[];
}

/** Load every profile of a type and apply the command's filters. */
export function loadSelection(type: ProfileType, options: SelectionOptions): Selection {
  const config = configFor(type, options);
  const profileDir = profileDirFor(config, type);
  const corpus = loadCorpus(profileDir, type);
  const filter = toFilter(type, options);
  const selection = selectProfiles(corpus.profiles, filter);

  printDiagnostics(corpus.diagnostics, options.verbose);

  if (selection.length === 0) {
    throw new Error(isEmptyFilter(filter)
      ? `No ${type} profiles found in ${profileDir}`
      : `No ${type} profiles in ${profileDir} match the given filters`);
  }

  return { config, profileDir, corpus, selection };
}

export function printDiagnostics(diagnostics: Diagnostic[], verbose = false): void {
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === 'info' && !verbose) continue;

    const icon = diagnostic.severity === 'error' ? chalk.red('✗')
      : diagnostic.severity === 'warning' ? chalk.yellow('⚠')
      : chalk.blue('ℹ');
    console.log(`${icon} ${diagnostic.message}`);
  }
}

export function displayPath(path: string): string {
  const rel = relative(process.cwd(), path);
  return rel && !rel.startsWith('..') ? rel : path;
}

/** Run a command body, reporting any thrown error and exiting with status 1. */
export function runCommand(body: () => void): void {
  try {
    body();
  } catch (err) {
    console.error(chalk.red('Error:'), errorMessage(err));
    process.exit(1);
  }
}
