import { Command } from 'commander';
import chalk from 'chalk';
import { cleanBundleFile, cleanProfileDir } from '../../core/clean/engine.js';
import { profileDirFor } from '../../core/config.js';
import { errorMessage } from '../../core/parser/ini.js';
import { PROFILE_TYPES } from '../../core/types.js';
import {
  addDirectoryOptions, addProjectOptions, addVerboseOption, configFor, displayPath, printDiagnostics, runCommand,
} from '../options.js';
import type { DirectoryOptions, ProjectOptions } from '../options.js';
import type { CleanResult, ProfileType, ProfmanConfig } from '../../core/types.js';

type CleanOptions = ProjectOptions & DirectoryOptions;

export type CleanTarget =
  | { kind: 'types'; types: ProfileType[] }
  | { kind: 'bundle'; bundleName: string };

/** `clean`, `clean print`, `clean bundle <name>` or `clean <name>`. */
export function parseCleanTarget(target?: string, bundleName?: string): CleanTarget {
  if (target === undefined) {
    return { kind: 'types', types: [...PROFILE_TYPES] };
  }

  if (target === 'bundle') {
    if (!bundleName) throw new Error('Usage: clean bundle <name>');
    return { kind: 'bundle', bundleName };
  }

  if (bundleName !== undefined) {
    throw new Error('Usage: clean [print|filament|bundle] [name]');
  }

  const type = PROFILE_TYPES.find(t => t === target);
  return type ? { kind: 'types', types: [type] } : { kind: 'bundle', bundleName: target };
}

export function cleanCommand(): Command {
  const cmd = new Command('clean')
    .description('Remove properties that repeat inherited values')
    .argument('[target]', 'print, filament, bundle, or a bundle name (default: print and filament)')
    .argument('[name]', 'Bundle name after "bundle"');

  return addVerboseOption(addProjectOptions(addDirectoryOptions(cmd)))
    .action((target: string | undefined, name: string | undefined, options: CleanOptions) => runCommand(() => {
      const parsed = parseCleanTarget(target, name);

      if (parsed.kind === 'bundle') {
        if (options.profileDir) {
          throw new Error('--profile-dir applies to a print or filament target');
        }
        cleanBundle(parsed.bundleName, configFor(undefined, options), options);
        return;
      }

      if (options.profileDir && parsed.types.length > 1) {
        throw new Error('--profile-dir applies to a print or filament target');
      }

      for (const type of parsed.types) {
        cleanType(type, configFor(type, options), options);
      }
    }));
}

function cleanType(type: ProfileType, config: ProfmanConfig, options: CleanOptions): void {
  const profileDir = profileDirFor(config, type);
  console.log(chalk.bold(`\nCleaning ${type} profiles in ${displayPath(profileDir)}...`));

  let result: CleanResult;
  try {
    result = cleanProfileDir({ type, profileDir, vendorDir: config.vendorDir });
  } catch (err) {
    console.log(chalk.yellow('⚠') + ` ${errorMessage(err)}`);
    return;
  }

  printDiagnostics(result.diagnostics, options.verbose);
  for (const change of result.changes) {
    console.log(`  ${chalk.cyan(change.profile)}: removed ${change.removed.length} redundant (${change.removed.join(', ')})`);
  }

  console.log(chalk.green('✓') + ' Clean complete:');
  console.log(`  Files processed:    ${result.filesProcessed}`);
  console.log(`  Files changed:      ${chalk.blue(String(result.filesChanged.length))}`);
  console.log(`  Properties removed: ${chalk.red(String(result.propertiesRemoved))}`);
}

function cleanBundle(bundleName: string, config: ProfmanConfig, options: CleanOptions): void {
  console.log(chalk.bold(`Cleaning bundle ${chalk.cyan(bundleName)}...\n`));

  const result = cleanBundleFile({
    bundleName,
    bundleDir: config.vendorDir,
    profileDirs: { print: config.printDir, filament: config.filamentDir },
    vendor: config.vendor,
  });
  printDiagnostics(result.diagnostics, options.verbose);

  console.log(`  Profile types: ${result.types.join(', ')}`);
  for (const parent of result.parentsCreated) {
    console.log(chalk.green('✓') + ` Created ${chalk.cyan(parent)}`);
  }
  for (const [type, properties] of Object.entries(result.hoisted)) {
    const keys = Object.keys(properties);
    if (keys.length > 0) console.log(`  ${type}: ${keys.length} propert${keys.length === 1 ? 'y' : 'ies'} held by the bundle parent`);
  }

  if (!result.changed && result.externalFilesChanged.length === 0) {
    console.log(chalk.yellow('○') + ` No optimization opportunities in ${displayPath(result.bundleFile)}`);
    return;
  }

  console.log(chalk.bold('\nResults:'));
  console.log(`  Properties removed:     ${chalk.red(String(result.propertiesRemoved))}`);
  console.log(`  Profiles modified:      ${chalk.blue(String(result.profilesChanged))}`);
  console.log(`  External files updated: ${chalk.blue(String(result.externalFilesChanged.length))}`);
  console.log(chalk.green('\n✓ Bundle clean complete'));
}
