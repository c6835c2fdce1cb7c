import { Command } from 'commander';
import chalk from 'chalk';
import { bundleProfiles } from '../../core/bundle/synthesizer.js';
import {
  addDirectoryOptions, addFilterOptions, addProjectOptions, addVerboseOption, displayPath, loadSelection,
  parseProfileType, printDiagnostics, runCommand,
} from '../options.js';
import type { SelectionOptions } from '../options.js';
import type { ProfileType } from '../../core/types.js';

interface BundleCommandOptions extends SelectionOptions {
  into: string;
}

export function bundleCommand(): Command {
  const cmd = new Command('bundle')
    .description('Move the parents of matching profiles into a vendor bundle')
    .argument('<type>', 'Profile type: print or filament', parseProfileType)
    .requiredOption('--into <name>', 'Bundle name');

  return addVerboseOption(addProjectOptions(addDirectoryOptions(addFilterOptions(cmd))))
    .action((type: ProfileType, options: BundleCommandOptions) => runCommand(() => {
      const { config, profileDir, selection } = loadSelection(type, options);

      console.log(chalk.bold(`Bundling ${selection.length} ${type} profile(s) into ${chalk.cyan(options.into)}...\n`));

      const result = bundleProfiles({
        selection,
        bundleName: options.into,
        type,
        profileDir,
        bundleDir: config.vendorDir,
        vendor: config.vendor,
      });
      printDiagnostics(result.diagnostics, options.verbose);

      if (result.status === 'nothing-to-bundle') {
        console.log(chalk.yellow('○') + ' No selected profile is inherited by another; nothing to bundle');
        return;
      }

      const parentState = result.parentCreated ? 'Created' : 'Reused';
      console.log(chalk.green('✓') + ` ${parentState} ${chalk.cyan(result.parentName)} (${result.commonPropertyCount} common properties)`);
      for (const [from, to] of Object.entries(result.renamed)) {
        console.log(`  ${from} -> ${chalk.cyan(to)}`);
      }
      if (result.skipped.length > 0) {
        console.log(chalk.yellow('○') + ` Already bundled: ${result.skipped.join(', ')}`);
      }

      console.log(chalk.bold('\nResults:'));
      console.log(`  Bundle file:     ${displayPath(result.bundleFile)}`);
      console.log(`  Profiles moved:  ${chalk.green(String(result.moved.length))}`);
      console.log(`  Leaves kept:     ${chalk.blue(String(result.leaves.length))}`);
      console.log(`  Files updated:   ${chalk.blue(String(result.filesUpdated.length))}`);
      console.log(`  Files deleted:   ${chalk.red(String(result.filesDeleted.length))}`);
      console.log(chalk.green('\n✓ Bundle complete'));
    }));
}
