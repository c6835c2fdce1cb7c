import { Command } from 'commander';
import chalk from 'chalk';
import { combineProfiles } from '../../core/bundle/combine.js';
import {
  addFilterOptions, addProjectOptions, addVerboseOption, displayPath, loadSelection, parseProfileType,
  printDiagnostics, runCommand,
} from '../options.js';
import type { SelectionOptions } from '../options.js';
import type { ProfileType } from '../../core/types.js';

interface CombineCommandOptions extends SelectionOptions {
  into: string;
}

export function combineCommand(): Command {
  const cmd = new Command('combine')
    .description('Move the properties shared by matching profiles into a new parent profile')
    .argument('<type>', 'Profile type: print or filament', parseProfileType)
    .requiredOption('--into <name>', 'Name of the parent profile')
    .option('--profile-dir <dir>', 'Profile directory (default: ./print or ./filament)');

  return addVerboseOption(addProjectOptions(addFilterOptions(cmd)))
    .action((type: ProfileType, options: CombineCommandOptions) => runCommand(() => {
      const { selection } = loadSelection(type, options);

      console.log(chalk.bold(`Combining ${selection.length} ${type} profile(s) into ${chalk.cyan(options.into)}...\n`));

      const result = combineProfiles({ selection, parentName: options.into, type });
      printDiagnostics(result.diagnostics, options.verbose);

      const count = Object.keys(result.commonProperties).length;
      console.log(chalk.green('✓') + ` Created ${displayPath(result.parentFile)} with ${count} common propert${count === 1 ? 'y' : 'ies'}`);
      if (result.inherits) {
        console.log(`  Parent inherits: ${chalk.cyan(result.inherits)}`);
      }
      for (const file of result.filesUpdated) {
        console.log(chalk.green('✓') + ` Updated ${displayPath(file)}`);
      }
      console.log(chalk.dim('\nOnly the selected profiles were repointed; their descendants are unchanged.'));
    }));
}
