import { Command } from 'commander';
import chalk from 'chalk';
import { groupByFile } from '../../core/corpus.js';
import { filterValues } from '../../core/filter.js';
import {
  addFilterOptions, addProjectOptions, addVerboseOption, displayPath, loadSelection, parseProfileType, runCommand,
} from '../options.js';
import type { SelectionOptions } from '../options.js';
import type { ProfileType } from '../../core/types.js';

export function listCommand(): Command {
  const cmd = new Command('list')
    .description('List the profiles matching the filters')
    .argument('<type>', 'Profile type: print or filament', parseProfileType)
    .option('--profile-dir <dir>', 'Profile directory (default: ./print or ./filament)');

  return addVerboseOption(addProjectOptions(addFilterOptions(cmd)))
    .action((type: ProfileType, options: SelectionOptions) => runCommand(() => {
      const { profileDir, selection } = loadSelection(type, options);

      console.log(chalk.bold(`${selection.length} ${type} profile(s) in ${displayPath(profileDir)}:\n`));

      for (const [file, profiles] of groupByFile(selection)) {
        console.log(chalk.dim(displayPath(file)));
        for (const profile of profiles) {
          const values = filterValues(profile, type);
          const details = 'tags' in values
            ? values.tags.map(tag => `@${tag}`).join(' ')
            : [values.filamentType, values.vendor].filter(Boolean).join(', ');
          const inherits = profile.properties.inherits ? chalk.dim(` <- ${profile.properties.inherits}`) : '';
          console.log(`  ${chalk.cyan(profile.name)}${details ? ' ' + chalk.yellow(details) : ''}${inherits}`);
        }
      }
    }));
}
