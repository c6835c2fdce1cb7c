import { Command } from 'commander';
import chalk from 'chalk';
import { applyUpdates, parseUpdateExpression } from '../../core/update.js';
import {
  addFilterOptions, addProjectOptions, addVerboseOption, displayPath, loadSelection, parseProfileType,
  printDiagnostics, runCommand,
} from '../options.js';
import type { SelectionOptions } from '../options.js';
import type { ProfileType } from '../../core/types.js';

export function updateCommand(): Command {
  const cmd = new Command('update')
    .description('Set or adjust properties of matching profiles')
    .argument('<type>', 'Profile type: print or filament', parseProfileType)
    .argument('<expressions...>', 'key=value to set, key==+N or key==-N[%|mm] to adjust')
    .option('--profile-dir <dir>', 'Profile directory (default: ./print or ./filament)')
    .addHelpText('after', '\nExample:\n  $ profman update print layer_height==+0.05 fill_density=20%');

  return addVerboseOption(addProjectOptions(addFilterOptions(cmd)))
    .action((type: ProfileType, expressions: string[], options: SelectionOptions) => runCommand(() => {
      const updates = expressions.map(parseUpdateExpression);
      const { selection } = loadSelection(type, options);

      console.log(chalk.bold(`Applying updates to ${selection.length} ${type} profile(s):\n`));

      const result = applyUpdates(selection, updates, type);
      printDiagnostics(result.diagnostics, options.verbose);

      for (const { profile, changes } of result.changes) {
        for (const change of changes) {
          console.log(`  ${chalk.cyan(profile)}: ${change.property} = ${change.oldValue ?? '(not set)'} -> ${chalk.green(change.newValue)}`);
        }
      }
      for (const file of result.filesWritten) {
        console.log(chalk.green('✓') + ` Updated ${displayPath(file)}`);
      }
      console.log(chalk.green('\n✓ Update complete'));
    }));
}
