import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { listCommand } from './commands/list.js';
import { combineCommand } from './commands/combine.js';
import { bundleCommand } from './commands/bundle.js';
import { updateCommand } from './commands/update.js';
import { cleanCommand } from './commands/clean.js';

const program = new Command();

program
  .name('profman')
  .description('Inheritance, bundling and cleanup for slicer print and filament profiles')
  .version('0.1.0');

program.addCommand(initCommand());
program.addCommand(listCommand());
program.addCommand(combineCommand());
program.addCommand(bundleCommand());
program.addCommand(updateCommand());
program.addCommand(cleanCommand());

program.parse();
