import { Command } from 'commander';
import chalk from 'chalk';
import { relative, resolve } from 'node:path';
import { saveConfig, getConfigPath } from '../../core/config.js';
import { listProfileFiles } from '../../core/corpus.js';
import { addProjectOptions, configFor, displayPath, runCommand } from '../options.js';
import type { ProjectOptions } from '../options.js';

interface InitOptions extends ProjectOptions {
  bundleDir?: string;
  printDir?: string;
  filamentDir?: string;
}

export function initCommand(): Command {
  const cmd = new Command('init')
    .description('Write a project configuration and report the profile files found')
    .option('--print-dir <dir>', 'Print profile directory')
    .option('--filament-dir <dir>', 'Filament profile directory')
    .option('--bundle-dir <dir>', 'Bundle directory');

  return addProjectOptions(cmd)
    .action((options: InitOptions) => runCommand(() => {
      console.log(chalk.bold('Initializing profman...\n'));

      const config = configFor(undefined, options);
      const printDir = options.printDir ? resolve(config.projectRoot, options.printDir) : config.printDir;
      const filamentDir = options.filamentDir ? resolve(config.projectRoot, options.filamentDir) : config.filamentDir;

      const dirs = [
        { label: 'print', dir: printDir },
        { label: 'filament', dir: filamentDir },
        { label: 'vendor', dir: config.vendorDir },
      ];

      for (const { label, dir } of dirs) {
        const files = listProfileFiles(dir);
        if (files.length > 0) {
          console.log(chalk.green('✓') + ` Found ${files.length} ${label} file(s) in ${displayPath(dir)}`);
        } else {
          console.log(chalk.yellow('○') + ` No ${label} files in ${displayPath(dir)}`);
        }
      }

      const relativeTo = (dir: string) => relative(config.projectRoot, dir) || '.';
      saveConfig(config.projectRoot, {
        printDir: relativeTo(printDir),
        filamentDir: relativeTo(filamentDir),
        vendorDir: relativeTo(config.vendorDir),
        vendor: config.vendor,
      });

      console.log(chalk.green('\n✓') + ` Config saved to ${displayPath(getConfigPath(config.projectRoot))}`);
    }));
}
