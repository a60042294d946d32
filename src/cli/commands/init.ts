/**
 * Init Command
 *
 * Create the data directory and an empty ledger database.
 */

import { Command } from 'commander';
import { existsSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { Ledger } from '../../core/Ledger.js';
import { LEDGER_FILE } from '../../core/config.js';
import { failCommand } from '../shared.js';

interface InitOptions {
  dataDir: string;
}

export const initCommand = new Command('init')
  .description('Initialize the ledger data directory')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .action((options: InitOptions) => {
    const spinner = ora('Initializing ledger...').start();

    try {
      const sqlitePath = join(options.dataDir, LEDGER_FILE);
      if (existsSync(sqlitePath)) {
        spinner.warn(`Ledger already exists at ${sqlitePath}`);
        return;
      }

      const ledger = new Ledger({ dataDir: options.dataDir });
      const createdAt = ledger.storage.getMeta('created_at');
      ledger.close();

      spinner.succeed(chalk.green('Ledger initialized'));
      console.log();
      console.log(chalk.dim('Database:'), sqlitePath);
      console.log(chalk.dim('Created:'), createdAt ?? 'unknown');
      console.log();
      console.log(chalk.cyan('Next steps:'));
      console.log('  matchledger collect payload.json');
      console.log('  matchledger analyze --all');
    } catch (error) {
      failCommand(spinner, 'Failed to initialize ledger', error);
    }
  });
