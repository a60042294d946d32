/**
 * Diff Command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { diffSnapshots, summarizeLineMovement } from '../../delta/DeltaComputer.js';
import { failCommand, openLedger, printJson, wantsJson, type CommonOptions } from '../shared.js';

export const diffCommand = new Command('diff')
  .description('Field-level diff between two snapshots of one game')
  .argument('<olderId>', 'Earlier snapshot id')
  .argument('<newerId>', 'Later snapshot id')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (olderId: string, newerId: string, options: CommonOptions) => {
    const spinner = ora('Comparing snapshots...').start();

    try {
      const ledger = await openLedger(options);
      const older = ledger.storage.require('snapshot', olderId);
      const newer = ledger.storage.require('snapshot', newerId);
      ledger.close();

      const diff = diffSnapshots(older, newer);
      const changes = diff.changes();
      const movement = summarizeLineMovement(older, newer);
      spinner.succeed(`${changes.length} field(s) differ`);

      if (wantsJson(options)) {
        printJson({ counts: diff.counts(), changes, movement });
        return;
      }

      for (const change of changes) {
        switch (change.kind) {
          case 'added':
            console.log(chalk.green(`+ ${change.path}`), JSON.stringify(change.value));
            break;
          case 'removed':
            console.log(chalk.red(`- ${change.path}`), JSON.stringify(change.value));
            break;
          case 'changed':
            console.log(chalk.yellow(`~ ${change.path}`), JSON.stringify(change.oldValue), '→', JSON.stringify(change.newValue));
            break;
          case 'unchanged':
            break;
        }
      }
      console.log();
      console.log(chalk.dim('Elapsed:'), `${movement.elapsedSeconds}s`);
    } catch (error) {
      failCommand(spinner, 'Failed to diff snapshots', error);
    }
  });
