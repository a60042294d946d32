/**
 * Status Command
 *
 * Record counts and pending work.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { failCommand, openLedger, printJson, wantsJson, type CommonOptions } from '../shared.js';

export const statusCommand = new Command('status')
  .description('Show ledger record counts and pending work')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (options: CommonOptions) => {
    const spinner = ora('Reading ledger...').start();

    try {
      const ledger = await openLedger(options);
      const status = ledger.status();
      ledger.close();
      spinner.succeed('Ledger status');

      if (wantsJson(options)) {
        printJson(status);
        return;
      }

      console.log();
      console.log(chalk.cyan('Ledger'));
      console.log(chalk.dim('─'.repeat(40)));
      console.log(chalk.dim('Database:'), chalk.white(status.sqlitePath));
      console.log(chalk.dim('Schema revision:'), chalk.white(status.schemaRevision ?? 'unknown'));
      console.log(chalk.dim('Code version:'), chalk.white(status.codeVersion ?? 'unknown'));
      console.log();
      console.log(chalk.dim('Snapshots:'), chalk.white(String(status.counts.snapshots)));
      console.log(chalk.dim('Analyses:'), chalk.white(String(status.counts.analyses)));
      console.log(chalk.dim('Outcomes:'), chalk.white(String(status.counts.outcomes)));
      console.log(chalk.dim('Evaluations:'), chalk.white(String(status.counts.evaluations)));
      console.log(chalk.dim('Proposals:'), chalk.white(String(status.counts.proposals)));
      console.log();
      console.log(chalk.dim('Games:'), chalk.white(String(status.games)));
      console.log(chalk.dim('Awaiting outcome:'), chalk.white(String(status.gamesAwaitingOutcome)));
      console.log(chalk.dim('Awaiting evaluation:'), chalk.white(String(status.pendingEvaluations)));
      console.log();
    } catch (error) {
      failCommand(spinner, 'Failed to read ledger status', error);
    }
  });
