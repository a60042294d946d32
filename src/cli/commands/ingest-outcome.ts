/**
 * Ingest Outcome Command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { failCommand, openLedger, printJson, readJsonFile, wantsJson, type CommonOptions } from '../shared.js';

export const ingestOutcomeCommand = new Command('ingest-outcome')
  .description('Record a final result (set "correction": true to supersede an earlier one)')
  .argument('<file>', 'JSON file holding the outcome payload')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (file: string, options: CommonOptions) => {
    const spinner = ora('Recording outcome...').start();

    try {
      const ledger = await openLedger(options);
      const { outcome, created } = ledger.outcomes.ingest(readJsonFile(file));
      ledger.close();
      spinner.succeed(created ? `Outcome recorded (revision ${outcome.revision})` : 'Outcome already recorded');

      if (wantsJson(options)) {
        printJson({ outcome, created });
        return;
      }
      console.log(chalk.dim('Game:'), outcome.gameId);
      console.log(chalk.dim('Score:'), `${outcome.finalScore.home}-${outcome.finalScore.away}`);
      console.log(chalk.dim('Winner:'), outcome.winner);
      if (outcome.supersedesOutcomeId) {
        console.log(chalk.dim('Supersedes:'), outcome.supersedesOutcomeId);
      }
    } catch (error) {
      failCommand(spinner, 'Failed to record outcome', error);
    }
  });
