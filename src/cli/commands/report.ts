/**
 * Report Command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { failCommand, openLedger, percent, printJson, wantsJson, type CommonOptions } from '../shared.js';

export const reportCommand = new Command('report')
  .description('Aggregate scores across evaluations')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (options: CommonOptions) => {
    const spinner = ora('Aggregating evaluations...').start();

    try {
      const ledger = await openLedger(options);
      const report = ledger.evaluations.report();
      ledger.close();
      spinner.succeed(`${report.evaluationCount} evaluation(s)`);

      if (wantsJson(options)) {
        printJson(report);
        return;
      }

      console.log();
      console.log(chalk.dim('Mean Brier:'), report.meanBrierScore === null ? 'n/a' : report.meanBrierScore.toFixed(4));
      console.log(chalk.dim('Mean log loss:'), report.meanLogLoss === null ? 'n/a' : report.meanLogLoss.toFixed(4));
      console.log(chalk.dim('Scored bets:'), String(report.scoredBets));
      console.log(chalk.dim('Mean ROI:'), percent(report.meanRoi, 1));
      console.log(chalk.dim('Edges realized/missed:'), `${report.edgesRealized}/${report.edgesMissed}`);
      console.log();
      console.log(chalk.cyan(report.interpretation));
    } catch (error) {
      failCommand(spinner, 'Failed to build report', error);
    }
  });
