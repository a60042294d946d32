/**
 * Evaluate Command
 *
 * Score analyses against recorded outcomes.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ValidationError } from '../../core/errors.js';
import {
  failCommand,
  interruptSignal,
  openLedger,
  percent,
  printBatch,
  printJson,
  wantsJson,
  type CommonOptions
} from '../shared.js';

interface EvaluateOptions extends CommonOptions {
  all?: boolean;
}

export const evaluateCommand = new Command('evaluate')
  .description('Score an analysis (or --all pending analyses) against its outcome')
  .argument('[analysisId]', 'Analysis identifier')
  .option('-a, --all', 'Evaluate every analysis whose game has a new outcome', false)
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (analysisId: string | undefined, options: EvaluateOptions) => {
    const spinner = ora('Evaluating...').start();

    try {
      const ledger = await openLedger(options);

      if (options.all) {
        const report = await ledger.evaluations.evaluateAllPending({
          concurrency: ledger.batchConcurrency,
          signal: interruptSignal()
        });
        ledger.close();
        spinner.succeed(`Evaluated ${report.total} analysis(es)`);
        if (wantsJson(options)) printJson(report);
        else printBatch(report);
        if (report.failed > 0) process.exit(1);
        return;
      }

      if (!analysisId) {
        ledger.close();
        throw new ValidationError('payload', ['pass an analysis id or --all']);
      }

      const { evaluation, created } = ledger.evaluations.evaluateAnalysis(analysisId);
      ledger.close();
      spinner.succeed(created ? 'Evaluation recorded' : 'Evaluation already recorded');

      if (wantsJson(options)) {
        printJson({ evaluation, created });
        return;
      }
      console.log(chalk.dim('Brier:'), evaluation.metrics.brierScore.toFixed(4));
      console.log(chalk.dim('Log loss:'), evaluation.metrics.logLoss.toFixed(4));
      console.log(chalk.dim('ROI:'), percent(evaluation.metrics.roi, 1));
      console.log(chalk.dim('Edge:'), evaluation.metrics.edgeRealized);
    } catch (error) {
      failCommand(spinner, 'Evaluation failed', error);
    }
  });
