/**
 * Analyze Command
 *
 * Compare venue prices for one game, or every game with snapshots.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ValidationError } from '../../core/errors.js';
import {
  failCommand,
  interruptSignal,
  openLedger,
  printBatch,
  printJson,
  wantsJson,
  type CommonOptions
} from '../shared.js';

interface AnalyzeOptions extends CommonOptions {
  all?: boolean;
  parent?: string;
  chain?: boolean;
  asOf?: string;
}

export const analyzeCommand = new Command('analyze')
  .description('Record an analysis for a game (or --all games)')
  .argument('[gameId]', 'Game identifier')
  .option('-a, --all', 'Analyze every game with snapshots', false)
  .option('-p, --parent <analysisId>', 'Record as a child of this analysis')
  .option('-c, --chain', "Record as a child of the game's latest analysis", false)
  .option('--as-of <timestamp>', 'Only use snapshots collected at or before this instant')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (gameId: string | undefined, options: AnalyzeOptions) => {
    const spinner = ora('Analyzing...').start();

    try {
      const ledger = await openLedger(options);

      if (options.all) {
        const report = await ledger.analysis.analyzeAll({
          chain: options.chain,
          asOf: options.asOf,
          concurrency: ledger.batchConcurrency,
          signal: interruptSignal()
        });
        ledger.close();
        spinner.succeed(`Analyzed ${report.total} game(s)`);
        if (wantsJson(options)) printJson(report);
        else printBatch(report);
        if (report.failed > 0) process.exit(1);
        return;
      }

      if (!gameId) {
        ledger.close();
        throw new ValidationError('payload', ['pass a game id or --all']);
      }

      const { analysis, created } = ledger.analysis.analyzeGame(gameId, {
        parentAnalysisId: options.parent,
        chain: options.chain,
        asOf: options.asOf
      });
      ledger.close();
      spinner.succeed(created ? 'Analysis recorded' : 'Identical analysis already recorded');

      if (wantsJson(options)) {
        printJson({ analysis, created });
        return;
      }

      console.log(chalk.dim('Analysis:'), analysis.analysisId);
      console.log(chalk.dim('Parent:'), analysis.parentAnalysisId ?? 'none');
      console.log(chalk.dim('Snapshots:'), String(analysis.inputSnapshotIds.length));
      console.log(chalk.cyan(String(analysis.conclusions.summary ?? '')));
      for (const action of analysis.recommendedActions) {
        console.log(chalk.yellow(`  → ${action.rationale}`));
      }
    } catch (error) {
      failCommand(spinner, 'Analysis failed', error);
    }
  });
