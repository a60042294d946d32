/**
 * Collect Command
 *
 * Record collector payloads from a JSON file: one payload object, or an array.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  failCommand,
  interruptSignal,
  openLedger,
  printBatch,
  printJson,
  readJsonFile,
  wantsJson,
  type CommonOptions
} from '../shared.js';

export const collectCommand = new Command('collect')
  .description('Record snapshots from collector payloads')
  .argument('<file>', 'JSON file holding a payload or an array of payloads')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (file: string, options: CommonOptions) => {
    const spinner = ora('Recording snapshots...').start();

    try {
      const ledger = await openLedger(options);
      const document = readJsonFile(file);

      if (!Array.isArray(document)) {
        const { snapshot, created } = ledger.collector.collect(document);
        ledger.close();
        spinner.succeed(created ? 'Snapshot recorded' : 'Snapshot already recorded');
        if (wantsJson(options)) {
          printJson({ snapshot, created });
        } else {
          console.log(chalk.dim('Game:'), snapshot.gameId);
          console.log(chalk.dim('Snapshot:'), snapshot.snapshotId);
          console.log(chalk.dim('Hash:'), snapshot.hash);
        }
        return;
      }

      const report = await ledger.collector.collectMany(document, {
        concurrency: ledger.batchConcurrency,
        signal: interruptSignal()
      });
      ledger.close();
      spinner.succeed(`Processed ${report.total} payload(s)`);

      if (wantsJson(options)) {
        printJson(report);
      } else {
        printBatch(report);
      }
      if (report.failed > 0) process.exit(1);
    } catch (error) {
      failCommand(spinner, 'Failed to record snapshots', error);
    }
  });
