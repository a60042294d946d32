/**
 * Timeline Command
 *
 * A game's snapshots in collection order, optionally as they stood at a past instant.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { NormalizedGameFieldsSchema } from '../../validation/schemas.js';
import { failCommand, openLedger, percent, printJson, wantsJson, type CommonOptions } from '../shared.js';

interface TimelineOptions extends CommonOptions {
  asOf?: string;
}

export const timelineCommand = new Command('timeline')
  .description("Show a game's snapshots in collection order")
  .argument('<gameId>', 'Game identifier')
  .option('--as-of <timestamp>', 'Only snapshots collected at or before this instant')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (gameId: string, options: TimelineOptions) => {
    const spinner = ora('Reading snapshots...').start();

    try {
      const ledger = await openLedger(options);
      const snapshots = ledger.storage.listByGame(gameId, { asOf: options.asOf });
      ledger.close();
      spinner.succeed(`${snapshots.length} snapshot(s) for ${gameId}`);

      if (wantsJson(options)) {
        printJson(snapshots);
        return;
      }

      for (const snapshot of snapshots) {
        const parsed = NormalizedGameFieldsSchema.safeParse(snapshot.normalizedFields);
        const fields = parsed.success ? parsed.data : null;
        console.log(
          chalk.white(snapshot.collectedAt),
          chalk.dim(snapshot.snapshotId),
          chalk.dim('book'), percent(fields?.sportsbook?.homeNoVigProbability ?? null),
          chalk.dim('market'), percent(fields?.predictionMarket?.midProbability ?? null)
        );
      }
    } catch (error) {
      failCommand(spinner, 'Failed to read timeline', error);
    }
  });
