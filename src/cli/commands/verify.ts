/**
 * Verify Command
 *
 * Full integrity pass. Exits non-zero when anything is wrong.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { failCommand, openLedger, printJson, wantsJson, type CommonOptions } from '../shared.js';

export const verifyCommand = new Command('verify')
  .description('Recompute every hash and check references and lineage')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (options: CommonOptions) => {
    const spinner = ora('Verifying ledger...').start();

    try {
      const ledger = await openLedger(options);
      const report = ledger.verify();
      ledger.close();

      if (report.ok) spinner.succeed(chalk.green(`${report.recordsChecked} record(s) verified`));
      else spinner.fail(chalk.red('Integrity problems found'));

      if (wantsJson(options)) {
        printJson(report);
      } else {
        for (const mismatch of report.mismatches) {
          console.log(chalk.red(`  hash mismatch: ${mismatch.entityType} ${mismatch.id}`));
        }
        for (const record of report.unreadable) {
          console.log(chalk.red(`  unreadable: ${record.entityType} ${record.id} (${record.reason})`));
        }
        for (const anomaly of report.lineageAnomalies) {
          console.log(chalk.yellow(`  lineage ${anomaly.kind}: ${anomaly.detail}`));
        }
        for (const dangling of report.danglingReferences) {
          console.log(chalk.yellow(`  dangling: ${dangling.entityType} ${dangling.id} ${dangling.field} -> ${dangling.referencedId}`));
        }
      }

      if (!report.ok) process.exit(1);
    } catch (error) {
      failCommand(spinner, 'Verification failed', error);
    }
  });
