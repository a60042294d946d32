/**
 * Helpers shared by the CLI commands
 */

import { readFileSync } from 'fs';
import chalk from 'chalk';
import type { Ora } from 'ora';
import { Ledger } from '../core/Ledger.js';
import { LedgerError, ValidationError } from '../core/errors.js';
import type { JsonValue } from '../core/types.js';
import { parseJson } from '../hashing/CanonicalHasher.js';
import type { BatchReport } from '../services/BatchRunner.js';

export interface CommonOptions {
  dataDir: string;
  output: string;
}

export async function openLedger(options: CommonOptions): Promise<Ledger> {
  const ledger = new Ledger({ dataDir: options.dataDir });
  await ledger.initialize();
  return ledger;
}

export function wantsJson(options: CommonOptions): boolean {
  return options.output === 'json';
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Read a JSON document from a file path
 */
export function readJsonFile(path: string): JsonValue {
  try {
    return parseJson(readFileSync(path, 'utf8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ValidationError('payload', [`${path} is not valid JSON: ${error.message}`]);
    }
    throw error;
  }
}

/**
 * Abort controller tripped by Ctrl-C, so batch commands stop between slices
 */
export function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log(chalk.yellow('\nInterrupted; finishing started units...'));
    controller.abort();
  });
  return controller.signal;
}

export function printBatch<T>(report: BatchReport<T>): void {
  for (const unit of report.units) {
    const marker = unit.status === 'succeeded'
      ? chalk.green('✓')
      : unit.status === 'skipped'
        ? chalk.dim('-')
        : unit.status === 'failed'
          ? chalk.red('✗')
          : chalk.yellow('○');
    console.log(`  ${marker} ${unit.unit}${unit.detail ? chalk.dim(`  ${unit.detail}`) : ''}`);
  }
  console.log();
  console.log(
    chalk.dim('Succeeded:'), chalk.white(String(report.succeeded)),
    chalk.dim(' Skipped:'), chalk.white(String(report.skipped)),
    chalk.dim(' Failed:'), report.failed > 0 ? chalk.red(String(report.failed)) : chalk.white('0'),
    chalk.dim(' Cancelled:'), chalk.white(String(report.cancelled))
  );
}

export function percent(value: number | null, digits = 2): string {
  return value === null ? 'n/a' : `${(value * 100).toFixed(digits)}%`;
}

/**
 * Report a failed command and exit non-zero
 */
export function failCommand(spinner: Ora, label: string, error: unknown): never {
  spinner.fail(chalk.red(label));
  if (error instanceof LedgerError) {
    console.error(chalk.red(`${error.name}: ${error.message}`));
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(1);
}
