#!/usr/bin/env node
/**
 * Matchledger CLI
 *
 * Command-line interface for the append-only market ledger.
 */

import { config } from 'dotenv';
import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { statusCommand } from './commands/status.js';
import { collectCommand } from './commands/collect.js';
import { timelineCommand } from './commands/timeline.js';
import { diffCommand } from './commands/diff.js';
import { analyzeCommand } from './commands/analyze.js';
import { ingestOutcomeCommand } from './commands/ingest-outcome.js';
import { evaluateCommand } from './commands/evaluate.js';
import { reportCommand } from './commands/report.js';
import { lineageCommand } from './commands/lineage.js';
import { proposeCommand, proposalStatusCommand, proposalsCommand } from './commands/propose.js';
import { verifyCommand } from './commands/verify.js';

// Load .env before any command reads MATCHLEDGER_* settings
config();

const program = new Command();

program
  .name('matchledger')
  .description('Append-only ledger of market snapshots, analyses and their outcomes')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(statusCommand);
program.addCommand(collectCommand);
program.addCommand(timelineCommand);
program.addCommand(diffCommand);
program.addCommand(analyzeCommand);
program.addCommand(ingestOutcomeCommand);
program.addCommand(evaluateCommand);
program.addCommand(reportCommand);
program.addCommand(lineageCommand);
program.addCommand(proposeCommand);
program.addCommand(proposalStatusCommand);
program.addCommand(proposalsCommand);
program.addCommand(verifyCommand);

program.parse();
