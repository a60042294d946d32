/**
 * Proposal Commands
 *
 * Record improvement proposals, list them, and move them through review.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ValidationError } from '../../core/errors.js';
import { parseProposalStatus } from '../../core/records.js';
import type { ProposalStatus } from '../../core/types.js';
import { failCommand, openLedger, printJson, readJsonFile, wantsJson, type CommonOptions } from '../shared.js';

interface ProposalsOptions extends CommonOptions {
  status?: string;
}

export const proposeCommand = new Command('propose')
  .description('Record an improvement proposal')
  .argument('<file>', 'JSON file holding the proposal payload')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (file: string, options: CommonOptions) => {
    const spinner = ora('Recording proposal...').start();

    try {
      const ledger = await openLedger(options);
      const { proposal, created } = ledger.proposals.propose(readJsonFile(file));
      ledger.close();
      spinner.succeed(created ? 'Proposal recorded' : 'Proposal already recorded');

      if (wantsJson(options)) printJson({ proposal, created });
      else console.log(chalk.dim('Proposal:'), proposal.proposalId, chalk.dim(proposal.status));
    } catch (error) {
      failCommand(spinner, 'Failed to record proposal', error);
    }
  });

export const proposalStatusCommand = new Command('proposal-status')
  .description('Move a proposal to accepted, rejected or implemented')
  .argument('<proposalId>', 'Proposal identifier')
  .argument('<status>', 'New status')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (proposalId: string, status: string, options: CommonOptions) => {
    const spinner = ora('Updating proposal...').start();

    try {
      const ledger = await openLedger(options);
      const proposal = ledger.proposals.transition(proposalId, status);
      ledger.close();
      spinner.succeed(`Proposal is now ${proposal.status}`);
      if (wantsJson(options)) printJson(proposal);
    } catch (error) {
      failCommand(spinner, 'Failed to update proposal', error);
    }
  });

export const proposalsCommand = new Command('proposals')
  .description('List improvement proposals')
  .option('-s, --status <status>', 'Only proposals in this status')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (options: ProposalsOptions) => {
    const spinner = ora('Reading proposals...').start();

    try {
      let status: ProposalStatus | undefined;
      if (options.status !== undefined) {
        const parsed = parseProposalStatus(options.status);
        if (parsed === null) throw new ValidationError('proposal', [`unknown status '${options.status}'`]);
        status = parsed;
      }

      const ledger = await openLedger(options);
      const proposals = ledger.proposals.list(status);
      ledger.close();
      spinner.succeed(`${proposals.length} proposal(s)`);

      if (wantsJson(options)) {
        printJson(proposals);
        return;
      }
      for (const proposal of proposals) {
        console.log(chalk.white(proposal.proposalId), chalk.dim(proposal.status), proposal.proposalText.split('\n')[0]);
      }
    } catch (error) {
      failCommand(spinner, 'Failed to list proposals', error);
    }
  });
