/**
 * Lineage Command
 *
 * Ancestors of an analysis, root first, and the tree below it.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { LineageNode } from '../../lineage/LineageGraph.js';
import { failCommand, openLedger, printJson, wantsJson, type CommonOptions } from '../shared.js';

function printTree(node: LineageNode, indent: string): void {
  console.log(`${indent}${chalk.white(node.analysis.analysisId)} ${chalk.dim(node.analysis.createdAt)}`);
  for (const child of node.children) {
    printTree(child, `${indent}  `);
  }
}

export const lineageCommand = new Command('lineage')
  .description('Show the lineage of an analysis')
  .argument('<analysisId>', 'Analysis identifier')
  .option('-d, --data-dir <path>', 'Data directory path', './data')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (analysisId: string, options: CommonOptions) => {
    const spinner = ora('Walking lineage...').start();

    try {
      const ledger = await openLedger(options);
      const path = ledger.storage.listLineagePath(analysisId);
      const tree = ledger.lineage.tree(analysisId);
      ledger.close();
      spinner.succeed(`Depth ${path.length - 1}`);

      if (wantsJson(options)) {
        printJson({ path, tree });
        return;
      }

      console.log(chalk.cyan('Ancestry (root first)'));
      path.forEach((analysis, depth) => {
        console.log(`  ${depth}. ${analysis.analysisId} ${chalk.dim(analysis.analysisVersion)}`);
      });
      console.log();
      console.log(chalk.cyan('Descendants'));
      printTree(tree, '  ');
    } catch (error) {
      failCommand(spinner, 'Failed to walk lineage', error);
    }
  });
