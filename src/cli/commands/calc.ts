/**
 * calc command - evaluate an expression locally, without a model
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { evaluate } from '../../tools/calculator/index.js';

export function calcCommand(): Command {
  const cmd = new Command('calc');

  cmd
    .description('Evaluate an arithmetic expression with the calculate tool')
    .argument('<expression...>', 'Expression, e.g. "2 + 3 * 4"')
    .action((parts: string[]) => {
      const result = evaluate(parts.join(' '));
      if (result.ok) {
        console.log(result.text);
      } else {
        console.error(chalk.red(`Error: ${result.error}`));
        process.exitCode = 1;
      }
    });

  return cmd;
}
