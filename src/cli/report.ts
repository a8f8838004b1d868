import chalk from 'chalk';
import { ConfigError } from '../config.js';

/**
 * Print a command failure and set a non-zero exit code
 */
export function reportFailure(error: unknown): void {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`Configuration error: ${error.message}`));
  } else {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exitCode = 1;
}
