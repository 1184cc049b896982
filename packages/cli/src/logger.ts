import chalk from 'chalk';
import type { ReviewLogger } from '@review-gate/core';

/**
 * Diagnostics go to stderr so reports on stdout stay machine-readable.
 */
export interface CliLogger extends ReviewLogger {
  info(message: string): void;
  error(message: string): void;
}

export function createLogger(options: { verbose?: boolean } = {}): CliLogger {
  return {
    debug(message) {
      if (options.verbose) console.error(chalk.gray(message));
    },
    info(message) {
      console.error(message);
    },
    warn(message) {
      console.error(chalk.yellow(`warning: ${message}`));
    },
    error(message) {
      console.error(chalk.red(message));
    },
  };
}
