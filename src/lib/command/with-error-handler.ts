import chalk from 'chalk';
import { DeployError, isConfigError } from '../errors.js';

/**
 * Wrap a CLI command handler with centralized error handling.
 * Catches all errors and prints user-friendly output.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof DeployError) {
        console.error(chalk.red(`✗ ${err.message}`));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
        // Nothing was touched yet: config errors get exit code 3
        process.exit(isConfigError(err) ? 3 : 1);
      } else if (err instanceof Error) {
        console.error(chalk.red(`✗ ${err.message}`));
      } else {
        console.error(chalk.red('✗ An unexpected error occurred'));
      }
      process.exit(1);
    }
  };
}
