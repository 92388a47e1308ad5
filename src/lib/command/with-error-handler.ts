import chalk from 'chalk';
import { ProvisionError, ErrorCode } from '../errors.js';

/** Exit code for plan loading and validation failures */
export const EXIT_PLAN_INVALID = 3;

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
      if (err instanceof ProvisionError) {
        // Validation messages arrive already marked, one line per issue
        const message = err.message.startsWith('✗') ? err.message : `✗ ${err.message}`;
        console.error(chalk.red(message));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
        if (
          err.code === ErrorCode.PLAN_VALIDATION_ERROR ||
          err.code === ErrorCode.PLAN_PARSE_ERROR ||
          err.code === ErrorCode.PLAN_NOT_FOUND
        ) {
          process.exit(EXIT_PLAN_INVALID);
        }
        process.exit(1);
      } else if (err instanceof Error) {
        console.error(chalk.red(`✗ ${err.message}`));
      } else {
        console.error(chalk.red('✗ An unexpected error occurred'));
      }
      process.exit(1);
    }
  };
}
