import chalk from 'chalk';
import { isBundleValidationError } from '../../index.js';

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (isBundleValidationError(error)) {
    console.error('\n' + chalk.yellow('Invalid Status Bundle'));
    console.error(error.message);
    if (error.context?.path) {
      console.error(chalk.gray(`at ${String(error.context.path)}`));
    }
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
