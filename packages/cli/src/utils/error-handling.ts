/**
 * CLI-specific error handling wrapper for Commander.js actions.
 *
 * Lives in the CLI package because it sets the process exit code and
 * writes to stderr.
 */

import { handleError } from '@pkgformula/core';

/**
 * Wraps an async action: errors are reported on stderr and the process
 * exits with status 1.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
