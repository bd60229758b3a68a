/**
 * CLI-specific error handling wrapper for Commander.js actions.
 *
 * Lives in the CLI package (not core) because it sets the process exit code
 * and writes directly to stderr.
 */

import { handleError, UserCancellationError } from '@layerkit/core/utils/errors.js';

/**
 * Wraps an async action: errors are formatted to stderr and the process
 * exits with code 1. Cancellation exits quietly with code 0.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
