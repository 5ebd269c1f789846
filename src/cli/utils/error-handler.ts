// CLI error handling utilities

import {
  ScannerError,
  ValidationError,
  SecurityError,
  DiscoveryIOError,
  MalformedLocationError,
  UnsupportedSchemeError,
  ConfigError
} from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof SecurityError) {
    return `Security Error: ${error.message}`;
  }

  if (error instanceof ScannerError) {
    const cause = error.cause instanceof Error ? `\n  caused by: ${error.cause.message}` : '';
    return `Error [${error.code}]: ${error.message}${cause}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ValidationError || error instanceof ConfigError) {
    return 2;
  }
  if (error instanceof SecurityError) {
    return 3;
  }
  if (error instanceof UnsupportedSchemeError || error instanceof MalformedLocationError) {
    return 4;
  }
  if (error instanceof DiscoveryIOError) {
    return 5;
  }
  return 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
