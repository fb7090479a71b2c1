// CLI error handling and output utilities

import {
  GovernanceError,
  ValidationError,
  SchemaError,
  SecurityError,
  NotFoundError,
  IOError
} from '../../core/errors.js';
import { formatDiagnostic, type Diagnostic, type OperationResult } from '../../models/diagnostic.js';

/**
 * Exit codes. Fatal errors carry their own code; business-rule failures exit 1.
 */
export const EXIT_FAILURE = 1;

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof SchemaError) {
    const issues = error.issues.map(issue => `\n  - ${issue}`).join('');
    return `Schema Error: ${error.message}${issues}`;
  }

  if (error instanceof SecurityError) {
    return `Security Error: ${error.message}`;
  }

  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof IOError) {
    return `I/O Error: ${error.message}`;
  }

  if (error instanceof GovernanceError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

export function exitCodeFor(error: unknown): number {
  return error instanceof GovernanceError ? error.exitCode : EXIT_FAILURE;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Wrap a CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(fn: (...args: T) => void): (...args: T) => void {
  return (...args: T) => {
    try {
      fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * Print diagnostics, one per line, to stderr
 */
export function printDiagnostics(diagnostics: Diagnostic[]): void {
  for (const diagnostic of diagnostics) {
    console.error(`${diagnostic.severity === 'error' ? '✗' : '⚠'} ${formatDiagnostic(diagnostic)}`);
  }
}

/**
 * Report an operation result. A refused operation sets a failing exit code.
 */
export function reportResult(result: OperationResult, message: string): void {
  printDiagnostics(result.diagnostics);
  if (result.applied) {
    success(message);
  } else {
    process.exitCode = EXIT_FAILURE;
  }
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`ℹ ${message}`);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.warn(`⚠ ${message}`);
}
