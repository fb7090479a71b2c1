// Domain-specific error types for docgov

/**
 * Base error class for every fatal docgov error.
 * Business-rule violations are reported as diagnostics instead.
 */
export abstract class GovernanceError extends Error {
  abstract readonly code: string;
  /** Process exit code the CLI uses when this error aborts a command */
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Bad caller input to an operation
 */
export class ValidationError extends GovernanceError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 1;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * A stored record or config file is malformed or misses required fields
 */
export class SchemaError extends GovernanceError {
  readonly code = 'SCHEMA_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly file?: string, public readonly issues: string[] = []) {
    super(message, { file, issues });
  }
}

/**
 * Path traversal and similar unsafe input
 */
export class SecurityError extends GovernanceError {
  readonly code = 'SECURITY_ERROR';
  readonly exitCode = 3;
}

export class NotFoundError extends GovernanceError {
  readonly code = 'NOT_FOUND';
  readonly exitCode = 4;

  constructor(resourceType: string, public readonly id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * Filesystem failures while reading or writing the store
 */
export class IOError extends GovernanceError {
  readonly code = 'IO_ERROR';
  readonly exitCode = 5;

  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, { path, cause: cause instanceof Error ? cause.message : cause });
  }
}

/**
 * Narrow an unknown thrown value to a Node errno error
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
