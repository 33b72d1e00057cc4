// Unit of Work error types

/**
 * Base class for all Unit of Work errors.
 * The storage driver's original error, when there is one, is kept as `cause`.
 */
export class UnitOfWorkError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnitOfWorkError';
    this.code = code;
  }
}

/**
 * An operation was invoked outside a valid open scope.
 * Always a programming error; never retried.
 */
export class ScopeMisuseError extends UnitOfWorkError {
  readonly operation: string;

  constructor(operation: string, reason: string) {
    super('SCOPE_MISUSE', `Cannot ${operation}: ${reason}`);
    this.name = 'ScopeMisuseError';
    this.operation = operation;
  }
}

/**
 * The underlying resource could not be obtained or its transaction begun.
 */
export class AcquireError extends UnitOfWorkError {
  constructor(cause: unknown) {
    super('ACQUIRE_FAILED', `Failed to open unit of work: ${describe(cause)}`, { cause });
    this.name = 'AcquireError';
  }
}

/**
 * Storage rejected the transaction. The scope stays uncommitted, so
 * release() rolls it back.
 */
export class CommitError extends UnitOfWorkError {
  constructor(cause: unknown) {
    super('COMMIT_FAILED', `Commit failed: ${describe(cause)}`, { cause });
    this.name = 'CommitError';
  }
}

/**
 * Rollback itself failed. Secondary: never replaces a failure already
 * propagating from the scope body.
 */
export class RollbackError extends UnitOfWorkError {
  constructor(cause: unknown) {
    super('ROLLBACK_FAILED', `Rollback failed: ${describe(cause)}`, { cause });
    this.name = 'RollbackError';
  }
}

/**
 * Closing the underlying connection failed. Secondary, like RollbackError.
 */
export class ResourceDisposalError extends UnitOfWorkError {
  constructor(cause: unknown) {
    super('DISPOSE_FAILED', `Failed to close connection: ${describe(cause)}`, { cause });
    this.name = 'ResourceDisposalError';
  }
}

export function isUnitOfWorkError(error: unknown): error is UnitOfWorkError {
  return error instanceof UnitOfWorkError;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
