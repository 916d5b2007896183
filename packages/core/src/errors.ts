/**
 * Error hierarchy for Cardinal
 *
 * Every error raised by the stores, the cache and the aggregator extends
 * CardinalError, which carries a code for programmatic handling and an
 * optional cause.
 *
 * @example
 * ```typescript
 * try {
 *   await aggregator.getCardinalities(request);
 * } catch (error) {
 *   if (error instanceof TableNotFoundError) {
 *     // counter table was never created for this table
 *   } else if (error instanceof CardinalityLookupError) {
 *     error.errors.forEach((cause) => logger.error('lookup failed', cause));
 *   }
 * }
 * ```
 */

export type CardinalErrorCode =
  | 'UNKNOWN'
  | 'INVALID_ARGUMENT'
  | 'INVALID_CONFIG'
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'UNAVAILABLE'
  | 'CANCELLED'
  | 'SHUTDOWN'
  | 'LOOKUP_FAILED';

export class CardinalError extends Error {
  readonly code: CardinalErrorCode;
  override readonly cause?: unknown;

  constructor(message: string, code: CardinalErrorCode = 'UNKNOWN', options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CardinalError';
    this.code = code;
    this.cause = options?.cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * The backing counter store could not be reached or rejected the request
 */
export class StoreUnavailableError extends CardinalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'UNAVAILABLE', options);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * The counter table for a schema/table pair does not exist.
 * This is a configuration problem and is never retried.
 */
export class TableNotFoundError extends CardinalError {
  readonly table: string;

  constructor(table: string) {
    super(`Counter table ${table} does not exist`, 'NOT_FOUND');
    this.name = 'TableNotFoundError';
    this.table = table;
  }
}

export class TableExistsError extends CardinalError {
  readonly table: string;

  constructor(table: string) {
    super(`Counter table ${table} already exists`, 'ALREADY_EXISTS');
    this.name = 'TableExistsError';
    this.table = table;
  }
}

/**
 * The caller's abort signal fired while it was waiting for cardinalities
 */
export class InterruptedError extends CardinalError {
  constructor(message = 'Interrupted while waiting for cardinalities', options?: { cause?: unknown }) {
    super(message, 'CANCELLED', options);
    this.name = 'InterruptedError';
  }
}

/**
 * One or more column lookups failed; `errors` holds every underlying failure
 */
export class CardinalityLookupError extends CardinalError {
  readonly errors: readonly unknown[];

  constructor(message: string, errors: readonly unknown[]) {
    super(message, 'LOOKUP_FAILED', { cause: errors[0] });
    this.name = 'CardinalityLookupError';
    this.errors = errors;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors.map((error) => (error instanceof Error ? error.message : String(error))),
    };
  }
}

export class ExecutorShutdownError extends CardinalError {
  constructor(message = 'Executor has been shut down') {
    super(message, 'SHUTDOWN');
    this.name = 'ExecutorShutdownError';
  }
}

export class InvalidVisibilityError extends CardinalError {
  readonly expression: string;

  constructor(expression: string, reason: string) {
    super(`Invalid visibility expression '${expression}': ${reason}`, 'INVALID_ARGUMENT');
    this.name = 'InvalidVisibilityError';
    this.expression = expression;
  }
}

export class ConfigError extends CardinalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INVALID_CONFIG', options);
    this.name = 'ConfigError';
  }
}
