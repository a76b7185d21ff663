/**
 * Error taxonomy for the federated query pipeline
 *
 * Only QueryInputError, PipelineCancelledError and ConfigurationError
 * ever reach the caller. Everything else is caught at its stage and
 * recorded against the source it belongs to.
 */

export type FederationErrorCode =
  | 'CLASSIFICATION_FAILED'
  | 'SCHEMA_VALIDATION_FAILED'
  | 'SQL_VALIDATION_FAILED'
  | 'QUERY_EXECUTION_FAILED'
  | 'QUERY_TIMEOUT'
  | 'TEXT_GENERATION_FAILED'
  | 'CIRCUIT_OPEN'
  | 'INVALID_QUERY_INPUT'
  | 'PIPELINE_CANCELLED'
  | 'INVALID_CONFIGURATION';

export class FederationError extends Error {
  constructor(
    public readonly code: FederationErrorCode,
    message: string,
    public readonly isOperational = true
  ) {
    super(message);
    this.name = 'FederationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ClassificationError extends FederationError {
  constructor(message: string) {
    super('CLASSIFICATION_FAILED', message);
    this.name = 'ClassificationError';
  }
}

export class SchemaValidationError extends FederationError {
  constructor(
    public readonly databaseId: string,
    public readonly databaseName: string,
    message: string
  ) {
    super('SCHEMA_VALIDATION_FAILED', message);
    this.name = 'SchemaValidationError';
  }
}

export class SqlValidationError extends FederationError {
  constructor(
    public readonly databaseId: string,
    public readonly errors: string[],
    /** The rejected statement, when one was produced */
    public readonly sql?: string
  ) {
    super('SQL_VALIDATION_FAILED', `SQL validation failed for ${databaseId}: ${errors.join('; ')}`);
    this.name = 'SqlValidationError';
  }
}

export class QueryExecutionError extends FederationError {
  constructor(
    public readonly databaseId: string,
    message: string
  ) {
    super('QUERY_EXECUTION_FAILED', message);
    this.name = 'QueryExecutionError';
  }
}

export class QueryTimeoutError extends FederationError {
  constructor(
    public readonly databaseId: string,
    public readonly timeoutMs: number
  ) {
    super('QUERY_TIMEOUT', `Query on ${databaseId} timed out after ${timeoutMs}ms`);
    this.name = 'QueryTimeoutError';
  }
}

export class TextGenerationError extends FederationError {
  constructor(
    message: string,
    public readonly providerErrors: string[] = []
  ) {
    super('TEXT_GENERATION_FAILED', message);
    this.name = 'TextGenerationError';
  }
}

export class CircuitBreakerOpenError extends FederationError {
  constructor(
    public readonly serviceName: string,
    public readonly remainingMs: number
  ) {
    super('CIRCUIT_OPEN', `Circuit breaker '${serviceName}' is open. Retry in ${Math.ceil(remainingMs / 1000)}s`);
    this.name = 'CircuitBreakerOpenError';
  }
}

/** The one failure that escapes the pipeline: input that cannot be tokenized */
export class QueryInputError extends FederationError {
  constructor(message: string) {
    super('INVALID_QUERY_INPUT', message, false);
    this.name = 'QueryInputError';
  }
}

export class PipelineCancelledError extends FederationError {
  constructor(stage: string) {
    super('PIPELINE_CANCELLED', `Pipeline cancelled during ${stage}`);
    this.name = 'PipelineCancelledError';
  }
}

export class ConfigurationError extends FederationError {
  constructor(
    message: string,
    public readonly problems: string[] = []
  ) {
    super('INVALID_CONFIGURATION', message, false);
    this.name = 'ConfigurationError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Throw PipelineCancelledError if the signal has fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(stage);
  }
}
