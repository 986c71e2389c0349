/**
 * Error types
 *
 * Every error surfaced to callers extends PplxQueryError, so a single
 * `instanceof` check separates library failures from anything else.
 */

export class PplxQueryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PplxQueryError";
  }
}

/**
 * Missing or invalid configuration. Raised at construction time only,
 * so no partially configured client ever exists.
 */
export class ConfigurationError extends PplxQueryError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * The request did not succeed: retries exhausted, a status that is not worth
 * retrying, or a network failure on the last attempt.
 */
export class RequestFailedError extends PplxQueryError {
  constructor(
    message: string,
    /** Last HTTP status, or null when no response was received */
    public readonly status: number | null,
    /** Total attempts made, initial attempt included */
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RequestFailedError";
  }
}

/**
 * A successful response whose body could not be turned into an answer.
 * Never retried.
 */
export class ResponseParseError extends PplxQueryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResponseParseError";
  }
}

/**
 * The caller's AbortSignal fired before the query completed.
 */
export class RequestAbortedError extends PplxQueryError {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RequestAbortedError";
  }
}
