/** Base class for failures that map onto an HTTP status and a stable error code. */
export class AnalyzerError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Request body or query parameters failed validation. */
export class ValidationError extends AnalyzerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'validation_failed', 400, details);
  }
}

export class NotFoundError extends AnalyzerError {
  constructor(message = 'String does not exist in the system') {
    super(message, 'not_found', 404);
  }
}

/**
 * The backing store could not be read or written. The request fails and the
 * stored document is left untouched.
 */
export class StorageError extends AnalyzerError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, 'storage_failed', 500, options?.details);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export interface ErrorResponse {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}
