/**
 * Error classes and structured error logging for the capturer dashboard
 */

/**
 * Base error class for domain errors
 */
export class CapturerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CapturerError';
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigError extends CapturerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/**
 * SQLite access errors
 */
export class DatabaseError extends CapturerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DATABASE_ERROR', context);
    this.name = 'DatabaseError';
  }
}

/**
 * Rejected client input (HTTP 400)
 */
export class ValidationError extends CapturerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends CapturerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends CapturerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFLICT', context);
    this.name = 'ConflictError';
  }
}

/**
 * Request body in a media type the API does not read (HTTP 415)
 */
export class UnsupportedMediaTypeError extends CapturerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'UNSUPPORTED_MEDIA_TYPE', context);
    this.name = 'UnsupportedMediaTypeError';
  }
}

/**
 * HTTP status for an error raised while serving a request
 */
export function statusForError(error: unknown): number {
  if (error instanceof ValidationError) {
    return 400;
  }
  if (error instanceof NotFoundError) {
    return 404;
  }
  if (error instanceof ConflictError) {
    return 409;
  }
  if (error instanceof UnsupportedMediaTypeError) {
    return 415;
  }
  return 500;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

/**
 * Log structured error
 */
export function logError(error: Error, context?: Record<string, unknown>): void {
  const errorData: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
    timestamp: new Date().toISOString(),
    ...context,
  };

  if (error instanceof CapturerError) {
    errorData.code = error.code;
    errorData.context = error.context;
  }

  console.error('Error occurred:', JSON.stringify(errorData, null, 2));
}
