/**
 * Custom Error Classes for tagfill
 *
 * Categorized error types for each processing step, used for structured
 * logging and the one-line detail printed for failed files.
 */

/**
 * Error categories matching the processing steps.
 */
export type ErrorCategory = 'FileReadError' | 'APIError' | 'WriteError' | 'ConfigError';

/** Context shared by every PipelineError constructor */
export interface PipelineErrorOptions {
  filePath?: string;
  step?: string;
  cause?: Error;
}

/**
 * Base class for all tagfill errors.
 * Extends the native Error class with additional context fields.
 */
export class PipelineError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** The file being processed when the error occurred (if applicable) */
  readonly filePath: string | null;
  /** The processing step where the error occurred */
  readonly step: string;
  /** The original error that caused this error (if wrapping) */
  override readonly cause: Error | null;
  /** Timestamp when the error was created */
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: PipelineErrorOptions) {
    super(message);
    this.name = category;
    this.category = category;
    this.filePath = options?.filePath ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    // Ensure prototype chain works correctly
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a structured object representation of the error for logging.
   */
  toLogObject(): {
    category: ErrorCategory;
    message: string;
    filePath: string | null;
    step: string;
    timestamp: string;
    stack: string | undefined;
    cause: string | null;
  } {
    return {
      category: this.category,
      message: this.message,
      filePath: this.filePath,
      step: this.step,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message ?? null,
    };
  }

  /**
   * Returns a user-friendly error message (no stack traces).
   */
  toUserMessage(): string {
    const fileInfo = this.filePath ? ` [${this.filePath}]` : '';
    return `${this.category}${fileInfo}: ${this.message}`;
  }
}

/**
 * Error thrown when opening or parsing a file's tag store fails.
 * Examples: file not found, corrupt ID3 header, permission denied.
 */
export class FileReadError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'FileReadError', {
      step: 'reading',
      ...options,
    });
  }
}

/**
 * Error thrown when an external lookup fails for good: a non-transient
 * status, or a transient one that outlasted every retry.
 */
export class APIError extends PipelineError {
  /** HTTP status code (null for transport failures) */
  readonly statusCode: number | null;
  /** Name of the service or URL that failed */
  readonly service: string | null;

  constructor(
    message: string,
    options?: PipelineErrorOptions & {
      statusCode?: number;
      service?: string;
    },
  ) {
    super(message, 'APIError', {
      step: 'api_call',
      ...options,
    });
    this.statusCode = options?.statusCode ?? null;
    this.service = options?.service ?? null;
  }

  override toLogObject(): ReturnType<PipelineError['toLogObject']> & {
    statusCode: number | null;
    service: string | null;
  } {
    return {
      ...super.toLogObject(),
      statusCode: this.statusCode,
      service: this.service,
    };
  }
}

/**
 * Error thrown when persisting tags fails.
 * Examples: permission denied, disk full, tag serialization failure.
 */
export class WriteError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'WriteError', {
      step: 'writing',
      ...options,
    });
  }
}

/**
 * Error raised for operator input that makes the run impossible,
 * such as a missing target directory. Fatal before dispatch.
 */
export class ConfigError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'ConfigError', {
      step: 'configuration',
      ...options,
    });
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Wraps a generic error in the appropriate PipelineError category.
 * If the error is already a PipelineError, it is returned as-is.
 *
 * @param error - The error to wrap
 * @param category - The error category to use
 * @param options - Additional context
 */
export function wrapError(
  error: unknown,
  category: ErrorCategory,
  options?: {
    filePath?: string;
    step?: string;
  },
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';

  switch (category) {
    case 'FileReadError':
      return new FileReadError(message, { ...options, cause });
    case 'APIError':
      return new APIError(message, { ...options, cause });
    case 'WriteError':
      return new WriteError(message, { ...options, cause });
    case 'ConfigError':
      return new ConfigError(message, { ...options, cause });
  }
}
