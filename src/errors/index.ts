/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the review pipeline. Only a few of these are
 * ever allowed to end a run:
 *
 * - CONFIGURATION: a required key is missing at startup
 * - DEPENDENCY: the shared context could not be produced, or a provider call failed
 * - PERSISTENCE: an artifact could not be written
 *
 * Everything the extractor and coercion layer can repair never becomes an error.
 *
 * @example
 * ```typescript
 * throw new PersistenceError(
 *   'Failed to write candidate_loop2.json',
 *   'outputs/run-1/candidate_loop2.json',
 *   'write',
 *   err,
 * );
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** May resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Will not resolve on retry (auth, bad request) */
  PERMANENT = 'PERMANENT',

  /** Invalid input */
  VALIDATION = 'VALIDATION',

  /** Missing or invalid configuration */
  CONFIGURATION = 'CONFIGURATION',

  /** An external collaborator failed or returned nothing usable */
  DEPENDENCY = 'DEPENDENCY',

  /** Artifact storage failed */
  PERSISTENCE = 'PERSISTENCE',

  /** Unexpected internal failure */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all pipeline errors.
 */
export class PipelineError extends Error {
  readonly category: ErrorCategory;

  /** Whether the error may resolve on retry */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'PipelineError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Missing or invalid configuration. Raised at startup, before any
 * collaborator is called.
 */
export class ConfigurationError extends PipelineError {
  /** Keys that were missing or invalid */
  readonly keys: string[];

  constructor(message: string, keys: string[] = []) {
    super(message, ErrorCategory.CONFIGURATION, false, { keys });
    this.name = 'ConfigurationError';
    this.keys = keys;
  }

  static missing(keys: string[]): ConfigurationError {
    return new ConfigurationError(
      `Missing required environment variable${keys.length === 1 ? '' : 's'}: ${keys.join(', ')}`,
      keys,
    );
  }
}

/**
 * The shared context for a run could not be produced. Fatal, never retried.
 */
export class InitializationError extends PipelineError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCategory.DEPENDENCY, false, { stage: 'init' }, cause);
    this.name = 'InitializationError';
  }
}

/**
 * Artifact storage failure. Aborts the run.
 */
export class PersistenceError extends PipelineError {
  readonly path: string;

  /** read | write | list */
  readonly operation: string;

  constructor(message: string, path: string, operation: string, cause?: Error) {
    super(message, ErrorCategory.PERSISTENCE, false, { path, operation }, cause);
    this.name = 'PersistenceError';
    this.path = path;
    this.operation = operation;
  }
}

export type ProviderErrorCode =
  | 'NOT_CONFIGURED'
  | 'AUTHENTICATION_FAILED'
  | 'RATE_LIMITED'
  | 'CONTEXT_LENGTH_EXCEEDED'
  | 'INVALID_REQUEST'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'UNKNOWN';

/**
 * Error from an LLM provider call.
 */
export class ProviderError extends PipelineError {
  readonly providerName: string;
  readonly code: ProviderErrorCode;
  readonly statusCode?: number;

  constructor(
    message: string,
    providerName: string,
    code: ProviderErrorCode,
    statusCode?: number,
    cause?: Error,
  ) {
    const transient = code === 'RATE_LIMITED' || code === 'SERVER_ERROR' || code === 'NETWORK_ERROR';
    super(
      message,
      transient ? ErrorCategory.TRANSIENT : ErrorCategory.PERMANENT,
      transient,
      { provider: providerName, code, statusCode },
      cause,
    );
    this.name = 'ProviderError';
    this.providerName = providerName;
    this.code = code;
    this.statusCode = statusCode;
  }

  /**
   * Map an HTTP status (and body) to a provider error.
   */
  static fromStatus(providerName: string, status: number, body: string): ProviderError {
    let code: ProviderErrorCode = 'UNKNOWN';

    if (status === 401 || status === 403) code = 'AUTHENTICATION_FAILED';
    else if (status === 429) code = 'RATE_LIMITED';
    else if (status === 400) {
      code =
        body.includes('context_length') || body.includes('maximum context length')
          ? 'CONTEXT_LENGTH_EXCEEDED'
          : 'INVALID_REQUEST';
    } else if (status === 404) code = 'INVALID_REQUEST';
    else if (status >= 500) code = 'SERVER_ERROR';

    return new ProviderError(
      `${providerName} API error (${status}): ${body.slice(0, 500)}`,
      providerName,
      code,
      status,
    );
  }
}

/**
 * Invalid input at a boundary (request body, input file).
 */
export class ValidationError extends PipelineError {
  readonly fields: string[];

  constructor(message: string, fields: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  static fromZodError(error: {
    issues: Array<{ path: (string | number)[]; message: string }>;
  }): ValidationError {
    const fields = error.issues.map((i) => i.path.join('.'));
    const messages = error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
    );
    return new ValidationError(`Validation failed: ${messages.join(', ')}`, fields);
  }
}

/**
 * The post-loop document export failed. Logged, never fatal.
 */
export class ConversionError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCategory.DEPENDENCY, false, context, cause);
    this.name = 'ConversionError';
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Determine error category from a generic error.
 */
export function categorizeError(error: Error): {
  category: ErrorCategory;
  recoverable: boolean;
} {
  const message = error.message.toLowerCase();
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

  if (
    code === 'ETIMEDOUT' ||
    code === 'ECONNRESET' ||
    code === 'ECONNREFUSED' ||
    code === 'ENOTFOUND' ||
    message.includes('timeout') ||
    message.includes('socket hang up') ||
    message.includes('network error')
  ) {
    return { category: ErrorCategory.TRANSIENT, recoverable: true };
  }

  if (code === 'EACCES' || code === 'EROFS' || code === 'ENOSPC' || code === 'EISDIR') {
    return { category: ErrorCategory.PERSISTENCE, recoverable: false };
  }

  if (
    message.includes('unauthorized') ||
    message.includes('forbidden') ||
    message.includes('401') ||
    message.includes('403')
  ) {
    return { category: ErrorCategory.PERMANENT, recoverable: false };
  }

  if (message.includes('invalid') || message.includes('validation')) {
    return { category: ErrorCategory.VALIDATION, recoverable: false };
  }

  return { category: ErrorCategory.INTERNAL, recoverable: false };
}

/**
 * Wrap an unknown thrown value as a PipelineError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const { category, recoverable } = categorizeError(err);

  return new PipelineError(err.message, category, recoverable, context, err);
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Format error for display to a user (one line).
 */
export function formatError(error: unknown): string {
  if (error instanceof PipelineError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof PipelineError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
