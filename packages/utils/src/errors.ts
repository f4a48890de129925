/**
 * Custom Error Classes
 * ====================
 * Standardized error classes shared by every package.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: ErrorContext,
    isOperational: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Not found error - for missing entities
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string | number, context?: ErrorContext) {
    const message =
      identifier !== undefined
        ? `${resource} with identifier '${identifier}' not found`
        : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Configuration error - raised before any work starts
 */
export class ConfigurationError extends AppError {
  public readonly configKey?: string;

  constructor(message: string, configKey?: string, context?: ErrorContext, code: string = 'CONFIGURATION_ERROR') {
    super(message, code, 500, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * A column/dtype filter that matched nothing or referenced something unavailable
 */
export class FilterError extends ConfigurationError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, configKey, context, 'FILTER_ERROR');
  }
}

/**
 * A transformer fit was attempted on a split that is not the fit split.
 * Always a programming defect, never retried.
 */
export class LeakageGuardViolation extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'LEAKAGE_GUARD_VIOLATION', 500, context, false);
  }
}

/**
 * Anything thrown by a user-supplied training callable
 */
export class JobExecutionError extends AppError {
  public readonly jobKey: string;

  constructor(message: string, jobKey: string, cause?: unknown, context?: ErrorContext) {
    super(message, 'JOB_EXECUTION_ERROR', 500, { jobKey, ...context }, true, { cause });
    this.jobKey = jobKey;
  }
}

/**
 * Split tensors requested for a (pipeline, fold, split) never materialized
 */
export class CacheMissError extends AppError {
  constructor(key: string, context?: ErrorContext) {
    super(`No materialized split for key '${key}'`, 'CACHE_MISS', 404, { key, ...context });
  }
}

/**
 * Split tensors requested after the pipeline's configuration changed
 */
export class StaleCacheError extends AppError {
  constructor(key: string, expectedHash: string, actualHash: string, context?: ErrorContext) {
    super(`Cached split for key '${key}' is stale`, 'STALE_CACHE', 409, {
      key,
      expectedHash,
      actualHash,
      ...context,
    });
  }
}

/**
 * Illegal job lifecycle transition
 */
export class InvalidStateError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'INVALID_STATE', 409, context, false);
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
