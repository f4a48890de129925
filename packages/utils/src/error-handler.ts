/**
 * Error Handler
 * =============
 * Centralized error logging and serialization.
 */

import { AppError, toError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  /** Nothing in this project retries on its own; callers decide. */
  shouldRetry: boolean;
}

/**
 * Plain, serializable description of an error, stored on failed records
 */
export interface ErrorRecord {
  name: string;
  message: string;
  code?: string;
  stack?: string;
  cause?: ErrorRecord;
}

/**
 * Handle and log error appropriately
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  const err = toError(error);

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    shouldRetry: false,
  };
}

export function describeError(error: unknown): ErrorRecord {
  const err = toError(error);
  const record: ErrorRecord = {
    name: err.name,
    message: err.message,
    stack: err.stack,
  };
  if (err instanceof AppError) {
    record.code = err.code;
  }
  if (err.cause !== undefined) {
    record.cause = describeError(err.cause);
  }
  return record;
}
