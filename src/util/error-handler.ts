/**
 * Error Handler Utility
 *
 * Standardized error categorisation and logging, plus the domain errors the
 * normalizer and scheduler raise.
 */

import { Logger } from './logger';

/**
 * Error categories for better error handling
 */
export enum ErrorCategory {
  NETWORK = 'NETWORK',
  AUTHENTICATION = 'AUTHENTICATION',
  VALIDATION = 'VALIDATION',
  API = 'API',
  DATA = 'DATA',
  SCHEDULING = 'SCHEDULING',
  INTERNAL = 'INTERNAL',
  UNKNOWN = 'UNKNOWN'
}

/**
 * Extended Error class with additional properties
 */
export class AppError extends Error {
  category: ErrorCategory;
  originalError?: unknown;
  context?: Record<string, unknown>;
  recoverable: boolean;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    originalError?: unknown,
    context?: Record<string, unknown>,
    recoverable: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.category = category;
    this.originalError = originalError;
    this.context = context;
    this.recoverable = recoverable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * No usable readings exist for a series on the requested date.
 */
export class DataUnavailableError extends AppError {
  readonly series: string;
  readonly date: string;

  constructor(series: string, date: string, originalError?: unknown) {
    super(`No ${series} data available for ${date}`, ErrorCategory.DATA, originalError, { series, date });
    this.name = 'DataUnavailableError';
    this.series = series;
    this.date = date;
  }
}

/**
 * A load's energy cannot fit inside its window at its per-slot limit.
 */
export class InfeasibleScheduleError extends AppError {
  readonly loadId: string;
  readonly shortfall: number;
  readonly capacity: number;

  constructor(loadId: string, shortfall: number, capacity: number) {
    super(
      `Load ${loadId} cannot be scheduled: ${shortfall.toFixed(3)} kWh short of its requirement (window capacity ${capacity.toFixed(3)} kWh)`,
      ErrorCategory.SCHEDULING,
      undefined,
      { loadId, shortfall, capacity }
    );
    this.name = 'InfeasibleScheduleError';
    this.loadId = loadId;
    this.shortfall = shortfall;
    this.capacity = capacity;
  }
}

/**
 * Malformed load definition or input series; raised before any computation.
 */
export class InvalidInputError extends AppError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message, ErrorCategory.VALIDATION, undefined, { field });
    this.name = 'InvalidInputError';
    this.field = field;
  }
}

export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

/**
 * Error handler utility class
 */
export class ErrorHandler {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Categorize an error based on its type or message
   */
  categorizeError(error: unknown): ErrorCategory {
    if (isAppError(error)) {
      return error.category;
    }

    if (!isError(error)) {
      return ErrorCategory.UNKNOWN;
    }

    const errorMessage = error.message.toLowerCase();

    if (
      errorMessage.includes('network') ||
      errorMessage.includes('timeout') ||
      errorMessage.includes('connection') ||
      errorMessage.includes('enotfound') ||
      errorMessage.includes('etimedout') ||
      errorMessage.includes('socket') ||
      errorMessage.includes('dns')
    ) {
      return ErrorCategory.NETWORK;
    }

    if (
      errorMessage.includes('unauthorized') ||
      errorMessage.includes('forbidden') ||
      errorMessage.includes('http 401') ||
      errorMessage.includes('http 403')
    ) {
      return ErrorCategory.AUTHENTICATION;
    }

    if (
      errorMessage.includes('validation') ||
      errorMessage.includes('invalid') ||
      errorMessage.includes('required') ||
      errorMessage.includes('missing')
    ) {
      return ErrorCategory.VALIDATION;
    }

    if (
      errorMessage.includes('api') ||
      errorMessage.includes('http') ||
      errorMessage.includes('status') ||
      errorMessage.includes('response')
    ) {
      return ErrorCategory.API;
    }

    if (
      errorMessage.includes('data') ||
      errorMessage.includes('parse') ||
      errorMessage.includes('json') ||
      errorMessage.includes('format')
    ) {
      return ErrorCategory.DATA;
    }

    return ErrorCategory.INTERNAL;
  }

  /**
   * Create a standardized AppError from any error
   */
  createAppError(
    error: unknown,
    context?: Record<string, unknown>,
    message?: string
  ): AppError {
    if (isAppError(error)) {
      if (context) {
        error.context = { ...error.context, ...context };
      }
      return error;
    }

    const category = this.categorizeError(error);
    const errorMessage = isError(error)
      ? message || error.message
      : message || String(error);

    return new AppError(
      errorMessage,
      category,
      error,
      context,
      category !== ErrorCategory.AUTHENTICATION
    );
  }

  /**
   * Log an error with a level chosen by its category
   */
  logError(
    error: unknown,
    context?: Record<string, unknown>,
    message?: string
  ): AppError {
    const appError = this.createAppError(error, context, message);

    const logContext = {
      category: appError.category,
      recoverable: appError.recoverable,
      ...(appError.context || {})
    };

    switch (appError.category) {
      case ErrorCategory.NETWORK:
        this.logger.warn(`Network Error: ${appError.message}`, logContext);
        break;
      case ErrorCategory.VALIDATION:
        this.logger.warn(`Validation Error: ${appError.message}`, logContext);
        break;
      case ErrorCategory.DATA:
      case ErrorCategory.SCHEDULING:
        this.logger.warn(`${appError.category} Error: ${appError.message}`, logContext);
        break;
      default:
        this.logger.error(`${appError.category} Error: ${appError.message}`, appError.originalError, logContext);
    }

    return appError;
  }
}
