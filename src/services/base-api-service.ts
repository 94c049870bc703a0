import { Logger } from '../util/logger';
import { AppError, ErrorHandler } from '../util/error-handler';
import { HttpClient } from '../util/http';

/**
 * Base API Service
 * Shared plumbing for the grid data feeds
 */
export abstract class BaseApiService {
  protected logger: Logger;
  protected errorHandler: ErrorHandler;
  protected http: HttpClient;

  /**
   * @param serviceName Name of the service for logging
   */
  constructor(
    protected readonly serviceName: string,
    http: HttpClient,
    logger: Logger
  ) {
    this.logger = logger;
    this.http = http;
    this.errorHandler = new ErrorHandler(this.logger);
  }

  protected logApiCall(method: string, endpoint: string, params?: Record<string, unknown>): void {
    this.logger.api(`${method} ${endpoint}`, {
      method,
      endpoint,
      params: params || null,
      service: this.serviceName
    });
  }

  /**
   * Wrap a failure with the service name so callers can tell feeds apart
   */
  protected createApiError(error: unknown, context?: Record<string, unknown>): AppError {
    return this.errorHandler.createAppError(error, {
      service: this.serviceName,
      ...context
    });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
