import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { AppError, ErrorCategory } from './error-handler';
import { Logger, createFallbackLogger } from './logger';

type Primitive = string | number | boolean | null | undefined;

export interface HttpClientOptions {
  baseURL: string;
  name: string;
  headers?: Record<string, string>;
  logger?: Logger;
  timeoutMs?: number;
  maxRetries?: number;
  /** Base delay for exponential backoff between retries */
  retryDelayMs?: number;
}

export interface RequestOptions {
  params?: Record<string, Primitive>;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpClient {
  /** Resolves with the parsed JSON body, or the raw text for other content types */
  get(path: string, options?: RequestOptions): Promise<unknown>;
}

export class RetryableError extends AppError {
  constructor(
    message: string,
    public readonly retryAfterMs: number | null,
    public readonly status?: number
  ) {
    super(message, status === undefined ? ErrorCategory.NETWORK : ErrorCategory.API, undefined, { status });
    this.name = 'RetryableError';
  }
}

export class HttpError extends AppError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: unknown
  ) {
    super(
      message,
      status === 401 || status === 403 ? ErrorCategory.AUTHENTICATION : ErrorCategory.API,
      undefined,
      { status },
      status !== 401 && status !== 403
    );
    this.name = 'HttpError';
  }
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  const {
    baseURL,
    name,
    headers = {},
    logger: providedLogger,
    timeoutMs = 30_000,
    maxRetries = 3,
    retryDelayMs = 1000
  } = options;

  const logger = providedLogger ?? createFallbackLogger(`HTTP:${name}`);

  return {
    get: async (path, requestOptions = {}) => {
      const url = buildUrl(baseURL, path, requestOptions.params);
      logger.api(`GET ${url}`, { client: name });
      return requestWithRetries(
        () => performFetch(url, 'GET', headers, requestOptions, timeoutMs),
        maxRetries,
        retryDelayMs,
        logger
      );
    }
  };
}

async function requestWithRetries<T>(
  fn: () => Promise<T>,
  maxRetries: number,
  retryDelayMs: number,
  logger: Logger
): Promise<T> {
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= maxRetries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      attempt += 1;

      if (!(error instanceof RetryableError) || attempt > maxRetries) {
        break;
      }

      const backoffBase = error.retryAfterMs ?? retryDelayMs * Math.pow(2, attempt - 1);
      const jitter = backoffBase * (0.5 + Math.random() * 0.5);
      const waitMs = Math.min(30_000, Math.round(jitter));

      logger.warn(`HTTP request failed (attempt ${attempt}/${maxRetries}), retrying in ${waitMs}ms`, {
        error: error.message,
        status: error.status
      });

      await new Promise((resolve) => setTimeout(resolve, waitMs));
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`HTTP request failed after ${attempt} attempts`);
}

async function performFetch(
  url: string,
  method: string,
  defaultHeaders: Record<string, string>,
  options: RequestOptions,
  timeoutMs: number
): Promise<unknown> {
  const init: RequestInit = {
    method,
    headers: {
      Accept: 'application/json',
      ...defaultHeaders,
      ...(options.headers ?? {})
    }
  };

  const controller = new AbortController();
  const timeout = options.timeoutMs ?? timeoutMs;
  const timeoutHandle = setTimeout(() => controller.abort(), timeout);
  init.signal = controller.signal;

  try {
    const response = await fetch(url, init);
    return await parseResponse(response);
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new RetryableError(`Request timeout after ${timeout}ms`, null);
    }
    if (error instanceof FetchError) {
      throw new RetryableError(`Network error: ${error.message}`, null);
    }
    throw error;
  } finally {
    clearTimeout(timeoutHandle);
  }
}

async function parseResponse(response: Response): Promise<unknown> {
  const text = await response.text();
  const contentType = response.headers.get('content-type') || '';
  const payload = text.length > 0 && contentType.includes('json')
    ? safeParseJson(text)
    : text.length > 0
      ? text
      : null;

  if (response.ok) {
    return payload;
  }

  const message = `HTTP ${response.status} ${response.statusText}`;

  if (isRetryableStatus(response.status)) {
    throw new RetryableError(message, parseRetryAfter(response), response.status);
  }

  throw new HttpError(message, response.status, payload);
}

function safeParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function buildUrl(baseURL: string, path: string, params?: Record<string, Primitive>): string {
  const url = new URL(path, ensureTrailingSlash(baseURL));
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value === null || value === undefined) continue;
      url.searchParams.append(key, String(value));
    }
  }
  return url.toString();
}

function ensureTrailingSlash(baseURL: string): string {
  return baseURL.endsWith('/') ? baseURL : `${baseURL}/`;
}

function parseRetryAfter(response: Response): number | null {
  const header = response.headers.get('retry-after');
  if (!header) return null;

  const delaySeconds = Number.parseFloat(header);
  if (Number.isFinite(delaySeconds)) {
    return Math.max(0, delaySeconds * 1000);
  }

  const retryDate = new Date(header);
  if (!Number.isNaN(retryDate.getTime())) {
    const diff = retryDate.getTime() - Date.now();
    return diff > 0 ? diff : 0;
  }

  return null;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}
