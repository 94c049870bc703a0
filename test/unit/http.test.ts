import fetch, { FetchError, Response } from 'node-fetch';
import { HttpError, RetryableError, buildUrl, createHttpClient } from '../../src/util/http';
import { ErrorCategory } from '../../src/util/error-handler';
import { createMockLogger } from '../mocks/logger.mock';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual('node-fetch');
  return { __esModule: true, ...actual, default: jest.fn() };
});
const mockedFetch = jest.mocked(fetch);

const BASE_URL = 'https://api.example.test/v1';

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'content-type': 'application/json' }
  });
}

describe('createHttpClient', () => {
  const logger = createMockLogger();
  const client = createHttpClient({ baseURL: BASE_URL, name: 'test', logger, maxRetries: 2, retryDelayMs: 0 });

  beforeEach(() => {
    mockedFetch.mockReset();
    jest.clearAllMocks();
  });

  test('parses JSON bodies and appends query params', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse({ results: [1, 2] }));

    const payload = await client.get('products/x/', { params: { period_from: '2025-01-15T00:00:00Z', skip: undefined } });

    expect(payload).toEqual({ results: [1, 2] });
    expect(mockedFetch).toHaveBeenCalledWith(
      'https://api.example.test/v1/products/x/?period_from=2025-01-15T00%3A00%3A00Z',
      expect.objectContaining({ method: 'GET' })
    );
    expect(logger.api).toHaveBeenCalledWith(
      'GET https://api.example.test/v1/products/x/?period_from=2025-01-15T00%3A00%3A00Z',
      { client: 'test' }
    );
  });

  test('returns text for other content types and null for empty bodies', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('plain', { status: 200, headers: { 'content-type': 'text/plain' } }));
    mockedFetch.mockResolvedValueOnce(new Response('', { status: 200 }));

    await expect(client.get('a')).resolves.toBe('plain');
    await expect(client.get('b')).resolves.toBeNull();
  });

  test('retries server errors and then succeeds', async () => {
    mockedFetch
      .mockResolvedValueOnce(jsonResponse({}, 503, 'Service Unavailable'))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));

    await expect(client.get('flaky')).resolves.toEqual({ ok: true });
    expect(mockedFetch).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('HTTP request failed (attempt 1/2), retrying in 0ms', {
      error: 'HTTP 503 Service Unavailable',
      status: 503
    });
  });

  test('gives up after the configured retries', async () => {
    mockedFetch.mockImplementation(async () => jsonResponse({}, 500, 'Internal Server Error'));

    const failure = client.get('down');
    await expect(failure).rejects.toBeInstanceOf(RetryableError);
    await expect(failure).rejects.toMatchObject({ message: 'HTTP 500 Internal Server Error', status: 500 });
    expect(mockedFetch).toHaveBeenCalledTimes(3);
  });

  test('does not retry client errors', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse({ detail: 'Not found.' }, 404, 'Not Found'));

    const failure = client.get('missing');
    await expect(failure).rejects.toBeInstanceOf(HttpError);
    await expect(failure).rejects.toMatchObject({
      status: 404,
      body: { detail: 'Not found.' },
      category: ErrorCategory.API
    });
    expect(mockedFetch).toHaveBeenCalledTimes(1);
  });

  test('marks auth failures as unrecoverable', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse({}, 401, 'Unauthorized'));

    await expect(client.get('secret')).rejects.toMatchObject({
      category: ErrorCategory.AUTHENTICATION,
      recoverable: false
    });
  });

  test('wraps network failures as retryable', async () => {
    mockedFetch.mockImplementation(async () => {
      throw new FetchError('connect ECONNREFUSED', 'system');
    });

    await expect(client.get('offline')).rejects.toMatchObject({
      name: 'RetryableError',
      message: 'Network error: connect ECONNREFUSED',
      category: ErrorCategory.NETWORK
    });
    expect(mockedFetch).toHaveBeenCalledTimes(3);
  });

  test('aborts requests that exceed the timeout', async () => {
    const impatient = createHttpClient({ baseURL: BASE_URL, name: 'slow', logger, timeoutMs: 5, maxRetries: 0 });
    mockedFetch.mockImplementation((_url, init) => new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => {
        const abort = new Error('The user aborted a request.');
        abort.name = 'AbortError';
        reject(abort);
      });
    }));

    await expect(impatient.get('slow')).rejects.toMatchObject({ message: 'Request timeout after 5ms' });
  });
});

describe('buildUrl', () => {
  test('joins paths onto the base and skips empty params', () => {
    expect(buildUrl('https://api.example.test', 'intensity/date/2025-01-15')).toBe(
      'https://api.example.test/intensity/date/2025-01-15'
    );
    expect(buildUrl(`${BASE_URL}/`, 'rates', { page: 2, empty: null })).toBe('https://api.example.test/v1/rates?page=2');
  });

  test('keeps absolute next links intact', () => {
    expect(buildUrl(BASE_URL, 'https://api.example.test/v1/rates?page=3')).toBe('https://api.example.test/v1/rates?page=3');
  });
});
