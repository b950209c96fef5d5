/**
 * HTTP client utilities for making API requests
 */

/** Default per-request timeout in milliseconds */
const DEFAULT_TIMEOUT_MS = 10_000;

export interface HttpClientOptions {
  baseUrl?: string;
  headers?: Record<string, string>;
  timeout?: number;
}

type ParamValue = string | number | boolean | undefined;

export interface RequestOptions extends Omit<RequestInit, 'headers' | 'body' | 'method'> {
  headers?: Record<string, string>;
  /** Array values are sent as repeated keys (`?id=1&id=2`) */
  params?: Record<string, ParamValue | ParamValue[]>;
}

/**
 * Build URL with query parameters
 */
function buildUrl(baseUrl: string, path: string, params?: RequestOptions['params']): string {
  const url = baseUrl ? new URL(path, baseUrl) : new URL(path);

  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      const values = Array.isArray(value) ? value : [value];
      values.forEach((v) => {
        if (v !== undefined) {
          url.searchParams.append(key, String(v));
        }
      });
    });
  }

  return url.toString();
}

/**
 * Read a rate limit hint from the response headers, in milliseconds from now.
 *
 * Supports `Retry-After` (seconds) and `Ratelimit-Reset` (epoch seconds).
 */
export function parseRetryAfter(headers: Headers, now: number = Date.now()): number | undefined {
  const retryAfter = headers.get('retry-after');
  if (retryAfter && /^\d+$/.test(retryAfter.trim())) {
    return Number(retryAfter.trim()) * 1000;
  }

  const reset = headers.get('ratelimit-reset');
  if (reset && /^\d+$/.test(reset.trim())) {
    return Math.max(0, Number(reset.trim()) * 1000 - now);
  }

  return undefined;
}

function isJsonResponse(response: Response): boolean {
  const contentType = response.headers.get('content-type') ?? '';
  return /^application\/([\w.+-]+\+)?json\b/i.test(contentType.trim());
}

async function toHttpError(response: Response): Promise<HttpError> {
  return new HttpError(
    response.status,
    response.statusText,
    await response.text(),
    parseRetryAfter(response.headers)
  );
}

/**
 * Create an HTTP client with default options
 */
export function createHttpClient(options: HttpClientOptions = {}) {
  const { baseUrl = '', headers: defaultHeaders = {}, timeout = DEFAULT_TIMEOUT_MS } = options;

  return {
    /**
     * Make a GET request
     */
    async get<T>(path: string, requestOptions: RequestOptions = {}): Promise<T> {
      const { params, headers, ...fetchOptions } = requestOptions;
      const url = buildUrl(baseUrl, path, params);

      const response = await fetch(url, {
        method: 'GET',
        headers: {
          ...defaultHeaders,
          ...headers,
        },
        signal: AbortSignal.timeout(timeout),
        ...fetchOptions,
      });

      if (!response.ok) {
        throw await toHttpError(response);
      }

      return response.json() as Promise<T>;
    },

    /**
     * Make a POST request with a JSON body
     *
     * Returns null when the server answers without a JSON body (e.g. 204,
     * or a plain-text "ok").
     */
    async post<T>(path: string, body?: unknown, requestOptions: RequestOptions = {}): Promise<T | null> {
      const { params, headers, ...fetchOptions } = requestOptions;
      const url = buildUrl(baseUrl, path, params);

      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...defaultHeaders,
          ...headers,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeout),
        ...fetchOptions,
      });

      if (!response.ok) {
        throw await toHttpError(response);
      }

      const text = await response.text();
      return text && isJsonResponse(response) ? (JSON.parse(text) as T) : null;
    },

    /**
     * Make a POST request with a form-encoded body
     */
    async postForm<T>(path: string, form: Record<string, string>): Promise<T> {
      const url = buildUrl(baseUrl, path);

      const response = await fetch(url, {
        method: 'POST',
        headers: {
          ...defaultHeaders,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams(form).toString(),
        signal: AbortSignal.timeout(timeout),
      });

      if (!response.ok) {
        throw await toHttpError(response);
      }

      return response.json() as Promise<T>;
    },
  };
}

/**
 * Type for the HTTP client
 */
export type HttpClient = ReturnType<typeof createHttpClient>;

/**
 * HTTP error with status code and response body
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string,
    public readonly retryAfterMs?: number
  ) {
    super(`HTTP ${status} ${statusText}: ${body}`);
    this.name = 'HttpError';
  }

  /**
   * Check if error is a client error (4xx)
   */
  isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }

  /**
   * Check if error is a server error (5xx)
   */
  isServerError(): boolean {
    return this.status >= 500;
  }

  /**
   * Check if the credentials were rejected (401/403)
   */
  isAuthError(): boolean {
    return this.status === 401 || this.status === 403;
  }

  /**
   * Check if the request was rate limited (429)
   */
  isRateLimited(): boolean {
    return this.status === 429;
  }

  /**
   * Check if error is retryable (5xx or rate limited)
   */
  isRetryable(): boolean {
    return this.isServerError() || this.isRateLimited();
  }
}
