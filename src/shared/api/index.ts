/**
 * Shared API utilities
 */
export {
  createHttpClient,
  parseRetryAfter,
  HttpError,
  type HttpClient,
  type HttpClientOptions,
  type RequestOptions,
} from './http-client';
