import { Context, Data, Effect, Layer, Predicate, Schedule } from 'effect';
import got from 'got';
import UserAgent from 'user-agents';

import type { IncomingHttpHeaders } from 'node:http';
import type { Got, Options } from 'got';

/**
 * Represents errors occurring during HTTP requests.
 */
export class HttpClientError extends Data.TaggedError('HttpClientError')<{
  readonly message: string;
  readonly code?: string;
  readonly status?: number;
  readonly cause?: unknown;
}> {}

/**
 * List of network error codes that are considered retryable.
 */
export const ERROR_CODES: readonly string[] = [
  'EADDRINUSE',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'ENETUNREACH',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ERR_CANCELED',
  'ECONNABORTED',
  'UND_ERR_CONNECT_TIMEOUT',
];

/**
 * List of HTTP status codes that are considered retryable.
 */
export const ERROR_STATUS_CODES: readonly number[] = [408, 413, 429, 500, 502, 503, 504, 521, 522, 524];

/**
 * Request options, compatible with `got`. The body is always read as text.
 */
export interface DefaultOptions extends Omit<Options, 'prefixUrl' | 'retry' | 'timeout' | 'resolveBodyOnly' | 'isStream' | 'responseType'> {
  readonly retry?: number;
  /** Sends a random desktop browser user agent instead of {@link USER_AGENT}. */
  readonly randomUserAgent?: boolean;
  readonly timeout?: Partial<{
    readonly initial: number;
    readonly transmission: number;
    readonly total: number;
  }>;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly headers: IncomingHttpHeaders;
  readonly body: string;
}

/**
 * Interface defining the HTTP client service.
 */
export interface HttpClient {
  readonly request: (options: string | DefaultOptions) => Effect.Effect<HttpResponse, HttpClientError>;
}

/**
 * Context tag for the HttpClient service.
 */
export class HttpClientTag extends Context.Tag('@structures/HttpClient')<HttpClientTag, HttpClient>() {}

export const USER_AGENT = 'helix-pager';

const gotInstance: Got = got.bind(got);

/**
 * Determines if an error is a timeout exception.
 */
export const isErrorTimeout = (error: unknown): boolean =>
  (Predicate.hasProperty(error, '_tag') && error._tag === 'TimeoutException') ||
  (Predicate.hasProperty(error, 'code') && error.code === 'ETIMEDOUT');

export const isRetryable = (error: HttpClientError): boolean => {
  const isNetworkError = !!error.code && ERROR_CODES.includes(error.code);
  const isRetryableStatus = !!error.status && ERROR_STATUS_CODES.includes(error.status);
  return isNetworkError || isRetryableStatus || isErrorTimeout(error);
};

const statusCodeOf = (error: unknown): number | undefined =>
  Predicate.hasProperty(error, 'response') &&
  Predicate.hasProperty(error.response, 'statusCode') &&
  typeof error.response.statusCode === 'number'
    ? error.response.statusCode
    : undefined;

/**
 * Executes an HTTP request with optional retries and timeout management.
 *
 * @param options - Request options or a URL string.
 * @returns An Effect that resolves to the status, headers and text body.
 */
const requestFn = (options: string | DefaultOptions): Effect.Effect<HttpResponse, HttpClientError> =>
  Effect.gen(function* () {
    const payload: DefaultOptions = typeof options === 'string' ? { url: options } : options;
    const { retry: retryCount = 3, timeout = {}, randomUserAgent = false, ...rest } = payload;
    const { initial = 10_000, transmission = 30_000, total = 60_000 } = timeout;
    const userAgent = randomUserAgent ? new UserAgent({ deviceCategory: 'desktop' }).toString() : USER_AGENT;

    const response = yield* Effect.tryPromise({
      try: (signal) => {
        const promise = gotInstance({
          http2: true,
          ...rest,
          headers: { 'user-agent': userAgent, ...rest.headers },
          retry: 0,
          timeout: {
            lookup: initial,
            connect: initial,
            secureConnect: initial,
            socket: transmission,
            response: transmission,
            send: transmission,
            request: total,
          },
          responseType: 'text',
          resolveBodyOnly: false,
        });

        signal.addEventListener('abort', () => promise.cancel(), { once: true });
        return promise;
      },
      catch: (error) =>
        new HttpClientError({
          message: error instanceof Error && error.message ? error.message : 'Request failed',
          code: Predicate.hasProperty(error, 'code') && typeof error.code === 'string' ? error.code : undefined,
          status: statusCodeOf(error),
          cause: error,
        }),
    }).pipe(
      Effect.retry({
        while: isRetryable,
        schedule: retryCount < 0 ? Schedule.forever : Schedule.recurs(retryCount),
      }),
    );

    return { statusCode: response.statusCode, headers: response.headers, body: response.body };
  });

/**
 * Helper to execute an HTTP request using the HttpClient service from the environment.
 */
export const request = (options: string | DefaultOptions) => Effect.flatMap(HttpClientTag, (service) => service.request(options));

/**
 * Layer providing the got backed HttpClient service.
 */
export const HttpClientLayer: Layer.Layer<HttpClientTag> = Layer.succeed(HttpClientTag, HttpClientTag.of({ request: requestFn }));
