export { EndpointMaximum, HelixHeader, PageParam, Twitch } from './core/Constants';
export { GameSchema, PageEnvelopeSchema, PaginationSchema, StreamSchema } from './core/Schemas';
export { encodeHeaderValue, HTTP_METHODS, isHeaderValue, normalizeMethod, pageCount, pageSize } from './helpers/HelixHelper';
export { HelixClient } from './lib/HelixClient';
export {
  DeserializationFailedError,
  HelixApiLayer,
  HelixApiTag,
  InvalidHeaderValueError,
  InvalidMethodError,
  InvalidPageRequestError,
  makeHeaders,
  makeHelixApi,
  MalformedPaginationEnvelopeError,
  PaginationExhaustedError,
  RequestFailedError,
  UnsuccessfulStatusError,
} from './services/HelixApi';
export { HttpClientError, HttpClientLayer, HttpClientTag, USER_AGENT } from './structures/HttpClient';
export { LoggerClientLayer, makeLoggerClient } from './structures/LoggerClient';

export type { Game, PageEnvelope, Pagination, Stream } from './core/Schemas';
export type { HttpMethod } from './helpers/HelixHelper';
export type { HelixClientOptions } from './lib/HelixClient';
export type {
  HelixApi,
  HelixApiError,
  HelixApiOptions,
  HelixHeaders,
  HelixQueryError,
  PaginateOptions,
  QueryParams,
} from './services/HelixApi';
export type { DefaultOptions, HttpClient, HttpResponse } from './structures/HttpClient';
export type { LoggerOptions } from './structures/LoggerClient';
