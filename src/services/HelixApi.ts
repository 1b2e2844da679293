import chalk from 'chalk';
import { Context, Data, Effect, Layer, Option, ParseResult, Schema } from 'effect';

import { EndpointMaximum, HelixHeader, PageParam, Twitch } from '../core/Constants';
import { GameSchema, PageEnvelopeSchema, StreamSchema } from '../core/Schemas';
import { encodeHeaderValue, isPageRequestValid, joinUrl, normalizeMethod, pageCount, pageSize } from '../helpers/HelixHelper';
import { HttpClientTag } from '../structures/HttpClient';

import type { Game, Stream } from '../core/Schemas';
import type { HttpClient } from '../structures/HttpClient';

export class InvalidMethodError extends Data.TaggedError('InvalidMethodError')<{
  readonly message: string;
  readonly method: string;
}> {}

export class InvalidHeaderValueError extends Data.TaggedError('InvalidHeaderValueError')<{
  readonly message: string;
  readonly header: string;
}> {}

export class RequestFailedError extends Data.TaggedError('RequestFailedError')<{
  readonly message: string;
  readonly code?: string;
  readonly cause?: unknown;
}> {}

export class UnsuccessfulStatusError extends Data.TaggedError('UnsuccessfulStatusError')<{
  readonly message: string;
  readonly status: number;
}> {}

export class DeserializationFailedError extends Data.TaggedError('DeserializationFailedError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class MalformedPaginationEnvelopeError extends Data.TaggedError('MalformedPaginationEnvelopeError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class InvalidPageRequestError extends Data.TaggedError('InvalidPageRequestError')<{
  readonly message: string;
  readonly count: number;
  readonly endpointMaximum: number;
}> {}

/**
 * Raised when the upstream runs out of items before `requested` were collected.
 * `items` holds everything decoded up to that point, in order.
 */
export class PaginationExhaustedError<A = unknown> extends Data.TaggedError('PaginationExhaustedError')<{
  readonly message: string;
  readonly requested: number;
  readonly items: ReadonlyArray<A>;
}> {}

export type HelixQueryError =
  | InvalidMethodError
  | InvalidHeaderValueError
  | RequestFailedError
  | UnsuccessfulStatusError
  | DeserializationFailedError;

export type HelixApiError<A = unknown> =
  | HelixQueryError
  | MalformedPaginationEnvelopeError
  | InvalidPageRequestError
  | PaginationExhaustedError<A>;

export type HelixHeaders = Readonly<Record<string, string>>;

export type QueryParams = ReadonlyArray<readonly [string, string]>;

export interface PaginateOptions<A, I> {
  readonly method: string;
  readonly endpoint: string;
  readonly schema: Schema.Schema<A, I>;
  readonly params?: QueryParams;
  readonly endpointMaximum: number;
  readonly count: number;
}

export interface HelixApiOptions {
  readonly clientId: string;
  readonly baseUrl?: string;
}

export interface HelixApi {
  readonly headers: Effect.Effect<HelixHeaders, InvalidHeaderValueError>;
  readonly query: <A, I>(method: string, endpoint: string, schema: Schema.Schema<A, I>, params?: QueryParams) => Effect.Effect<A, HelixQueryError>;
  readonly paginate: <A, I>(options: PaginateOptions<A, I>) => Effect.Effect<ReadonlyArray<A>, HelixApiError<A>>;
  readonly streams: (count: number) => Effect.Effect<ReadonlyArray<Stream>, HelixApiError<Stream>>;
  readonly topGames: (count: number) => Effect.Effect<ReadonlyArray<Game>, HelixApiError<Game>>;
}

export class HelixApiTag extends Context.Tag('@services/HelixApi')<HelixApiTag, HelixApi>() {}

/**
 * Builds the headers every Helix request carries.
 *
 * @param clientId - Application client id from the Twitch developer console.
 */
export const makeHeaders = (clientId: string): Effect.Effect<HelixHeaders, InvalidHeaderValueError> =>
  Option.match(encodeHeaderValue(clientId), {
    onNone: () =>
      Effect.fail(
        new InvalidHeaderValueError({
          message: `Client id cannot be sent in the ${HelixHeader.ClientId} header`,
          header: HelixHeader.ClientId,
        }),
      ),
    onSome: (value) => Effect.succeed({ [HelixHeader.ClientId]: value }),
  });

const formatParseError = (error: ParseResult.ParseError): string => ParseResult.TreeFormatter.formatErrorSync(error);

const decodeEnvelope = Schema.decodeUnknown(PageEnvelopeSchema);

export const makeHelixApi = (http: HttpClient, options: HelixApiOptions): HelixApi => {
  const { clientId, baseUrl = Twitch.HelixUrl } = options;
  const headers = makeHeaders(clientId);

  const query = <A, I>(method: string, endpoint: string, schema: Schema.Schema<A, I>, params: QueryParams = []): Effect.Effect<A, HelixQueryError> =>
    Effect.gen(function* () {
      const verb = normalizeMethod(method);
      if (Option.isNone(verb)) {
        return yield* Effect.fail(new InvalidMethodError({ message: `Unrecognized HTTP method: ${method}`, method }));
      }

      const requestHeaders = yield* headers;
      const response = yield* http
        .request({
          method: verb.value,
          url: joinUrl(baseUrl, endpoint),
          headers: requestHeaders,
          searchParams: new URLSearchParams(params.map(([key, value]): [string, string] => [key, value])),
          throwHttpErrors: false,
          retry: 0,
        })
        .pipe(Effect.mapError((e) => new RequestFailedError({ message: e.message, code: e.code, cause: e })));

      yield* Effect.logDebug(chalk`Helix: {bold ${response.statusCode}} ${verb.value} ${endpoint}`);

      if (response.statusCode < 200 || response.statusCode > 299) {
        return yield* Effect.fail(
          new UnsuccessfulStatusError({
            message: `Received error status code from API: ${response.statusCode}`,
            status: response.statusCode,
          }),
        );
      }

      return yield* Schema.decodeUnknown(Schema.parseJson(schema))(response.body).pipe(
        Effect.mapError((e) => new DeserializationFailedError({ message: formatParseError(e), cause: e })),
      );
    }).pipe(Effect.annotateLogs({ service: 'HelixApi', operation: 'query' }));

  const paginate = <A, I>(request: PaginateOptions<A, I>): Effect.Effect<ReadonlyArray<A>, HelixApiError<A>> =>
    Effect.gen(function* () {
      const { method, endpoint, schema, params = [], endpointMaximum, count } = request;
      if (!isPageRequestValid(count, endpointMaximum)) {
        return yield* Effect.fail(
          new InvalidPageRequestError({
            message: `Cannot paginate ${count} items at ${endpointMaximum} per page`,
            count,
            endpointMaximum,
          }),
        );
      }

      const pages = pageCount(count, endpointMaximum);
      const decodeItems = Schema.decodeUnknown(Schema.Array(schema));
      const items: A[] = [];
      let cursor = '';

      for (let page = 0; page < pages; page++) {
        const first = pageSize(count, endpointMaximum, items.length);
        const body = yield* query(method, endpoint, Schema.Unknown, [...params, [PageParam.First, String(first)], [PageParam.After, cursor]]);

        const envelope = yield* decodeEnvelope(body).pipe(
          Effect.mapError((e) => new MalformedPaginationEnvelopeError({ message: formatParseError(e), cause: e })),
        );
        const isLastPage = page === pages - 1;
        // The cursor already skips past any extras.
        if (!isLastPage && envelope.data.length > first) {
          return yield* Effect.fail(
            new MalformedPaginationEnvelopeError({
              message: `${endpoint} page ${page + 1} returned ${envelope.data.length} items but only ${first} were requested`,
            }),
          );
        }

        const decoded = yield* decodeItems(envelope.data.slice(0, first)).pipe(
          Effect.mapError((e) => new DeserializationFailedError({ message: formatParseError(e), cause: e })),
        );

        items.push(...decoded);
        yield* Effect.logDebug(chalk`Helix: page {bold ${page + 1}/${pages}} of ${endpoint} returned ${decoded.length}/${first} items`);

        if (decoded.length < first) {
          return yield* Effect.fail(
            new PaginationExhaustedError({
              message: `${endpoint} ran out after ${items.length} of ${count} items`,
              requested: count,
              items: [...items],
            }),
          );
        }

        if (isLastPage) break;

        const next = envelope.pagination?.cursor;
        if (next === undefined) {
          return yield* Effect.fail(
            new MalformedPaginationEnvelopeError({ message: `${endpoint} page ${page + 1} has no pagination cursor but more pages remain` }),
          );
        }

        if (next === '') {
          return yield* Effect.fail(
            new PaginationExhaustedError({
              message: `${endpoint} has no further pages after ${items.length} of ${count} items`,
              requested: count,
              items: [...items],
            }),
          );
        }

        cursor = next;
      }

      return items;
    }).pipe(Effect.annotateLogs({ service: 'HelixApi', operation: 'paginate' }));

  const streams = (count: number): Effect.Effect<ReadonlyArray<Stream>, HelixApiError<Stream>> =>
    paginate({ method: 'GET', endpoint: 'streams', schema: StreamSchema, endpointMaximum: EndpointMaximum.Streams, count });

  const topGames = (count: number): Effect.Effect<ReadonlyArray<Game>, HelixApiError<Game>> =>
    paginate({ method: 'GET', endpoint: 'games/top', schema: GameSchema, endpointMaximum: EndpointMaximum.TopGames, count });

  return {
    headers,
    query,
    paginate,
    streams,
    topGames,
  };
};

export const HelixApiLayer = (options: HelixApiOptions): Layer.Layer<HelixApiTag, never, HttpClientTag> =>
  Layer.effect(
    HelixApiTag,
    Effect.map(HttpClientTag, (http) => makeHelixApi(http, options)),
  );
