import { Effect, Either, Layer, Logger, ManagedRuntime } from 'effect';

import { HelixApiLayer, HelixApiTag } from '../services/HelixApi';
import { HttpClientLayer, HttpClientTag } from '../structures/HttpClient';
import { LoggerClientLayer } from '../structures/LoggerClient';

import type { Schema } from 'effect';
import type { Logger as PinoLogger } from 'pino';
import type { Game, Stream } from '../core/Schemas';
import type { HelixApi, HelixHeaders, PaginateOptions, QueryParams } from '../services/HelixApi';
import type { HttpClient } from '../structures/HttpClient';

export interface HelixClientOptions {
  /** Defaults to the public Helix endpoint. */
  readonly baseUrl?: string;
  /** Receives the client's Effect logs when given. */
  readonly logger?: PinoLogger;
  /** Replaces the got transport. */
  readonly httpClient?: HttpClient;
}

/**
 * Promise based entry point to the Helix API.
 * Rejections carry the tagged errors of {@link HelixApi} unchanged.
 *
 * @example
 * const client = new HelixClient('my-client-id');
 * const streams = await client.streams(3);
 */
export class HelixClient {
  private readonly runtime: ManagedRuntime.ManagedRuntime<HelixApiTag, never>;

  public constructor(
    public readonly clientId: string,
    options: HelixClientOptions = {},
  ) {
    const http = options.httpClient ? Layer.succeed(HttpClientTag, options.httpClient) : HttpClientLayer;
    const api = HelixApiLayer({ clientId, baseUrl: options.baseUrl }).pipe(Layer.provide(http));
    this.runtime = ManagedRuntime.make(options.logger ? Layer.merge(api, LoggerClientLayer(Logger.defaultLogger, options.logger)) : api);
  }

  public headers(): Promise<HelixHeaders> {
    return this.run((api) => api.headers);
  }

  public query<A, I>(method: string, endpoint: string, schema: Schema.Schema<A, I>, params?: QueryParams): Promise<A> {
    return this.run((api) => api.query(method, endpoint, schema, params));
  }

  public paginate<A, I>(options: PaginateOptions<A, I>): Promise<ReadonlyArray<A>> {
    return this.run((api) => api.paginate(options));
  }

  public streams(count: number): Promise<ReadonlyArray<Stream>> {
    return this.run((api) => api.streams(count));
  }

  public topGames(count: number): Promise<ReadonlyArray<Game>> {
    return this.run((api) => api.topGames(count));
  }

  public dispose(): Promise<void> {
    return this.runtime.dispose();
  }

  private async run<A, E>(f: (api: HelixApi) => Effect.Effect<A, E>): Promise<A> {
    const result = await this.runtime.runPromise(Effect.either(Effect.flatMap(HelixApiTag, f)));
    if (Either.isLeft(result)) {
      throw result.left;
    }

    return result.right;
  }
}
