import 'dotenv/config';

import chalk from 'chalk';
import { Effect, Layer, Logger, Schema } from 'effect';

import { EnvSchema } from './core/Config';
import { HelixApiLayer, HelixApiTag } from './services/HelixApi';
import { HttpClientLayer } from './structures/HttpClient';
import { LoggerClientLayer, makeLoggerClient } from './structures/LoggerClient';

const program = Effect.gen(function* () {
  const env = yield* Schema.decodeUnknown(EnvSchema)(process.env);
  const logger = makeLoggerClient({ level: env.IS_DEBUG ? 'debug' : 'info', pretty: true });
  const layer = Layer.merge(
    HelixApiLayer({ clientId: env.CLIENT_ID, baseUrl: env.HELIX_BASE_URL }).pipe(Layer.provide(HttpClientLayer)),
    LoggerClientLayer(Logger.defaultLogger, logger),
  );

  yield* Effect.gen(function* () {
    const api = yield* HelixApiTag;
    yield* Effect.logDebug('Started');

    const streams = yield* api.streams(env.STREAM_COUNT);
    yield* Effect.forEach(streams, (stream) =>
      Effect.logInfo(chalk`{green ${stream.user_name}} | {yellow ${stream.viewer_count} viewers} | ${stream.title}`),
    );
  }).pipe(
    Effect.tapError((error) => Effect.logError(chalk`{red ${error._tag}: ${error.message}}`)),
    Effect.provide(layer),
  );
});

Effect.runPromise(program).catch((error: unknown) => {
  console.trace(error);
  process.exitCode = 1;
});
