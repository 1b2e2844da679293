import { join } from 'node:path';
import { Cause, Layer, Logger, LogLevel, Schema } from 'effect';
import pino from 'pino';
import pinoPretty from 'pino-pretty';

import type { ReadonlyRecord } from 'effect/Record';
import type { DestinationStream, StreamEntry } from 'pino';

export const PINO_LEVEL_MAP: ReadonlyRecord<string, LogLevel.LogLevel> = {
  trace: LogLevel.Trace,
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
  fatal: LogLevel.Fatal,
  silent: LogLevel.None,
};

export const EFFECT_LEVEL_MAP: ReadonlyRecord<LogLevel.LogLevel['_tag'], pino.LevelWithSilent> = {
  All: 'trace',
  Trace: 'trace',
  Debug: 'debug',
  Info: 'info',
  Warning: 'warn',
  Error: 'error',
  Fatal: 'fatal',
  None: 'silent',
};

export const LoggerOptions = Schema.Struct({
  dir: Schema.optional(Schema.String),
  level: Schema.optional(Schema.Literal('fatal', 'error', 'warn', 'info', 'debug', 'trace')),
  pretty: Schema.optional(Schema.Boolean),
  exception: Schema.optional(Schema.Boolean),
  rejection: Schema.optional(Schema.Boolean),
});

export type LoggerOptions = Schema.Schema.Type<typeof LoggerOptions>;

/**
 * Creates the pino logger behind the Effect logger.
 *
 * Lines go to `stream` as JSON, or through pino-pretty when `pretty` is set.
 * When `dir` is given, warnings and above are also appended to `errors.log` there.
 */
export const makeLoggerClient = (options: LoggerOptions = {}, stream: DestinationStream = process.stdout): pino.Logger => {
  const {
    dir,
    level = process.env.NODE_ENV === 'development' ? 'debug' : 'info',
    pretty = false,
    exception = true,
    rejection = true,
  } = options;

  const streams: StreamEntry[] = [
    pretty
      ? {
          level,
          stream: pinoPretty({
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            destination: stream,
            sync: true,
          }),
        }
      : { level, stream },
  ];

  if (dir) {
    streams.push({
      level: 'warn',
      stream: pino.destination({ mkdir: true, dest: join(dir, 'errors.log') }),
    });
  }

  const instance = pino({ level, base: undefined, nestedKey: 'payload' }, pino.multistream(streams));

  if (exception && process.listenerCount('uncaughtException') === 0) {
    process.on('uncaughtException', (error, origin) => {
      instance.fatal({ error, origin }, 'UncaughtException');
    });
  }

  if (rejection && process.listenerCount('unhandledRejection') === 0) {
    process.on('unhandledRejection', (reason) => {
      instance.fatal({ reason }, 'UnhandledRejection');
    });
  }

  return instance;
};

/**
 * Replaces `self` with a logger that forwards to pino.
 * String parts of a message are joined into the pino message, other parts are merged into its payload.
 */
export const LoggerClientLayer = (self: Logger.Logger<unknown, void>, logger: pino.Logger): Layer.Layer<never> =>
  Layer.mergeAll(
    Logger.replace(
      self,
      Logger.make(({ logLevel, message, cause, annotations }) => {
        const level = EFFECT_LEVEL_MAP[logLevel._tag] ?? 'info';
        const parts: ReadonlyArray<unknown> = Array.isArray(message) ? message : [message];

        const text = parts.filter((part): part is string => typeof part === 'string').join(' ');
        const objects = parts.filter((part) => typeof part !== 'string');
        if (cause && !Cause.isEmpty(cause)) {
          objects.push({ cause: Cause.pretty(cause) });
        }

        const annotated = Object.fromEntries(annotations);
        if (objects.length === 0 && Object.keys(annotated).length === 0) {
          logger[level](text);
          return;
        }

        logger[level](Object.assign({}, annotated, ...objects), text);
      }),
    ),
    Logger.minimumLogLevel(PINO_LEVEL_MAP[logger.level] ?? LogLevel.Info),
  );
