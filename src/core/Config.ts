import { Schema } from 'effect';

import { Twitch } from './Constants';

const BooleanLike = Schema.Union(
  Schema.Boolean,
  Schema.transform(Schema.String, Schema.Boolean, {
    decode: (s) => s === 'true',
    encode: (b) => String(b),
  }),
);

export const EnvSchema = Schema.Struct({
  CLIENT_ID: Schema.NonEmptyString,
  HELIX_BASE_URL: Schema.optionalWith(Schema.NonEmptyString, { default: () => Twitch.HelixUrl }),
  STREAM_COUNT: Schema.optionalWith(Schema.NumberFromString.pipe(Schema.int(), Schema.nonNegative()), { default: () => 3 }),
  IS_DEBUG: Schema.optionalWith(BooleanLike, { default: () => false }),
});

export type Env = Schema.Schema.Type<typeof EnvSchema>;
