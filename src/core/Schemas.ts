import { Schema } from 'effect';

/**
 * Schema for the pagination block Helix attaches to list responses.
 * The cursor is absent once the upstream has nothing more to return.
 */
export const PaginationSchema = Schema.Struct({
  cursor: Schema.optional(Schema.String),
});

export type Pagination = Schema.Schema.Type<typeof PaginationSchema>;

/**
 * Schema for a paginated response with its items left undecoded.
 */
export const PageEnvelopeSchema = Schema.Struct({
  data: Schema.Array(Schema.Unknown),
  pagination: Schema.optional(PaginationSchema),
});

export type PageEnvelope = Schema.Schema.Type<typeof PageEnvelopeSchema>;

/**
 * Schema for one entry of the Helix streams endpoint.
 */
export const StreamSchema = Schema.Struct({
  id: Schema.String,
  user_id: Schema.String,
  user_login: Schema.optional(Schema.String),
  user_name: Schema.String,
  game_id: Schema.String,
  game_name: Schema.optional(Schema.String),
  type: Schema.String,
  title: Schema.String,
  viewer_count: Schema.Number,
  started_at: Schema.Date,
  language: Schema.String,
  thumbnail_url: Schema.String,
  tag_ids: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
  tags: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
  is_mature: Schema.optional(Schema.Boolean),
});

export type Stream = Schema.Schema.Type<typeof StreamSchema>;

/**
 * Schema for one entry of the Helix top games endpoint.
 */
export const GameSchema = Schema.Struct({
  id: Schema.String,
  name: Schema.String,
  box_art_url: Schema.String,
  igdb_id: Schema.optional(Schema.String),
});

export type Game = Schema.Schema.Type<typeof GameSchema>;
