import { Data } from 'effect';

export const Twitch = Data.struct({
  HelixUrl: 'https://api.twitch.tv/helix',
} as const);

export const HelixHeader = Data.struct({
  ClientId: 'client-id',
} as const);

/**
 * Largest `first` each Helix endpoint accepts in a single request.
 */
export const EndpointMaximum = Data.struct({
  Streams: 100,
  TopGames: 100,
} as const);

export const PageParam = Data.struct({
  First: 'first',
  After: 'after',
} as const);
