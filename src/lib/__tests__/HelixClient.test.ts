import { Writable } from 'node:stream';
import { Effect, Schema } from 'effect';
import { afterEach, describe, expect, it } from 'vitest';

import { makeLoggerClient } from '../../structures/LoggerClient';
import { HelixClient } from '../HelixClient';

import type { DefaultOptions, HttpClient, HttpResponse } from '../../structures/HttpClient';

const page = (data: ReadonlyArray<unknown>, cursor?: string): HttpResponse => ({
  statusCode: 200,
  headers: {},
  body: JSON.stringify({ data, pagination: cursor === undefined ? {} : { cursor } }),
});

const fakeHttp = (responses: ReadonlyArray<HttpResponse>) => {
  const urls: string[] = [];
  const http: HttpClient = {
    request: (options) =>
      Effect.suspend(() => {
        const payload: DefaultOptions = typeof options === 'string' ? { url: options } : options;
        urls.push(`${String(payload.url)}?${String(payload.searchParams)}`);
        const next = responses[urls.length - 1];
        return next === undefined ? Effect.die(new Error('Unexpected request')) : Effect.succeed(next);
      }),
  };
  return { urls, http };
};

describe('HelixClient', () => {
  const clients: HelixClient[] = [];
  const create = (responses: ReadonlyArray<HttpResponse>, clientId = 'test-client') => {
    const fake = fakeHttp(responses);
    const client = new HelixClient(clientId, { baseUrl: 'http://helix.test', httpClient: fake.http });
    clients.push(client);
    return { client, urls: fake.urls };
  };

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.dispose()));
  });

  it('keeps the client id it was built with', async () => {
    const { client } = create([]);

    expect(client.clientId).toBe('test-client');
    await expect(client.headers()).resolves.toEqual({ 'client-id': 'test-client' });
  });

  it('aggregates pages into one list', async () => {
    const { client, urls } = create([
      page([{ id: '1', name: 'One', box_art_url: 'https://example.test/1.jpg' }], 'abc'),
      page([{ id: '2', name: 'Two', box_art_url: 'https://example.test/2.jpg' }]),
    ]);

    const games = await client.paginate({
      method: 'GET',
      endpoint: 'games/top',
      schema: Schema.Struct({ id: Schema.String, name: Schema.String }),
      endpointMaximum: 1,
      count: 2,
    });

    expect(games).toEqual([
      { id: '1', name: 'One' },
      { id: '2', name: 'Two' },
    ]);
    expect(urls).toEqual(['http://helix.test/games/top?first=1&after=', 'http://helix.test/games/top?first=1&after=abc']);
  });

  it('runs single queries', async () => {
    const { client } = create([{ statusCode: 200, headers: {}, body: '{"total":4}' }]);

    await expect(client.query('GET', 'channels/followers', Schema.Struct({ total: Schema.Number }))).resolves.toEqual({ total: 4 });
  });

  it('rejects with the tagged error', async () => {
    const { client } = create([{ statusCode: 401, headers: {}, body: '{"error":"Unauthorized"}' }]);

    await expect(client.streams(1)).rejects.toMatchObject({ _tag: 'UnsuccessfulStatusError', status: 401 });
  });

  it('rejects construction-time header problems on first use', async () => {
    const { client, urls } = create([], 'bad\nid');

    await expect(client.topGames(1)).rejects.toMatchObject({ _tag: 'InvalidHeaderValueError' });
    expect(urls).toHaveLength(0);
  });

  it('sends its logs to the given pino logger', async () => {
    const lines: Record<string, unknown>[] = [];
    const sink = new Writable({
      write(chunk, _encoding, callback) {
        lines.push(JSON.parse(String(chunk)));
        callback();
      },
    });
    const logger = makeLoggerClient({ level: 'debug', pretty: false, exception: false, rejection: false }, sink);
    const fake = fakeHttp([page([{ id: '1', name: 'One', box_art_url: 'https://example.test/1.jpg' }])]);
    const client = new HelixClient('test-client', { baseUrl: 'http://helix.test', httpClient: fake.http, logger });
    clients.push(client);

    await client.topGames(1);

    expect(lines[0]).toMatchObject({ level: 20, msg: expect.stringMatching(/^Helix: \S*200\S* GET games\/top$/), payload: { service: 'HelixApi', operation: 'query' } });
  });
});
