import { createServer } from 'node:http';
import { Effect } from 'effect';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import { HttpClientError, HttpClientLayer, isErrorTimeout, isRetryable, request, USER_AGENT } from '../HttpClient';

import type { IncomingMessage, Server, ServerResponse } from 'node:http';

type Handler = (req: IncomingMessage, res: ServerResponse) => void;

const listen = (server: Server): Promise<string> =>
  new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? `http://127.0.0.1:${address.port}` : String(address));
    });
  });

const close = (server: Server): Promise<void> => new Promise((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));

describe('HttpClient', () => {
  let handler: Handler = (_req, res) => res.end();
  let hits = 0;
  let baseUrl = '';
  const server = createServer((req, res) => {
    hits++;
    handler(req, res);
  });

  beforeAll(async () => {
    baseUrl = await listen(server);
  });

  afterAll(() => close(server));

  beforeEach(() => {
    hits = 0;
  });

  const send = (url: string, retry = 0, throwHttpErrors = true) =>
    Effect.runPromise(request({ url, retry, throwHttpErrors, http2: false }).pipe(Effect.provide(HttpClientLayer)));

  it('returns status, headers and the text body', async () => {
    handler = (req, res) => {
      res.setHeader('content-type', 'application/json');
      res.end(JSON.stringify({ path: req.url, clientId: req.headers['client-id'], userAgent: req.headers['user-agent'] }));
    };

    const response = await Effect.runPromise(
      request({
        url: `${baseUrl}/helix/streams`,
        headers: { 'client-id': 'test-client' },
        searchParams: new URLSearchParams([
          ['first', '2'],
          ['after', ''],
        ]),
        http2: false,
      }).pipe(Effect.provide(HttpClientLayer)),
    );

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/json');
    const body: { path: string; clientId: string; userAgent: string } = JSON.parse(response.body);
    expect(body.path).toBe('/helix/streams?first=2&after=');
    expect(body.clientId).toBe('test-client');
    expect(body.userAgent).toBe(USER_AGENT);
  });

  it('sends a browser user agent only when asked to', async () => {
    handler = (req, res) => res.end(req.headers['user-agent']);

    const response = await Effect.runPromise(
      request({ url: `${baseUrl}/agent`, randomUserAgent: true, http2: false }).pipe(Effect.provide(HttpClientLayer)),
    );

    expect(response.body).toMatch(/^Mozilla\/5\.0 /);
  });

  it('hands back error statuses when throwHttpErrors is off', async () => {
    handler = (_req, res) => {
      res.statusCode = 404;
      res.end('missing');
    };

    const response = await send(`${baseUrl}/missing`, 0, false);

    expect(response.statusCode).toBe(404);
    expect(response.body).toBe('missing');
    expect(hits).toBe(1);
  });

  it('retries retryable statuses up to the retry count', async () => {
    handler = (_req, res) => {
      res.statusCode = hits === 1 ? 503 : 200;
      res.end(hits === 1 ? 'busy' : 'ok');
    };

    const response = await send(`${baseUrl}/flaky`, 1);

    expect(response.body).toBe('ok');
    expect(hits).toBe(2);
  });

  it('does not retry when retry is zero', async () => {
    handler = (_req, res) => {
      res.statusCode = 503;
      res.end('busy');
    };

    const error = await Effect.runPromise(Effect.flip(request({ url: `${baseUrl}/busy`, retry: 0, http2: false }).pipe(Effect.provide(HttpClientLayer))));

    expect(error).toMatchObject({ _tag: 'HttpClientError', status: 503 });
    expect(hits).toBe(1);
  });

  it('reports connection failures with their code', async () => {
    const closed = createServer();
    const closedUrl = await listen(closed);
    await close(closed);

    const error = await Effect.runPromise(Effect.flip(request({ url: closedUrl, retry: 0, http2: false }).pipe(Effect.provide(HttpClientLayer))));

    expect(error).toMatchObject({ _tag: 'HttpClientError', code: 'ECONNREFUSED' });
  });

  describe('isRetryable', () => {
    it('matches network codes, retryable statuses and timeouts', () => {
      expect(isRetryable(new HttpClientError({ message: 'reset', code: 'ECONNRESET' }))).toBe(true);
      expect(isRetryable(new HttpClientError({ message: 'busy', status: 503 }))).toBe(true);
      expect(isRetryable(new HttpClientError({ message: 'missing', status: 404 }))).toBe(false);
      expect(isRetryable(new HttpClientError({ message: 'unknown' }))).toBe(false);
    });

    it('recognises timeout errors', () => {
      expect(isErrorTimeout({ code: 'ETIMEDOUT' })).toBe(true);
      expect(isErrorTimeout({ _tag: 'TimeoutException' })).toBe(true);
      expect(isErrorTimeout(new Error('other'))).toBe(false);
    });
  });
});
