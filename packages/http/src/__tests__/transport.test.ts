import { ReadableStream } from 'node:stream/web';

import { Headers, Response, type RequestInit } from 'undici';
import { describe, expect, it, vi, type Mock } from 'vitest';

import type { HttpEffects } from '../core/types.js';
import {
  ConnectionFailed,
  InvalidUrl,
  NoResponse,
  RequestAborted,
  RequestCreationFailed,
  RequestTimeout,
} from '../errors.js';
import { HttpTransport } from '../transport.js';
import { createHttpRequest } from '../types.js';

type FetchMock = Mock<HttpEffects['fetch']>;

function createFetch(): FetchMock {
  return vi.fn<HttpEffects['fetch']>();
}

function lastInit(fetch: FetchMock): RequestInit {
  const call = fetch.mock.lastCall;
  if (!call) {
    throw new Error('fetch was not called');
  }
  return call[1];
}

function sentHeaders(fetch: FetchMock): Headers {
  return new Headers(lastInit(fetch).headers);
}

describe('HttpTransport', () => {
  it('returns status, headers, body and content type', async () => {
    const fetch = createFetch().mockResolvedValue(
      new Response('{"id":1}', {
        headers: { 'Content-Type': 'application/json; charset=utf-8', 'X-Request-Id': 'req-1' },
        status: 200,
      })
    );
    const transport = new HttpTransport({}, { fetch });

    const response = (await transport.call(createHttpRequest('https://api.example.com/orders')))._unsafeUnwrap();

    expect(response.statusCode).toBe(200);
    expect(response.succeeded).toBe(true);
    expect(response.contentType).toBe('application/json; charset=utf-8');
    expect(response.headers['x-request-id']).toBe('req-1');
    expect(new TextDecoder().decode(response.body)).toBe('{"id":1}');
    expect(response.url).toBe('https://api.example.com/orders');
    expect(fetch).toHaveBeenCalledWith('https://api.example.com/orders', expect.objectContaining({ method: 'GET' }));
  });

  it('returns non-2xx responses as successful results', async () => {
    const fetch = createFetch().mockResolvedValue(new Response('missing', { status: 404 }));
    const transport = new HttpTransport({}, { fetch });

    const response = (await transport.call(createHttpRequest('https://api.example.com/orders/9')))._unsafeUnwrap();

    expect(response.statusCode).toBe(404);
    expect(response.succeeded).toBe(false);
  });

  it('sends user agent and default headers, letting request headers win', async () => {
    const fetch = createFetch().mockResolvedValue(new Response(''));
    const transport = new HttpTransport(
      { defaultHeaders: { Accept: 'application/json', 'X-Client': 'default' }, userAgent: 'orders-cli/2.0' },
      { fetch }
    );

    await transport.call(createHttpRequest('https://api.example.com', { headers: { 'x-client': 'request' } }));

    const headers = sentHeaders(fetch);
    expect(headers.get('user-agent')).toBe('orders-cli/2.0');
    expect(headers.get('accept')).toBe('application/json');
    expect(headers.get('x-client')).toBe('request');
  });

  it('adds Content-Type from the request only when a body is present', async () => {
    const fetch = createFetch().mockImplementation(() => Promise.resolve(new Response('')));
    const transport = new HttpTransport({}, { fetch });

    await transport.call(createHttpRequest('https://api.example.com/orders'));
    expect(sentHeaders(fetch).has('content-type')).toBe(false);

    await transport.call(createHttpRequest('https://api.example.com/orders', { body: '{"qty":1}', method: 'POST' }));
    expect(sentHeaders(fetch).get('content-type')).toBe('application/json');
    expect(lastInit(fetch).body).toBe('{"qty":1}');

    await transport.call(
      createHttpRequest('https://api.example.com/orders', {
        body: 'qty=1',
        contentType: 'application/json',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        method: 'POST',
      })
    );
    expect(sentHeaders(fetch).get('content-type')).toBe('application/x-www-form-urlencoded');
  });

  it('rejects empty and non-http URLs without fetching', async () => {
    const fetch = createFetch();
    const transport = new HttpTransport({}, { fetch });

    const empty = (await transport.call(createHttpRequest('  ')))._unsafeUnwrapErr();
    const relative = (await transport.call(createHttpRequest('/orders')))._unsafeUnwrapErr();
    const ftp = (await transport.call(createHttpRequest('ftp://files.example.com')))._unsafeUnwrapErr();

    expect(empty.is(InvalidUrl)).toBe(true);
    expect(empty.message).toBe('Request URL is empty');
    expect(relative.message).toBe('Invalid request URL: /orders');
    expect(ftp.is(InvalidUrl)).toBe(true);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('fails request creation for a GET with a body or an invalid header', async () => {
    const fetch = createFetch();
    const transport = new HttpTransport({}, { fetch });

    const withBody = (
      await transport.call(createHttpRequest('https://api.example.com', { body: 'x', method: 'GET' }))
    )._unsafeUnwrapErr();
    const badHeader = (
      await transport.call(createHttpRequest('https://api.example.com', { headers: { 'bad header': 'x' } }))
    )._unsafeUnwrapErr();

    expect(withBody.is(RequestCreationFailed)).toBe(true);
    expect(withBody.message).toBe('A GET request cannot have a body');
    expect(badHeader.is(RequestCreationFailed)).toBe(true);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('maps network failures to ConnectionFailed', async () => {
    const cause = new TypeError('fetch failed');
    const fetch = createFetch().mockRejectedValue(cause);
    const transport = new HttpTransport({}, { fetch });

    const error = (await transport.call(createHttpRequest('https://api.example.com/orders')))._unsafeUnwrapErr();

    expect(error.is(ConnectionFailed)).toBe(true);
    expect(error.message).toBe('https://api.example.com/orders: fetch failed');
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ method: 'GET', url: 'https://api.example.com/orders' });
  });

  it('maps a caller abort to RequestAborted', async () => {
    const fetch = createFetch().mockRejectedValue(new Error('This operation was aborted'));
    const transport = new HttpTransport({}, { fetch });
    const controller = new AbortController();
    controller.abort();

    const error = (
      await transport.call(createHttpRequest('https://api.example.com/orders', { signal: controller.signal }))
    )._unsafeUnwrapErr();

    expect(error.is(RequestAborted)).toBe(true);
  });

  it('maps an expired request timeout to RequestTimeout', async () => {
    const fetch = createFetch().mockImplementation(
      (_url, init) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const transport = new HttpTransport({}, { fetch });

    const error = (
      await transport.call(createHttpRequest('https://api.example.com/slow', { timeoutMs: 5 }))
    )._unsafeUnwrapErr();

    expect(error.is(RequestTimeout)).toBe(true);
    expect(error.message).toBe('Request timeout after 5ms');
  });

  it('sends no signal when timeouts are disabled and the caller gives none', async () => {
    const fetch = createFetch().mockResolvedValue(new Response(''));
    const transport = new HttpTransport({ defaultTimeoutMs: 0 }, { fetch });

    await transport.call(createHttpRequest('https://api.example.com'));

    expect(lastInit(fetch).signal).toBeNull();
  });

  it('maps a body that cannot be read to NoResponse', async () => {
    const broken = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error('socket hang up'));
      },
    });
    const fetch = createFetch().mockResolvedValue(new Response(broken));
    const transport = new HttpTransport({}, { fetch });

    const error = (await transport.call(createHttpRequest('https://api.example.com/orders')))._unsafeUnwrapErr();

    expect(error.is(NoResponse)).toBe(true);
  });

  it('closes idempotently', async () => {
    const transport = new HttpTransport();

    await expect(Promise.all([transport.close(), transport.close()])).resolves.toEqual([undefined, undefined]);
    await expect(transport.close()).resolves.toBeUndefined();
  });

  it('keeps resolving close calls made after the agent has closed', async () => {
    const transport = new HttpTransport();

    await transport.close();

    await expect(transport.close()).resolves.toBeUndefined();
    await expect(transport.close()).resolves.toBeUndefined();
  });
});
