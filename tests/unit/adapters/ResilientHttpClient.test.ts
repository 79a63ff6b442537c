/**
 * ResilientHttpClient Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';
import { ResilientHttpClient, parseResponse } from '../../../src/packages/adapters/http/ResilientHttpClient.js';
import { RemoteCallError } from '../../../src/utils/errors.js';
import { silentLogger } from '../../helpers/fakes.js';
import { createFakeFetch, json, type FetchHandler } from '../../helpers/http.js';

describe('ResilientHttpClient', () => {
  let client: ResilientHttpClient | null = null;

  function createClient(handler: FetchHandler, overrides: { timeoutMs?: number; volumeThreshold?: number } = {}) {
    const fake = createFakeFetch(handler);
    client = new ResilientHttpClient({
      service: 'test-api',
      baseUrl: 'https://api.test/v1/',
      headers: { 'x-api-key': 'test-secret' },
      fetchImpl: fake.fetchImpl,
      logger: silentLogger,
      ...overrides,
    });
    return { client, calls: fake.calls };
  }

  afterEach(() => {
    client?.shutdown();
    client = null;
  });

  it('builds the URL, skipping undefined query values', async () => {
    const { client, calls } = createClient(() => json([{ id: 1 }]));

    const data = await client.get('/leases', { propertyId: 'p1', status: 'active', page: undefined });

    expect(data).toEqual([{ id: 1 }]);
    expect(calls[0]?.url).toBe('https://api.test/v1/leases?propertyId=p1&status=active');
    expect(calls[0]?.headers['x-api-key']).toBe('test-secret');
  });

  it('sends JSON bodies', async () => {
    const { client, calls } = createClient(() => json({ id: 'new' }, 201));

    await client.post('/charges', { amount: 10 });

    expect(calls[0]).toMatchObject({ method: 'POST', body: { amount: 10 } });
  });

  it('resolves null for an empty body', async () => {
    const { client } = createClient(() => new Response(null, { status: 204 }));

    await expect(client.delete('/charges/1')).resolves.toBeNull();
  });

  it('raises RemoteCallError with the status on a non-2xx response', async () => {
    const { client } = createClient(() => new Response('nope', { status: 503, statusText: 'Service Unavailable' }));

    const error = await client.get('/leases').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteCallError);
    expect(error).toMatchObject({
      service: 'test-api',
      status: 503,
      message: 'test-api: GET /leases failed: 503 Service Unavailable',
    });
  });

  it('raises RemoteCallError on invalid JSON', async () => {
    const { client } = createClient(() => new Response('<html>', { status: 200 }));

    await expect(client.get('/leases')).rejects.toThrow('test-api: GET /leases returned invalid JSON');
  });

  it('raises RemoteCallError when the transport fails', async () => {
    const { client } = createClient(() => {
      throw new TypeError('fetch failed');
    });

    await expect(client.get('/leases')).rejects.toThrow('test-api: GET /leases failed: fetch failed');
  });

  it('aborts a request that exceeds the timeout', async () => {
    const { client } = createClient(
      (_request, signal) =>
        new Promise<Response>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
      { timeoutMs: 5 }
    );

    await expect(client.get('/slow')).rejects.toThrow('test-api: GET /slow timed out after 5ms');
  });

  it('opens the breaker after repeated failures and fails fast', async () => {
    const { client, calls } = createClient(() => new Response('', { status: 500 }), { volumeThreshold: 2 });

    await expect(client.get('/a')).rejects.toBeInstanceOf(RemoteCallError);
    await expect(client.get('/a')).rejects.toBeInstanceOf(RemoteCallError);

    expect(client.isOpen()).toBe(true);
    await expect(client.get('/a')).rejects.toThrow('test-api: GET /a rejected');
    expect(calls).toHaveLength(2);
  });
});

describe('parseResponse', () => {
  const schema = z.object({ id: z.string() });

  it('returns the parsed payload', () => {
    expect(parseResponse('test-api', 'thing', schema, { id: 'x', extra: true })).toEqual({ id: 'x' });
  });

  it('lists the issues in the error', () => {
    expect(() => parseResponse('test-api', 'thing', schema, { id: 3 })).toThrow(
      'test-api: Unexpected thing payload (id: Expected string, received number)'
    );
  });
});
