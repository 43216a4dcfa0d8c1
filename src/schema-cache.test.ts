/**
 * shopify-gql-extract
 *
 * Unit tests for the schema cache module.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createStubFetch, ENDPOINT } from '../test/fixtures/schema.js';
import { AccessTokenClient } from './client.js';
import { UpstreamServiceError } from './errors.js';
import { clearSchemaCache, getSchemaCacheStats, loadSchema } from './schema-cache.js';

describe('Schema Cache Module', () => {
  beforeEach(() => {
    clearSchemaCache();
  });

  it('should introspect once per endpoint', async () => {
    const fetch = createStubFetch();
    const client = new AccessTokenClient('test-secret', { endpoint: ENDPOINT, fetch });

    const first = await loadSchema(client);
    const second = await loadSchema(client);

    expect(second).toBe(first);
    expect(first.types.has('Order')).toBe(true);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(getSchemaCacheStats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('should share a pending introspection between concurrent loads', async () => {
    const fetch = createStubFetch();
    const client = new AccessTokenClient('test-secret', { endpoint: ENDPOINT, fetch });

    const [a, b] = await Promise.all([loadSchema(client), loadSchema(client)]);

    expect(a).toBe(b);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('should cache separately per endpoint', async () => {
    const fetch = createStubFetch();

    await loadSchema(new AccessTokenClient('test-secret', { endpoint: ENDPOINT, fetch }));
    await loadSchema(
      new AccessTokenClient('test-secret', {
        endpoint: 'https://other-store.myshopify.com/admin/api/2024-01/graphql.json',
        fetch,
      }),
    );

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(getSchemaCacheStats().size).toBe(2);
  });

  it('should not cache failures', async () => {
    const denied = vi.fn<typeof fetch>(async () => Response.json({ errors: [{ message: 'Access denied' }] }));
    const failing = new AccessTokenClient('test-secret', { endpoint: ENDPOINT, fetch: denied });

    await expect(loadSchema(failing)).rejects.toThrow('Introspection failed: Access denied');
    await expect(loadSchema(failing)).rejects.toBeInstanceOf(UpstreamServiceError);
    expect(getSchemaCacheStats()).toEqual({ hits: 0, misses: 2, size: 0 });

    const healthy = new AccessTokenClient('test-secret', { endpoint: ENDPOINT, fetch: createStubFetch() });
    expect((await loadSchema(healthy)).queryTypeName).toBe('Query');
  });

  it('should reset statistics when cleared', async () => {
    await loadSchema(new AccessTokenClient('test-secret', { endpoint: ENDPOINT, fetch: createStubFetch() }));

    clearSchemaCache();

    expect(getSchemaCacheStats()).toEqual({ hits: 0, misses: 0, size: 0 });
  });
});
