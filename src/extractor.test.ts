/**
 * shopify-gql-extract
 *
 * Unit tests for the extractor module.
 * The Admin API is stood in by a stubbed fetch backed by the shop schema fixture.
 */

import { pino } from 'pino';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import * as z from 'zod';
import type { StubReply, StubRequest } from '../test/fixtures/schema.js';
import { connectionPage, costExtension, createStubFetch, ENDPOINT } from '../test/fixtures/schema.js';
import { AccessTokenClient } from './client.js';
import type { ExtractorConfig } from './config.js';
import { getConfig } from './config.js';
import { ConfigurationError, FieldRecoveryError } from './errors.js';
import type { ExtractedRecord } from './extractor.js';
import { Extractor } from './extractor.js';
import { findProperty } from './record-schema.js';
import { clearSchemaCache } from './schema-cache.js';

const LogLineSchema = z.object({
  msg: z.string(),
  entities: z.array(z.string()).optional(),
  fieldCount: z.number().optional(),
  depth: z.number().optional(),
});

async function collect(iterable: AsyncIterable<ExtractedRecord>): Promise<ExtractedRecord[]> {
  const items: ExtractedRecord[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe('Extractor Module', () => {
  let requests: StubRequest[];
  let replies: StubReply[];
  const sleep = vi.fn<(ms: number) => Promise<void>>();

  function extractor(overrides: Partial<ExtractorConfig> = {}, downloads: Record<string, string> = {}) {
    const fetch = createStubFetch({
      respond: (request) => {
        requests.push(request);
        return replies.shift() ?? { body: { errors: [{ message: 'unexpected request' }] } };
      },
      downloads,
    });
    const client = new AccessTokenClient('test-secret', { endpoint: ENDPOINT, fetch });
    return {
      fetch,
      extractor: new Extractor(client, { config: { ...getConfig(), ...overrides }, sleep, now: () => 0 }),
    };
  }

  beforeEach(() => {
    clearSchemaCache();
    requests = [];
    replies = [];
    sleep.mockReset();
    sleep.mockResolvedValue(undefined);
  });

  describe('discover', () => {
    it('should catalog every entity with its schema', async () => {
      const catalog = await extractor().extractor.discover();

      expect(catalog.map((entry) => entry.entity.name)).toEqual(['orders', 'customers', 'draft_orders']);
      const orders = catalog[0];
      expect(orders?.nestedConnections).toEqual(['events', 'lineItems']);
      expect(orders?.schema.properties.at(-1)).toEqual({
        name: 'lineItems',
        type: { kind: 'object', properties: [], loose: true },
        required: false,
      });
      expect(orders?.jsonSchema.properties?.['updatedAt']).toEqual({
        type: ['string', 'null'],
        format: 'date-time',
      });
      expect(orders?.jsonSchema.required).toBeUndefined();
    });

    it('should keep required flags when inaccessible fields fail the run', async () => {
      const catalog = await extractor({ ignoreAccessDenied: false }).extractor.discover();

      expect(catalog[1]?.jsonSchema.required).toEqual(['id', 'displayName', 'createdAt', 'updatedAt']);
    });

    it('should log through the injected logger', async () => {
      const lines: string[] = [];
      const logger = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });
      const client = new AccessTokenClient('test-secret', { endpoint: ENDPOINT, fetch: createStubFetch() });

      await new Extractor(client, { config: getConfig(), logger }).discover();

      const entries = lines.map((line) => LogLineSchema.parse(JSON.parse(line)));
      expect(entries.find((entry) => entry.msg === 'Discovered entities')?.entities).toEqual([
        'orders',
        'customers',
        'draft_orders',
      ]);
    });

    it('should introspect only once', async () => {
      const { fetch, extractor: subject } = extractor();

      await subject.discover();
      await subject.discover();
      await subject.extraction('orders');

      expect(fetch).toHaveBeenCalledTimes(1);
    });
  });

  describe('extraction', () => {
    it('should reject unknown entities', async () => {
      const pending = extractor().extractor.extraction('refunds');

      await expect(pending).rejects.toBeInstanceOf(ConfigurationError);
      await expect(pending).rejects.toThrow('Unknown entity: refunds');
    });
  });

  describe('interactive extraction', () => {
    it('should page through the connection and track the checkpoint', async () => {
      replies.push(
        connectionPage(
          'customers',
          [{ id: 'gid://shopify/Customer/1', updatedAt: '2024-02-01T00:00:00Z' }],
          { hasNextPage: true, endCursor: 'c1' },
          costExtension(10, 9990),
        ),
        connectionPage(
          'customers',
          [
            { id: 'gid://shopify/Customer/2', updatedAt: '2024-03-05T10:00:00Z' },
            { id: 'gid://shopify/Customer/3', updatedAt: '2024-02-20T00:00:00Z' },
          ],
          { hasNextPage: false, endCursor: 'c3' },
        ),
      );
      const extraction = await extractor().extractor.extraction('customers', {
        selectedFields: ['email'],
        since: new Date('2024-01-01T00:00:00Z'),
      });

      const records = await collect(extraction.records());

      expect(records.map((record) => record['id'])).toEqual([
        'gid://shopify/Customer/1',
        'gid://shopify/Customer/2',
        'gid://shopify/Customer/3',
      ]);
      expect(requests.map((request) => request.variables)).toEqual([
        { filter: 'updated_at:>2024-01-01T00:00:00', first: 1, after: null },
        { filter: 'updated_at:>2024-01-01T00:00:00', first: 100, after: 'c1' },
      ]);
      expect(requests[0]?.query).toContain('node { id email updatedAt } }');
      expect(extraction.checkpoint).toBe('2024-03-05T10:00:00Z');
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should wait for the budget to restore', async () => {
      replies.push(
        connectionPage('customers', [], { hasNextPage: true, endCursor: 'c1' }, costExtension(200, 100, 50)),
        connectionPage('customers', [], { hasNextPage: false, endCursor: null }),
      );

      await collect(extractor().extractor.extract('customers'));

      expect(sleep).toHaveBeenCalledWith(48000);
      expect(requests[1]?.variables).toEqual({ first: 5, after: 'c1' });
    });

    it('should prune inaccessible fields and replay the same page', async () => {
      replies.push(
        {
          body: {
            data: { orders: { edges: [{ cursor: 'c0', node: { id: 'gid://shopify/Order/1', email: null } }] } },
            errors: [
              {
                message: 'Access denied for email field.',
                path: ['orders', 'edges', 0, 'node', 'email'],
                extensions: { code: 'ACCESS_DENIED' },
              },
            ],
          },
        },
        connectionPage('orders', [{ id: 'gid://shopify/Order/1', updatedAt: '2024-05-01T00:00:00Z' }], {
          hasNextPage: false,
          endCursor: 'c0',
        }),
      );
      const extraction = await extractor().extractor.extraction('orders', {
        selectedFields: ['email', 'customer'],
      });

      const records = await collect(extraction.records());

      expect(records).toEqual([{ id: 'gid://shopify/Order/1', updatedAt: '2024-05-01T00:00:00Z' }]);
      expect(requests).toHaveLength(2);
      expect(requests[0]?.query).toContain('node { id email updatedAt customer { id } } }');
      expect(requests[1]?.query).toContain('node { id updatedAt customer { id } } }');
      expect(requests[1]?.variables).toEqual(requests[0]?.variables);
      expect(extraction.selectedFields).toEqual(['customer']);
      expect(findProperty(extraction.schema, 'email')).toBeUndefined();
      expect(extraction.jsonSchema().properties?.['email']).toBeUndefined();
    });

    it('should log each entity query with the size of its selection', async () => {
      replies.push(connectionPage('customers', [], { hasNextPage: false, endCursor: null }));
      const lines: string[] = [];
      const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
      const client = new AccessTokenClient('test-secret', { endpoint: ENDPOINT, fetch: extractor().fetch });
      const subject = new Extractor(client, { config: getConfig(), logger, sleep });

      await collect(subject.extract('customers', { selectedFields: ['email'] }));

      const entries = lines.map((line) => LogLineSchema.parse(JSON.parse(line)));
      const query = entries.find((entry) => entry.msg === 'Entity query');
      expect(query?.fieldCount).toBe(3);
      expect(query?.depth).toBe(1);
    });

    it('should keep pruned fields out of later extractions of the entity', async () => {
      replies.push(
        {
          body: {
            data: { orders: { edges: [{ cursor: 'c0', node: { id: 'gid://shopify/Order/1', email: null } }] } },
            errors: [
              {
                message: 'Access denied for email field.',
                path: ['orders', 'edges', 0, 'node', 'email'],
                extensions: { code: 'ACCESS_DENIED' },
              },
            ],
          },
        },
        connectionPage('orders', [{ id: 'gid://shopify/Order/1', updatedAt: '2024-05-01T00:00:00Z' }], {
          hasNextPage: false,
          endCursor: 'c0',
        }),
        connectionPage('orders', [{ id: 'gid://shopify/Order/2', updatedAt: '2024-05-02T00:00:00Z' }], {
          hasNextPage: false,
          endCursor: 'c0',
        }),
      );
      const { extractor: subject } = extractor();

      await collect(subject.extract('orders', { selectedFields: ['email'] }));
      const second = await subject.extraction('orders', { selectedFields: ['email'] });
      const records = await collect(second.records());

      expect(records).toEqual([{ id: 'gid://shopify/Order/2', updatedAt: '2024-05-02T00:00:00Z' }]);
      expect(requests).toHaveLength(3);
      expect(requests[2]?.query).toContain('node { id updatedAt } }');
      expect(findProperty(second.schema, 'email')).toBeUndefined();

      const [orders] = await subject.discover();
      expect(findProperty(orders?.schema ?? { kind: 'object', properties: [] }, 'email')).toBeUndefined();
      expect(orders?.jsonSchema.properties?.['email']).toBeUndefined();
      expect(orders?.jsonSchema.properties?.['name']).toEqual({ type: ['string', 'null'] });
    });

    it('should skip entities denied at the top level', async () => {
      replies.push({
        body: {
          data: null,
          errors: [
            { message: 'Access denied for orders field.', path: ['orders'], extensions: { code: 'ACCESS_DENIED' } },
          ],
        },
      });

      const records = await collect(extractor().extractor.extract('orders'));

      expect(records).toEqual([]);
      expect(requests).toHaveLength(1);
    });

    it('should fail on field errors when pruning is disabled', async () => {
      replies.push({
        body: {
          data: null,
          errors: [
            {
              message: 'Access denied for email field.',
              path: ['orders', 'edges', 0, 'node', 'email'],
              extensions: { code: 'ACCESS_DENIED' },
            },
          ],
        },
      });

      await expect(collect(extractor({ ignoreAccessDenied: false }).extractor.extract('orders'))).rejects.toThrow(
        FieldRecoveryError,
      );
    });

    it('should default the start instant to the configured startDate', async () => {
      replies.push(connectionPage('customers', [], { hasNextPage: false, endCursor: null }));

      await collect(extractor({ startDate: new Date('2023-06-01T12:30:00Z') }).extractor.extract('customers'));

      expect(requests[0]?.variables['filter']).toBe('updated_at:>2023-06-01T12:30:00');
    });
  });

  describe('bulk extraction', () => {
    const RESULT_URL = 'https://storage.example.com/bulk/customers.jsonl';

    it('should run a bulk operation and stream its result', async () => {
      replies.push(
        {
          body: {
            data: {
              bulkOperationRunQuery: {
                bulkOperation: { id: 'gid://shopify/BulkOperation/1', status: 'CREATED' },
                userErrors: [],
              },
            },
          },
        },
        {
          body: {
            data: {
              currentBulkOperation: {
                id: 'gid://shopify/BulkOperation/1',
                status: 'COMPLETED',
                errorCode: null,
                objectCount: '2',
                url: RESULT_URL,
              },
            },
          },
        },
      );
      const { extractor: subject } = extractor(
        { bulk: true },
        {
          [RESULT_URL]:
            '{"id":"gid://shopify/Customer/1","updatedAt":"2024-01-02T00:00:00Z"}\n' +
            '{"id":"gid://shopify/Customer/2","updatedAt":"2024-01-03T00:00:00Z"}\n',
        },
      );
      const extraction = await subject.extraction('customers', {
        selectedFields: [],
        since: new Date('2024-01-01T00:00:00Z'),
      });

      const records = await collect(extraction.records());

      expect(records).toHaveLength(2);
      expect(extraction.checkpoint).toBe('2024-01-03T00:00:00Z');
      expect(requests[0]?.query).toBe(
        'mutation { bulkOperationRunQuery(query: """{ customers(query: "updated_at:>2024-01-01T00:00:00") ' +
          '{ edges { node { id updatedAt } } } }""") ' +
          '{ bulkOperation { id status } userErrors { field message } } }',
      );
      expect(requests[1]?.query).toContain('currentBulkOperation');
    });
  });
});
