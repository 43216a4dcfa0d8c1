/**
 * shopify-gql-extract Examples
 *
 * Basic Usage
 *
 * Discovers the store's entities, prints their inferred schemas, and streams
 * one entity incrementally. Credentials come from the environment:
 * SHOPIFY_STORE and SHOPIFY_ACCESS_TOKEN.
 */

import { configure, Extractor, getLogger } from '../src/index.js';

/**
 * Example 1: Catalog
 *
 * Lists every extractable entity with its keys.
 */
export async function printCatalog(extractor: Extractor): Promise<void> {
  for (const { entity, nestedConnections } of await extractor.discover()) {
    console.log(
      `${entity.name}: keys=${entity.primaryKeys.join(',')} ` +
        `replication=${entity.replicationKey ?? '-'} nested=${nestedConnections.join(',') || '-'}`,
    );
  }
}

/**
 * Example 2: Incremental extraction
 *
 * Streams orders updated since the given instant and returns the checkpoint
 * to resume from next time.
 */
export async function extractOrdersSince(extractor: Extractor, since: Date): Promise<string | undefined> {
  const orders = await extractor.extraction('orders', {
    selectedFields: ['name', 'totalPriceSet', 'customer'],
    since,
  });

  for await (const record of orders.records()) {
    console.log(JSON.stringify(record));
  }
  return orders.checkpoint;
}

async function main(): Promise<void> {
  configure({
    store: process.env['SHOPIFY_STORE'] ?? '',
    accessToken: process.env['SHOPIFY_ACCESS_TOKEN'] ?? '',
  });

  const extractor = new Extractor();
  await printCatalog(extractor);
  const checkpoint = await extractOrdersSince(extractor, new Date(Date.now() - 24 * 60 * 60 * 1000));
  getLogger().info({ checkpoint }, 'Done');
}

if (process.argv[1]?.endsWith('basic-usage.ts')) {
  main().catch((error: unknown) => {
    getLogger().fatal({ err: error }, 'Example failed');
    process.exitCode = 1;
  });
}
