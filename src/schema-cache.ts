/**
 * shopify-gql-extract
 *
 * Schema Cache Module
 *
 * Process-wide cache of introspected type systems, keyed by endpoint. The
 * remote schema is fetched once per run; concurrent loads share the same
 * pending request.
 */

import type { GraphQLClient } from './client.js';
import { UpstreamServiceError } from './errors.js';
import type { IntrospectedSchema } from './introspection.js';
import { INTROSPECTION_QUERY, parseIntrospection } from './introspection.js';
import { getLogger } from './logger.js';

/**
 * Cache statistics.
 */
export interface SchemaCacheStats {
  hits: number;
  misses: number;
  size: number;
}

const cache = new Map<string, Promise<IntrospectedSchema>>();
let stats: SchemaCacheStats = { hits: 0, misses: 0, size: 0 };

/**
 * Loads the type system behind a client's endpoint, introspecting at most
 * once per endpoint.
 *
 * @throws {UpstreamServiceError} If introspection fails; failures are not cached
 */
export async function loadSchema(client: GraphQLClient): Promise<IntrospectedSchema> {
  const key = client.endpoint;
  const cached = cache.get(key);
  if (cached) {
    stats.hits++;
    return cached;
  }

  stats.misses++;
  const pending = introspect(client);
  cache.set(key, pending);
  stats.size = cache.size;

  try {
    return await pending;
  } catch (error) {
    cache.delete(key);
    stats.size = cache.size;
    throw error;
  }
}

/**
 * Clears all cached schemas.
 */
export function clearSchemaCache(): void {
  cache.clear();
  stats = { hits: 0, misses: 0, size: 0 };
}

/**
 * Gets cache statistics.
 */
export function getSchemaCacheStats(): SchemaCacheStats {
  return { ...stats };
}

async function introspect(client: GraphQLClient): Promise<IntrospectedSchema> {
  const response = await client.execute(INTROSPECTION_QUERY);
  if (response.errors?.length) {
    throw new UpstreamServiceError(
      `Introspection failed: ${response.errors.map((e) => e.message).join(', ')}`,
      'admin-api',
      { errors: response.errors },
    );
  }

  const schema = parseIntrospection(response.data);
  getLogger().info({ endpoint: client.endpoint, types: schema.types.size }, 'Loaded remote schema');
  return schema;
}
