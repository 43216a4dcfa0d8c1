/**
 * shopify-gql-extract
 *
 * Configuration Module
 *
 * Global settings consumed by the extraction core. Loading them from a file,
 * a CLI or a catalog is the caller's job; this module only validates and
 * holds them.
 */

import * as z from 'zod';
import { ConfigurationError } from './errors.js';

const ExtractorConfigSchema = z.object({
  /** Shop name (`my-store`) or full host (`my-store.myshopify.com`) */
  store: z.string(),
  /** Admin API version, e.g. `2024-01` */
  apiVersion: z.string().regex(/^(\d{4}-\d{2}|unstable)$/, 'must look like YYYY-MM or unstable'),
  /** Admin API access token */
  accessToken: z.string(),
  /** Use bulk operations instead of paged queries */
  bulk: z.boolean(),
  /** Prune inaccessible fields and skip inaccessible entities instead of failing */
  ignoreAccessDenied: z.boolean(),
  /** Leave deprecated fields out of inferred schemas */
  ignoreDeprecated: z.boolean(),
  /** Earliest replication-key value to extract when no checkpoint exists */
  startDate: z.coerce.date().optional(),
  /** Per-request timeout in milliseconds */
  requestTimeout: z.number().int().positive(),
  /** Retries for throttled, 5xx and reset requests */
  maxRetries: z.number().int().nonnegative(),
  /** Seconds between bulk operation status polls */
  pollInterval: z.number().positive(),
  /** Seconds before a bulk operation is abandoned */
  pollTimeout: z.number().positive(),
  /** Cost the paginator aims to spend on one query */
  costCap: z.number().positive(),
  /** Largest page size the API accepts */
  maxPageSize: z.number().int().positive().max(250),
});

/**
 * Configuration for the extractor.
 */
export type ExtractorConfig = z.infer<typeof ExtractorConfigSchema>;

/**
 * Accepted input for {@link configure}; `startDate` may be a string.
 */
export type ExtractorConfigInput = Partial<z.input<typeof ExtractorConfigSchema>>;

const DEFAULT_CONFIG: ExtractorConfig = {
  store: '',
  apiVersion: '2024-01',
  accessToken: '',
  bulk: false,
  ignoreAccessDenied: true,
  ignoreDeprecated: true,
  startDate: undefined,
  requestTimeout: 30000,
  maxRetries: 3,
  pollInterval: 10,
  pollTimeout: 1800,
  costCap: 1000,
  maxPageSize: 250,
};

let currentConfig: ExtractorConfig = { ...DEFAULT_CONFIG };

/**
 * Validates and applies configuration options on top of the current ones.
 *
 * @throws {ConfigurationError} If any value is invalid; `configKey` names the
 * first offending option
 *
 * @example
 * ```typescript
 * configure({
 *   store: 'my-store',
 *   accessToken: process.env.SHOPIFY_TOKEN,
 *   startDate: '2024-01-01T00:00:00Z',
 * });
 * ```
 */
export function configure(options: ExtractorConfigInput): void {
  const result = ExtractorConfigSchema.partial().safeParse(options);

  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path[0] !== undefined ? String(issue.path[0]) : 'config';
    throw new ConfigurationError(`${key}: ${issue?.message ?? 'invalid value'}`, key);
  }

  const applied = Object.fromEntries(
    Object.entries(result.data).filter(([, value]) => value !== undefined),
  );
  currentConfig = ExtractorConfigSchema.parse({ ...currentConfig, ...applied });
}

/**
 * Retrieves a copy of the current configuration.
 */
export function getConfig(): ExtractorConfig {
  return { ...currentConfig };
}

/**
 * Resets configuration to default values.
 */
export function resetConfig(): void {
  currentConfig = { ...DEFAULT_CONFIG };
}

/**
 * Renders the Admin API GraphQL endpoint for a configuration.
 *
 * @throws {ConfigurationError} If no store is configured
 *
 * @example
 * ```typescript
 * resolveEndpoint({ ...getConfig(), store: 'my-store', apiVersion: '2024-01' });
 * // 'https://my-store.myshopify.com/admin/api/2024-01/graphql.json'
 * ```
 */
export function resolveEndpoint(config: ExtractorConfig = currentConfig): string {
  if (!config.store) {
    throw new ConfigurationError('store is required to build the endpoint', 'store');
  }
  const host = config.store.includes('.') ? config.store : `${config.store}.myshopify.com`;
  return `https://${host}/admin/api/${config.apiVersion}/graphql.json`;
}
