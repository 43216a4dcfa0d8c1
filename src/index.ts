/**
 * shopify-gql-extract
 *
 * Schema-inferring extractor for the Shopify Admin GraphQL API. Entities and
 * their record schemas are derived from introspection instead of a
 * hand-maintained field mapping.
 *
 * The core workflow:
 * 1. Configure the store and credential once with configure()
 * 2. Discover entities and their JSON Schemas with Extractor.discover()
 * 3. Stream records with Extractor.extract(), one entity at a time
 *
 * @example
 * ```typescript
 * import { configure, Extractor } from 'shopify-gql-extract';
 *
 * configure({ store: 'my-store', accessToken: 'test-secret', startDate: '2024-01-01' });
 *
 * const extractor = new Extractor();
 * const catalog = await extractor.discover();
 *
 * const orders = await extractor.extraction('orders', { selectedFields: ['name'] });
 * for await (const record of orders.records()) {
 *   emit(record);
 * }
 * saveCheckpoint('orders', orders.checkpoint);
 * ```
 */

// === Extraction ===
export type {
  CatalogEntry,
  EntityExtractionOptions,
  ExtractedRecord,
  ExtractionDependencies,
} from './extractor.js';
export { EntityExtraction, Extractor } from './extractor.js';

// === Discovery & Schema Inference ===
export type { DiscoveryResult, EntityDescriptor } from './discovery.js';
export { discoverEntities, isCollectionQuery, REPLICATION_KEY_PRIORITY } from './discovery.js';
export type { ResolvedSchema, TypeResolverOptions } from './type-resolver.js';
export { TypeResolver } from './type-resolver.js';
export type {
  IntrospectedField,
  IntrospectedSchema,
  IntrospectedType,
  TypeRef,
} from './introspection.js';
export { INTROSPECTION_QUERY, parseIntrospection } from './introspection.js';
export type { SchemaCacheStats } from './schema-cache.js';
export { clearSchemaCache, getSchemaCacheStats, loadSchema } from './schema-cache.js';
export type {
  JsonSchema,
  RecordSchema,
  ScalarKind,
  SchemaProperty,
  SchemaType,
} from './record-schema.js';
export { pruneSchema, restrictSchema, toJsonSchema } from './record-schema.js';

// === Query Building ===
export type { BuiltQuery, ExtractionMode, QueryBuildOptions } from './builder.js';
export { buildFilters, buildQuery, incrementalFilter } from './builder.js';

// === Paging, Bulk & Recovery ===
export type { PagePlan, PageRequest, PaginationState, PaginatorOptions } from './paginator.js';
export { AdaptivePaginator } from './paginator.js';
export type { BulkJob, BulkOperationOptions, BulkOutcome } from './bulk.js';
export { BULK_STATUS_QUERY, BulkOperationManager } from './bulk.js';
export type { ErrorRecoveryOptions, RecoveryDecision } from './recovery.js';
export { ErrorRecovery, toFieldPath } from './recovery.js';

// === Transport ===
export type { GraphQLClientOptions, GraphQLErrorEntry, GraphQLResponse, QueryCost } from './client.js';
export { AccessTokenClient, createClient, GraphQLClient } from './client.js';

// === Configuration & Logging ===
export type { ExtractorConfig, ExtractorConfigInput } from './config.js';
export { configure, getConfig, resetConfig, resolveEndpoint } from './config.js';
export type { LoggerOptions } from './logger.js';
export { getLogger, initLogger } from './logger.js';

// === Errors ===
export {
  BulkOperationError,
  BulkOperationTimeoutError,
  ConfigurationError,
  FieldRecoveryError,
  UpstreamServiceError,
} from './errors.js';
export { isExtractorError } from './types.js';
