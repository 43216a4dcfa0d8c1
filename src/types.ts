/**
 * shopify-gql-extract
 *
 * Type re-exports for consumers who prefer importing from a single location.
 * Types are defined inline in their respective modules.
 */

import {
  BulkOperationError,
  ConfigurationError,
  FieldRecoveryError,
  UpstreamServiceError,
} from './errors.js';

export type { BuiltQuery, ExtractionMode, QueryBuildOptions } from './builder.js';
export type { BulkJob, BulkOutcome } from './bulk.js';
export type { GraphQLErrorEntry, GraphQLResponse, QueryCost } from './client.js';
export type { ExtractorConfig, ExtractorConfigInput } from './config.js';
export type { EntityDescriptor } from './discovery.js';
export type { CatalogEntry, EntityExtractionOptions, ExtractedRecord } from './extractor.js';
export type { PageRequest, PaginationState } from './paginator.js';
export type { JsonSchema, RecordSchema, SchemaProperty, SchemaType } from './record-schema.js';
export type { RecoveryDecision } from './recovery.js';

/**
 * Any error raised by the extraction core.
 */
export type ExtractorError =
  | ConfigurationError
  | UpstreamServiceError
  | BulkOperationError
  | FieldRecoveryError;

/**
 * Type guard for errors raised by the extraction core.
 *
 * @example
 * ```typescript
 * try {
 *   for await (const record of extractor.extract('orders')) emit(record);
 * } catch (error) {
 *   if (isExtractorError(error)) log.error({ code: error.code }, error.message);
 * }
 * ```
 */
export function isExtractorError(error: unknown): error is ExtractorError {
  return (
    error instanceof ConfigurationError ||
    error instanceof UpstreamServiceError ||
    error instanceof BulkOperationError ||
    error instanceof FieldRecoveryError
  );
}
