/**
 * shopify-gql-extract
 *
 * Custom Error Classes
 *
 * Fatal conditions raised by the extraction core. Recoverable conditions
 * (pruned fields, skipped entities, empty bulk results) never surface as
 * errors past an entity's record iterator.
 */

/**
 * Error thrown when configuration values are invalid.
 *
 * @example
 * ```typescript
 * try {
 *   configure({ pollInterval: -1 });
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.error('Invalid config key:', error.configKey);
 *   }
 * }
 * ```
 */
export class ConfigurationError extends Error {
  public readonly configKey: string;
  public readonly code: string;

  constructor(message: string, configKey: string, code = 'CONFIGURATION_ERROR') {
    super(message);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
    this.code = code;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when the Admin API cannot be reached or answers without a
 * usable GraphQL body (transport failure, timeout, malformed JSON).
 */
export class UpstreamServiceError extends Error {
  public readonly serviceName: string;
  public readonly details?: Record<string, unknown>;
  public readonly code: string;

  constructor(
    message: string,
    serviceName: string,
    details?: Record<string, unknown>,
    code = 'UPSTREAM_SERVICE_ERROR',
  ) {
    super(message);
    this.name = 'UpstreamServiceError';
    this.serviceName = serviceName;
    this.details = details;
    this.code = code;
    Object.setPrototypeOf(this, UpstreamServiceError.prototype);
  }
}

/**
 * Error thrown when a bulk operation reaches a state the extractor cannot
 * turn into rows or an empty result.
 *
 * @example
 * ```typescript
 * try {
 *   await bulk.poll(operationId);
 * } catch (error) {
 *   if (error instanceof BulkOperationError) {
 *     console.error(error.code, error.operationId);
 *   }
 * }
 * ```
 */
export class BulkOperationError extends Error {
  public readonly operationId?: string;
  public readonly details?: Record<string, unknown>;
  public readonly code: string;

  constructor(
    message: string,
    operationId?: string,
    details?: Record<string, unknown>,
    code = 'BULK_OPERATION_ERROR',
  ) {
    super(message);
    this.name = 'BulkOperationError';
    this.operationId = operationId;
    this.details = details;
    this.code = code;
    Object.setPrototypeOf(this, BulkOperationError.prototype);
  }
}

/**
 * Error thrown when a bulk operation does not finish within the poll timeout.
 */
export class BulkOperationTimeoutError extends BulkOperationError {
  public readonly timeoutSeconds: number;

  constructor(operationId: string, timeoutSeconds: number) {
    super(
      `Bulk operation ${operationId} did not finish within ${timeoutSeconds}s`,
      operationId,
      { timeoutSeconds },
      'BULK_OPERATION_TIMEOUT',
    );
    this.name = 'BulkOperationTimeoutError';
    this.timeoutSeconds = timeoutSeconds;
    Object.setPrototypeOf(this, BulkOperationTimeoutError.prototype);
  }
}

/**
 * Error thrown when field-level errors in a response cannot be absorbed by
 * pruning the entity schema.
 */
export class FieldRecoveryError extends Error {
  public readonly entity: string;
  public readonly details?: Record<string, unknown>;
  public readonly code: string;

  constructor(
    message: string,
    entity: string,
    details?: Record<string, unknown>,
    code = 'FIELD_RECOVERY_ERROR',
  ) {
    super(message);
    this.name = 'FieldRecoveryError';
    this.entity = entity;
    this.details = details;
    this.code = code;
    Object.setPrototypeOf(this, FieldRecoveryError.prototype);
  }
}
