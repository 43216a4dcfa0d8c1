/**
 * shopify-gql-extract
 *
 * Error Recovery Module
 *
 * Interprets field-level errors on paged responses. Inaccessible fields are
 * pruned from the entity schema and the request replayed; errors that make
 * the whole entity unreachable skip it; anything else is fatal.
 *
 * Any path-scoped error below the top level is pruned, not only
 * ACCESS_DENIED. That catch-all is broad; a stricter allow-list of codes may
 * replace it once the server's codes are catalogued.
 */

import type { Logger } from 'pino';
import type { GraphQLErrorEntry } from './client.js';
import type { EntityDescriptor } from './discovery.js';
import { FieldRecoveryError } from './errors.js';
import { getLogger } from './logger.js';
import type { ObjectSchema, RecordSchema, SchemaProperty } from './record-schema.js';
import { branchOf, hasPath, pruneSchema } from './record-schema.js';

export const ACCESS_DENIED = 'ACCESS_DENIED';
export const MISSING_REQUIRED_ARGUMENTS = 'missingRequiredArguments';

/**
 * What to do with a response.
 */
export type RecoveryDecision =
  | { action: 'continue' }
  | { action: 'prune'; paths: string[][] }
  | { action: 'skip'; reason: string };

/**
 * Options for error recovery.
 */
export interface ErrorRecoveryOptions {
  /** Prune and skip instead of failing (the `ignoreAccessDenied` setting) */
  pruneEnabled: boolean;
  logger?: Logger;
}

/**
 * Maps a response error path to a field path inside the record schema.
 *
 * The root query field and the connection wrappers around the record
 * (`edges.<n>.node` or `nodes.<n>`) are dropped, as are list indices.
 *
 * @example
 * ```typescript
 * toFieldPath(['orders', 'edges', 3, 'node', 'customer', 'email']);
 * // ['customer', 'email']
 * ```
 */
export function toFieldPath(errorPath: ReadonlyArray<string | number>): string[] {
  const rest = errorPath.slice(1);

  if (rest[0] === 'edges') {
    rest.shift();
    if (typeof rest[0] === 'number') rest.shift();
    if (rest.at(0) === 'node') rest.shift();
  } else if (rest[0] === 'nodes') {
    rest.shift();
    if (typeof rest[0] === 'number') rest.shift();
  }

  return rest.filter((segment): segment is string => typeof segment === 'string');
}

/**
 * Shortens a field path that runs into a loose object, which has no
 * children of its own to prune.
 */
export function truncateAtLooseObject(schema: RecordSchema, path: readonly string[]): string[] {
  const truncated: string[] = [];
  let current: RecordSchema | undefined = schema;

  for (const segment of path) {
    truncated.push(segment);
    const property: SchemaProperty | undefined = current?.properties.find((p) => p.name === segment);
    const branch: ObjectSchema | undefined = property ? branchOf(property.type) : undefined;
    if (branch?.loose) break;
    current = branch;
  }

  return truncated;
}

/**
 * Field-level error handling for one entity.
 */
export class ErrorRecovery {
  private readonly logger: Logger;

  constructor(
    private readonly entity: EntityDescriptor,
    private readonly options: ErrorRecoveryOptions,
  ) {
    this.logger = (options.logger ?? getLogger()).child({ entity: entity.name });
  }

  /**
   * Decides how to handle the errors of one response.
   *
   * @throws {FieldRecoveryError} If pruning is disabled or an error carries
   * no usable path
   */
  evaluate(errors: readonly GraphQLErrorEntry[] | undefined): RecoveryDecision {
    if (!errors || errors.length === 0) return { action: 'continue' };

    for (const error of errors) {
      const path = error.path ?? [];
      if (!this.options.pruneEnabled || path.length === 0) {
        this.fail(error);
      }
    }

    for (const error of errors) {
      const code = error.extensions?.code;
      const path = error.path ?? [];

      if (code === MISSING_REQUIRED_ARGUMENTS) {
        this.logger.warn({ code, message: error.message }, 'Skipping entity: missing required arguments');
        return { action: 'skip', reason: MISSING_REQUIRED_ARGUMENTS };
      }
      if (path.length === 1 || toFieldPath(path).length === 0) {
        this.logger.warn(
          { code, path, message: error.message },
          'Skipping entity: error at the top-level query',
        );
        return { action: 'skip', reason: code ?? 'top-level error' };
      }
    }

    const paths = errors.map((error) => toFieldPath(error.path ?? []));
    for (const error of errors) {
      this.logger.warn(
        { code: error.extensions?.code, path: error.path, message: error.message },
        error.extensions?.code === ACCESS_DENIED
          ? 'Pruning inaccessible field'
          : 'Pruning field with error',
      );
    }
    return { action: 'prune', paths };
  }

  /**
   * Derives a schema without the given field paths.
   *
   * @throws {FieldRecoveryError} If none of the paths exist, since replaying
   * an unchanged query would fail the same way
   */
  prune(schema: RecordSchema, paths: readonly string[][]): RecordSchema {
    let current = schema;
    let changed = false;

    for (const path of paths) {
      const target = truncateAtLooseObject(current, path);
      if (!hasPath(current, target)) {
        this.logger.debug({ path }, 'Field already absent from schema');
        continue;
      }
      current = pruneSchema(current, target).schema;
      changed = true;
    }

    if (!changed) {
      const message = `Field errors reference fields absent from the ${this.entity.name} schema`;
      this.logger.error({ paths }, message);
      throw new FieldRecoveryError(message, this.entity.name, { paths }, 'FIELD_NOT_PRUNABLE');
    }

    return current;
  }

  private fail(error: GraphQLErrorEntry): never {
    const code = error.extensions?.code ?? null;
    this.logger.error({ code, path: error.path ?? null, message: error.message }, 'Unrecoverable GraphQL error');
    throw new FieldRecoveryError(`GraphQL error: ${error.message}`, this.entity.name, {
      code,
      path: error.path ?? null,
    });
  }
}
