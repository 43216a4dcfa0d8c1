/**
 * shopify-gql-extract
 *
 * Query Builder Module
 *
 * Renders the query document for an entity from its record schema: a paged
 * connection query for interactive extraction, or a bulk operation
 * submission wrapping the same selection.
 */

import type { EntityDescriptor } from './discovery.js';
import type { RecordSchema, SchemaProperty } from './record-schema.js';
import { branchOf, findProperty, restrictSchema } from './record-schema.js';

export type ExtractionMode = 'interactive' | 'bulk';

/**
 * Options for building an entity query.
 */
export interface QueryBuildOptions {
  /** Document flavour (default: 'interactive') */
  mode?: ExtractionMode;
  /** Top-level fields to request; every field when omitted */
  selectedFields?: Iterable<string>;
  /** Only request records updated after this instant */
  since?: Date;
  /** Operation name for interactive queries */
  operationName?: string;
}

/**
 * Result of building a query.
 */
export interface BuiltQuery {
  /** The GraphQL document */
  query: string;
  /** Variables the document expects besides paging */
  variables: Record<string, unknown>;
  /** Operation name, null for anonymous documents */
  operationName: string | null;
  /** Size of the selection, logged with the query */
  metadata: {
    fieldCount: number;
    depth: number;
  };
}

/**
 * Sub-resources that are connections of their own and cannot be derived from
 * the record schema. The owning entity gets a loose property of that name and
 * the fragment is spliced into its selection.
 */
const AUXILIARY_FRAGMENTS: Record<string, { field: string; fragment: string }> = {
  orders: {
    field: 'lineItems',
    fragment:
      'lineItems(first: 250) { edges { node { id name title sku vendor quantity ' +
      'currentQuantity taxable requiresShipping variant { id } product { id } ' +
      'originalUnitPriceSet { shopMoney { amount currencyCode } } ' +
      'discountedTotalSet { shopMoney { amount currencyCode } } } } }',
  },
};

/**
 * Adds the loose auxiliary property an entity's query carries, if any.
 */
export function withAuxiliaryProperties(entity: EntityDescriptor, schema: RecordSchema): RecordSchema {
  const auxiliary = AUXILIARY_FRAGMENTS[entity.queryName];
  if (!auxiliary || findProperty(schema, auxiliary.field)) return schema;

  return {
    ...schema,
    properties: [
      ...schema.properties,
      {
        name: auxiliary.field,
        type: { kind: 'object', properties: [], loose: true },
        required: false,
      },
    ],
  };
}

/**
 * Formats an instant the way the search syntax expects (`YYYY-MM-DDTHH:MM:SS`, UTC).
 */
export function formatFilterTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19);
}

/**
 * The incremental search expression for an instant.
 */
export function incrementalFilter(since: Date): string {
  return `updated_at:>${formatFilterTimestamp(since)}`;
}

/**
 * Static arguments followed by the incremental filter, in that order.
 * The filter is only added for entities with a replication key.
 */
export function buildFilters(entity: EntityDescriptor, since?: Date): string[] {
  const filters = [...entity.staticArguments];
  if (since && entity.replicationKey) {
    filters.push(`query: ${JSON.stringify(incrementalFilter(since))}`);
  }
  return filters;
}

/**
 * Renders an argument list, or nothing at all when there are no arguments.
 */
export function renderArguments(args: readonly string[]): string {
  return args.length > 0 ? `(${args.join(', ')})` : '';
}

/**
 * Restricts a schema to the selected fields plus the entity's identity and
 * replication key.
 */
export function selectSchema(
  entity: EntityDescriptor,
  schema: RecordSchema,
  selectedFields?: Iterable<string>,
): RecordSchema {
  if (selectedFields === undefined) return schema;

  const names = new Set(selectedFields);
  for (const key of entity.primaryKeys) names.add(key);
  if (entity.replicationKey) names.add(entity.replicationKey);

  return restrictSchema(schema, names);
}

/**
 * Builds the query document for an entity.
 *
 * Never fails on a degenerate schema: an empty selection renders as
 * `__typename` and the server decides what to make of it.
 *
 * @example
 * ```typescript
 * const { query, variables } = buildQuery(orders, schema, {
 *   selectedFields: ['name', 'totalPriceSet'],
 *   since: new Date('2024-01-01T00:00:00Z'),
 * });
 * // query ExtractOrders($first: Int!, $after: String, $filter: String) {
 * //   orders(first: $first, after: $after, query: $filter) { ... } }
 * // variables: { filter: 'updated_at:>2024-01-01T00:00:00' }
 * ```
 */
export function buildQuery(
  entity: EntityDescriptor,
  schema: RecordSchema,
  options: QueryBuildOptions = {},
): BuiltQuery {
  const selected = selectSchema(entity, schema, options.selectedFields);
  const parts = buildRootSelections(entity, selected.properties);
  const selection = ` { ${parts.length > 0 ? parts.join(' ') : '__typename'} }`;
  const metadata = calculateMetadata(selected.properties);

  if (options.mode === 'bulk') {
    const inner = `{ ${entity.queryName}${renderArguments(buildFilters(entity, options.since))} { edges { node${selection} } } }`;
    return {
      query:
        `mutation { bulkOperationRunQuery(query: """${inner}""") ` +
        '{ bulkOperation { id status } userErrors { field message } } }',
      variables: {},
      operationName: null,
      metadata,
    };
  }

  const operationName = options.operationName ?? `Extract${capitalize(entity.queryName)}`;
  const args = renderArguments([
    'first: $first',
    'after: $after',
    ...entity.staticArguments,
    'query: $filter',
  ]);
  const variables: Record<string, unknown> =
    options.since && entity.replicationKey ? { filter: incrementalFilter(options.since) } : {};

  return {
    query:
      `query ${operationName}($first: Int!, $after: String, $filter: String) ` +
      `{ ${entity.queryName}${args} { edges { cursor node${selection} } ` +
      'pageInfo { hasNextPage endCursor } } }',
    variables,
    operationName,
    metadata,
  };
}

// === Internal helpers ===

function buildRootSelections(entity: EntityDescriptor, properties: SchemaProperty[]): string[] {
  const auxiliary = AUXILIARY_FRAGMENTS[entity.queryName];
  const parts = buildSelections(properties);

  if (auxiliary && properties.some((property) => property.name === auxiliary.field)) {
    parts.push(auxiliary.fragment);
  }
  return parts;
}

function buildSelections(properties: SchemaProperty[]): string[] {
  const parts: string[] = [];

  for (const property of properties) {
    const branch = branchOf(property.type);
    if (!branch) {
      parts.push(property.name);
      continue;
    }
    // Loose objects are only ever rendered from a fixed fragment.
    if (branch.loose) continue;

    const nested = buildSelections(branch.properties);
    if (nested.length > 0) {
      parts.push(`${property.name} { ${nested.join(' ')} }`);
    }
  }

  return parts;
}

function calculateMetadata(properties: SchemaProperty[]): { fieldCount: number; depth: number } {
  let count = 0;
  let maxDepth = 0;

  function traverse(list: SchemaProperty[], depth: number): void {
    for (const property of list) {
      count++;
      if (depth > maxDepth) maxDepth = depth;
      const branch = branchOf(property.type);
      if (branch) traverse(branch.properties, depth + 1);
    }
  }

  traverse(properties, 1);
  return { fieldCount: count, depth: maxDepth };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
