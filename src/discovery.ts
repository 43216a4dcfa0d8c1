/**
 * shopify-gql-extract
 *
 * Entity Discovery Module
 *
 * Finds the extractable collections among the root query fields and derives
 * each one's identity and replication key from its record type.
 */

import type { IntrospectedField, IntrospectedSchema } from './introspection.js';
import { getTypeFields, isNonNullScalar, unwrapNamedType } from './introspection.js';

/**
 * An extractable entity.
 */
export interface EntityDescriptor {
  /** snake_case stream name, e.g. `draft_orders` */
  name: string;
  /** Root query field, e.g. `draftOrders` */
  queryName: string;
  /** Backing record type, e.g. `DraftOrder` */
  typeName: string;
  /** Fields of the ID scalar type */
  primaryKeys: string[];
  /** Timestamp field used for incremental extraction */
  replicationKey?: string;
  /** Literal arguments every query for this entity carries */
  staticArguments: string[];
}

/**
 * Result of discovery.
 */
export interface DiscoveryResult {
  entities: EntityDescriptor[];
  /** Backing types of every discovered entity */
  entityTypes: Set<string>;
}

/** Candidate replication keys, most preferred first */
export const REPLICATION_KEY_PRIORITY = [
  'updatedAt',
  'editedAt',
  'lastEditDate',
  'occurredAt',
  'createdAt',
  'startedAt',
  'processedAt',
] as const;

/** Optional root arguments switched on for every query that accepts them */
const STATIC_ARGUMENTS: Record<string, string> = {
  includeClosed: 'includeClosed: true',
};

/**
 * True for root fields that page (`first`) and filter (`query`).
 */
export function isCollectionQuery(field: IntrospectedField): boolean {
  const args = new Set(field.args.map((arg) => arg.name));
  return args.has('first') && args.has('query');
}

/**
 * Enumerates extractable entities.
 *
 * Entities whose record type has no ID field are dropped.
 *
 * @example
 * ```typescript
 * const { entities } = discoverEntities(await loadSchema(client));
 * // [{ name: 'orders', queryName: 'orders', typeName: 'Order',
 * //    primaryKeys: ['id'], replicationKey: 'updatedAt',
 * //    staticArguments: ['includeClosed: true'] }, ...]
 * ```
 */
export function discoverEntities(schema: IntrospectedSchema): DiscoveryResult {
  const entities: EntityDescriptor[] = [];
  const entityTypes = new Set<string>();

  for (const field of getTypeFields(schema, schema.queryTypeName)) {
    if (!isCollectionQuery(field)) continue;

    const typeName = recordTypeOf(schema, field);
    if (!typeName) continue;

    const fields = getTypeFields(schema, typeName);
    const primaryKeys = fields.filter((f) => isNonNullScalar(f.type, 'ID')).map((f) => f.name);
    if (primaryKeys.length === 0) continue;

    const timestamps = new Set(
      fields.filter((f) => isNonNullScalar(f.type, 'DateTime')).map((f) => f.name),
    );
    const replicationKey = REPLICATION_KEY_PRIORITY.find((key) => timestamps.has(key));

    const staticArguments = field.args.flatMap((arg) => {
      const literal = STATIC_ARGUMENTS[arg.name];
      return literal ? [literal] : [];
    });

    entityTypes.add(typeName);
    entities.push({
      name: underscore(field.name),
      queryName: field.name,
      typeName,
      primaryKeys,
      replicationKey,
      staticArguments,
    });
  }

  return { entities, entityTypes };
}

/**
 * Resolves a connection field to its node type through `nodes`, falling
 * back to `edges.node`.
 */
function recordTypeOf(schema: IntrospectedSchema, field: IntrospectedField): string | undefined {
  const connection = unwrapNamedType(field.type).name;
  if (!connection) return undefined;

  const connectionFields = getTypeFields(schema, connection);
  const nodes = connectionFields.find((f) => f.name === 'nodes');
  if (nodes) return unwrapNamedType(nodes.type).name ?? undefined;

  const edges = connectionFields.find((f) => f.name === 'edges');
  const edgeType = edges ? unwrapNamedType(edges.type).name : null;
  if (!edgeType) return undefined;

  const node = getTypeFields(schema, edgeType).find((f) => f.name === 'node');
  return node ? (unwrapNamedType(node.type).name ?? undefined) : undefined;
}

function underscore(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .toLowerCase();
}
