/**
 * shopify-gql-extract
 *
 * Type Resolver Module
 *
 * Walks the introspected type system from an entity's backing type and
 * derives its record schema. The remote graph is cyclic (order → customer →
 * order), so recursion is bounded two ways: references to other entity types
 * collapse to `{ id }`, and each root-level field tracks the object types it
 * has already expanded.
 */

import { TypeKind } from 'graphql';
import type { IntrospectedField, IntrospectedSchema, TypeRef } from './introspection.js';
import { getTypeFields } from './introspection.js';
import type { ObjectSchema, RecordSchema, ScalarKind, SchemaProperty, SchemaType } from './record-schema.js';

/**
 * Options controlling which fields make it into a schema.
 */
export interface TypeResolverOptions {
  /** Skip fields flagged `isDeprecated` */
  ignoreDeprecated?: boolean;
  /**
   * Mark every property optional. Used when inaccessible fields are pruned
   * at runtime, since a pruned required field would otherwise break records.
   */
  relaxRequired?: boolean;
  /** Field names never included */
  ignoredFields?: readonly string[];
  /** Backing types of discovered entities; references to them collapse to `{ id }` */
  entityTypes?: ReadonlySet<string>;
}

/**
 * A resolved entity schema.
 */
export interface ResolvedSchema {
  schema: RecordSchema;
  /** Root-level paginated sub-collection fields left out of the schema */
  nestedConnections: string[];
}

const SCALAR_KINDS: Record<string, ScalarKind> = {
  Boolean: 'boolean',
  DateTime: 'timestamp',
  Float: 'number',
  Int: 'integer',
};

const ENTITY_REFERENCE: ObjectSchema = {
  kind: 'object',
  properties: [{ name: 'id', type: { kind: 'string' }, required: true }],
};

/**
 * Derives record schemas from introspected types.
 *
 * @example
 * ```typescript
 * const resolver = new TypeResolver(schema, { entityTypes: new Set(['Order', 'Customer']) });
 * const resolved = resolver.resolve('Order');
 * // resolved.schema.properties -> id, name, customer { id }, ...
 * ```
 */
export class TypeResolver {
  private readonly ignored: ReadonlySet<string>;
  private readonly entityTypes: ReadonlySet<string>;

  constructor(
    private readonly types: IntrospectedSchema,
    private readonly options: TypeResolverOptions = {},
  ) {
    this.ignored = new Set(options.ignoredFields ?? []);
    this.entityTypes = options.entityTypes ?? new Set();
  }

  /**
   * Resolves the named object type into a record schema.
   *
   * @returns `undefined` when the type is unknown or has no usable fields
   */
  resolve(typeName: string): ResolvedSchema | undefined {
    const nestedConnections = new Set<string>();
    const properties: SchemaProperty[] = [];

    for (const field of this.usableFields(getTypeFields(this.types, typeName), nestedConnections)) {
      // Each root-level field starts with a fresh visited set.
      const visited = new Set<string>([typeName]);
      const property = this.resolveField(field, visited);
      if (property) properties.push(property);
    }

    if (properties.length === 0) return undefined;

    return {
      schema: { kind: 'object', properties },
      nestedConnections: [...nestedConnections],
    };
  }

  private usableFields(
    fields: IntrospectedField[],
    nestedConnections?: Set<string>,
  ): IntrospectedField[] {
    return fields.filter((field) => {
      if (field.isDeprecated && this.options.ignoreDeprecated) return false;
      if (field.args.length > 0) {
        if (field.args[0]?.name === 'first') nestedConnections?.add(field.name);
        return false;
      }
      if (this.ignored.has(field.name)) return false;
      return field.type.kind !== TypeKind.INTERFACE;
    });
  }

  private resolveField(field: IntrospectedField, visited: Set<string>): SchemaProperty | undefined {
    const type = this.resolveRef(field.type, visited);
    if (!type) return undefined;

    const required = field.type.kind === TypeKind.NON_NULL && !this.options.relaxRequired;
    return { name: field.name, type, required };
  }

  private resolveRef(ref: TypeRef, visited: Set<string>): SchemaType | undefined {
    switch (ref.kind) {
      case TypeKind.NON_NULL:
        return ref.ofType ? this.resolveRef(ref.ofType, visited) : undefined;

      case TypeKind.LIST: {
        // Element types are usually NON_NULL(T); the schema wants T itself.
        const element = ref.ofType?.kind === TypeKind.NON_NULL ? ref.ofType.ofType : ref.ofType;
        if (!element) return undefined;
        const items = this.resolveRef(element, visited);
        return items ? { kind: 'array', items } : undefined;
      }

      case TypeKind.ENUM:
        return { kind: 'string' };

      case TypeKind.SCALAR:
        return { kind: (ref.name && SCALAR_KINDS[ref.name]) || 'string' };

      case TypeKind.OBJECT:
        return ref.name ? this.resolveObject(ref.name, visited) : undefined;

      default:
        return undefined;
    }
  }

  private resolveObject(typeName: string, visited: Set<string>): ObjectSchema | undefined {
    if (this.entityTypes.has(typeName)) return ENTITY_REFERENCE;
    if (visited.has(typeName)) return undefined;
    visited.add(typeName);

    const properties: SchemaProperty[] = [];
    for (const field of this.usableFields(getTypeFields(this.types, typeName))) {
      const property = this.resolveField(field, visited);
      if (property) properties.push(property);
    }

    return properties.length > 0 ? { kind: 'object', properties } : undefined;
  }
}
