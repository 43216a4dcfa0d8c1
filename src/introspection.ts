/**
 * shopify-gql-extract
 *
 * Introspection Module
 *
 * The introspection document sent to the Admin API, the Type Node model it
 * yields, and helpers for walking wrapped type references.
 */

import { TypeKind } from 'graphql';
import * as z from 'zod';
import { UpstreamServiceError } from './errors.js';

/**
 * A (possibly wrapped) reference to a type, as returned by `__Type`.
 */
export interface TypeRef {
  kind: TypeKind;
  name: string | null;
  ofType?: TypeRef | null;
}

/**
 * A field of an introspected object type.
 */
export interface IntrospectedField {
  name: string;
  isDeprecated: boolean;
  args: Array<{ name: string }>;
  type: TypeRef;
}

/**
 * A named type from `__schema.types`.
 */
export interface IntrospectedType {
  kind: TypeKind;
  name: string;
  fields: IntrospectedField[] | null;
}

/**
 * The slice of the remote type system the extractor works from.
 */
export interface IntrospectedSchema {
  queryTypeName: string;
  types: ReadonlyMap<string, IntrospectedType>;
}

/**
 * Introspection document. Type references are unwrapped four levels deep,
 * enough for `NON_NULL(LIST(NON_NULL(T)))`.
 */
export const INTROSPECTION_QUERY = `query ExtractorIntrospection {
  __schema {
    queryType {
      name
    }
    types {
      kind
      name
      fields(includeDeprecated: true) {
        name
        isDeprecated
        args {
          name
        }
        type {
          ...TypeRef
        }
      }
    }
  }
}

fragment TypeRef on __Type {
  kind
  name
  ofType {
    kind
    name
    ofType {
      kind
      name
      ofType {
        kind
        name
        ofType {
          kind
          name
        }
      }
    }
  }
}`;

const TypeRefSchema: z.ZodType<TypeRef> = z.lazy(() =>
  z.object({
    kind: z.enum(TypeKind),
    name: z.string().nullable(),
    ofType: TypeRefSchema.nullable().optional(),
  }),
);

const IntrospectedFieldSchema = z.object({
  name: z.string(),
  isDeprecated: z.boolean().default(false),
  args: z.array(z.object({ name: z.string() })).default([]),
  type: TypeRefSchema,
});

const IntrospectionDataSchema = z.object({
  __schema: z.object({
    queryType: z.object({ name: z.string() }),
    types: z.array(
      z.object({
        kind: z.enum(TypeKind),
        name: z.string(),
        fields: z.array(IntrospectedFieldSchema).nullable().default(null),
      }),
    ),
  }),
});

/**
 * Validates the `data` of an introspection response and indexes its types.
 *
 * @throws {UpstreamServiceError} If the payload is not an introspection result
 */
export function parseIntrospection(data: unknown, serviceName = 'admin-api'): IntrospectedSchema {
  const result = IntrospectionDataSchema.safeParse(data);
  if (!result.success) {
    throw new UpstreamServiceError('Malformed introspection response', serviceName, {
      issues: result.error.issues,
    });
  }

  const types = new Map<string, IntrospectedType>();
  for (const type of result.data.__schema.types) {
    types.set(type.name, type);
  }

  return { queryTypeName: result.data.__schema.queryType.name, types };
}

/**
 * Follows `ofType` links down to the named type.
 */
export function unwrapNamedType(ref: TypeRef): TypeRef {
  let current = ref;
  while (current.ofType && (current.kind === TypeKind.NON_NULL || current.kind === TypeKind.LIST)) {
    current = current.ofType;
  }
  return current;
}

/**
 * True for `NON_NULL(SCALAR <scalarName>)`.
 */
export function isNonNullScalar(ref: TypeRef, scalarName: string): boolean {
  return (
    ref.kind === TypeKind.NON_NULL &&
    ref.ofType?.kind === TypeKind.SCALAR &&
    ref.ofType.name === scalarName
  );
}

/**
 * Fields of an object type, or an empty list for unknown or non-object types.
 */
export function getTypeFields(schema: IntrospectedSchema, typeName: string): IntrospectedField[] {
  return schema.types.get(typeName)?.fields ?? [];
}
