/**
 * shopify-gql-extract
 *
 * Record Schema Module
 *
 * The hierarchical schema inferred for an entity. Schemas are treated as
 * values: restricting or pruning derives a new tree and leaves the input
 * untouched, so a caller swaps its stored reference instead of mutating a
 * tree someone else may hold.
 */

export type ScalarKind = 'boolean' | 'timestamp' | 'number' | 'integer' | 'string';

export interface ScalarSchema {
  kind: ScalarKind;
}

export interface ObjectSchema {
  kind: 'object';
  properties: SchemaProperty[];
  /** Accepts any shape; rendered as a plain nullable object */
  loose?: boolean;
}

export interface ArraySchema {
  kind: 'array';
  items: SchemaType;
}

export type SchemaType = ScalarSchema | ObjectSchema | ArraySchema;

export interface SchemaProperty {
  name: string;
  type: SchemaType;
  required: boolean;
}

/**
 * Top-level schema of one entity.
 */
export type RecordSchema = ObjectSchema;

/**
 * JSON Schema emitted for downstream consumers.
 */
export interface JsonSchema {
  type: string | string[];
  format?: string;
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  required?: string[];
}

export function isObjectSchema(type: SchemaType): type is ObjectSchema {
  return type.kind === 'object';
}

export function isArraySchema(type: SchemaType): type is ArraySchema {
  return type.kind === 'array';
}

/**
 * Returns the object schema a property branches into, looking through arrays.
 */
export function branchOf(type: SchemaType): ObjectSchema | undefined {
  if (isArraySchema(type)) return branchOf(type.items);
  return isObjectSchema(type) ? type : undefined;
}

/**
 * Finds a top-level property by name.
 */
export function findProperty(schema: RecordSchema, name: string): SchemaProperty | undefined {
  return schema.properties.find((property) => property.name === name);
}

/**
 * True if the dotted field path exists in the schema.
 */
export function hasPath(schema: ObjectSchema, path: readonly string[]): boolean {
  if (path.length === 0) return false;
  const [head, ...rest] = path;
  const property = schema.properties.find((p) => p.name === head);
  if (!property) return false;
  if (rest.length === 0) return true;
  const branch = branchOf(property.type);
  return branch !== undefined && hasPath(branch, rest);
}

/**
 * Keeps only the named top-level properties, in declaration order.
 */
export function restrictSchema(schema: RecordSchema, names: Iterable<string>): RecordSchema {
  const keep = new Set(names);
  return {
    ...schema,
    properties: schema.properties.filter((property) => keep.has(property.name)),
  };
}

/**
 * Derives a schema without the property at `path`.
 *
 * Arrays are looked through, so `['lines', 'sku']` reaches `sku` inside an
 * array of objects. Removing a property also removes it from its parent's
 * required list, since `required` is carried on the property itself.
 *
 * @returns The derived schema and whether anything was removed
 */
export function pruneSchema(
  schema: RecordSchema,
  path: readonly string[],
): { schema: RecordSchema; pruned: boolean } {
  const result = pruneObject(schema, path);
  return result ? { schema: result, pruned: true } : { schema, pruned: false };
}

function pruneObject(schema: ObjectSchema, path: readonly string[]): ObjectSchema | undefined {
  const [head, ...rest] = path;
  if (head === undefined) return undefined;

  const index = schema.properties.findIndex((property) => property.name === head);
  if (index === -1) return undefined;

  const properties = [...schema.properties];
  if (rest.length === 0) {
    properties.splice(index, 1);
    return { ...schema, properties };
  }

  const property = properties[index];
  if (!property) return undefined;
  const type = pruneType(property.type, rest);
  if (!type) return undefined;

  properties[index] = { ...property, type };
  return { ...schema, properties };
}

function pruneType(type: SchemaType, path: readonly string[]): SchemaType | undefined {
  if (isArraySchema(type)) {
    const items = pruneType(type.items, path);
    return items ? { ...type, items } : undefined;
  }
  if (isObjectSchema(type)) {
    return pruneObject(type, path);
  }
  return undefined;
}

/**
 * Converts a record schema to nullable-by-default JSON Schema.
 *
 * @example
 * ```typescript
 * toJsonSchema({
 *   kind: 'object',
 *   properties: [{ name: 'id', type: { kind: 'string' }, required: true }],
 * });
 * // { type: 'object', properties: { id: { type: 'string' } }, required: ['id'] }
 * ```
 */
export function toJsonSchema(schema: RecordSchema): JsonSchema {
  return objectToJson(schema, true);
}

function objectToJson(schema: ObjectSchema, required: boolean): JsonSchema {
  const json: JsonSchema = { type: nullable('object', required) };
  if (schema.loose) return json;

  json.properties = Object.fromEntries(
    schema.properties.map((property) => [property.name, typeToJson(property.type, property.required)]),
  );
  const requiredNames = schema.properties.filter((p) => p.required).map((p) => p.name);
  if (requiredNames.length > 0) json.required = requiredNames;
  return json;
}

function typeToJson(type: SchemaType, required: boolean): JsonSchema {
  switch (type.kind) {
    case 'object':
      return objectToJson(type, required);
    case 'array':
      return { type: nullable('array', required), items: typeToJson(type.items, true) };
    case 'timestamp':
      return { type: nullable('string', required), format: 'date-time' };
    default:
      return { type: nullable(type.kind, required) };
  }
}

function nullable(type: string, required: boolean): string | string[] {
  return required ? type : [type, 'null'];
}
