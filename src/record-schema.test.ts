/**
 * shopify-gql-extract
 *
 * Unit tests for the record schema module.
 */

import { describe, expect, it } from 'vitest';
import type { RecordSchema } from './record-schema.js';
import { findProperty, hasPath, pruneSchema, restrictSchema, toJsonSchema } from './record-schema.js';

function orderSchema(): RecordSchema {
  return {
    kind: 'object',
    properties: [
      { name: 'id', type: { kind: 'string' }, required: true },
      { name: 'updatedAt', type: { kind: 'timestamp' }, required: true },
      {
        name: 'customer',
        type: {
          kind: 'object',
          properties: [
            { name: 'id', type: { kind: 'string' }, required: true },
            { name: 'email', type: { kind: 'string' }, required: true },
          ],
        },
        required: false,
      },
      {
        name: 'lines',
        type: {
          kind: 'array',
          items: {
            kind: 'object',
            properties: [
              { name: 'sku', type: { kind: 'string' }, required: false },
              { name: 'quantity', type: { kind: 'integer' }, required: true },
            ],
          },
        },
        required: true,
      },
      { name: 'tags', type: { kind: 'array', items: { kind: 'string' } }, required: false },
    ],
  };
}

describe('Record Schema Module', () => {
  describe('hasPath', () => {
    it('should follow objects and arrays', () => {
      const schema = orderSchema();

      expect(hasPath(schema, ['customer', 'email'])).toBe(true);
      expect(hasPath(schema, ['lines', 'sku'])).toBe(true);
      expect(hasPath(schema, ['customer', 'phone'])).toBe(false);
      expect(hasPath(schema, ['id', 'value'])).toBe(false);
      expect(hasPath(schema, [])).toBe(false);
    });
  });

  describe('restrictSchema', () => {
    it('should keep declaration order regardless of the requested order', () => {
      const restricted = restrictSchema(orderSchema(), ['tags', 'id']);

      expect(restricted.properties.map((p) => p.name)).toEqual(['id', 'tags']);
    });
  });

  describe('pruneSchema', () => {
    it('should remove a nested property and its required entry', () => {
      const schema = orderSchema();
      const { schema: pruned, pruned: changed } = pruneSchema(schema, ['customer', 'email']);

      expect(changed).toBe(true);
      expect(hasPath(pruned, ['customer', 'email'])).toBe(false);
      expect(toJsonSchema(pruned).properties?.['customer']).toEqual({
        type: ['object', 'null'],
        properties: { id: { type: 'string' } },
        required: ['id'],
      });
    });

    it('should not mutate the source schema', () => {
      const schema = orderSchema();
      pruneSchema(schema, ['customer', 'email']);

      expect(hasPath(schema, ['customer', 'email'])).toBe(true);
    });

    it('should look through arrays', () => {
      const { schema, pruned } = pruneSchema(orderSchema(), ['lines', 'sku']);

      expect(pruned).toBe(true);
      expect(hasPath(schema, ['lines', 'sku'])).toBe(false);
      expect(hasPath(schema, ['lines', 'quantity'])).toBe(true);
    });

    it('should remove top-level properties', () => {
      const { schema } = pruneSchema(orderSchema(), ['tags']);

      expect(findProperty(schema, 'tags')).toBeUndefined();
      expect(schema.properties).toHaveLength(4);
    });

    it('should report absent paths without copying', () => {
      const schema = orderSchema();

      expect(pruneSchema(schema, ['missing'])).toEqual({ schema, pruned: false });
      expect(pruneSchema(schema, ['id', 'value']).pruned).toBe(false);
      expect(pruneSchema(schema, []).pruned).toBe(false);
    });
  });

  describe('toJsonSchema', () => {
    it('should produce nullable-by-default JSON Schema', () => {
      expect(toJsonSchema(orderSchema())).toEqual({
        type: 'object',
        properties: {
          id: { type: 'string' },
          updatedAt: { type: 'string', format: 'date-time' },
          customer: {
            type: ['object', 'null'],
            properties: { id: { type: 'string' }, email: { type: 'string' } },
            required: ['id', 'email'],
          },
          lines: {
            type: 'array',
            items: {
              type: 'object',
              properties: { sku: { type: ['string', 'null'] }, quantity: { type: 'integer' } },
              required: ['quantity'],
            },
          },
          tags: { type: ['array', 'null'], items: { type: 'string' } },
        },
        required: ['id', 'updatedAt', 'lines'],
      });
    });

    it('should render loose objects without properties', () => {
      const schema: RecordSchema = {
        kind: 'object',
        properties: [
          { name: 'lineItems', type: { kind: 'object', properties: [], loose: true }, required: false },
        ],
      };

      expect(toJsonSchema(schema)).toEqual({
        type: 'object',
        properties: { lineItems: { type: ['object', 'null'] } },
      });
    });
  });
});
