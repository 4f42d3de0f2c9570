/**
 * JSON Schema to Zod
 *
 * Rebuilds native argument types from a tool's canonical JSON Schema so
 * invocations from a local model can be validated before they reach the
 * registry.
 */

import { z } from 'zod';
import type { JsonSchema } from '../tools/registry.js';

/**
 * Convert a JSON Schema to Zod schema
 * Supports basic types and nested objects
 */
export function jsonSchemaToZod(schema: JsonSchema): z.ZodTypeAny {
  const type = schema.type;

  if (!type) {
    // If no type specified, allow any
    return z.unknown();
  }

  switch (type) {
    case 'string': {
      if (schema.enum !== undefined) {
        const [first, ...rest] = schema.enum;
        if (first !== undefined) {
          return z.enum([first, ...rest]);
        }
      }
      let zodSchema = z.string();
      if (schema.minLength !== undefined) {
        zodSchema = zodSchema.min(schema.minLength);
      }
      if (schema.maxLength !== undefined) {
        zodSchema = zodSchema.max(schema.maxLength);
      }
      return zodSchema;
    }

    case 'number':
    case 'integer': {
      let zodSchema = type === 'integer' ? z.number().int() : z.number();
      if (schema.minimum !== undefined) {
        zodSchema = zodSchema.min(schema.minimum);
      }
      if (schema.maximum !== undefined) {
        zodSchema = zodSchema.max(schema.maximum);
      }
      return zodSchema;
    }

    case 'boolean':
      return z.boolean();

    case 'array': {
      const itemSchema = schema.items ? jsonSchemaToZod(schema.items) : z.unknown();
      let arraySchema = z.array(itemSchema);
      if (schema.minItems !== undefined) {
        arraySchema = arraySchema.min(schema.minItems);
      }
      if (schema.maxItems !== undefined) {
        arraySchema = arraySchema.max(schema.maxItems);
      }
      return arraySchema;
    }

    case 'object': {
      const properties = schema.properties;
      if (!properties) {
        return z.object({}).passthrough();
      }

      const shape: Record<string, z.ZodTypeAny> = {};
      for (const [key, propSchema] of Object.entries(properties)) {
        const zodProp = jsonSchemaToZod(propSchema);
        shape[key] = schema.required?.includes(key) ? zodProp : zodProp.optional();
      }
      return z.object(shape);
    }

    case 'null':
      return z.null();
  }
}
