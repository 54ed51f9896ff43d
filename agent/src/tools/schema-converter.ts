import { z } from 'zod';
import type { JsonSchema, JsonSchemaProperty } from './types.js';

export function zodToJsonSchema(schema: z.ZodObject<z.ZodRawShape>): JsonSchema {
  const { properties, required } = objectProperties(schema);
  return {
    type: 'object',
    properties,
    ...(required.length > 0 && { required }),
  };
}

function objectProperties(schema: z.ZodObject<z.ZodRawShape>): {
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
} {
  const shape = schema._def.shape();
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries(shape)) {
    properties[key] = zodTypeToJsonSchemaProperty(value);
    // defaults accept undefined, so they count as optional too
    if (!value.isOptional()) {
      required.push(key);
    }
  }
  return { properties, required };
}

function withDescription(property: JsonSchemaProperty, description: string | undefined): JsonSchemaProperty {
  return description ? { ...property, description } : property;
}

function zodTypeToJsonSchemaProperty(zodType: z.ZodTypeAny): JsonSchemaProperty {
  const desc = zodType._def.description;

  // Wrappers: keep the outer description, take the shape from the inner type
  if (zodType instanceof z.ZodOptional || zodType instanceof z.ZodNullable) {
    return withDescription(zodTypeToJsonSchemaProperty(zodType._def.innerType), desc);
  }
  if (zodType instanceof z.ZodDefault) {
    const inner = zodTypeToJsonSchemaProperty(zodType._def.innerType);
    return withDescription({ ...inner, default: zodType._def.defaultValue() }, desc);
  }
  if (zodType instanceof z.ZodEffects) {
    return withDescription(zodTypeToJsonSchemaProperty(zodType._def.schema), desc);
  }

  // Primitives
  if (zodType instanceof z.ZodString) {
    return withDescription({ type: 'string' }, desc);
  }
  if (zodType instanceof z.ZodNumber) {
    let property: JsonSchemaProperty = { type: 'number' };
    for (const check of zodType._def.checks) {
      if (check.kind === 'int') {
        property = { ...property, type: 'integer' };
      } else if (check.kind === 'min') {
        property = { ...property, minimum: check.inclusive ? check.value : check.value + 1 };
      }
    }
    return withDescription(property, desc);
  }
  if (zodType instanceof z.ZodBoolean) {
    return withDescription({ type: 'boolean' }, desc);
  }

  if (zodType instanceof z.ZodEnum) {
    return withDescription({ type: 'string', enum: [...zodType._def.values] }, desc);
  }

  if (zodType instanceof z.ZodArray) {
    return withDescription({ type: 'array', items: zodTypeToJsonSchemaProperty(zodType._def.type) }, desc);
  }

  if (zodType instanceof z.ZodObject) {
    const { properties, required } = objectProperties(zodType);
    return withDescription(
      {
        type: 'object',
        properties,
        ...(required.length > 0 && { required }),
      },
      desc
    );
  }

  if (zodType instanceof z.ZodRecord) {
    return withDescription({ type: 'object' }, desc);
  }

  // Fallback
  return withDescription({ type: 'string' }, desc);
}
