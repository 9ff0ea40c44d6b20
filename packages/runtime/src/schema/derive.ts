/**
 * Zod parameter shape to JSON Schema
 *
 * Parameters are declared once at registration as a zod raw shape. Each
 * entry becomes a descriptor that drives both the advertised schema and
 * argument binding. Derivation never throws: anything it cannot map is
 * advertised as the unconstrained schema `{}`.
 */

import type { JsonSchema, ObjectJsonSchema, PromptArgument } from '@plinth/core';
import { z } from 'zod';

export type JsonType = NonNullable<JsonSchema['type']>;

export type ParameterDescriptor = {
  name: string;
  required: boolean;
  hasDefault: boolean;
  defaultValue?: unknown;
  /** Undefined means any JSON value is accepted */
  type?: JsonType;
  description?: string;
  schema: z.ZodTypeAny;
};

type Unwrapped = {
  inner: z.ZodTypeAny;
  optional: boolean;
  nullable: boolean;
  hasDefault: boolean;
  defaultValue?: unknown;
  description?: string;
};

function unwrap(schema: z.ZodTypeAny): Unwrapped {
  const result: Unwrapped = {
    inner: schema,
    optional: false,
    nullable: false,
    hasDefault: false,
    description: schema.description
  };

  let current = schema;
  for (;;) {
    if (current instanceof z.ZodOptional) {
      result.optional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      result.hasDefault = true;
      result.defaultValue = current._def.defaultValue();
      current = current.removeDefault();
    } else if (current instanceof z.ZodCatch) {
      current = current.removeCatch();
    } else if (current instanceof z.ZodNullable) {
      result.nullable = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else if (current instanceof z.ZodBranded) {
      current = current.unwrap();
    } else if (current instanceof z.ZodReadonly) {
      current = current._def.innerType;
    } else if (current instanceof z.ZodPipeline) {
      current = current._def.in;
    } else {
      break;
    }
    result.description ??= current.description;
  }

  result.inner = current;
  return result;
}

function literalType(value: unknown): JsonType | undefined {
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return undefined;
  }
}

/**
 * Map an unwrapped zod type to a JSON primitive, or undefined when unknown
 */
export function jsonTypeOf(schema: z.ZodTypeAny): JsonType | undefined {
  if (schema instanceof z.ZodString || schema instanceof z.ZodEnum) {
    return 'string';
  }
  if (schema instanceof z.ZodNativeEnum) {
    const values: unknown[] = Object.values(schema.enum);
    return values.every((value) => typeof value === 'string') ? 'string' : undefined;
  }
  if (schema instanceof z.ZodLiteral) {
    return literalType(schema.value);
  }
  if (schema instanceof z.ZodNumber) {
    return 'number';
  }
  if (schema instanceof z.ZodBoolean) {
    return 'boolean';
  }
  if (schema instanceof z.ZodArray || schema instanceof z.ZodTuple || schema instanceof z.ZodSet) {
    return 'array';
  }
  if (schema instanceof z.ZodObject || schema instanceof z.ZodRecord) {
    return 'object';
  }
  return undefined;
}

/**
 * Build ordered descriptors from a parameter shape
 */
export function describeParameters(shape: z.ZodRawShape): ParameterDescriptor[] {
  return Object.entries(shape).map(([name, schema]) => {
    const unwrapped = unwrap(schema);
    const descriptor: ParameterDescriptor = {
      name,
      required: !unwrapped.optional && !unwrapped.hasDefault,
      hasDefault: unwrapped.hasDefault,
      schema
    };
    if (unwrapped.hasDefault) descriptor.defaultValue = unwrapped.defaultValue;
    // A nullable parameter also accepts null, so no single JSON type fits
    const type = unwrapped.nullable ? undefined : jsonTypeOf(unwrapped.inner);
    if (type) descriptor.type = type;
    if (unwrapped.description) descriptor.description = unwrapped.description;
    return descriptor;
  });
}

export function toPropertySchema(descriptor: ParameterDescriptor): JsonSchema {
  const property: JsonSchema = {};
  if (descriptor.type) property.type = descriptor.type;
  if (descriptor.description) property.description = descriptor.description;
  return property;
}

/**
 * Input schema for a tool. Defaults are never written into the schema.
 */
export function deriveInputSchema(descriptors: readonly ParameterDescriptor[]): ObjectJsonSchema {
  const properties: Record<string, JsonSchema> = {};
  for (const descriptor of descriptors) {
    properties[descriptor.name] = toPropertySchema(descriptor);
  }
  return {
    type: 'object',
    properties,
    required: descriptors.filter((d) => d.required).map((d) => d.name)
  };
}

export function derivePromptArguments(descriptors: readonly ParameterDescriptor[]): PromptArgument[] {
  return descriptors.map((descriptor) => {
    const argument: PromptArgument = { name: descriptor.name, required: descriptor.required };
    if (descriptor.description) argument.description = descriptor.description;
    return argument;
  });
}
