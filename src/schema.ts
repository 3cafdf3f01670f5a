/**
 * Output schemas: the structured-output contract an agent can declare.
 */

import type { JSONSchema7, JSONSchema7TypeName } from 'json-schema';
import type { FieldType, OutputType, StructField } from './ast';
import { toJsonValue } from './values';

export interface OutputSchema {
  fields: StructField[];
}

/**
 * Build an output schema from a declared output type, resolving a named
 * type against the struct declarations seen so far.
 *
 * Returns undefined when the named struct is unknown.
 */
export function resolveOutputSchema(
  output: OutputType,
  structs: ReadonlyMap<string, StructField[]>,
): OutputSchema | undefined {
  if (output.kind === 'inline') {
    return { fields: output.fields };
  }
  const fields = structs.get(output.name);
  return fields ? { fields } : undefined;
}

export function toJsonSchema(schema: OutputSchema): JSONSchema7 {
  return objectSchema(schema.fields);
}

export function fieldTypeToJsonSchema(type: FieldType): JSONSchema7 {
  switch (type.kind) {
    case 'string': return { type: 'string' };
    case 'number': return { type: 'number' };
    case 'boolean': return { type: 'boolean' };
    case 'array': return { type: 'array', items: fieldTypeToJsonSchema(type.items) };
    case 'object': return objectSchema(type.fields);
    case 'named': return { $ref: `#/definitions/${type.name}` };
  }
}

function objectSchema(fields: StructField[]): JSONSchema7 {
  const properties: Record<string, JSONSchema7> = {};
  for (const field of fields) {
    properties[field.name] = fieldTypeToJsonSchema(field.type);
  }
  return {
    type: 'object',
    properties,
    required: fields.map((f) => f.name),
  };
}

/**
 * Human-readable schema text embedded in prompts.
 */
export function describeSchema(schema: OutputSchema): string {
  return JSON.stringify(toJsonSchema(schema), null, 2);
}

const JSON_SCHEMA_TYPES: readonly JSONSchema7TypeName[] = [
  'string', 'number', 'integer', 'boolean', 'object', 'array', 'null',
];

function isSchemaTypeName(value: unknown): value is JSONSchema7TypeName {
  return JSON_SCHEMA_TYPES.some((t) => t === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep the parts of an externally supplied schema (e.g. an MCP tool's
 * input schema) that tool definitions use. Anything else is dropped.
 */
export function narrowJsonSchema(raw: unknown): JSONSchema7 {
  if (!isRecord(raw)) return {};
  const schema: JSONSchema7 = {};

  if (isSchemaTypeName(raw.type)) {
    schema.type = raw.type;
  } else if (Array.isArray(raw.type)) {
    const types: unknown[] = raw.type;
    schema.type = types.filter(isSchemaTypeName);
  }
  if (typeof raw.description === 'string') schema.description = raw.description;
  if (isRecord(raw.properties)) {
    const properties: Record<string, JSONSchema7> = {};
    for (const [key, value] of Object.entries(raw.properties)) {
      properties[key] = narrowJsonSchema(value);
    }
    schema.properties = properties;
  }
  if (Array.isArray(raw.required)) {
    const required: unknown[] = raw.required;
    schema.required = required.filter((r): r is string => typeof r === 'string');
  }
  if (isRecord(raw.items)) schema.items = narrowJsonSchema(raw.items);
  if (Array.isArray(raw.enum)) {
    const values: unknown[] = raw.enum;
    schema.enum = values.map((v) => toJsonValue(v));
  }
  if (typeof raw.additionalProperties === 'boolean') {
    schema.additionalProperties = raw.additionalProperties;
  } else if (isRecord(raw.additionalProperties)) {
    schema.additionalProperties = narrowJsonSchema(raw.additionalProperties);
  }
  return schema;
}
