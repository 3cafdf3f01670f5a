/**
 * Structural validation of parsed model output against an output schema.
 *
 * Only the first violation is reported.
 */

import type { FieldType } from './ast';
import type { OutputSchema } from './schema';

export type ValidationResult = { ok: true } | { ok: false; error: string };

type JsonObject = { [key: string]: unknown };

export function validateOutput(json: unknown, schema: OutputSchema): ValidationResult {
  if (!isJsonObject(json)) {
    return { ok: false, error: 'Expected JSON object' };
  }

  for (const field of schema.fields) {
    if (!Object.hasOwn(json, field.name)) {
      return { ok: false, error: `missing required field: '${field.name}'` };
    }
    const error = validateField(json[field.name], field.type, field.name);
    if (error) return { ok: false, error };
  }

  return { ok: true };
}

function validateField(value: unknown, expected: FieldType, path: string): string | undefined {
  switch (expected.kind) {
    case 'string':
    case 'number':
    case 'boolean':
      if (typeof value !== expected.kind) {
        return `'${path}': expected ${expected.kind}, got ${jsonTypeName(value)}`;
      }
      return undefined;

    case 'array': {
      if (!Array.isArray(value)) {
        return `'${path}': expected array, got ${jsonTypeName(value)}`;
      }
      for (let i = 0; i < value.length; i++) {
        const error = validateField(value[i], expected.items, `${path}[${i}]`);
        if (error) return error;
      }
      return undefined;
    }

    case 'object': {
      if (!isJsonObject(value)) {
        return `'${path}': expected object, got ${jsonTypeName(value)}`;
      }
      for (const field of expected.fields) {
        const fieldPath = `${path}.${field.name}`;
        if (!Object.hasOwn(value, field.name)) {
          return `'${fieldPath}': missing required field`;
        }
        const error = validateField(value[field.name], field.type, fieldPath);
        if (error) return error;
      }
      return undefined;
    }

    case 'named':
      // Unresolved reference: any object passes.
      if (!isJsonObject(value)) {
        return `'${path}': expected object, got ${jsonTypeName(value)}`;
      }
      return undefined;
  }
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function jsonTypeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string': return 'string';
    case 'number': return 'number';
    case 'boolean': return 'boolean';
    default: return 'object';
  }
}

export type ParseResult = { ok: true; value: unknown } | { ok: false; error: string };

const FENCED_BLOCK = /^```(?:json)?[ \t]*\r?\n([\s\S]*?)\r?\n?```$/;

/**
 * Unwrap a single fenced code block, if the whole text is one.
 */
export function extractJson(text: string): string {
  const trimmed = text.trim();
  const match = FENCED_BLOCK.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

export function parseJsonOutput(text: string): ParseResult {
  try {
    return { ok: true, value: JSON.parse(extractJson(text)) };
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
}
