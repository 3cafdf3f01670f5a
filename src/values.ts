/**
 * Runtime value representations for the Quill engine.
 */

import type { LambdaBody } from './ast';
import type { OutputSchema } from './schema';

export type Value =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }
  | { kind: 'array'; elements: Value[] }
  | { kind: 'object'; entries: Map<string, Value> }
  | { kind: 'agent'; agent: AgentValue }
  | { kind: 'tool'; name: string }
  | { kind: 'lambda'; params: string[]; body: LambdaBody }
  | { kind: 'enum'; enumName: string; variant: string; data: Value[] }
  | { kind: 'enum_constructor'; enumName: string; variant: string; arity: number };

export type ValueKind = Value['kind'];

export type ValueOf<K extends ValueKind> = Extract<Value, { kind: K }>;

/**
 * A declared agent. Created once from its declaration and never mutated;
 * the prompt methods produce modified copies.
 */
export interface AgentValue {
  readonly name: string;
  readonly prompt: string;
  readonly userPrompt?: string;
  readonly tools: readonly string[];
  readonly maxSteps: number;
  readonly model?: string;
  readonly outputSchema?: OutputSchema;
  readonly outputRetries: number;
  readonly outputInstructions?: string;
  readonly retryPrompt?: string;
}

export const DEFAULT_MAX_STEPS = 10;

export function createAgent(
  name: string,
  prompt: string,
  options: Partial<Omit<AgentValue, 'name' | 'prompt'>> = {},
): AgentValue {
  return {
    ...options,
    name,
    prompt,
    tools: options.tools ?? [],
    maxSteps: options.maxSteps ?? DEFAULT_MAX_STEPS,
    outputRetries: options.outputRetries ?? 0,
  };
}

// ---- Value constructors ----

export function mkString(value: string): Value {
  return { kind: 'string', value };
}

export function mkNumber(value: number): Value {
  return { kind: 'number', value };
}

export function mkBool(value: boolean): Value {
  return { kind: 'boolean', value };
}

export function mkNull(): Value {
  return { kind: 'null' };
}

export function mkArray(elements: Value[]): Value {
  return { kind: 'array', elements };
}

export function mkObject(entries: Map<string, Value> | Record<string, Value>): Value {
  return { kind: 'object', entries: entries instanceof Map ? entries : new Map(Object.entries(entries)) };
}

export function mkAgent(agent: AgentValue): Value {
  return { kind: 'agent', agent };
}

export function mkTool(name: string): Value {
  return { kind: 'tool', name };
}

export function mkLambda(params: string[], body: LambdaBody): Value {
  return { kind: 'lambda', params, body };
}

export function mkEnum(enumName: string, variant: string, data: Value[] = []): Value {
  return { kind: 'enum', enumName, variant, data };
}

export function mkEnumConstructor(enumName: string, variant: string, arity: number): Value {
  return { kind: 'enum_constructor', enumName, variant, arity };
}

// ---- Value utilities ----

export function isTruthy(v: Value): boolean {
  switch (v.kind) {
    case 'boolean': return v.value;
    case 'null': return false;
    case 'string': return v.value.length > 0;
    case 'number': return v.value !== 0;
    case 'array': return v.elements.length > 0;
    case 'object': return v.entries.size > 0;
    default: return true;
  }
}

export function typeName(v: Value): string {
  switch (v.kind) {
    case 'string': return 'String';
    case 'number': return 'Number';
    case 'boolean': return 'Boolean';
    case 'null': return 'Null';
    case 'array': return 'Array';
    case 'object': return 'Object';
    case 'agent': return 'Agent';
    case 'tool': return 'Tool';
    case 'lambda': return 'Lambda';
    case 'enum': return `${v.enumName}.${v.variant}`;
    case 'enum_constructor': return `EnumConstructor(${v.enumName}.${v.variant})`;
  }
}

export function valueToString(v: Value): string {
  switch (v.kind) {
    case 'string': return v.value;
    case 'number': return String(v.value);
    case 'boolean': return String(v.value);
    case 'null': return 'null';
    case 'array': return `[${v.elements.map(valueToString).join(', ')}]`;
    case 'object': {
      const pairs: string[] = [];
      v.entries.forEach((val, key) => {
        pairs.push(`${key}: ${valueToString(val)}`);
      });
      return `{${pairs.join(', ')}}`;
    }
    case 'agent': return `<agent ${v.agent.name}>`;
    case 'tool': return `<tool ${v.name}>`;
    case 'lambda': return '<lambda>';
    case 'enum':
      return v.data.length === 0
        ? `${v.enumName}.${v.variant}`
        : `${v.enumName}.${v.variant}(${v.data.map(valueToString).join(', ')})`;
    case 'enum_constructor': return `<enum constructor ${v.enumName}.${v.variant}>`;
  }
}

/**
 * Structural equality. Values of different kinds are never equal.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'string':
    case 'number':
    case 'boolean':
      return b.kind === a.kind && a.value === b.value;
    case 'null':
      return b.kind === 'null';
    case 'array':
      return b.kind === 'array'
        && a.elements.length === b.elements.length
        && a.elements.every((el, i) => valuesEqual(el, b.elements[i]));
    case 'object': {
      if (b.kind !== 'object' || a.entries.size !== b.entries.size) return false;
      for (const [k, v] of a.entries) {
        const bv = b.entries.get(k);
        if (bv === undefined || !valuesEqual(v, bv)) return false;
      }
      return true;
    }
    case 'enum':
      return b.kind === 'enum'
        && a.enumName === b.enumName
        && a.variant === b.variant
        && a.data.length === b.data.length
        && a.data.every((el, i) => valuesEqual(el, b.data[i]));
    case 'agent':
    case 'tool':
    case 'lambda':
    case 'enum_constructor':
      return a === b;
  }
}

// ---- JSON conversion ----

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export function valueToJson(v: Value): JsonValue {
  switch (v.kind) {
    case 'string':
    case 'number':
    case 'boolean':
      return v.value;
    case 'null': return null;
    case 'array': return v.elements.map(valueToJson);
    case 'object': {
      const out: { [key: string]: JsonValue } = {};
      for (const [k, val] of v.entries) out[k] = valueToJson(val);
      return out;
    }
    case 'enum':
      return v.data.length === 0
        ? `${v.enumName}.${v.variant}`
        : { enum: v.enumName, variant: v.variant, data: v.data.map(valueToJson) };
    default:
      return valueToString(v);
  }
}

export function jsonToValue(json: unknown): Value {
  if (json === null || json === undefined) return mkNull();
  if (typeof json === 'string') return mkString(json);
  if (typeof json === 'number') return mkNumber(json);
  if (typeof json === 'boolean') return mkBool(json);
  if (Array.isArray(json)) return mkArray(json.map(jsonToValue));
  if (typeof json === 'object') {
    const entries = new Map<string, Value>();
    for (const [k, v] of Object.entries(json)) entries.set(k, jsonToValue(v));
    return mkObject(entries);
  }
  return mkNull();
}

/**
 * Normalize an arbitrary parsed value (e.g. provider tool arguments) to JSON.
 */
export function toJsonValue(value: unknown): JsonValue {
  return valueToJson(jsonToValue(value));
}
