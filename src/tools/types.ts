/**
 * Tool capability
 */

import type { JSONSchema7 } from 'json-schema';
import type { JsonValue } from '../values';

/**
 * Outcome of one tool execution. Failures are values, not exceptions:
 * the agent runner hands them back to the model.
 */
export type ToolExecution =
  | { ok: true; content: string }
  | { ok: false; error: string };

export interface Tool {
  readonly name: string;
  readonly description: string;
  /** JSON Schema object describing the arguments. */
  parametersSchema(): JSONSchema7;
  /** Schema arguments are checked against, when it differs from the advertised one. */
  validationSchema?(): JSONSchema7;
  execute(args: JsonValue): Promise<ToolExecution>;
}

export function success(content: string): ToolExecution {
  return { ok: true, content };
}

export function failure(error: string): ToolExecution {
  return { ok: false, error };
}

/**
 * Read a required string argument from a JSON object.
 */
export function stringArg(args: JsonValue, name: string): string | undefined {
  if (typeof args !== 'object' || args === null || Array.isArray(args)) return undefined;
  const value = args[name];
  return typeof value === 'string' ? value : undefined;
}
