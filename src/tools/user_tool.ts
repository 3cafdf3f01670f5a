/**
 * Tools declared in a program.
 */

import type { JSONSchema7, JSONSchema7TypeName } from 'json-schema';
import type { Param, ToolDecl, TypeName } from '../ast';
import type { BlockEvaluator } from '../block';
import type { Environment } from '../environment';
import { errorMessage } from '../errors';
import { jsonToValue, valueToString, type JsonValue } from '../values';
import { failure, success, type Tool, type ToolExecution } from './types';

export class UserTool implements Tool {
  readonly name: string;
  readonly description: string;

  constructor(
    private decl: ToolDecl,
    private env: Environment,
    private evaluator: BlockEvaluator,
  ) {
    this.name = decl.name;
    this.description = decl.description ?? 'User-defined tool';
  }

  get params(): readonly Param[] {
    return this.decl.params;
  }

  parametersSchema(): JSONSchema7 {
    const properties: Record<string, JSONSchema7> = {};
    for (const param of this.decl.params) {
      properties[param.name] = {
        type: jsonTypeFor(param.type),
        description: `Parameter ${param.name}`,
      };
    }
    return {
      type: 'object',
      properties,
      required: this.decl.params.map((p) => p.name),
    };
  }

  /**
   * Same shape as the advertised schema, but `any` params accept every
   * JSON value.
   */
  validationSchema(): JSONSchema7 {
    const properties: Record<string, JSONSchema7> = {};
    for (const param of this.decl.params) {
      properties[param.name] = param.type === 'any' ? {} : { type: param.type };
    }
    return {
      type: 'object',
      properties,
      required: this.decl.params.map((p) => p.name),
    };
  }

  /**
   * Runs the body against the global bindings plus its parameters. The
   * caller's block-local names are out of reach, and nothing the body
   * binds leaks back.
   */
  async execute(args: JsonValue): Promise<ToolExecution> {
    const scope = this.env.forkGlobal();
    for (const param of this.decl.params) {
      const value = lookup(args, param.name);
      if (value === undefined) {
        return failure(`Missing required parameter: ${param.name}`);
      }
      scope.define(param.name, jsonToValue(value));
    }

    try {
      const completion = await this.evaluator.evaluateBlock(this.decl.body, scope);
      return success(valueToString(completion.value));
    } catch (err) {
      return failure(`Tool execution failed: ${errorMessage(err)}`);
    }
  }
}

function jsonTypeFor(type: TypeName): JSONSchema7TypeName {
  // Untyped params are advertised as strings.
  return type === 'any' ? 'string' : type;
}

function lookup(args: JsonValue, name: string): JsonValue | undefined {
  if (typeof args !== 'object' || args === null || Array.isArray(args)) return undefined;
  return Object.hasOwn(args, name) ? args[name] : undefined;
}
