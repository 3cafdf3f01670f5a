/**
 * Block evaluation.
 *
 * Statement sequences and the asynchronous expression path. Unlike the
 * synchronous evaluator this one handles calls at any depth: tools,
 * lambdas, enum constructors, agent methods and the built-in methods of
 * strings, arrays and enum values.
 */

import type { JSONSchema7 } from 'json-schema';
import type { Block, Expression, Span, Statement } from './ast';
import type { Environment } from './environment';
import {
  QuillTypeError,
  ToolError,
  UndefinedPropertyError,
  UndefinedVariableError,
  UnknownToolError,
} from './errors';
import {
  applyBinary,
  applyUnary,
  enumMember,
  evaluate,
  indexAccess,
  makeRange,
  memberAccess,
} from './expression';
import { NullLogger, type Logger } from './logging';
import {
  callArrayMethod,
  callEnumMethod,
  callStringMethod,
  isCallbackMethod,
  isMutatingMethod,
  type CallbackMethod,
} from './methods';
import type { ToolRegistry } from './tools/registry';
import type { Tool } from './tools/types';
import { parseJsonOutput } from './validation';
import {
  isTruthy,
  jsonToValue,
  mkAgent,
  mkArray,
  mkEnum,
  mkNull,
  mkObject,
  mkString,
  typeName,
  valueToJson,
  valueToString,
  type AgentValue,
  type JsonValue,
  type Value,
  type ValueOf,
} from './values';

/**
 * How a block finished. `returned` carries a `return` out through every
 * enclosing block; `normal` is a block that ran off its end.
 */
export type Completion =
  | { type: 'normal'; value: Value }
  | { type: 'returned'; value: Value };

export function normal(value: Value): Completion {
  return { type: 'normal', value };
}

export function returned(value: Value): Completion {
  return { type: 'returned', value };
}

/**
 * What `agent.run(...)` needs from the agent runner.
 */
export interface AgentInvoker {
  run(agent: AgentValue, input?: string): Promise<string>;
}

export interface BlockEvaluatorOptions {
  registry?: ToolRegistry;
  runner?: AgentInvoker;
  logger?: Logger;
}

export class BlockEvaluator {
  private registry: ToolRegistry | undefined;
  private runner: AgentInvoker | undefined;
  private logger: Logger;

  constructor(options: BlockEvaluatorOptions = {}) {
    this.registry = options.registry;
    this.runner = options.runner;
    this.logger = options.logger ?? new NullLogger();
  }

  /**
   * Run a block in a fresh child scope. The scope is popped on every exit,
   * including a thrown error.
   */
  async evaluateBlock(block: Block, env: Environment): Promise<Completion> {
    env.pushScope();
    try {
      for (const stmt of block.statements) {
        const completion = await this.executeStatement(stmt, env);
        if (completion.type === 'returned') return completion;
      }
      return normal(mkNull());
    } finally {
      env.popScope();
    }
  }

  async executeStatement(stmt: Statement, env: Environment): Promise<Completion> {
    switch (stmt.kind) {
      case 'let':
        env.define(stmt.name, await this.evaluateExpression(stmt.value, env));
        return normal(mkNull());

      case 'assign': {
        const value = await this.evaluateExpression(stmt.value, env);
        if (!env.set(stmt.name, value)) {
          throw new UndefinedVariableError(stmt.name, stmt.span);
        }
        return normal(mkNull());
      }

      case 'return':
        return returned(stmt.value ? await this.evaluateExpression(stmt.value, env) : mkNull());

      case 'if': {
        const condition = await this.evaluateExpression(stmt.condition, env);
        const branch = isTruthy(condition) ? stmt.then : stmt.else;
        if (!branch) return normal(mkNull());
        const completion = await this.evaluateBlock(branch, env);
        return completion.type === 'returned' ? completion : normal(mkNull());
      }

      case 'expr':
        return normal(await this.evaluateExpression(stmt.expression, env));
    }
  }

  async evaluateExpression(expr: Expression, env: Environment): Promise<Value> {
    switch (expr.kind) {
      case 'string': {
        let out = '';
        for (const part of expr.parts) {
          out += typeof part === 'string' ? part : valueToString(await this.evaluateExpression(part.expr, env));
        }
        return mkString(out);
      }
      case 'array': {
        const elements: Value[] = [];
        for (const el of expr.elements) elements.push(await this.evaluateExpression(el, env));
        return mkArray(elements);
      }
      case 'object': {
        const entries = new Map<string, Value>();
        for (const entry of expr.entries) {
          entries.set(entry.key, await this.evaluateExpression(entry.value, env));
        }
        return mkObject(entries);
      }
      case 'binary': {
        const left = await this.evaluateExpression(expr.left, env);
        const right = await this.evaluateExpression(expr.right, env);
        return applyBinary(expr.op, left, right, expr.span);
      }
      case 'unary':
        return applyUnary(expr.op, await this.evaluateExpression(expr.operand, env), expr.span);
      case 'member': {
        const variant = enumMember(expr.object, expr.property, env, expr.span);
        if (variant) return variant;
        return memberAccess(await this.evaluateExpression(expr.object, env), expr.property, expr.span);
      }
      case 'index': {
        const target = await this.evaluateExpression(expr.target, env);
        const idx = await this.evaluateExpression(expr.index, env);
        return indexAccess(target, idx, expr.span);
      }
      case 'range': {
        const start = await this.evaluateExpression(expr.start, env);
        const end = await this.evaluateExpression(expr.end, env);
        return makeRange(start, end, expr.span);
      }
      case 'call':
        return this.evaluateCall(expr.callee, expr.args, env, expr.span);
      default:
        // Literals, identifiers and lambda literals never suspend.
        return evaluate(expr, env);
    }
  }

  private async evaluateCall(
    callee: Expression,
    argExprs: Expression[],
    env: Environment,
    span?: Span,
  ): Promise<Value> {
    if (callee.kind === 'identifier') {
      const tool = this.registry?.get(callee.name);
      if (tool) {
        return this.callTool(tool, await this.evaluateArgs(argExprs, env), span);
      }
      const bound = env.get(callee.name);
      if (bound?.kind === 'lambda') {
        return this.applyLambda(bound, await this.evaluateArgs(argExprs, env), env, span);
      }
      if (bound?.kind === 'enum_constructor') {
        return constructEnum(bound, await this.evaluateArgs(argExprs, env), span);
      }
      if (bound?.kind === 'tool') {
        const referenced = this.registry?.get(bound.name);
        if (referenced) return this.callTool(referenced, await this.evaluateArgs(argExprs, env), span);
        throw new UnknownToolError(bound.name, span);
      }
      throw new UnknownToolError(callee.name, span);
    }

    if (callee.kind === 'member') {
      const variant = enumMember(callee.object, callee.property, env, callee.span);
      if (variant) {
        const args = await this.evaluateArgs(argExprs, env);
        if (variant.kind === 'enum_constructor') return constructEnum(variant, args, span);
        if (args.length > 0) {
          throw new QuillTypeError('0 arguments', `${args.length} for ${typeName(variant)}`, span);
        }
        return variant;
      }

      const target = await this.evaluateExpression(callee.object, env);
      if (target.kind === 'agent') {
        return this.callAgentMethod(target.agent, callee.property, await this.evaluateArgs(argExprs, env), span);
      }
      if (target.kind === 'string') {
        return callStringMethod(target.value, callee.property, await this.evaluateArgs(argExprs, env), span);
      }
      if (target.kind === 'array') {
        const args = await this.evaluateArgs(argExprs, env);
        if (isCallbackMethod(callee.property)) {
          return this.callCallbackMethod(target.elements, callee.property, args, env, span);
        }
        const elements = [...target.elements];
        const result = callArrayMethod(elements, callee.property, args, span);
        // push and pop write the new array back to a named receiver.
        if (isMutatingMethod(callee.property) && callee.object.kind === 'identifier') {
          env.set(callee.object.name, mkArray(elements));
        }
        return result;
      }
      if (target.kind === 'enum') {
        const result = callEnumMethod(target, callee.property, await this.evaluateArgs(argExprs, env), span);
        if (result) return result;
      }
      const method = memberAccess(target, callee.property, callee.span);
      if (method.kind === 'lambda') {
        return this.applyLambda(method, await this.evaluateArgs(argExprs, env), env, span);
      }
      throw new QuillTypeError('callable', typeName(method), span);
    }

    const value = await this.evaluateExpression(callee, env);
    if (value.kind === 'lambda') {
      return this.applyLambda(value, await this.evaluateArgs(argExprs, env), env, span);
    }
    throw new QuillTypeError('callable', typeName(value), span);
  }

  private async evaluateArgs(argExprs: Expression[], env: Environment): Promise<Value[]> {
    const args: Value[] = [];
    for (const arg of argExprs) args.push(await this.evaluateExpression(arg, env));
    return args;
  }

  private async callTool(tool: Tool, args: Value[], span?: Span): Promise<Value> {
    const json = argsToJson(args, tool.parametersSchema());
    this.logger.debug(`Calling tool '${tool.name}'`, { args: json });
    const outcome = await tool.execute(json);
    if (!outcome.ok) {
      throw new ToolError(tool.name, outcome.error, span);
    }
    return mkString(outcome.content);
  }

  private async applyLambda(
    lambda: ValueOf<'lambda'>,
    args: Value[],
    env: Environment,
    span?: Span,
  ): Promise<Value> {
    if (args.length !== lambda.params.length) {
      throw new QuillTypeError(`${lambda.params.length} arguments`, `${args.length}`, span);
    }
    env.pushScope();
    try {
      lambda.params.forEach((param, i) => env.define(param, args[i]));
      if (lambda.body.kind === 'expression') {
        return await this.evaluateExpression(lambda.body.expression, env);
      }
      return (await this.evaluateBlock(lambda.body.block, env)).value;
    } finally {
      env.popScope();
    }
  }

  private async callCallbackMethod(
    elements: Value[],
    method: CallbackMethod,
    args: Value[],
    env: Environment,
    span?: Span,
  ): Promise<Value> {
    const [callback, ...rest] = args;
    if (callback === undefined) {
      throw new QuillTypeError('callback function for array method', 'missing argument', span);
    }
    if (callback.kind !== 'lambda') {
      throw new QuillTypeError(`Lambda argument for ${method}()`, typeName(callback), span);
    }

    switch (method) {
      case 'map': {
        const out: Value[] = [];
        for (const el of elements) out.push(await this.applyLambda(callback, [el], env, span));
        return mkArray(out);
      }
      case 'filter': {
        const out: Value[] = [];
        for (const el of elements) {
          if (isTruthy(await this.applyLambda(callback, [el], env, span))) out.push(el);
        }
        return mkArray(out);
      }
      case 'find': {
        for (const el of elements) {
          if (isTruthy(await this.applyLambda(callback, [el], env, span))) return el;
        }
        return mkNull();
      }
      case 'reduce': {
        // Without an initial value the first element seeds the accumulator.
        let acc = rest.at(0);
        let start = 0;
        if (acc === undefined) {
          acc = elements.at(0);
          start = 1;
        }
        if (acc === undefined) {
          throw new QuillTypeError('initial value for reduce() on an empty Array', 'missing argument', span);
        }
        for (const el of elements.slice(start)) acc = await this.applyLambda(callback, [acc, el], env, span);
        return acc;
      }
    }
  }

  private async callAgentMethod(
    agent: AgentValue,
    method: string,
    args: Value[],
    span?: Span,
  ): Promise<Value> {
    switch (method) {
      case 'userPrompt':
        return mkAgent({ ...agent, userPrompt: stringArgument(method, args, span) });

      case 'systemPrompt':
        return mkAgent({ ...agent, prompt: stringArgument(method, args, span) });

      case 'run': {
        if (args.length > 1) {
          throw new QuillTypeError('at most 1 argument', `${args.length}`, span);
        }
        if (!this.runner) {
          throw new QuillTypeError('configured model backend', `agent '${agent.name}' run without one`, span);
        }
        const input = args.length === 1 ? valueToString(args[0]) : undefined;
        const answer = await this.runner.run(agent, input);
        if (!agent.outputSchema) return mkString(answer);
        // The runner only returns text that already parsed and validated.
        const parsed = parseJsonOutput(answer);
        return parsed.ok ? jsonToValue(parsed.value) : mkString(answer);
      }

      default:
        throw new UndefinedPropertyError(method, 'Agent', span);
    }
  }
}

function stringArgument(method: string, args: Value[], span?: Span): string {
  const [arg] = args;
  if (args.length !== 1 || arg.kind !== 'string') {
    const got = args.length === 1 ? typeName(arg) : `${args.length} arguments`;
    throw new QuillTypeError(`one String argument to ${method}`, got, span);
  }
  return arg.value;
}

function constructEnum(ctor: ValueOf<'enum_constructor'>, args: Value[], span?: Span): Value {
  if (args.length !== ctor.arity) {
    throw new QuillTypeError(
      `${ctor.arity} arguments for ${ctor.enumName}.${ctor.variant}`,
      `${args.length}`,
      span,
    );
  }
  return mkEnum(ctor.enumName, ctor.variant, args);
}

/**
 * Convert call arguments to a tool's JSON input.
 *
 * A single Object argument that already names every declared parameter
 * (or any single Object, when none are declared) is passed as is.
 * Otherwise positional arguments are keyed by the declared parameter
 * names in schema order; a tool with no declared parameters receives an
 * array.
 */
export function argsToJson(args: Value[], schema: JSONSchema7): JsonValue {
  const params = Object.keys(schema.properties ?? {});
  const [first] = args;

  if (args.length === 1 && first.kind === 'object') {
    const keys = first.entries;
    if (params.length === 0 || params.every((p) => keys.has(p))) {
      return valueToJson(first);
    }
  }

  if (params.length === 0) {
    return args.map(valueToJson);
  }

  const out: { [key: string]: JsonValue } = {};
  params.forEach((param, i) => {
    if (i < args.length) out[param] = valueToJson(args[i]);
  });
  return out;
}
