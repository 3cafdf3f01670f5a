/**
 * Synchronous expression evaluation.
 *
 * Used wherever evaluation cannot suspend (agent field values, lambda
 * bodies reached without an async caller). Calls are rejected here; the
 * block evaluator handles them.
 */

import type { BinaryOp, Expression, Span, UnaryOp } from './ast';
import type { Environment } from './environment';
import {
  DivisionByZeroError,
  IndexOutOfBoundsError,
  InvalidOperandsError,
  NotIndexableError,
  QuillTypeError,
  UndefinedPropertyError,
  UndefinedVariableError,
} from './errors';
import {
  isTruthy,
  mkArray,
  mkBool,
  mkEnum,
  mkEnumConstructor,
  mkLambda,
  mkNull,
  mkNumber,
  mkObject,
  mkString,
  typeName,
  valuesEqual,
  valueToString,
  type Value,
} from './values';

export function evaluate(expr: Expression, env: Environment): Value {
  switch (expr.kind) {
    case 'string': {
      let out = '';
      for (const part of expr.parts) {
        out += typeof part === 'string' ? part : valueToString(evaluate(part.expr, env));
      }
      return mkString(out);
    }
    case 'number': return mkNumber(expr.value);
    case 'boolean': return mkBool(expr.value);
    case 'null': return mkNull();
    case 'identifier': {
      const value = env.get(expr.name);
      if (value === undefined) throw new UndefinedVariableError(expr.name, expr.span);
      return value;
    }
    case 'array':
      return mkArray(expr.elements.map((el) => evaluate(el, env)));
    case 'object': {
      const entries = new Map<string, Value>();
      for (const entry of expr.entries) entries.set(entry.key, evaluate(entry.value, env));
      return mkObject(entries);
    }
    case 'binary':
      return applyBinary(expr.op, evaluate(expr.left, env), evaluate(expr.right, env), expr.span);
    case 'unary':
      return applyUnary(expr.op, evaluate(expr.operand, env), expr.span);
    case 'member': {
      const variant = enumMember(expr.object, expr.property, env, expr.span);
      if (variant) return variant;
      return memberAccess(evaluate(expr.object, env), expr.property, expr.span);
    }
    case 'index':
      return indexAccess(evaluate(expr.target, env), evaluate(expr.index, env), expr.span);
    case 'range':
      return makeRange(evaluate(expr.start, env), evaluate(expr.end, env), expr.span);
    case 'lambda':
      return mkLambda(expr.params, expr.body);
    case 'call':
      throw new QuillTypeError('expression', 'function call (requires async context)', expr.span);
  }
}

export function applyBinary(op: BinaryOp, left: Value, right: Value, span?: Span): Value {
  switch (op) {
    case '+':
      if (left.kind === 'number' && right.kind === 'number') return mkNumber(left.value + right.value);
      if (left.kind === 'string' || right.kind === 'string') {
        return mkString(valueToString(left) + valueToString(right));
      }
      throw new InvalidOperandsError(op, typeName(left), typeName(right), span);

    case '-': {
      const [a, b] = numericOperands(op, left, right, span);
      return mkNumber(a - b);
    }
    case '*': {
      const [a, b] = numericOperands(op, left, right, span);
      return mkNumber(a * b);
    }
    case '/': {
      const [a, b] = numericOperands(op, left, right, span);
      if (b === 0) throw new DivisionByZeroError(span);
      return mkNumber(a / b);
    }
    case '%': {
      const [a, b] = numericOperands(op, left, right, span);
      if (b === 0) throw new DivisionByZeroError(span);
      return mkNumber(a % b);
    }
    case '<': {
      const [a, b] = numericOperands(op, left, right, span);
      return mkBool(a < b);
    }
    case '<=': {
      const [a, b] = numericOperands(op, left, right, span);
      return mkBool(a <= b);
    }
    case '>': {
      const [a, b] = numericOperands(op, left, right, span);
      return mkBool(a > b);
    }
    case '>=': {
      const [a, b] = numericOperands(op, left, right, span);
      return mkBool(a >= b);
    }
    case '==': return mkBool(valuesEqual(left, right));
    case '!=': return mkBool(!valuesEqual(left, right));
    case '&&': return mkBool(isTruthy(left) && isTruthy(right));
    case '||': return mkBool(isTruthy(left) || isTruthy(right));
  }
}

function numericOperands(op: BinaryOp, left: Value, right: Value, span?: Span): [number, number] {
  if (left.kind !== 'number' || right.kind !== 'number') {
    throw new InvalidOperandsError(op, typeName(left), typeName(right), span);
  }
  return [left.value, right.value];
}

export function applyUnary(op: UnaryOp, operand: Value, span?: Span): Value {
  if (op === '!') return mkBool(!isTruthy(operand));
  if (operand.kind !== 'number') {
    throw new InvalidOperandsError(op, typeName(operand), '', span);
  }
  return mkNumber(-operand.value);
}

/**
 * `Enum.Variant` where the object is an identifier naming an enum type.
 * Returns undefined when the identifier is not an enum, so ordinary
 * member access can proceed.
 */
export function enumMember(
  object: Expression,
  property: string,
  env: Environment,
  span?: Span,
): Value | undefined {
  if (object.kind !== 'identifier') return undefined;
  const def = env.getEnum(object.name);
  if (!def) return undefined;
  const variant = def.variants.find((v) => v.name === property);
  if (!variant) {
    throw new QuillTypeError(`variant of ${def.name}`, property, span);
  }
  return variant.fields.length === 0
    ? mkEnum(def.name, variant.name)
    : mkEnumConstructor(def.name, variant.name, variant.fields.length);
}

export function memberAccess(target: Value, property: string, span?: Span): Value {
  if (target.kind === 'object') {
    const value = target.entries.get(property);
    if (value !== undefined) return value;
  }
  throw new UndefinedPropertyError(property, typeName(target), span);
}

export function indexAccess(target: Value, idx: Value, span?: Span): Value {
  if (target.kind === 'array') {
    if (idx.kind !== 'number') {
      throw new NotIndexableError(`Array with ${typeName(idx)} index`, span);
    }
    const i = Math.trunc(idx.value);
    if (!Number.isFinite(i) || i < 0 || i >= target.elements.length) {
      throw new IndexOutOfBoundsError(i, target.elements.length, span);
    }
    return target.elements[i];
  }
  if (target.kind === 'object') {
    if (idx.kind !== 'string') {
      throw new NotIndexableError(`Object with ${typeName(idx)} index`, span);
    }
    const value = target.entries.get(idx.value);
    if (value === undefined) throw new UndefinedPropertyError(idx.value, 'Object', span);
    return value;
  }
  throw new NotIndexableError(typeName(target), span);
}

export function makeRange(start: Value, end: Value, span?: Span): Value {
  if (start.kind !== 'number') throw new QuillTypeError('Number', typeName(start), span);
  if (end.kind !== 'number') throw new QuillTypeError('Number', typeName(end), span);
  const from = Math.trunc(start.value);
  const to = Math.trunc(end.value);
  const elements: Value[] = [];
  for (let i = from; i < to; i++) elements.push(mkNumber(i));
  return mkArray(elements);
}
