/**
 * Built-in methods on String, Array and enum values.
 *
 * Only the methods that need no callbacks live here. `map`, `filter`,
 * `reduce` and `find` apply lambdas and are handled by the block
 * evaluator.
 */

import type { Span } from './ast';
import { QuillTypeError, UndefinedPropertyError } from './errors';
import {
  mkArray,
  mkBool,
  mkNull,
  mkNumber,
  mkString,
  typeName,
  valuesEqual,
  valueToString,
  type Value,
  type ValueOf,
} from './values';

export const CALLBACK_METHODS = ['map', 'filter', 'reduce', 'find'] as const;

export type CallbackMethod = typeof CALLBACK_METHODS[number];

export function isCallbackMethod(method: string): method is CallbackMethod {
  return CALLBACK_METHODS.some((name) => name === method);
}

/** Array methods that change the receiver in place. */
export function isMutatingMethod(method: string): boolean {
  return method === 'push' || method === 'pop';
}

export function callStringMethod(s: string, method: string, args: Value[], span?: Span): Value {
  switch (method) {
    case 'length':
      return mkNumber([...s].length);
    case 'trim':
      return mkString(s.trim());
    case 'toLowerCase':
      return mkString(s.toLowerCase());
    case 'toUpperCase':
      return mkString(s.toUpperCase());
    case 'contains':
      return mkBool(s.includes(stringArg(args, 0, method, span)));
    case 'startsWith':
      return mkBool(s.startsWith(stringArg(args, 0, method, span)));
    case 'endsWith':
      return mkBool(s.endsWith(stringArg(args, 0, method, span)));
    case 'split':
      return mkArray(s.split(stringArg(args, 0, method, span)).map(mkString));
    case 'replace': {
      const search = stringArg(args, 0, method, span);
      const replacement = stringArg(args, 1, method, span);
      // Function form: `$` sequences in the replacement stay literal.
      return mkString(s.replace(search, () => replacement));
    }
    default:
      throw new UndefinedPropertyError(method, 'String', span);
  }
}

/**
 * Call a non-callback array method. `push` and `pop` modify `elements`;
 * the caller decides whether that copy is written back.
 */
export function callArrayMethod(elements: Value[], method: string, args: Value[], span?: Span): Value {
  switch (method) {
    case 'length':
      return mkNumber(elements.length);

    case 'push':
      elements.push(requiredArg(args, 0, method, span));
      return mkNull();

    case 'pop':
      return elements.pop() ?? mkNull();

    case 'indexOf': {
      const target = requiredArg(args, 0, method, span);
      return mkNumber(elements.findIndex((el) => valuesEqual(el, target)));
    }

    case 'join':
      return mkString(elements.map(valueToString).join(stringArg(args, 0, method, span)));

    case 'slice': {
      const end = Math.min(position(numberArg(args, 1, method, span)), elements.length);
      const start = Math.min(position(numberArg(args, 0, method, span)), end);
      return mkArray(elements.slice(start, end));
    }

    case 'concat':
      return mkArray([...elements, ...arrayArg(args, 0, method, span)]);

    default:
      throw new UndefinedPropertyError(method, 'Array', span);
  }
}

/**
 * `is` and `data` on an enum value. Returns undefined for any other
 * method name.
 */
export function callEnumMethod(
  value: ValueOf<'enum'>,
  method: string,
  args: Value[],
  span?: Span,
): Value | undefined {
  if (method !== 'is' && method !== 'data') return undefined;
  const [arg] = args;
  if (args.length !== 1) {
    throw new QuillTypeError(`1 argument for ${method}()`, `${args.length} arguments`, span);
  }

  if (method === 'is') {
    const matches = (arg.kind === 'enum' || arg.kind === 'enum_constructor')
      && arg.enumName === value.enumName
      && arg.variant === value.variant;
    return mkBool(matches);
  }

  if (arg.kind !== 'number') {
    throw new QuillTypeError('Number index for data()', typeName(arg), span);
  }
  const i = Math.trunc(arg.value);
  return i >= 0 && i < value.data.length ? value.data[i] : mkNull();
}

// Negative and non-finite positions clamp to 0.
function position(n: number): number {
  const i = Math.trunc(n);
  return Number.isFinite(i) && i > 0 ? i : 0;
}

function argError(kind: string, args: Value[], index: number, method: string, span?: Span): QuillTypeError {
  const arg = args.at(index);
  return new QuillTypeError(
    `${kind}argument for ${method}()`,
    arg === undefined ? 'missing argument' : typeName(arg),
    span,
  );
}

function requiredArg(args: Value[], index: number, method: string, span?: Span): Value {
  const arg = args.at(index);
  if (arg === undefined) throw argError('', args, index, method, span);
  return arg;
}

function stringArg(args: Value[], index: number, method: string, span?: Span): string {
  const arg = args.at(index);
  if (arg?.kind !== 'string') throw argError('String ', args, index, method, span);
  return arg.value;
}

function numberArg(args: Value[], index: number, method: string, span?: Span): number {
  const arg = args.at(index);
  if (arg?.kind !== 'number') throw argError('Number ', args, index, method, span);
  return arg.value;
}

function arrayArg(args: Value[], index: number, method: string, span?: Span): Value[] {
  const arg = args.at(index);
  if (arg?.kind !== 'array') throw argError('Array ', args, index, method, span);
  return arg.elements;
}
