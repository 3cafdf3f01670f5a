import { describe, it, expect, beforeEach } from 'vitest'
import {
  arr,
  binary,
  bool,
  call,
  ident,
  index,
  lambda,
  member,
  nul,
  num,
  obj,
  range,
  str,
  unary
} from '../../src/ast'
import { Environment } from '../../src/environment'
import {
  DivisionByZeroError,
  IndexOutOfBoundsError,
  InvalidOperandsError,
  NotIndexableError,
  QuillTypeError,
  UndefinedPropertyError,
  UndefinedVariableError
} from '../../src/errors'
import { evaluate } from '../../src/expression'
import {
  createAgent,
  mkAgent,
  mkArray,
  mkNumber,
  mkObject,
  mkString,
  valueToJson,
  valueToString
} from '../../src/values'

describe('Expression evaluation', () => {
  let env: Environment

  beforeEach(() => {
    env = new Environment()
  })

  describe('literals', () => {
    it('should evaluate scalars', () => {
      expect(evaluate(num(42), env)).toEqual(mkNumber(42))
      expect(evaluate(bool(true), env)).toEqual({ kind: 'boolean', value: true })
      expect(evaluate(nul(), env)).toEqual({ kind: 'null' })
    })

    it('should interpolate string parts', () => {
      env.define('name', mkString('Ada'))
      env.define('n', mkNumber(3))
      const result = evaluate(str('Hi ', { expr: ident('name') }, ', you have ', { expr: ident('n') }, ' items'), env)
      expect(result).toEqual(mkString('Hi Ada, you have 3 items'))
    })

    it('should evaluate arrays and objects', () => {
      const result = evaluate(obj({ xs: arr(num(1), num(2)), label: str('x') }), env)
      expect(valueToJson(result)).toEqual({ xs: [1, 2], label: 'x' })
    })
  })

  describe('identifiers', () => {
    it('should fail on undefined names', () => {
      expect(() => evaluate(ident('missing'), env)).toThrow(UndefinedVariableError)
      expect(() => evaluate(ident('missing'), env)).toThrow("Undefined variable: 'missing'")
    })
  })

  describe('arithmetic', () => {
    it('should add, subtract, multiply and divide numbers', () => {
      expect(evaluate(binary('+', num(2), num(3)), env)).toEqual(mkNumber(5))
      expect(evaluate(binary('-', num(2), num(3)), env)).toEqual(mkNumber(-1))
      expect(evaluate(binary('*', num(4), num(3)), env)).toEqual(mkNumber(12))
      expect(evaluate(binary('/', num(7), num(2)), env)).toEqual(mkNumber(3.5))
      expect(evaluate(binary('%', num(7), num(4)), env)).toEqual(mkNumber(3))
    })

    it('should concatenate when either side is a string', () => {
      expect(evaluate(binary('+', str('n='), num(2)), env)).toEqual(mkString('n=2'))
      expect(evaluate(binary('+', num(2), str('px')), env)).toEqual(mkString('2px'))
      expect(evaluate(binary('+', str('a'), bool(true)), env)).toEqual(mkString('atrue'))
    })

    it('should reject mixed non-string operands', () => {
      expect(() => evaluate(binary('+', num(1), bool(true)), env))
        .toThrow("Invalid operands for '+': Number and Boolean")
      expect(() => evaluate(binary('*', str('a'), num(2)), env)).toThrow(InvalidOperandsError)
    })

    it('should fail on division or modulo by zero', () => {
      expect(() => evaluate(binary('/', num(1), num(0)), env)).toThrow(DivisionByZeroError)
      expect(() => evaluate(binary('%', num(1), num(0)), env)).toThrow('Division by zero')
    })

    it('should negate numbers only', () => {
      expect(evaluate(unary('-', num(5)), env)).toEqual(mkNumber(-5))
      expect(() => evaluate(unary('-', str('x')), env)).toThrow("Invalid operand for '-': String")
    })
  })

  describe('comparison and logic', () => {
    it('should compare numbers', () => {
      expect(evaluate(binary('<', num(1), num(2)), env)).toEqual({ kind: 'boolean', value: true })
      expect(evaluate(binary('>=', num(1), num(2)), env)).toEqual({ kind: 'boolean', value: false })
      expect(() => evaluate(binary('<', str('a'), str('b')), env)).toThrow(InvalidOperandsError)
    })

    it('should use structural equality', () => {
      expect(evaluate(binary('==', arr(num(1), str('a')), arr(num(1), str('a'))), env))
        .toEqual({ kind: 'boolean', value: true })
      expect(evaluate(binary('==', num(1), str('1')), env)).toEqual({ kind: 'boolean', value: false })
      expect(evaluate(binary('!=', nul(), nul()), env)).toEqual({ kind: 'boolean', value: false })
    })

    it('should combine truthiness', () => {
      expect(evaluate(binary('&&', str('x'), num(0)), env)).toEqual({ kind: 'boolean', value: false })
      expect(evaluate(binary('||', arr(), num(2)), env)).toEqual({ kind: 'boolean', value: true })
      expect(evaluate(unary('!', str('')), env)).toEqual({ kind: 'boolean', value: true })
    })

    it('should treat agents as truthy', () => {
      env.define('bot', mkAgent(createAgent('Bot', '')))
      expect(evaluate(unary('!', ident('bot')), env)).toEqual({ kind: 'boolean', value: false })
    })
  })

  describe('member and index access', () => {
    beforeEach(() => {
      env.define('user', mkObject({ name: mkString('Ada') }))
      env.define('xs', mkArray([mkNumber(10), mkNumber(20), mkNumber(30)]))
    })

    it('should read object properties', () => {
      expect(evaluate(member(ident('user'), 'name'), env)).toEqual(mkString('Ada'))
      expect(evaluate(index(ident('user'), str('name')), env)).toEqual(mkString('Ada'))
    })

    it('should fail on missing properties', () => {
      expect(() => evaluate(member(ident('user'), 'age'), env)).toThrow(UndefinedPropertyError)
      expect(() => evaluate(member(ident('user'), 'age'), env)).toThrow("Undefined property 'age' on Object")
      expect(() => evaluate(member(ident('xs'), 'length'), env)).toThrow("Undefined property 'length' on Array")
    })

    it('should index arrays by truncated number', () => {
      expect(evaluate(index(ident('xs'), num(1)), env)).toEqual(mkNumber(20))
      expect(evaluate(index(ident('xs'), num(2.9)), env)).toEqual(mkNumber(30))
    })

    it('should fail on out-of-range indices', () => {
      expect(() => evaluate(index(ident('xs'), num(3)), env)).toThrow(IndexOutOfBoundsError)
      expect(() => evaluate(index(ident('xs'), num(5)), env)).toThrow('Index 5 out of bounds for length 3')
      expect(() => evaluate(index(ident('xs'), unary('-', num(1))), env)).toThrow(IndexOutOfBoundsError)
    })

    it('should fail on non-finite indices', () => {
      const notANumber = binary('-', num(Infinity), num(Infinity))
      expect(() => evaluate(index(arr(num(1), num(2)), notANumber), env)).toThrow(IndexOutOfBoundsError)
      expect(() => evaluate(index(arr(num(1), num(2)), notANumber), env)).toThrow('Index NaN out of bounds for length 2')
      expect(() => evaluate(index(arr(num(1)), num(Infinity)), env)).toThrow(IndexOutOfBoundsError)
    })

    it('should reject mismatched index types', () => {
      expect(() => evaluate(index(ident('xs'), str('a')), env)).toThrow('Cannot index into Array with String index')
      expect(() => evaluate(index(ident('user'), num(0)), env)).toThrow('Cannot index into Object with Number index')
      expect(() => evaluate(index(num(3), num(0)), env)).toThrow(NotIndexableError)
    })
  })

  describe('enums', () => {
    beforeEach(() => {
      env.defineEnum({
        name: 'Status',
        variants: [
          { name: 'Ok', fields: [] },
          { name: 'Failed', fields: ['reason'] }
        ]
      })
    })

    it('should produce unit variants', () => {
      expect(valueToString(evaluate(member(ident('Status'), 'Ok'), env))).toBe('Status.Ok')
    })

    it('should produce constructors for data variants', () => {
      expect(evaluate(member(ident('Status'), 'Failed'), env)).toEqual({
        kind: 'enum_constructor',
        enumName: 'Status',
        variant: 'Failed',
        arity: 1
      })
    })

    it('should reject unknown variants', () => {
      expect(() => evaluate(member(ident('Status'), 'Pending'), env))
        .toThrow('Type error: expected variant of Status, got Pending')
    })
  })

  describe('ranges', () => {
    it('should produce integers from start inclusive to end exclusive', () => {
      expect(valueToJson(evaluate(range(num(1), num(4)), env))).toEqual([1, 2, 3])
      expect(valueToJson(evaluate(range(num(3), num(3)), env))).toEqual([])
    })

    it('should require numeric bounds', () => {
      expect(() => evaluate(range(str('a'), num(3)), env)).toThrow(QuillTypeError)
    })
  })

  describe('lambdas and calls', () => {
    it('should capture lambda parameters and body', () => {
      const value = evaluate(lambda(['x'], binary('*', ident('x'), num(2))), env)
      expect(value.kind).toBe('lambda')
      expect(valueToString(value)).toBe('<lambda>')
    })

    it('should reject calls', () => {
      expect(() => evaluate(call('search', str('q')), env))
        .toThrow('Type error: expected expression, got function call (requires async context)')
    })
  })
})
