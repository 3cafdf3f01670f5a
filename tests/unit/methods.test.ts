import { describe, it, expect } from 'vitest'
import {
  callArrayMethod,
  callEnumMethod,
  callStringMethod,
  isCallbackMethod,
  isMutatingMethod
} from '../../src/methods'
import {
  mkArray,
  mkBool,
  mkEnum,
  mkEnumConstructor,
  mkNull,
  mkNumber,
  mkObject,
  mkString,
  type Value
} from '../../src/values'

const numbers = (...values: number[]): Value[] => values.map(mkNumber)

describe('Built-in methods', () => {
  describe('strings', () => {
    it('should count characters rather than code units', () => {
      expect(callStringMethod('👋hi', 'length', [])).toEqual(mkNumber(3))
    })

    it('should trim and change case', () => {
      expect(callStringMethod('  Hi There ', 'trim', [])).toEqual(mkString('Hi There'))
      expect(callStringMethod('Hi There', 'toLowerCase', [])).toEqual(mkString('hi there'))
      expect(callStringMethod('Hi There', 'toUpperCase', [])).toEqual(mkString('HI THERE'))
    })

    it('should search for substrings', () => {
      expect(callStringMethod('needle in hay', 'contains', [mkString('in')])).toEqual(mkBool(true))
      expect(callStringMethod('needle in hay', 'contains', [mkString('pin')])).toEqual(mkBool(false))
      expect(callStringMethod('needle in hay', 'startsWith', [mkString('need')])).toEqual(mkBool(true))
      expect(callStringMethod('needle in hay', 'endsWith', [mkString('needle')])).toEqual(mkBool(false))
    })

    it('should split on a separator and keep empty parts', () => {
      expect(callStringMethod('a,b,,c', 'split', [mkString(',')])).toEqual(
        mkArray([mkString('a'), mkString('b'), mkString(''), mkString('c')])
      )
    })

    it('should replace only the first occurrence', () => {
      expect(callStringMethod('a-b-c', 'replace', [mkString('-'), mkString('+')])).toEqual(mkString('a+b-c'))
    })

    it('should insert replacement text literally', () => {
      expect(callStringMethod('a-b', 'replace', [mkString('-'), mkString('$&$&')])).toEqual(mkString('a$&$&b'))
    })

    it('should reject missing and mistyped arguments', () => {
      expect(() => callStringMethod('x', 'contains', [])).toThrow(
        'Type error: expected String argument for contains(), got missing argument'
      )
      expect(() => callStringMethod('x', 'replace', [mkString('x'), mkNumber(1)])).toThrow(
        'Type error: expected String argument for replace(), got Number'
      )
    })

    it('should reject unknown methods', () => {
      expect(() => callStringMethod('x', 'reverse', [])).toThrow("Undefined property 'reverse' on String")
    })
  })

  describe('arrays', () => {
    it('should report the length', () => {
      expect(callArrayMethod(numbers(1, 2, 3), 'length', [])).toEqual(mkNumber(3))
    })

    it('should push onto the given elements', () => {
      const elements = numbers(1)
      expect(callArrayMethod(elements, 'push', [mkString('two')])).toEqual(mkNull())
      expect(elements).toEqual([mkNumber(1), mkString('two')])
    })

    it('should require a value to push', () => {
      expect(() => callArrayMethod([], 'push', [])).toThrow('Type error: expected argument for push(), got missing argument')
    })

    it('should pop the last element or null', () => {
      const elements = numbers(1, 2)
      expect(callArrayMethod(elements, 'pop', [])).toEqual(mkNumber(2))
      expect(elements).toEqual(numbers(1))
      expect(callArrayMethod([], 'pop', [])).toEqual(mkNull())
    })

    it('should find indices by structural equality', () => {
      const elements = [mkString('a'), mkObject({ k: mkNumber(1) })]
      expect(callArrayMethod(elements, 'indexOf', [mkObject({ k: mkNumber(1) })])).toEqual(mkNumber(1))
      expect(callArrayMethod(elements, 'indexOf', [mkString('b')])).toEqual(mkNumber(-1))
    })

    it('should join stringified elements', () => {
      const elements = [mkNumber(1), mkString('a'), mkBool(true)]
      expect(callArrayMethod(elements, 'join', [mkString('-')])).toEqual(mkString('1-a-true'))
    })

    it('should clamp slice bounds', () => {
      const elements = numbers(1, 2, 3, 4)
      expect(callArrayMethod(elements, 'slice', numbers(1, 3))).toEqual(mkArray(numbers(2, 3)))
      expect(callArrayMethod(elements, 'slice', numbers(-2, 10))).toEqual(mkArray(numbers(1, 2, 3, 4)))
      expect(callArrayMethod(elements, 'slice', numbers(3, 1))).toEqual(mkArray([]))
    })

    it('should concatenate without changing the receiver', () => {
      const elements = numbers(1)
      expect(callArrayMethod(elements, 'concat', [mkArray(numbers(2, 3))])).toEqual(mkArray(numbers(1, 2, 3)))
      expect(elements).toEqual(numbers(1))
    })

    it('should reject a non-array to concat', () => {
      expect(() => callArrayMethod([], 'concat', [mkString('x')])).toThrow(
        'Type error: expected Array argument for concat(), got String'
      )
    })

    it('should reject unknown methods', () => {
      expect(() => callArrayMethod([], 'sort', [])).toThrow("Undefined property 'sort' on Array")
    })

    it('should classify callback and mutating methods', () => {
      expect(['map', 'filter', 'reduce', 'find', 'push'].map(isCallbackMethod)).toEqual([true, true, true, true, false])
      expect(['push', 'pop', 'slice'].map(isMutatingMethod)).toEqual([true, true, false])
    })
  })

  describe('enum values', () => {
    const circle = { kind: 'enum' as const, enumName: 'Shape', variant: 'Circle', data: numbers(2) }

    it('should match variants and constructors', () => {
      expect(callEnumMethod(circle, 'is', [mkEnumConstructor('Shape', 'Circle', 1)])).toEqual(mkBool(true))
      expect(callEnumMethod(circle, 'is', [mkEnum('Shape', 'Empty')])).toEqual(mkBool(false))
      expect(callEnumMethod(circle, 'is', [mkEnum('Other', 'Circle')])).toEqual(mkBool(false))
      expect(callEnumMethod(circle, 'is', [mkString('Circle')])).toEqual(mkBool(false))
    })

    it('should read payload values by position', () => {
      expect(callEnumMethod(circle, 'data', numbers(0))).toEqual(mkNumber(2))
      expect(callEnumMethod(circle, 'data', numbers(5))).toEqual(mkNull())
    })

    it('should check arguments', () => {
      expect(() => callEnumMethod(circle, 'is', [])).toThrow('Type error: expected 1 argument for is(), got 0 arguments')
      expect(() => callEnumMethod(circle, 'data', [mkString('radius')])).toThrow(
        'Type error: expected Number index for data(), got String'
      )
    })

    it('should leave other names to property access', () => {
      expect(callEnumMethod(circle, 'radius', [])).toBeUndefined()
    })
  })
})
