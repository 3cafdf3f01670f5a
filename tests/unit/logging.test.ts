import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { ConsoleLogger, NullLogger, isLogLevel, parseLogLevel } from '../../src/logging'
import { captureLogs } from '../fixtures/helpers'

describe('Logging', () => {
  let capture: ReturnType<typeof captureLogs>

  beforeEach(() => {
    capture = captureLogs()
  })

  afterEach(() => {
    capture.reset()
  })

  describe('parseLogLevel', () => {
    it('should parse levels case-insensitively', () => {
      expect(parseLogLevel('DEBUG')).toBe('debug')
      expect(parseLogLevel(' info ')).toBe('info')
    })

    it('should accept aliases', () => {
      expect(parseLogLevel('warning')).toBe('warn')
      expect(parseLogLevel('none')).toBe('off')
    })

    it('should reject unknown levels', () => {
      expect(parseLogLevel('loud')).toBeUndefined()
      expect(isLogLevel('verbose')).toBe(false)
    })
  })

  describe('ConsoleLogger', () => {
    it('should prefix messages', () => {
      new ConsoleLogger('info').info('started')
      expect(capture.getLogs()).toEqual(['INFO: [quill] started'])
    })

    it('should append fields as JSON', () => {
      new ConsoleLogger('info').warn('slow', { ms: 12 })
      expect(capture.getLogs()).toEqual(['WARN: [quill] slow {"ms":12}'])
    })

    it('should drop messages below the level', () => {
      const logger = new ConsoleLogger('warn')
      logger.debug('hidden')
      logger.info('hidden')
      logger.error('shown')
      expect(capture.getLogs()).toEqual(['ERROR: [quill] shown'])
    })

    it('should route trace through console.debug', () => {
      new ConsoleLogger('trace').trace('deep')
      expect(capture.getLogs()).toEqual(['DEBUG: [quill] deep'])
    })

    it('should print nothing when off', () => {
      new ConsoleLogger('off').error('quiet')
      expect(capture.getLogs()).toEqual([])
    })
  })

  describe('NullLogger', () => {
    it('should print nothing', () => {
      const logger = new NullLogger()
      logger.error('x')
      logger.info('y')
      expect(capture.getLogs()).toEqual([])
    })
  })
})
