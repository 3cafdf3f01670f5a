import { describe, it, expect, beforeEach } from 'vitest'
import type { JSONSchema7 } from 'json-schema'
import { block, ident, ret } from '../../src/ast'
import { BlockEvaluator } from '../../src/block'
import { Environment } from '../../src/environment'
import { ToolRegistry } from '../../src/tools/registry'
import { UserTool } from '../../src/tools/user_tool'
import { failure, stringArg, success, type Tool, type ToolExecution } from '../../src/tools/types'
import type { JsonValue } from '../../src/values'
import { createSpyLogger, toolCall } from '../fixtures/helpers'

class UpperTool implements Tool {
  readonly description = 'Upper-case text'

  constructor(readonly name = 'upper', private behaviour: 'ok' | 'fail' | 'throw' = 'ok') {}

  parametersSchema(): JSONSchema7 {
    return {
      type: 'object',
      properties: { text: { type: 'string' } },
      required: ['text']
    }
  }

  async execute(args: JsonValue): Promise<ToolExecution> {
    if (this.behaviour === 'throw') throw new Error('exploded')
    if (this.behaviour === 'fail') return failure('refused')
    return success((stringArg(args, 'text') ?? '').toUpperCase())
  }
}

class LooseTool implements Tool {
  readonly name = 'loose'
  readonly description = 'Tool with a broken schema'

  parametersSchema(): JSONSchema7 {
    return { type: 'object', properties: { text: { type: 'string', minLength: -1 } } }
  }

  async execute(): Promise<ToolExecution> {
    return success('ran')
  }
}

describe('ToolRegistry', () => {
  let registry: ToolRegistry
  let logger: ReturnType<typeof createSpyLogger>

  beforeEach(() => {
    logger = createSpyLogger()
    registry = new ToolRegistry(logger)
    registry.register(new UpperTool())
  })

  describe('lookup', () => {
    it('should find registered tools', () => {
      expect(registry.has('upper')).toBe(true)
      expect(registry.get('upper')?.description).toBe('Upper-case text')
      expect(registry.get('lower')).toBeUndefined()
    })

    it('should replace a tool registered under the same name', async () => {
      registry.register(new UpperTool('upper', 'fail'))
      expect(registry.names()).toEqual(['upper'])
      const result = await registry.execute(toolCall('upper', { text: 'a' }))
      expect(result.isError).toBe(true)
    })

    it('should list definitions in the requested order, skipping unknown names', () => {
      registry.register(new UpperTool('shout'))
      const defs = registry.definitionsFor(['shout', 'missing', 'upper'])
      expect(defs.map(d => d.name)).toEqual(['shout', 'upper'])
      expect(defs[0]).toEqual({
        name: 'shout',
        description: 'Upper-case text',
        parameters: {
          type: 'object',
          properties: { text: { type: 'string' } },
          required: ['text']
        }
      })
    })

    it('should register the built-in tools', () => {
      expect(ToolRegistry.withBuiltins().names()).toEqual(['read_file', 'write_file', 'web_fetch', 'json_parse'])
    })
  })

  describe('execute', () => {
    it('should return tool output', async () => {
      const result = await registry.execute(toolCall('upper', { text: 'hi' }, 'c1'))
      expect(result).toEqual({ tool_call_id: 'c1', content: 'HI', isError: false })
    })

    it('should report unknown tools as error results', async () => {
      const result = await registry.execute(toolCall('missing_tool', {}, 'c2'))
      expect(result).toEqual({ tool_call_id: 'c2', content: 'Unknown tool: missing_tool', isError: true })
    })

    it('should reject arguments that do not match the schema', async () => {
      const missing = await registry.execute(toolCall('upper', {}))
      expect(missing.content).toBe("Invalid arguments for upper: (root) must have required property 'text'")
      expect(missing.isError).toBe(true)

      const wrongType = await registry.execute(toolCall('upper', { text: 5 }))
      expect(wrongType.content).toBe('Invalid arguments for upper: /text must be string')
    })

    it('should turn failures into error results', async () => {
      registry.register(new UpperTool('grumpy', 'fail'))
      const result = await registry.execute(toolCall('grumpy', { text: 'a' }))
      expect(result).toEqual({ tool_call_id: 'call_grumpy', content: 'refused', isError: true })
    })

    it('should turn thrown errors into error results', async () => {
      registry.register(new UpperTool('volatile', 'throw'))
      const result = await registry.execute(toolCall('volatile', { text: 'a' }))
      expect(result).toEqual({ tool_call_id: 'call_volatile', content: 'exploded', isError: true })
      expect(logger.warn).toHaveBeenCalledWith("Tool 'volatile' threw", { error: 'exploded' })
    })

    it('should run tools whose schema cannot be compiled without validation', async () => {
      registry.register(new LooseTool())
      const result = await registry.execute(toolCall('loose', { text: 1 }))
      expect(result).toEqual({ tool_call_id: 'call_loose', content: 'ran', isError: false })
      expect(logger.warn).toHaveBeenCalledTimes(1)
      expect(logger.warn.mock.calls[0][0]).toBe("Cannot compile parameter schema for 'loose'")
    })

    it('should accept any JSON value for untyped declared parameters', async () => {
      const echo = new UserTool({
        kind: 'tool',
        name: 'echo',
        params: [{ name: 'x', type: 'any' }, { name: 'times', type: 'number' }],
        body: block(ret(ident('x')))
      }, new Environment(), new BlockEvaluator({ registry }))
      registry.register(echo)

      expect(echo.parametersSchema().properties?.x).toEqual({ type: 'string', description: 'Parameter x' })
      expect(await registry.execute(toolCall('echo', { x: 5, times: 1 }, 'c1'))).toEqual({
        tool_call_id: 'c1',
        content: '5',
        isError: false
      })
      expect((await registry.execute(toolCall('echo', { x: { a: 1 }, times: 1 }))).content).toBe('{a: 1}')
      expect((await registry.execute(toolCall('echo', { x: 'a', times: 'one' }))).content).toBe(
        'Invalid arguments for echo: /times must be number'
      )
      expect((await registry.execute(toolCall('echo', { times: 1 }))).content).toBe(
        "Invalid arguments for echo: (root) must have required property 'x'"
      )
    })
  })
})
